#!/usr/bin/env ts-node
import { Command } from 'commander';
import { makeBookCommand } from './commands/book';
import { makeChapterCommand } from './commands/chapter';
import type { CliOverrides } from './utils/context';

export function buildProgram(overrides: CliOverrides = {}): Command {
  return new Command()
    .name('srcpress')
    .description('Typeset source files into syntax-highlighted PDF chapters and books')
    .addCommand(makeChapterCommand(overrides))
    .addCommand(makeBookCommand(overrides));
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await buildProgram().parseAsync(argv);
}

export type { CliOverrides } from './utils/context';

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}

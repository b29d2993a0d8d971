/**
 * srcpress → chapter
 *
 *   $ srcpress chapter kernel/fork.c
 *   $ srcpress chapter --color -p linux linux/kernel/fork.c
 */

import { Command } from 'commander';
import { buildChapter, ConsoleNotifier, type Notifier } from '@srcpress/core';
import { createContext, reportFailure, type CliOverrides } from '../utils/context';
import { ChapterOptionsSchema, parseOptions } from '../utils/options';
import { addCommonOptions } from './common';

export function makeChapterCommand(overrides: CliOverrides = {}): Command {
  const command = new Command('chapter')
    .description('Typeset a single source file into a PDF')
    .argument('<file>', 'Source file')
    .option('-p, --parent <dir>', 'Base directory stripped from the path for the title');

  return addCommonOptions(command).action(async (file: string, raw: Record<string, unknown>) => {
    let notifier: Notifier = overrides.notifier ?? new ConsoleNotifier();
    try {
      const opts = parseOptions(ChapterOptionsSchema, raw);
      const ctx = await createContext(opts, overrides);
      notifier = ctx.notifier;

      const pdf = await buildChapter(file, {
        contentRoot: opts.parent,
        color: opts.color,
        keepIntermediates: opts.keep,
        outputDir: opts.output,
        workspaceParent: overrides.workspaceParent,
        renderer: ctx.renderer,
        typesetter: ctx.typesetter,
        languages: ctx.languages,
        notifier,
      });

      (overrides.print ?? console.log)(pdf);
    } catch (error) {
      await reportFailure(error, notifier, overrides);
    }
  });
}

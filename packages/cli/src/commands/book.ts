/**
 * srcpress → book
 *
 *   $ srcpress book -t "Linux 0.01" -r "1991-09-17" -c "linux/kernel" ./linux/kernel
 *   $ srcpress book --color -v 2 -t Kernel -r 0.01 -c kernel ./kernel
 */

import { Command } from 'commander';
import { assembleBook, ConsoleNotifier, type Notifier } from '@srcpress/core';
import { createContext, reportFailure, type CliOverrides } from '../utils/context';
import { BookOptionsSchema, parseOptions } from '../utils/options';
import { addCommonOptions } from './common';

export function makeBookCommand(overrides: CliOverrides = {}): Command {
  const command = new Command('book')
    .description('Typeset every file under a directory into one PDF book (or several volumes)')
    .argument('<directory>', 'Source directory')
    .requiredOption('-t, --title <title>', 'Title for the book')
    .requiredOption('-r, --release <release>', 'Release date string')
    .requiredOption('-c, --contents <contents>', 'Heading for the listed directory')
    .option('-v, --volumes <n>', 'Split the book into this many volumes', '1');

  return addCommonOptions(command).action(async (directory: string, raw: Record<string, unknown>) => {
    let notifier: Notifier = overrides.notifier ?? new ConsoleNotifier();
    try {
      const opts = parseOptions(BookOptionsSchema, raw);
      const ctx = await createContext(opts, overrides);
      notifier = ctx.notifier;

      const pdfs = await assembleBook(directory, {
        title: opts.title,
        release: opts.release,
        contentsLabel: opts.contents,
        color: opts.color,
        volumes: opts.volumes,
        keepIntermediates: opts.keep,
        outputDir: opts.output,
        workspaceParent: overrides.workspaceParent,
        renderer: ctx.renderer,
        typesetter: ctx.typesetter,
        languages: ctx.languages,
        notifier,
      });

      const print = overrides.print ?? console.log;
      pdfs.forEach((pdf) => print(pdf));
    } catch (error) {
      await reportFailure(error, notifier, overrides);
    }
  });
}

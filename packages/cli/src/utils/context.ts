// Wires the ports for one command run from validated options and the environment.

import {
  ConsoleNotifier,
  DEFAULT_LANGUAGES,
  ENV,
  getEnv,
  LatexTypesetter,
  readLanguageTable,
  type CommandRunner,
  type LanguageTable,
  type Notifier,
  type TemplateRenderer,
  type Typesetter,
} from '@srcpress/core';
import { NunjucksRenderer } from '@srcpress/renderer';
import type { CommonOptions } from './options';

/** Test seams; production runs use the defaults. */
export interface CliOverrides {
  runner?: CommandRunner;
  notifier?: Notifier;
  /** Receives each produced PDF path (stdout by default). */
  print?: (line: string) => void;
  setExitCode?: (code: number) => void;
  workspaceParent?: string;
}

export interface RunContext {
  notifier: Notifier;
  renderer: TemplateRenderer;
  typesetter: Typesetter;
  languages: LanguageTable;
}

export async function createContext(opts: CommonOptions, overrides: CliOverrides): Promise<RunContext> {
  const notifier = overrides.notifier ?? new ConsoleNotifier({ quiet: opts.quiet });
  const renderer = new NunjucksRenderer({ templateDir: opts.templates });
  const typesetter = new LatexTypesetter({
    bin: opts.tex ?? getEnv(ENV.TEX_BIN),
    runner: overrides.runner,
    notifier,
  });
  const languages = opts.languages ? await readLanguageTable(opts.languages) : DEFAULT_LANGUAGES;
  return { notifier, renderer, typesetter, languages };
}

export function reportFailure(error: unknown, notifier: Notifier, overrides: CliOverrides): Promise<void> {
  (overrides.setExitCode ?? ((code: number) => { process.exitCode = code; }))(1);
  const message = error instanceof Error ? error.message : String(error);
  return notifier.showErrorMessage(message);
}

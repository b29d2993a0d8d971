// Two-pass LaTeX compilation. The first pass writes the .aux/.toc files, the
// second typesets with references and the table of contents resolved.

import path from 'path';
import fs from 'fs-extra';
import { RenderError, type TypesetPhase } from '../errors';
import type { Notifier } from '../notifier/Notifier';
import type { Typesetter } from '../types';
import { spawnRunner, type CommandRunner, type RunResult } from './command-runner';

export const DEFAULT_TEX_BIN = 'pdflatex';
export const DEFAULT_TEX_ARGS: readonly string[] = ['-interaction=nonstopmode', '-halt-on-error'];

/** Lines of compiler output kept on a RenderError. */
const OUTPUT_TAIL_LINES = 20;

export type TypesetState =
  | { phase: 'pass1' }
  | { phase: 'pass2' }
  | { phase: 'done'; pdfPath: string }
  | { phase: 'failed'; failedIn: TypesetPhase; error: RenderError };

interface TypesetJob {
  /** Source path relative to the working directory. */
  source: string;
  /** `./`-prefixed form handed to the compiler, so a leading `-` is never read as an option. */
  argument: string;
  workingDir: string;
  pdfPath: string;
}

export interface LatexTypesetterOptions {
  bin?: string;
  args?: readonly string[];
  runner?: CommandRunner;
  notifier?: Notifier;
}

const PASS_LABELS: Record<TypesetPhase, string> = {
  pass1: 'Initial render',
  pass2: 'Final render',
};

function tail(result: RunResult): string {
  const lines = `${result.stdout}${result.stderr}`.trimEnd().split(/\r?\n/);
  return lines.slice(-OUTPUT_TAIL_LINES).join('\n');
}

export function isTerminal(state: TypesetState): state is Extract<TypesetState, { phase: 'done' | 'failed' }> {
  return state.phase === 'done' || state.phase === 'failed';
}

export class LatexTypesetter implements Typesetter {
  readonly bin: string;
  private readonly args: readonly string[];
  private readonly runner: CommandRunner;
  private readonly notifier?: Notifier;

  constructor(options: LatexTypesetterOptions = {}) {
    this.bin = options.bin ?? DEFAULT_TEX_BIN;
    this.args = options.args ?? DEFAULT_TEX_ARGS;
    this.runner = options.runner ?? spawnRunner;
    this.notifier = options.notifier;
  }

  async compile(sourcePath: string, workingDir: string): Promise<string> {
    const cwd = path.resolve(workingDir);
    const absoluteSource = path.resolve(cwd, sourcePath);
    const source = path.relative(cwd, absoluteSource);
    const job: TypesetJob = {
      source,
      argument: `./${source.split(path.sep).join('/')}`,
      workingDir: cwd,
      pdfPath: path.join(cwd, `${path.basename(absoluteSource, path.extname(absoluteSource))}.pdf`),
    };

    let state: TypesetState = { phase: 'pass1' };
    while (!isTerminal(state)) {
      state = await this.advance(state, job);
    }
    if (state.phase === 'failed') throw state.error;
    return state.pdfPath;
  }

  /** One transition: pass1 → pass2 | failed, pass2 → done | failed. */
  private async advance(
    state: Extract<TypesetState, { phase: TypesetPhase }>,
    job: TypesetJob,
  ): Promise<TypesetState> {
    const phase = state.phase;
    await this.notifier?.showInformationMessage(PASS_LABELS[phase]);
    // each pass must produce the PDF itself
    await fs.remove(job.pdfPath);

    let result: RunResult;
    try {
      result = await this.runner(this.bin, [...this.args, job.argument], { cwd: job.workingDir });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return this.fail(phase, new RenderError(`Could not start ${this.bin} (${phase}): ${reason}`, {
        phase,
        exitCode: null,
        cause: error,
      }));
    }

    if (result.code !== 0) {
      return this.fail(phase, new RenderError(`${this.bin} failed on ${job.source} (${phase}, exit code ${result.code})`, {
        phase,
        exitCode: result.code,
        output: tail(result),
      }));
    }
    if (!(await fs.pathExists(job.pdfPath))) {
      return this.fail(phase, new RenderError(`${this.bin} produced no ${path.basename(job.pdfPath)} (${phase})`, {
        phase,
        exitCode: result.code,
        output: tail(result),
      }));
    }

    return phase === 'pass1' ? { phase: 'pass2' } : { phase: 'done', pdfPath: job.pdfPath };
  }

  private fail(phase: TypesetPhase, error: RenderError): TypesetState {
    return { phase: 'failed', failedIn: phase, error };
  }
}

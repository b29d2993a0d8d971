import { spawn } from 'child_process';

export interface RunResult {
  /** null when the process was killed by a signal. */
  code: number | null;
  stdout: string;
  stderr: string;
}

/** Runs one external command to completion. Injectable so tests never spawn a compiler. */
export type CommandRunner = (
  bin: string,
  args: readonly string[],
  opts: { cwd: string },
) => Promise<RunResult>;

/** Default runner: no shell, output collected, rejects only when the binary cannot start. */
export const spawnRunner: CommandRunner = (bin, args, opts) =>
  new Promise((resolve, reject) => {
    const ps = spawn(bin, args, { cwd: opts.cwd, shell: false, stdio: ['ignore', 'pipe', 'pipe'] });
    let out = '';
    let err = '';
    ps.stdout.on('data', (d: Buffer) => (out += d.toString()));
    ps.stderr.on('data', (d: Buffer) => (err += d.toString()));
    ps.on('error', reject);
    ps.on('close', (code) => resolve({ code, stdout: out, stderr: err }));
  });

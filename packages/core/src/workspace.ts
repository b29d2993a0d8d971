import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import type { Notifier } from './notifier/Notifier';

export interface WorkspaceOptions {
  /** Leave the directory in place and report it instead of deleting it. */
  keep?: boolean;
  prefix?: string;
  /** Parent directory; defaults to the OS temp dir. */
  parentDir?: string;
  notifier: Notifier;
}

/**
 * Run `task` inside a fresh temporary directory owned by this run. The
 * directory is removed on every exit path, failures included, unless `keep`.
 */
export async function withWorkspace<T>(
  task: (workDir: string) => Promise<T>,
  options: WorkspaceOptions,
): Promise<T> {
  const parent = options.parentDir ?? os.tmpdir();
  const workDir = await fs.mkdtemp(path.join(parent, options.prefix ?? 'srcpress-'));

  try {
    return await task(workDir);
  } finally {
    if (options.keep) {
      await options.notifier.showInformationMessage(`Kept intermediate sources in ${workDir}`);
    } else {
      try {
        await fs.remove(workDir);
      } catch (error) {
        // must not mask the task's own failure
        const reason = error instanceof Error ? error.message : String(error);
        await options.notifier.showWarningMessage(`Could not remove ${workDir}: ${reason}`);
      }
    }
  }
}

// Recursive source discovery. Only regular files count as chapters; symlinks,
// sockets, FIFOs and device nodes are skipped and never followed.

import path from 'path';
import fs from 'fs-extra';
import fg from 'fast-glob';
import { EmptyInputError, InputPathError } from './errors';

/** Plain code-unit order, independent of locale and of readdir order. */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

async function assertDirectory(rootDir: string): Promise<void> {
  const stat = await fs.stat(rootDir).catch(() => null);
  if (!stat) throw new InputPathError(rootDir, 'Source directory not found');
  if (!stat.isDirectory()) {
    throw new InputPathError(rootDir, 'Source path is not a directory');
  }
}

/** All regular files under rootDir (dotfiles included) as absolute, sorted paths. */
export async function discoverSourceFiles(rootDir: string): Promise<string[]> {
  const root = path.resolve(rootDir);
  await assertDirectory(root);

  const files = await fg('**/*', {
    cwd: root,
    absolute: true,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    suppressErrors: false,
  });

  // fast-glob reports "/" separators on every platform
  const normalized = files.map((file) => path.normalize(file));
  normalized.sort(compareCodeUnits);

  if (normalized.length === 0) throw new EmptyInputError(root);
  return normalized;
}

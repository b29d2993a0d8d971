import path from 'path';
import { PathScopeError } from './errors';
import type { SourceFile } from './types';

/** Separator between path segments in chapter titles. */
export const BREADCRUMB_SEPARATOR = '/';

function isOutside(relative: string): boolean {
  return (
    relative === '' ||
    relative === '..' ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  );
}

/**
 * Title of a chapter: the path relative to `contentRoot` as a breadcrumb, or
 * the bare file name when no root is given. Throws PathScopeError when the
 * file is not below the root.
 */
export function deriveTitle(filePath: string, contentRoot?: string): string {
  const absolute = path.resolve(filePath);
  if (contentRoot === undefined) return path.basename(absolute);

  const root = path.resolve(contentRoot);
  const relative = path.relative(root, absolute);
  if (isOutside(relative)) throw new PathScopeError(absolute, root);
  return relative.split(path.sep).join(BREADCRUMB_SEPARATOR);
}

/** Inverse of deriveTitle: the platform relative path a title came from. */
export function titleToRelativePath(title: string): string {
  return title.split(BREADCRUMB_SEPARATOR).join(path.sep);
}

/**
 * `kernel/fork.c` → `kernel_fork_c`. Anything outside [A-Za-z0-9-] becomes
 * "_", so distinct inputs can collide (`a_b.c` and `a/b_c`); callers
 * holding several identifiers must reject duplicates.
 */
export function toIdentifier(text: string): string {
  return text.replace(/[^A-Za-z0-9-]/gu, '_');
}

export function toSourceFile(filePath: string, contentRoot: string): SourceFile {
  const absolutePath = path.resolve(filePath);
  return {
    absolutePath,
    extension: path.extname(absolutePath),
    relativePath: deriveTitle(absolutePath, contentRoot),
  };
}

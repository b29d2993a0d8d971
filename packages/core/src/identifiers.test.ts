import path from 'path';
import { PathScopeError } from './errors';
import { deriveTitle, titleToRelativePath, toIdentifier, toSourceFile } from './identifiers';

const ROOT = path.resolve('/work/src');

describe('deriveTitle', () => {
  it('uses the path below the content root as breadcrumb', () => {
    expect(deriveTitle(path.join(ROOT, 'kernel', 'fork.c'), ROOT)).toBe('kernel/fork.c');
    expect(deriveTitle(path.join(ROOT, 'kernel', 'fork.c'), path.join(ROOT, 'kernel'))).toBe('fork.c');
  });

  it('falls back to the file name without a content root', () => {
    expect(deriveTitle(path.join(ROOT, 'kernel', 'fork.c'))).toBe('fork.c');
  });

  it('keeps dotfiles and names that merely start with two dots', () => {
    expect(deriveTitle(path.join(ROOT, '.config'), ROOT)).toBe('.config');
    expect(deriveTitle(path.join(ROOT, '..notes'), ROOT)).toBe('..notes');
  });

  it('rejects files outside the content root', () => {
    expect(() => deriveTitle(path.resolve('/work/other/x.c'), ROOT)).toThrow(PathScopeError);
    expect(() => deriveTitle(path.resolve('/work/other/x.c'), ROOT)).toThrow(
      `File ${path.resolve('/work/other/x.c')} is outside content root ${ROOT}`,
    );
  });

  it('rejects a sibling directory sharing the root as prefix', () => {
    expect(() => deriveTitle(path.resolve('/work/src2/x.c'), ROOT)).toThrow(PathScopeError);
  });

  it('rejects the content root itself', () => {
    expect(() => deriveTitle(ROOT, ROOT)).toThrow(PathScopeError);
  });
});

describe('titleToRelativePath', () => {
  it('inverts deriveTitle', () => {
    const file = path.join(ROOT, 'mm', 'swap', 'page.c');
    expect(titleToRelativePath(deriveTitle(file, ROOT))).toBe(path.relative(ROOT, file));
  });
});

describe('toIdentifier', () => {
  it('replaces everything but letters, digits and hyphens', () => {
    expect(toIdentifier('kernel/fork.c')).toBe('kernel_fork_c');
    expect(toIdentifier('a b+c-d.h')).toBe('a_b_c-d_h');
    expect(toIdentifier('Makefile')).toBe('Makefile');
  });

  it('replaces each non-ASCII character with one underscore', () => {
    expect(toIdentifier('é.c')).toBe('__c');
  });

  it('maps distinct titles onto the same identifier', () => {
    expect(toIdentifier('a_b.c')).toBe(toIdentifier('a/b_c'));
  });
});

describe('toSourceFile', () => {
  it('describes a file below the root', () => {
    expect(toSourceFile(path.join(ROOT, 'kernel', 'fork.c'), ROOT)).toEqual({
      absolutePath: path.join(ROOT, 'kernel', 'fork.c'),
      extension: '.c',
      relativePath: 'kernel/fork.c',
    });
  });

  it('reports an empty extension for bare names', () => {
    expect(toSourceFile(path.join(ROOT, 'Makefile'), ROOT).extension).toBe('');
  });
});

import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import {
  assembleBook,
  assertDistinctIdentifiers,
  bookTemplateVariables,
  buildBookUnits,
  wrapperFileName,
  type AssembleBookOptions,
} from './book-assembler';
import {
  ChapterAssemblyError,
  ConfigurationError,
  EmptyInputError,
  InputPathError,
  RenderError,
  TemplateVariableError,
  VolumeCountError,
} from './errors';
import { toSourceFile } from './identifiers';
import { MemoryNotifier } from './notifier/MemoryNotifier';
import type { ChapterUnit, TemplateVariables, Typesetter } from './types';

function chapter(title: string): ChapterUnit {
  const identifier = title.replace(/[^A-Za-z0-9-]/g, '_');
  return {
    sourcePath: `/src/${title}`,
    title,
    identifier,
    fragmentFile: path.join('chapters', `${identifier}.tex`),
    language: 'C',
    color: false,
  };
}

describe('buildBookUnits', () => {
  const chapters = ['a.c', 'b.c', 'sub/c.c'].map(chapter);
  const book = { title: 'Kernel', release: '1991', contentsLabel: 'linux', volumes: 1 };

  it('returns one unit without volume info for a single volume', () => {
    const units = buildBookUnits(chapters, book);

    expect(units).toHaveLength(1);
    expect(units[0]?.title).toBe('Kernel');
    expect(units[0]?.volume).toBeUndefined();
    expect(units[0]?.chapters).toEqual(chapters);
  });

  it('numbers volumes in their titles', () => {
    const units = buildBookUnits(chapters, { ...book, volumes: 2 });

    expect(units.map((unit) => unit.title)).toEqual(['Kernel, Volume 1 of 2', 'Kernel, Volume 2 of 2']);
    expect(units.map((unit) => unit.chapters.map((c) => c.title))).toEqual([['a.c', 'b.c'], ['sub/c.c']]);
    expect(units[1]?.volume).toEqual({ index: 2, total: 2 });
  });
});

describe('wrapperFileName', () => {
  it('slugs the title and suffixes the volume', () => {
    expect(wrapperFileName('Linux 0.01')).toBe('Linux_0_01.tex');
    expect(wrapperFileName('Linux 0.01', { index: 3, total: 4 })).toBe('Linux_0_01_vol3.tex');
  });
});

describe('bookTemplateVariables', () => {
  it('lists the chapters as \\input targets', () => {
    const [unit] = buildBookUnits(['a.c', 'sub/c.c'].map(chapter), {
      title: 'Kernel',
      release: '1991',
      contentsLabel: 'linux',
      volumes: 1,
    });
    if (!unit) throw new Error('no book unit');

    expect(bookTemplateVariables(unit, true)).toEqual({
      title: 'Kernel',
      releasedate: '1991',
      contentsdir: 'linux',
      color: true,
      license: 'front/license',
      sections: [
        { title: 'a.c', texFile: 'chapters/a_c' },
        { title: 'sub/c.c', texFile: 'chapters/sub_c_c' },
      ],
      volume: null,
    });
  });
});

describe('assertDistinctIdentifiers', () => {
  it('rejects two files that map onto the same fragment', () => {
    const root = path.resolve('/src');
    const first = path.join(root, 'a', 'b_c');
    const second = path.join(root, 'a_b.c');

    const sources = [first, second].map((file) => toSourceFile(file, root));

    expect(() => assertDistinctIdentifiers(sources)).toThrow(
      `Chapter ${second}: identifier "a_b_c" is already used by ${first}`,
    );
  });

  it('accepts distinct names', () => {
    const root = path.resolve('/src');
    const sources = ['a.c', 'b.c'].map((name) => toSourceFile(path.join(root, name), root));
    expect(() => assertDistinctIdentifiers(sources)).not.toThrow();
  });
});

describe('assembleBook', () => {
  let sandbox: string;
  let root: string;
  let outputDir: string;
  let workspaceParent: string;
  let notifier: MemoryNotifier;

  /** Records every rendered template and returns a marker line. */
  const render = jest.fn<string, [string, TemplateVariables]>((template) => `% ${template}\n`);

  /** Writes `<base>.pdf` beside the wrapper, like a real compiler would. */
  const compile = jest.fn<Promise<string>, [string, string]>(async (source) => {
    const pdf = source.replace(/\.tex$/, '.pdf');
    await fs.writeFile(pdf, '%PDF-1.4\n');
    return pdf;
  });
  const typesetter: Typesetter = { compile };

  const options = (overrides: Partial<AssembleBookOptions> = {}): AssembleBookOptions => ({
    title: 'Kernel',
    release: '1991',
    contentsLabel: 'linux',
    outputDir,
    workspaceParent,
    renderer: { render },
    typesetter,
    notifier,
    ...overrides,
  });

  const bookCalls = (): TemplateVariables[] =>
    render.mock.calls.filter(([template]) => template === 'book.tex').map(([, variables]) => variables);

  beforeEach(async () => {
    render.mockClear();
    compile.mockClear();
    sandbox = await fs.mkdtemp(path.join(os.tmpdir(), 'srcpress-book-'));
    root = path.join(sandbox, 'src');
    outputDir = path.join(sandbox, 'out');
    workspaceParent = path.join(sandbox, 'tmp');
    await fs.ensureDir(workspaceParent);
    for (const name of ['b.c', 'a.c', 'sub/c.c']) {
      await fs.outputFile(path.join(root, name), `/* ${name} */\n`, 'utf8');
    }
    notifier = new MemoryNotifier();
  });

  afterEach(async () => {
    await fs.remove(sandbox);
  });

  it('typesets one book with every chapter in order', async () => {
    const pdfs = await assembleBook(root, options());

    expect(pdfs).toEqual([path.join(outputDir, 'Kernel.pdf')]);
    expect(await fs.pathExists(pdfs[0] ?? '')).toBe(true);

    const [book] = bookCalls();
    expect(book?.title).toBe('Kernel');
    expect(book?.volume).toBeNull();
    expect(book?.sections).toEqual([
      { title: 'a.c', texFile: 'chapters/a_c' },
      { title: 'b.c', texFile: 'chapters/b_c' },
      { title: 'sub/c.c', texFile: 'chapters/sub_c_c' },
    ]);
    expect(render.mock.calls.map(([template]) => template)).toEqual([
      'section.tex',
      'section.tex',
      'section.tex',
      'license.tex',
      'book.tex',
    ]);
    expect(render.mock.calls[3]?.[1]).toEqual({ title: 'Kernel', releasedate: '1991' });
    expect(compile).toHaveBeenCalledTimes(1);
    expect(await fs.readdir(workspaceParent)).toEqual([]);
  });

  it('reports progress', async () => {
    await assembleBook(root, options());

    expect(notifier.messages('information')).toEqual([
      `Rendering ${path.join('chapters', 'a_c.tex')}`,
      `Rendering ${path.join('chapters', 'b_c.tex')}`,
      `Rendering ${path.join('chapters', 'sub_c_c.tex')}`,
      'Compiling Kernel.tex',
    ]);
  });

  it('splits the chapters across volumes', async () => {
    const pdfs = await assembleBook(root, options({ volumes: 2 }));

    expect(pdfs).toEqual([path.join(outputDir, 'Kernel_vol1.pdf'), path.join(outputDir, 'Kernel_vol2.pdf')]);
    const books = bookCalls();
    expect(books.map((book) => book.title)).toEqual(['Kernel, Volume 1 of 2', 'Kernel, Volume 2 of 2']);
    expect(books.map((book) => book.volume)).toEqual([
      { index: 1, total: 2 },
      { index: 2, total: 2 },
    ]);
    expect(books[0]?.sections).toEqual([
      { title: 'a.c', texFile: 'chapters/a_c' },
      { title: 'b.c', texFile: 'chapters/b_c' },
    ]);
    expect(books[1]?.sections).toEqual([{ title: 'sub/c.c', texFile: 'chapters/sub_c_c' }]);
    expect(compile).toHaveBeenCalledTimes(2);
  });

  it('keeps the workspace on request', async () => {
    await assembleBook(root, options({ keepIntermediates: true }));

    const [kept] = await fs.readdir(workspaceParent);
    const workDir = path.join(workspaceParent, kept ?? '');
    expect((await fs.readdir(workDir)).sort()).toEqual(['Kernel.pdf', 'Kernel.tex', 'chapters', 'front']);
    expect(await fs.readdir(path.join(workDir, 'front'))).toEqual(['license.tex']);
    expect((await fs.readdir(path.join(workDir, 'chapters'))).sort()).toEqual(['a_c.tex', 'b_c.tex', 'sub_c_c.tex']);
    expect(notifier.messages('information')).toContain(`Kept intermediate sources in ${workDir}`);
  });

  it('keeps the license apart from a wrapper named after it', async () => {
    const pdfs = await assembleBook(root, options({ title: 'license', keepIntermediates: true }));

    const [kept] = await fs.readdir(workspaceParent);
    const workDir = path.join(workspaceParent, kept ?? '');
    expect(pdfs).toEqual([path.join(outputDir, 'license.pdf')]);
    expect(await fs.readFile(path.join(workDir, 'license.tex'), 'utf8')).toBe('% book.tex\n');
    expect(await fs.readFile(path.join(workDir, 'front', 'license.tex'), 'utf8')).toBe('% license.tex\n');
    expect(bookCalls()[0]?.license).toBe('front/license');
  });

  it('rejects a blank title', async () => {
    await expect(assembleBook(root, options({ title: '  ' }))).rejects.toThrow(ConfigurationError);
    expect(render).not.toHaveBeenCalled();
  });

  it('rejects a directory without files', async () => {
    const empty = path.join(sandbox, 'empty');
    await fs.ensureDir(empty);

    await expect(assembleBook(empty, options())).rejects.toThrow(EmptyInputError);
    expect(await fs.pathExists(outputDir)).toBe(false);
  });

  it('rejects a missing directory', async () => {
    await expect(assembleBook(path.join(sandbox, 'missing'), options())).rejects.toThrow(InputPathError);
  });

  it('rejects more volumes than chapters before rendering', async () => {
    await expect(assembleBook(root, options({ volumes: 4 }))).rejects.toThrow(VolumeCountError);
    expect(render).not.toHaveBeenCalled();
  });

  it('rejects colliding chapter identifiers before rendering', async () => {
    await fs.outputFile(path.join(root, 'a_b.c'), '', 'utf8');
    await fs.outputFile(path.join(root, 'a', 'b_c'), '', 'utf8');

    await expect(assembleBook(root, options())).rejects.toThrow(
      `Chapter ${path.join(root, 'a_b.c')}: identifier "a_b_c" is already used by ${path.join(root, 'a', 'b_c')}`,
    );
    expect(render).not.toHaveBeenCalled();
  });

  it('wraps a chapter failure with the file it came from', async () => {
    render.mockImplementation((template, variables) => {
      if (variables.title === 'b.c') throw new TemplateVariableError(template, 'missing variable');
      return `% ${template}\n`;
    });

    try {
      const failure = await assembleBook(root, options()).then(
        () => undefined,
        (error: unknown) => error,
      );
      expect(failure).toBeInstanceOf(ChapterAssemblyError);
      if (!(failure instanceof ChapterAssemblyError)) return;
      expect(failure.file).toBe(path.join(root, 'b.c'));
      expect(failure.cause).toBeInstanceOf(TemplateVariableError);
      expect(compile).not.toHaveBeenCalled();
      expect(await fs.readdir(workspaceParent)).toEqual([]);
    } finally {
      render.mockImplementation((template) => `% ${template}\n`);
    }
  });

  it('publishes nothing when a later volume fails to compile', async () => {
    compile.mockImplementationOnce(async (source) => {
      const pdf = source.replace(/\.tex$/, '.pdf');
      await fs.writeFile(pdf, '%PDF-1.4\n');
      return pdf;
    });
    compile.mockImplementationOnce(async () => {
      throw new RenderError('pdflatex failed on Kernel_vol2.tex (pass1, exit code 1)', {
        phase: 'pass1',
        exitCode: 1,
      });
    });

    await expect(assembleBook(root, options({ volumes: 2 }))).rejects.toThrow(RenderError);
    expect(await fs.pathExists(outputDir)).toBe(false);
    expect(await fs.readdir(workspaceParent)).toEqual([]);
  });
});

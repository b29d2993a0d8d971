// Book assembly: discover → render every chapter → split into volumes →
// render one wrapper per volume → compile all → copy the PDFs out.
// Either every PDF lands in the output directory or none does.

import path from 'path';
import fs from 'fs-extra';
import { assembleChapter } from './chapter-assembler';
import { discoverSourceFiles } from './discovery';
import { ChapterAssemblyError, ConfigurationError } from './errors';
import { toIdentifier, toSourceFile } from './identifiers';
import { DEFAULT_LANGUAGES } from './languages';
import type { Notifier } from './notifier/Notifier';
import { assertVolumeCount, partitionVolumes } from './partition';
import type {
  BookTemplateVariables,
  BookUnit,
  ChapterUnit,
  LanguageTable,
  SourceFile,
  TemplateRenderer,
  Typesetter,
} from './types';
import { withWorkspace } from './workspace';

export const BOOK_TEMPLATE = 'book.tex';
export const LICENSE_TEMPLATE = 'license.tex';
/** Workspace layout: wrappers at the top, chapters and front matter below. */
export const CHAPTERS_DIR = 'chapters';
export const FRONT_DIR = 'front';
const LICENSE_FRAGMENT = path.join(FRONT_DIR, 'license.tex');

export interface AssembleBookOptions {
  title: string;
  release: string;
  contentsLabel: string;
  color?: boolean;
  volumes?: number;
  keepIntermediates?: boolean;
  /** Where the PDFs end up; defaults to the current directory. */
  outputDir?: string;
  /** Parent of the temporary workspace; defaults to the OS temp dir. */
  workspaceParent?: string;
  renderer: TemplateRenderer;
  typesetter: Typesetter;
  languages?: LanguageTable;
  notifier: Notifier;
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** `chapters/fork_c.tex` → `chapters/fork_c`, the form \input expects. */
function toTexInput(file: string): string {
  return file.replace(/\.tex$/, '').split(path.sep).join('/');
}

/** Reject two files that would share a fragment name, before anything is written. */
export function assertDistinctIdentifiers(sources: readonly SourceFile[]): void {
  const seen = new Map<string, string>();
  for (const source of sources) {
    const identifier = toIdentifier(source.relativePath);
    const previous = seen.get(identifier);
    if (previous !== undefined) {
      throw new ChapterAssemblyError(
        source.absolutePath,
        `identifier "${identifier}" is already used by ${previous}`,
      );
    }
    seen.set(identifier, source.absolutePath);
  }
}

/** One BookUnit per volume; a single unit without volume info when volumes is 1. */
export function buildBookUnits(
  chapters: readonly ChapterUnit[],
  book: { title: string; release: string; contentsLabel: string; volumes: number },
): BookUnit[] {
  const groups = partitionVolumes(chapters, book.volumes);
  if (groups.length === 1) {
    return [{ title: book.title, release: book.release, contentsLabel: book.contentsLabel, chapters }];
  }
  return groups.map((group, i) => ({
    title: `${book.title}, Volume ${i + 1} of ${groups.length}`,
    release: book.release,
    contentsLabel: book.contentsLabel,
    chapters: group,
    volume: { index: i + 1, total: groups.length },
  }));
}

/** Wrapper file name: `<slug>.tex`, or `<slug>_vol<i>.tex` for a split book. */
export function wrapperFileName(bookTitle: string, volume?: BookUnit['volume']): string {
  const slug = toIdentifier(bookTitle);
  return volume ? `${slug}_vol${volume.index}.tex` : `${slug}.tex`;
}

export function bookTemplateVariables(book: BookUnit, color: boolean): BookTemplateVariables {
  return {
    title: book.title,
    releasedate: book.release,
    contentsdir: book.contentsLabel,
    color,
    license: toTexInput(LICENSE_FRAGMENT),
    sections: book.chapters.map((chapter) => ({
      title: chapter.title,
      texFile: toTexInput(chapter.fragmentFile),
    })),
    volume: book.volume ?? null,
  };
}

async function renderChapters(
  sources: readonly SourceFile[],
  contentRoot: string,
  workDir: string,
  options: AssembleBookOptions,
): Promise<ChapterUnit[]> {
  const chapters: ChapterUnit[] = [];
  for (const source of sources) {
    try {
      const chapter = await assembleChapter(source.absolutePath, {
        contentRoot,
        color: options.color ?? false,
        workDir,
        fragmentDir: CHAPTERS_DIR,
        renderer: options.renderer,
        languages: options.languages ?? DEFAULT_LANGUAGES,
      });
      await options.notifier.showInformationMessage(`Rendering ${chapter.fragmentFile}`);
      chapters.push(chapter);
    } catch (error) {
      throw new ChapterAssemblyError(source.absolutePath, reasonOf(error), { cause: error });
    }
  }
  return chapters;
}

/** Copy every PDF or none: copies made before a failure are removed again. */
async function publishAll(pdfs: readonly string[], outputDir: string): Promise<string[]> {
  await fs.ensureDir(outputDir);
  const published: string[] = [];
  try {
    for (const pdf of pdfs) {
      const target = path.join(outputDir, path.basename(pdf));
      await fs.copy(pdf, target, { overwrite: true });
      published.push(target);
    }
  } catch (error) {
    await Promise.all(published.map((file) => fs.remove(file)));
    throw error;
  }
  return published;
}

/**
 * Typeset every regular file under `rootDir` into one book (or `volumes`
 * books) and return the PDF paths in the output directory.
 */
export async function assembleBook(rootDir: string, options: AssembleBookOptions): Promise<string[]> {
  if (!options.title.trim()) throw new ConfigurationError('Book title must not be empty', { field: 'title' });
  const root = path.resolve(rootDir);
  const volumes = options.volumes ?? 1;
  const outputDir = path.resolve(options.outputDir ?? process.cwd());

  const sources = (await discoverSourceFiles(root)).map((file) => toSourceFile(file, root));
  assertVolumeCount(volumes, sources.length);
  assertDistinctIdentifiers(sources);

  return withWorkspace(
    async (workDir) => {
      const chapters = await renderChapters(sources, root, workDir, options);

      const license = options.renderer.render(LICENSE_TEMPLATE, {
        title: options.title,
        releasedate: options.release,
      });
      await fs.outputFile(path.join(workDir, LICENSE_FRAGMENT), license, 'utf8');

      const books = buildBookUnits(chapters, {
        title: options.title,
        release: options.release,
        contentsLabel: options.contentsLabel,
        volumes,
      });

      const pdfs: string[] = [];
      for (const book of books) {
        const wrapper = wrapperFileName(options.title, book.volume);
        const tex = options.renderer.render(BOOK_TEMPLATE, bookTemplateVariables(book, options.color ?? false));
        await fs.writeFile(path.join(workDir, wrapper), tex, 'utf8');
        await options.notifier.showInformationMessage(`Compiling ${wrapper}`);
        pdfs.push(await options.typesetter.compile(path.join(workDir, wrapper), workDir));
      }

      return publishAll(pdfs, outputDir);
    },
    { keep: options.keepIntermediates, notifier: options.notifier, parentDir: options.workspaceParent },
  );
}

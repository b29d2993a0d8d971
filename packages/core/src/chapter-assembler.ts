import path from 'path';
import fs from 'fs-extra';
import { FileAccessError } from './errors';
import { deriveTitle, toIdentifier } from './identifiers';
import { resolveLanguage } from './languages';
import type {
  ChapterTemplateVariables,
  ChapterUnit,
  LanguageTable,
  TemplateRenderer,
} from './types';

/** Listing fragment, \input by a book. */
export const SECTION_TEMPLATE = 'section.tex';
/** Complete document around one listing (chapter mode). */
export const CHAPTER_TEMPLATE = 'chapter.tex';

export interface AssembleChapterOptions {
  /** Directory stripped from the path to build the title; the file name alone when omitted. */
  contentRoot?: string;
  color: boolean;
  workDir: string;
  /** Sub-directory of workDir receiving the fragment. */
  fragmentDir?: string;
  renderer: TemplateRenderer;
  languages: LanguageTable;
  template?: string;
}

async function assertReadableFile(filePath: string): Promise<void> {
  const stat = await fs.stat(filePath).catch(() => null);
  if (!stat) throw new FileAccessError(filePath, 'File not found');
  if (!stat.isFile()) throw new FileAccessError(filePath, 'Not a regular file');
  try {
    await fs.access(filePath, fs.constants.R_OK);
  } catch (error) {
    throw new FileAccessError(filePath, 'File is not readable', { cause: error });
  }
}

/** LaTeX wants "/" even on Windows. */
function toTexPath(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

/**
 * Render one source file into `<identifier>.tex` under the workspace and
 * describe it. Nothing is written when the file is unusable or out of scope.
 */
export async function assembleChapter(
  filePath: string,
  options: AssembleChapterOptions,
): Promise<ChapterUnit> {
  const sourcePath = path.resolve(filePath);
  await assertReadableFile(sourcePath);

  const title = deriveTitle(sourcePath, options.contentRoot);
  const identifier = toIdentifier(title);
  const language = resolveLanguage(sourcePath, options.languages);
  const fragmentFile = path.join(options.fragmentDir ?? '', `${identifier}.tex`);

  const variables: ChapterTemplateVariables = {
    language,
    color: options.color,
    title,
    filepath: toTexPath(sourcePath),
  };
  const tex = options.renderer.render(options.template ?? SECTION_TEMPLATE, variables);

  const target = path.join(options.workDir, fragmentFile);
  await fs.ensureDir(path.dirname(target));
  await fs.writeFile(target, tex, 'utf8');

  return {
    sourcePath,
    title,
    identifier,
    fragmentFile,
    language,
    color: options.color,
  };
}

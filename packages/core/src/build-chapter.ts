import path from 'path';
import fs from 'fs-extra';
import { assembleChapter, CHAPTER_TEMPLATE } from './chapter-assembler';
import { DEFAULT_LANGUAGES } from './languages';
import type { Notifier } from './notifier/Notifier';
import type { LanguageTable, TemplateRenderer, Typesetter } from './types';
import { withWorkspace } from './workspace';

export interface BuildChapterOptions {
  /** Strip this directory from the path for the title (`-p` in the CLI). */
  contentRoot?: string;
  color?: boolean;
  /** Keep the workspace and copy the .tex source next to the PDF. */
  keepIntermediates?: boolean;
  outputDir?: string;
  workspaceParent?: string;
  renderer: TemplateRenderer;
  typesetter: Typesetter;
  languages?: LanguageTable;
  notifier: Notifier;
}

/** Typeset a single source file as a standalone document; returns the PDF path in outputDir. */
export async function buildChapter(filePath: string, options: BuildChapterOptions): Promise<string> {
  const outputDir = path.resolve(options.outputDir ?? process.cwd());

  return withWorkspace(
    async (workDir) => {
      const chapter = await assembleChapter(filePath, {
        contentRoot: options.contentRoot,
        color: options.color ?? false,
        workDir,
        renderer: options.renderer,
        languages: options.languages ?? DEFAULT_LANGUAGES,
        template: CHAPTER_TEMPLATE,
      });
      await options.notifier.showInformationMessage(`Rendering ${chapter.fragmentFile}`);

      const source = path.join(workDir, chapter.fragmentFile);
      const pdf = await options.typesetter.compile(source, workDir);

      await fs.ensureDir(outputDir);
      const target = path.join(outputDir, path.basename(pdf));
      await fs.copy(pdf, target, { overwrite: true });
      if (options.keepIntermediates) {
        await fs.copy(source, path.join(outputDir, path.basename(source)), { overwrite: true });
      }
      return target;
    },
    { keep: options.keepIntermediates, notifier: options.notifier, parentDir: options.workspaceParent },
  );
}

export interface SourceFile {
  absolutePath: string;
  /** Extension including the dot, e.g. ".c"; empty when the name has none. */
  extension: string;
  /** Path relative to the content root, always with "/" separators. */
  relativePath: string;
}

export interface ChapterUnit {
  sourcePath: string;
  /** Breadcrumb title: the relative path with "/" between segments. */
  title: string;
  /** File-system and \input-safe identifier derived from the title. */
  identifier: string;
  /** Rendered fragment, relative to the workspace. */
  fragmentFile: string;
  language: string;
  color: boolean;
}

export interface VolumeInfo {
  index: number;
  total: number;
}

export interface BookUnit {
  title: string;
  release: string;
  contentsLabel: string;
  chapters: readonly ChapterUnit[];
  volume?: VolumeInfo;
}

/** Read-only extension → listings language mapping. */
export interface LanguageTable {
  readonly fileNames: Readonly<Record<string, string>>;
  readonly extensions: Readonly<Record<string, string>>;
  /** Used when nothing matches; "" means no highlighting. */
  readonly fallback: string;
}

export type TemplateVariables = Record<string, unknown>;

/** Port implemented by @srcpress/renderer. */
export interface TemplateRenderer {
  render(template: string, variables: TemplateVariables): string;
}

/** Port for the two-pass typesetting compiler. */
export interface Typesetter {
  compile(sourcePath: string, workingDir: string): Promise<string>;
}

/** Template variables of the single-file listing templates. */
export interface ChapterTemplateVariables extends TemplateVariables {
  language: string;
  color: boolean;
  title: string;
  filepath: string;
}

export interface BookSectionEntry {
  title: string;
  texFile: string;
}

/** Template variables of the book wrapper template. */
export interface BookTemplateVariables extends TemplateVariables {
  title: string;
  releasedate: string;
  contentsdir: string;
  color: boolean;
  license: string;
  sections: BookSectionEntry[];
  volume: VolumeInfo | null;
}

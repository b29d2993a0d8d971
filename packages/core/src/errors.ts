// Domain error hierarchy. Every error aborts the current run; nothing is retried.

/** Base class for domain-level errors. */
export abstract class DomainError extends Error {
  override readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = new.target.name;
    this.cause = options?.cause;
  }
}

/** Root directory (or target file in chapter mode) is missing or of the wrong kind. */
export class InputPathError extends DomainError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`${reason}: ${path}`);
    this.path = path;
  }
}

/** Source file does not exist, is not a regular file, or cannot be read. */
export class FileAccessError extends DomainError {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`${reason}: ${path}`, options);
    this.path = path;
  }
}

/** Source file lies outside the declared content root. */
export class PathScopeError extends DomainError {
  readonly path: string;
  readonly contentRoot: string;

  constructor(path: string, contentRoot: string) {
    super(`File ${path} is outside content root ${contentRoot}`);
    this.path = path;
    this.contentRoot = contentRoot;
  }
}

/** Discovery found no eligible files under the root. */
export class EmptyInputError extends DomainError {
  constructor(rootDir: string) {
    super(`No eligible source files found under ${rootDir}`);
  }
}

/** Wraps a per-file failure during book assembly. */
export class ChapterAssemblyError extends DomainError {
  readonly file: string;

  constructor(file: string, message: string, options?: { cause?: unknown }) {
    super(`Chapter ${file}: ${message}`, options);
    this.file = file;
  }
}

/** Template missing, unparsable, or failing while rendering. */
export class TemplateError extends DomainError {
  readonly template: string;

  constructor(template: string, message: string, options?: { cause?: unknown }) {
    super(`Template ${template}: ${message}`, options);
    this.template = template;
  }
}

/** A template referenced a variable that was not supplied. */
export class TemplateVariableError extends TemplateError {}

export type TypesetPhase = 'pass1' | 'pass2';

/** The external compiler failed, could not start, or produced no PDF. */
export class RenderError extends DomainError {
  readonly phase: TypesetPhase;
  readonly exitCode: number | null;
  readonly output: string;

  constructor(
    message: string,
    details: { phase: TypesetPhase; exitCode: number | null; output?: string; cause?: unknown },
  ) {
    super(message, { cause: details.cause });
    this.phase = details.phase;
    this.exitCode = details.exitCode;
    this.output = details.output ?? '';
  }
}

/** Requested volume count cannot partition the chapters. */
export class VolumeCountError extends DomainError {
  constructor(volumes: number, chapters: number) {
    super(
      Number.isInteger(volumes) && volumes >= 1
        ? `Cannot split ${chapters} chapter(s) into ${volumes} volumes`
        : `Volume count must be a positive integer, got ${volumes}`,
    );
  }
}

/** Options or configuration files failed validation. */
export class ConfigurationError extends DomainError {
  constructor(message: string, options?: { cause?: unknown; field?: string }) {
    super(
      options?.field ? `${message} (field: ${options.field})` : message,
      { cause: options?.cause },
    );
  }
}

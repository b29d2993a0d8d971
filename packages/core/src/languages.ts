import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { LanguageTable } from './types';
import defaultLanguages from './languages.json';

const LanguageTableSchema = z.object({
  fileNames: z.record(z.string()).default({}),
  extensions: z
    .record(z.string())
    .default({})
    .refine((exts) => Object.keys(exts).every((ext) => /^\.[^./\\]+$/.test(ext)), {
      message: 'extension keys must look like ".c"',
    }),
  fallback: z.string().optional(),
});

export type LanguageTableInput = z.input<typeof LanguageTableSchema>;

function freezeTable(table: LanguageTable): LanguageTable {
  return Object.freeze({
    fileNames: Object.freeze({ ...table.fileNames }),
    extensions: Object.freeze({ ...table.extensions }),
    fallback: table.fallback,
  });
}

/** Built-in table (exact file names, then extensions; unknown files are not highlighted). */
export const DEFAULT_LANGUAGES: LanguageTable = (() => {
  const parsed = LanguageTableSchema.parse(defaultLanguages);
  return freezeTable({ ...parsed, fallback: parsed.fallback ?? '' });
})();

/**
 * Build a table from user input layered over `base`: entries are added or
 * replaced one by one, the fallback only when given.
 */
export function createLanguageTable(
  input: unknown,
  base: LanguageTable = DEFAULT_LANGUAGES,
): LanguageTable {
  const result = LanguageTableSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(`Invalid language table: ${issue?.message ?? 'unknown issue'}`, {
      field: issue?.path.join('.'),
      cause: result.error,
    });
  }
  const table = result.data;
  return freezeTable({
    fileNames: { ...base.fileNames, ...table.fileNames },
    extensions: { ...base.extensions, ...table.extensions },
    fallback: table.fallback ?? base.fallback,
  });
}

/** Read a JSON language table from disk, layered over the defaults. */
export async function readLanguageTable(filePath: string): Promise<LanguageTable> {
  let raw: unknown;
  try {
    raw = await fs.readJson(filePath);
  } catch (error) {
    throw new ConfigurationError(`Cannot read language table ${filePath}`, { cause: error });
  }
  return createLanguageTable(raw);
}

function lookup(map: Readonly<Record<string, string>>, key: string): string | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

/** Map a file name to a listings language name. Never fails. */
export function resolveLanguage(fileName: string, table: LanguageTable): string {
  const base = path.basename(fileName);
  const byName = lookup(table.fileNames, base);
  if (byName !== undefined) return byName;

  const ext = path.extname(base);
  if (ext) {
    const byExt = lookup(table.extensions, ext);
    if (byExt !== undefined) return byExt;
  }
  return table.fallback;
}

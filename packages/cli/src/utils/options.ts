import { z } from 'zod';
import { ConfigurationError } from '@srcpress/core';

const CommonOptionsSchema = z.object({
  color: z.boolean().default(false),
  keep: z.boolean().default(false),
  quiet: z.boolean().default(false),
  output: z.string().min(1).optional(),
  templates: z.string().min(1).optional(),
  languages: z.string().min(1).optional(),
  tex: z.string().min(1).optional(),
});

export const BookOptionsSchema = CommonOptionsSchema.extend({
  title: z.string().trim().min(1, 'must not be empty'),
  release: z.string(),
  contents: z.string(),
  volumes: z.coerce.number().int('must be a whole number').min(1, 'must be at least 1').default(1),
});

export const ChapterOptionsSchema = CommonOptionsSchema.extend({
  parent: z.string().min(1).optional(),
});

export type CommonOptions = z.infer<typeof CommonOptionsSchema>;
export type BookOptions = z.infer<typeof BookOptionsSchema>;
export type ChapterOptions = z.infer<typeof ChapterOptionsSchema>;

/** Validate raw commander options; the first issue becomes a ConfigurationError. */
export function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const field = issue ? issue.path.join('.') : undefined;
  throw new ConfigurationError(
    field ? `Invalid option --${field}: ${issue?.message}` : 'Invalid options',
    { cause: result.error },
  );
}

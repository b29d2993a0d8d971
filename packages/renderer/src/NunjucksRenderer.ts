import fs from 'fs';
import path from 'path';
import * as nunjucks from 'nunjucks';
import {
  ENV,
  getEnv,
  TemplateError,
  TemplateVariableError,
  type TemplateRenderer,
  type TemplateVariables,
} from '@srcpress/core';
import { escapeLatex } from './filters';
import { requiredVariables, scanTemplate, type TemplateScan } from './template-variables';

/** Templates shipped with the package. */
export const DEFAULT_TEMPLATE_DIR = path.resolve(__dirname, '..', 'templates');

/**
 * Delimiters that never occur in ordinary LaTeX:
 *   ((( var )))   ((* if x *)) … ((* endif *))   ((= comment =))
 */
export const LATEX_TAGS = {
  blockStart: '((*',
  blockEnd: '*))',
  variableStart: '(((',
  variableEnd: ')))',
  commentStart: '((=',
  commentEnd: '=))',
} as const;

const UNDEFINED_OUTPUT = 'attempted to output null or undefined value';

export interface NunjucksRendererOptions {
  /** Falls back to SRCPRESS_TEMPLATE_DIR, then to the bundled templates. */
  templateDir?: string;
}

// Filters run before throwOnUndefined sees the value, so the filter checks itself.
function strictLatex(value: unknown): string {
  if (value === undefined || value === null) {
    throw new Error(`${UNDEFINED_OUTPUT} (latex filter)`);
  }
  return escapeLatex(value);
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Renders LaTeX templates from one directory. Every `.tex` file there is
 * compiled at construction; rendering only substitutes variables.
 */
export class NunjucksRenderer implements TemplateRenderer {
  readonly templateDir: string;
  private readonly env: nunjucks.Environment;
  private readonly scans = new Map<string, TemplateScan>();

  constructor(options: NunjucksRendererOptions = {}) {
    this.templateDir = path.resolve(
      options.templateDir ?? getEnv(ENV.TEMPLATE_DIR) ?? DEFAULT_TEMPLATE_DIR,
    );
    if (!fs.existsSync(this.templateDir) || !fs.statSync(this.templateDir).isDirectory()) {
      throw new TemplateError(this.templateDir, 'template directory not found');
    }

    this.env = new nunjucks.Environment(new nunjucks.FileSystemLoader(this.templateDir), {
      autoescape: false,
      throwOnUndefined: true,
      trimBlocks: true,
      tags: LATEX_TAGS,
    });
    this.env.addFilter('latex', strictLatex);

    for (const name of this.templateNames()) {
      try {
        this.env.getTemplate(name, true);
        this.scans.set(name, scanTemplate(fs.readFileSync(path.join(this.templateDir, name), 'utf8'), LATEX_TAGS));
      } catch (error) {
        throw new TemplateError(name, reasonOf(error), { cause: error });
      }
    }
  }

  /** `.tex` files available to render, sorted. */
  templateNames(): string[] {
    return fs
      .readdirSync(this.templateDir)
      .filter((name) => name.endsWith('.tex'))
      .sort();
  }

  /** Names `template` reads from its variables, including those read by the templates it includes. */
  requiredVariables(template: string): string[] {
    return requiredVariables(template, this.scans);
  }

  render(template: string, variables: TemplateVariables): string {
    // null is a value (`volume: null`); only absent names are refused
    const missing = this.requiredVariables(template).filter((name) => variables[name] === undefined);
    if (missing.length > 0) {
      throw new TemplateVariableError(template, `references a variable that was not supplied (${missing.join(', ')})`);
    }
    try {
      return this.env.render(template, variables);
    } catch (error) {
      const reason = reasonOf(error);
      if (reason.includes(UNDEFINED_OUTPUT)) {
        throw new TemplateVariableError(template, `references a variable that was not supplied (${reason})`, {
          cause: error,
        });
      }
      throw new TemplateError(template, reason, { cause: error });
    }
  }
}

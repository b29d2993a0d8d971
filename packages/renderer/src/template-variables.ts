// Names a template reads from its context. throwOnUndefined only guards output
// positions; a missing name in an `if` or `for` tag would render as false or
// empty, so the renderer checks these names before rendering.

export interface TagDelimiters {
  blockStart: string;
  blockEnd: string;
  variableStart: string;
  variableEnd: string;
}

export interface TemplateScan {
  /** Top-level names read by the template itself, loop and `set` targets excluded. */
  reads: string[];
  /** Names the template binds with `for` or `set`. */
  bound: string[];
  includes: string[];
}

const KEYWORDS = new Set([
  'and', 'or', 'not', 'in', 'is', 'if', 'else',
  'true', 'false', 'none', 'null', 'True', 'False', 'None',
]);
const BUILTINS = new Set(['range', 'cycler', 'joiner', 'loop', 'super', 'caller']);

const STRING_LITERAL = /"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*'/g;
const IDENTIFIER = /[A-Za-z_]\w*/g;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function tagBodies(source: string, start: string, end: string): string[] {
  const pattern = new RegExp(`${escapeRegExp(start)}-?([\\s\\S]*?)-?${escapeRegExp(end)}`, 'g');
  return [...source.matchAll(pattern)].map((match) => (match[1] ?? '').trim());
}

/** Identifiers at the root of each lookup: `a.b | f(c)` reads `a` and `c`. */
export function expressionNames(expression: string): string[] {
  const text = expression.replace(STRING_LITERAL, ' ');
  const names: string[] = [];
  for (const match of text.matchAll(IDENTIFIER)) {
    const before = text.slice(0, match.index ?? 0);
    if (/\w$/.test(before)) continue;
    const previous = before.trimEnd().slice(-1);
    if (previous === '.' || previous === '|') continue;
    if (KEYWORDS.has(match[0]) || BUILTINS.has(match[0])) continue;
    names.push(match[0]);
  }
  return names;
}

export function scanTemplate(source: string, tags: TagDelimiters): TemplateScan {
  const reads = new Set<string>();
  const bound = new Set<string>();
  const includes: string[] = [];
  const read = (expression: string) => expressionNames(expression).forEach((name) => reads.add(name));

  for (const body of tagBodies(source, tags.blockStart, tags.blockEnd)) {
    const [, keyword = '', rest = ''] = /^(\w+)\s*([\s\S]*)$/.exec(body) ?? [];
    if (keyword === 'if' || keyword === 'elif' || keyword === 'elseif') {
      read(rest);
    } else if (keyword === 'for') {
      const loop = /^([\w\s,]+?)\s+in\s+([\s\S]+)$/.exec(rest);
      if (loop) {
        (loop[1] ?? '').split(',').forEach((name) => bound.add(name.trim()));
        read(loop[2] ?? '');
      }
    } else if (keyword === 'set') {
      const assignment = /^([\w\s,]+?)\s*=\s*([\s\S]*)$/.exec(rest);
      if (assignment) {
        (assignment[1] ?? '').split(',').forEach((name) => bound.add(name.trim()));
        read(assignment[2] ?? '');
      }
    } else if (keyword === 'include') {
      const target = /^["']([^"']+)["']/.exec(rest);
      if (target?.[1]) includes.push(target[1]);
    }
  }
  for (const body of tagBodies(source, tags.variableStart, tags.variableEnd)) read(body);

  return {
    reads: [...reads].filter((name) => !bound.has(name)),
    bound: [...bound],
    includes,
  };
}

/**
 * Every name `template` needs from the caller, following includes. Names an
 * including template binds are available to the included one.
 */
export function requiredVariables(
  template: string,
  scans: ReadonlyMap<string, TemplateScan>,
  visiting: ReadonlySet<string> = new Set(),
): string[] {
  const scan = scans.get(template);
  if (!scan || visiting.has(template)) return [];

  const required = new Set(scan.reads);
  const inner = new Set([...visiting, template]);
  for (const include of scan.includes) {
    for (const name of requiredVariables(include, scans, inner)) {
      if (!scan.bound.includes(name)) required.add(name);
    }
  }
  return [...required].sort();
}

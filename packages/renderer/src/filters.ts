const LATEX_SPECIALS: Record<string, string> = {
  '\\': '\\textbackslash{}',
  '{': '\\{',
  '}': '\\}',
  $: '\\$',
  '&': '\\&',
  '#': '\\#',
  '%': '\\%',
  _: '\\_',
  '^': '\\textasciicircum{}',
  '~': '\\textasciitilde{}',
};

/** Escape text for LaTeX body/argument positions (titles, labels). */
export function escapeLatex(value: unknown): string {
  return String(value).replace(/[\\{}$&#%_^~]/g, (ch) => LATEX_SPECIALS[ch] ?? ch);
}

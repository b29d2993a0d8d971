import { Command } from 'commander';

/** Options shared by `chapter` and `book`. */
export function addCommonOptions(command: Command): Command {
  return command
    .option('--color', 'Colored syntax highlighting', false)
    .option('-k, --keep', 'Keep the intermediate .tex sources and report where', false)
    .option('-o, --output <dir>', 'Directory receiving the PDFs (default: current directory)')
    .option('--templates <dir>', 'LaTeX template directory (env SRCPRESS_TEMPLATE_DIR)')
    .option('--languages <file>', 'JSON file extending the extension → language table')
    .option('--tex <bin>', 'Typesetting compiler (env SRCPRESS_TEX_BIN, default pdflatex)')
    .option('-q, --quiet', 'Only print the produced PDF paths', false);
}

import type { Notifier } from './Notifier';

export interface ConsoleNotifierOptions {
  /** Suppress information messages (warnings and errors still print). */
  quiet?: boolean;
}

// Information goes to stdout, warnings and errors to stderr.
export class ConsoleNotifier implements Notifier {
  private readonly quiet: boolean;

  constructor(options: ConsoleNotifierOptions = {}) {
    this.quiet = options.quiet ?? false;
  }

  async showErrorMessage(message: string): Promise<void> {
    console.error(`Error: ${message}`);
  }

  async showWarningMessage(message: string): Promise<void> {
    console.warn(`Warning: ${message}`);
  }

  async showInformationMessage(message: string): Promise<void> {
    if (this.quiet) return;
    console.info(`[srcpress] ${message}`);
  }
}

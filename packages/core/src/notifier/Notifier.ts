/** Progress and failure reporting, kept behind a port so tests can record it. */
export interface Notifier {
  showErrorMessage(message: string): Promise<void>;
  showWarningMessage(message: string): Promise<void>;
  showInformationMessage(message: string): Promise<void>;
}

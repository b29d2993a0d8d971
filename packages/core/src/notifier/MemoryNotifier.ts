import type { Notifier } from './Notifier';

export type NotificationLevel = 'error' | 'warning' | 'information';

export interface Notification {
  level: NotificationLevel;
  message: string;
}

/** Keeps every message in order instead of printing it. */
export class MemoryNotifier implements Notifier {
  readonly notifications: Notification[] = [];

  async showErrorMessage(message: string): Promise<void> {
    this.notifications.push({ level: 'error', message });
  }

  async showWarningMessage(message: string): Promise<void> {
    this.notifications.push({ level: 'warning', message });
  }

  async showInformationMessage(message: string): Promise<void> {
    this.notifications.push({ level: 'information', message });
  }

  messages(level: NotificationLevel): string[] {
    return this.notifications.filter((n) => n.level === level).map((n) => n.message);
  }
}

export * from './errors';
export * from './types';
export * from './config';
export * from './identifiers';
export * from './languages';
export * from './partition';
export * from './discovery';
export * from './workspace';
export * from './chapter-assembler';
export * from './book-assembler';
export * from './build-chapter';
export * from './typesetting/command-runner';
export * from './typesetting/LatexTypesetter';
export type { Notifier } from './notifier/Notifier';
export { ConsoleNotifier, type ConsoleNotifierOptions } from './notifier/ConsoleNotifier';
export { MemoryNotifier, type Notification, type NotificationLevel } from './notifier/MemoryNotifier';

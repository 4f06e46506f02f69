export { LoggingNotifier, CompositeNotifier } from './notifier';
export type { NotificationRecord } from './notifier';

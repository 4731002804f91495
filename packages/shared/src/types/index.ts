export type { MetricSnapshot, DiskUsage, HostDetails } from './metrics.js';

export type { ContainerEvent } from './events.js';

export type { NotificationPriority, NotificationMessage } from './notification.js';

export { PRIORITY } from './notification.js';

export type {
  Weekday,
  ClockTime,
  AlertThresholds,
  NotifyConfig,
  ScheduleConfig,
  ContainerEventsConfig,
  MonitorConfig,
} from './config.js';

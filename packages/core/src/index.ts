// Contracts
export type { MetricSource, DiskSource, NotificationSender, BackgroundTask } from './types.js';

// Metric sources
export { SystemSampler, parseMeminfo } from './metrics/SystemSampler.js';
export type { SystemSamplerOptions } from './metrics/SystemSampler.js';
export { DiskScanner, selectMounts } from './metrics/DiskScanner.js';

// Alerts
export { evaluateThresholds, findFullDisks } from './alerts/thresholds.js';
export type { DiskViolation } from './alerts/thresholds.js';
export { AlertCooldown } from './alerts/AlertCooldown.js';

// Notifications
export { Notifier, sanitizeTitle, sanitizeBody, createNotification } from './notify/Notifier.js';

// Container events
export { FrameDecoder, decodeFrame } from './containers/FrameDecoder.js';
export type { Frame } from './containers/FrameDecoder.js';
export { toContainerEvent, formatCrashMessage } from './containers/container-event.js';
export {
  ContainerEventStream,
  buildEventsRequest,
  CRASH_TITLE,
  CRASH_TAGS,
} from './containers/ContainerEventStream.js';
export type {
  ContainerEventStreamOptions,
  SocketConnector,
} from './containers/ContainerEventStream.js';

// Scheduling
export { Scheduler } from './scheduler/Scheduler.js';
export type { ScheduledTask, SchedulerOptions } from './scheduler/Scheduler.js';
export { latestOccurrence, describeTrigger, WEEKDAYS } from './scheduler/triggers.js';
export type { TriggerRule } from './scheduler/triggers.js';

// Checks
export { HealthChecks, formatReport } from './checks/HealthChecks.js';
export type { HealthChecksOptions, ReportType } from './checks/HealthChecks.js';

// Engine
export { MonitorEngine } from './daemon/Engine.js';
export type { EngineComponents } from './daemon/Engine.js';

export { InterruptibleDelay } from './utils/delay.js';

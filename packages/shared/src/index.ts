// Types
export type {
  MetricSnapshot,
  DiskUsage,
  HostDetails,
  ContainerEvent,
  NotificationPriority,
  NotificationMessage,
  Weekday,
  ClockTime,
  AlertThresholds,
  NotifyConfig,
  ScheduleConfig,
  ContainerEventsConfig,
  MonitorConfig,
} from './types/index.js';

export { PRIORITY } from './types/index.js';

// Constants
export {
  HOSTWATCH_VERSION,
  DEFAULT_TEMP_LIMIT,
  DEFAULT_DISK_LIMIT,
  DEFAULT_RAM_LIMIT,
  DEFAULT_DAILY_TIME,
  DEFAULT_WEEKLY_DAY,
  DEFAULT_CHECK_INTERVAL,
  DEFAULT_NOTIFY_TIMEOUT,
  DEFAULT_RECONNECT_DELAY,
  DEFAULT_ALERT_COOLDOWN,
  HOURLY_PERIOD_SECONDS,
  MAX_TIMER_DELAY_MS,
  MAX_CHECK_INTERVAL_SECONDS,
  MAX_EVENT_FRAME_LENGTH,
  DOCKER_SOCKET_PATH,
  DOCKER_DIE_EVENTS_FILTER,
  TEMPERATURE_SENSOR_PATHS,
  MEMINFO_PATH,
  MOUNTS_PATH,
  DISK_DEVICE_PREFIXES,
  EXCLUDED_MOUNT_MARKERS,
} from './constants.js';

// Schemas
export { envSchema } from './schemas/config.schema.js';

// Utilities
export {
  parseDuration,
  formatBytes,
  formatUptime,
  parseClockTime,
  isClockTime,
  formatClockTime,
  roundPercent,
} from './utils/parser.js';

export { loadConfig } from './utils/config.js';

export { createLogger, getLogger, setDefaultLogger, LOG_LEVELS } from './utils/logger.js';
export type { LogLevel, Logger, CreateLoggerOptions } from './utils/logger.js';

export {
  HostwatchError,
  ConfigValidationError,
  StreamConnectionError,
  StreamClosedError,
  NotificationDeliveryError,
  DiskScanError,
  getErrorCode,
  getErrorMessage,
} from './utils/errors.js';

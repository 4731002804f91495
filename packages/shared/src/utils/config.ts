import { hostname } from 'node:os';
import { envSchema } from '../schemas/config.schema.js';
import type { MonitorConfig } from '../types/config.js';
import { ConfigValidationError } from './errors.js';
import { parseClockTime } from './parser.js';

/**
 * Build the monitor configuration from environment variables.
 * Every invalid variable is reported at once through ConfigValidationError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const values = result.data;

  return {
    thresholds: Object.freeze({
      tempLimitC: values.TEMP_LIMIT,
      diskLimitPercent: values.DISK_LIMIT,
      ramLimitPercent: values.RAM_LIMIT,
    }),
    notify: {
      url: values.NTFY_URL ?? '',
      token: values.NTFY_TOKEN,
      hostId: values.HOSTNAME ?? hostname(),
      timeout: values.NOTIFY_TIMEOUT,
    },
    schedule: {
      checkInterval: values.CHECK_INTERVAL,
      dailyTime: parseClockTime(values.DAILY_TIME),
      weeklyDay: values.WEEKLY_DAY,
    },
    containers: {
      socketPath: values.DOCKER_SOCKET,
      reconnectDelay: values.RECONNECT_DELAY,
    },
    alertCooldown: values.ALERT_COOLDOWN,
    logLevel: values.LOG_LEVEL,
  };
}

import { z } from 'zod';
import {
  DEFAULT_ALERT_COOLDOWN,
  DEFAULT_CHECK_INTERVAL,
  DEFAULT_DAILY_TIME,
  DEFAULT_DISK_LIMIT,
  DEFAULT_NOTIFY_TIMEOUT,
  DEFAULT_RAM_LIMIT,
  DEFAULT_RECONNECT_DELAY,
  DEFAULT_TEMP_LIMIT,
  DEFAULT_WEEKLY_DAY,
  DOCKER_SOCKET_PATH,
  MAX_CHECK_INTERVAL_SECONDS,
  MAX_TIMER_DELAY_MS,
} from '../constants.js';
import { LOG_LEVELS } from '../utils/logger.js';
import { isClockTime, parseDuration } from '../utils/parser.js';

// Environment values arrive as strings; blank counts as unset.
const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

function tryParseDuration(value: string): number | null {
  try {
    return parseDuration(value);
  } catch {
    return null;
  }
}

interface DurationBounds {
  /** Smallest accepted value in milliseconds. */
  min: number;
  /** Largest accepted value in milliseconds, if any. */
  max?: number;
}

const envDuration = (fallback: string, bounds: DurationBounds) =>
  z
    .preprocess(blankToUndefined, z.string().default(fallback))
    .transform((value, ctx) => {
      const ms = tryParseDuration(value);
      if (ms === null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'must be a duration such as "15s", "500ms" or "2m"',
        });
        return z.NEVER;
      }
      if (ms < bounds.min) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: bounds.min > 0 ? 'must be greater than 0' : 'must not be negative',
        });
        return z.NEVER;
      }
      if (bounds.max !== undefined && ms > bounds.max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `must be at most ${bounds.max}ms`,
        });
        return z.NEVER;
      }
      return ms;
    });

const weekdaySchema = z.enum([
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
]);

const logLevelSchema = z.enum(LOG_LEVELS);

const thresholdsEnvSchema = z.object({
  TEMP_LIMIT: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_TEMP_LIMIT),
  ),
  DISK_LIMIT: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(100).default(DEFAULT_DISK_LIMIT),
  ),
  RAM_LIMIT: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(100).default(DEFAULT_RAM_LIMIT),
  ),
});

export const envSchema = thresholdsEnvSchema.extend({
  NTFY_URL: z.preprocess(
    blankToUndefined,
    z.string().url({ message: 'must be an http(s) URL' }).optional(),
  ),
  NTFY_TOKEN: z.preprocess(blankToUndefined, z.string().optional()),
  HOSTNAME: z.preprocess(blankToUndefined, z.string().optional()),
  DAILY_TIME: z
    .preprocess(blankToUndefined, z.string().default(DEFAULT_DAILY_TIME))
    .refine(isClockTime, { message: 'must be a 24h time of day such as "08:00"' }),
  WEEKLY_DAY: z.preprocess(
    (value) => (typeof value === 'string' ? blankToUndefined(value.toLowerCase()) : value),
    weekdaySchema.default(DEFAULT_WEEKLY_DAY),
  ),
  CHECK_INTERVAL: z.preprocess(
    blankToUndefined,
    z.coerce
      .number()
      .int()
      .positive()
      .max(MAX_CHECK_INTERVAL_SECONDS)
      .default(DEFAULT_CHECK_INTERVAL),
  ),
  DOCKER_SOCKET: z.preprocess(blankToUndefined, z.string().default(DOCKER_SOCKET_PATH)),
  NOTIFY_TIMEOUT: envDuration(DEFAULT_NOTIFY_TIMEOUT, { min: 1, max: MAX_TIMER_DELAY_MS }),
  RECONNECT_DELAY: envDuration(DEFAULT_RECONNECT_DELAY, { min: 1, max: MAX_TIMER_DELAY_MS }),
  // Compared against timestamps, never handed to a timer.
  ALERT_COOLDOWN: envDuration(DEFAULT_ALERT_COOLDOWN, { min: 0 }),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? blankToUndefined(value.toLowerCase()) : value),
    logLevelSchema.default('info'),
  ),
});

import { HOURLY_PERIOD_SECONDS, formatClockTime } from '@hostwatch/shared';
import type { ClockTime, Weekday } from '@hostwatch/shared';

export type TriggerRule =
  | { kind: 'interval'; seconds: number }
  | { kind: 'hourly' }
  | { kind: 'daily'; at: ClockTime }
  | { kind: 'weekly'; weekday: Weekday; at: ClockTime };

/** Indexed like Date#getDay(). */
export const WEEKDAYS: readonly Weekday[] = [
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
];

function atLocalTime(day: Date, at: ClockTime): Date {
  return new Date(day.getFullYear(), day.getMonth(), day.getDate(), at.hour, at.minute, 0, 0);
}

function shiftDays(date: Date, days: number): Date {
  const shifted = new Date(date.getTime());
  shifted.setDate(shifted.getDate() + days);
  return shifted;
}

function latestPeriodic(periodMs: number, now: Date, registeredAt: Date): Date | null {
  const elapsed = now.getTime() - registeredAt.getTime();
  if (periodMs <= 0 || elapsed < periodMs) return null;

  const periods = Math.floor(elapsed / periodMs);
  return new Date(registeredAt.getTime() + periods * periodMs);
}

function latestDaily(at: ClockTime, now: Date): Date {
  const today = atLocalTime(now, at);
  return today.getTime() > now.getTime() ? shiftDays(today, -1) : today;
}

function latestWeekly(weekday: Weekday, at: ClockTime, now: Date): Date {
  const daysBack = (now.getDay() - WEEKDAYS.indexOf(weekday) + 7) % 7;
  const candidate = shiftDays(atLocalTime(now, at), -daysBack);
  return candidate.getTime() > now.getTime() ? shiftDays(candidate, -7) : candidate;
}

function notBefore(occurrence: Date, registeredAt: Date): Date | null {
  return occurrence.getTime() >= registeredAt.getTime() ? occurrence : null;
}

/**
 * The most recent occurrence of `rule` at or before `now`, in local wall-clock time,
 * or null when the rule has not come due since `registeredAt`.
 *
 * Periodic rules count from registration (k >= 1). Calendar rules ignore occurrences
 * that were already in the past when the task was registered.
 */
export function latestOccurrence(rule: TriggerRule, now: Date, registeredAt: Date): Date | null {
  switch (rule.kind) {
    case 'interval':
      return latestPeriodic(rule.seconds * 1000, now, registeredAt);
    case 'hourly':
      return latestPeriodic(HOURLY_PERIOD_SECONDS * 1000, now, registeredAt);
    case 'daily':
      return notBefore(latestDaily(rule.at, now), registeredAt);
    case 'weekly':
      return notBefore(latestWeekly(rule.weekday, rule.at, now), registeredAt);
  }
}

export function describeTrigger(rule: TriggerRule): string {
  switch (rule.kind) {
    case 'interval':
      return `every ${rule.seconds}s`;
    case 'hourly':
      return 'every hour';
    case 'daily':
      return `daily at ${formatClockTime(rule.at)}`;
    case 'weekly':
      return `every ${rule.weekday} at ${formatClockTime(rule.at)}`;
  }
}

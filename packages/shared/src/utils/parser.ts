import msLib from 'ms';
import bytesLib from 'bytes';
import type { ClockTime } from '../types/config.js';

/**
 * Parse a duration string to milliseconds.
 * Supports: '30s', '5m', '1h', '2d', '100ms', and bare numbers ('0', '1500').
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') return value;

  const result = msLib(value);
  if (result === undefined || Number.isNaN(result)) {
    throw new Error(`Invalid duration string: "${value}"`);
  }
  return result;
}

/**
 * Format bytes to a human-readable string.
 */
export function formatBytes(value: number): string {
  return bytesLib.format(value, { unitSeparator: ' ' }) ?? '0 B';
}

/**
 * Format an uptime in seconds to a human-readable string.
 */
export function formatUptime(seconds: number): string {
  if (seconds < 60) return `${Math.floor(seconds)}s`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m`;
  if (seconds < 86400) return `${Math.floor(seconds / 3600)}h`;
  return `${Math.floor(seconds / 86400)}d`;
}

const CLOCK_TIME_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/;

/**
 * Parse a 24h "HH:MM" time of day. A single-digit hour ("8:30") is accepted.
 */
export function parseClockTime(value: string): ClockTime {
  const match = CLOCK_TIME_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid time of day: "${value}" (expected HH:MM)`);
  }
  return { hour: parseInt(match[1], 10), minute: parseInt(match[2], 10) };
}

export function isClockTime(value: string): boolean {
  return CLOCK_TIME_PATTERN.test(value.trim());
}

export function formatClockTime(time: ClockTime): string {
  return `${String(time.hour).padStart(2, '0')}:${String(time.minute).padStart(2, '0')}`;
}

/**
 * Round to one decimal place, the precision used for every percentage we report.
 */
export function roundPercent(value: number): number {
  return Math.round(value * 10) / 10;
}

import type { AlertThresholds, DiskUsage, MetricSnapshot } from '@hostwatch/shared';

export interface DiskViolation {
  mount: string;
  usedPercent: number;
}

/**
 * Violation lines for a snapshot, temperature first, empty when healthy.
 * A temperature of 0 is "no sensor" and never violates. Load average has no limit.
 */
export function evaluateThresholds(
  snapshot: MetricSnapshot,
  thresholds: AlertThresholds,
): string[] {
  const issues: string[] = [];

  if (snapshot.temperatureCelsius > 0 && snapshot.temperatureCelsius >= thresholds.tempLimitC) {
    issues.push(`CPU Overheat: ${snapshot.temperatureCelsius}C`);
  }
  if (snapshot.ramUsedPercent >= thresholds.ramLimitPercent) {
    issues.push(`High RAM Usage: ${snapshot.ramUsedPercent}%`);
  }

  return issues;
}

/**
 * Mounts at or above the limit, in scan order.
 */
export function findFullDisks(disks: DiskUsage, diskLimitPercent: number): DiskViolation[] {
  return Object.entries(disks)
    .filter(([, usedPercent]) => usedPercent >= diskLimitPercent)
    .map(([mount, usedPercent]) => ({ mount, usedPercent }));
}

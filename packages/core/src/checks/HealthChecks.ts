import {
  PRIORITY,
  formatBytes,
  formatUptime,
  getLogger,
} from '@hostwatch/shared';
import type {
  AlertThresholds,
  DiskUsage,
  HostDetails,
  MetricSnapshot,
} from '@hostwatch/shared';
import { AlertCooldown } from '../alerts/AlertCooldown.js';
import { evaluateThresholds, findFullDisks } from '../alerts/thresholds.js';
import type { DiskSource, MetricSource, NotificationSender } from '../types.js';

const logger = getLogger();

export type ReportType = 'Daily' | 'Weekly';

export interface HealthChecksOptions {
  thresholds: AlertThresholds;
  metrics: MetricSource;
  disks: DiskSource;
  notifier: NotificationSender;
  cooldown?: AlertCooldown;
}

const CRITICAL_KEY = 'critical';
const diskKey = (mount: string): string => `disk:${mount}`;

export function formatReport(
  snapshot: MetricSnapshot,
  host: HostDetails,
  disks: DiskUsage,
): string {
  const diskLines = Object.entries(disks).map(([mount, used]) => `- ${mount}: ${used}%`);
  const temperature =
    snapshot.temperatureCelsius > 0 ? `${snapshot.temperatureCelsius}C` : 'N/A';

  return [
    'Status: Operational',
    `Temp: ${temperature}`,
    `RAM: ${snapshot.ramUsedPercent}% of ${formatBytes(host.memoryTotalBytes)}`,
    `Load: ${snapshot.loadAverage1m.toFixed(2)}`,
    `Uptime: ${formatUptime(host.uptimeSeconds)}`,
    '',
    'Disks:',
    diskLines.length > 0 ? diskLines.join('\n') : 'None detected',
  ].join('\n');
}

/**
 * The actions the scheduler runs. Owns the last full disk scan, which is replaced as a
 * whole by each successful scan and read by the reports.
 */
export class HealthChecks {
  private thresholds: AlertThresholds;
  private metrics: MetricSource;
  private disks: DiskSource;
  private notifier: NotificationSender;
  private cooldown: AlertCooldown;
  private lastDiskScan: DiskUsage = Object.freeze({});

  constructor(options: HealthChecksOptions) {
    this.thresholds = options.thresholds;
    this.metrics = options.metrics;
    this.disks = options.disks;
    this.notifier = options.notifier;
    this.cooldown = options.cooldown ?? new AlertCooldown(0);
  }

  getLastDiskScan(): DiskUsage {
    return this.lastDiskScan;
  }

  /**
   * Scan all disks and replace the cached result. On failure the previous scan is kept
   * and null is returned.
   */
  async refreshDisks(): Promise<DiskUsage | null> {
    try {
      const scan = await this.disks.scan();
      this.lastDiskScan = scan;
      return scan;
    } catch (err) {
      logger.error({ err }, 'Disk scanning error');
      return null;
    }
  }

  /**
   * Temperature and RAM against their limits; one combined alert for all violations.
   */
  async runFastCheck(): Promise<void> {
    const snapshot = await this.metrics.sample();
    const issues = evaluateThresholds(snapshot, this.thresholds);

    if (issues.length === 0) {
      this.cooldown.reset(CRITICAL_KEY);
      logger.info(
        {
          temperature: snapshot.temperatureCelsius,
          ram: snapshot.ramUsedPercent,
          load: Number(snapshot.loadAverage1m.toFixed(2)),
        },
        'Health OK',
      );
      return;
    }

    if (!this.cooldown.tryAcquire(CRITICAL_KEY)) {
      logger.debug({ issues }, 'Critical alert suppressed by cooldown');
      return;
    }

    await this.notifier.send('CRITICAL ALERT', issues.join('\n'), PRIORITY.urgent, [
      'fire',
      'warning',
    ]);
  }

  /**
   * Fresh scan, then one alert per mount at or over the disk limit.
   */
  async runDiskSweep(): Promise<void> {
    const scan = await this.refreshDisks();
    if (!scan) return;

    const full = findFullDisks(scan, this.thresholds.diskLimitPercent);
    const fullMounts = new Set(full.map(({ mount }) => mount));

    for (const mount of Object.keys(scan)) {
      if (!fullMounts.has(mount)) this.cooldown.reset(diskKey(mount));
    }

    for (const { mount, usedPercent } of full) {
      if (!this.cooldown.tryAcquire(diskKey(mount))) {
        logger.debug({ mount, usedPercent }, 'Storage alert suppressed by cooldown');
        continue;
      }
      await this.notifier.send(
        'STORAGE ALERT',
        `Low Space on ${mount}: ${usedPercent}%`,
        PRIORITY.high,
        ['floppy_disk'],
      );
    }
  }

  /**
   * Summary built from a fresh snapshot and the cached disk scan.
   */
  async sendReport(type: ReportType): Promise<void> {
    const snapshot = await this.metrics.sample();
    const body = formatReport(snapshot, this.metrics.describeHost(), this.lastDiskScan);

    await this.notifier.send(`${type} Status`, body, PRIORITY.default, ['calendar']);
  }
}

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { AlertThresholds, DiskUsage, MetricSnapshot } from '@hostwatch/shared';

// --- Mock global fetch ---
const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

import { AlertCooldown } from '../alerts/AlertCooldown.js';
import { HealthChecks, formatReport } from '../checks/HealthChecks.js';
import { Notifier } from '../notify/Notifier.js';
import type { DiskSource, MetricSource, NotificationSender } from '../types.js';

const thresholds: AlertThresholds = Object.freeze({
  tempLimitC: 82,
  diskLimitPercent: 90,
  ramLimitPercent: 92,
});

const GIB = 1024 ** 3;

function createMetrics(snapshot: MetricSnapshot): MetricSource & {
  sample: ReturnType<typeof vi.fn>;
} {
  return {
    sample: vi.fn().mockResolvedValue(snapshot),
    describeHost: () => ({ memoryTotalBytes: 8 * GIB, uptimeSeconds: 90_000 }),
  };
}

function createDisks(...scans: DiskUsage[]): DiskSource & { scan: ReturnType<typeof vi.fn> } {
  const scan = vi.fn();
  for (const result of scans) scan.mockResolvedValueOnce(result);
  return { scan };
}

function createMockNotifier(): NotificationSender & { send: ReturnType<typeof vi.fn> } {
  return { send: vi.fn().mockResolvedValue(true) };
}

const healthy: MetricSnapshot = { temperatureCelsius: 45, ramUsedPercent: 45.2, loadAverage1m: 0.5 };

describe('formatReport', () => {
  it('should list the snapshot, host details and each disk', () => {
    const body = formatReport(
      { temperatureCelsius: 51.5, ramUsedPercent: 45.2, loadAverage1m: 0.5 },
      { memoryTotalBytes: 8 * GIB, uptimeSeconds: 90_000 },
      { '/': 40, '/data': 95 },
    );

    expect(body).toBe(
      [
        'Status: Operational',
        'Temp: 51.5C',
        'RAM: 45.2% of 8 GB',
        'Load: 0.50',
        'Uptime: 1d',
        '',
        'Disks:',
        '- /: 40%',
        '- /data: 95%',
      ].join('\n'),
    );
  });

  it('should mark a missing temperature and an empty disk scan', () => {
    const body = formatReport(
      { temperatureCelsius: 0, ramUsedPercent: 10, loadAverage1m: 1.234 },
      { memoryTotalBytes: 8 * GIB, uptimeSeconds: 90_000 },
      {},
    );

    expect(body.split('\n')).toEqual([
      'Status: Operational',
      'Temp: N/A',
      'RAM: 10% of 8 GB',
      'Load: 1.23',
      'Uptime: 1d',
      '',
      'Disks:',
      'None detected',
    ]);
  });
});

describe('HealthChecks', () => {
  let notifier: ReturnType<typeof createMockNotifier>;

  beforeEach(() => {
    notifier = createMockNotifier();
  });

  describe('runFastCheck', () => {
    it('should send one critical alert for high RAM', async () => {
      const checks = new HealthChecks({
        thresholds,
        metrics: createMetrics({ temperatureCelsius: 0, ramUsedPercent: 95, loadAverage1m: 0.5 }),
        disks: createDisks(),
        notifier,
      });

      await checks.runFastCheck();

      expect(notifier.send).toHaveBeenCalledTimes(1);
      expect(notifier.send).toHaveBeenCalledWith('CRITICAL ALERT', 'High RAM Usage: 95%', 5, [
        'fire',
        'warning',
      ]);
    });

    it('should combine every violation into a single alert', async () => {
      const checks = new HealthChecks({
        thresholds,
        metrics: createMetrics({ temperatureCelsius: 90, ramUsedPercent: 95, loadAverage1m: 3 }),
        disks: createDisks(),
        notifier,
      });

      await checks.runFastCheck();

      expect(notifier.send).toHaveBeenCalledTimes(1);
      expect(notifier.send).toHaveBeenCalledWith(
        'CRITICAL ALERT',
        'CPU Overheat: 90C\nHigh RAM Usage: 95%',
        5,
        ['fire', 'warning'],
      );
    });

    it('should stay quiet when healthy', async () => {
      const checks = new HealthChecks({
        thresholds,
        metrics: createMetrics(healthy),
        disks: createDisks(),
        notifier,
      });

      await checks.runFastCheck();

      expect(notifier.send).not.toHaveBeenCalled();
    });

    it('should alert on every check while no cooldown is configured', async () => {
      const checks = new HealthChecks({
        thresholds,
        metrics: createMetrics({ temperatureCelsius: 0, ramUsedPercent: 95, loadAverage1m: 0 }),
        disks: createDisks(),
        notifier,
      });

      await checks.runFastCheck();
      await checks.runFastCheck();

      expect(notifier.send).toHaveBeenCalledTimes(2);
    });

    it('should suppress repeats inside the cooldown until the condition clears', async () => {
      const metrics = createMetrics({ temperatureCelsius: 0, ramUsedPercent: 95, loadAverage1m: 0 });
      const checks = new HealthChecks({
        thresholds,
        metrics,
        disks: createDisks(),
        notifier,
        cooldown: new AlertCooldown(600_000, () => 1_000),
      });

      await checks.runFastCheck();
      await checks.runFastCheck();
      expect(notifier.send).toHaveBeenCalledTimes(1);

      metrics.sample.mockResolvedValueOnce(healthy);
      await checks.runFastCheck();
      await checks.runFastCheck();
      expect(notifier.send).toHaveBeenCalledTimes(2);
    });
  });

  describe('runDiskSweep', () => {
    it('should send one storage alert per full mount', async () => {
      const checks = new HealthChecks({
        thresholds,
        metrics: createMetrics(healthy),
        disks: createDisks({ '/': 40, '/data': 95, '/backup': 91.5 }),
        notifier,
      });

      await checks.runDiskSweep();

      expect(notifier.send).toHaveBeenCalledTimes(2);
      expect(notifier.send).toHaveBeenNthCalledWith(
        1,
        'STORAGE ALERT',
        'Low Space on /data: 95%',
        4,
        ['floppy_disk'],
      );
      expect(notifier.send).toHaveBeenNthCalledWith(
        2,
        'STORAGE ALERT',
        'Low Space on /backup: 91.5%',
        4,
        ['floppy_disk'],
      );
    });

    it('should replace the cached scan', async () => {
      const checks = new HealthChecks({
        thresholds,
        metrics: createMetrics(healthy),
        disks: createDisks({ '/': 40, '/old': 10 }, { '/': 41 }),
        notifier,
      });

      await checks.refreshDisks();
      await checks.runDiskSweep();

      expect(checks.getLastDiskScan()).toEqual({ '/': 41 });
    });

    it('should keep the previous scan when scanning fails', async () => {
      const disks = createDisks({ '/': 40 });
      disks.scan.mockRejectedValueOnce(new Error('mount table unreadable'));
      const checks = new HealthChecks({ thresholds, metrics: createMetrics(healthy), disks, notifier });

      await expect(checks.refreshDisks()).resolves.toEqual({ '/': 40 });
      await checks.runDiskSweep();

      expect(checks.getLastDiskScan()).toEqual({ '/': 40 });
      expect(notifier.send).not.toHaveBeenCalled();
    });

    it('should alert again once a mount has dropped below the limit', async () => {
      const checks = new HealthChecks({
        thresholds,
        metrics: createMetrics(healthy),
        disks: createDisks({ '/data': 95 }, { '/data': 95 }, { '/data': 70 }, { '/data': 96 }),
        notifier,
        cooldown: new AlertCooldown(86_400_000, () => 1_000),
      });

      await checks.runDiskSweep();
      await checks.runDiskSweep();
      await checks.runDiskSweep();
      await checks.runDiskSweep();

      expect(notifier.send).toHaveBeenCalledTimes(2);
      expect(notifier.send).toHaveBeenLastCalledWith(
        'STORAGE ALERT',
        'Low Space on /data: 96%',
        4,
        ['floppy_disk'],
      );
    });
  });

  describe('sendReport', () => {
    it('should report from the cached scan without scanning again', async () => {
      const disks = createDisks({ '/': 40, '/data': 95 });
      const checks = new HealthChecks({ thresholds, metrics: createMetrics(healthy), disks, notifier });

      await checks.refreshDisks();
      await checks.sendReport('Daily');

      expect(disks.scan).toHaveBeenCalledTimes(1);
      expect(notifier.send).toHaveBeenCalledWith(
        'Daily Status',
        [
          'Status: Operational',
          'Temp: 45C',
          'RAM: 45.2% of 8 GB',
          'Load: 0.50',
          'Uptime: 1d',
          '',
          'Disks:',
          '- /: 40%',
          '- /data: 95%',
        ].join('\n'),
        3,
        ['calendar'],
      );
    });

    it('should title the weekly report', async () => {
      const checks = new HealthChecks({
        thresholds,
        metrics: createMetrics(healthy),
        disks: createDisks(),
        notifier,
      });

      await checks.sendReport('Weekly');

      expect(notifier.send.mock.calls[0][0]).toBe('Weekly Status');
      expect(notifier.send.mock.calls[0][1]).toContain('Disks:\nNone detected');
    });
  });

  describe('with the ntfy notifier', () => {
    beforeEach(() => {
      mockFetch.mockReset();
      mockFetch.mockResolvedValue({ ok: true, status: 200 });
    });

    it('should publish a critical alert with urgent priority and the host suffix', async () => {
      const checks = new HealthChecks({
        thresholds,
        metrics: createMetrics({ temperatureCelsius: 0, ramUsedPercent: 95, loadAverage1m: 0.5 }),
        disks: createDisks(),
        notifier: new Notifier({
          url: 'https://ntfy.example.test/alerts',
          hostId: 'srv1',
          timeout: 15_000,
        }),
      });

      await checks.runFastCheck();

      expect(mockFetch).toHaveBeenCalledTimes(1);
      const [, init] = mockFetch.mock.calls[0];
      expect(init.body).toBe('High RAM Usage: 95%');
      expect(init.headers.Title).toBe('CRITICAL ALERT | srv1');
      expect(init.headers.Priority).toBe('5');
      expect(init.headers.Tags).toBe('fire,warning');
    });
  });
});

import { HOSTWATCH_VERSION, getLogger } from '@hostwatch/shared';
import type { MonitorConfig } from '@hostwatch/shared';
import { AlertCooldown } from '../alerts/AlertCooldown.js';
import { HealthChecks } from '../checks/HealthChecks.js';
import { ContainerEventStream } from '../containers/ContainerEventStream.js';
import { DiskScanner } from '../metrics/DiskScanner.js';
import { SystemSampler } from '../metrics/SystemSampler.js';
import { Notifier } from '../notify/Notifier.js';
import { Scheduler } from '../scheduler/Scheduler.js';
import type {
  BackgroundTask,
  DiskSource,
  MetricSource,
  NotificationSender,
} from '../types.js';

const logger = getLogger();

/**
 * Collaborators the engine builds from the config unless supplied.
 */
export interface EngineComponents {
  notifier: NotificationSender;
  metrics: MetricSource;
  disks: DiskSource;
  containerEvents: BackgroundTask;
  now: () => Date;
  sleep: (ms: number) => Promise<void>;
}

export class MonitorEngine {
  private config: MonitorConfig;
  private checks: HealthChecks;
  private scheduler: Scheduler;
  private containerEvents: BackgroundTask;
  private containerEventsDone: Promise<void> | null = null;
  private running: boolean = false;

  constructor(config: MonitorConfig, components: Partial<EngineComponents> = {}) {
    this.config = config;

    const notifier = components.notifier ?? new Notifier(config.notify);

    this.checks = new HealthChecks({
      thresholds: config.thresholds,
      metrics: components.metrics ?? new SystemSampler(),
      disks: components.disks ?? new DiskScanner(),
      notifier,
      cooldown: new AlertCooldown(config.alertCooldown),
    });

    this.containerEvents =
      components.containerEvents ??
      new ContainerEventStream(notifier, {
        socketPath: config.containers.socketPath,
        reconnectDelay: config.containers.reconnectDelay,
      });

    this.scheduler = new Scheduler({
      intervalSeconds: config.schedule.checkInterval,
      everyTick: () => this.checks.runFastCheck(),
      now: components.now,
      sleep: components.sleep,
    });
  }

  getHealthChecks(): HealthChecks {
    return this.checks;
  }

  getScheduler(): Scheduler {
    return this.scheduler;
  }

  /**
   * Runs until stop(): initial disk scan, container events in the background, then the
   * scheduler loop.
   */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;

    logger.info(
      { host: this.config.notify.hostId, version: HOSTWATCH_VERSION },
      'hostwatch starting',
    );

    // Reports read this scan until the first hourly sweep replaces it.
    await this.checks.refreshDisks();

    this.containerEventsDone = this.containerEvents.start().catch((err: unknown) => {
      logger.error({ err }, 'Container event monitor terminated');
    });

    const { dailyTime, weeklyDay } = this.config.schedule;
    this.scheduler.register({
      name: 'daily-report',
      trigger: { kind: 'daily', at: dailyTime },
      run: () => this.checks.sendReport('Daily'),
    });
    this.scheduler.register({
      name: 'weekly-report',
      trigger: { kind: 'weekly', weekday: weeklyDay, at: dailyTime },
      run: () => this.checks.sendReport('Weekly'),
    });
    this.scheduler.register({
      name: 'disk-sweep',
      trigger: { kind: 'hourly' },
      run: () => this.checks.runDiskSweep(),
    });

    await this.scheduler.run();
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    logger.info('hostwatch stopping');

    this.scheduler.stop();
    this.containerEvents.stop();
    await this.containerEventsDone;

    logger.info('hostwatch stopped');
  }

  /**
   * Stop on SIGINT or SIGTERM, then exit with 0, or 1 if shutdown failed.
   */
  installSignalHandlers(exit: (code: number) => void = (code) => process.exit(code)): void {
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info({ signal }, 'Shutdown signal received');
      this.stop().then(
        () => exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          exit(1);
        },
      );
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  }
}

import { getLogger } from '@hostwatch/shared';
import { InterruptibleDelay } from '../utils/delay.js';
import { describeTrigger, latestOccurrence } from './triggers.js';
import type { TriggerRule } from './triggers.js';

const logger = getLogger();

export interface ScheduledTask {
  name: string;
  trigger: TriggerRule;
  run: () => Promise<void>;
}

interface TaskState {
  task: ScheduledTask;
  registeredAt: Date;
  lastFired: number | null;
}

export interface SchedulerOptions {
  /** Seconds between the end of one tick and the start of the next. */
  intervalSeconds: number;
  /** Runs first on every tick. */
  everyTick: () => Promise<void>;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Single control loop. Each tick runs the per-tick check, then every registered task whose
 * trigger has a due occurrence that has not fired yet. Ticks never overlap, and a failure in
 * one step is logged without stopping the loop or the remaining steps of the tick.
 */
export class Scheduler {
  private intervalMs: number;
  private everyTick: () => Promise<void>;
  private now: () => Date;
  private sleep: (ms: number) => Promise<void>;
  private delay = new InterruptibleDelay();
  private tasks: Map<string, TaskState> = new Map();
  private running: boolean = false;

  constructor(options: SchedulerOptions) {
    this.intervalMs = options.intervalSeconds * 1000;
    this.everyTick = options.everyTick;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? ((ms) => this.delay.wait(ms));
  }

  register(task: ScheduledTask): void {
    this.tasks.set(task.name, { task, registeredAt: this.now(), lastFired: null });
    logger.info({ task: task.name, trigger: describeTrigger(task.trigger) }, 'Task scheduled');
  }

  unregister(name: string): void {
    this.tasks.delete(name);
  }

  getTaskNames(): string[] {
    return Array.from(this.tasks.keys());
  }

  /**
   * Run one tick. Resolves to the names of the tasks that fired.
   */
  async tick(): Promise<string[]> {
    try {
      await this.everyTick();
    } catch (err) {
      logger.fatal({ err }, 'Health check failed');
    }

    const now = this.now();
    const fired: string[] = [];

    for (const state of this.tasks.values()) {
      const occurrence = latestOccurrence(state.task.trigger, now, state.registeredAt);
      if (!occurrence) continue;
      if (state.lastFired !== null && occurrence.getTime() <= state.lastFired) continue;

      // Marked before running: a failing task is not retried within the same occurrence.
      state.lastFired = occurrence.getTime();
      fired.push(state.task.name);

      try {
        await state.task.run();
      } catch (err) {
        logger.fatal({ err, task: state.task.name }, 'Scheduled task failed');
      }
    }

    return fired;
  }

  async run(): Promise<void> {
    if (this.running) return;
    this.running = true;

    logger.info({ interval: this.intervalMs / 1000 }, 'Monitoring started');

    while (this.running) {
      await this.tick();
      if (!this.running) break;
      await this.sleep(this.intervalMs);
    }
  }

  stop(): void {
    this.running = false;
    this.delay.interrupt();
  }

  isRunning(): boolean {
    return this.running;
  }
}

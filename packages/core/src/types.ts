import type {
  DiskUsage,
  HostDetails,
  MetricSnapshot,
  NotificationPriority,
} from '@hostwatch/shared';

/**
 * Samples temperature, RAM and load from the host.
 */
export interface MetricSource {
  sample(): Promise<MetricSnapshot>;
  describeHost(): HostDetails;
}

/**
 * Produces a full per-mount usage scan.
 */
export interface DiskSource {
  scan(): Promise<DiskUsage>;
}

/**
 * Delivers one notification per call. Resolves to whether delivery succeeded and never rejects.
 */
export interface NotificationSender {
  send(
    title: string,
    body: string,
    priority: NotificationPriority,
    tags: readonly string[],
  ): Promise<boolean>;
}

/**
 * A long-running loop that is started once and stopped on shutdown.
 */
export interface BackgroundTask {
  start(): Promise<void>;
  stop(): void;
}

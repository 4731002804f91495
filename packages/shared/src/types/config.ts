import type { LogLevel } from '../utils/logger.js';

export type Weekday =
  | 'sunday'
  | 'monday'
  | 'tuesday'
  | 'wednesday'
  | 'thursday'
  | 'friday'
  | 'saturday';

export interface ClockTime {
  hour: number;
  minute: number;
}

export interface AlertThresholds {
  readonly tempLimitC: number;
  readonly diskLimitPercent: number;
  readonly ramLimitPercent: number;
}

export interface NotifyConfig {
  url: string;
  token?: string;
  hostId: string;
  /** Milliseconds before an outbound request is aborted. */
  timeout: number;
}

export interface ScheduleConfig {
  /** Seconds between fast checks. */
  checkInterval: number;
  dailyTime: ClockTime;
  weeklyDay: Weekday;
}

export interface ContainerEventsConfig {
  socketPath: string;
  /** Milliseconds to wait before reconnecting after a stream failure. */
  reconnectDelay: number;
}

export interface MonitorConfig {
  thresholds: AlertThresholds;
  notify: NotifyConfig;
  schedule: ScheduleConfig;
  containers: ContainerEventsConfig;
  /** Milliseconds during which a repeated alert is suppressed. 0 disables. */
  alertCooldown: number;
  logLevel: LogLevel;
}

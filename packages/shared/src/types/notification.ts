/**
 * ntfy priority ordinal: 1 (min) to 5 (max/urgent).
 */
export type NotificationPriority = 1 | 2 | 3 | 4 | 5;

export const PRIORITY = {
  min: 1,
  low: 2,
  default: 3,
  high: 4,
  urgent: 5,
} as const satisfies Record<string, NotificationPriority>;

export interface NotificationMessage {
  readonly title: string;
  readonly body: string;
  readonly priority: NotificationPriority;
  readonly tags: readonly string[];
}

import type { UiCommand } from './ui-command.ts';

export const DEFAULT_NOTIFICATION_DURATION_MS = 5000;

export type NotificationKind = 'success' | 'error' | 'info' | 'warning';

export interface Notification {
  readonly id: string;
  readonly kind: NotificationKind;
  readonly message: string;
  readonly createdAtMs: number;
  readonly durationMs: number;
  readonly retry: UiCommand | null;
}

export interface NotificationInput {
  readonly kind: NotificationKind;
  readonly message: string;
  readonly durationMs?: number;
  readonly retry?: UiCommand;
}

export function createNotification(id: string, input: NotificationInput, nowMs: number): Notification {
  return {
    id,
    kind: input.kind,
    message: input.message,
    createdAtMs: nowMs,
    durationMs: input.durationMs ?? DEFAULT_NOTIFICATION_DURATION_MS,
    retry: input.retry ?? null
  };
}

// Expired strictly after the duration has elapsed.
export function isNotificationExpired(notification: Notification, nowMs: number): boolean {
  return nowMs - notification.createdAtMs > notification.durationMs;
}

export function remainingNotificationMs(notification: Notification, nowMs: number): number {
  return Math.max(0, notification.durationMs - (nowMs - notification.createdAtMs));
}

export function pruneExpiredNotifications(
  notifications: readonly Notification[],
  nowMs: number
): readonly Notification[] {
  const live = notifications.filter((notification) => !isNotificationExpired(notification, nowMs));
  return live.length === notifications.length ? notifications : live;
}

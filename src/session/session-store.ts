import { createStore, type StoreApi } from 'zustand/vanilla';
import { pruneExpiredNotifications, type Notification } from '../app/notification.ts';
import type { SessionSummary } from './terminal-session.ts';

export interface CiabSessionStoreState {
  readonly sessions: Readonly<Record<string, SessionSummary>>;
  readonly notifications: readonly Notification[];
  readonly tmuxAvailable: boolean | null;
}

export type CiabSessionStore = StoreApi<CiabSessionStoreState>;

export function createCiabSessionStore(initial: Partial<CiabSessionStoreState> = {}): CiabSessionStore {
  return createStore<CiabSessionStoreState>(() => ({
    sessions: initial.sessions ?? {},
    notifications: initial.notifications ?? [],
    tmuxAvailable: initial.tmuxAvailable ?? null
  }));
}

export function upsertSessionSummary(store: CiabSessionStore, summary: SessionSummary): void {
  const { sessions } = store.getState();
  const previous = sessions[summary.name];
  if (previous !== undefined && previous.revision === summary.revision) {
    return;
  }
  store.setState({ sessions: { ...sessions, [summary.name]: summary } });
}

export function removeSessionSummary(store: CiabSessionStore, name: string): void {
  const { sessions } = store.getState();
  if (sessions[name] === undefined) {
    return;
  }
  const next = Object.fromEntries(Object.entries(sessions).filter(([key]) => key !== name));
  store.setState({ sessions: next });
}

export function pushNotification(store: CiabSessionStore, notification: Notification, nowMs: number): void {
  const live = pruneExpiredNotifications(store.getState().notifications, nowMs);
  store.setState({ notifications: [...live, notification] });
}

export function dismissNotification(store: CiabSessionStore, id: string): boolean {
  const { notifications } = store.getState();
  const next = notifications.filter((notification) => notification.id !== id);
  if (next.length === notifications.length) {
    return false;
  }
  store.setState({ notifications: next });
  return true;
}

export function pruneNotifications(store: CiabSessionStore, nowMs: number): void {
  const { notifications } = store.getState();
  const live = pruneExpiredNotifications(notifications, nowMs);
  if (live !== notifications) {
    store.setState({ notifications: live });
  }
}

export function selectSessionList(state: CiabSessionStoreState): SessionSummary[] {
  return Object.values(state.sessions).sort(
    (left, right) => left.createdAt.localeCompare(right.createdAt) || left.name.localeCompare(right.name)
  );
}

export function setTmuxAvailability(store: CiabSessionStore, available: boolean): void {
  if (store.getState().tmuxAvailable === available) {
    return;
  }
  store.setState({ tmuxAvailable: available });
}

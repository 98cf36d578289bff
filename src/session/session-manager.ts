import { createNotification, remainingNotificationMs, type NotificationInput } from '../app/notification.ts';
import { describeUiCommand, type UiCommand } from '../app/ui-command.ts';
import type { CiabConfig } from '../config/config-core.ts';
import {
  InvalidLabelError,
  SessionExistsError,
  SessionNotFoundError,
  TmuxNotInstalledError,
  errorMessage,
  toCiabErrorShape,
  wrapTransportError,
  type CiabErrorKind
} from '../core/errors.ts';
import { systemScheduler, type Scheduler } from '../core/scheduler.ts';
import { logError, logInfo, logWarn } from '../diagnostics/event-log.ts';
import { canonicalSessionName } from '../naming/session-name.ts';
import type { TmuxDriver } from '../pty/tmux-driver.ts';
import type { RemoteEndpoint } from '../remote/tcp-duplex.ts';
import type { ScreenSnapshot } from '../terminal/screen-model.ts';
import {
  SESSION_METADATA_VERSION,
  type SessionMetadata,
  type SessionMetadataStore
} from './session-persistence.ts';
import {
  createCiabSessionStore,
  dismissNotification,
  pruneNotifications,
  pushNotification,
  removeSessionSummary,
  selectSessionList,
  setTmuxAvailability,
  upsertSessionSummary,
  type CiabSessionStore
} from './session-store.ts';
import {
  TerminalSession,
  type ScrollPosition,
  type SessionIdentity,
  type SessionSummary
} from './terminal-session.ts';
import type { SessionTarget, TransportFactory } from './transport.ts';

export interface CreateSessionRequest {
  readonly label: string;
  readonly cwd: string;
  readonly program?: string;
  readonly remote?: RemoteEndpoint;
}

export interface SessionSnapshot {
  readonly summary: SessionSummary;
  readonly view: ScreenSnapshot;
  readonly scroll: ScrollPosition;
}

export type UiCommandResult =
  | { readonly ok: true; readonly snapshot: SessionSnapshot }
  | { readonly ok: false; readonly error: { readonly kind: CiabErrorKind; readonly message: string } };

export interface SessionManagerOptions {
  readonly config: CiabConfig;
  readonly driver: TmuxDriver;
  readonly metadataStore: SessionMetadataStore;
  readonly openTransport: TransportFactory;
  readonly scheduler?: Scheduler;
  readonly store?: CiabSessionStore;
  /** Starts periodic activity sampling for every registered session. */
  readonly sampleActivity?: boolean;
}

interface ManagedSession {
  readonly session: TerminalSession;
  readonly unsubscribe: () => void;
}

function identityToMetadata(identity: SessionIdentity): SessionMetadata {
  return {
    version: SESSION_METADATA_VERSION,
    name: identity.name,
    label: identity.label,
    cwd: identity.cwd,
    createdAt: identity.createdAt,
    transport:
      identity.target.kind === 'local'
        ? { kind: 'local', program: identity.target.program }
        : { kind: 'remote', host: identity.target.endpoint.host, port: identity.target.endpoint.port }
  };
}

function metadataToIdentity(metadata: SessionMetadata): SessionIdentity {
  const target: SessionTarget =
    metadata.transport.kind === 'local'
      ? { kind: 'local', program: metadata.transport.program }
      : { kind: 'remote', endpoint: { host: metadata.transport.host, port: metadata.transport.port } };
  return {
    name: metadata.name,
    label: metadata.label,
    cwd: metadata.cwd,
    createdAt: metadata.createdAt,
    target
  };
}

function collisionDetail(existingLabel: string, requestedLabel: string): string | undefined {
  return existingLabel === requestedLabel ? undefined : `label ${JSON.stringify(existingLabel)} maps to the same name`;
}

/**
 * Owns every session by its sanitized name and publishes their summaries and
 * user notifications into the session store. A failure in one session never
 * reaches another.
 */
export class SessionManager {
  readonly store: CiabSessionStore;

  private readonly config: CiabConfig;
  private readonly driver: TmuxDriver;
  private readonly metadataStore: SessionMetadataStore;
  private readonly openTransport: TransportFactory;
  private readonly scheduler: Scheduler;
  private readonly sampleActivity: boolean;
  private readonly sessions = new Map<string, ManagedSession>();
  private readonly creating = new Map<string, string>();
  private tmuxAvailable: boolean | null = null;
  private tmuxMissingReported = false;
  private nextNotificationId = 1;

  constructor(options: SessionManagerOptions) {
    this.config = options.config;
    this.driver = options.driver;
    this.metadataStore = options.metadataStore;
    this.openTransport = options.openTransport;
    this.scheduler = options.scheduler ?? systemScheduler;
    this.store = options.store ?? createCiabSessionStore();
    this.sampleActivity = options.sampleActivity ?? true;
  }

  /** Probes for tmux once; a missing binary is reported a single time. */
  async startup(): Promise<boolean> {
    const installed = await this.driver.isInstalled();
    this.tmuxAvailable = installed;
    setTmuxAvailability(this.store, installed);
    if (!installed && !this.tmuxMissingReported) {
      this.tmuxMissingReported = true;
      logError('tmux.missing', { executable: this.driver.executable });
      this.notify({ kind: 'error', message: 'tmux is not installed; local sessions are unavailable' });
    }
    return installed;
  }

  async create(request: CreateSessionRequest): Promise<SessionSummary> {
    if (request.label.trim().length === 0) {
      throw new InvalidLabelError(request.label, 'label is empty');
    }
    const name = canonicalSessionName(request.label);
    const claimedBy = this.creating.get(name);
    if (claimedBy !== undefined) {
      throw new SessionExistsError(name, collisionDetail(claimedBy, request.label));
    }
    const existing = this.sessions.get(name);
    if (existing !== undefined && existing.session.attachState() !== 'terminated') {
      throw new SessionExistsError(name, collisionDetail(existing.session.identity.label, request.label));
    }
    this.creating.set(name, request.label);
    try {
      if (existing !== undefined) {
        await this.discard(name, existing);
      }
      return await this.createUnclaimed(name, request);
    } finally {
      this.creating.delete(name);
    }
  }

  async attach(name: string): Promise<SessionSummary> {
    const session = this.require(name);
    try {
      await session.attach();
    } catch (error: unknown) {
      const failure = wrapTransportError(name, 'attach', error);
      if (failure.kind !== 'session-busy' && failure.kind !== 'invalid-transition') {
        this.notify({
          kind: 'error',
          message: failure.message,
          retry: { type: 'attach', name }
        });
      }
      throw failure;
    }
    this.dismissRetries(name);
    return session.summary();
  }

  async detach(name: string): Promise<SessionSummary> {
    const session = this.require(name);
    await session.detach();
    return session.summary();
  }

  resize(name: string, cols: number, rows: number): SessionSummary {
    const session = this.require(name);
    session.resize(cols, rows);
    return session.summary();
  }

  sendInput(name: string, bytes: Uint8Array): SessionSummary {
    const session = this.require(name);
    session.sendInput(bytes);
    return session.summary();
  }

  scroll(name: string, delta: number): ScrollPosition {
    return this.require(name).scroll(delta);
  }

  resume(name: string): SessionSummary {
    const session = this.require(name);
    session.resume();
    return session.summary();
  }

  /** Releases the session's transport (ending its process) before forgetting it. */
  async close(name: string): Promise<SessionSnapshot> {
    const entry = this.sessions.get(name);
    if (entry === undefined) {
      throw new SessionNotFoundError(name);
    }
    try {
      await entry.session.close();
    } finally {
      this.forget(name, entry);
    }
    const snapshot = this.snapshotOf(entry.session);
    try {
      await this.metadataStore.remove(name);
    } catch (error: unknown) {
      this.reportPersistenceFailure(name, 'remove', error);
    }
    logInfo('session.closed', { session: name });
    return snapshot;
  }

  list(): SessionSummary[] {
    return selectSessionList(this.store.getState());
  }

  get(name: string): TerminalSession | null {
    return this.sessions.get(name)?.session ?? null;
  }

  snapshot(name: string): SessionSnapshot {
    return this.snapshotOf(this.require(name));
  }

  /** Re-registers persisted sessions as detached; local ones whose tmux session is gone come back terminated. */
  async restore(): Promise<SessionSummary[]> {
    let records: SessionMetadata[];
    try {
      records = await this.metadataStore.loadAll();
    } catch (error: unknown) {
      this.reportPersistenceFailure('*', 'load', error);
      return [];
    }
    const pending = records.filter((record) => !this.sessions.has(record.name));
    let liveTmuxSessions: ReadonlySet<string> | null = null;
    if (pending.some((record) => record.transport.kind === 'local')) {
      const installed = this.tmuxAvailable ?? (await this.startup());
      if (installed) {
        liveTmuxSessions = new Set(await this.driver.listSessions());
      }
    }
    const restored: SessionSummary[] = [];
    for (const record of pending) {
      const session = this.register(metadataToIdentity(record));
      if (record.transport.kind === 'local') {
        if (liveTmuxSessions === null) {
          session.markTerminated('tmux is not installed');
        } else if (!liveTmuxSessions.has(record.name)) {
          session.markTerminated('tmux session not found');
        }
      }
      restored.push(session.summary());
    }
    logInfo('session.restore', { loaded: records.length, restored: restored.length });
    return restored;
  }

  /** The UI boundary: every outcome comes back as a value. */
  async execute(command: UiCommand): Promise<UiCommandResult> {
    try {
      switch (command.type) {
        case 'attach':
          await this.attach(command.name);
          break;
        case 'detach':
          await this.detach(command.name);
          break;
        case 'resize':
          this.resize(command.name, command.cols, command.rows);
          break;
        case 'send-input':
          this.sendInput(command.name, command.bytes);
          break;
        case 'scroll':
          this.scroll(command.name, command.delta);
          break;
        case 'resume':
          this.resume(command.name);
          break;
        case 'close':
          return { ok: true, snapshot: await this.close(command.name) };
      }
      return { ok: true, snapshot: this.snapshot(command.name) };
    } catch (error: unknown) {
      const shape = toCiabErrorShape(error);
      logWarn('ui.command.failed', {
        command: describeUiCommand(command),
        kind: shape.kind,
        message: shape.message
      });
      return { ok: false, error: { kind: shape.kind, message: shape.message } };
    }
  }

  notify(input: NotificationInput): void {
    const id = `notification-${String(this.nextNotificationId)}`;
    this.nextNotificationId += 1;
    const nowMs = this.scheduler.nowMs();
    const notification = createNotification(id, input, nowMs);
    pushNotification(this.store, notification, nowMs);
    this.scheduler.setTimer(() => {
      this.pruneNotifications();
    }, remainingNotificationMs(notification, nowMs) + 1);
  }

  pruneNotifications(): void {
    pruneNotifications(this.store, this.scheduler.nowMs());
  }

  /** Stops sampling and detaches live views; tmux sessions and remote processes keep running. */
  async shutdown(): Promise<void> {
    for (const { session } of this.sessions.values()) {
      session.stopSampling();
      const state = session.attachState();
      if (state !== 'attached' && state !== 'scroll-mode') {
        continue;
      }
      try {
        await session.detach();
      } catch (error: unknown) {
        logWarn('session.shutdown.detach.failed', { session: session.name, message: errorMessage(error) });
      }
    }
  }

  private async createUnclaimed(name: string, request: CreateSessionRequest): Promise<SessionSummary> {

    const target: SessionTarget =
      request.remote === undefined
        ? { kind: 'local', program: request.program ?? this.config.local.program }
        : { kind: 'remote', endpoint: request.remote };
    if (target.kind === 'local') {
      await this.requireTmux();
      await this.driver.createSession(name, request.cwd, target.program, this.config.local.historyLimit);
    }

    const identity: SessionIdentity = {
      name,
      label: request.label,
      cwd: request.cwd,
      createdAt: new Date(this.scheduler.nowMs()).toISOString(),
      target
    };
    const session = this.register(identity);
    logInfo('session.created', { session: name, transport: target.kind });
    await this.persist(identity);
    return session.summary();
  }

  private register(identity: SessionIdentity): TerminalSession {
    const local = identity.target.kind === 'local';
    const session = new TerminalSession({
      identity,
      openTransport: this.openTransport,
      capture: this.config.capture,
      markers: this.config.activity.markers,
      attachTimeoutMs: this.config.local.attachTimeoutMs,
      cols: this.config.terminal.defaultCols,
      rows: this.config.terminal.defaultRows,
      scrollbackLines: this.config.terminal.scrollbackLines,
      capabilities: this.config.terminal.capabilities,
      scheduler: this.scheduler,
      ...(local
        ? {
            captureDetached: async () => await this.driver.capturePane(identity.name, this.config.capture),
            terminateDetached: async () => {
              await this.driver.killSession(identity.name);
            }
          }
        : {})
    });
    let previousState = session.attachState();
    const unsubscribe = session.subscribe((summary) => {
      upsertSessionSummary(this.store, summary);
      const ended = summary.attachState === 'terminated' && previousState !== 'terminated';
      previousState = summary.attachState;
      if (ended && summary.endReason !== 'closed') {
        this.notify({
          kind: 'warning',
          message: `${summary.label} ended (${summary.endReason ?? 'unknown reason'}); close it or create it again`
        });
      }
    });
    this.sessions.set(identity.name, { session, unsubscribe });
    upsertSessionSummary(this.store, session.summary());
    if (this.sampleActivity) {
      session.startSampling();
    }
    return session;
  }

  // A retry offer is stale once the session attached.
  private dismissRetries(name: string): void {
    for (const notification of this.store.getState().notifications) {
      if (notification.retry?.type === 'attach' && notification.retry.name === name) {
        dismissNotification(this.store, notification.id);
      }
    }
  }

  private async discard(name: string, entry: ManagedSession): Promise<void> {
    try {
      await entry.session.close();
    } finally {
      this.forget(name, entry);
    }
  }

  private forget(name: string, entry: ManagedSession): void {
    entry.unsubscribe();
    if (this.sessions.get(name) === entry) {
      this.sessions.delete(name);
    }
    removeSessionSummary(this.store, name);
  }

  private require(name: string): TerminalSession {
    const entry = this.sessions.get(name);
    if (entry === undefined) {
      throw new SessionNotFoundError(name);
    }
    return entry.session;
  }

  private snapshotOf(session: TerminalSession): SessionSnapshot {
    return {
      summary: session.summary(),
      view: session.view(),
      scroll: session.scrollPosition()
    };
  }

  private async requireTmux(): Promise<void> {
    const installed = this.tmuxAvailable ?? (await this.startup());
    if (!installed) {
      throw new TmuxNotInstalledError();
    }
  }

  private async persist(identity: SessionIdentity): Promise<void> {
    try {
      await this.metadataStore.save(identity.name, identityToMetadata(identity));
    } catch (error: unknown) {
      this.reportPersistenceFailure(identity.name, 'save', error);
    }
  }

  private reportPersistenceFailure(name: string, operation: 'save' | 'load' | 'remove', error: unknown): void {
    const message = errorMessage(error);
    logWarn(`session.metadata.${operation}.failed`, { session: name, message });
    this.notify({ kind: 'warning', message: `could not ${operation} session metadata: ${message}` });
  }
}

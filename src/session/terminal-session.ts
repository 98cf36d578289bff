import { classifyActivity, type ActivityState } from '../activity/activity-detector.ts';
import type { ActivityMarkers, CaptureOptions, TerminalCapabilities } from '../config/config-core.ts';
import { deferred, type Deferred } from '../core/async-push-queue.ts';
import {
  AttachFailedError,
  InvalidTransitionError,
  SessionBusyError,
  errorMessage,
  toCiabErrorShape,
  wrapTransportError,
  type CiabError,
  type CiabErrorShape
} from '../core/errors.ts';
import { systemScheduler, type ScheduledTimer, type Scheduler } from '../core/scheduler.ts';
import { logDebug, logInfo, logWarn, startEventSpan } from '../diagnostics/event-log.ts';
import type { ConnectionState } from '../remote/stream-client.ts';
import { ScreenModel, type ScreenDiagnostics, type ScreenSnapshot } from '../terminal/screen-model.ts';
import type { SessionTarget, SessionTransport, TransportEvent, TransportFactory } from './transport.ts';

export type AttachState = 'detached' | 'attaching' | 'attached' | 'scroll-mode' | 'detaching' | 'terminated';

type TransitionKind = 'attach' | 'detach';

type AttachOutcome =
  | { readonly kind: 'ready' }
  | { readonly kind: 'aborted' }
  | { readonly kind: 'timeout' }
  | { readonly kind: 'failed'; readonly error: CiabError };

type AttachStep = AttachOutcome | { readonly kind: 'opened'; readonly transport: SessionTransport };

export interface SessionIdentity {
  readonly name: string;
  readonly label: string;
  readonly cwd: string;
  readonly createdAt: string;
  readonly target: SessionTarget;
}

export interface TerminalSessionOptions {
  readonly identity: SessionIdentity;
  readonly openTransport: TransportFactory;
  readonly capture: CaptureOptions;
  readonly markers: ActivityMarkers;
  readonly attachTimeoutMs: number;
  readonly cols: number;
  readonly rows: number;
  readonly scrollbackLines: number;
  readonly capabilities?: TerminalCapabilities;
  readonly scheduler?: Scheduler;
  /** Samples pane text while no transport is open (a detached tmux session). */
  readonly captureDetached?: () => Promise<string>;
  /** Ends the backing process when the session is closed without an open transport. */
  readonly terminateDetached?: () => Promise<void>;
}

export interface SessionSummary {
  readonly name: string;
  readonly label: string;
  readonly cwd: string;
  readonly createdAt: string;
  readonly transport: SessionTarget['kind'];
  readonly attachState: AttachState;
  readonly activity: ActivityState;
  readonly connection: ConnectionState | null;
  readonly scrollOffset: number;
  readonly lastError: CiabErrorShape | null;
  readonly endReason: string | null;
  readonly revision: number;
}

export interface ScrollPosition {
  readonly offset: number;
  readonly maxOffset: number;
}

function scrollWindow(frozen: ScreenSnapshot, offset: number): ScreenSnapshot {
  const rows = [...frozen.scrollback, ...frozen.richLines];
  const end = rows.length - offset;
  const start = Math.max(0, end - frozen.rows);
  const richLines = rows.slice(start, end);
  return {
    ...frozen,
    cursor: { ...frozen.cursor, visible: false },
    lines: richLines.map((line) => line.text),
    richLines
  };
}

/**
 * One terminal session: a screen model fed by at most one open transport,
 * moved through the attach lifecycle one transition at a time.
 */
export class TerminalSession {
  readonly identity: SessionIdentity;

  private readonly options: TerminalSessionOptions;
  private readonly scheduler: Scheduler;
  private readonly model: ScreenModel;
  private readonly listeners = new Set<(summary: SessionSummary) => void>();
  private state: AttachState = 'detached';
  private inFlight: TransitionKind | null = null;
  private transport: SessionTransport | null = null;
  private pendingAttach: Deferred<AttachOutcome> | null = null;
  private activity: ActivityState = 'unknown';
  private connection: ConnectionState | null = null;
  private frozen: ScreenSnapshot | null = null;
  private scrollOffset = 0;
  private lastError: CiabErrorShape | null = null;
  private endReason: string | null = null;
  private revision = 0;
  private samplerTimer: ScheduledTimer | null = null;
  private samplingActive = false;
  private sampleInProgress: Promise<ActivityState> | null = null;

  constructor(options: TerminalSessionOptions) {
    this.options = options;
    this.identity = options.identity;
    this.scheduler = options.scheduler ?? systemScheduler;
    this.model = new ScreenModel({
      cols: options.cols,
      rows: options.rows,
      scrollbackLines: options.scrollbackLines,
      ...(options.capabilities === undefined ? {} : { capabilities: options.capabilities })
    });
  }

  get name(): string {
    return this.identity.name;
  }

  attachState(): AttachState {
    return this.state;
  }

  summary(): SessionSummary {
    return {
      name: this.identity.name,
      label: this.identity.label,
      cwd: this.identity.cwd,
      createdAt: this.identity.createdAt,
      transport: this.identity.target.kind,
      attachState: this.state,
      activity: this.activity,
      connection: this.connection,
      scrollOffset: this.state === 'scroll-mode' ? this.scrollOffset : 0,
      lastError: this.lastError,
      endReason: this.endReason,
      revision: this.revision
    };
  }

  /** The live screen. */
  screen(): ScreenSnapshot {
    return this.model.snapshot();
  }

  /** What the user sees: the frozen scrollback window in scroll mode, otherwise the live screen. */
  view(): ScreenSnapshot {
    if (this.state === 'scroll-mode' && this.frozen !== null) {
      return scrollWindow(this.frozen, this.scrollOffset);
    }
    return this.model.snapshot();
  }

  scrollPosition(): ScrollPosition {
    if (this.state !== 'scroll-mode' || this.frozen === null) {
      return { offset: 0, maxOffset: 0 };
    }
    return { offset: this.scrollOffset, maxOffset: this.frozen.scrollback.length };
  }

  screenDiagnostics(): ScreenDiagnostics {
    return this.model.diagnostics();
  }

  subscribe(listener: (summary: SessionSummary) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async attach(): Promise<void> {
    this.beginTransition('attach', ['detached']);
    const outcome = deferred<AttachOutcome>();
    this.pendingAttach = outcome;
    this.lastError = null;
    this.endReason = null;
    this.setState('attaching');
    const span = startEventSpan('session.attach', {
      session: this.name,
      transport: this.identity.target.kind
    });
    const timer = this.scheduler.setTimer(() => {
      outcome.resolve({ kind: 'timeout' });
    }, this.options.attachTimeoutMs);
    let transport: SessionTransport | null = null;
    try {
      const opening = this.options.openTransport({
        sessionName: this.name,
        target: this.identity.target,
        cols: this.model.cols,
        rows: this.model.rows
      });
      const step: AttachStep = await Promise.race([
        opening.then((opened): AttachStep => ({ kind: 'opened', transport: opened })),
        outcome.promise
      ]);
      let result: AttachOutcome;
      if (step.kind === 'opened') {
        transport = step.transport;
        this.transport = transport;
        void this.pump(transport, outcome);
        result = await outcome.promise;
      } else {
        this.releaseLateTransport(opening, step.kind === 'aborted');
        result = step;
      }
      if (result.kind !== 'ready') {
        throw this.attachFailure(result);
      }
      this.setState('attached');
      span.end({ status: 'attached' });
      logInfo('session.attached', { session: this.name });
    } catch (error: unknown) {
      const failure = wrapTransportError(this.name, 'attach', error);
      span.end({ status: 'error', kind: failure.kind });
      logWarn('session.attach.failed', {
        session: this.name,
        kind: failure.kind,
        message: failure.message
      });
      if (this.state !== 'terminated') {
        if (transport !== null && this.transport === transport) {
          this.transport = null;
          await this.releaseTransport(transport, 'detach');
        }
        this.lastError = toCiabErrorShape(failure);
        this.setState('detached');
      }
      throw failure;
    } finally {
      timer.cancel();
      this.pendingAttach = null;
      this.inFlight = null;
    }
  }

  async detach(): Promise<void> {
    this.beginTransition('detach', ['attached', 'scroll-mode']);
    const transport = this.transport;
    this.transport = null;
    this.frozen = null;
    this.setState('detaching');
    try {
      if (transport !== null) {
        await this.releaseTransport(transport, 'detach');
      }
    } finally {
      this.inFlight = null;
      if (this.state === 'detaching') {
        this.connection = null;
        this.setState('detached');
        logInfo('session.detached', { session: this.name });
      }
    }
  }

  /** Negative deltas scroll back into history; scrolling forward to the bottom resumes the live view. */
  scroll(delta: number): ScrollPosition {
    if (this.state === 'attached') {
      if (delta >= 0) {
        return this.scrollPosition();
      }
      this.freeze();
    } else if (this.state !== 'scroll-mode') {
      throw new InvalidTransitionError(this.name, this.state, 'scroll');
    }
    const maxOffset = this.frozen?.scrollback.length ?? 0;
    const next = Math.min(maxOffset, Math.max(0, this.scrollOffset - Math.trunc(delta)));
    if (next === 0 && delta > 0) {
      this.resume();
      return this.scrollPosition();
    }
    this.scrollOffset = next;
    this.touch();
    return this.scrollPosition();
  }

  enterScrollMode(): void {
    if (this.state === 'scroll-mode') {
      return;
    }
    if (this.state !== 'attached') {
      throw new InvalidTransitionError(this.name, this.state, 'enter scroll mode');
    }
    this.freeze();
    this.touch();
  }

  resume(): void {
    if (this.state === 'attached') {
      return;
    }
    if (this.state !== 'scroll-mode') {
      throw new InvalidTransitionError(this.name, this.state, 'resume');
    }
    this.frozen = null;
    this.scrollOffset = 0;
    this.setState('attached');
  }

  sendInput(bytes: Uint8Array): void {
    if (this.state === 'scroll-mode') {
      this.resume();
    }
    const transport = this.transport;
    if (this.state !== 'attached' || transport === null) {
      throw new InvalidTransitionError(this.name, this.state, 'send input to');
    }
    transport.write(bytes);
  }

  /** Returns false for sizes the screen model rejects; nothing is forwarded then. */
  resize(cols: number, rows: number): boolean {
    if (!this.model.resize(cols, rows)) {
      logWarn('session.resize.rejected', { session: this.name, cols, rows });
      return false;
    }
    this.transport?.resize(cols, rows);
    this.touch();
    return true;
  }

  startSampling(): void {
    if (this.samplingActive || this.state === 'terminated') {
      return;
    }
    this.samplingActive = true;
    this.scheduleSample();
  }

  stopSampling(): void {
    this.samplingActive = false;
    this.samplerTimer?.cancel();
    this.samplerTimer = null;
  }

  /** Runs one activity sample; a call made while one is running shares its result. */
  async sampleActivity(): Promise<ActivityState> {
    if (this.sampleInProgress !== null) {
      return await this.sampleInProgress;
    }
    const running = this.runSample();
    this.sampleInProgress = running;
    try {
      return await running;
    } finally {
      this.sampleInProgress = null;
    }
  }

  /** Tears the session down from any state; the backing process is ended. */
  async close(): Promise<void> {
    if (this.state === 'terminated' && this.transport === null) {
      this.stopSampling();
      return;
    }
    this.stopSampling();
    this.pendingAttach?.resolve({ kind: 'aborted' });
    const transport = this.transport;
    this.transport = null;
    this.frozen = null;
    this.endReason = 'closed';
    this.setState('terminated');
    if (transport !== null) {
      await this.releaseTransport(transport, 'terminate');
      return;
    }
    const terminateDetached = this.options.terminateDetached;
    if (terminateDetached !== undefined) {
      try {
        await terminateDetached();
      } catch (error: unknown) {
        logWarn('session.close.terminate.failed', { session: this.name, message: errorMessage(error) });
      }
    }
  }

  /** Marks a session whose backing process is known to be gone, without touching any transport. */
  markTerminated(reason: string): void {
    if (this.state === 'terminated') {
      return;
    }
    this.stopSampling();
    this.endReason = reason;
    this.setState('terminated');
  }

  private beginTransition(kind: TransitionKind, allowed: readonly AttachState[]): void {
    if (this.inFlight !== null) {
      logDebug('session.transition.busy', { session: this.name, requested: kind, inFlight: this.inFlight });
      throw new SessionBusyError(this.name, this.inFlight);
    }
    if (!allowed.includes(this.state)) {
      throw new InvalidTransitionError(this.name, this.state, kind);
    }
    this.inFlight = kind;
  }

  private attachFailure(outcome: Exclude<AttachOutcome, { kind: 'ready' }>): CiabError {
    switch (outcome.kind) {
      case 'timeout':
        return new AttachFailedError(
          this.name,
          `no output within ${String(this.options.attachTimeoutMs)}ms`
        );
      case 'aborted':
        return new AttachFailedError(this.name, 'session was closed');
      case 'failed':
        return outcome.error;
    }
  }

  private releaseLateTransport(opening: Promise<SessionTransport>, terminate: boolean): void {
    void opening.then(
      async (late) => {
        await this.releaseTransport(late, terminate ? 'terminate' : 'detach');
      },
      (error: unknown) => {
        logDebug('session.attach.late-open.failed', { session: this.name, message: errorMessage(error) });
      }
    );
  }

  private async releaseTransport(transport: SessionTransport, mode: 'detach' | 'terminate'): Promise<void> {
    try {
      if (mode === 'terminate') {
        await transport.terminate();
      } else {
        await transport.detach();
      }
    } catch (error: unknown) {
      const wrapped = wrapTransportError(this.name, mode, error);
      this.lastError = toCiabErrorShape(wrapped);
      logWarn('session.transport.release.failed', { session: this.name, mode, message: wrapped.message });
    }
  }

  private async pump(transport: SessionTransport, outcome: Deferred<AttachOutcome>): Promise<void> {
    try {
      for await (const event of transport.read()) {
        if (this.transport !== transport) {
          return;
        }
        this.handleTransportEvent(transport, event, outcome);
      }
    } catch (error: unknown) {
      if (this.transport !== transport) {
        return;
      }
      const wrapped = wrapTransportError(this.name, 'read', error);
      this.handleTransportEvent(transport, { kind: 'error', error: wrapped }, outcome);
      this.handleTransportEvent(
        transport,
        { kind: 'end', processAlive: true, reason: wrapped.message },
        outcome
      );
    }
  }

  private handleTransportEvent(
    transport: SessionTransport,
    event: TransportEvent,
    outcome: Deferred<AttachOutcome>
  ): void {
    switch (event.kind) {
      case 'ready':
        outcome.resolve({ kind: 'ready' });
        return;
      case 'data':
        this.model.feed(event.bytes);
        this.touch();
        return;
      case 'resize':
        this.model.resize(event.cols, event.rows);
        this.touch();
        return;
      case 'connection':
        this.connection = event.state;
        this.touch();
        return;
      case 'error':
        this.lastError = toCiabErrorShape(event.error);
        logWarn('session.transport.error', {
          session: this.name,
          kind: event.error.kind,
          message: event.error.message
        });
        if (this.state === 'attaching') {
          outcome.resolve({ kind: 'failed', error: event.error });
        }
        this.touch();
        return;
      case 'end':
        this.handleEnd(transport, event.processAlive, event.reason, outcome);
        return;
    }
  }

  private handleEnd(
    transport: SessionTransport,
    processAlive: boolean,
    reason: string,
    outcome: Deferred<AttachOutcome>
  ): void {
    if (this.state === 'attaching') {
      outcome.resolve({ kind: 'failed', error: new AttachFailedError(this.name, reason) });
      return;
    }
    if (this.transport !== transport) {
      return;
    }
    this.transport = null;
    this.frozen = null;
    this.connection = null;
    this.endReason = reason;
    if (processAlive) {
      logInfo('session.stream.ended', { session: this.name, reason });
      this.setState('detached');
      return;
    }
    logInfo('session.terminated', { session: this.name, reason });
    this.stopSampling();
    this.setState('terminated');
  }

  private freeze(): void {
    this.frozen = this.model.snapshot();
    this.scrollOffset = 0;
    this.state = 'scroll-mode';
  }

  private scheduleSample(): void {
    if (!this.samplingActive) {
      return;
    }
    this.samplerTimer = this.scheduler.setTimer(() => {
      this.samplerTimer = null;
      void this.sampleActivity().finally(() => {
        this.scheduleSample();
      });
    }, this.options.capture.samplingIntervalMs);
  }

  private async runSample(): Promise<ActivityState> {
    let text: string;
    try {
      text = await this.captureText();
    } catch (error: unknown) {
      logDebug('session.sample.failed', { session: this.name, message: errorMessage(error) });
      return this.activity;
    }
    const next = classifyActivity(text, {
      markers: this.options.markers,
      historyLines: this.options.capture.historyLines
    });
    if (next !== this.activity) {
      logDebug('session.activity', { session: this.name, from: this.activity, to: next });
      this.activity = next;
      this.touch();
    }
    return next;
  }

  private async captureText(): Promise<string> {
    const transport = this.transport;
    if (transport !== null && transport.capture !== undefined) {
      return await transport.capture();
    }
    if (transport === null && this.state !== 'terminated' && this.options.captureDetached !== undefined) {
      return await this.options.captureDetached();
    }
    return this.model.tailText(this.options.capture.historyLines);
  }

  private setState(next: AttachState): void {
    if (this.state !== next) {
      logDebug('session.state', { session: this.name, from: this.state, to: next });
    }
    this.state = next;
    this.touch();
  }

  private touch(): void {
    this.revision += 1;
    const summary = this.summary();
    for (const listener of this.listeners) {
      listener(summary);
    }
  }
}

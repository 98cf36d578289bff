import type { CiabRemoteConfig } from '../config/config-core.ts';
import { ConnectionFailedError, errorMessage } from '../core/errors.ts';
import { systemScheduler, type ScheduledTimer, type Scheduler } from '../core/scheduler.ts';
import { logDebug, logInfo, logWarn, startEventSpan } from '../diagnostics/event-log.ts';
import {
  ProtocolFrameDecoder,
  encodeProtocolMessage,
  type ProtocolMessage
} from './stream-protocol.ts';
import {
  connectTcpDuplex,
  formatEndpoint,
  type DuplexConnection,
  type DuplexConnector,
  type RemoteEndpoint
} from './tcp-duplex.ts';

export type ConnectionState =
  | { readonly kind: 'connecting' }
  | { readonly kind: 'connected' }
  | { readonly kind: 'reconnecting'; readonly attempt: number }
  | { readonly kind: 'disconnected' }
  | { readonly kind: 'failed'; readonly reason: string };

export type RemoteStreamTimings = Pick<
  CiabRemoteConfig,
  | 'heartbeatIntervalMs'
  | 'heartbeatTimeoutMs'
  | 'reconnectBaseDelayMs'
  | 'reconnectMaxDelayMs'
  | 'maxReconnectAttempts'
  | 'connectTimeoutMs'
  | 'maxQueuedMessages'
>;

interface RemoteStreamClientOptions {
  readonly endpoint: RemoteEndpoint;
  readonly timings: RemoteStreamTimings;
  readonly connector?: DuplexConnector;
  readonly scheduler?: Scheduler;
  readonly sessionName?: string;
}

export function reconnectDelayMs(
  attempt: number,
  timings: Pick<RemoteStreamTimings, 'reconnectBaseDelayMs' | 'reconnectMaxDelayMs'>
): number {
  const exponent = Math.max(0, attempt - 1);
  const delay = timings.reconnectBaseDelayMs * 2 ** exponent;
  return Math.min(timings.reconnectMaxDelayMs, delay);
}

/**
 * One persistent connection to a remote PTY service. Inbound messages are
 * delivered to listeners in arrival order; outbound messages sent while the
 * link is down are queued and flushed, in order, once it is back.
 */
export class RemoteStreamClient {
  private readonly endpoint: RemoteEndpoint;
  private readonly timings: RemoteStreamTimings;
  private readonly connector: DuplexConnector;
  private readonly scheduler: Scheduler;
  private readonly sessionName: string;
  private readonly messageListeners = new Set<(message: ProtocolMessage) => void>();
  private readonly stateListeners = new Set<(state: ConnectionState) => void>();
  private readonly decoder = new ProtocolFrameDecoder();
  private state: ConnectionState = { kind: 'disconnected' };
  private connection: DuplexConnection | null = null;
  private generation = 0;
  private outbound: ProtocolMessage[] = [];
  private sendSeq = 0;
  private lastInboundAtMs = 0;
  private attempt = 0;
  private heartbeatTimer: ScheduledTimer | null = null;
  private watchdogTimer: ScheduledTimer | null = null;
  private reconnectTimer: ScheduledTimer | null = null;
  private closed = false;
  private rejectedFrames = 0;

  constructor(options: RemoteStreamClientOptions) {
    this.endpoint = options.endpoint;
    this.timings = options.timings;
    this.connector = options.connector ?? connectTcpDuplex;
    this.scheduler = options.scheduler ?? systemScheduler;
    this.sessionName = options.sessionName ?? formatEndpoint(options.endpoint);
  }

  connectionState(): ConnectionState {
    return this.state;
  }

  get rejectedFrameCount(): number {
    return this.rejectedFrames;
  }

  get queuedMessageCount(): number {
    return this.outbound.length;
  }

  onMessage(listener: (message: ProtocolMessage) => void): () => void {
    this.messageListeners.add(listener);
    return () => {
      this.messageListeners.delete(listener);
    };
  }

  onStateChange(listener: (state: ConnectionState) => void): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  /** Opens the first connection. A failure here is final: no reconnect is scheduled. */
  async connect(): Promise<void> {
    if (this.closed) {
      throw new ConnectionFailedError(formatEndpoint(this.endpoint), 'client is closed', {
        sessionName: this.sessionName
      });
    }
    if (this.state.kind === 'connected' || this.state.kind === 'connecting') {
      return;
    }
    this.setState({ kind: 'connecting' });
    const span = startEventSpan('remote.connect', {
      session: this.sessionName,
      endpoint: formatEndpoint(this.endpoint)
    });
    try {
      const connection = await this.connector(this.endpoint, this.timings.connectTimeoutMs);
      if (this.closed) {
        connection.close();
        span.end({ status: 'closed' });
        throw new ConnectionFailedError(formatEndpoint(this.endpoint), 'client closed while connecting', {
          sessionName: this.sessionName
        });
      }
      this.adoptConnection(connection);
      span.end({ status: 'connected' });
    } catch (error: unknown) {
      if (error instanceof ConnectionFailedError) {
        throw error;
      }
      const reason = errorMessage(error);
      span.end({ status: 'error', message: reason });
      this.setState({ kind: 'failed', reason });
      throw new ConnectionFailedError(formatEndpoint(this.endpoint), reason, {
        sessionName: this.sessionName,
        cause: error
      });
    }
  }

  /** Returns false when the message was dropped (closed, failed, or the offline queue is full). */
  send(message: ProtocolMessage): boolean {
    if (this.closed || this.state.kind === 'failed') {
      return false;
    }
    if (this.state.kind === 'connected' && this.connection !== null) {
      this.writeMessage(this.connection, message);
      return true;
    }
    if (message.type === 'heartbeat') {
      return false;
    }
    if (this.outbound.length >= this.timings.maxQueuedMessages) {
      logWarn('remote.queue.overflow', {
        session: this.sessionName,
        type: message.type,
        queued: this.outbound.length
      });
      return false;
    }
    this.outbound.push(message);
    return true;
  }

  /** Clears a `failed` state so `connect()` may be tried again. */
  reset(): void {
    if (this.closed) {
      return;
    }
    this.cancelReconnect();
    this.dropConnection();
    this.attempt = 0;
    this.outbound = [];
    this.decoder.reset();
    this.setState({ kind: 'disconnected' });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.cancelReconnect();
    this.dropConnection();
    this.outbound = [];
    this.setState({ kind: 'disconnected' });
    this.messageListeners.clear();
    this.stateListeners.clear();
  }

  private setState(next: ConnectionState): void {
    this.state = next;
    logDebug('remote.state', {
      session: this.sessionName,
      state: next.kind,
      ...(next.kind === 'reconnecting' ? { attempt: next.attempt } : {}),
      ...(next.kind === 'failed' ? { reason: next.reason } : {})
    });
    for (const listener of this.stateListeners) {
      listener(next);
    }
  }

  private adoptConnection(connection: DuplexConnection): void {
    this.generation += 1;
    const generation = this.generation;
    this.connection = connection;
    this.decoder.reset();
    this.lastInboundAtMs = this.scheduler.nowMs();

    connection.onData((chunk) => {
      if (generation !== this.generation) {
        return;
      }
      this.handleData(chunk);
    });
    connection.onClose((error) => {
      if (generation !== this.generation) {
        return;
      }
      this.handleDrop(error === null ? 'connection closed' : errorMessage(error));
    });

    this.attempt = 0;
    this.setState({ kind: 'connected' });
    this.flushOutbound(connection);
    this.scheduleHeartbeat();
    this.scheduleWatchdog(this.timings.heartbeatTimeoutMs);
  }

  private handleData(chunk: Uint8Array): void {
    this.lastInboundAtMs = this.scheduler.nowMs();
    const decoded = this.decoder.push(chunk);
    if (decoded.rejections.length > 0) {
      this.rejectedFrames += decoded.rejections.length;
      logWarn('remote.frame.rejected', {
        session: this.sessionName,
        count: decoded.rejections.length,
        reasons: decoded.rejections.join(',')
      });
    }
    for (const frame of decoded.frames) {
      if (frame.message.type === 'heartbeat') {
        continue;
      }
      for (const listener of this.messageListeners) {
        listener(frame.message);
      }
    }
  }

  private writeMessage(connection: DuplexConnection, message: ProtocolMessage): void {
    connection.write(encodeProtocolMessage(message, this.sendSeq));
    this.sendSeq += 1;
  }

  private flushOutbound(connection: DuplexConnection): void {
    const queued = this.outbound;
    this.outbound = [];
    for (const message of queued) {
      this.writeMessage(connection, message);
    }
    if (queued.length > 0) {
      logDebug('remote.queue.flushed', { session: this.sessionName, count: queued.length });
    }
  }

  private scheduleHeartbeat(): void {
    this.heartbeatTimer?.cancel();
    this.heartbeatTimer = this.scheduler.setTimer(() => {
      this.heartbeatTimer = null;
      const connection = this.connection;
      if (connection === null || this.state.kind !== 'connected') {
        return;
      }
      this.writeMessage(connection, { type: 'heartbeat', timestamp: this.scheduler.nowMs() });
      this.scheduleHeartbeat();
    }, this.timings.heartbeatIntervalMs);
  }

  private scheduleWatchdog(delayMs: number): void {
    this.watchdogTimer?.cancel();
    this.watchdogTimer = this.scheduler.setTimer(() => {
      this.watchdogTimer = null;
      if (this.state.kind !== 'connected') {
        return;
      }
      const silentMs = this.scheduler.nowMs() - this.lastInboundAtMs;
      if (silentMs >= this.timings.heartbeatTimeoutMs) {
        logWarn('remote.heartbeat.timeout', { session: this.sessionName, silentMs });
        this.handleDrop('heartbeat timeout');
        return;
      }
      this.scheduleWatchdog(this.timings.heartbeatTimeoutMs - silentMs);
    }, delayMs);
  }

  private dropConnection(): void {
    this.generation += 1;
    this.heartbeatTimer?.cancel();
    this.heartbeatTimer = null;
    this.watchdogTimer?.cancel();
    this.watchdogTimer = null;
    const connection = this.connection;
    this.connection = null;
    connection?.close();
  }

  private cancelReconnect(): void {
    this.reconnectTimer?.cancel();
    this.reconnectTimer = null;
  }

  private handleDrop(reason: string): void {
    if (this.closed) {
      return;
    }
    this.dropConnection();
    logInfo('remote.connection.lost', { session: this.sessionName, reason });
    this.scheduleReconnect(reason);
  }

  private scheduleReconnect(reason: string): void {
    if (this.attempt >= this.timings.maxReconnectAttempts) {
      logWarn('remote.reconnect.exhausted', {
        session: this.sessionName,
        attempts: this.attempt,
        reason
      });
      this.outbound = [];
      this.setState({ kind: 'failed', reason });
      return;
    }
    this.attempt += 1;
    const attempt = this.attempt;
    const delayMs = reconnectDelayMs(attempt, this.timings);
    this.setState({ kind: 'reconnecting', attempt });
    logInfo('remote.reconnect.scheduled', { session: this.sessionName, attempt, delayMs });
    this.reconnectTimer = this.scheduler.setTimer(() => {
      this.reconnectTimer = null;
      void this.reconnect(attempt);
    }, delayMs);
  }

  private async reconnect(attempt: number): Promise<void> {
    if (this.closed || this.state.kind !== 'reconnecting' || this.state.attempt !== attempt) {
      return;
    }
    try {
      const connection = await this.connector(this.endpoint, this.timings.connectTimeoutMs);
      if (this.closed || this.state.kind !== 'reconnecting') {
        connection.close();
        return;
      }
      logInfo('remote.reconnect.succeeded', { session: this.sessionName, attempt });
      this.adoptConnection(connection);
    } catch (error: unknown) {
      if (this.closed || this.state.kind !== 'reconnecting') {
        return;
      }
      this.scheduleReconnect(errorMessage(error));
    }
  }
}

import { CiabError, ConnectionFailedError } from '../core/errors.ts';
import { AsyncPushQueue } from '../core/async-push-queue.ts';
import type { Scheduler } from '../core/scheduler.ts';
import { logDebug, logInfo } from '../diagnostics/event-log.ts';
import type { SessionTransport, TransportEvent } from '../session/transport.ts';
import {
  RemoteStreamClient,
  type ConnectionState,
  type RemoteStreamTimings
} from './stream-client.ts';
import type { ProtocolMessage } from './stream-protocol.ts';
import { formatEndpoint, type DuplexConnector, type RemoteEndpoint } from './tcp-duplex.ts';

export interface RemoteTransportOptions {
  readonly sessionName: string;
  readonly endpoint: RemoteEndpoint;
  readonly timings: RemoteStreamTimings;
  readonly cols: number;
  readonly rows: number;
  readonly connector?: DuplexConnector;
  readonly scheduler?: Scheduler;
}

/** A remote container PTY reached through a {@link RemoteStreamClient}. */
export class RemoteTransport implements SessionTransport {
  readonly kind = 'remote';

  private readonly queue = new AsyncPushQueue<TransportEvent>();
  private readonly unsubscribers: Array<() => void> = [];
  private opened = false;
  private ended = false;

  private constructor(
    private readonly sessionName: string,
    private readonly endpoint: RemoteEndpoint,
    private readonly client: RemoteStreamClient
  ) {
    this.unsubscribers.push(
      client.onMessage((message) => {
        this.handleMessage(message);
      }),
      client.onStateChange((state) => {
        this.handleState(state);
      })
    );
  }

  static async open(options: RemoteTransportOptions): Promise<RemoteTransport> {
    const client = new RemoteStreamClient({
      endpoint: options.endpoint,
      timings: options.timings,
      sessionName: options.sessionName,
      ...(options.connector === undefined ? {} : { connector: options.connector }),
      ...(options.scheduler === undefined ? {} : { scheduler: options.scheduler })
    });
    const transport = new RemoteTransport(options.sessionName, options.endpoint, client);
    try {
      await client.connect();
    } catch (error: unknown) {
      transport.release();
      throw error;
    }
    transport.opened = true;
    transport.queue.push({ kind: 'ready' });
    client.send({ type: 'resize', cols: options.cols, rows: options.rows });
    return transport;
  }

  read(): AsyncIterable<TransportEvent> {
    return this.queue;
  }

  write(bytes: Uint8Array): void {
    if (this.ended) {
      return;
    }
    this.client.send({ type: 'data', bytes });
  }

  resize(cols: number, rows: number): void {
    if (this.ended) {
      return;
    }
    this.client.send({ type: 'resize', cols, rows });
  }

  async detach(): Promise<void> {
    if (this.ended) {
      return;
    }
    this.client.send({ type: 'control', kind: 'detach' });
    this.finish(true, 'detached');
  }

  async terminate(): Promise<void> {
    if (this.ended) {
      return;
    }
    this.client.send({ type: 'control', kind: 'terminate' });
    this.finish(false, 'terminated');
  }

  private handleMessage(message: ProtocolMessage): void {
    if (this.ended) {
      return;
    }
    switch (message.type) {
      case 'data':
        this.queue.push({ kind: 'data', bytes: message.bytes });
        return;
      case 'resize':
        this.queue.push({ kind: 'resize', cols: message.cols, rows: message.rows });
        return;
      case 'error':
        this.queue.push({
          kind: 'error',
          error: new CiabError('transport-io', `remote error: ${message.reason}`, {
            sessionName: this.sessionName
          })
        });
        return;
      case 'control':
        if (message.kind === 'exit' || message.kind === 'terminate') {
          logInfo('remote.process.exited', { session: this.sessionName, control: message.kind });
          this.finish(false, 'process exited');
          return;
        }
        if (message.kind === 'detach') {
          this.finish(true, 'detached by remote');
          return;
        }
        logDebug('remote.control.ready', { session: this.sessionName });
        return;
      case 'heartbeat':
        return;
    }
  }

  private handleState(state: ConnectionState): void {
    if (!this.opened || this.ended) {
      return;
    }
    if (state.kind === 'failed') {
      this.queue.push({
        kind: 'error',
        error: new ConnectionFailedError(formatEndpoint(this.endpoint), state.reason, {
          sessionName: this.sessionName
        })
      });
      this.finish(true, state.reason);
      return;
    }
    if (state.kind === 'disconnected') {
      return;
    }
    this.queue.push({ kind: 'connection', state });
  }

  private release(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
    this.client.close();
  }

  private finish(processAlive: boolean, reason: string): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.release();
    this.queue.push({ kind: 'end', processAlive, reason });
    this.queue.close();
  }
}

import type { CiabError } from '../core/errors.ts';
import type { ConnectionState } from '../remote/stream-client.ts';
import type { RemoteEndpoint } from '../remote/tcp-duplex.ts';

export type TransportKind = 'local' | 'remote';

export type SessionTarget =
  | {
      readonly kind: 'local';
      readonly program: string;
    }
  | {
      readonly kind: 'remote';
      readonly endpoint: RemoteEndpoint;
    };

/**
 * Everything a transport reports to its session, in stream order.
 * `ready` is emitted once: on the first output of a local client, on connect for a remote one.
 * `end` is always the last event; `processAlive` says whether the backing process survived.
 */
export type TransportEvent =
  | { readonly kind: 'ready' }
  | { readonly kind: 'data'; readonly bytes: Uint8Array }
  | { readonly kind: 'resize'; readonly cols: number; readonly rows: number }
  | { readonly kind: 'connection'; readonly state: ConnectionState }
  | { readonly kind: 'error'; readonly error: CiabError }
  | { readonly kind: 'end'; readonly processAlive: boolean; readonly reason: string };

export interface SessionTransport {
  readonly kind: TransportKind;
  read(): AsyncIterable<TransportEvent>;
  write(bytes: Uint8Array): void;
  resize(cols: number, rows: number): void;
  /** Releases the connection; the backing process keeps running. */
  detach(): Promise<void>;
  /** Ends the backing process and releases the connection. */
  terminate(): Promise<void>;
  capture?(): Promise<string>;
}

export interface TransportOpenRequest {
  readonly sessionName: string;
  readonly target: SessionTarget;
  readonly cols: number;
  readonly rows: number;
}

export type TransportFactory = (request: TransportOpenRequest) => Promise<SessionTransport>;

import { connect, type Socket } from 'node:net';

export interface RemoteEndpoint {
  readonly host: string;
  readonly port: number;
}

/** A byte-oriented duplex connection. `onClose` fires once, with the error that ended it if any. */
export interface DuplexConnection {
  write(bytes: Uint8Array): void;
  close(): void;
  onData(listener: (chunk: Uint8Array) => void): void;
  onClose(listener: (error: Error | null) => void): void;
}

export type DuplexConnector = (endpoint: RemoteEndpoint, timeoutMs: number) => Promise<DuplexConnection>;

export function formatEndpoint(endpoint: RemoteEndpoint): string {
  return `${endpoint.host}:${String(endpoint.port)}`;
}

export function parseEndpoint(value: string): RemoteEndpoint | null {
  const separator = value.lastIndexOf(':');
  if (separator <= 0) {
    return null;
  }
  const host = value.slice(0, separator).replace(/^\[(.*)\]$/u, '$1');
  const portText = value.slice(separator + 1);
  if (!/^\d+$/u.test(portText)) {
    return null;
  }
  const port = Number.parseInt(portText, 10);
  if (host.length === 0 || port <= 0 || port > 65535) {
    return null;
  }
  return { host, port };
}

class SocketDuplexConnection implements DuplexConnection {
  private readonly closeListeners: Array<(error: Error | null) => void> = [];
  private closeError: Error | null = null;
  private closed = false;

  constructor(private readonly socket: Socket) {
    socket.on('error', (error: Error) => {
      this.closeError = error;
    });
    socket.on('close', () => {
      this.closed = true;
      for (const listener of this.closeListeners) {
        listener(this.closeError);
      }
    });
  }

  write(bytes: Uint8Array): void {
    if (this.closed || this.socket.destroyed) {
      return;
    }
    this.socket.write(bytes);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.socket.end(() => {
      this.socket.destroy();
    });
  }

  onData(listener: (chunk: Uint8Array) => void): void {
    this.socket.on('data', (chunk: Buffer) => {
      listener(chunk);
    });
  }

  onClose(listener: (error: Error | null) => void): void {
    if (this.closed) {
      listener(this.closeError);
      return;
    }
    this.closeListeners.push(listener);
  }
}

export const connectTcpDuplex: DuplexConnector = async (endpoint, timeoutMs) => {
  const socket = await new Promise<Socket>((resolve, reject) => {
    const client = connect({ host: endpoint.host, port: endpoint.port });
    const timer = setTimeout(() => {
      client.destroy();
      reject(new Error(`connect timed out after ${String(timeoutMs)}ms`));
    }, Math.max(1, timeoutMs));
    const onError = (error: Error): void => {
      clearTimeout(timer);
      client.off('connect', onConnect);
      reject(error);
    };
    const onConnect = (): void => {
      clearTimeout(timer);
      client.off('error', onError);
      resolve(client);
    };

    client.once('error', onError);
    client.once('connect', onConnect);
  });
  socket.setNoDelay(true);
  return new SocketDuplexConnection(socket);
};

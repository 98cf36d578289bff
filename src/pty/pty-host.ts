import { StringDecoder } from 'node:string_decoder';
import { PtyCreationFailedError, errorMessage } from '../core/errors.ts';
import { logDebug, logError, startEventSpan } from '../diagnostics/event-log.ts';

export interface PtyExit {
  code: number | null;
  signal: number | null;
}

export interface PtySpawnOptions {
  command: string;
  args: readonly string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  cols: number;
  rows: number;
}

/** The slice of a pseudo-terminal child the transports rely on. */
export interface PtyProcess {
  readonly pid: number;
  write(data: Uint8Array | string): void;
  resize(cols: number, rows: number): void;
  kill(signal?: string): void;
  onData(listener: (chunk: Uint8Array) => void): () => void;
  onExit(listener: (exit: PtyExit) => void): () => void;
}

export type PtySpawner = (options: PtySpawnOptions) => Promise<PtyProcess>;

/** The members of a node-pty `IPty` this module drives. */
export interface PtyHandle {
  readonly pid: number;
  write(data: string): void;
  resize(columns: number, rows: number): void;
  kill(signal?: string): void;
  onData(listener: (data: string) => void): { dispose(): void };
  onExit(listener: (event: { exitCode: number; signal?: number }) => void): { dispose(): void };
}

const TERM_NAME = 'xterm-256color';

export class NodePtyProcess implements PtyProcess {
  private exited = false;
  // node-pty writes strings; a code point split across writes is held until complete.
  private readonly inputDecoder = new StringDecoder('utf8');

  constructor(private readonly pty: PtyHandle) {
    pty.onExit(() => {
      this.exited = true;
    });
  }

  get pid(): number {
    return this.pty.pid;
  }

  write(data: Uint8Array | string): void {
    if (this.exited) {
      return;
    }
    const payload = typeof data === 'string' ? data : this.inputDecoder.write(Buffer.from(data));
    if (payload.length > 0) {
      this.pty.write(payload);
    }
  }

  resize(cols: number, rows: number): void {
    if (this.exited) {
      return;
    }
    this.pty.resize(Math.max(1, Math.floor(cols)), Math.max(1, Math.floor(rows)));
  }

  kill(signal?: string): void {
    if (this.exited) {
      return;
    }
    this.pty.kill(signal);
  }

  onData(listener: (chunk: Uint8Array) => void): () => void {
    const disposable = this.pty.onData((data) => {
      listener(Buffer.from(data, 'utf8'));
    });
    return () => {
      disposable.dispose();
    };
  }

  onExit(listener: (exit: PtyExit) => void): () => void {
    const disposable = this.pty.onExit((event) => {
      listener({
        code: event.exitCode,
        signal: event.signal ?? null
      });
    });
    return () => {
      disposable.dispose();
    };
  }
}

async function loadNodePtySpawn(): Promise<typeof import('node-pty').spawn> {
  try {
    const nodePty = await import('node-pty');
    return nodePty.spawn;
  } catch (error: unknown) {
    throw new PtyCreationFailedError(`node-pty could not be loaded: ${errorMessage(error)}`, {
      cause: error
    });
  }
}

export const spawnNodePty: PtySpawner = async (options) => {
  const spawn = await loadNodePtySpawn();
  const span = startEventSpan('pty.spawn', {
    command: options.command,
    cols: options.cols,
    rows: options.rows
  });
  try {
    const pty = spawn(options.command, [...options.args], {
      name: TERM_NAME,
      cols: Math.max(1, Math.floor(options.cols)),
      rows: Math.max(1, Math.floor(options.rows)),
      ...(options.cwd === undefined ? {} : { cwd: options.cwd }),
      env: { ...(options.env ?? process.env), TERM: TERM_NAME }
    });
    span.end({ status: 'ok', pid: pty.pid });
    logDebug('pty.spawned', { command: options.command, pid: pty.pid });
    return new NodePtyProcess(pty);
  } catch (error: unknown) {
    span.end({ status: 'error', message: errorMessage(error) });
    logError('pty.spawn.failed', { command: options.command, message: errorMessage(error) });
    throw new PtyCreationFailedError(errorMessage(error), { cause: error });
  }
};

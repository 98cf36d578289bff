import type { PtyExit, PtyProcess, PtySpawnOptions, PtySpawner } from '../../src/pty/pty-host.ts';

export class FakePty implements PtyProcess {
  readonly pid: number;
  readonly writes: string[] = [];
  readonly resizes: Array<{ cols: number; rows: number }> = [];
  killed = false;

  private readonly dataListeners = new Set<(chunk: Uint8Array) => void>();
  private readonly exitListeners = new Set<(exit: PtyExit) => void>();

  constructor(
    readonly options: PtySpawnOptions,
    pid = 4242
  ) {
    this.pid = pid;
  }

  write(data: Uint8Array | string): void {
    this.writes.push(typeof data === 'string' ? data : Buffer.from(data).toString('utf8'));
  }

  resize(cols: number, rows: number): void {
    this.resizes.push({ cols, rows });
  }

  kill(): void {
    this.killed = true;
  }

  onData(listener: (chunk: Uint8Array) => void): () => void {
    this.dataListeners.add(listener);
    return () => {
      this.dataListeners.delete(listener);
    };
  }

  onExit(listener: (exit: PtyExit) => void): () => void {
    this.exitListeners.add(listener);
    return () => {
      this.exitListeners.delete(listener);
    };
  }

  emitData(text: string): void {
    const chunk = Buffer.from(text, 'utf8');
    for (const listener of this.dataListeners) {
      listener(chunk);
    }
  }

  emitExit(exit: PtyExit = { code: 0, signal: null }): void {
    for (const listener of this.exitListeners) {
      listener(exit);
    }
  }
}

export function createFakeSpawner(): { spawner: PtySpawner; spawned: FakePty[] } {
  const spawned: FakePty[] = [];
  const spawner: PtySpawner = async (options) => {
    const pty = new FakePty(options, 4242 + spawned.length);
    spawned.push(pty);
    return pty;
  };
  return { spawner, spawned };
}

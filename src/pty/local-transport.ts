import type { CaptureOptions } from '../config/config-core.ts';
import { AttachFailedError, CiabError, errorMessage, wrapTransportError } from '../core/errors.ts';
import { AsyncPushQueue } from '../core/async-push-queue.ts';
import { logDebug, logInfo, logWarn } from '../diagnostics/event-log.ts';
import type { SessionTransport, TransportEvent } from '../session/transport.ts';
import { spawnNodePty, type PtyExit, type PtyProcess, type PtySpawner } from './pty-host.ts';
import type { TmuxDriver } from './tmux-driver.ts';

export interface LocalPtyTransportOptions {
  readonly sessionName: string;
  readonly cols: number;
  readonly rows: number;
  readonly driver: TmuxDriver;
  readonly capture: Pick<CaptureOptions, 'historyLines' | 'includeEscapeSequences' | 'joinWrappedLines'>;
  readonly spawner?: PtySpawner;
}

type ClientPhase = 'open' | 'detaching' | 'terminating' | 'ended';

/**
 * A `tmux attach-session` client running in a pseudo-terminal. The tmux
 * session outlives the client: detaching kills only the client process.
 */
export class LocalPtyTransport implements SessionTransport {
  readonly kind = 'local';

  private readonly queue = new AsyncPushQueue<TransportEvent>();
  private readonly unsubscribers: Array<() => void> = [];
  private phase: ClientPhase = 'open';
  private sawOutput = false;

  private constructor(
    private readonly sessionName: string,
    private readonly driver: TmuxDriver,
    private readonly captureOptions: LocalPtyTransportOptions['capture'],
    private readonly client: PtyProcess
  ) {
    this.unsubscribers.push(
      client.onData((chunk) => {
        this.handleData(chunk);
      }),
      client.onExit((exit) => {
        void this.handleExit(exit);
      })
    );
  }

  static async open(options: LocalPtyTransportOptions): Promise<LocalPtyTransport> {
    const { sessionName, driver } = options;
    await driver.checkInstalled();
    if (!(await driver.hasSession(sessionName))) {
      throw new AttachFailedError(sessionName, 'tmux session is not running');
    }
    const spawner = options.spawner ?? spawnNodePty;
    let client: PtyProcess;
    try {
      client = await spawner({
        command: driver.executable,
        args: driver.attachArgs(sessionName),
        cols: options.cols,
        rows: options.rows
      });
    } catch (error: unknown) {
      if (error instanceof CiabError && error.kind === 'pty-creation-failed') {
        throw error;
      }
      throw new AttachFailedError(sessionName, errorMessage(error), error);
    }
    logDebug('local.attach.client', { session: sessionName, pid: client.pid });
    return new LocalPtyTransport(sessionName, driver, options.capture, client);
  }

  read(): AsyncIterable<TransportEvent> {
    return this.queue;
  }

  write(bytes: Uint8Array): void {
    if (this.phase !== 'open') {
      return;
    }
    this.client.write(bytes);
  }

  resize(cols: number, rows: number): void {
    if (this.phase !== 'open') {
      return;
    }
    this.client.resize(cols, rows);
  }

  async detach(): Promise<void> {
    if (this.phase === 'ended') {
      return;
    }
    this.phase = 'detaching';
    this.client.kill();
    this.finish(true, 'detached');
  }

  async terminate(): Promise<void> {
    if (this.phase === 'ended') {
      return;
    }
    this.phase = 'terminating';
    try {
      await this.driver.killSession(this.sessionName);
    } catch (error: unknown) {
      logWarn('local.terminate.failed', { session: this.sessionName, message: errorMessage(error) });
    }
    this.client.kill();
    this.finish(false, 'terminated');
  }

  async capture(): Promise<string> {
    return await this.driver.capturePane(this.sessionName, this.captureOptions);
  }

  private handleData(chunk: Uint8Array): void {
    if (this.phase !== 'open') {
      return;
    }
    if (!this.sawOutput) {
      this.sawOutput = true;
      this.queue.push({ kind: 'ready' });
    }
    this.queue.push({ kind: 'data', bytes: chunk });
  }

  private async handleExit(exit: PtyExit): Promise<void> {
    if (this.phase !== 'open') {
      return;
    }
    logInfo('local.attach.client.exit', {
      session: this.sessionName,
      code: exit.code ?? -1,
      signal: exit.signal ?? -1
    });
    let alive = false;
    try {
      alive = await this.driver.hasSession(this.sessionName);
    } catch (error: unknown) {
      this.queue.push({
        kind: 'error',
        error: wrapTransportError(this.sessionName, 'tmux has-session', error)
      });
    }
    this.finish(alive, alive ? 'client exited' : 'process exited');
  }

  // Closes the queue at once so a pending read unblocks.
  private finish(processAlive: boolean, reason: string): void {
    if (this.phase === 'ended') {
      return;
    }
    this.phase = 'ended';
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
    this.queue.push({ kind: 'end', processAlive, reason });
    this.queue.close();
  }
}

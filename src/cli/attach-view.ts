import { AsyncPushQueue } from '../core/async-push-queue.ts';
import { errorMessage } from '../core/errors.ts';
import { logWarn } from '../diagnostics/event-log.ts';
import type { SessionManager, SessionSnapshot } from '../session/session-manager.ts';
import { renderSnapshotAnsiRow } from '../terminal/screen-render.ts';

const DETACH_KEY = '\u0011';
const STATUS_ROWS = 1;

export type AttachViewCommand =
  | { readonly type: 'detach' }
  | { readonly type: 'page'; readonly delta: -1 | 1 }
  | { readonly type: 'input'; readonly bytes: Buffer };

type AttachViewEvent =
  | { readonly type: 'input'; readonly input: Buffer }
  | { readonly type: 'resize'; readonly cols: number; readonly rows: number }
  | { readonly type: 'changed' };

export interface AttachViewInputStream {
  readonly isTTY: boolean | undefined;
  setRawMode?: (mode: boolean) => void;
  resume: () => void;
  pause: () => void;
  on: (event: 'data' | 'end', listener: (chunk?: unknown) => void) => void;
  off: (event: 'data' | 'end', listener: (chunk?: unknown) => void) => void;
}

export interface AttachViewOutputStream {
  readonly isTTY: boolean | undefined;
  readonly columns: number | undefined;
  readonly rows: number | undefined;
  on: (event: 'resize', listener: () => void) => void;
  off: (event: 'resize', listener: () => void) => void;
}

export interface AttachViewOptions {
  readonly manager: SessionManager;
  readonly name: string;
  readonly stdin: AttachViewInputStream;
  readonly stdout: AttachViewOutputStream;
  readonly writeStdout: (text: string) => void;
}

export function decodeAttachViewInput(input: Buffer): AttachViewCommand {
  const text = input.toString('utf8');
  if (text === DETACH_KEY) {
    return { type: 'detach' };
  }
  if (text === '\u001b[5~') {
    return { type: 'page', delta: -1 };
  }
  if (text === '\u001b[6~') {
    return { type: 'page', delta: 1 };
  }
  return { type: 'input', bytes: input };
}

export function viewportRows(terminalRows: number): number {
  return Math.max(1, Math.floor(terminalRows) - STATUS_ROWS);
}

export function formatStatusLine(snapshot: SessionSnapshot, cols: number): string {
  const { summary, scroll } = snapshot;
  const parts = [summary.label, summary.attachState, summary.activity];
  if (summary.attachState === 'scroll-mode') {
    parts.push(`scroll ${String(scroll.offset)}/${String(scroll.maxOffset)}`);
  }
  if (summary.connection !== null && summary.connection.kind !== 'connected') {
    parts.push(summary.connection.kind);
  }
  parts.push('ctrl+q detach');
  const text = ` ${parts.join(' | ')}`;
  return text.length >= cols ? text.slice(0, cols) : text.padEnd(cols, ' ');
}

export function renderAttachFrame(snapshot: SessionSnapshot, cols: number): string {
  const { view } = snapshot;
  let output = '\u001b[?25l\u001b[H';
  for (let row = 0; row < view.rows; row += 1) {
    output += renderSnapshotAnsiRow(view, row, cols);
    output += '\r\n';
  }
  output += `\u001b[7m${formatStatusLine(snapshot, cols)}\u001b[0m`;
  if (view.cursor.visible) {
    output += `\u001b[${String(view.cursor.row + 1)};${String(view.cursor.col + 1)}H\u001b[?25h`;
  }
  return output;
}

function isLiveState(state: string): boolean {
  return state === 'attached' || state === 'scroll-mode';
}

function enterAttachViewTerminal(options: AttachViewOptions): () => void {
  if (options.stdin.isTTY !== true || options.stdout.isTTY !== true) {
    throw new Error('attach requires an interactive TTY on stdin and stdout');
  }
  options.stdin.setRawMode?.(true);
  options.stdin.resume();
  options.writeStdout('\u001b[?1049h');
  return () => {
    options.writeStdout('\u001b[?1049l\u001b[?25h');
    options.stdin.pause();
    options.stdin.setRawMode?.(false);
  };
}

/**
 * Mirrors one session into the terminal until the user detaches (ctrl+q) or
 * the session leaves the live states. Returns the final snapshot.
 */
export async function runAttachView(options: AttachViewOptions): Promise<SessionSnapshot> {
  const { manager, name } = options;
  let cols = Math.max(1, options.stdout.columns ?? 80);
  let rows = viewportRows(options.stdout.rows ?? 24);
  manager.resize(name, cols, rows);

  const events = new AsyncPushQueue<AttachViewEvent>();
  const onData = (chunk?: unknown): void => {
    const input = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk ?? ''), 'utf8');
    if (input.length > 0) {
      events.push({ type: 'input', input });
    }
  };
  const onEnd = (): void => {
    events.close();
  };
  const onResize = (): void => {
    events.push({
      type: 'resize',
      cols: Math.max(1, options.stdout.columns ?? cols),
      rows: viewportRows(options.stdout.rows ?? rows + STATUS_ROWS)
    });
  };

  const cleanupTerminal = enterAttachViewTerminal(options);
  let unsubscribe: () => void = () => {};
  try {
    await manager.attach(name);
    unsubscribe = manager.store.subscribe((state, previous) => {
      if (state.sessions[name] !== previous.sessions[name]) {
        events.push({ type: 'changed' });
      }
    });
    options.stdin.on('data', onData);
    options.stdin.on('end', onEnd);
    options.stdout.on('resize', onResize);
    options.writeStdout(renderAttachFrame(manager.snapshot(name), cols));
    for await (const event of events) {
      if (event.type === 'input') {
        const command = decodeAttachViewInput(event.input);
        if (command.type === 'detach') {
          await manager.detach(name);
          break;
        }
        if (command.type === 'page') {
          manager.scroll(name, command.delta * rows);
        } else {
          try {
            manager.sendInput(name, command.bytes);
          } catch (error: unknown) {
            logWarn('attach.view.input.failed', { session: name, message: errorMessage(error) });
          }
        }
      } else if (event.type === 'resize') {
        cols = event.cols;
        rows = event.rows;
        manager.resize(name, cols, rows);
      }
      const snapshot = manager.snapshot(name);
      if (!isLiveState(snapshot.summary.attachState)) {
        break;
      }
      if (events.size === 0) {
        options.writeStdout(renderAttachFrame(snapshot, cols));
      }
    }
  } finally {
    unsubscribe();
    events.close();
    options.stdin.off('data', onData);
    options.stdin.off('end', onEnd);
    options.stdout.off('resize', onResize);
    cleanupTerminal();
  }
  return manager.snapshot(name);
}

import { execFile } from 'node:child_process';
import type { CaptureOptions } from '../config/config-core.ts';
import {
  CiabError,
  SessionExistsError,
  TmuxNotInstalledError,
  errorMessage,
  wrapTransportError
} from '../core/errors.ts';
import { logDebug, logWarn } from '../diagnostics/event-log.ts';
import { isCanonicalSessionName } from '../naming/session-name.ts';

export interface CommandResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
}

/** Runs a program to completion. Rejects only when it could not be started. */
export type CommandRunner = (file: string, args: readonly string[]) => Promise<CommandResult>;

const MAX_COMMAND_OUTPUT_BYTES = 16 * 1024 * 1024;

function errorCode(error: unknown): unknown {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return error.code;
  }
  return undefined;
}

export const execFileRunner: CommandRunner = (file, args) =>
  new Promise<CommandResult>((resolve, reject) => {
    execFile(
      file,
      [...args],
      { encoding: 'utf8', maxBuffer: MAX_COMMAND_OUTPUT_BYTES },
      (error, stdout, stderr) => {
        if (error === null) {
          resolve({ stdout, stderr, exitCode: 0 });
          return;
        }
        const code = errorCode(error);
        if (typeof code === 'number') {
          resolve({ stdout, stderr, exitCode: code });
          return;
        }
        reject(error);
      }
    );
  });

export function tmuxTarget(name: string): string {
  return `=${name}`;
}

export function buildCapturePaneArgs(
  name: string,
  options: Pick<CaptureOptions, 'historyLines' | 'includeEscapeSequences' | 'joinWrappedLines'>
): string[] {
  const args = ['capture-pane', '-p'];
  if (options.includeEscapeSequences) {
    args.push('-e');
  }
  if (options.joinWrappedLines) {
    args.push('-J');
  }
  args.push('-t', tmuxTarget(name));
  if (options.historyLines > 0) {
    args.push('-S', `-${String(options.historyLines)}`);
  }
  return args;
}

export class TmuxDriver {
  constructor(
    private readonly runner: CommandRunner = execFileRunner,
    private readonly tmuxPath = 'tmux'
  ) {}

  get executable(): string {
    return this.tmuxPath;
  }

  async isInstalled(): Promise<boolean> {
    try {
      const result = await this.runner(this.tmuxPath, ['-V']);
      return result.exitCode === 0;
    } catch (error: unknown) {
      logDebug('tmux.probe.failed', { message: errorMessage(error) });
      return false;
    }
  }

  async checkInstalled(): Promise<void> {
    if (!(await this.isInstalled())) {
      throw new TmuxNotInstalledError();
    }
  }

  async hasSession(name: string): Promise<boolean> {
    const result = await this.run(name, ['has-session', '-t', tmuxTarget(name)]);
    return result.exitCode === 0;
  }

  async createSession(name: string, cwd: string, program: string, historyLimit: number): Promise<void> {
    const created = await this.run(name, ['new-session', '-d', '-s', name, '-c', cwd, program]);
    if (created.exitCode !== 0) {
      const stderr = created.stderr.trim();
      if (stderr.includes('duplicate session')) {
        throw new SessionExistsError(name, 'tmux session already running');
      }
      throw new CiabError('transport-io', `tmux new-session failed: ${stderr}`, { sessionName: name });
    }
    const limited = await this.run(name, [
      'set-option',
      '-t',
      tmuxTarget(name),
      'history-limit',
      String(historyLimit)
    ]);
    if (limited.exitCode !== 0) {
      logWarn('tmux.history-limit.failed', { session: name, stderr: limited.stderr.trim() });
    }
    logDebug('tmux.session.created', { session: name, cwd, program });
  }

  /** Session names carrying the project prefix; an absent tmux server means none. */
  async listSessions(): Promise<string[]> {
    const result = await this.run(null, ['list-sessions', '-F', '#{session_name}']);
    if (result.exitCode !== 0) {
      return [];
    }
    return result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => isCanonicalSessionName(line));
  }

  async killSession(name: string): Promise<boolean> {
    const result = await this.run(name, ['kill-session', '-t', tmuxTarget(name)]);
    return result.exitCode === 0;
  }

  async capturePane(
    name: string,
    options: Pick<CaptureOptions, 'historyLines' | 'includeEscapeSequences' | 'joinWrappedLines'>
  ): Promise<string> {
    const result = await this.run(name, buildCapturePaneArgs(name, options));
    if (result.exitCode !== 0) {
      throw new CiabError('transport-io', `tmux capture-pane failed: ${result.stderr.trim()}`, {
        sessionName: name
      });
    }
    return result.stdout;
  }

  attachArgs(name: string): string[] {
    return ['attach-session', '-t', tmuxTarget(name)];
  }

  private async run(sessionName: string | null, args: readonly string[]): Promise<CommandResult> {
    try {
      return await this.runner(this.tmuxPath, args);
    } catch (error: unknown) {
      if (errorCode(error) === 'ENOENT') {
        throw new TmuxNotInstalledError({
          ...(sessionName === null ? {} : { sessionName }),
          cause: error
        });
      }
      throw wrapTransportError(sessionName ?? 'tmux', `tmux ${args[0] ?? ''}`, error);
    }
  }
}

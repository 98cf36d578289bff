import type { CommandResult, CommandRunner } from '../../src/pty/tmux-driver.ts';

/** Answers tmux invocations from an in-memory set of sessions. */
export class FakeTmux {
  readonly calls: string[][] = [];
  readonly sessions = new Set<string>();
  installed = true;
  paneText = '';

  readonly runner: CommandRunner = async (_file, args) => {
    this.calls.push([...args]);
    return this.respond(args);
  };

  private respond(args: readonly string[]): CommandResult {
    if (!this.installed) {
      throw Object.assign(new Error('spawn tmux ENOENT'), { code: 'ENOENT' });
    }
    const command = args[0];
    const target = (args[args.indexOf('-t') + 1] ?? '').replace(/^=/u, '');
    switch (command) {
      case '-V':
        return ok('tmux 3.4\n');
      case 'has-session':
        return this.sessions.has(target) ? ok('') : fail(`can't find session: ${target}`);
      case 'new-session': {
        const name = args[args.indexOf('-s') + 1] ?? '';
        if (this.sessions.has(name)) {
          return fail(`duplicate session: ${name}`);
        }
        this.sessions.add(name);
        return ok('');
      }
      case 'set-option':
        return ok('');
      case 'list-sessions':
        if (this.sessions.size === 0) {
          return fail('no server running on /tmp/tmux-1000/default');
        }
        return ok(`${[...this.sessions, 'scratch'].join('\n')}\n`);
      case 'kill-session':
        return this.sessions.delete(target) ? ok('') : fail(`can't find session: ${target}`);
      case 'capture-pane':
        return this.sessions.has(target) ? ok(this.paneText) : fail(`can't find pane: ${target}`);
      default:
        return fail(`unknown command: ${command ?? ''}`);
    }
  }
}

function ok(stdout: string): CommandResult {
  return { stdout, stderr: '', exitCode: 0 };
}

function fail(stderr: string): CommandResult {
  return { stdout: '', stderr: `${stderr}\n`, exitCode: 1 };
}

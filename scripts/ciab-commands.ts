import { setTimeout as delay } from 'node:timers/promises';
import { Args, Command, Flags } from '@oclif/core';
import { classifyActivity } from '../src/activity/activity-detector.ts';
import { runAttachView } from '../src/cli/attach-view.ts';
import { openCiabRuntime, type CiabRuntime } from '../src/cli/runtime.ts';
import { CiabError } from '../src/core/errors.ts';
import { canonicalSessionName } from '../src/naming/session-name.ts';
import { parseEndpoint } from '../src/remote/tcp-duplex.ts';
import type { SessionSummary } from '../src/session/terminal-session.ts';
import { renderCapturePreview } from '../src/terminal/screen-render.ts';

const sessionArg = Args.string({
  description: 'Session name (ciab_<label>) or the label it was created from.',
  required: true,
});

abstract class CiabCommandBase extends Command {
  protected async withRuntime<T>(work: (runtime: CiabRuntime) => Promise<T>): Promise<T> {
    const runtime = await openCiabRuntime();
    try {
      return await work(runtime);
    } catch (error: unknown) {
      if (error instanceof CiabError) {
        this.error(`${error.kind}: ${error.message}`, { exit: 1 });
      }
      throw error;
    } finally {
      await runtime.close();
    }
  }

  protected resolveSessionName(runtime: CiabRuntime, value: string): string {
    return runtime.manager.get(value) === null ? canonicalSessionName(value) : value;
  }
}

function formatSummaryRow(summary: SessionSummary): string {
  const columns = [
    summary.name.padEnd(28, ' '),
    summary.transport.padEnd(7, ' '),
    summary.attachState.padEnd(12, ' '),
    summary.activity.padEnd(18, ' '),
    summary.cwd,
  ];
  return columns.join(' ');
}

class ListCommand extends CiabCommandBase {
  static override summary = 'List known sessions with their attach state and activity.';

  static override flags = {
    help: Flags.help({ char: 'h' }),
    json: Flags.boolean({ description: 'Print summaries as JSON.' }),
  };

  override async run(): Promise<void> {
    const { flags } = await this.parse(ListCommand);
    await this.withRuntime(async (runtime) => {
      const sessions = runtime.manager.list();
      await Promise.all(
        sessions.map(async (summary) => await runtime.manager.get(summary.name)?.sampleActivity()),
      );
      const refreshed = runtime.manager.list();
      if (flags.json) {
        this.log(JSON.stringify(refreshed, null, 2));
        return;
      }
      if (refreshed.length === 0) {
        this.log('no sessions');
        return;
      }
      for (const summary of refreshed) {
        this.log(formatSummaryRow(summary));
      }
    });
  }
}

class NewCommand extends CiabCommandBase {
  static override summary = 'Create a session running the configured program in tmux or on a remote host.';

  static override usage = ['new <label> [--cwd <dir>] [--program <cmd>] [--remote <host:port>]'];

  static override args = {
    label: Args.string({ description: 'Free-form label; reserved characters become underscores.', required: true }),
  };

  static override flags = {
    help: Flags.help({ char: 'h' }),
    cwd: Flags.string({ description: 'Working directory for the session.' }),
    program: Flags.string({ description: 'Program to start instead of the configured one.' }),
    remote: Flags.string({ description: 'host:port of a remote PTY service.' }),
  };

  override async run(): Promise<void> {
    const { args, flags } = await this.parse(NewCommand);
    const remote = flags.remote === undefined ? undefined : parseEndpoint(flags.remote);
    if (remote === null) {
      this.error(`invalid --remote endpoint: ${flags.remote ?? ''}`, { exit: 2 });
    }
    await this.withRuntime(async (runtime) => {
      const summary = await runtime.manager.create({
        label: args.label,
        cwd: flags.cwd ?? process.cwd(),
        ...(flags.program === undefined ? {} : { program: flags.program }),
        ...(remote === undefined ? {} : { remote }),
      });
      this.log(`created ${summary.name}`);
    });
  }
}

class AttachCommand extends CiabCommandBase {
  static override summary = 'Attach to a session; ctrl+q detaches, page up/down scroll.';

  static override args = { session: sessionArg };

  static override flags = {
    help: Flags.help({ char: 'h' }),
  };

  override async run(): Promise<void> {
    const { args } = await this.parse(AttachCommand);
    await this.withRuntime(async (runtime) => {
      const name = this.resolveSessionName(runtime, args.session);
      const final = await runAttachView({
        manager: runtime.manager,
        name,
        stdin: process.stdin,
        stdout: process.stdout,
        writeStdout: (text) => {
          process.stdout.write(text);
        },
      });
      const reason = final.summary.endReason;
      this.log(reason === null ? `${final.summary.attachState} ${name}` : `${final.summary.attachState} ${name}: ${reason}`);
    });
  }
}

class CaptureCommand extends CiabCommandBase {
  static override summary = 'Print the recent output of a session and its detected activity.';

  static override args = { session: sessionArg };

  static override flags = {
    help: Flags.help({ char: 'h' }),
    lines: Flags.integer({ description: 'Number of history lines to capture.', min: 1 }),
    'wait-ms': Flags.integer({
      description: 'How long to collect output from a remote session before printing.',
      default: 500,
      min: 0,
    }),
  };

  override async run(): Promise<void> {
    const { args, flags } = await this.parse(CaptureCommand);
    await this.withRuntime(async (runtime) => {
      const name = this.resolveSessionName(runtime, args.session);
      const summary = runtime.manager.snapshot(name).summary;
      const capture = { ...runtime.config.capture, historyLines: flags.lines ?? runtime.config.capture.historyLines };
      let text: string;
      if (summary.transport === 'local') {
        text = await runtime.driver.capturePane(name, capture);
      } else {
        await runtime.manager.attach(name);
        await delay(flags['wait-ms']);
        text = renderCapturePreview(runtime.manager.snapshot(name).view, capture);
        await runtime.manager.detach(name);
      }
      const activity = classifyActivity(text, {
        markers: runtime.config.activity.markers,
        historyLines: capture.historyLines,
      });
      this.log(text.replace(/\n+$/u, ''));
      this.log(`-- ${name}: ${activity}`);
    });
  }
}

class CloseCommand extends CiabCommandBase {
  static override summary = 'Close a session and end the program behind it.';

  static override args = { session: sessionArg };

  static override flags = {
    help: Flags.help({ char: 'h' }),
  };

  override async run(): Promise<void> {
    const { args } = await this.parse(CloseCommand);
    await this.withRuntime(async (runtime) => {
      const name = this.resolveSessionName(runtime, args.session);
      await runtime.manager.close(name);
      this.log(`closed ${name}`);
    });
  }
}

const commands = {
  list: ListCommand,
  new: NewCommand,
  attach: AttachCommand,
  capture: CaptureCommand,
  close: CloseCommand,
} satisfies Record<string, Command.Class>;

export default commands;

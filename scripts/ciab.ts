#!/usr/bin/env -S node --import tsx
import { handle } from '@oclif/core';
import commands from './ciab-commands.ts';

type CommandId = keyof typeof commands;

function isCommandId(value: string): value is CommandId {
  return Object.hasOwn(commands, value);
}

function usage(): string {
  const lines = ['usage: ciab <command> [args...]', '', 'commands:'];
  for (const [id, command] of Object.entries(commands)) {
    lines.push(`  ${id.padEnd(10, ' ')}${command.summary ?? ''}`);
  }
  lines.push('', 'run `ciab <command> --help` for command options');
  return `${lines.join('\n')}\n`;
}

async function main(argv: readonly string[]): Promise<number> {
  const [id, ...rest] = argv;
  if (id === undefined || id === 'help' || id === '--help' || id === '-h') {
    process.stdout.write(usage());
    return 0;
  }
  if (!isCommandId(id)) {
    process.stderr.write(`ciab: unknown command ${JSON.stringify(id)}\n\n${usage()}`);
    return 2;
  }
  await commands[id].run(rest, import.meta.url);
  return 0;
}

void main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  async (error: unknown) => {
    await handle(error instanceof Error ? error : new Error(String(error)));
  },
);

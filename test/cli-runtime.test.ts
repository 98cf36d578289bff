import assert from 'node:assert/strict';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { test } from 'node:test';
import { openCiabRuntime } from '../src/cli/runtime.ts';

void test('runtime loads config and restores persisted sessions without tmux', async () => {
  const dir = mkdtempSync(join(tmpdir(), 'ciab-runtime-test-'));
  try {
    const configDir = join(dir, 'ciab');
    mkdirSync(join(configDir, 'sessions'), { recursive: true });
    writeFileSync(join(configDir, 'ciab.config.jsonc'), '{ "local": { "program": "bash" } }\n', 'utf8');
    writeFileSync(
      join(configDir, 'sessions', 'ciab_demo.json'),
      JSON.stringify({
        version: 1,
        name: 'ciab_demo',
        label: 'demo',
        cwd: '/work/demo',
        createdAt: '2026-01-01T00:00:00.000Z',
        transport: { kind: 'local', program: 'bash' },
      }),
      'utf8',
    );

    const runtime = await openCiabRuntime({
      env: { XDG_CONFIG_HOME: dir, HOME: dir },
      tmuxPath: join(dir, 'missing-tmux'),
    });
    try {
      assert.equal(runtime.configPath, join(configDir, 'ciab.config.jsonc'));
      assert.equal(runtime.config.local.program, 'bash');
      assert.deepEqual(
        runtime.manager.list().map((summary) => [summary.name, summary.attachState, summary.endReason]),
        [['ciab_demo', 'terminated', 'tmux is not installed']],
      );
      assert.equal(runtime.manager.store.getState().tmuxAvailable, false);
    } finally {
      await runtime.close();
    }
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

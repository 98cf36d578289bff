import assert from 'node:assert/strict';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { test } from 'node:test';
import {
  FileSessionMetadataStore,
  sessionMetadataSchema,
  type SessionMetadata,
} from '../src/session/session-persistence.ts';

function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'ciab-session-metadata-test-'));
}

function record(name: string): SessionMetadata {
  return {
    version: 1,
    name,
    label: name.slice('ciab_'.length),
    cwd: '/work/app',
    createdAt: '2026-01-01T00:00:00.000Z',
    transport: { kind: 'local', program: 'claude' },
  };
}

void test('file store writes one pretty JSON file per session and loads them sorted', async () => {
  const dir = makeTempDir();
  try {
    const store = new FileSessionMetadataStore(join(dir, 'sessions'));
    await store.save('ciab_b', record('ciab_b'));
    await store.save('ciab_a', record('ciab_a'));

    const written = readFileSync(store.filePathFor('ciab_a'), 'utf8');
    assert.equal(written.endsWith('}\n'), true);
    assert.deepEqual(JSON.parse(written), record('ciab_a'));
    assert.deepEqual(
      (await store.loadAll()).map((entry) => entry.name),
      ['ciab_a', 'ciab_b'],
    );
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

void test('file store skips files it cannot read or validate', async () => {
  const dir = makeTempDir();
  try {
    const store = new FileSessionMetadataStore(dir);
    await store.save('ciab_good', record('ciab_good'));
    writeFileSync(join(dir, 'ciab_broken.json'), '{ not json', 'utf8');
    writeFileSync(
      join(dir, 'ciab_future.json'),
      JSON.stringify({ ...record('ciab_future'), version: 2 }),
      'utf8',
    );
    writeFileSync(join(dir, 'notes.txt'), 'ignored', 'utf8');

    assert.deepEqual(
      (await store.loadAll()).map((entry) => entry.name),
      ['ciab_good'],
    );
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

void test('file store treats a missing directory as empty and removes idempotently', async () => {
  const dir = makeTempDir();
  try {
    const store = new FileSessionMetadataStore(join(dir, 'absent'));
    assert.deepEqual(await store.loadAll(), []);

    await store.save('ciab_a', record('ciab_a'));
    await store.remove('ciab_a');
    await store.remove('ciab_a');
    assert.deepEqual(await store.loadAll(), []);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

void test('metadata schema requires a prefixed sanitized name and a valid port', () => {
  assert.equal(sessionMetadataSchema.safeParse(record('ciab_ok')).success, true);
  assert.equal(sessionMetadataSchema.safeParse({ ...record('ciab_ok'), name: 'ok' }).success, false);
  assert.equal(sessionMetadataSchema.safeParse({ ...record('ciab_ok'), name: 'ciab_a/b' }).success, false);
  assert.equal(
    sessionMetadataSchema.safeParse({
      ...record('ciab_ok'),
      transport: { kind: 'remote', host: 'box.internal', port: 70000 },
    }).success,
    false,
  );
});

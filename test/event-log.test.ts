import assert from 'node:assert/strict';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, test } from 'node:test';
import {
  configureEventLog,
  isEventLogEnabled,
  logDebug,
  logError,
  logInfo,
  logWarn,
  shutdownEventLog,
  startEventSpan,
} from '../src/diagnostics/event-log.ts';

interface ParsedLogRecord {
  readonly type: string;
  readonly level: string;
  readonly name: string;
  readonly attrs: unknown;
  readonly durationMs: unknown;
}

function readRecords(path: string): ParsedLogRecord[] {
  return readFileSync(path, 'utf8')
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line) => {
      const record: unknown = JSON.parse(line);
      if (typeof record !== 'object' || record === null) {
        throw new Error('invalid record');
      }
      const type: unknown = Reflect.get(record, 'type');
      const level: unknown = Reflect.get(record, 'level');
      const name: unknown = Reflect.get(record, 'name');
      if (typeof type !== 'string' || typeof level !== 'string' || typeof name !== 'string') {
        throw new Error('invalid record');
      }
      return {
        type,
        level,
        name,
        attrs: Reflect.get(record, 'attrs'),
        durationMs: Reflect.get(record, 'duration-ms'),
      };
    });
}

afterEach(() => {
  shutdownEventLog();
});

void test('event log is a no-op while disabled and creates no file', () => {
  const dir = mkdtempSync(join(tmpdir(), 'ciab-log-disabled-'));
  const outputPath = join(dir, 'events.jsonl');
  try {
    configureEventLog({ enabled: false, filePath: outputPath });
    logInfo('session.created', { name: 'ciab_demo' });
    startEventSpan('session.attach').end();
    shutdownEventLog();
    assert.equal(isEventLogEnabled(), false);
    assert.equal(existsSync(outputPath), false);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

void test('event log writes leveled events and spans as jsonl', () => {
  const dir = mkdtempSync(join(tmpdir(), 'ciab-log-enabled-'));
  const outputPath = join(dir, 'nested', 'events.jsonl');
  try {
    configureEventLog({ enabled: true, filePath: outputPath });
    logDebug('parser.unrecognized', { count: 2 });
    logWarn('persistence.save.failed', { name: 'ciab_demo' });
    const span = startEventSpan('session.attach', { name: 'ciab_demo' });
    span.end({ outcome: 'attached' });
    span.end({ outcome: 'ignored' });
    logError('remote.failed');
    shutdownEventLog();

    const records = readRecords(outputPath);
    assert.deepEqual(
      records.map((record) => [record.type, record.level, record.name]),
      [
        ['event', 'debug', 'parser.unrecognized'],
        ['event', 'warn', 'persistence.save.failed'],
        ['span', 'debug', 'session.attach'],
        ['event', 'error', 'remote.failed'],
      ],
    );
    assert.deepEqual(records[0]?.attrs, { count: 2 });
    assert.deepEqual(records[2]?.attrs, { name: 'ciab_demo', outcome: 'attached' });
    assert.equal(typeof records[2]?.durationMs, 'number');
    assert.equal(records[3]?.attrs, undefined);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

void test('event log drops records below the configured minimum level', () => {
  const dir = mkdtempSync(join(tmpdir(), 'ciab-log-level-'));
  const outputPath = join(dir, 'events.jsonl');
  try {
    configureEventLog({ enabled: true, filePath: outputPath, minLevel: 'warn' });
    logDebug('dropped.debug');
    logInfo('dropped.info');
    startEventSpan('dropped.span').end();
    logWarn('kept.warn');
    shutdownEventLog();
    assert.deepEqual(
      readRecords(outputPath).map((record) => record.name),
      ['kept.warn'],
    );
  } finally {
    configureEventLog({ enabled: false, minLevel: 'debug' });
    rmSync(dir, { recursive: true, force: true });
  }
});

void test('warnings reach the file at once while debug records wait for the batch', () => {
  const dir = mkdtempSync(join(tmpdir(), 'ciab-log-flush-'));
  const outputPath = join(dir, 'events.jsonl');
  try {
    configureEventLog({ enabled: true, filePath: outputPath });
    logDebug('screen.feed', { bytes: 12 });
    assert.equal(existsSync(outputPath), false);

    logWarn('session.resize.rejected', { cols: 0 });
    assert.deepEqual(
      readRecords(outputPath).map((record) => [record.level, record.name]),
      [
        ['debug', 'screen.feed'],
        ['warn', 'session.resize.rejected'],
      ],
    );
  } finally {
    shutdownEventLog();
    rmSync(dir, { recursive: true, force: true });
  }
});

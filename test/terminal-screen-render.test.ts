import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  measureDisplayWidth,
  padToDisplayWidth,
  truncateToDisplayWidth,
} from '../src/terminal/display-width.ts';
import { ScreenModel } from '../src/terminal/screen-model.ts';
import {
  renderCapturePreview,
  renderSnapshotAnsiRow,
  renderSnapshotText,
} from '../src/terminal/screen-render.ts';

const PREVIEW = {
  historyLines: 40,
  includePaneBorders: false,
  includeEscapeSequences: false,
  joinWrappedLines: true,
};

void test('ansi row renderer emits style changes and a trailing reset', () => {
  const screen = new ScreenModel({ cols: 4, rows: 1 });
  screen.feed('\u001b[31mA\u001b[0mB');
  assert.equal(
    renderSnapshotAnsiRow(screen.snapshot(), 0),
    '\u001b[0;31;49mA\u001b[0;39;49mB  \u001b[0m',
  );
});

void test('ansi row renderer skips continuation cells of wide glyphs', () => {
  const screen = new ScreenModel({ cols: 4, rows: 1 });
  screen.feed('中a');
  assert.equal(renderSnapshotAnsiRow(screen.snapshot(), 0), '\u001b[0;39;49m中a \u001b[0m');
  assert.equal(renderSnapshotAnsiRow(screen.snapshot(), 3, 2), '\u001b[0;39;49m  \u001b[0m');
});

void test('snapshot text joins visible rows', () => {
  const screen = new ScreenModel({ cols: 6, rows: 2 });
  screen.feed('one\r\ntwo');
  assert.equal(renderSnapshotText(screen.snapshot()), 'one\ntwo');
});

void test('capture preview joins wrapped rows and keeps the last lines', () => {
  const screen = new ScreenModel({ cols: 10, rows: 3 });
  screen.feed('abcdefghijkl\r\nxyz');
  const snapshot = screen.snapshot();
  assert.equal(renderCapturePreview(snapshot, PREVIEW), 'abcdefghijkl\nxyz');
  assert.equal(
    renderCapturePreview(snapshot, { ...PREVIEW, joinWrappedLines: false }),
    'abcdefghij\nkl\nxyz',
  );
  assert.equal(renderCapturePreview(snapshot, { ...PREVIEW, historyLines: 1 }), 'xyz');
});

void test('capture preview draws pane borders', () => {
  const screen = new ScreenModel({ cols: 4, rows: 2 });
  screen.feed('ab');
  assert.equal(
    renderCapturePreview(screen.snapshot(), { ...PREVIEW, includePaneBorders: true }),
    '┌────┐\n│ab  │\n└────┘',
  );
});

void test('capture preview keeps escape sequences when asked', () => {
  const screen = new ScreenModel({ cols: 4, rows: 1 });
  screen.feed('ab');
  assert.equal(
    renderCapturePreview(screen.snapshot(), { ...PREVIEW, includeEscapeSequences: true }),
    '\u001b[0;39;49mab\u001b[0m',
  );
});

void test('display width counts wide glyphs and ignores combining marks', () => {
  assert.equal(measureDisplayWidth('abc'), 3);
  assert.equal(measureDisplayWidth('中文'), 4);
  assert.equal(measureDisplayWidth('e\u0301'), 1);
  assert.equal(truncateToDisplayWidth('中文x', 3), '中');
  assert.equal(padToDisplayWidth('中', 4), '中  ');
});

import assert from 'node:assert/strict';
import { test } from 'node:test';
import fc from 'fast-check';
import { ScreenModel } from '../../../src/terminal/screen-model.ts';

const fragmentArb = fc.constantFrom(
  'a',
  'xyz ',
  '中',
  'é',
  '\r\n',
  '\t',
  '\u001b[31m',
  '\u001b[0m',
  '\u001b[38;2;1;2;3m',
  '\u001b[2J',
  '\u001b[K',
  '\u001b[3;2H',
  '\u001b]0;title\u0007',
  '\u001b[?1049h',
  '\u001b[?1049l',
  '\u001b[2P',
  '\u001b7',
  '\u001b8',
  'ÿ',
);

function allText(screen: ScreenModel): string[] {
  const snapshot = screen.snapshot();
  const texts = [...snapshot.scrollback.map((line) => line.text), ...snapshot.lines];
  let end = texts.length;
  while (end > 0 && (texts[end - 1] ?? '').length === 0) {
    end -= 1;
  }
  return texts.slice(0, end);
}

void test('property: feeding a byte stream in arbitrary chunks matches a single feed', () => {
  fc.assert(
    fc.property(
      fc.array(fragmentArb, { maxLength: 40 }),
      fc.array(fc.nat(), { maxLength: 12 }),
      (fragments, splitSeeds) => {
        const bytes = Buffer.from(fragments.join(''), 'utf8');
        const whole = new ScreenModel({ cols: 12, rows: 4, scrollbackLines: 50 });
        whole.feed(bytes);

        const splits = [...new Set(splitSeeds.map((seed) => (bytes.length === 0 ? 0 : seed % bytes.length)))].sort(
          (left, right) => left - right,
        );
        const chunked = new ScreenModel({ cols: 12, rows: 4, scrollbackLines: 50 });
        let start = 0;
        for (const split of splits) {
          chunked.feed(bytes.subarray(start, split));
          start = split;
        }
        chunked.feed(bytes.subarray(start));

        assert.deepEqual(chunked.snapshot(), whole.snapshot());
        assert.deepEqual(chunked.diagnostics(), whole.diagnostics());
      },
    ),
  );
});

void test('property: shrinking and restoring the width keeps primary screen text', () => {
  fc.assert(
    fc.property(
      fc.array(fc.stringMatching(/^([a-z ]{0,29}[a-z])?$/), { minLength: 1, maxLength: 20 }),
      fc.integer({ min: 2, max: 40 }),
      (lines, narrowCols) => {
        const screen = new ScreenModel({ cols: 20, rows: 5, scrollbackLines: 1000 });
        screen.feed(lines.join('\r\n'));
        const before = allText(screen);

        screen.resize(narrowCols, 5);
        screen.resize(20, 5);

        assert.deepEqual(allText(screen), before);
      },
    ),
  );
});

const styledFragmentArb = fc.constantFrom(
  'a',
  'word ',
  '中文',
  'é',
  '\r\n',
  '\t',
  '\b',
  '\u001b[1;4;7m',
  '\u001b[48;5;21m',
  '\u001b[38;2;200;10;10m',
  '\u001b[0m',
  '\u001b[3;5H',
  '\u001b[A',
  '\u001b[10C',
  '\u001b[K',
  '\u001b[2P',
);

function glyphCount(screen: ScreenModel): number {
  const snapshot = screen.snapshot();
  let count = 0;
  for (const line of [...snapshot.scrollback, ...snapshot.richLines]) {
    for (const cell of line.cells) {
      if (cell.width > 0 && cell.glyph.trim().length > 0) {
        count += 1;
      }
    }
  }
  return count;
}

void test('property: a single resize keeps every glyph of scrollback and screen', () => {
  fc.assert(
    fc.property(
      fc.array(styledFragmentArb, { maxLength: 60 }),
      fc.integer({ min: 1, max: 40 }),
      fc.integer({ min: 1, max: 12 }),
      (fragments, cols, rows) => {
        const screen = new ScreenModel({ cols: 16, rows: 6, scrollbackLines: 10_000 });
        screen.feed(fragments.join(''));
        const before = glyphCount(screen);

        assert.equal(screen.resize(cols, rows), true);

        const snapshot = screen.snapshot();
        assert.equal(glyphCount(screen), before);
        assert.ok(snapshot.cursor.row >= 0 && snapshot.cursor.row < rows);
        assert.ok(snapshot.cursor.col >= 0 && snapshot.cursor.col < cols);
        assert.equal(snapshot.richLines.length, rows);
      },
    ),
  );
});

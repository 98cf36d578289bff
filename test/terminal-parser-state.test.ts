import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  advanceParser,
  createParserState,
  type MutableParserState,
  type ParserActions,
} from '../src/terminal/parser-state.ts';

function recordEvents(input: string | readonly number[], state: MutableParserState = createParserState()): string[] {
  const events: string[] = [];
  const actions: ParserActions = {
    print: (char) => {
      events.push(`print:${char}`);
    },
    execute: (code) => {
      events.push(`execute:${String(code)}`);
    },
    escDispatch: (intermediates, final) => {
      events.push(`esc:${intermediates}:${final}`);
    },
    csiDispatch: (params, intermediates, final) => {
      events.push(`csi:${params}:${intermediates}:${final}`);
    },
    stringDispatch: (kind, payload) => {
      events.push(`${kind}:${payload}`);
    },
    ignored: () => {
      events.push('ignored');
    },
    malformedUtf8: () => {
      events.push('malformed');
    },
  };
  const bytes = typeof input === 'string' ? Buffer.from(input, 'utf8') : input;
  for (const byte of bytes) {
    advanceParser(state, byte, actions);
  }
  return events;
}

void test('parser dispatches csi sequences with private markers and intermediates', () => {
  assert.deepEqual(recordEvents('\u001b[?25h\u001b[2 q'), ['csi:?25::h', 'csi:2: :q']);
});

void test('parser dispatches escape sequences with intermediates', () => {
  assert.deepEqual(recordEvents('\u001b(B\u001b7'), ['esc:(:B', 'esc::7']);
});

void test('parser resumes an osc string split across calls', () => {
  const state = createParserState();
  assert.deepEqual(recordEvents('\u001b]0;ti', state), []);
  assert.equal(state.mode, 'osc-string');
  assert.deepEqual(recordEvents('tle\u0007x', state), ['osc:0;title', 'print:x']);
});

void test('parser ends strings on ESC backslash and on a new escape', () => {
  assert.deepEqual(recordEvents('\u001b]2;a\u001b\\'), ['osc:2;a']);
  assert.deepEqual(recordEvents('\u001bPq\u001b[1m'), ['dcs:q', 'csi:1::m']);
});

void test('parser aborts sequences on CAN', () => {
  assert.deepEqual(recordEvents('\u001b[12\u0018A'), ['ignored', 'print:A']);
});

void test('parser executes C0 controls inside a csi sequence', () => {
  assert.deepEqual(recordEvents('\u001b[1\n2H'), ['execute:10', 'csi:12::H']);
});

void test('parser resumes utf-8 sequences split across calls', () => {
  const state = createParserState();
  assert.deepEqual(recordEvents([0xe4, 0xb8], state), []);
  assert.deepEqual(state.pendingUtf8, [0xe4, 0xb8]);
  assert.deepEqual(recordEvents([0xad], state), ['print:中']);
  assert.deepEqual(state.pendingUtf8, []);
});

void test('parser rejects overlong and interrupted utf-8', () => {
  assert.deepEqual(recordEvents([0xe0, 0x80, 0x80]), ['malformed', 'print:\ufffd']);
  assert.deepEqual(recordEvents([0xe4, 0x41]), ['malformed', 'print:\ufffd', 'print:A']);
  assert.deepEqual(recordEvents([0x80]), ['malformed', 'print:\ufffd']);
});

void test('parser drops DEL and C1 controls in ground state', () => {
  assert.deepEqual(recordEvents('a\u007fb'), ['print:a', 'print:b']);
  assert.deepEqual(recordEvents([0xc2, 0x85, 0x62]), ['print:b']);
});

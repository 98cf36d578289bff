import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  ProtocolFrameDecoder,
  encodeProtocolMessage,
  parseProtocolEnvelope,
  type ProtocolMessage,
} from '../src/remote/stream-protocol.ts';

function describeMessage(message: ProtocolMessage): string {
  switch (message.type) {
    case 'data':
      return `data:${Buffer.from(message.bytes).toString('hex')}`;
    case 'resize':
      return `resize:${String(message.cols)}x${String(message.rows)}`;
    case 'control':
      return `control:${message.kind}`;
    case 'heartbeat':
      return `heartbeat:${String(message.timestamp)}`;
    case 'error':
      return `error:${message.reason}`;
  }
}

void test('encodeProtocolMessage writes one versioned JSON line per message', () => {
  assert.equal(
    encodeProtocolMessage({ type: 'resize', cols: 80, rows: 24 }, 3).toString('utf8'),
    '{"v":1,"type":"resize","seq":3,"cols":80,"rows":24}\n',
  );
  assert.equal(
    encodeProtocolMessage({ type: 'data', bytes: Uint8Array.from([0, 255, 10]) }, 0).toString('utf8'),
    '{"v":1,"type":"data","seq":0,"data":"AP8K"}\n',
  );
  assert.equal(
    encodeProtocolMessage({ type: 'control', kind: 'detach' }, 7).toString('utf8'),
    '{"v":1,"type":"control","seq":7,"kind":"detach"}\n',
  );
});

void test('decoder yields frames only once their newline arrives', () => {
  const decoder = new ProtocolFrameDecoder();
  const encoded = encodeProtocolMessage({ type: 'heartbeat', timestamp: 1234 }, 5);

  const first = decoder.push(encoded.subarray(0, 10));
  assert.deepEqual(first, { frames: [], rejections: [] });
  assert.equal(decoder.bufferedBytes, 10);

  const second = decoder.push(encoded.subarray(10));
  assert.deepEqual(second.rejections, []);
  assert.equal(second.frames.length, 1);
  assert.equal(second.frames[0]?.seq, 5);
  assert.deepEqual(second.frames[0]?.message, { type: 'heartbeat', timestamp: 1234 });
  assert.equal(decoder.bufferedBytes, 0);
});

void test('decoder keeps a multi-byte character split across chunks intact', () => {
  const decoder = new ProtocolFrameDecoder();
  const encoded = encodeProtocolMessage({ type: 'error', reason: 'pr\u00fcfung' }, 0);
  const splitAt = encoded.indexOf(0xc3) + 1;

  assert.deepEqual(decoder.push(encoded.subarray(0, splitAt)).frames, []);
  const result = decoder.push(encoded.subarray(splitAt));

  assert.deepEqual(
    result.frames.map((frame) => describeMessage(frame.message)),
    ['error:pr\u00fcfung'],
  );
});

void test('decoder counts and skips frames it cannot accept', () => {
  const decoder = new ProtocolFrameDecoder();
  const input = [
    'not json',
    '{"v":2,"type":"data","seq":0,"data":""}',
    '{"v":1,"type":"bogus","seq":0}',
    '{"v":1,"type":"resize","seq":1,"cols":0,"rows":5}',
    '{"v":1,"type":"data","seq":2,"data":"!!"}',
    '{"v":1,"type":"control","seq":3,"kind":"exit"}',
    '',
  ].join('\n');

  const result = decoder.push(Buffer.from(input, 'utf8'));

  assert.deepEqual(result.rejections, [
    'malformed-json',
    'unsupported-version',
    'unknown-type',
    'invalid-payload',
    'invalid-payload',
  ]);
  assert.deepEqual(
    result.frames.map((frame) => describeMessage(frame.message)),
    ['control:exit'],
  );
});

void test('decoder skips blank lines silently', () => {
  const decoder = new ProtocolFrameDecoder();
  assert.deepEqual(decoder.push(Buffer.from('\n\r\n\n', 'utf8')), { frames: [], rejections: [] });
});

void test('decoder rejects an oversize frame once and resynchronizes on the next newline', () => {
  const decoder = new ProtocolFrameDecoder(64);
  const valid = encodeProtocolMessage({ type: 'control', kind: 'exit' }, 0);

  const overflow = decoder.push(Buffer.from('x'.repeat(100), 'utf8'));
  assert.deepEqual(overflow.rejections, ['oversize']);
  assert.equal(decoder.bufferedBytes, 0);

  const tail = decoder.push(Buffer.concat([Buffer.from('yyy\n', 'utf8'), valid]));
  assert.deepEqual(tail.rejections, []);
  assert.deepEqual(
    tail.frames.map((frame) => describeMessage(frame.message)),
    ['control:exit'],
  );
});

void test('decoder rejects a complete line longer than the frame limit', () => {
  const decoder = new ProtocolFrameDecoder(64);
  const valid = encodeProtocolMessage({ type: 'control', kind: 'ready' }, 1);

  assert.deepEqual(decoder.push(Buffer.from('x'.repeat(50), 'utf8')).rejections, []);
  const result = decoder.push(Buffer.concat([Buffer.from(`${'x'.repeat(50)}\n`, 'utf8'), valid]));

  assert.deepEqual(result.rejections, ['oversize']);
  assert.deepEqual(
    result.frames.map((frame) => describeMessage(frame.message)),
    ['control:ready'],
  );
});

void test('parseProtocolEnvelope validates payload shapes', () => {
  assert.deepEqual(parseProtocolEnvelope({ v: 1, type: 'heartbeat', seq: 0, timestamp: 'soon' }), {
    ok: false,
    rejection: 'invalid-payload',
  });
  assert.deepEqual(parseProtocolEnvelope({ v: 1, type: 'control', seq: 0, kind: 'reboot' }), {
    ok: false,
    rejection: 'invalid-payload',
  });
  assert.deepEqual(parseProtocolEnvelope([1, 2]), { ok: false, rejection: 'invalid-payload' });
  assert.deepEqual(parseProtocolEnvelope({ v: 1, type: 'resize', seq: 4, cols: 132, rows: 43 }), {
    ok: true,
    frame: { seq: 4, message: { type: 'resize', cols: 132, rows: 43 } },
  });
});

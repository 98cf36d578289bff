import assert from 'node:assert/strict';
import { test } from 'node:test';
import { ConnectionFailedError } from '../src/core/errors.ts';
import {
  RemoteStreamClient,
  reconnectDelayMs,
  type ConnectionState,
  type RemoteStreamTimings,
} from '../src/remote/stream-client.ts';
import type { ProtocolMessage } from '../src/remote/stream-protocol.ts';
import { ManualScheduler } from './support/manual-scheduler.ts';
import { ScriptedConnector } from './support/memory-duplex.ts';

const TIMINGS: RemoteStreamTimings = {
  heartbeatIntervalMs: 1000,
  heartbeatTimeoutMs: 3000,
  reconnectBaseDelayMs: 100,
  reconnectMaxDelayMs: 500,
  maxReconnectAttempts: 4,
  connectTimeoutMs: 50,
  maxQueuedMessages: 3,
};

const REFUSED = 'connect ECONNREFUSED 127.0.0.1:7681';

function describeMessage(message: ProtocolMessage): string {
  switch (message.type) {
    case 'data':
      return `data:${Buffer.from(message.bytes).toString('utf8')}`;
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

function describeState(state: ConnectionState): string {
  if (state.kind === 'reconnecting') {
    return `reconnecting:${String(state.attempt)}`;
  }
  if (state.kind === 'failed') {
    return `failed:${state.reason}`;
  }
  return state.kind;
}

function createClient(): {
  client: RemoteStreamClient;
  connector: ScriptedConnector;
  scheduler: ManualScheduler;
  states: string[];
  messages: string[];
} {
  const connector = new ScriptedConnector();
  const scheduler = new ManualScheduler();
  const client = new RemoteStreamClient({
    endpoint: { host: '127.0.0.1', port: 7681 },
    timings: TIMINGS,
    connector: connector.connect,
    scheduler,
    sessionName: 'ciab_remote',
  });
  const states: string[] = [];
  const messages: string[] = [];
  client.onStateChange((state) => {
    states.push(describeState(state));
  });
  client.onMessage((message) => {
    messages.push(describeMessage(message));
  });
  return { client, connector, scheduler, states, messages };
}

function text(value: string): Uint8Array {
  return Buffer.from(value, 'utf8');
}

void test('reconnect delays grow exponentially up to the cap', () => {
  assert.deepEqual(
    [1, 2, 3, 4, 5].map((attempt) => reconnectDelayMs(attempt, TIMINGS)),
    [100, 200, 400, 500, 500],
  );
});

void test('inbound messages are delivered in arrival order and heartbeats are absorbed', async () => {
  const { client, connector, states, messages } = createClient();
  await client.connect();
  const connection = connector.latest();

  connection.serverSend({ type: 'data', bytes: text('ab') });
  connection.serverSend({ type: 'resize', cols: 90, rows: 20 });
  connection.serverSend({ type: 'heartbeat', timestamp: 5 });
  connection.serverSend({ type: 'data', bytes: text('c') });

  assert.deepEqual(states, ['connecting', 'connected']);
  assert.deepEqual(messages, ['data:ab', 'resize:90x20', 'data:c']);
});

void test('client sends heartbeats on the configured interval', async () => {
  const { client, connector, scheduler } = createClient();
  await client.connect();
  const connection = connector.latest();

  await scheduler.advance(1000);
  connection.serverSend({ type: 'heartbeat', timestamp: 1000 });
  await scheduler.advance(1000);

  assert.deepEqual(connection.received.map(describeMessage), ['heartbeat:1000', 'heartbeat:2000']);
});

void test('silence past the heartbeat timeout drops the link and reconnects', async () => {
  const { client, connector, scheduler, states } = createClient();
  await client.connect();
  const first = connector.latest();

  await scheduler.advance(3000);
  assert.deepEqual(states, ['connecting', 'connected', 'reconnecting:1']);
  assert.equal(first.closed, true);

  await scheduler.advance(100);
  assert.deepEqual(states, ['connecting', 'connected', 'reconnecting:1', 'connected']);
  assert.equal(connector.connections.length, 2);
});

void test('messages sent while reconnecting are queued, bounded, and flushed in order', async () => {
  const { client, connector, scheduler } = createClient();
  await client.connect();
  connector.latest().drop(new Error('socket reset'));

  assert.equal(client.send({ type: 'data', bytes: text('x') }), true);
  assert.equal(client.send({ type: 'resize', cols: 100, rows: 40 }), true);
  assert.equal(client.send({ type: 'data', bytes: text('y') }), true);
  assert.equal(client.send({ type: 'data', bytes: text('z') }), false);
  assert.equal(client.send({ type: 'heartbeat', timestamp: 1 }), false);
  assert.equal(client.queuedMessageCount, 3);

  await scheduler.advance(100);

  assert.deepEqual(connector.latest().received.map(describeMessage), ['data:x', 'resize:100x40', 'data:y']);
  assert.equal(client.queuedMessageCount, 0);
});

void test('reconnect backs off exponentially then fails until reset', async () => {
  const { client, connector, scheduler, states } = createClient();
  await client.connect();
  connector.refuse(4);
  connector.latest().drop(null);

  const observedDelays: number[][] = [];
  for (const delay of [100, 200, 400, 500]) {
    observedDelays.push(scheduler.pendingDelays());
    await scheduler.advance(delay);
  }

  assert.deepEqual(observedDelays, [[100], [200], [400], [500]]);
  assert.deepEqual(states.slice(2), [
    'reconnecting:1',
    'reconnecting:2',
    'reconnecting:3',
    'reconnecting:4',
    `failed:${REFUSED}`,
  ]);
  assert.equal(connector.attempts, 5);
  assert.equal(client.send({ type: 'data', bytes: text('late') }), false);

  await scheduler.advance(10_000);
  assert.equal(connector.attempts, 5);

  client.reset();
  assert.equal(client.connectionState().kind, 'disconnected');
  await client.connect();
  assert.equal(client.connectionState().kind, 'connected');
});

void test('a failed first connect is final and schedules nothing', async () => {
  const { client, connector, scheduler } = createClient();
  connector.refuse(1);

  await assert.rejects(client.connect(), ConnectionFailedError);

  assert.deepEqual(client.connectionState(), { kind: 'failed', reason: REFUSED });
  assert.deepEqual(scheduler.pendingDelays(), []);
});

void test('malformed frames are counted and do not disturb the stream', async () => {
  const { client, connector, messages } = createClient();
  await client.connect();
  const connection = connector.latest();

  connection.serverSendRaw('garbage\n');
  connection.serverSend({ type: 'data', bytes: text('ok') });

  assert.equal(client.rejectedFrameCount, 1);
  assert.deepEqual(messages, ['data:ok']);
});

void test('data from a dropped connection is ignored', async () => {
  const { client, connector, scheduler, messages } = createClient();
  await client.connect();
  const first = connector.latest();
  first.drop(null);
  await scheduler.advance(100);

  first.serverSend({ type: 'data', bytes: text('stale') });
  connector.latest().serverSend({ type: 'data', bytes: text('fresh') });

  assert.deepEqual(messages, ['data:fresh']);
});

void test('close releases the connection and refuses further sends', async () => {
  const { client, connector, scheduler } = createClient();
  await client.connect();

  client.close();

  assert.equal(connector.latest().closed, true);
  assert.equal(client.connectionState().kind, 'disconnected');
  assert.equal(client.send({ type: 'data', bytes: text('x') }), false);
  assert.deepEqual(scheduler.pendingDelays(), []);
});

import assert from 'node:assert/strict';
import { test } from 'node:test';
import { ConnectionFailedError } from '../src/core/errors.ts';
import { RemoteTransport } from '../src/remote/remote-transport.ts';
import type { RemoteStreamTimings } from '../src/remote/stream-client.ts';
import type { ProtocolMessage } from '../src/remote/stream-protocol.ts';
import type { TransportEvent } from '../src/session/transport.ts';
import { ManualScheduler } from './support/manual-scheduler.ts';
import { ScriptedConnector } from './support/memory-duplex.ts';

const TIMINGS: RemoteStreamTimings = {
  heartbeatIntervalMs: 1000,
  heartbeatTimeoutMs: 3000,
  reconnectBaseDelayMs: 100,
  reconnectMaxDelayMs: 500,
  maxReconnectAttempts: 1,
  connectTimeoutMs: 50,
  maxQueuedMessages: 8,
};

function describeEvent(event: TransportEvent): string {
  switch (event.kind) {
    case 'data':
      return `data:${Buffer.from(event.bytes).toString('utf8')}`;
    case 'end':
      return `end:${String(event.processAlive)}:${event.reason}`;
    case 'error':
      return `error:${event.error.kind}`;
    case 'resize':
      return `resize:${String(event.cols)}x${String(event.rows)}`;
    case 'connection':
      return `connection:${event.state.kind}`;
    case 'ready':
      return 'ready';
  }
}

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

async function collect(transport: RemoteTransport): Promise<string[]> {
  const events: string[] = [];
  for await (const event of transport.read()) {
    events.push(describeEvent(event));
  }
  return events;
}

async function openTransport(connector: ScriptedConnector, scheduler: ManualScheduler): Promise<RemoteTransport> {
  return await RemoteTransport.open({
    sessionName: 'ciab_remote',
    endpoint: { host: '127.0.0.1', port: 7681 },
    timings: TIMINGS,
    cols: 80,
    rows: 24,
    connector: connector.connect,
    scheduler,
  });
}

void test('remote transport announces its size and maps the stream in order', async () => {
  const connector = new ScriptedConnector();
  const transport = await openTransport(connector, new ManualScheduler());
  const connection = connector.latest();

  connection.serverSend({ type: 'data', bytes: Buffer.from('hi', 'utf8') });
  connection.serverSend({ type: 'resize', cols: 100, rows: 30 });
  connection.serverSend({ type: 'data', bytes: Buffer.from('there', 'utf8') });
  connection.serverSend({ type: 'error', reason: 'disk full' });
  connection.serverSend({ type: 'control', kind: 'exit' });

  assert.deepEqual(connection.received.map(describeMessage), ['resize:80x24']);
  assert.deepEqual(await collect(transport), [
    'ready',
    'data:hi',
    'resize:100x30',
    'data:there',
    'error:transport-io',
    'end:false:process exited',
  ]);
  assert.equal(connection.closed, true);
});

void test('remote detach sends a detach control and keeps the process', async () => {
  const connector = new ScriptedConnector();
  const transport = await openTransport(connector, new ManualScheduler());
  const connection = connector.latest();

  transport.write(Buffer.from('ls\r', 'utf8'));
  transport.resize(120, 40);
  await transport.detach();

  assert.deepEqual(connection.received.map(describeMessage), [
    'resize:80x24',
    'data:ls\r',
    'resize:120x40',
    'control:detach',
  ]);
  assert.equal(connection.closed, true);
  assert.deepEqual(await collect(transport), ['ready', 'end:true:detached']);
});

void test('remote terminate sends a terminate control and ends the process', async () => {
  const connector = new ScriptedConnector();
  const transport = await openTransport(connector, new ManualScheduler());
  const connection = connector.latest();

  await transport.terminate();

  assert.deepEqual(connection.received.map(describeMessage), ['resize:80x24', 'control:terminate']);
  assert.deepEqual(await collect(transport), ['ready', 'end:false:terminated']);
});

void test('remote transport reports reconnects and ends alive once reconnecting fails', async () => {
  const connector = new ScriptedConnector();
  const scheduler = new ManualScheduler();
  const transport = await openTransport(connector, scheduler);

  connector.refuse(1);
  connector.latest().drop(new Error('socket reset'));
  await scheduler.advance(100);

  assert.deepEqual(await collect(transport), [
    'ready',
    'connection:reconnecting',
    'error:connection-failed',
    'end:true:connect ECONNREFUSED 127.0.0.1:7681',
  ]);
});

void test('remote transport open fails when the first connect is refused', async () => {
  const connector = new ScriptedConnector();
  connector.refuse(1);

  await assert.rejects(openTransport(connector, new ManualScheduler()), ConnectionFailedError);
});

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { once } from 'node:events';
import { WebSocketServer, type WebSocket } from 'ws';
import { MeshGatewayConnection } from '../lib/connection/MeshGatewayConnection.mjs';
import type { MeshReport } from '../lib/types.mjs';
import { RecordingLogger } from './helpers/fakes.mjs';

async function startGateway() {
  const server = new WebSocketServer({ port: 0 });
  await once(server, 'listening');
  const address = server.address();
  if (typeof address === 'string') {
    throw new Error(`unexpected address ${address}`);
  }

  const close = async () => {
    for (const client of server.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  };

  return { server, url: `ws://127.0.0.1:${address.port}`, close };
}

function nextConnection(server: WebSocketServer): Promise<WebSocket> {
  return new Promise((resolve) => {
    server.once('connection', (socket) => {
      resolve(socket);
    });
  });
}

function nextFrame(socket: WebSocket): Promise<string> {
  return new Promise((resolve) => {
    socket.once('message', (data) => {
      resolve(String(data));
    });
  });
}

test('MeshGatewayConnection: connects and routes report frames', async () => {
  const gateway = await startGateway();
  const connection = new MeshGatewayConnection(gateway.url, { logger: new RecordingLogger() });
  const reports: MeshReport[] = [];
  const received = new Promise<void>((resolve) => {
    connection.setOnReport((report) => {
      reports.push(report);
      resolve();
    });
  });

  try {
    const accepted = nextConnection(gateway.server);
    await connection.connect();
    const socket = await accepted;

    assert.equal(connection.getState(), 'connected');
    assert.equal(connection.isConnected(), true);

    socket.send('{"type":"relay_cmd","device_id":"quiet-otter-0b1c","relay_state":true}');
    socket.send('{"type":"report","device_id":"swift-falcon-a3f2","temperature":21.5}');
    await received;

    assert.deepEqual(reports, [{ deviceId: 'swift-falcon-a3f2', temperature: 21.5 }]);
  } finally {
    connection.cleanup();
    await gateway.close();
  }
});

test('MeshGatewayConnection: writes relay command frames', async () => {
  const gateway = await startGateway();
  const connection = new MeshGatewayConnection(gateway.url, { logger: new RecordingLogger() });

  try {
    const accepted = nextConnection(gateway.server);
    await connection.connect();
    const socket = await accepted;
    const frame = nextFrame(socket);

    assert.equal(await connection.sendRelayCommand('swift-falcon-a3f2', false), true);
    assert.equal(await frame, '{"type":"relay_cmd","device_id":"swift-falcon-a3f2","relay_state":false}');
  } finally {
    connection.cleanup();
    await gateway.close();
  }
});

test('MeshGatewayConnection: refuses to send while disconnected', async () => {
  const logger = new RecordingLogger();
  const connection = new MeshGatewayConnection('ws://127.0.0.1:9', { logger });

  assert.equal(await connection.sendRelayCommand('swift-falcon-a3f2', true), false);
  assert.deepEqual(logger.errors, [
    "[MeshGatewayConnection] Cannot send command for 'swift-falcon-a3f2' - WebSocket not open",
  ]);
});

test('MeshGatewayConnection: reconnects after an established connection drops', async () => {
  const gateway = await startGateway();
  const logger = new RecordingLogger();
  const connection = new MeshGatewayConnection(gateway.url, { reconnectDelay: 10, logger });

  try {
    const accepted = nextConnection(gateway.server);
    await connection.connect();
    const socket = await accepted;

    const reconnected = nextConnection(gateway.server);
    socket.close();
    await reconnected;

    assert.ok(logger.logs.includes('[MeshGatewayConnection] Scheduling reconnect in 10ms...'));
  } finally {
    connection.cleanup();
    await gateway.close();
  }
});

test('MeshGatewayConnection: does not reconnect after cleanup', async () => {
  const gateway = await startGateway();
  const logger = new RecordingLogger();
  const connection = new MeshGatewayConnection(gateway.url, { reconnectDelay: 10, logger });

  try {
    const accepted = nextConnection(gateway.server);
    await connection.connect();
    const socket = await accepted;
    const closed = once(socket, 'close');

    connection.cleanup();
    await closed;
    await new Promise((resolve) => setTimeout(resolve, 30));

    assert.equal(connection.getState(), 'disconnected');
    assert.equal(gateway.server.clients.size, 0);
    assert.equal(logger.logs.some((line) => line.includes('Scheduling reconnect')), false);
  } finally {
    await gateway.close();
  }
});

test('MeshGatewayConnection: rejects when the gateway is unreachable', async () => {
  const gateway = await startGateway();
  const url = gateway.url;
  await gateway.close();

  const connection = new MeshGatewayConnection(url, { logger: new RecordingLogger() });
  try {
    await assert.rejects(connection.connect());
    assert.equal(connection.getState(), 'disconnected');
  } finally {
    connection.cleanup();
  }
});

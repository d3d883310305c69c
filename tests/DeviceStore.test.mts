import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import Database from 'better-sqlite3';
import { BRIDGE_ERROR_CODES, BridgeError, type BridgeErrorCode } from '../lib/BridgeProtocol.mjs';
import { DeviceStore } from '../lib/persistence/DeviceStore.mjs';
import { SqliteKeyValueStore } from '../lib/persistence/KeyValueStore.mjs';
import { deviceKeySuffix } from '../lib/persistence/RecordCodec.mjs';
import type { DeviceRecord } from '../lib/types.mjs';
import { MemoryKeyValueStore, RecordingLogger } from './helpers/fakes.mjs';

const isBridgeError = (code: BridgeErrorCode) => (error: unknown) =>
  error instanceof BridgeError && error.code === code;

function record(deviceId: string, overrides: Partial<DeviceRecord> = {}): DeviceRecord {
  return {
    deviceId,
    endpoints: { plug: 0, temperature: 0, humidity: 0 },
    lastKnown: {},
    ...overrides,
  };
}

describe('deviceKeySuffix', () => {
  it('takes the last hyphen segment, lowercased', () => {
    assert.equal(deviceKeySuffix('swift-falcon-a3f2'), 'a3f2');
    assert.equal(deviceKeySuffix('Swift-Falcon-A3F2'), 'a3f2');
  });

  it('rejects ids without a 4-digit hex suffix', () => {
    assert.equal(deviceKeySuffix('nohyphen'), null);
    assert.equal(deviceKeySuffix('bad-otter-zz12'), null);
    assert.equal(deviceKeySuffix('short-otter-a3f'), null);
    assert.equal(deviceKeySuffix('long-otter-a3f20'), null);
    assert.equal(deviceKeySuffix('trailing-'), null);
  });
});

describe('SqliteKeyValueStore', () => {
  it('scopes keys to its namespace', () => {
    const db = new Database(':memory:');
    const bridge = new SqliteKeyValueStore(db, 'bridge');
    const wifi = new SqliteKeyValueStore(db, 'wifi');

    bridge.set('dev-a3f2', 'one');
    bridge.set('dev-0b1c', 'two');
    bridge.set('global', 'three');
    wifi.set('dev-a3f2', 'other');

    assert.equal(bridge.get('dev-a3f2'), 'one');
    assert.equal(wifi.get('dev-a3f2'), 'other');
    assert.deepEqual(bridge.keys('dev-'), ['dev-0b1c', 'dev-a3f2']);
    assert.equal(bridge.get('missing'), undefined);

    assert.equal(bridge.clear(), 3);
    assert.deepEqual(bridge.keys(''), []);
    assert.equal(wifi.get('dev-a3f2'), 'other');
    db.close();
  });

  it('overwrites existing keys', () => {
    const store = new SqliteKeyValueStore(':memory:', 'bridge');
    store.set('global', 'a');
    store.set('global', 'b');
    assert.equal(store.get('global'), 'b');
    store.close();
  });
});

describe('DeviceStore', () => {
  it('stores records in the persisted JSON layout', () => {
    const kv = new MemoryKeyValueStore();
    const logger = new RecordingLogger();
    const store = new DeviceStore(kv, logger);

    store.saveDevice(
      record('swift-falcon-a3f2', {
        endpoints: { plug: 0, temperature: 3, humidity: 0 },
        lastKnown: { temperature: 21.5 },
      })
    );

    assert.equal(
      kv.get('dev-a3f2'),
      '{"device_id":"swift-falcon-a3f2","plug_endpoint_id":0,"temp_endpoint_id":3,"humidity_endpoint_id":0,' +
        '"has_temperature":true,"temperature":21.5,"has_humidity":false,"humidity":0,' +
        '"has_relay_state":false,"relay_state":false}'
    );
    assert.deepEqual(logger.logs, [
      '[DeviceStore] Saved device: swift-falcon-a3f2 (plug=0, temperature=3, humidity=0)',
    ]);
  });

  it('loads only the values that were observed', () => {
    const store = new DeviceStore(new MemoryKeyValueStore(), new RecordingLogger());
    store.saveDevice(
      record('swift-falcon-a3f2', {
        endpoints: { plug: 4, temperature: 3, humidity: 0 },
        lastKnown: { temperature: 21.5, relayState: false },
      })
    );

    assert.deepEqual(store.loadDevice('a3f2'), {
      deviceId: 'swift-falcon-a3f2',
      endpoints: { plug: 4, temperature: 3, humidity: 0 },
      lastKnown: { temperature: 21.5, relayState: false },
    });
    assert.equal(store.loadDevice('0b1c'), null);
  });

  it('defaults the endpoint counter to 1', () => {
    const kv = new MemoryKeyValueStore();
    const store = new DeviceStore(kv, new RecordingLogger());

    assert.equal(store.readNextEndpointId(), 1);
    store.writeNextEndpointId(8);
    assert.equal(kv.get('global'), '{"next_endpoint_id":8}');
    assert.equal(store.readNextEndpointId(), 8);
  });

  it('treats an unreadable counter as absent', () => {
    const kv = new MemoryKeyValueStore();
    const logger = new RecordingLogger();
    kv.set('global', '{"next_endpoint_id":0}');

    assert.equal(new DeviceStore(kv, logger).readNextEndpointId(), 1);
    assert.equal(logger.errors.length, 1);
    assert.match(logger.errors[0] ?? '', /^\[DeviceStore\] Failed to decode global record: DECODE_FAILED/);
  });

  it('refuses a record whose suffix key holds another device', () => {
    const store = new DeviceStore(new MemoryKeyValueStore(), new RecordingLogger());
    store.saveDevice(record('swift-falcon-a3f2'));

    assert.throws(
      () => store.saveDevice(record('quiet-otter-A3F2')),
      isBridgeError(BRIDGE_ERROR_CODES.SUFFIX_COLLISION)
    );
    assert.equal(store.loadDevice('a3f2')?.deviceId, 'swift-falcon-a3f2');
  });

  it('refuses ids without a key suffix', () => {
    const store = new DeviceStore(new MemoryKeyValueStore(), new RecordingLogger());
    assert.throws(
      () => store.saveDevice(record('nohyphen')),
      isBridgeError(BRIDGE_ERROR_CODES.INVALID_DEVICE_ID)
    );
  });

  it('wraps backend write failures', () => {
    const kv = new MemoryKeyValueStore();
    kv.failWrites = true;
    const store = new DeviceStore(kv, new RecordingLogger());

    assert.throws(
      () => store.saveDevice(record('swift-falcon-a3f2')),
      isBridgeError(BRIDGE_ERROR_CODES.STORE_WRITE_FAILED)
    );
    assert.throws(
      () => store.writeNextEndpointId(2),
      isBridgeError(BRIDGE_ERROR_CODES.STORE_WRITE_FAILED)
    );
  });

  it('skips undecodable records when loading everything', () => {
    const kv = new MemoryKeyValueStore();
    const logger = new RecordingLogger();
    const store = new DeviceStore(kv, logger);

    store.saveDevice(record('swift-falcon-a3f2'));
    kv.set('dev-beef', '{not json');
    kv.set(
      'dev-cafe',
      JSON.stringify({ device_id: 'broken-crane-cafe', plug_endpoint_id: -1 })
    );

    const devices = store.loadAllDevices();
    assert.deepEqual(
      devices.map((device) => device.deviceId),
      ['swift-falcon-a3f2']
    );
    assert.equal(logger.errors.length, 2);
    assert.equal(logger.logs.at(-1), '[DeviceStore] Loaded 1 devices');
  });

  it('erases only the bridge namespace', () => {
    const db = new Database(':memory:');
    const bridgeKv = new SqliteKeyValueStore(db, 'bridge');
    const wifiKv = new SqliteKeyValueStore(db, 'wifi');
    wifiKv.set('ssid', 'test-network');

    const store = new DeviceStore(bridgeKv, new RecordingLogger());
    store.saveDevice(record('swift-falcon-a3f2'));
    store.writeNextEndpointId(5);

    assert.equal(store.eraseAll(), 2);
    assert.deepEqual(bridgeKv.keys(''), []);
    assert.equal(store.readNextEndpointId(), 1);
    assert.equal(wifiKv.get('ssid'), 'test-network');
    db.close();
  });
});

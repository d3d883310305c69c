import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  BRIDGE_ERROR_CODES,
  BridgeError,
  CLUSTERS,
  DEVICE_TYPES,
  type BridgeErrorCode,
} from '../lib/BridgeProtocol.mjs';
import { EndpointLifecycleManager, endpointLabel } from '../lib/endpoints/EndpointLifecycleManager.mjs';
import { DeviceStore } from '../lib/persistence/DeviceStore.mjs';
import { createDeviceRecord, type BridgeDevice } from '../lib/state/BridgeRegistry.mjs';
import { IdentifierAllocator } from '../lib/state/IdentifierAllocator.mjs';
import { ReentrantLock } from '../lib/utils/ReentrantLock.mjs';
import type { EndpointActivator, EndpointHandle } from '../lib/types.mjs';
import { FakeFramework, MemoryKeyValueStore, RecordingLogger } from './helpers/fakes.mjs';

const isBridgeError = (code: BridgeErrorCode) => (error: unknown) =>
  error instanceof BridgeError && error.code === code;

function setup(activateEndpoint?: EndpointActivator) {
  const kv = new MemoryKeyValueStore();
  const logger = new RecordingLogger();
  const lock = new ReentrantLock();
  const framework = new FakeFramework();
  const allocator = new IdentifierAllocator(new DeviceStore(kv, logger), lock, logger);
  const endpoints = new EndpointLifecycleManager({
    framework,
    allocator,
    lock,
    aggregatorEndpointId: 1,
    activateEndpoint,
    logger,
  });
  return { kv, framework, allocator, endpoints };
}

function newDevice(deviceId: string): BridgeDevice {
  return { record: createDeviceRecord(deviceId), handles: {} };
}

describe('EndpointLifecycleManager', () => {
  describe('create', () => {
    it('instantiates, labels, enables and activates a new endpoint', async () => {
      const { framework, endpoints, kv } = setup();
      const device = newDevice('swift-falcon-a3f2');

      const handle = await endpoints.create(device, 'temperature');

      assert.deepEqual(handle, { endpointId: 1, deviceType: DEVICE_TYPES.TEMPERATURE_SENSOR });
      assert.deepEqual(framework.createRequests, [
        { aggregatorId: 1, endpointId: 1, deviceType: DEVICE_TYPES.TEMPERATURE_SENSOR },
      ]);
      assert.deepEqual(framework.endpoints.get(1), {
        handle,
        label: 'swift-falcon-a3f2 temperature',
        enabled: true,
        initializedClusters: [CLUSTERS.TEMPERATURE_MEASUREMENT],
      });
      assert.equal(device.record.endpoints.temperature, 1);
      assert.equal(device.handles.temperature, handle);
      assert.equal(kv.get('global'), '{"next_endpoint_id":2}');
    });

    it('bridges each capability as its own device type', async () => {
      const { framework, endpoints } = setup();
      const device = newDevice('swift-falcon-a3f2');

      await endpoints.create(device, 'plug');
      await endpoints.create(device, 'humidity');

      assert.deepEqual(
        framework.createRequests.map((request) => request.deviceType),
        [DEVICE_TYPES.ON_OFF_PLUG_IN_UNIT, DEVICE_TYPES.HUMIDITY_SENSOR]
      );
      assert.deepEqual(device.record.endpoints, { plug: 1, temperature: 0, humidity: 2 });
    });

    it('leaves the capability unassigned when the framework rejects it', async () => {
      const { framework, endpoints, allocator } = setup();
      framework.failCreates = 1;
      const device = newDevice('swift-falcon-a3f2');

      await assert.rejects(
        endpoints.create(device, 'plug'),
        isBridgeError(BRIDGE_ERROR_CODES.ENDPOINT_CREATE_FAILED)
      );

      assert.equal(device.record.endpoints.plug, 0);
      assert.equal(device.handles.plug, undefined);
      assert.equal(allocator.peek(), 2);
    });

    it('runs a replacement activation hook instead of the cluster replay', async () => {
      const activated: EndpointHandle[] = [];
      const { framework, endpoints } = setup(async (_framework, handle) => {
        activated.push(handle);
      });
      const device = newDevice('swift-falcon-a3f2');

      const handle = await endpoints.create(device, 'plug');

      assert.deepEqual(activated, [handle]);
      assert.deepEqual(framework.endpoints.get(1)?.initializedClusters, []);
    });

    it('fails creation when activation fails', async () => {
      const { endpoints } = setup(async () => {
        throw new Error('cluster init failed');
      });
      const device = newDevice('swift-falcon-a3f2');

      await assert.rejects(
        endpoints.create(device, 'humidity'),
        isBridgeError(BRIDGE_ERROR_CODES.ENDPOINT_CREATE_FAILED)
      );
      assert.equal(device.record.endpoints.humidity, 0);
    });
  });

  describe('resume', () => {
    it('re-attaches to a stored id without touching the counter', async () => {
      const { framework, endpoints, kv } = setup();
      const device = newDevice('swift-falcon-a3f2');
      device.record.endpoints.plug = 7;

      const handle = await endpoints.resume(device, 'plug', 7);

      assert.deepEqual(framework.resumeRequests, [
        { endpointId: 7, deviceType: DEVICE_TYPES.ON_OFF_PLUG_IN_UNIT },
      ]);
      assert.equal(framework.createRequests.length, 0);
      assert.equal(device.handles.plug, handle);
      assert.equal(device.record.endpoints.plug, 7);
      assert.equal(framework.endpoints.get(7)?.label, 'swift-falcon-a3f2 plug');
      assert.equal(kv.get('global'), undefined);
    });

    it('resets the capability to 0 when resumption fails', async () => {
      const { framework, endpoints } = setup();
      framework.failResume.add(7);
      const device = newDevice('swift-falcon-a3f2');
      device.record.endpoints.plug = 7;

      await assert.rejects(
        endpoints.resume(device, 'plug', 7),
        isBridgeError(BRIDGE_ERROR_CODES.ENDPOINT_RESUME_FAILED)
      );
      assert.equal(device.record.endpoints.plug, 0);
      assert.equal(device.handles.plug, undefined);
    });
  });

  it('truncates labels to 32 characters', () => {
    assert.equal(endpointLabel('swift-falcon-a3f2', 'humidity'), 'swift-falcon-a3f2 humidity');
    assert.equal(
      endpointLabel('extraordinarily-verbose-hummingbird-0b1c', 'plug'),
      'extraordinarily-verbose-hummingb'
    );
  });
});

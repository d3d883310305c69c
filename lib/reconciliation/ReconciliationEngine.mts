/**
 * Reconciliation Engine for the Mesh Bridge
 *
 * Entry points for the two writers:
 * - the mesh pushes sensor truth through onReport()
 * - the framework's controller pushes command intent through queueCmd()
 *
 * A pending command always wins over the relay value of the report that
 * opens the device's delivery window.
 */

import {
  ATTRIBUTES,
  BridgeError,
  CLUSTERS,
  describeError,
} from '../BridgeProtocol.mjs';
import { deviceKeySuffix } from '../persistence/RecordCodec.mjs';
import { createDeviceRecord } from '../state/BridgeRegistry.mjs';
import { CAPABILITIES } from '../types.mjs';
import { celsiusToMeasuredValue, humidityToMeasuredValue } from '../utils/ValueConverters.mjs';
import type { DeviceStore } from '../persistence/DeviceStore.mjs';
import type { BridgeDevice, BridgeRegistry } from '../state/BridgeRegistry.mjs';
import type { CommandQueue } from '../state/CommandQueue.mjs';
import type { IdentifierAllocator } from '../state/IdentifierAllocator.mjs';
import type { EndpointLifecycleManager } from '../endpoints/EndpointLifecycleManager.mjs';
import type { ReentrantLock } from '../utils/ReentrantLock.mjs';
import type {
  AttributePath,
  AttributeSink,
  AttributeValue,
  AttributeWrite,
  Capability,
  DeviceRecord,
  Logger,
  MeshReport,
  MeshTransport,
} from '../types.mjs';

/**
 * Capabilities carried by a report, in creation order
 */
export function reportCapabilities(report: MeshReport): Capability[] {
  const capabilities: Capability[] = [];
  if (report.relayState !== undefined) capabilities.push('plug');
  if (report.temperature !== undefined) capabilities.push('temperature');
  if (report.humidity !== undefined) capabilities.push('humidity');
  return capabilities;
}

export interface ReconciliationEngineOptions {
  registry: BridgeRegistry;
  commandQueue: CommandQueue;
  store: DeviceStore;
  allocator: IdentifierAllocator;
  endpoints: EndpointLifecycleManager;
  sink: AttributeSink;
  transport: MeshTransport;
  lock: ReentrantLock;
  logger?: Logger;
  now?: () => number;
}

// ============================================================================
// ReconciliationEngine Class
// ============================================================================

export class ReconciliationEngine {
  private readonly registry: BridgeRegistry;
  private readonly commandQueue: CommandQueue;
  private readonly store: DeviceStore;
  private readonly allocator: IdentifierAllocator;
  private readonly endpoints: EndpointLifecycleManager;
  private readonly sink: AttributeSink;
  private readonly transport: MeshTransport;
  private readonly lock: ReentrantLock;
  private readonly logger: Logger;
  private readonly now: () => number;

  // Nesting depth of attribute pushes originating from the mesh
  private meshWriteDepth: number = 0;

  constructor(options: ReconciliationEngineOptions) {
    this.registry = options.registry;
    this.commandQueue = options.commandQueue;
    this.store = options.store;
    this.allocator = options.allocator;
    this.endpoints = options.endpoints;
    this.sink = options.sink;
    this.transport = options.transport;
    this.lock = options.lock;
    this.logger = options.logger ?? console;
    this.now = options.now ?? Date.now;
  }

  /**
   * True while the engine itself is writing mesh values into the framework
   */
  get isWritingFromMesh(): boolean {
    return this.meshWriteDepth > 0;
  }

  /**
   * Reconcile one decoded report from the mesh
   */
  onReport(received: MeshReport): Promise<void> {
    return this.lock.run(async () => {
      const suffix = deviceKeySuffix(received.deviceId);
      if (!suffix) {
        this.logger.error(
          `[ReconciliationEngine] Dropping report with malformed device id '${received.deviceId}'`
        );
        return;
      }

      const report = this.dropNonFinite(received);
      this.allocator.flushPending();

      let device = this.registry.getDevice(report.deviceId);
      if (!device) {
        const clash = this.registry.findBySuffix(suffix);
        if (clash) {
          this.logger.error(
            `[ReconciliationEngine] Dropping report from '${report.deviceId}': key suffix '${suffix}' belongs to '${clash.record.deviceId}'`
          );
          return;
        }

        const created = await this.adoptOrCreateDevice(report.deviceId, suffix);
        if (!created) return;
        device = created;
        this.registry.setDevice(device);
      }

      await this.ensureEndpoints(device, reportCapabilities(report));

      this.mergeReport(device, report);
      device.lastSeenAt = this.now();
      this.persist(device);

      const pending = this.commandQueue.take(report.deviceId);
      if (pending) {
        this.deliver(report.deviceId, pending.relayState);
        await this.pushAttributes(device, { includeRelay: false });
      } else {
        await this.pushAttributes(device, { includeRelay: true });
      }
    });
  }

  /**
   * Queue a relay command for the device owning a plug endpoint.
   * Returns false when the endpoint is unknown.
   */
  queueCmd(endpointId: number, relayState: boolean): Promise<boolean> {
    return this.lock.run(() => {
      const device = this.registry.findByPlugEndpoint(endpointId);
      if (!device) {
        this.logger.error(`[ReconciliationEngine] queueCmd: endpoint ${endpointId} not found`);
        return false;
      }

      const { deviceId } = device.record;
      const replaced = this.commandQueue.set(deviceId, { relayState });
      this.logger.log(
        `[ReconciliationEngine] Queued command for '${deviceId}': relay=${relayState ? 'ON' : 'OFF'}${
          replaced ? ' (replaced unsent command)' : ''
        }`
      );
      return true;
    });
  }

  /**
   * Route a framework attribute write into the command queue.
   *
   * Must run synchronously up to the mesh-flag check: the framework reports
   * our own pushes from inside updateAttribute().
   */
  handleAttributeWrite(write: AttributeWrite): Promise<boolean> {
    if (this.isWritingFromMesh) {
      return Promise.resolve(false);
    }
    if (write.clusterId !== CLUSTERS.ON_OFF || write.attributeId !== ATTRIBUTES.ON_OFF) {
      return Promise.resolve(false);
    }
    if (typeof write.value !== 'boolean') {
      this.logger.error(
        `[ReconciliationEngine] Ignoring non-boolean OnOff write on endpoint ${write.endpointId}`
      );
      return Promise.resolve(false);
    }

    return this.queueCmd(write.endpointId, write.value);
  }

  /**
   * Rebuild registry entries from stored records, resuming their endpoints
   */
  restoreDevices(records: DeviceRecord[]): Promise<number> {
    return this.lock.run(async () => {
      let restored = 0;
      for (const record of records) {
        if (!deviceKeySuffix(record.deviceId)) {
          this.logger.error(`[ReconciliationEngine] Skipping stored record with malformed id '${record.deviceId}'`);
          continue;
        }
        if (this.registry.getDevice(record.deviceId)) continue;

        this.registry.setDevice(await this.restoreDevice(record));
        restored++;
      }
      return restored;
    });
  }

  // ===========================================================================
  // Report steps
  // ===========================================================================

  private async adoptOrCreateDevice(deviceId: string, suffix: string): Promise<BridgeDevice | null> {
    const stored = this.store.loadDevice(suffix);
    if (stored && stored.deviceId !== deviceId) {
      this.logger.error(
        `[ReconciliationEngine] Dropping report from '${deviceId}': stored key suffix '${suffix}' belongs to '${stored.deviceId}'`
      );
      return null;
    }
    if (stored) {
      this.logger.log(`[ReconciliationEngine] Adopting stored record for '${deviceId}'`);
      return this.restoreDevice(stored);
    }

    this.logger.log(`[ReconciliationEngine] New device '${deviceId}'`);
    return { record: createDeviceRecord(deviceId), handles: {} };
  }

  private async restoreDevice(record: DeviceRecord): Promise<BridgeDevice> {
    const device: BridgeDevice = { record, handles: {} };

    for (const capability of CAPABILITIES) {
      const endpointId = record.endpoints[capability];
      if (endpointId === 0) continue;

      this.allocator.observe(endpointId);
      try {
        await this.endpoints.resume(device, capability, endpointId);
      } catch (error) {
        this.logger.error(
          `[ReconciliationEngine] Resume failed for '${record.deviceId}' ${capability}, will recreate on next report: ${describeError(error)}`
        );
      }
    }
    return device;
  }

  private async ensureEndpoints(device: BridgeDevice, capabilities: Capability[]): Promise<void> {
    for (const capability of capabilities) {
      if (device.record.endpoints[capability] !== 0 && device.handles[capability]) {
        continue;
      }
      try {
        await this.endpoints.create(device, capability);
      } catch (error) {
        this.logger.error(
          `[ReconciliationEngine] Failed to create ${capability} endpoint for '${device.record.deviceId}', retrying on next report: ${describeError(error)}`
        );
      }
    }
  }

  private dropNonFinite(report: MeshReport): MeshReport {
    const { deviceId, temperature, humidity, relayState } = report;
    const kept: MeshReport = { deviceId };

    if (temperature !== undefined) {
      if (Number.isFinite(temperature)) kept.temperature = temperature;
      else this.logger.error(`[ReconciliationEngine] Ignoring non-finite temperature from '${deviceId}'`);
    }
    if (humidity !== undefined) {
      if (Number.isFinite(humidity)) kept.humidity = humidity;
      else this.logger.error(`[ReconciliationEngine] Ignoring non-finite humidity from '${deviceId}'`);
    }
    if (relayState !== undefined) kept.relayState = relayState;
    return kept;
  }

  private mergeReport(device: BridgeDevice, report: MeshReport): void {
    const { lastKnown } = device.record;
    if (report.temperature !== undefined) lastKnown.temperature = report.temperature;
    if (report.humidity !== undefined) lastKnown.humidity = report.humidity;
    if (report.relayState !== undefined) lastKnown.relayState = report.relayState;
  }

  private persist(device: BridgeDevice): void {
    try {
      this.store.saveDevice(device.record);
    } catch (error) {
      const details = error instanceof BridgeError ? ` ${JSON.stringify(error.details)}` : '';
      this.logger.error(
        `[ReconciliationEngine] Failed to save '${device.record.deviceId}': ${describeError(error)}${details}`
      );
    }
  }

  private deliver(deviceId: string, relayState: boolean): void {
    this.logger.log(
      `[ReconciliationEngine] Sending command to '${deviceId}': relay=${relayState ? 'ON' : 'OFF'}`
    );

    this.transport
      .sendRelayCommand(deviceId, relayState)
      .then((sent) => {
        if (!sent) {
          this.logger.error(`[ReconciliationEngine] Transport did not accept command for '${deviceId}'`);
        }
      })
      .catch((error: unknown) => {
        this.logger.error(
          `[ReconciliationEngine] Failed to send command to '${deviceId}': ${describeError(error)}`
        );
      });
  }

  private async pushAttributes(device: BridgeDevice, options: { includeRelay: boolean }): Promise<void> {
    const { temperature, humidity, relayState } = device.record.lastKnown;

    if (temperature !== undefined) {
      await this.push(device, 'temperature', {
        clusterId: CLUSTERS.TEMPERATURE_MEASUREMENT,
        attributeId: ATTRIBUTES.MEASURED_VALUE,
      }, () => celsiusToMeasuredValue(temperature));
    }
    if (humidity !== undefined) {
      await this.push(device, 'humidity', {
        clusterId: CLUSTERS.RELATIVE_HUMIDITY_MEASUREMENT,
        attributeId: ATTRIBUTES.MEASURED_VALUE,
      }, () => humidityToMeasuredValue(humidity));
    }
    if (options.includeRelay && relayState !== undefined) {
      await this.push(device, 'plug', {
        clusterId: CLUSTERS.ON_OFF,
        attributeId: ATTRIBUTES.ON_OFF,
      }, () => relayState);
    }
  }

  /**
   * The mesh flag only covers the synchronous part of updateAttribute(),
   * where the framework echoes our own write. Controller writes arriving
   * while the update settles are real commands.
   */
  private async push(
    device: BridgeDevice,
    capability: Capability,
    path: AttributePath,
    encode: () => AttributeValue
  ): Promise<void> {
    const handle = device.handles[capability];
    if (!handle) return;

    let update: Promise<void>;
    this.meshWriteDepth++;
    try {
      update = this.sink.updateAttribute(handle, path, encode());
    } catch (error) {
      update = Promise.reject(error);
    } finally {
      this.meshWriteDepth--;
    }

    try {
      await update;
    } catch (error) {
      this.logger.error(
        `[ReconciliationEngine] Failed to update ${capability} on endpoint ${handle.endpointId}: ${describeError(error)}`
      );
    }
  }
}

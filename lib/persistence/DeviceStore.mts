/**
 * Device Store for the Mesh Bridge
 *
 * One record per device keyed by its id suffix, plus the global endpoint
 * counter. Only the registry talks to it after startup.
 */

import {
  BRIDGE_ERROR_CODES,
  BridgeError,
  LIMITS,
  STORE_KEYS,
  describeError,
} from '../BridgeProtocol.mjs';
import {
  decodeDeviceRecord,
  decodeGlobal,
  deviceKey,
  deviceKeySuffix,
  encodeDeviceRecord,
  encodeGlobal,
} from './RecordCodec.mjs';
import type { KeyValueStore } from './KeyValueStore.mjs';
import type { DeviceRecord, Logger } from '../types.mjs';

// ============================================================================
// DeviceStore Class
// ============================================================================

export class DeviceStore {
  private readonly kv: KeyValueStore;
  private readonly logger: Logger;

  constructor(kv: KeyValueStore, logger: Logger = console) {
    this.kv = kv;
    this.logger = logger;
  }

  /**
   * Next endpoint id as persisted (1 when absent or unreadable)
   */
  readNextEndpointId(): number {
    const raw = this.kv.get(STORE_KEYS.GLOBAL);
    if (raw === undefined) {
      return LIMITS.FIRST_ENDPOINT_ID;
    }

    try {
      return decodeGlobal(raw);
    } catch (error) {
      this.logger.error(`[DeviceStore] Failed to decode global record: ${describeError(error)}`);
      return LIMITS.FIRST_ENDPOINT_ID;
    }
  }

  writeNextEndpointId(nextEndpointId: number): void {
    this.write(STORE_KEYS.GLOBAL, encodeGlobal(nextEndpointId));
  }

  /**
   * Persist a device record under its suffix key.
   * Throws INVALID_DEVICE_ID, SUFFIX_COLLISION or STORE_WRITE_FAILED.
   */
  saveDevice(record: DeviceRecord): void {
    const suffix = deviceKeySuffix(record.deviceId);
    if (!suffix) {
      throw new BridgeError(BRIDGE_ERROR_CODES.INVALID_DEVICE_ID, { deviceId: record.deviceId });
    }

    const key = deviceKey(suffix);
    const existing = this.loadDevice(suffix);
    if (existing && existing.deviceId !== record.deviceId) {
      throw new BridgeError(BRIDGE_ERROR_CODES.SUFFIX_COLLISION, {
        key,
        storedDeviceId: existing.deviceId,
        deviceId: record.deviceId,
      });
    }

    this.write(key, encodeDeviceRecord(record));
    this.logger.log(
      `[DeviceStore] Saved device: ${record.deviceId} (plug=${record.endpoints.plug}, temperature=${record.endpoints.temperature}, humidity=${record.endpoints.humidity})`
    );
  }

  /**
   * Load one device by key suffix. Unreadable records are logged and treated as absent.
   */
  loadDevice(suffix: string): DeviceRecord | null {
    const key = deviceKey(suffix);
    const raw = this.kv.get(key);
    if (raw === undefined) return null;

    try {
      return decodeDeviceRecord(raw);
    } catch (error) {
      this.logger.error(`[DeviceStore] Failed to decode device ${key}: ${describeError(error)}`);
      return null;
    }
  }

  loadAllDevices(): DeviceRecord[] {
    const devices: DeviceRecord[] = [];

    for (const key of this.kv.keys(STORE_KEYS.DEVICE_PREFIX)) {
      const device = this.loadDevice(key.slice(STORE_KEYS.DEVICE_PREFIX.length));
      if (device) {
        devices.push(device);
      }
    }

    this.logger.log(`[DeviceStore] Loaded ${devices.length} devices`);
    return devices;
  }

  /**
   * Remove every bridge record (devices and counter)
   */
  eraseAll(): number {
    const removed = this.kv.clear();
    this.logger.log(`[DeviceStore] Erased all bridge data (${removed} records)`);
    return removed;
  }

  private write(key: string, value: string): void {
    try {
      this.kv.set(key, value);
    } catch (error) {
      throw new BridgeError(BRIDGE_ERROR_CODES.STORE_WRITE_FAILED, { key }, { cause: error });
    }
  }
}

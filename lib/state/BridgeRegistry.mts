/**
 * Bridge Registry for the Mesh Bridge
 *
 * In-memory set of known devices with their live endpoint handles.
 * Source of truth while running; rebuilt from the device store at startup.
 */

import { deviceKeySuffix } from '../persistence/RecordCodec.mjs';
import { CAPABILITIES } from '../types.mjs';
import type {
  Capability,
  DeviceRecord,
  DeviceSnapshot,
  EndpointHandle,
  PendingCommand,
} from '../types.mjs';

/**
 * Registry entry for one device
 */
export interface BridgeDevice {
  record: DeviceRecord;
  /** Runtime only - framework handles per capability */
  handles: Partial<Record<Capability, EndpointHandle>>;
  /** Epoch ms of the last report, unset until heard from */
  lastSeenAt?: number;
}

export function createDeviceRecord(deviceId: string): DeviceRecord {
  return {
    deviceId,
    endpoints: { plug: 0, temperature: 0, humidity: 0 },
    lastKnown: {},
  };
}

// ============================================================================
// BridgeRegistry Class
// ============================================================================

export class BridgeRegistry {
  private devices: Map<string, BridgeDevice> = new Map();

  /**
   * Add or replace a device
   */
  setDevice(device: BridgeDevice): void {
    this.devices.set(device.record.deviceId, device);
  }

  /**
   * Get a device by ID
   */
  getDevice(deviceId: string): BridgeDevice | undefined {
    return this.devices.get(deviceId);
  }

  /**
   * Find the device stored under the same key suffix
   */
  findBySuffix(suffix: string): BridgeDevice | undefined {
    for (const device of this.devices.values()) {
      if (deviceKeySuffix(device.record.deviceId) === suffix) {
        return device;
      }
    }
    return undefined;
  }

  /**
   * Find the device owning a plug endpoint
   */
  findByPlugEndpoint(endpointId: number): BridgeDevice | undefined {
    if (endpointId === 0) return undefined;

    for (const device of this.devices.values()) {
      if (device.record.endpoints.plug === endpointId) {
        return device;
      }
    }
    return undefined;
  }

  /**
   * Get all devices
   */
  getAllDevices(): BridgeDevice[] {
    return Array.from(this.devices.values());
  }

  /**
   * Clear all devices
   */
  clearDevices(): void {
    this.devices.clear();
  }

  /**
   * Get the number of devices
   */
  get deviceCount(): number {
    return this.devices.size;
  }

  /**
   * Detached copy of a device for callers outside the lock
   */
  snapshot(device: BridgeDevice, pendingCommand?: PendingCommand): DeviceSnapshot {
    const { record } = device;
    const activeCapabilities = CAPABILITIES.filter(
      (capability) => device.handles[capability] !== undefined
    );

    return {
      deviceId: record.deviceId,
      endpoints: { ...record.endpoints },
      lastKnown: { ...record.lastKnown },
      activeCapabilities,
      lastSeenAt: device.lastSeenAt,
      pendingCommand: pendingCommand ? { ...pendingCommand } : undefined,
    };
  }
}

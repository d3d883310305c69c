/**
 * Endpoint Lifecycle Manager for the Mesh Bridge
 *
 * Creates bridged endpoints for device capabilities, or resumes them from
 * stored ids at startup. Every endpoint goes through the same sequence:
 * instantiate → label → enable → activate.
 *
 * Activation is an explicit hook because endpoints added after the framework
 * started never get its one-time cluster initialization. The default replays
 * that initialization; a different framework can pass its own activator.
 */

import {
  BRIDGE_ERROR_CODES,
  BridgeError,
  CAPABILITY_DEVICE_TYPES,
  getDeviceTypeName,
} from '../BridgeProtocol.mjs';
import { clampLabel } from '../utils/ValueConverters.mjs';
import type { IdentifierAllocator } from '../state/IdentifierAllocator.mjs';
import type { BridgeDevice } from '../state/BridgeRegistry.mjs';
import type { ReentrantLock } from '../utils/ReentrantLock.mjs';
import type {
  Capability,
  EndpointActivator,
  EndpointFramework,
  EndpointHandle,
  Logger,
} from '../types.mjs';

/**
 * Run each cluster's initialization once on a dynamically added endpoint
 */
export const replayClusterInitialization: EndpointActivator = async (framework, handle) => {
  for (const cluster of framework.listClusters(handle)) {
    await framework.initializeCluster(handle, cluster);
  }
};

export function endpointLabel(deviceId: string, capability: Capability): string {
  return clampLabel(`${deviceId} ${capability}`);
}

export interface EndpointLifecycleOptions {
  framework: EndpointFramework;
  allocator: IdentifierAllocator;
  lock: ReentrantLock;
  aggregatorEndpointId: number;
  activateEndpoint?: EndpointActivator;
  logger?: Logger;
}

// ============================================================================
// EndpointLifecycleManager Class
// ============================================================================

export class EndpointLifecycleManager {
  private readonly framework: EndpointFramework;
  private readonly allocator: IdentifierAllocator;
  private readonly lock: ReentrantLock;
  private readonly aggregatorEndpointId: number;
  private readonly activateEndpoint: EndpointActivator;
  private readonly logger: Logger;

  constructor(options: EndpointLifecycleOptions) {
    this.framework = options.framework;
    this.allocator = options.allocator;
    this.lock = options.lock;
    this.aggregatorEndpointId = options.aggregatorEndpointId;
    this.activateEndpoint = options.activateEndpoint ?? replayClusterInitialization;
    this.logger = options.logger ?? console;
  }

  /**
   * Create a new endpoint for a capability and record its id on the device.
   * Throws a BridgeError (ENDPOINT_CREATE_FAILED or ENDPOINT_IDS_EXHAUSTED).
   */
  create(device: BridgeDevice, capability: Capability): Promise<EndpointHandle> {
    return this.lock.run(async () => {
      const { deviceId } = device.record;
      const deviceType = CAPABILITY_DEVICE_TYPES[capability];
      const endpointId = this.allocator.allocate();

      this.logger.log(
        `[EndpointLifecycleManager] Creating endpoint ${endpointId} for '${deviceId}' (${getDeviceTypeName(deviceType)})`
      );

      let handle: EndpointHandle;
      try {
        handle = await this.framework.createEndpoint({
          aggregatorId: this.aggregatorEndpointId,
          endpointId,
          deviceType,
        });
        await this.bringUp(handle, deviceId, capability);
      } catch (error) {
        throw new BridgeError(
          BRIDGE_ERROR_CODES.ENDPOINT_CREATE_FAILED,
          { deviceId, capability, endpointId },
          { cause: error }
        );
      }

      device.record.endpoints[capability] = handle.endpointId;
      device.handles[capability] = handle;
      this.logger.log(
        `[EndpointLifecycleManager] Created endpoint ${handle.endpointId} for '${deviceId}' ${capability}`
      );
      return handle;
    });
  }

  /**
   * Re-attach to a previously allocated endpoint id (startup only).
   * On failure the capability is reset to 0 so the next report recreates it.
   */
  resume(device: BridgeDevice, capability: Capability, endpointId: number): Promise<EndpointHandle> {
    return this.lock.run(async () => {
      const { deviceId } = device.record;
      const deviceType = CAPABILITY_DEVICE_TYPES[capability];

      this.logger.log(
        `[EndpointLifecycleManager] Resuming '${deviceId}' ${capability} at endpoint ${endpointId}`
      );

      try {
        const handle = await this.framework.resumeEndpoint({ endpointId, deviceType });
        await this.bringUp(handle, deviceId, capability);
        device.record.endpoints[capability] = handle.endpointId;
        device.handles[capability] = handle;
        return handle;
      } catch (error) {
        device.record.endpoints[capability] = 0;
        delete device.handles[capability];
        throw new BridgeError(
          BRIDGE_ERROR_CODES.ENDPOINT_RESUME_FAILED,
          { deviceId, capability, endpointId },
          { cause: error }
        );
      }
    });
  }

  private async bringUp(handle: EndpointHandle, deviceId: string, capability: Capability): Promise<void> {
    await this.framework.setLabel(handle, endpointLabel(deviceId, capability));
    await this.framework.enableEndpoint(handle);
    await this.activateEndpoint(this.framework, handle);
  }
}

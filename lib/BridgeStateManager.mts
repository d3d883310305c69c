/**
 * Bridge State Manager - Facade
 *
 * Main entry point for the mesh bridge. Owns the registry, command queue,
 * device store and lock, wires the framework and transport callbacks into
 * the reconciliation engine, and rebuilds the registry at startup.
 *
 * Only ONE instance should exist per device store namespace.
 */

import { DeviceStore } from './persistence/DeviceStore.mjs';
import { BridgeRegistry } from './state/BridgeRegistry.mjs';
import { CommandQueue } from './state/CommandQueue.mjs';
import { IdentifierAllocator } from './state/IdentifierAllocator.mjs';
import { EndpointLifecycleManager } from './endpoints/EndpointLifecycleManager.mjs';
import { ReconciliationEngine } from './reconciliation/ReconciliationEngine.mjs';
import { ReentrantLock } from './utils/ReentrantLock.mjs';
import { describeError } from './BridgeProtocol.mjs';
import type { KeyValueStore } from './persistence/KeyValueStore.mjs';
import type {
  AttributeWrite,
  DeviceSnapshot,
  EndpointActivator,
  EndpointFramework,
  Logger,
  MeshReport,
  MeshTransport,
  UnsubscribeFunction,
} from './types.mjs';

export interface BridgeStateManagerOptions {
  store: KeyValueStore;
  framework: EndpointFramework;
  transport: MeshTransport;
  aggregatorEndpointId: number;
  /** Replaces the default cluster-initialization replay */
  activateEndpoint?: EndpointActivator;
  logger?: Logger;
  now?: () => number;
}

// ============================================================================
// BridgeStateManager Class
// ============================================================================

export class BridgeStateManager {
  private readonly framework: EndpointFramework;
  private readonly transport: MeshTransport;
  private readonly logger: Logger;

  // Modules
  private readonly lock: ReentrantLock;
  private readonly deviceStore: DeviceStore;
  private readonly registry: BridgeRegistry;
  private readonly commandQueue: CommandQueue;
  private readonly allocator: IdentifierAllocator;
  private readonly engine: ReconciliationEngine;

  // State
  private started: boolean = false;
  private unsubscribeWrites: UnsubscribeFunction | null = null;

  constructor(options: BridgeStateManagerOptions) {
    this.framework = options.framework;
    this.transport = options.transport;
    this.logger = options.logger ?? console;

    this.lock = new ReentrantLock();
    this.deviceStore = new DeviceStore(options.store, this.logger);
    this.registry = new BridgeRegistry();
    this.commandQueue = new CommandQueue();
    this.allocator = new IdentifierAllocator(this.deviceStore, this.lock, this.logger);

    const endpoints = new EndpointLifecycleManager({
      framework: options.framework,
      allocator: this.allocator,
      lock: this.lock,
      aggregatorEndpointId: options.aggregatorEndpointId,
      activateEndpoint: options.activateEndpoint,
      logger: this.logger,
    });

    this.engine = new ReconciliationEngine({
      registry: this.registry,
      commandQueue: this.commandQueue,
      store: this.deviceStore,
      allocator: this.allocator,
      endpoints,
      sink: options.framework,
      transport: options.transport,
      lock: this.lock,
      logger: this.logger,
      now: options.now,
    });
  }

  /**
   * Rebuild the registry from the store and start listening to both writers
   */
  async start(): Promise<void> {
    if (this.started) return;

    const records = this.deviceStore.loadAllDevices();
    this.logger.log(`[BridgeStateManager] Resuming ${records.length} devices from store`);
    const restored = await this.engine.restoreDevices(records);
    this.logger.log(
      `[BridgeStateManager] Restored ${restored} devices, next endpoint ID ${this.allocator.peek()}`
    );

    this.unsubscribeWrites = this.framework.onAttributeWrite((write) => {
      this.handleAttributeWrite(write).catch((error: unknown) => {
        this.logger.error(`[BridgeStateManager] Attribute write handling failed: ${describeError(error)}`);
      });
    });

    this.transport.setOnReport((report) => {
      this.onReport(report).catch((error: unknown) => {
        this.logger.error(
          `[BridgeStateManager] Report handling failed for '${report.deviceId}': ${describeError(error)}`
        );
      });
    });

    this.started = true;
  }

  /**
   * Stop reacting to framework writes and mesh reports
   */
  stop(): void {
    this.unsubscribeWrites?.();
    this.unsubscribeWrites = null;
    this.transport.setOnReport(() => undefined);
    this.started = false;
  }

  // ===========================================================================
  // Public API - Entry Points
  // ===========================================================================

  onReport(report: MeshReport): Promise<void> {
    return this.engine.onReport(report);
  }

  queueCmd(endpointId: number, relayState: boolean): Promise<boolean> {
    return this.engine.queueCmd(endpointId, relayState);
  }

  handleAttributeWrite(write: AttributeWrite): Promise<boolean> {
    return this.engine.handleAttributeWrite(write);
  }

  // ===========================================================================
  // Public API - Administration
  // ===========================================================================

  /**
   * Erase every bridge record and forget all devices.
   * Endpoints already live in the framework stay until it restarts.
   */
  eraseAll(): Promise<number> {
    return this.lock.run(() => {
      const removed = this.deviceStore.eraseAll();
      this.registry.clearDevices();
      this.commandQueue.clear();
      this.allocator.reset();
      this.logger.log('[BridgeStateManager] Erased all bridge data');
      return removed;
    });
  }

  // ===========================================================================
  // Public API - Device Access
  // ===========================================================================

  getDevices(): DeviceSnapshot[] {
    return this.registry
      .getAllDevices()
      .map((device) =>
        this.registry.snapshot(device, this.commandQueue.get(device.record.deviceId))
      );
  }

  getDevice(deviceId: string): DeviceSnapshot | undefined {
    const device = this.registry.getDevice(deviceId);
    return device
      ? this.registry.snapshot(device, this.commandQueue.get(deviceId))
      : undefined;
  }

  get deviceCount(): number {
    return this.registry.deviceCount;
  }

  get nextEndpointId(): number {
    return this.allocator.peek();
  }

  get isStarted(): boolean {
    return this.started;
  }
}

/**
 * Identifier Allocator for the Mesh Bridge
 *
 * Hands out endpoint ids from the persisted counter. Ids only ever grow;
 * a failed counter commit is retried on the next registry mutation and the
 * in-memory high-water mark keeps the failed id from being handed out again.
 */

import {
  BRIDGE_ERROR_CODES,
  BridgeError,
  LIMITS,
  describeError,
} from '../BridgeProtocol.mjs';
import type { DeviceStore } from '../persistence/DeviceStore.mjs';
import type { ReentrantLock } from '../utils/ReentrantLock.mjs';
import type { Logger } from '../types.mjs';

export class IdentifierAllocator {
  private readonly store: DeviceStore;
  private readonly lock: ReentrantLock;
  private readonly logger: Logger;

  private highWater: number = LIMITS.FIRST_ENDPOINT_ID;
  private pendingCommit: number | null = null;

  constructor(store: DeviceStore, lock: ReentrantLock, logger: Logger = console) {
    this.store = store;
    this.lock = lock;
    this.logger = logger;
  }

  /**
   * Next id that allocate() would return
   */
  peek(): number {
    return Math.max(this.store.readNextEndpointId(), this.highWater);
  }

  /**
   * Allocate the next endpoint id. Caller must hold the registry lock.
   */
  allocate(): number {
    if (!this.lock.isHeld()) {
      throw new BridgeError(BRIDGE_ERROR_CODES.LOCK_NOT_HELD, { operation: 'allocate' });
    }

    const id = this.peek();
    if (id > LIMITS.MAX_ENDPOINT_ID) {
      throw new BridgeError(BRIDGE_ERROR_CODES.ENDPOINT_IDS_EXHAUSTED, { next: id });
    }

    this.highWater = id + 1;
    this.commit(id + 1);
    this.logger.log(`[IdentifierAllocator] Allocated endpoint ID: ${id}`);
    return id;
  }

  /**
   * Raise the high-water mark past an id found in a stored record
   */
  observe(endpointId: number): void {
    if (endpointId >= this.highWater) {
      this.highWater = endpointId + 1;
    }
  }

  /**
   * Retry a counter write that failed earlier
   */
  flushPending(): void {
    if (this.pendingCommit !== null) {
      this.commit(this.pendingCommit);
    }
  }

  get hasPendingCommit(): boolean {
    return this.pendingCommit !== null;
  }

  /**
   * Forget the in-memory state after the store was erased
   */
  reset(): void {
    this.highWater = LIMITS.FIRST_ENDPOINT_ID;
    this.pendingCommit = null;
  }

  private commit(nextEndpointId: number): void {
    try {
      this.store.writeNextEndpointId(nextEndpointId);
      this.pendingCommit = null;
    } catch (error) {
      this.pendingCommit = nextEndpointId;
      this.logger.error(
        `[IdentifierAllocator] Failed to commit counter ${nextEndpointId}: ${describeError(error)}`
      );
    }
  }
}

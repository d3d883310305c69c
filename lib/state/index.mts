/**
 * State Management - Public API
 *
 * Barrel exports for the registry, command queue and id allocation.
 */

export {
  BridgeRegistry,
  createDeviceRecord,
  type BridgeDevice,
} from './BridgeRegistry.mjs';

export { CommandQueue } from './CommandQueue.mjs';

export { IdentifierAllocator } from './IdentifierAllocator.mjs';

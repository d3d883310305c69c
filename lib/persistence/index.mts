/**
 * Persistence - Public API
 *
 * Barrel exports for the key-value backend, record codec and device store.
 */

export { DeviceStore } from './DeviceStore.mjs';

export { SqliteKeyValueStore, type KeyValueStore } from './KeyValueStore.mjs';

export {
  deviceKeySuffix,
  deviceKey,
  encodeDeviceRecord,
  decodeDeviceRecord,
  encodeGlobal,
  decodeGlobal,
  type StoredDevice,
  type StoredGlobal,
} from './RecordCodec.mjs';

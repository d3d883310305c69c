/**
 * Mesh Bridge Protocol Constants
 *
 * Device types, cluster/attribute ids, storage keys and error codes used
 * across the bridge.
 */

import type { Capability } from './types.mjs';

/**
 * Framework device types used for bridged endpoints
 */
export const DEVICE_TYPES = {
  ON_OFF_PLUG_IN_UNIT: 0x010a,
  TEMPERATURE_SENSOR: 0x0302,
  HUMIDITY_SENSOR: 0x0307,
} as const;

export type DeviceType = (typeof DEVICE_TYPES)[keyof typeof DEVICE_TYPES];

/**
 * Device type each capability is bridged as
 */
export const CAPABILITY_DEVICE_TYPES: Record<Capability, DeviceType> = {
  plug: DEVICE_TYPES.ON_OFF_PLUG_IN_UNIT,
  temperature: DEVICE_TYPES.TEMPERATURE_SENSOR,
  humidity: DEVICE_TYPES.HUMIDITY_SENSOR,
};

/**
 * Cluster ids
 */
export const CLUSTERS = {
  ON_OFF: 0x0006,
  TEMPERATURE_MEASUREMENT: 0x0402,
  RELATIVE_HUMIDITY_MEASUREMENT: 0x0405,
} as const;

/**
 * Attribute ids (per cluster)
 */
export const ATTRIBUTES = {
  ON_OFF: 0x0000,
  MEASURED_VALUE: 0x0000,
} as const;

/**
 * Device store layout
 */
export const STORE_KEYS = {
  GLOBAL: 'global',
  DEVICE_PREFIX: 'dev-',
  DEFAULT_NAMESPACE: 'bridge',
} as const;

export const LIMITS = {
  /** Characters of the device id suffix used as the persistence key */
  DEVICE_SUFFIX_LENGTH: 4,
  /** Endpoint 0 is the root node, 0xFFFF is invalid */
  FIRST_ENDPOINT_ID: 1,
  MAX_ENDPOINT_ID: 0xfffe,
  LABEL_MAX_LENGTH: 32,
  TEMPERATURE_MIN: -27315,
  TEMPERATURE_MAX: 32767,
  HUMIDITY_MAX: 10000,
} as const;

export const TIMEOUTS = {
  RECONNECT_DELAY: 5000,
} as const;

/**
 * Error Codes
 */
export const BRIDGE_ERROR_CODES = {
  INVALID_DEVICE_ID: 'INVALID_DEVICE_ID',
  SUFFIX_COLLISION: 'SUFFIX_COLLISION',
  DECODE_FAILED: 'DECODE_FAILED',
  STORE_WRITE_FAILED: 'STORE_WRITE_FAILED',
  ENDPOINT_CREATE_FAILED: 'ENDPOINT_CREATE_FAILED',
  ENDPOINT_RESUME_FAILED: 'ENDPOINT_RESUME_FAILED',
  ENDPOINT_IDS_EXHAUSTED: 'ENDPOINT_IDS_EXHAUSTED',
  LOCK_NOT_HELD: 'LOCK_NOT_HELD',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type BridgeErrorCode = (typeof BRIDGE_ERROR_CODES)[keyof typeof BRIDGE_ERROR_CODES];

/**
 * Error Messages
 */
export const BRIDGE_ERROR_MESSAGES: Record<BridgeErrorCode, string> = {
  [BRIDGE_ERROR_CODES.INVALID_DEVICE_ID]: 'Device id has no valid key suffix',
  [BRIDGE_ERROR_CODES.SUFFIX_COLLISION]: 'Device key suffix already belongs to another device',
  [BRIDGE_ERROR_CODES.DECODE_FAILED]: 'Stored record could not be decoded',
  [BRIDGE_ERROR_CODES.STORE_WRITE_FAILED]: 'Failed to write to the device store',
  [BRIDGE_ERROR_CODES.ENDPOINT_CREATE_FAILED]: 'Framework rejected endpoint creation',
  [BRIDGE_ERROR_CODES.ENDPOINT_RESUME_FAILED]: 'Framework rejected endpoint resumption',
  [BRIDGE_ERROR_CODES.ENDPOINT_IDS_EXHAUSTED]: 'No endpoint ids left to allocate',
  [BRIDGE_ERROR_CODES.LOCK_NOT_HELD]: 'Operation requires the registry lock',
  [BRIDGE_ERROR_CODES.INVALID_CONFIG]: 'Invalid bridge configuration',
};

/**
 * Bridge error with code and details
 */
export class BridgeError extends Error {
  readonly code: BridgeErrorCode;
  readonly details: unknown;

  constructor(code: BridgeErrorCode, details: unknown = null, options?: { cause?: unknown }) {
    super(BRIDGE_ERROR_MESSAGES[code], options);
    this.name = 'BridgeError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Helper function to get a device type name from its id
 */
export function getDeviceTypeName(deviceType: number): string {
  const entry = Object.entries(DEVICE_TYPES).find(
    ([, value]) => value === deviceType
  );
  return entry ? entry[0] : `UNKNOWN_0x${deviceType.toString(16)}`;
}

/**
 * Helper function to format an error for log output
 */
export function describeError(error: unknown): string {
  if (error instanceof BridgeError) {
    return `${error.code}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Record Codec for the Device Store
 *
 * Stored layout (JSON):
 *   dev-<suffix> → { device_id, plug_endpoint_id, temp_endpoint_id,
 *                    humidity_endpoint_id, has_temperature, temperature,
 *                    has_humidity, humidity, has_relay_state, relay_state }
 *   global       → { next_endpoint_id }
 */

import { z } from 'zod';
import { BRIDGE_ERROR_CODES, BridgeError, LIMITS, STORE_KEYS } from '../BridgeProtocol.mjs';
import type { DeviceRecord, LastKnownValues } from '../types.mjs';

const endpointIdSchema = z.number().int().min(0).max(LIMITS.MAX_ENDPOINT_ID);

const storedDeviceSchema = z.object({
  device_id: z.string().min(1),
  plug_endpoint_id: endpointIdSchema,
  temp_endpoint_id: endpointIdSchema,
  humidity_endpoint_id: endpointIdSchema,
  has_temperature: z.boolean(),
  temperature: z.number(),
  has_humidity: z.boolean(),
  humidity: z.number(),
  has_relay_state: z.boolean(),
  relay_state: z.boolean(),
});

const storedGlobalSchema = z.object({
  next_endpoint_id: z.number().int().min(LIMITS.FIRST_ENDPOINT_ID),
});

export type StoredDevice = z.infer<typeof storedDeviceSchema>;
export type StoredGlobal = z.infer<typeof storedGlobalSchema>;

const hexSuffixRegex = /^[0-9a-f]+$/i;

/**
 * Extract the key suffix from a device id: "vivid-falcon-a3f2" → "a3f2"
 * Returns null when the id has no valid suffix.
 */
export function deviceKeySuffix(deviceId: string): string | null {
  const lastDash = deviceId.lastIndexOf('-');
  if (lastDash === -1) return null;

  const suffix = deviceId.slice(lastDash + 1);
  if (suffix.length !== LIMITS.DEVICE_SUFFIX_LENGTH || !hexSuffixRegex.test(suffix)) {
    return null;
  }
  return suffix.toLowerCase();
}

export function deviceKey(suffix: string): string {
  return `${STORE_KEYS.DEVICE_PREFIX}${suffix}`;
}

export function encodeDeviceRecord(record: DeviceRecord): string {
  const { lastKnown } = record;
  const stored: StoredDevice = {
    device_id: record.deviceId,
    plug_endpoint_id: record.endpoints.plug,
    temp_endpoint_id: record.endpoints.temperature,
    humidity_endpoint_id: record.endpoints.humidity,
    has_temperature: lastKnown.temperature !== undefined,
    temperature: lastKnown.temperature ?? 0,
    has_humidity: lastKnown.humidity !== undefined,
    humidity: lastKnown.humidity ?? 0,
    has_relay_state: lastKnown.relayState !== undefined,
    relay_state: lastKnown.relayState ?? false,
  };
  return JSON.stringify(stored);
}

export function decodeDeviceRecord(raw: string): DeviceRecord {
  const stored = parseStored(raw, storedDeviceSchema);

  const lastKnown: LastKnownValues = {};
  if (stored.has_temperature) lastKnown.temperature = stored.temperature;
  if (stored.has_humidity) lastKnown.humidity = stored.humidity;
  if (stored.has_relay_state) lastKnown.relayState = stored.relay_state;

  return {
    deviceId: stored.device_id,
    endpoints: {
      plug: stored.plug_endpoint_id,
      temperature: stored.temp_endpoint_id,
      humidity: stored.humidity_endpoint_id,
    },
    lastKnown,
  };
}

export function encodeGlobal(nextEndpointId: number): string {
  const stored: StoredGlobal = { next_endpoint_id: nextEndpointId };
  return JSON.stringify(stored);
}

export function decodeGlobal(raw: string): number {
  return parseStored(raw, storedGlobalSchema).next_endpoint_id;
}

function parseStored<T>(raw: string, schema: z.ZodType<T>): T {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new BridgeError(BRIDGE_ERROR_CODES.DECODE_FAILED, { raw }, { cause: error });
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    throw new BridgeError(BRIDGE_ERROR_CODES.DECODE_FAILED, result.error.flatten());
  }
  return result.data;
}

/**
 * Bridge configuration from environment variables
 */

import { z } from 'zod';
import { BRIDGE_ERROR_CODES, BridgeError, LIMITS, STORE_KEYS, TIMEOUTS } from './BridgeProtocol.mjs';
import type { BridgeConfig } from './types.mjs';

const envSchema = z.object({
  BRIDGE_AGGREGATOR_ENDPOINT_ID: z.coerce.number().int().min(1).max(LIMITS.MAX_ENDPOINT_ID).default(1),
  BRIDGE_DB_PATH: z.string().min(1).default('./data/bridge.db'),
  BRIDGE_STORE_NAMESPACE: z.string().min(1).default(STORE_KEYS.DEFAULT_NAMESPACE),
  MESH_GATEWAY_URL: z
    .string()
    .url()
    .refine((value) => /^wss?:\/\//i.test(value), { message: 'Must be a ws:// or wss:// URL' }),
  MESH_RECONNECT_DELAY_MS: z.coerce.number().int().min(0).default(TIMEOUTS.RECONNECT_DELAY),
});

export type BridgeEnv = z.infer<typeof envSchema>;

/**
 * Validate the environment into a BridgeConfig.
 * Throws BridgeError(INVALID_CONFIG) listing every offending variable.
 */
export function loadBridgeConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new BridgeError(BRIDGE_ERROR_CODES.INVALID_CONFIG, { problems }, { cause: parsed.error });
  }

  const values = parsed.data;
  return {
    aggregatorEndpointId: values.BRIDGE_AGGREGATOR_ENDPOINT_ID,
    databasePath: values.BRIDGE_DB_PATH,
    storeNamespace: values.BRIDGE_STORE_NAMESPACE,
    gatewayUrl: values.MESH_GATEWAY_URL,
    reconnectDelay: values.MESH_RECONNECT_DELAY_MS,
  };
}

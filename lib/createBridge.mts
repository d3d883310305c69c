/**
 * Wires a bridge from configuration: SQLite device store, gateway
 * connection and the caller's endpoint framework.
 */

import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { BridgeStateManager } from './BridgeStateManager.mjs';
import { MeshGatewayConnection } from './connection/MeshGatewayConnection.mjs';
import { SqliteKeyValueStore } from './persistence/KeyValueStore.mjs';
import type { BridgeConfig, EndpointActivator, EndpointFramework, Logger } from './types.mjs';

export interface CreateBridgeOptions {
  activateEndpoint?: EndpointActivator;
  logger?: Logger;
}

export interface RunningBridge {
  bridge: BridgeStateManager;
  connection: MeshGatewayConnection;
  close(): void;
}

export async function createBridge(
  config: BridgeConfig,
  framework: EndpointFramework,
  options: CreateBridgeOptions = {}
): Promise<RunningBridge> {
  const logger = options.logger ?? console;

  if (config.databasePath !== ':memory:') {
    mkdirSync(path.dirname(config.databasePath), { recursive: true });
  }
  const store = new SqliteKeyValueStore(config.databasePath, config.storeNamespace);
  const connection = new MeshGatewayConnection(config.gatewayUrl, {
    reconnectDelay: config.reconnectDelay,
    logger,
  });

  const bridge = new BridgeStateManager({
    store,
    framework,
    transport: connection,
    aggregatorEndpointId: config.aggregatorEndpointId,
    activateEndpoint: options.activateEndpoint,
    logger,
  });

  const close = (): void => {
    bridge.stop();
    connection.cleanup();
    store.close();
  };

  try {
    await bridge.start();
    await connection.connect();
  } catch (error) {
    close();
    throw error;
  }

  logger.log(`[createBridge] Bridge running with ${bridge.deviceCount} devices`);
  return { bridge, connection, close };
}

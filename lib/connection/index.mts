/**
 * Connection - Public API
 *
 * Barrel exports for the gateway connection.
 */

export {
  MeshGatewayConnection,
  type ConnectionState,
  type MeshGatewayConnectionOptions,
} from './MeshGatewayConnection.mjs';

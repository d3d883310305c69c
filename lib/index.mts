/**
 * Mesh Bridge State Library - Public API
 *
 * This is the main entry point for the mesh bridge library.
 * Import from here to access all public types and utilities.
 */

// =============================================================================
// Types (from central types.mts)
// =============================================================================
export type {
  // Logging
  Logger,
  LoggerFunction,
  UnsubscribeFunction,
  // Device
  Capability,
  CapabilityEndpoints,
  LastKnownValues,
  DeviceRecord,
  PendingCommand,
  DeviceSnapshot,
  // Mesh
  MeshReport,
  RelayCommand,
  GatewayMessage,
  OnReportFn,
  MeshTransport,
  // Framework
  ClusterRef,
  EndpointHandle,
  AttributePath,
  AttributeValue,
  AttributeWrite,
  AttributeWriteListener,
  CreateEndpointRequest,
  ResumeEndpointRequest,
  AttributeSink,
  EndpointFramework,
  EndpointActivator,
  // Configuration
  BridgeConfig,
} from './types.mjs';

export { CAPABILITIES } from './types.mjs';

// =============================================================================
// Constants & Errors
// =============================================================================
export {
  DEVICE_TYPES,
  CAPABILITY_DEVICE_TYPES,
  CLUSTERS,
  ATTRIBUTES,
  STORE_KEYS,
  LIMITS,
  TIMEOUTS,
  BRIDGE_ERROR_CODES,
  BRIDGE_ERROR_MESSAGES,
  BridgeError,
  getDeviceTypeName,
  describeError,
  type DeviceType,
  type BridgeErrorCode,
} from './BridgeProtocol.mjs';

// =============================================================================
// Utilities
// =============================================================================
export {
  celsiusToMeasuredValue,
  humidityToMeasuredValue,
  clampLabel,
  ReentrantLock,
} from './utils/index.mjs';

// =============================================================================
// Persistence
// =============================================================================
export * from './persistence/index.mjs';

// =============================================================================
// State Management
// =============================================================================
export * from './state/index.mjs';

// =============================================================================
// Endpoints & Reconciliation
// =============================================================================
export * from './endpoints/index.mjs';
export * from './reconciliation/index.mjs';

// =============================================================================
// Gateway
// =============================================================================
export * from './messaging/index.mjs';
export * from './connection/index.mjs';

// =============================================================================
// Bridge
// =============================================================================
export { BridgeStateManager, type BridgeStateManagerOptions } from './BridgeStateManager.mjs';
export { loadBridgeConfig, type BridgeEnv } from './config.mjs';
export { createBridge, type CreateBridgeOptions, type RunningBridge } from './createBridge.mjs';

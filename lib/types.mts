/**
 * Mesh Bridge - Shared TypeScript Interfaces
 *
 * This file contains all shared type definitions used across the bridge.
 * All modules should import types from here to avoid duplication.
 */

// =============================================================================
// Logging
// =============================================================================

/** Logger function signature */
export type LoggerFunction = (...args: unknown[]) => void;

/**
 * Logger used by every bridge module (defaults to console)
 */
export interface Logger {
  log: LoggerFunction;
  error: LoggerFunction;
}

/**
 * Unsubscribe function returned when adding listeners
 */
export type UnsubscribeFunction = () => void;

// =============================================================================
// Device Types
// =============================================================================

/**
 * Sensor/actuator facet a mesh device may expose
 */
export type Capability = 'plug' | 'temperature' | 'humidity';

export const CAPABILITIES: readonly Capability[] = ['plug', 'temperature', 'humidity'];

/**
 * Endpoint id per capability (0 = not created yet)
 */
export type CapabilityEndpoints = Record<Capability, number>;

/**
 * Last observed values. Fields stay absent until first observed.
 */
export interface LastKnownValues {
  temperature?: number;
  humidity?: number;
  relayState?: boolean;
}

/**
 * One physical mesh device, as owned by the registry
 */
export interface DeviceRecord {
  deviceId: string;
  endpoints: CapabilityEndpoints;
  lastKnown: LastKnownValues;
}

/**
 * Outbound command waiting for the device's next report window
 */
export interface PendingCommand {
  relayState: boolean;
}

/**
 * Read-only view of a registered device
 */
export interface DeviceSnapshot extends DeviceRecord {
  /** Capabilities whose endpoint handle is live in the framework */
  activeCapabilities: Capability[];
  lastSeenAt?: number;
  pendingCommand?: PendingCommand;
}

// =============================================================================
// Mesh Types
// =============================================================================

/**
 * Decoded report from a mesh device. Absent fields were not reported.
 */
export interface MeshReport {
  deviceId: string;
  temperature?: number;
  humidity?: number;
  relayState?: boolean;
}

/**
 * Relay command issued by some router on the mesh
 */
export interface RelayCommand {
  deviceId: string;
  relayState: boolean;
}

/**
 * Gateway envelope, tagged by message type
 */
export type GatewayMessage =
  | { type: 'report'; report: MeshReport }
  | { type: 'relay_cmd'; command: RelayCommand };

/** Callback for decoded reports */
export type OnReportFn = (report: MeshReport) => void;

/**
 * Mesh transport collaborator
 */
export interface MeshTransport {
  /** Hand a relay command to the mesh. Resolves once handed off, not once acknowledged. */
  sendRelayCommand(deviceId: string, relayState: boolean): Promise<boolean>;
  setOnReport(callback: OnReportFn): void;
}

// =============================================================================
// Framework Types
// =============================================================================

/**
 * Cluster on a bridged endpoint
 */
export interface ClusterRef {
  clusterId: number;
}

/**
 * Live endpoint inside the integration framework
 */
export interface EndpointHandle {
  endpointId: number;
  deviceType: number;
}

export interface AttributePath {
  clusterId: number;
  attributeId: number;
}

export type AttributeValue = boolean | number;

/**
 * Attribute write reported by the framework
 */
export interface AttributeWrite extends AttributePath {
  endpointId: number;
  value: unknown;
}

export type AttributeWriteListener = (write: AttributeWrite) => void;

export interface CreateEndpointRequest {
  aggregatorId: number;
  endpointId: number;
  deviceType: number;
}

export interface ResumeEndpointRequest {
  endpointId: number;
  deviceType: number;
}

/**
 * Sink for attribute values pushed from the mesh
 */
export interface AttributeSink {
  updateAttribute(handle: EndpointHandle, path: AttributePath, value: AttributeValue): Promise<void>;
}

/**
 * The subset of the smart-home framework the bridge depends on.
 *
 * Implementations call attribute write listeners synchronously from inside
 * `updateAttribute` when the write originates there.
 */
export interface EndpointFramework extends AttributeSink {
  createEndpoint(request: CreateEndpointRequest): Promise<EndpointHandle>;
  resumeEndpoint(request: ResumeEndpointRequest): Promise<EndpointHandle>;
  enableEndpoint(handle: EndpointHandle): Promise<void>;
  setLabel(handle: EndpointHandle, label: string): Promise<void>;
  listClusters(handle: EndpointHandle): readonly ClusterRef[];
  initializeCluster(handle: EndpointHandle, cluster: ClusterRef): void | Promise<void>;
  onAttributeWrite(listener: AttributeWriteListener): UnsubscribeFunction;
}

/**
 * Post-creation step that makes a dynamically added endpoint live
 */
export type EndpointActivator = (
  framework: EndpointFramework,
  handle: EndpointHandle
) => Promise<void>;

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Validated runtime configuration
 */
export interface BridgeConfig {
  /** Aggregator endpoint the bridged endpoints hang under */
  aggregatorEndpointId: number;
  /** SQLite database file (":memory:" for a throwaway store) */
  databasePath: string;
  /** Store namespace owned by the bridge */
  storeNamespace: string;
  /** WebSocket URL of the mesh gateway */
  gatewayUrl: string;
  /** Reconnect delay in ms */
  reconnectDelay: number;
}

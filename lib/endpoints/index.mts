/**
 * Endpoints - Public API
 */

export {
  EndpointLifecycleManager,
  replayClusterInitialization,
  endpointLabel,
  type EndpointLifecycleOptions,
} from './EndpointLifecycleManager.mjs';

/**
 * Reconciliation - Public API
 */

export {
  ReconciliationEngine,
  reportCapabilities,
  type ReconciliationEngineOptions,
} from './ReconciliationEngine.mjs';

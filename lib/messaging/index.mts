/**
 * Messaging - Public API
 *
 * Barrel exports for gateway message handling.
 */

export {
  MessageHandler,
  parseGatewayMessage,
  encodeRelayCommand,
  type WireReportMessage,
  type WireRelayCommandMessage,
} from './MessageHandler.mjs';

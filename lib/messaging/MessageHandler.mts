/**
 * Message Handler for the Mesh Gateway
 *
 * Decodes gateway envelopes and routes device reports.
 * Relay commands issued by other routers on the mesh are observed and dropped.
 */

import { z } from 'zod';
import type { GatewayMessage, Logger, MeshReport, OnReportFn } from '../types.mjs';

// ============================================================================
// Wire Schemas
// ============================================================================

const reportMessageSchema = z.object({
  type: z.literal('report'),
  device_id: z.string().min(1),
  temperature: z.number().finite().optional(),
  humidity: z.number().finite().optional(),
  relay_state: z.boolean().optional(),
});

const relayCommandMessageSchema = z.object({
  type: z.literal('relay_cmd'),
  device_id: z.string().min(1),
  relay_state: z.boolean(),
});

const gatewayMessageSchema = z.discriminatedUnion('type', [
  reportMessageSchema,
  relayCommandMessageSchema,
]);

export type WireReportMessage = z.infer<typeof reportMessageSchema>;
export type WireRelayCommandMessage = z.infer<typeof relayCommandMessageSchema>;

/**
 * Encode an outbound relay command frame
 */
export function encodeRelayCommand(deviceId: string, relayState: boolean): string {
  const message: WireRelayCommandMessage = {
    type: 'relay_cmd',
    device_id: deviceId,
    relay_state: relayState,
  };
  return JSON.stringify(message);
}

/**
 * Decode a raw gateway frame. Returns null for anything malformed.
 */
export function parseGatewayMessage(raw: string, logger: Logger = console): GatewayMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    logger.error(`[MessageHandler] Dropping non-JSON frame: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }

  const parsed = gatewayMessageSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    logger.error(
      `[MessageHandler] Dropping malformed message: ${issue ? `${issue.path.join('.') || '<root>'} ${issue.message}` : 'unknown error'}`
    );
    return null;
  }

  const message = parsed.data;
  if (message.type === 'relay_cmd') {
    return {
      type: 'relay_cmd',
      command: { deviceId: message.device_id, relayState: message.relay_state },
    };
  }

  const report: MeshReport = { deviceId: message.device_id };
  if (message.temperature !== undefined) report.temperature = message.temperature;
  if (message.humidity !== undefined) report.humidity = message.humidity;
  if (message.relay_state !== undefined) report.relayState = message.relay_state;
  return { type: 'report', report };
}

// ============================================================================
// MessageHandler Class
// ============================================================================

export class MessageHandler {
  private readonly logger: Logger;
  private onReport?: OnReportFn;

  constructor(logger: Logger = console) {
    this.logger = logger;
  }

  /**
   * Set callback for decoded device reports
   */
  setOnReport(callback: OnReportFn): void {
    this.onReport = callback;
  }

  /**
   * Process one raw frame.
   * Returns true if the frame was a valid gateway message.
   */
  processMessage(raw: string): boolean {
    const message = parseGatewayMessage(raw, this.logger);
    if (!message) return false;

    if (message.type === 'relay_cmd') {
      this.logger.log(
        `[MessageHandler] Ignoring relay command for '${message.command.deviceId}' from another router`
      );
      return true;
    }

    this.onReport?.(message.report);
    return true;
  }
}

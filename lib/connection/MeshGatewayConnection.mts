/**
 * Mesh Gateway Connection
 *
 * Handles WebSocket lifecycle towards the mesh gateway:
 * - Connection establishment
 * - Reconnection after an established connection drops
 * - Report routing and relay command sending
 */

import WebSocket from 'ws';
import { TIMEOUTS } from '../BridgeProtocol.mjs';
import { MessageHandler, encodeRelayCommand } from '../messaging/MessageHandler.mjs';
import type { Logger, MeshTransport, OnReportFn } from '../types.mjs';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

export interface MeshGatewayConnectionOptions {
  /** Delay before reconnecting, in ms */
  reconnectDelay?: number;
  logger?: Logger;
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

// ============================================================================
// MeshGatewayConnection Class
// ============================================================================

export class MeshGatewayConnection implements MeshTransport {
  private readonly url: string;
  private readonly reconnectDelay: number;
  private readonly logger: Logger;
  private readonly messageHandler: MessageHandler;

  private ws: WebSocket | null = null;
  private state: ConnectionState = 'disconnected';
  private connectionEstablished: boolean = false;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(url: string, options: MeshGatewayConnectionOptions = {}) {
    this.url = url;
    this.reconnectDelay = options.reconnectDelay ?? TIMEOUTS.RECONNECT_DELAY;
    this.logger = options.logger ?? console;
    this.messageHandler = new MessageHandler(this.logger);
  }

  /**
   * Set callback for decoded device reports
   */
  setOnReport(callback: OnReportFn): void {
    this.messageHandler.setOnReport(callback);
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  /**
   * Connect to the gateway. Resolves once the socket is open.
   */
  connect(): Promise<void> {
    this.detachSocket();

    return new Promise((resolve, reject) => {
      this.state = 'connecting';
      const ws = new WebSocket(this.url, { perMessageDeflate: false });
      this.ws = ws;

      ws.on('open', () => {
        this.logger.log(`[MeshGatewayConnection] Connected to ${this.url}`);
        this.state = 'connected';
        this.connectionEstablished = true;
        resolve();
      });

      ws.on('message', (data: WebSocket.RawData) => {
        this.messageHandler.processMessage(rawDataToString(data));
      });

      ws.on('error', (err: Error) => {
        this.logger.error(`[MeshGatewayConnection] WebSocket error: ${err.message}`);
        reject(err);
      });

      ws.on('close', (code: number, reason: Buffer) => {
        const reasonStr = reason.toString() || 'No reason';
        this.logger.log(`[MeshGatewayConnection] Connection closed. Code: ${code}, Reason: ${reasonStr}`);

        this.state = 'disconnected';
        if (this.ws === ws) this.ws = null;
        if (this.connectionEstablished) {
          this.scheduleReconnect();
        }
      });
    });
  }

  /**
   * Hand a relay command to the gateway.
   * Resolves once the frame is written; delivery is not acknowledged.
   */
  sendRelayCommand(deviceId: string, relayState: boolean): Promise<boolean> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      this.logger.error(`[MeshGatewayConnection] Cannot send command for '${deviceId}' - WebSocket not open`);
      return Promise.resolve(false);
    }

    return new Promise((resolve, reject) => {
      ws.send(encodeRelayCommand(deviceId, relayState), (err) => {
        if (err) reject(err);
        else resolve(true);
      });
    });
  }

  /**
   * Close connection and cleanup. No reconnect follows.
   */
  cleanup(): void {
    this.connectionEstablished = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.detachSocket();
    this.state = 'disconnected';
  }

  private detachSocket(): void {
    const ws = this.ws;
    if (!ws) return;

    this.ws = null;
    ws.removeAllListeners();
    // closing a socket that is still connecting emits an error
    ws.on('error', (err: Error) => {
      this.logger.log(`[MeshGatewayConnection] Discarded socket: ${err.message}`);
    });
    ws.close();
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) return;

    this.logger.log(`[MeshGatewayConnection] Scheduling reconnect in ${this.reconnectDelay}ms...`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect().catch((err: unknown) => {
        this.logger.error(
          `[MeshGatewayConnection] Reconnection failed: ${err instanceof Error ? err.message : String(err)}`
        );
      });
    }, this.reconnectDelay);
  }
}

/**
 * Command Queue for the Mesh Bridge
 *
 * Single slot per device: the newest intent replaces any unsent one.
 * Delivery happens on the device's next report.
 */

import type { PendingCommand } from '../types.mjs';

export class CommandQueue {
  private pending: Map<string, PendingCommand> = new Map();

  /**
   * Set the pending command, returning the one it replaced
   */
  set(deviceId: string, command: PendingCommand): PendingCommand | undefined {
    const replaced = this.pending.get(deviceId);
    this.pending.set(deviceId, { ...command });
    return replaced;
  }

  get(deviceId: string): PendingCommand | undefined {
    return this.pending.get(deviceId);
  }

  /**
   * Remove and return the pending command
   */
  take(deviceId: string): PendingCommand | undefined {
    const command = this.pending.get(deviceId);
    this.pending.delete(deviceId);
    return command;
  }

  clear(): void {
    this.pending.clear();
  }

  get size(): number {
    return this.pending.size;
  }
}

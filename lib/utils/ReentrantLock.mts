/**
 * Re-entrant async lock
 *
 * Serializes registry mutation across independent callers (mesh receive,
 * framework callbacks, maintenance). A caller that already holds the lock
 * may enter it again from anywhere in its own async call chain.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

export class ReentrantLock {
  private readonly context = new AsyncLocalStorage<symbol>();
  private holder: symbol | null = null;
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run `fn` while holding the lock
   */
  async run<T>(fn: () => T | Promise<T>): Promise<T> {
    if (this.isHeld()) {
      return fn();
    }

    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    const ticket = Symbol('lock-holder');
    this.holder = ticket;
    try {
      return await this.context.run(ticket, fn);
    } finally {
      this.holder = null;
      release();
    }
  }

  /**
   * Whether the current async context holds the lock
   */
  isHeld(): boolean {
    const ticket = this.context.getStore();
    return ticket !== undefined && ticket === this.holder;
  }
}

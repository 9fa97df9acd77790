/**
 * Session Delivery Queue
 *
 * Unbounded FIFO of backend responses waiting to be spoken on one
 * satellite. Once closed the queue rejects further pushes, so nothing
 * can be routed to a session after teardown.
 */

import type { Logger } from "./bridge.js";
import type { BrokerMessage } from "./types.js";

/**
 * Options for creating a DeliveryQueue.
 */
export interface DeliveryQueueOptions {
  /** Owning session, used in log output */
  sessionId: string;
  /** Logger for debug output */
  logger?: Logger;
}

export class DeliveryQueue {
  readonly sessionId: string;
  private items: BrokerMessage[] = [];
  private head = 0;
  private closed = false;
  private logger?: Logger;

  constructor(options: DeliveryQueueOptions) {
    this.sessionId = options.sessionId;
    this.logger = options.logger;
  }

  /**
   * Append a message.
   *
   * @returns false if the queue was already closed
   */
  push(message: BrokerMessage): boolean {
    if (this.closed) {
      this.logger?.debug(`[DeliveryQueue] Dropping message for closed session ${this.sessionId}`);
      return false;
    }
    this.items.push(message);
    return true;
  }

  /**
   * Take the oldest message without waiting.
   * Returns undefined when the queue is empty.
   */
  tryShift(): BrokerMessage | undefined {
    if (this.head >= this.items.length) return undefined;

    const message = this.items[this.head];
    this.head++;

    // Compact once the consumed prefix dominates
    if (this.head > 64 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return message;
  }

  get size(): number {
    return this.items.length - this.head;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Close the queue and drop pending messages.
   * Safe to call more than once.
   */
  close(): void {
    if (this.closed) return;
    const dropped = this.size;
    this.closed = true;
    this.items = [];
    this.head = 0;
    if (dropped > 0) {
      this.logger?.debug(`[DeliveryQueue] Discarded ${dropped} pending messages for ${this.sessionId}`);
    }
  }
}

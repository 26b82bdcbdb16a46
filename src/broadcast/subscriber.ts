/**
 * Subscriber - one downstream client as seen by the BroadcastHub:
 * an opaque id, a bounded FIFO of pending records and a liveness flag.
 *
 * There is exactly one reader (the client's SubscriberSession) and one
 * writer (the hub), so the queue needs no locking beyond the event loop.
 */

import type { PriceRecord } from '../types/price.types.js';

export type SubscriberCloseReason = 'unregistered' | 'evicted' | 'shutdown';

export type TakeResult =
  | { kind: 'record'; record: PriceRecord }
  | { kind: 'idle' }
  | { kind: 'closed'; reason: SubscriberCloseReason };

interface PendingTake {
  resolve: (result: TakeResult) => void;
  timer: NodeJS.Timeout | null;
}

export class Subscriber {
  readonly id: string;
  readonly capacity: number;

  private readonly queue: PriceRecord[] = [];
  private pendingTake: PendingTake | null = null;
  private closeReason: SubscriberCloseReason | null = null;
  private closeListeners: Array<(reason: SubscriberCloseReason) => void> = [];

  constructor(id: string, capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Subscriber queue capacity must be a positive integer, got ${capacity}`);
    }
    this.id = id;
    this.capacity = capacity;
  }

  get alive(): boolean {
    return this.closeReason === null;
  }

  get pending(): number {
    return this.queue.length;
  }

  getCloseReason(): SubscriberCloseReason | null {
    return this.closeReason;
  }

  /**
   * Enqueue a record without waiting.
   *
   * @returns false when the queue is full or the subscriber is closed
   */
  offer(record: PriceRecord): boolean {
    if (this.closeReason !== null) {
      return false;
    }

    // A waiting reader means the queue is empty; hand the record over directly
    if (this.pendingTake) {
      this.settleTake({ kind: 'record', record });
      return true;
    }

    if (this.queue.length >= this.capacity) {
      return false;
    }
    this.queue.push(record);
    return true;
  }

  /**
   * Wait for the next record.
   *
   * Resolves with 'idle' if nothing arrives within idleTimeoutMs, and with
   * 'closed' once the subscriber is closed. Only one take may be pending.
   */
  take(idleTimeoutMs?: number): Promise<TakeResult> {
    const next = this.queue.shift();
    if (next) {
      return Promise.resolve({ kind: 'record', record: next });
    }
    if (this.closeReason !== null) {
      return Promise.resolve({ kind: 'closed', reason: this.closeReason });
    }
    if (this.pendingTake) {
      return Promise.reject(new Error(`Subscriber ${this.id} already has a pending take`));
    }

    return new Promise<TakeResult>(resolve => {
      const timer =
        idleTimeoutMs !== undefined && idleTimeoutMs > 0
          ? setTimeout(() => this.settleTake({ kind: 'idle' }), idleTimeoutMs)
          : null;
      this.pendingTake = { resolve, timer };
    });
  }

  /**
   * Run `listener` once when the subscriber closes, immediately if it already has.
   * Fires even while the reader is busy elsewhere and not parked in take().
   */
  onClose(listener: (reason: SubscriberCloseReason) => void): void {
    if (this.closeReason !== null) {
      listener(this.closeReason);
      return;
    }
    this.closeListeners.push(listener);
  }

  /**
   * Close the queue and drop anything still pending. Idempotent.
   *
   * @returns true only for the call that actually closed it
   */
  close(reason: SubscriberCloseReason): boolean {
    if (this.closeReason !== null) {
      return false;
    }
    this.closeReason = reason;
    this.queue.length = 0;
    this.settleTake({ kind: 'closed', reason });

    const listeners = this.closeListeners;
    this.closeListeners = [];
    for (const listener of listeners) {
      listener(reason);
    }
    return true;
  }

  private settleTake(result: TakeResult): void {
    const take = this.pendingTake;
    if (!take) {
      return;
    }
    this.pendingTake = null;
    if (take.timer) {
      clearTimeout(take.timer);
    }
    take.resolve(result);
  }
}

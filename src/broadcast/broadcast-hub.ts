/**
 * BroadcastHub - fans every published PriceRecord out to all registered
 * subscribers and owns their lifetime.
 *
 * Backpressure policy is drop-and-evict: a subscriber whose bounded queue is
 * full when a record arrives is unregistered and its queue closed with reason
 * 'evicted'; its session then tears the connection down. Publish never waits
 * on a subscriber, so its cost is O(subscribers).
 *
 * Every method runs to completion on the event loop, so register, unregister
 * and publish are atomic with respect to each other.
 */

import type { PriceRecord } from '../types/price.types.js';
import type { PriceConsumer } from '../pipeline/price-channel.js';
import { Subscriber, type SubscriberCloseReason } from './subscriber.js';
import { LogEvents, createSilentLogger, type IServiceLogger } from '../utils/service-logger.js';

// ============================================================================
// Types
// ============================================================================

export interface BroadcastHubConfig {
  /** Capacity of each subscriber's outbound queue (default: 100) */
  queueCapacity?: number;
  logger?: IServiceLogger;
}

export interface PublishResult {
  delivered: number;
  evicted: number;
}

/**
 * Thrown by register() once the hub has been shut down
 */
export class HubClosedError extends Error {
  constructor() {
    super('Broadcast hub is shut down; refusing new subscribers');
    this.name = 'HubClosedError';
  }
}

// ============================================================================
// BroadcastHub Implementation
// ============================================================================

export class BroadcastHub implements PriceConsumer {
  readonly name = 'broadcast-hub';

  private readonly subscribers = new Map<string, Subscriber>();
  private readonly queueCapacity: number;
  private readonly logger: IServiceLogger;
  private sequence = 0;
  private closed = false;

  constructor(config: BroadcastHubConfig = {}) {
    this.queueCapacity = config.queueCapacity ?? 100;
    this.logger = config.logger ?? createSilentLogger();
  }

  /**
   * Create a subscriber; it receives every record published from now on.
   *
   * @throws HubClosedError after shutdown()
   */
  register(): Subscriber {
    if (this.closed) {
      throw new HubClosedError();
    }

    this.sequence++;
    const subscriber = new Subscriber(`sub-${this.sequence}`, this.queueCapacity);
    this.subscribers.set(subscriber.id, subscriber);

    this.logger.info(LogEvents.SUBSCRIBER_CONNECTED, {
      subscriberId: subscriber.id,
      subscriberCount: this.subscribers.size,
    });
    return subscriber;
  }

  /**
   * Remove a subscriber and close its queue. Safe to call repeatedly and from
   * either the session's teardown or the eviction path.
   *
   * @returns true if the subscriber was registered
   */
  unregister(subscriber: Subscriber): boolean {
    return this.remove(subscriber, 'unregistered');
  }

  publish(record: PriceRecord): PublishResult {
    let delivered = 0;
    const slow: Subscriber[] = [];

    for (const subscriber of this.subscribers.values()) {
      if (subscriber.offer(record)) {
        delivered++;
      } else {
        slow.push(subscriber);
      }
    }

    for (const subscriber of slow) {
      if (this.remove(subscriber, 'evicted')) {
        this.logger.warn(LogEvents.SUBSCRIBER_EVICTED, {
          subscriberId: subscriber.id,
          symbol: record.symbol,
          reason: 'queue_full',
          subscriberCount: this.subscribers.size,
        });
      }
    }

    return { delivered, evicted: slow.length };
  }

  consume(record: PriceRecord): void {
    this.publish(record);
  }

  /**
   * Refuse new subscribers and close every queue. Idempotent.
   */
  shutdown(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const subscriber of Array.from(this.subscribers.values())) {
      this.remove(subscriber, 'shutdown');
    }
  }

  has(subscriber: Subscriber): boolean {
    return this.subscribers.get(subscriber.id) === subscriber;
  }

  get size(): number {
    return this.subscribers.size;
  }

  isClosed(): boolean {
    return this.closed;
  }

  private remove(subscriber: Subscriber, reason: SubscriberCloseReason): boolean {
    if (!this.has(subscriber)) {
      subscriber.close(reason);
      return false;
    }
    this.subscribers.delete(subscriber.id);
    subscriber.close(reason);

    if (reason !== 'evicted') {
      this.logger.info(LogEvents.SUBSCRIBER_DISCONNECTED, {
        subscriberId: subscriber.id,
        reason,
        subscriberCount: this.subscribers.size,
      });
    }
    return true;
  }
}

/**
 * PriceChannel - the single internal channel between the upstream feed and
 * the components that consume its records.
 *
 * Consumers run synchronously, in attach order, for every record. Each one
 * therefore sees records in exactly the order the feed produced them, and a
 * consumer that throws is logged and skipped without affecting the others.
 */

import type { PriceRecord } from '../types/price.types.js';
import { LogEvents, ServiceLogger, createSilentLogger, type IServiceLogger } from '../utils/service-logger.js';

export interface PriceConsumer {
  /** Name used in logs */
  readonly name: string;
  consume(record: PriceRecord): void;
}

/**
 * Write side of the channel, as seen by producers
 */
export interface PriceSink {
  publish(record: PriceRecord): void;
}

export class PriceChannel implements PriceSink {
  private readonly consumers: PriceConsumer[] = [];
  private readonly logger: IServiceLogger;
  private published = 0;

  constructor(logger: IServiceLogger = createSilentLogger()) {
    this.logger = logger;
  }

  /**
   * Add a consumer. Returns a function that detaches it.
   */
  attach(consumer: PriceConsumer): () => void {
    this.consumers.push(consumer);
    return () => {
      const index = this.consumers.indexOf(consumer);
      if (index !== -1) {
        this.consumers.splice(index, 1);
      }
    };
  }

  publish(record: PriceRecord): void {
    this.published++;
    for (const consumer of this.consumers) {
      try {
        consumer.consume(record);
      } catch (error) {
        this.logger.error(LogEvents.CONSUMER_FAILED, {
          consumer: consumer.name,
          symbol: record.symbol,
          error: ServiceLogger.sanitizeErrorMessage(error),
        });
      }
    }
  }

  getPublishedCount(): number {
    return this.published;
  }
}

/**
 * PriceStore - last-value cache keyed by symbol
 *
 * Last writer by arrival order wins; timestamps are never compared.
 * Records are frozen, so readers can share them with no copy.
 */

import type { PriceRecord } from '../types/price.types.js';
import type { PriceConsumer } from '../pipeline/price-channel.js';

export class PriceStore implements PriceConsumer {
  readonly name = 'price-store';

  private readonly records = new Map<string, PriceRecord>();

  upsert(record: PriceRecord): void {
    this.records.set(record.symbol, record);
  }

  get(symbol: string): PriceRecord | undefined {
    return this.records.get(symbol);
  }

  /**
   * Point-in-time copy of every known record, in first-seen symbol order
   */
  getAll(): PriceRecord[] {
    return Array.from(this.records.values());
  }

  consume(record: PriceRecord): void {
    this.upsert(record);
  }

  get size(): number {
    return this.records.size;
  }
}

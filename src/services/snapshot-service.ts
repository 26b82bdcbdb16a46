/**
 * SnapshotService - read-only point-in-time queries over the PriceStore.
 *
 * Lookups are synchronous map reads, so a query can never hold up the
 * upstream feed or a broadcast.
 */

import type { PriceStore } from '../store/price-store.js';
import type { PriceRecord } from '../types/price.types.js';

export type SnapshotResult =
  | { found: true; record: PriceRecord }
  | { found: false; symbol: string };

export class SnapshotService {
  constructor(private readonly store: Pick<PriceStore, 'get' | 'getAll'>) {}

  /**
   * Latest record for a symbol; an unknown symbol is a normal "not found" result
   */
  getPrice(symbol: string): SnapshotResult {
    const normalized = symbol.trim().toUpperCase();
    const record = this.store.get(normalized);
    return record ? { found: true, record } : { found: false, symbol: normalized };
  }

  getAllPrices(): PriceRecord[] {
    return this.store.getAll();
  }
}

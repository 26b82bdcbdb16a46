/**
 * Shared Test Fixtures
 *
 * Factory functions for records and upstream frames used by unit and
 * integration tests.
 */

import { createPriceRecord, type PriceRecord } from '../types/price.types.js';

/**
 * Create a test PriceRecord with sensible defaults
 */
export function createTestRecord(overrides: Partial<PriceRecord> = {}): PriceRecord {
  return createPriceRecord({
    symbol: 'BTCUSDT',
    lastPrice: '50000.00',
    changePercent24h: '1.20',
    observedAt: 1700000000000,
    ...overrides,
  });
}

/**
 * Create a Binance 24hr ticker frame as it arrives on a combined stream
 */
export function createTickerFrame(
  symbol: string,
  lastPrice: string,
  changePercent: string,
  eventTime = 1700000000000
): string {
  return JSON.stringify({
    stream: `${symbol.toLowerCase()}@ticker`,
    data: {
      e: '24hrTicker',
      E: eventTime,
      s: symbol,
      c: lastPrice,
      P: changePercent,
    },
  });
}

/**
 * Wait for pending timers and I/O callbacks to run
 */
export function flushEventLoop(ms = 20): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Poll until `predicate` holds, failing the test after `timeoutMs`
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 3000, label = 'condition'): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Timed out waiting for ${label}`);
    }
    await flushEventLoop(10);
  }
}

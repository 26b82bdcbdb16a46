/**
 * Binance 24hr ticker frame parsing
 *
 * Single-stream frames are the ticker payload itself; combined-stream frames
 * wrap it as { stream, data }. Fields used:
 *   e  event type ("24hrTicker")
 *   E  event time (ms)
 *   s  symbol (BTCUSDT)
 *   c  last price (string)
 *   P  24h price change percent (string)
 *
 * @see https://binance-docs.github.io/apidocs/spot/en/#individual-symbol-ticker-streams
 */

import { createPriceRecord, type PriceRecord } from '../types/price.types.js';

export type DropReason =
  | 'invalid_json'
  | 'not_an_object'
  | 'unexpected_event'
  | 'missing_fields'
  | 'invalid_value'
  | 'untracked_symbol';

export type ParseResult =
  | { ok: true; record: PriceRecord }
  | { ok: false; reason: DropReason };

const TICKER_EVENT = '24hrTicker';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse one raw frame into a PriceRecord.
 *
 * @param tracked - uppercase symbols to accept; frames for anything else are dropped
 */
export function parseTickerFrame(raw: string, tracked?: ReadonlySet<string>): ParseResult {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return { ok: false, reason: 'invalid_json' };
  }

  if (!isObject(payload)) {
    return { ok: false, reason: 'not_an_object' };
  }

  const ticker = isObject(payload.data) ? payload.data : payload;

  if (typeof ticker.e === 'string' && ticker.e !== TICKER_EVENT) {
    return { ok: false, reason: 'unexpected_event' };
  }

  const { s, c, P, E } = ticker;
  if (typeof s !== 'string' || typeof c !== 'string' || typeof P !== 'string' || typeof E !== 'number') {
    return { ok: false, reason: 'missing_fields' };
  }

  let record: PriceRecord;
  try {
    record = createPriceRecord({ symbol: s, lastPrice: c, changePercent24h: P, observedAt: E });
  } catch {
    return { ok: false, reason: 'invalid_value' };
  }

  if (tracked && !tracked.has(record.symbol)) {
    return { ok: false, reason: 'untracked_symbol' };
  }

  return { ok: true, record };
}

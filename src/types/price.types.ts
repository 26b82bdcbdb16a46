/**
 * Shared price types used across the feed, store, hub and HTTP layer
 */

/**
 * One normalized observation of an instrument's price and 24h change.
 *
 * Decimals stay in the upstream's decimal-string form so no precision is lost
 * on the way to subscribers.
 */
export interface PriceRecord {
  /** Uppercase instrument identifier (e.g., 'BTCUSDT') */
  readonly symbol: string;
  /** Last traded price, always > 0 (e.g., '50010.25') */
  readonly lastPrice: string;
  /** Signed 24h change in percent (e.g., '-0.50') */
  readonly changePercent24h: string;
  /** Upstream event time in milliseconds; not monotonic per symbol */
  readonly observedAt: number;
}

/**
 * Frame pushed to downstream subscribers, one per record
 */
export interface TickerMessage {
  type: 'ticker';
  data: PriceRecord;
}

/**
 * Frame sent to an idle subscriber so intermediaries keep the socket open
 */
export interface KeepaliveMessage {
  type: 'keepalive';
}

export type OutboundMessage = TickerMessage | KeepaliveMessage;

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Check a string is a plain decimal number (no exponent, no sign prefix '+')
 */
export function isDecimalString(value: string): boolean {
  return DECIMAL_PATTERN.test(value);
}

/**
 * Build a frozen PriceRecord, validating every field.
 *
 * @throws Error if a field is out of range
 */
export function createPriceRecord(input: {
  symbol: string;
  lastPrice: string;
  changePercent24h: string;
  observedAt: number;
}): PriceRecord {
  const symbol = input.symbol.trim().toUpperCase();
  if (!/^[A-Z0-9]+$/.test(symbol)) {
    throw new Error(`Invalid symbol: ${input.symbol}`);
  }
  if (!isDecimalString(input.lastPrice) || !(parseFloat(input.lastPrice) > 0)) {
    throw new Error(`Invalid last price: ${input.lastPrice}`);
  }
  if (!isDecimalString(input.changePercent24h)) {
    throw new Error(`Invalid change percent: ${input.changePercent24h}`);
  }
  if (!Number.isSafeInteger(input.observedAt) || input.observedAt < 0) {
    throw new Error(`Invalid timestamp: ${input.observedAt}`);
  }

  return Object.freeze({
    symbol,
    lastPrice: input.lastPrice,
    changePercent24h: input.changePercent24h,
    observedAt: input.observedAt,
  });
}

export function encodeTickerMessage(record: PriceRecord): string {
  const message: TickerMessage = { type: 'ticker', data: record };
  return JSON.stringify(message);
}

export const KEEPALIVE_FRAME: string = JSON.stringify({ type: 'keepalive' } satisfies KeepaliveMessage);

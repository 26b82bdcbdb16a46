/**
 * Ticker Relay Configuration
 *
 * Every value can be overridden via environment variables (APP_ prefix).
 * The config is validated once at startup; core components treat it as
 * immutable input.
 *
 * Environment variables:
 * - APP_SYMBOLS: Tracked symbols, CSV or JSON array (default: BTCUSDT,ETHUSDT,SOLUSDT)
 * - APP_UPSTREAM_URL: Upstream stream base URL (default: wss://stream.binance.com:9443)
 * - APP_RECONNECT_MIN_DELAY_MS: Backoff floor (default: 1000)
 * - APP_RECONNECT_MAX_DELAY_MS: Backoff cap (default: 30000)
 * - APP_PING_INTERVAL_MS: Upstream heartbeat interval (default: 20000)
 * - APP_CONNECT_TIMEOUT_MS: Upstream connect timeout (default: 20000)
 * - APP_CLIENT_QUEUE_SIZE: Per-subscriber queue capacity (default: 100)
 * - APP_KEEPALIVE_MS: Idle keepalive interval for subscribers, 0 disables (default: 30000)
 * - APP_HOST / APP_PORT: Listen address (default: 0.0.0.0:8000)
 * - APP_WS_PATH: WebSocket endpoint path (default: /ws)
 * - APP_LOG_LEVEL: DEBUG | INFO | WARN | ERROR (default: INFO)
 * - APP_MAX_WS_CONNECTIONS: Total subscriber cap (default: 200)
 * - APP_MAX_WS_CONNECTIONS_PER_IP: Per-address subscriber cap (default: 10)
 * - APP_PRICE_RATE_LIMIT_PER_MINUTE: GET /price requests per address per minute (default: 120)
 * - APP_CORS_ALLOW_ORIGINS: CSV or JSON array (default: *)
 */

import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '../src/utils/service-logger.js';

export interface ServerConfig {
  readonly symbols: readonly string[];
  readonly upstreamUrl: string;
  readonly reconnectMinDelayMs: number;
  readonly reconnectMaxDelayMs: number;
  readonly pingIntervalMs: number;
  readonly connectTimeoutMs: number;
  readonly clientQueueSize: number;
  readonly keepaliveMs: number;
  readonly host: string;
  readonly port: number;
  readonly wsPath: string;
  readonly logLevel: LogLevel;
  readonly maxWsConnections: number;
  readonly maxWsConnectionsPerIp: number;
  readonly priceRateLimitPerMinute: number;
  readonly corsAllowOrigins: readonly string[];
}

/**
 * Raised when the environment does not describe a runnable configuration
 */
export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Accept a JSON array string or a CSV string; blank entries are dropped
 */
export function parseList(value: string, upper = false): string[] {
  const trimmed = value.trim();
  let items: unknown[] = trimmed.split(',');

  if (trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsed)) {
        items = parsed;
      }
    } catch {
      // Not JSON after all; fall back to CSV
      items = trimmed.split(',');
    }
  }

  const out = items.map(item => String(item).trim()).filter(item => item.length > 0);
  return upper ? out.map(item => item.toUpperCase()) : out;
}

const symbolList = z
  .string()
  .transform(value => parseList(value, true))
  .pipe(
    z
      .array(z.string().regex(/^[A-Z0-9]+$/, 'symbols must be alphanumeric'))
      .min(1, 'at least one symbol is required')
  );

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const Env = z
  .object({
    APP_SYMBOLS: symbolList.default('BTCUSDT,ETHUSDT,SOLUSDT'),
    APP_UPSTREAM_URL: z
      .string()
      .url()
      .refine(url => /^wss?:\/\//.test(url), 'upstream URL must use ws:// or wss://')
      .default('wss://stream.binance.com:9443'),
    APP_RECONNECT_MIN_DELAY_MS: positiveInt(1000),
    APP_RECONNECT_MAX_DELAY_MS: positiveInt(30000),
    APP_PING_INTERVAL_MS: positiveInt(20000),
    APP_CONNECT_TIMEOUT_MS: positiveInt(20000),
    APP_CLIENT_QUEUE_SIZE: positiveInt(100),
    APP_KEEPALIVE_MS: z.coerce.number().int().min(0).default(30000),
    APP_HOST: z.string().min(1).default('0.0.0.0'),
    APP_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
    APP_WS_PATH: z.string().startsWith('/', 'ws path must start with /').default('/ws'),
    APP_LOG_LEVEL: z
      .string()
      .transform(value => value.trim().toUpperCase())
      .pipe(z.enum(LOG_LEVELS))
      .default('INFO'),
    APP_MAX_WS_CONNECTIONS: positiveInt(200),
    APP_MAX_WS_CONNECTIONS_PER_IP: positiveInt(10),
    APP_PRICE_RATE_LIMIT_PER_MINUTE: positiveInt(120),
    APP_CORS_ALLOW_ORIGINS: z
      .string()
      .transform(value => parseList(value))
      .default('*'),
  })
  .refine(env => env.APP_RECONNECT_MAX_DELAY_MS >= env.APP_RECONNECT_MIN_DELAY_MS, {
    message: 'APP_RECONNECT_MAX_DELAY_MS must be >= APP_RECONNECT_MIN_DELAY_MS',
    path: ['APP_RECONNECT_MAX_DELAY_MS'],
  });

/**
 * Build the validated configuration from an environment map.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = Env.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return Object.freeze({
    symbols: Object.freeze([...new Set(parsed.APP_SYMBOLS)]),
    upstreamUrl: parsed.APP_UPSTREAM_URL,
    reconnectMinDelayMs: parsed.APP_RECONNECT_MIN_DELAY_MS,
    reconnectMaxDelayMs: parsed.APP_RECONNECT_MAX_DELAY_MS,
    pingIntervalMs: parsed.APP_PING_INTERVAL_MS,
    connectTimeoutMs: parsed.APP_CONNECT_TIMEOUT_MS,
    clientQueueSize: parsed.APP_CLIENT_QUEUE_SIZE,
    keepaliveMs: parsed.APP_KEEPALIVE_MS,
    host: parsed.APP_HOST,
    port: parsed.APP_PORT,
    wsPath: parsed.APP_WS_PATH,
    logLevel: parsed.APP_LOG_LEVEL,
    maxWsConnections: parsed.APP_MAX_WS_CONNECTIONS,
    maxWsConnectionsPerIp: parsed.APP_MAX_WS_CONNECTIONS_PER_IP,
    priceRateLimitPerMinute: parsed.APP_PRICE_RATE_LIMIT_PER_MINUTE,
    corsAllowOrigins: Object.freeze(parsed.APP_CORS_ALLOW_ORIGINS),
  });
}

/**
 * Service Logger
 *
 * Structured JSON logging for the ticker relay.
 * Every entry is a single-line JSON object on stdout so log collectors can
 * filter by component, event, symbol or subscriber.
 *
 * Key features:
 * - Consistent base fields: timestamp, level, component, event
 * - Minimum level filtering (DEBUG < INFO < WARN < ERROR)
 * - Base fields cannot be overridden by context
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels supported by the logger, lowest first
 */
export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Standard event names for consistent filtering
 */
export const LogEvents = {
  // Service Lifecycle
  SERVICE_STARTING: 'service_starting',
  SERVICE_STARTED: 'service_started',
  SHUTDOWN_INITIATED: 'shutdown_initiated',
  SHUTDOWN_COMPLETE: 'shutdown_complete',
  CONFIG_LOADED: 'config_loaded',
  CONFIG_ERROR: 'config_error',

  // Upstream Feed
  UPSTREAM_CONNECTING: 'upstream_connecting',
  UPSTREAM_CONNECTED: 'upstream_connected',
  UPSTREAM_DISCONNECTED: 'upstream_disconnected',
  UPSTREAM_ERROR: 'upstream_error',
  UPSTREAM_BACKOFF: 'upstream_backoff',
  UPSTREAM_STALE: 'upstream_stale',
  UPSTREAM_STOPPED: 'upstream_stopped',
  MESSAGE_DROPPED: 'message_dropped',

  // Pipeline
  CONSUMER_FAILED: 'consumer_failed',

  // Subscribers
  SUBSCRIBER_CONNECTED: 'subscriber_connected',
  SUBSCRIBER_DISCONNECTED: 'subscriber_disconnected',
  SUBSCRIBER_EVICTED: 'subscriber_evicted',
  SUBSCRIBER_REJECTED: 'subscriber_rejected',
  SUBSCRIBER_WRITE_FAILED: 'subscriber_write_failed',

  // HTTP
  RATE_LIMITED: 'rate_limited',

  // General
  ERROR: 'error',
} as const;

export type LogEventType = (typeof LogEvents)[keyof typeof LogEvents];

/**
 * Base log entry with required fields
 */
export interface BaseLogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  /** Component name (e.g., 'UpstreamFeed') */
  component: string;
  /** Event type for filtering (e.g., 'upstream_connected') */
  event: LogEventType;
  _service: string;
  _app: string;
  _env: string;
}

/**
 * Context fields for log entries (excludes base fields)
 */
export interface LogContext {
  /** Instrument symbol (e.g., 'BTCUSDT') */
  symbol?: string;
  /** Tracked symbols */
  symbols?: string[];
  /** Subscriber id (e.g., 'sub-12') */
  subscriberId?: string;
  /** Remote address of a downstream client */
  remoteAddress?: string;
  /** Current number of subscribers */
  subscriberCount?: number;
  /** Upstream URL */
  url?: string;
  /** Upstream connection state */
  state?: string;
  /** Reconnect attempt number */
  attempt?: number;
  /** Backoff delay in milliseconds */
  delayMs?: number;
  /** Reason a frame was dropped or a connection closed */
  reason?: string;
  /** WebSocket close code */
  code?: number;
  /** Listen host */
  host?: string;
  /** Listen port */
  port?: number;
  /** Shutdown signal name */
  signal?: string;
  /** Consumer name within the pipeline */
  consumer?: string;
  /** Error message */
  error?: string;
  /** Human-readable message */
  message?: string;
}

/**
 * Full log entry combining base fields and context
 */
export interface LogEntry extends BaseLogEntry, LogContext {}

/**
 * Configuration for ServiceLogger
 */
export interface ServiceLoggerConfig {
  /** Component name to include in all logs */
  component: string;
  /** Minimum level emitted (default: 'INFO') */
  level?: LogLevel;
  /** Whether to enable logging (default: true) */
  enabled?: boolean;
  /** Service name (default: 'ticker-relay') */
  service?: string;
  /** Application name (default: 'market-data') */
  app?: string;
  /** Environment (e.g., 'production', 'staging', 'development') */
  environment?: string;
}

// ============================================================================
// IServiceLogger Interface
// ============================================================================

/**
 * Interface for service loggers
 *
 * Components depend on this rather than on ServiceLogger so tests can pass a spy.
 */
export interface IServiceLogger {
  debug(event: LogEventType, context?: LogContext): void;
  info(event: LogEventType, context?: LogContext): void;
  warn(event: LogEventType, context?: LogContext): void;
  error(event: LogEventType, context?: LogContext): void;
  /** Logger for another component sharing this logger's settings */
  child(component: string): IServiceLogger;
  isEnabled(): boolean;
}

// ============================================================================
// ServiceLogger Implementation
// ============================================================================

/** Maximum error message length to prevent log bloat */
const MAX_ERROR_MESSAGE_LENGTH = 200;

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

/**
 * Structured JSON logger
 *
 * @example
 * const logger = new ServiceLogger({ component: 'UpstreamFeed' });
 *
 * logger.info(LogEvents.UPSTREAM_CONNECTED, { url: 'wss://...' });
 *
 * // Outputs:
 * // {"url":"wss://...","timestamp":"2026-01-08T14:23:45.123Z","level":"INFO","component":"UpstreamFeed",...}
 */
export class ServiceLogger implements IServiceLogger {
  private readonly config: {
    readonly component: string;
    readonly level: LogLevel;
    readonly service: string;
    readonly app: string;
    readonly environment: string;
  };
  private readonly enabled: boolean;

  constructor(config: ServiceLoggerConfig) {
    this.enabled = config.enabled ?? true;
    this.config = {
      component: config.component,
      level: config.level ?? 'INFO',
      service: config.service ?? 'ticker-relay',
      app: config.app ?? 'market-data',
      environment: config.environment ?? process.env.NODE_ENV ?? 'development',
    };
  }

  // ============================================================================
  // Public API
  // ============================================================================

  /**
   * Log a DEBUG level message
   *
   * Per-frame detail such as dropped upstream messages.
   */
  debug(event: LogEventType, context?: LogContext): void {
    this.log('DEBUG', event, context);
  }

  /**
   * Log an INFO level message
   *
   * Use for normal operational events:
   * - Service started/stopped
   * - Upstream connected
   * - Subscriber connected/disconnected
   */
  info(event: LogEventType, context?: LogContext): void {
    this.log('INFO', event, context);
  }

  /**
   * Log a WARN level message
   *
   * Use for recovered failures:
   * - Upstream connection lost, reconnect scheduled
   * - Slow subscriber evicted
   * - Request rate limited
   */
  warn(event: LogEventType, context?: LogContext): void {
    this.log('WARN', event, context);
  }

  /**
   * Log an ERROR level message
   *
   * Use for failures the service cannot recover from on its own,
   * or that indicate a bug (a pipeline consumer throwing).
   */
  error(event: LogEventType, context?: LogContext): void {
    this.log('ERROR', event, context);
  }

  child(component: string): IServiceLogger {
    return new ServiceLogger({
      component,
      level: this.config.level,
      enabled: this.enabled,
      service: this.config.service,
      app: this.config.app,
      environment: this.config.environment,
    });
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Sanitize error message to prevent log bloat
   */
  static sanitizeErrorMessage(error: unknown): string {
    const msg = error instanceof Error ? error.message : String(error);
    if (msg.length > MAX_ERROR_MESSAGE_LENGTH) {
      return msg.substring(0, MAX_ERROR_MESSAGE_LENGTH) + '...';
    }
    return msg;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private log(level: LogLevel, event: LogEventType, context?: LogContext): void {
    if (!this.enabled || LEVEL_RANK[level] < LEVEL_RANK[this.config.level]) {
      return;
    }

    // Spread context first, then base fields so context cannot override them
    const entry: LogEntry = {
      ...context,
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      event,
      _service: this.config.service,
      _app: this.config.app,
      _env: this.config.environment,
    };

    console.log(JSON.stringify(entry));
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Logger that discards everything; the default for components built without one
 */
export function createSilentLogger(): IServiceLogger {
  return new ServiceLogger({ component: 'silent', enabled: false });
}


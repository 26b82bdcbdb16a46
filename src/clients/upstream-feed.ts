/**
 * Upstream Feed - resilient Binance 24hr ticker stream client
 *
 * Keeps one logical subscription to the configured symbols alive for the
 * life of the process and pushes every valid ticker into the price channel.
 *
 * Stream formats:
 * - Single stream:   wss://stream.binance.com:9443/ws/<symbol>@ticker
 * - Combined streams: wss://stream.binance.com:9443/stream?streams=<a>@ticker/<b>@ticker
 *
 * State machine:
 *   DISCONNECTED -> CONNECTING -> CONNECTED -> BACKOFF -> CONNECTING -> ...
 *   any state -> SHUTDOWN on stop() or when the start signal aborts
 *
 * Features:
 * - Exponential backoff with cap and jitter, reset on every successful connect
 * - Connect timeout and ping/pong staleness detection
 * - Malformed frames are dropped and logged, never fatal
 *
 * @see https://binance-docs.github.io/apidocs/spot/en/#individual-symbol-ticker-streams
 */

import { EventEmitter } from 'events';
import WebSocket from 'isomorphic-ws';
import { parseTickerFrame } from './ticker-parser.js';
import { computeBackoffDelay, DEFAULT_BACKOFF_POLICY, type BackoffPolicy } from './backoff.js';
import type { PriceSink } from '../pipeline/price-channel.js';
import { LogEvents, ServiceLogger, createSilentLogger, type IServiceLogger } from '../utils/service-logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Configuration for the upstream feed
 */
export interface UpstreamFeedConfig {
  /** Symbols to subscribe to (e.g., ['BTCUSDT', 'ETHUSDT']) */
  symbols: string[];
  /** Receives every valid record, in arrival order */
  sink: PriceSink;
  /** Stream base URL (default: 'wss://stream.binance.com:9443') */
  baseUrl?: string;
  /** Reconnect backoff overrides */
  backoff?: Partial<BackoffPolicy>;
  /** Ping interval in ms for connection health check (default: 20000) */
  pingInterval?: number;
  /** Give up on a connect attempt after this many ms (default: 20000) */
  connectTimeout?: number;
  /** Terminate the socket if a clean close takes longer than this on stop (default: 5000) */
  closeTimeout?: number;
  logger?: IServiceLogger;
  /** Random source for backoff jitter (default: Math.random) */
  random?: () => number;
}

/**
 * Connection states
 */
export enum UpstreamConnectionState {
  DISCONNECTED = 'DISCONNECTED',
  CONNECTING = 'CONNECTING',
  CONNECTED = 'CONNECTED',
  BACKOFF = 'BACKOFF',
  SHUTDOWN = 'SHUTDOWN',
}

export interface UpstreamFeedStats {
  /** Frames received from upstream */
  messagesReceived: number;
  /** Records handed to the sink */
  recordsPublished: number;
  /** Frames dropped as malformed, partial or untracked */
  framesDropped: number;
  /** Successful connections, the first one included */
  connections: number;
  /** Epoch ms of the last frame, 0 if none yet */
  lastMessageAt: number;
}

const DEFAULT_BASE_URL = 'wss://stream.binance.com:9443';
const MAX_URL_LENGTH = 2048;

// ============================================================================
// UpstreamFeed Implementation
// ============================================================================

/**
 * Events:
 * - 'stateChange': (state, previous) on every transition
 * - 'connected': connection established
 * - 'disconnected': an established connection was lost or closed
 */
export class UpstreamFeed extends EventEmitter {
  private ws: WebSocket | null = null;
  private state: UpstreamConnectionState = UpstreamConnectionState.DISCONNECTED;
  private reconnectAttempts = 0;
  private lastPongTime = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private connectTimer: NodeJS.Timeout | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private signal: AbortSignal | null = null;
  private stopping: Promise<void> | null = null;

  private readonly url: string;
  private readonly tracked: ReadonlySet<string>;
  private readonly sink: PriceSink;
  private readonly backoff: BackoffPolicy;
  private readonly pingInterval: number;
  private readonly connectTimeout: number;
  private readonly closeTimeout: number;
  private readonly logger: IServiceLogger;
  private readonly random: () => number;
  private readonly stats: UpstreamFeedStats = {
    messagesReceived: 0,
    recordsPublished: 0,
    framesDropped: 0,
    connections: 0,
    lastMessageAt: 0,
  };

  private readonly boundHandleAbort: () => void;

  constructor(config: UpstreamFeedConfig) {
    super();
    if (config.symbols.length === 0) {
      throw new Error('At least one symbol is required');
    }

    this.tracked = new Set(config.symbols.map(symbol => symbol.toUpperCase()));
    this.url = UpstreamFeed.buildStreamUrl(config.baseUrl ?? DEFAULT_BASE_URL, config.symbols);
    this.sink = config.sink;
    this.backoff = { ...DEFAULT_BACKOFF_POLICY, ...config.backoff };
    this.pingInterval = config.pingInterval ?? 20000;
    this.connectTimeout = config.connectTimeout ?? 20000;
    this.closeTimeout = config.closeTimeout ?? 5000;
    this.logger = config.logger ?? createSilentLogger();
    this.random = config.random ?? Math.random;

    this.boundHandleAbort = () => {
      this.stop().catch(error => {
        this.logger.error(LogEvents.ERROR, { error: ServiceLogger.sanitizeErrorMessage(error) });
      });
    };
  }

  // ============================================================================
  // Public API
  // ============================================================================

  /**
   * Build the stream URL for a symbol set.
   *
   * @throws Error on non-alphanumeric symbols or an over-long URL
   */
  static buildStreamUrl(baseUrl: string, symbols: string[]): string {
    const streams = symbols.map(symbol => {
      const lower = symbol.toLowerCase();
      if (!/^[a-z0-9]+$/.test(lower)) {
        throw new Error(`Invalid symbol format: ${symbol}. Only alphanumeric characters allowed.`);
      }
      return `${lower}@ticker`;
    });

    const base = baseUrl.replace(/\/+$/, '');
    const url = streams.length === 1 ? `${base}/ws/${streams[0]}` : `${base}/stream?streams=${streams.join('/')}`;

    if (url.length > MAX_URL_LENGTH) {
      throw new Error(`Too many symbols: URL length exceeds ${MAX_URL_LENGTH} characters`);
    }
    return url;
  }

  /**
   * Open the upstream connection. Aborting `signal` has the same effect as stop().
   */
  start(signal?: AbortSignal): this {
    if (this.state !== UpstreamConnectionState.DISCONNECTED) {
      return this;
    }

    if (signal) {
      if (signal.aborted) {
        this.boundHandleAbort();
        return this;
      }
      this.signal = signal;
      signal.addEventListener('abort', this.boundHandleAbort, { once: true });
    }

    this.connect();
    return this;
  }

  /**
   * Stop for good: cancel any pending reconnect or connect, close the socket
   * and resolve once it is closed. No record is produced afterwards.
   */
  stop(): Promise<void> {
    if (this.stopping) {
      return this.stopping;
    }

    const wasConnected = this.state === UpstreamConnectionState.CONNECTED;
    this.transition(UpstreamConnectionState.SHUTDOWN);
    this.clearTimers();
    this.signal?.removeEventListener('abort', this.boundHandleAbort);
    this.signal = null;

    const socket = this.ws;
    this.ws = null;

    this.stopping = (socket ? this.closeSocket(socket) : Promise.resolve()).then(() => {
      if (wasConnected) {
        this.emit('disconnected');
      }
      this.logger.info(LogEvents.UPSTREAM_STOPPED, { url: this.url });
    });
    return this.stopping;
  }

  isConnected(): boolean {
    return this.state === UpstreamConnectionState.CONNECTED && this.ws?.readyState === WebSocket.OPEN;
  }

  getState(): UpstreamConnectionState {
    return this.state;
  }

  /**
   * Consecutive failed attempts since the last successful connection
   */
  getReconnectAttempts(): number {
    return this.reconnectAttempts;
  }

  getStats(): UpstreamFeedStats {
    return { ...this.stats };
  }

  getUrl(): string {
    return this.url;
  }

  // ============================================================================
  // Private Methods - Connection Management
  // ============================================================================

  private connect(): void {
    this.transition(UpstreamConnectionState.CONNECTING);
    this.logger.info(LogEvents.UPSTREAM_CONNECTING, { url: this.url, attempt: this.reconnectAttempts + 1 });

    let socket: WebSocket;
    try {
      socket = new WebSocket(this.url);
    } catch (error) {
      this.logger.warn(LogEvents.UPSTREAM_ERROR, { error: ServiceLogger.sanitizeErrorMessage(error) });
      this.scheduleReconnect();
      return;
    }

    this.ws = socket;
    // Handlers ignore events from sockets that have since been replaced
    socket.on('open', () => this.handleOpen(socket));
    socket.on('message', (data: WebSocket.RawData) => this.handleMessage(socket, data));
    socket.on('error', (error: Error) => this.handleError(socket, error));
    socket.on('close', (code: number, reason: Buffer) => this.handleClose(socket, code, reason));
    socket.on('pong', () => this.handlePong(socket));

    this.connectTimer = setTimeout(() => {
      this.connectTimer = null;
      this.dropConnection('connect_timeout');
    }, this.connectTimeout);
  }

  private handleOpen(socket: WebSocket): void {
    if (socket !== this.ws) {
      return;
    }
    this.clearTimers();
    this.transition(UpstreamConnectionState.CONNECTED);
    this.reconnectAttempts = 0;
    this.lastPongTime = Date.now();
    this.stats.connections++;
    this.logger.info(LogEvents.UPSTREAM_CONNECTED, { url: this.url, symbols: Array.from(this.tracked) });

    this.startPingTimer();
    this.emit('connected');
  }

  private handleMessage(socket: WebSocket, data: WebSocket.RawData): void {
    if (socket !== this.ws || this.state !== UpstreamConnectionState.CONNECTED) {
      return;
    }
    this.stats.messagesReceived++;
    this.stats.lastMessageAt = Date.now();

    const result = parseTickerFrame(rawDataToString(data), this.tracked);
    if (!result.ok) {
      this.stats.framesDropped++;
      this.logger.debug(LogEvents.MESSAGE_DROPPED, { reason: result.reason });
      return;
    }

    try {
      this.sink.publish(result.record);
      this.stats.recordsPublished++;
    } catch (error) {
      this.logger.error(LogEvents.CONSUMER_FAILED, {
        consumer: 'sink',
        symbol: result.record.symbol,
        error: ServiceLogger.sanitizeErrorMessage(error),
      });
    }
  }

  private handleError(socket: WebSocket, error: Error): void {
    if (socket !== this.ws) {
      return;
    }
    // A 'close' event always follows; reconnect is handled there
    this.logger.warn(LogEvents.UPSTREAM_ERROR, { error: ServiceLogger.sanitizeErrorMessage(error) });
  }

  private handleClose(socket: WebSocket, code: number, reason: Buffer): void {
    if (socket !== this.ws) {
      return;
    }
    this.ws = null;
    this.clearTimers();
    this.handleConnectionLost(`closed code=${code} reason=${reason.toString() || 'none'}`);
  }

  private handlePong(socket: WebSocket): void {
    if (socket === this.ws) {
      this.lastPongTime = Date.now();
    }
  }

  /**
   * Abandon the current socket without waiting for its close handshake
   */
  private dropConnection(reason: string): void {
    const socket = this.ws;
    if (!socket) {
      return;
    }
    this.ws = null;
    this.clearTimers();
    socket.terminate();
    this.handleConnectionLost(reason);
  }

  private handleConnectionLost(reason: string): void {
    if (this.state === UpstreamConnectionState.SHUTDOWN) {
      return;
    }
    if (this.state === UpstreamConnectionState.CONNECTED) {
      this.logger.warn(LogEvents.UPSTREAM_DISCONNECTED, { url: this.url, reason });
      this.emit('disconnected');
    } else {
      this.logger.warn(LogEvents.UPSTREAM_ERROR, { url: this.url, reason });
    }
    this.scheduleReconnect();
  }

  private closeSocket(socket: WebSocket): Promise<void> {
    if (socket.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }

    return new Promise(resolve => {
      const timer = setTimeout(() => {
        socket.terminate();
        resolve();
      }, this.closeTimeout);

      socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });

      if (socket.readyState === WebSocket.CONNECTING) {
        socket.terminate();
      } else {
        socket.close(1000, 'shutdown');
      }
    });
  }

  // ============================================================================
  // Private Methods - Heartbeat & Reconnection
  // ============================================================================

  private startPingTimer(): void {
    this.pingTimer = setInterval(() => {
      const socket = this.ws;
      if (socket?.readyState !== WebSocket.OPEN) {
        return;
      }

      const timeSinceLastPong = Date.now() - this.lastPongTime;
      if (timeSinceLastPong > this.pingInterval * 2) {
        this.logger.warn(LogEvents.UPSTREAM_STALE, { url: this.url, delayMs: timeSinceLastPong });
        this.dropConnection('stale');
        return;
      }
      socket.ping();
    }, this.pingInterval);
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) {
      return;
    }

    this.reconnectAttempts++;
    const delay = computeBackoffDelay(this.reconnectAttempts, this.backoff, this.random);
    this.transition(UpstreamConnectionState.BACKOFF);
    this.logger.warn(LogEvents.UPSTREAM_BACKOFF, { url: this.url, attempt: this.reconnectAttempts, delayMs: delay });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  private transition(next: UpstreamConnectionState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    this.emit('stateChange', next, previous);
  }

  private clearTimers(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.connectTimer) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

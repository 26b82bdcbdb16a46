/**
 * TickerServer - HTTP snapshot API plus the WebSocket broadcast endpoint.
 *
 * Owns the whole pipeline for one process:
 *
 *   UpstreamFeed -> PriceChannel -> PriceStore -> BroadcastHub -> SubscriberSession (one per socket)
 *                                       ^
 *                          SnapshotService (GET /price, /latest)
 *
 * shutdown() stops the feed, closes every subscriber with 1001, waits for
 * each session to finish and then closes the WS and HTTP servers.
 */

import { createServer, type IncomingMessage, type Server } from 'http';
import type { AddressInfo } from 'net';
import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import { WebSocketServer, type WebSocket } from 'ws';
import type { ServerConfig } from '../../config/server.config.js';
import { UpstreamFeed } from '../clients/upstream-feed.js';
import { PriceChannel } from '../pipeline/price-channel.js';
import { PriceStore } from '../store/price-store.js';
import { BroadcastHub, HubClosedError } from '../broadcast/broadcast-hub.js';
import { SubscriberSession, CloseCodes } from '../broadcast/subscriber-session.js';
import { SnapshotService } from '../services/snapshot-service.js';
import { createPriceRateLimiter } from './rate-limiter.js';
import { WsTransport } from './ws-transport.js';
import { LogEvents, ServiceLogger, createSilentLogger, type IServiceLogger } from '../utils/service-logger.js';

// ============================================================================
// Types
// ============================================================================

export interface TickerServerOptions {
  config: ServerConfig;
  logger?: IServiceLogger;
  /** Random source for upstream backoff jitter */
  random?: () => number;
}

export interface HealthReport {
  status: 'ok';
  upstream: string;
  subscribers: number;
  symbols: number;
}

/** How long subscribers get to finish the close handshake on shutdown */
const CLOSE_GRACE_MS = 2_000;

// ============================================================================
// TickerServer Implementation
// ============================================================================

export class TickerServer {
  readonly store = new PriceStore();
  readonly channel: PriceChannel;
  readonly hub: BroadcastHub;
  readonly feed: UpstreamFeed;
  readonly snapshots: SnapshotService;

  private readonly config: ServerConfig;
  private readonly logger: IServiceLogger;
  private readonly app: Express;
  private readonly httpServer: Server;
  private readonly wss: WebSocketServer;
  private readonly abort = new AbortController();
  private readonly sessions = new Map<SubscriberSession, Promise<void>>();
  private readonly connectionsByAddress = new Map<string, number>();
  private started: Promise<AddressInfo> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(options: TickerServerOptions) {
    this.config = options.config;
    this.logger = options.logger ?? createSilentLogger();

    this.channel = new PriceChannel(this.logger.child('PriceChannel'));
    this.hub = new BroadcastHub({
      queueCapacity: this.config.clientQueueSize,
      logger: this.logger.child('BroadcastHub'),
    });
    // Store first, so a record is queryable by the time any subscriber sees it
    this.channel.attach(this.store);
    this.channel.attach(this.hub);

    this.feed = new UpstreamFeed({
      symbols: [...this.config.symbols],
      sink: this.channel,
      baseUrl: this.config.upstreamUrl,
      backoff: {
        initialDelayMs: this.config.reconnectMinDelayMs,
        maxDelayMs: this.config.reconnectMaxDelayMs,
      },
      pingInterval: this.config.pingIntervalMs,
      connectTimeout: this.config.connectTimeoutMs,
      logger: this.logger.child('UpstreamFeed'),
      random: options.random,
    });

    this.snapshots = new SnapshotService(this.store);

    this.app = this.createApp();
    this.httpServer = createServer(this.app);
    this.wss = new WebSocketServer({ server: this.httpServer, path: this.config.wsPath });
    this.wss.on('connection', (socket, req) => this.handleConnection(socket, req));
    // ws re-emits HTTP server errors here; listen failures also reject start()
    this.wss.on('error', error => {
      this.logger.error(LogEvents.ERROR, { error: ServiceLogger.sanitizeErrorMessage(error) });
    });
  }

  // ============================================================================
  // Public API
  // ============================================================================

  /**
   * Listen on the configured host/port and start the upstream feed.
   * Rejects if the port cannot be bound.
   */
  start(): Promise<AddressInfo> {
    if (this.started) {
      return this.started;
    }

    this.logger.info(LogEvents.SERVICE_STARTING, {
      host: this.config.host,
      port: this.config.port,
      symbols: [...this.config.symbols],
    });

    this.started = new Promise<AddressInfo>((resolve, reject) => {
      const onError = (error: Error) => {
        this.httpServer.off('listening', onListening);
        reject(error);
      };
      const onListening = () => {
        this.httpServer.off('error', onError);
        resolve(this.address());
      };
      this.httpServer.once('error', onError);
      this.httpServer.once('listening', onListening);
      this.httpServer.listen(this.config.port, this.config.host);
    }).then(address => {
      this.feed.start(this.abort.signal);
      this.logger.info(LogEvents.SERVICE_STARTED, { host: address.address, port: address.port });
      return address;
    });
    return this.started;
  }

  /**
   * Stop everything and resolve once every session and both servers are closed. Idempotent.
   */
  shutdown(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.runShutdown();
    }
    return this.stopping;
  }

  address(): AddressInfo {
    const address = this.httpServer.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    return address;
  }

  health(): HealthReport {
    return {
      status: 'ok',
      upstream: this.feed.getState(),
      subscribers: this.hub.size,
      symbols: this.store.size,
    };
  }

  getApp(): Express {
    return this.app;
  }

  // ============================================================================
  // Private Methods - HTTP
  // ============================================================================

  private createApp(): Express {
    const app = express();
    const origins = this.config.corsAllowOrigins;
    app.use(cors({ origin: origins.includes('*') ? '*' : [...origins] }));

    app.get(
      '/price',
      createPriceRateLimiter({
        limit: this.config.priceRateLimitPerMinute,
        onLimited: remoteAddress => {
          this.logger.warn(LogEvents.RATE_LIMITED, { remoteAddress });
        },
      }),
      (req: Request, res: Response) => {
        const symbol = req.query.symbol;
        if (typeof symbol !== 'string' || symbol.trim() === '') {
          res.json({ data: this.snapshots.getAllPrices() });
          return;
        }

        const result = this.snapshots.getPrice(symbol);
        if (result.found) {
          res.json({ symbol: result.record.symbol, data: result.record });
        } else {
          res.json({ symbol: result.symbol, data: null, message: 'no data yet' });
        }
      }
    );

    app.get('/latest', (_req: Request, res: Response) => {
      res.json({ data: this.snapshots.getAllPrices() });
    });

    app.get('/healthz', (_req: Request, res: Response) => {
      res.json(this.health());
    });

    return app;
  }

  // ============================================================================
  // Private Methods - WebSocket
  // ============================================================================

  private handleConnection(socket: WebSocket, req: IncomingMessage): void {
    const remoteAddress = req.socket.remoteAddress ?? 'unknown';
    socket.on('error', error => {
      this.logger.warn(LogEvents.ERROR, { remoteAddress, error: ServiceLogger.sanitizeErrorMessage(error) });
    });

    const perAddress = this.connectionsByAddress.get(remoteAddress) ?? 0;
    if (this.sessions.size >= this.config.maxWsConnections || perAddress >= this.config.maxWsConnectionsPerIp) {
      this.logger.warn(LogEvents.SUBSCRIBER_REJECTED, {
        remoteAddress,
        reason: this.sessions.size >= this.config.maxWsConnections ? 'server_full' : 'address_limit',
        code: CloseCodes.TRY_AGAIN_LATER,
      });
      socket.close(CloseCodes.TRY_AGAIN_LATER, 'too many connections');
      return;
    }

    let session: SubscriberSession;
    try {
      const subscriber = this.hub.register();
      session = new SubscriberSession(subscriber, this.hub, new WsTransport(socket, { closeGraceMs: CLOSE_GRACE_MS }), {
        keepaliveMs: this.config.keepaliveMs,
        logger: this.logger.child('SubscriberSession'),
      });
    } catch (error) {
      if (!(error instanceof HubClosedError)) {
        throw error;
      }
      socket.close(CloseCodes.GOING_AWAY, 'server shutting down');
      return;
    }

    this.connectionsByAddress.set(remoteAddress, perAddress + 1);
    const done = session.run().then(
      () => this.releaseSession(session, remoteAddress),
      error => {
        this.logger.error(LogEvents.ERROR, {
          subscriberId: session.id,
          error: ServiceLogger.sanitizeErrorMessage(error),
        });
        this.releaseSession(session, remoteAddress);
      }
    );
    this.sessions.set(session, done);
  }

  private releaseSession(session: SubscriberSession, remoteAddress: string): void {
    this.sessions.delete(session);
    const remaining = (this.connectionsByAddress.get(remoteAddress) ?? 1) - 1;
    if (remaining > 0) {
      this.connectionsByAddress.set(remoteAddress, remaining);
    } else {
      this.connectionsByAddress.delete(remoteAddress);
    }
  }

  // ============================================================================
  // Private Methods - Lifecycle
  // ============================================================================

  private async runShutdown(): Promise<void> {
    this.logger.info(LogEvents.SHUTDOWN_INITIATED, { subscriberCount: this.hub.size });

    this.abort.abort();
    await this.feed.stop();

    // Clients that never answer the close handshake are cut off
    const forceClose = setTimeout(() => {
      for (const client of this.wss.clients) {
        client.terminate();
      }
    }, CLOSE_GRACE_MS);

    this.hub.shutdown();
    await Promise.all(this.sessions.values());
    await new Promise<void>(resolve => this.wss.close(() => resolve()));
    clearTimeout(forceClose);

    if (this.httpServer.listening) {
      await new Promise<void>((resolve, reject) => {
        this.httpServer.close(error => (error ? reject(error) : resolve()));
        this.httpServer.closeAllConnections();
      });
    }

    this.logger.info(LogEvents.SHUTDOWN_COMPLETE);
  }
}

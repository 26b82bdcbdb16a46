/**
 * SubscriberSession - per-connection send loop.
 *
 * Drains one subscriber's queue onto its transport, one write at a time.
 * Teardown can be triggered from three places (queue closed by the hub,
 * transport closed by the client, a failed write) and runs exactly once.
 * The session is done as soon as teardown runs, even if a write to a stalled
 * client is still pending.
 */

import type { Subscriber, SubscriberCloseReason } from './subscriber.js';
import { encodeTickerMessage, KEEPALIVE_FRAME } from '../types/price.types.js';
import { LogEvents, ServiceLogger, createSilentLogger, type IServiceLogger } from '../utils/service-logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Message-oriented downstream connection
 */
export interface SessionTransport {
  /** Resolves once the frame has been handed to the socket, rejects on failure */
  send(frame: string): Promise<void>;
  close(code: number, reason: string): void;
  /** Register a listener for a close initiated by the remote side or the network */
  onClose(listener: () => void): void;
}

/**
 * The part of the hub a session needs
 */
export interface SubscriberRegistry {
  unregister(subscriber: Subscriber): boolean;
}

export type SessionEndReason = SubscriberCloseReason | 'client_closed' | 'write_failed';

export interface SubscriberSessionOptions {
  /** Send a keepalive frame after this long without a record (0 disables, default: 30000) */
  keepaliveMs?: number;
  logger?: IServiceLogger;
}

/** WebSocket close codes used on teardown */
export const CloseCodes = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  INTERNAL_ERROR: 1011,
  TRY_AGAIN_LATER: 1013,
} as const;

const CLOSE_FRAMES: Record<SessionEndReason, { code: number; reason: string }> = {
  unregistered: { code: CloseCodes.NORMAL, reason: 'unsubscribed' },
  evicted: { code: CloseCodes.TRY_AGAIN_LATER, reason: 'subscriber too slow' },
  shutdown: { code: CloseCodes.GOING_AWAY, reason: 'server shutting down' },
  client_closed: { code: CloseCodes.NORMAL, reason: 'client closed' },
  write_failed: { code: CloseCodes.INTERNAL_ERROR, reason: 'write failed' },
};

// ============================================================================
// SubscriberSession Implementation
// ============================================================================

export class SubscriberSession {
  /** Resolves once teardown has run */
  readonly done: Promise<void>;

  private readonly keepaliveMs: number;
  private readonly logger: IServiceLogger;
  private readonly finish: () => void;
  private endReason: SessionEndReason | null = null;
  private started = false;
  private framesSent = 0;

  constructor(
    private readonly subscriber: Subscriber,
    private readonly registry: SubscriberRegistry,
    private readonly transport: SessionTransport,
    options: SubscriberSessionOptions = {}
  ) {
    this.keepaliveMs = options.keepaliveMs ?? 30000;
    this.logger = options.logger ?? createSilentLogger();

    let resolveDone: () => void = () => undefined;
    this.done = new Promise<void>(resolve => {
      resolveDone = resolve;
    });
    this.finish = resolveDone;
  }

  /**
   * Start the send loop (once). Resolves when the session has ended.
   */
  run(): Promise<void> {
    if (!this.started) {
      this.started = true;
      this.transport.onClose(() => this.teardown('client_closed'));
      this.subscriber.onClose(reason => this.teardown(reason));
      this.loop().catch(error => {
        this.logger.error(LogEvents.ERROR, {
          subscriberId: this.subscriber.id,
          error: ServiceLogger.sanitizeErrorMessage(error),
        });
        this.teardown('write_failed');
      });
    }
    return this.done;
  }

  get id(): string {
    return this.subscriber.id;
  }

  getEndReason(): SessionEndReason | null {
    return this.endReason;
  }

  getFramesSent(): number {
    return this.framesSent;
  }

  private async loop(): Promise<void> {
    while (this.endReason === null) {
      const result = await this.subscriber.take(this.keepaliveMs);

      if (result.kind === 'closed') {
        this.teardown(result.reason);
        return;
      }
      if (this.endReason !== null) {
        return;
      }

      const frame = result.kind === 'record' ? encodeTickerMessage(result.record) : KEEPALIVE_FRAME;
      try {
        await this.transport.send(frame);
        this.framesSent++;
      } catch (error) {
        // A write cut short by our own teardown is not a failure
        if (this.endReason !== null) {
          return;
        }
        this.logger.warn(LogEvents.SUBSCRIBER_WRITE_FAILED, {
          subscriberId: this.subscriber.id,
          error: ServiceLogger.sanitizeErrorMessage(error),
        });
        this.teardown('write_failed');
        return;
      }
    }
  }

  private teardown(reason: SessionEndReason): void {
    if (this.endReason !== null) {
      return;
    }
    this.endReason = reason;

    // Closes the subscriber queue too, which wakes a loop parked in take()
    this.registry.unregister(this.subscriber);

    if (reason !== 'client_closed') {
      const { code, reason: text } = CLOSE_FRAMES[reason];
      this.transport.close(code, text);
    }
    this.finish();
  }
}

import { describe, it, expect, vi, afterEach } from 'vitest';
import { SubscriberSession, CloseCodes, type SessionTransport } from './subscriber-session.js';
import { BroadcastHub } from './broadcast-hub.js';
import { createTestRecord, flushEventLoop } from '../__tests__/test-fixtures.js';

// ============================================================================
// Fake Transport
// ============================================================================

class FakeTransport implements SessionTransport {
  readonly frames: string[] = [];
  readonly closeCalls: Array<{ code: number; reason: string }> = [];
  failWrites = false;
  private closeListeners: Array<() => void> = [];

  send(frame: string): Promise<void> {
    if (this.failWrites) {
      return Promise.reject(new Error('socket hang up'));
    }
    this.frames.push(frame);
    return Promise.resolve();
  }

  close(code: number, reason: string): void {
    this.closeCalls.push({ code, reason });
  }

  onClose(listener: () => void): void {
    this.closeListeners.push(listener);
  }

  simulateClientClose(): void {
    for (const listener of this.closeListeners) {
      listener();
    }
  }
}

/**
 * Transport whose writes never complete, like a client that stopped reading
 */
class StalledTransport extends FakeTransport {
  sendCalls = 0;

  send(): Promise<void> {
    this.sendCalls++;
    return new Promise<void>(() => undefined);
  }
}

function createSession(options: { queueCapacity?: number; keepaliveMs?: number } = {}) {
  const hub = new BroadcastHub({ queueCapacity: options.queueCapacity ?? 10 });
  const subscriber = hub.register();
  const transport = new FakeTransport();
  const session = new SubscriberSession(subscriber, hub, transport, { keepaliveMs: options.keepaliveMs ?? 0 });
  return { hub, subscriber, transport, session };
}

// ============================================================================
// Tests
// ============================================================================

describe('SubscriberSession', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should write one ticker frame per published record, in order', async () => {
    const { hub, transport, session } = createSession();
    const done = session.run();

    hub.publish(createTestRecord({ symbol: 'BTCUSDT', lastPrice: '50000.00', changePercent24h: '1.2' }));
    hub.publish(createTestRecord({ symbol: 'ETHUSDT', lastPrice: '3000.00', changePercent24h: '-0.5' }));
    await flushEventLoop();

    expect(transport.frames).toEqual([
      '{"type":"ticker","data":{"symbol":"BTCUSDT","lastPrice":"50000.00","changePercent24h":"1.2","observedAt":1700000000000}}',
      '{"type":"ticker","data":{"symbol":"ETHUSDT","lastPrice":"3000.00","changePercent24h":"-0.5","observedAt":1700000000000}}',
    ]);
    expect(session.getFramesSent()).toBe(2);

    hub.shutdown();
    await done;
  });

  it('should unregister and stop when the client closes', async () => {
    const { hub, subscriber, transport, session } = createSession();
    const done = session.run();

    transport.simulateClientClose();
    await done;

    expect(session.getEndReason()).toBe('client_closed');
    expect(hub.has(subscriber)).toBe(false);
    expect(transport.closeCalls).toEqual([]);
  });

  it('should close with 1013 and write nothing more after eviction', async () => {
    const { hub, transport, session } = createSession({ queueCapacity: 1 });

    // Fill the queue before the loop starts reading, then overflow it
    hub.publish(createTestRecord());
    hub.publish(createTestRecord());

    await session.run();

    expect(session.getEndReason()).toBe('evicted');
    expect(transport.frames).toEqual([]);
    expect(transport.closeCalls).toEqual([{ code: CloseCodes.TRY_AGAIN_LATER, reason: 'subscriber too slow' }]);
  });

  it('should close with 1001 on hub shutdown', async () => {
    const { hub, transport, session } = createSession();
    const done = session.run();

    hub.shutdown();
    await done;

    expect(session.getEndReason()).toBe('shutdown');
    expect(transport.closeCalls).toEqual([{ code: CloseCodes.GOING_AWAY, reason: 'server shutting down' }]);
  });

  it('should unregister after a failed write', async () => {
    const { hub, subscriber, transport, session } = createSession();
    transport.failWrites = true;
    const done = session.run();

    hub.publish(createTestRecord());
    await done;

    expect(session.getEndReason()).toBe('write_failed');
    expect(hub.has(subscriber)).toBe(false);
    expect(transport.closeCalls).toEqual([{ code: CloseCodes.INTERNAL_ERROR, reason: 'write failed' }]);
  });

  it('should tear down exactly once when close paths race', async () => {
    const { hub, subscriber, transport, session } = createSession();
    const unregisterSpy = vi.spyOn(hub, 'unregister');
    const done = session.run();

    transport.simulateClientClose();
    transport.simulateClientClose();
    hub.unregister(subscriber);
    await done;

    expect(session.getEndReason()).toBe('client_closed');
    // one from the session teardown, one from the explicit call above
    expect(unregisterSpy).toHaveBeenCalledTimes(2);
    expect(transport.closeCalls).toEqual([]);
  });

  it('should send a keepalive frame when idle', async () => {
    vi.useFakeTimers();
    const { hub, transport, session } = createSession({ keepaliveMs: 1000 });
    const done = session.run();

    await vi.advanceTimersByTimeAsync(1000);

    expect(transport.frames).toEqual(['{"type":"keepalive"}']);

    hub.shutdown();
    await done;
  });

  describe('with a write in flight', () => {
    function createStalledSession(queueCapacity: number) {
      const hub = new BroadcastHub({ queueCapacity });
      const subscriber = hub.register();
      const transport = new StalledTransport();
      const session = new SubscriberSession(subscriber, hub, transport, { keepaliveMs: 0 });
      return { hub, subscriber, transport, session };
    }

    it('should close with 1013 when evicted', async () => {
      const { hub, subscriber, transport, session } = createStalledSession(2);
      const done = session.run();

      for (let i = 1; i <= 5; i++) {
        hub.publish(createTestRecord({ lastPrice: `${i}.00` }));
        await flushEventLoop(1);
      }
      await done;

      expect(transport.sendCalls).toBe(1);
      expect(subscriber.getCloseReason()).toBe('evicted');
      expect(session.getEndReason()).toBe('evicted');
      expect(transport.closeCalls).toEqual([{ code: CloseCodes.TRY_AGAIN_LATER, reason: 'subscriber too slow' }]);
    });

    it('should finish on hub shutdown', async () => {
      const { hub, transport, session } = createStalledSession(10);
      const done = session.run();

      hub.publish(createTestRecord());
      await flushEventLoop();
      expect(transport.sendCalls).toBe(1);

      hub.shutdown();
      await done;

      expect(session.getEndReason()).toBe('shutdown');
      expect(transport.closeCalls).toEqual([{ code: CloseCodes.GOING_AWAY, reason: 'server shutting down' }]);
    });
  });

  it('should expose the run promise as done', () => {
    const { hub, session } = createSession();
    expect(session.run()).toBe(session.done);
    hub.shutdown();
    return session.done;
  });

  it('should return the same promise from repeated run calls', () => {
    const { hub, session } = createSession();
    const first = session.run();
    expect(session.run()).toBe(first);
    hub.shutdown();
    return first;
  });
});

import { describe, it, expect } from 'vitest';
import { BroadcastHub, HubClosedError } from './broadcast-hub.js';
import type { Subscriber } from './subscriber.js';
import type { PriceRecord } from '../types/price.types.js';
import { createTestRecord } from '../__tests__/test-fixtures.js';

async function drain(subscriber: Subscriber): Promise<PriceRecord[]> {
  const records: PriceRecord[] = [];
  while (subscriber.pending > 0) {
    const result = await subscriber.take();
    if (result.kind === 'record') {
      records.push(result.record);
    }
  }
  return records;
}

describe('BroadcastHub', () => {
  describe('register', () => {
    it('should assign unique ids', () => {
      const hub = new BroadcastHub();
      const a = hub.register();
      const b = hub.register();

      expect(a.id).toBe('sub-1');
      expect(b.id).toBe('sub-2');
      expect(hub.size).toBe(2);
    });

    it('should make a subscriber visible to the next publish', async () => {
      const hub = new BroadcastHub();
      const subscriber = hub.register();

      hub.publish(createTestRecord());

      expect(await drain(subscriber)).toEqual([createTestRecord()]);
    });

    it('should refuse registrations after shutdown', () => {
      const hub = new BroadcastHub();
      hub.shutdown();

      expect(() => hub.register()).toThrow(HubClosedError);
    });
  });

  describe('publish', () => {
    it('should deliver N records in order to a subscriber registered before them', async () => {
      const hub = new BroadcastHub({ queueCapacity: 10 });
      const subscriber = hub.register();
      const records = [
        createTestRecord({ symbol: 'BTCUSDT', lastPrice: '50000.00' }),
        createTestRecord({ symbol: 'ETHUSDT', lastPrice: '3000.00' }),
        createTestRecord({ symbol: 'BTCUSDT', lastPrice: '50010.00' }),
      ];

      for (const record of records) {
        hub.publish(record);
      }

      expect(await drain(subscriber)).toEqual(records);
    });

    it('should not replay earlier records to a late subscriber', async () => {
      const hub = new BroadcastHub();
      hub.publish(createTestRecord({ lastPrice: '1.00' }));
      hub.publish(createTestRecord({ lastPrice: '2.00' }));

      const late = hub.register();
      expect(late.pending).toBe(0);

      hub.publish(createTestRecord({ lastPrice: '3.00' }));
      expect(await drain(late)).toEqual([createTestRecord({ lastPrice: '3.00' })]);
    });

    it('should report how many subscribers received the record', () => {
      const hub = new BroadcastHub();
      hub.register();
      hub.register();

      expect(hub.publish(createTestRecord())).toEqual({ delivered: 2, evicted: 0 });
    });

    it('should succeed with no subscribers', () => {
      const hub = new BroadcastHub();
      expect(hub.publish(createTestRecord())).toEqual({ delivered: 0, evicted: 0 });
    });
  });

  describe('drop-and-evict', () => {
    it('should evict a stalled subscriber and keep serving the others', async () => {
      const hub = new BroadcastHub({ queueCapacity: 2 });
      const stalled = hub.register();
      const healthy = hub.register();
      const received: PriceRecord[] = [];

      for (let i = 1; i <= 5; i++) {
        const result = hub.publish(createTestRecord({ lastPrice: `${i}.00` }));
        expect(result.delivered).toBeGreaterThanOrEqual(1);
        received.push(...(await drain(healthy)));
      }

      expect(stalled.alive).toBe(false);
      expect(stalled.getCloseReason()).toBe('evicted');
      expect(hub.has(stalled)).toBe(false);
      expect(hub.size).toBe(1);
      expect(received.map(r => r.lastPrice)).toEqual(['1.00', '2.00', '3.00', '4.00', '5.00']);
    });

    it('should evict on the first publish that finds the queue full', () => {
      const hub = new BroadcastHub({ queueCapacity: 2 });
      hub.register();

      expect(hub.publish(createTestRecord())).toEqual({ delivered: 1, evicted: 0 });
      expect(hub.publish(createTestRecord())).toEqual({ delivered: 1, evicted: 0 });
      expect(hub.publish(createTestRecord())).toEqual({ delivered: 0, evicted: 1 });
      expect(hub.publish(createTestRecord())).toEqual({ delivered: 0, evicted: 0 });
    });
  });

  describe('unregister', () => {
    it('should be idempotent', () => {
      const hub = new BroadcastHub();
      const subscriber = hub.register();

      expect(hub.unregister(subscriber)).toBe(true);
      expect(hub.unregister(subscriber)).toBe(false);
      expect(hub.size).toBe(0);
      expect(subscriber.getCloseReason()).toBe('unregistered');
    });

    it('should be a no-op for an already evicted subscriber', () => {
      const hub = new BroadcastHub({ queueCapacity: 1 });
      const subscriber = hub.register();
      hub.publish(createTestRecord());
      hub.publish(createTestRecord());

      expect(hub.unregister(subscriber)).toBe(false);
      expect(subscriber.getCloseReason()).toBe('evicted');
    });

    it('should stop delivery to the removed subscriber only', async () => {
      const hub = new BroadcastHub();
      const leaving = hub.register();
      const staying = hub.register();

      hub.unregister(leaving);
      hub.publish(createTestRecord());

      expect(leaving.pending).toBe(0);
      expect(await drain(staying)).toHaveLength(1);
    });
  });

  describe('shutdown', () => {
    it('should close every subscriber with reason shutdown', async () => {
      const hub = new BroadcastHub();
      const a = hub.register();
      const b = hub.register();

      hub.shutdown();
      hub.shutdown();

      expect(hub.size).toBe(0);
      expect(hub.isClosed()).toBe(true);
      expect(await a.take()).toEqual({ kind: 'closed', reason: 'shutdown' });
      expect(await b.take()).toEqual({ kind: 'closed', reason: 'shutdown' });
    });
  });

  describe('as a channel consumer', () => {
    it('should publish consumed records', async () => {
      const hub = new BroadcastHub();
      const subscriber = hub.register();

      hub.consume(createTestRecord({ symbol: 'SOLUSDT' }));

      expect((await drain(subscriber)).map(r => r.symbol)).toEqual(['SOLUSDT']);
    });
  });
});

import { env } from '../../src/config/env';
import { InMemorySessionStore, RedisSessionStore } from '../../src/session/session-store';
import { SessionRecord } from '../../src/session/types';
import { StoreUnavailableError } from '../../src/shared/errors';
import { fixedClock, T0 } from '../helpers/fakes';

const TTL_SECONDS = 60 * 60;

function makeStore() {
  const clock = fixedClock();
  const store = new InMemorySessionStore({ ttlSeconds: TTL_SECONDS, transcriptLimit: 20, now: clock.now });
  return { store, clock };
}

describe('InMemorySessionStore', () => {
  describe('get', () => {
    it('returns null for an unknown identity', async () => {
      const { store } = makeStore();
      expect(await store.get('923000000001')).toBeNull();
    });

    it('resets the idle timeout on every read', async () => {
      const { store, clock } = makeStore();
      await store.update('923000000001', { customerName: 'Ayesha' });

      clock.advance(50 * 60 * 1000);
      expect(store.ttlRemaining('923000000001')).toBe(10 * 60 * 1000);

      await store.get('923000000001');
      expect(store.ttlRemaining('923000000001')).toBe(TTL_SECONDS * 1000);
    });

    it('keeps a session alive through reads spaced under the timeout', async () => {
      const { store, clock } = makeStore();
      await store.update('923000000001', { customerName: 'Ayesha' });

      for (let i = 0; i < 3; i++) {
        clock.advance(45 * 60 * 1000);
        expect(await store.get('923000000001')).not.toBeNull();
      }
    });

    it('returns null once the idle timeout passes without access', async () => {
      const { store, clock } = makeStore();
      await store.update('923000000001', { customerName: 'Ayesha' });

      clock.advance(TTL_SECONDS * 1000);
      expect(await store.get('923000000001')).toBeNull();
    });

    it('hands out copies that do not alias stored state', async () => {
      const { store } = makeStore();
      await store.update('923000000001', { currentOrder: { items: [{ name: 'Fries' }], total: 270 } });

      const first = await store.get('923000000001');
      first?.currentOrder?.items.push({ name: 'Coleslaw' });

      const second = await store.get('923000000001');
      expect(second?.currentOrder?.items).toEqual([{ name: 'Fries' }]);
    });
  });

  describe('update', () => {
    it('merges new keys alongside existing ones', async () => {
      const { store } = makeStore();
      await store.update('id-1', { customerName: 'Ali' });
      const session = await store.update('id-1', { pendingAddress: true });

      expect(session.customerName).toBe('Ali');
      expect(session.pendingAddress).toBe(true);
    });

    it('lets the last writer win per key', async () => {
      const { store } = makeStore();
      await store.update('id-1', { customerName: 'Ali' });
      await store.update('id-1', { customerName: 'Sara' });

      expect((await store.get('id-1'))?.customerName).toBe('Sara');
    });

    it('replaces nested values wholesale instead of merging them', async () => {
      const { store } = makeStore();
      await store.update('id-1', { location: { latitude: 31.5, longitude: 74.3 } });
      await store.update('id-1', { extensions: { a: 1 } });
      await store.update('id-1', { extensions: { b: 2 } });

      const session = await store.get('id-1');
      expect(session?.extensions).toEqual({ b: 2 });
      expect(session?.location).toEqual({ latitude: 31.5, longitude: 74.3 });
    });

    it('clears a key when it is set to null', async () => {
      const { store } = makeStore();
      await store.update('id-1', { currentOrder: { items: [], total: 0 } });
      const session = await store.update('id-1', { currentOrder: null });

      expect(session.currentOrder).toBeNull();
    });

    it('stamps lastActivity from the clock', async () => {
      const { store } = makeStore();
      const session = await store.update('id-1', {});

      expect(session.lastActivity).toBe(new Date(T0).toISOString());
    });

    it('caps a transcript written directly', async () => {
      const { store } = makeStore();
      const transcript = Array.from({ length: 25 }, (_, i) => ({
        role: 'user' as const,
        text: `message ${i + 1}`,
        timestamp: new Date(T0).toISOString(),
      }));

      const session = await store.update('id-1', { transcript });

      expect(session.transcript).toHaveLength(20);
      expect(session.transcript?.[0].text).toBe('message 6');
      expect((await store.get('id-1'))?.transcript).toHaveLength(20);
    });
  });

  describe('appendTranscript', () => {
    it('keeps only the most recent 20 entries, oldest first', async () => {
      const { store, clock } = makeStore();
      for (let i = 1; i <= 25; i++) {
        await store.appendTranscript('id-1', i % 2 === 1 ? 'user' : 'assistant', `message ${i}`);
        clock.advance(1000);
      }

      const transcript = (await store.get('id-1'))?.transcript ?? [];
      expect(transcript).toHaveLength(20);
      expect(transcript[0].text).toBe('message 6');
      expect(transcript[19].text).toBe('message 25');
      expect(transcript[0].timestamp).toBe(new Date(T0 + 5000).toISOString());
    });

    it('preserves other session keys', async () => {
      const { store } = makeStore();
      await store.update('id-1', { pendingLocation: true });
      await store.appendTranscript('id-1', 'user', 'hello');

      const session = await store.get('id-1');
      expect(session?.pendingLocation).toBe(true);
      expect(session?.transcript).toEqual([
        { role: 'user', text: 'hello', timestamp: new Date(T0).toISOString() },
      ]);
    });
  });

  describe('delete', () => {
    it('removes the session', async () => {
      const { store } = makeStore();
      await store.update('id-1', { customerName: 'Ali' });
      await store.delete('id-1');

      expect(await store.get('id-1')).toBeNull();
    });

    it('does not fail for an absent identity', async () => {
      const { store } = makeStore();
      await expect(store.delete('never-seen')).resolves.toBeUndefined();
    });
  });
});

describe('RedisSessionStore', () => {
  const key = `${env.redis.keyPrefix}session:id-1`;

  function makeRedisStore(stored: string | null = null) {
    const redis = {
      getex: jest.fn().mockResolvedValue(stored),
      set: jest.fn().mockResolvedValue('OK'),
      del: jest.fn().mockResolvedValue(1),
    };
    const store = new RedisSessionStore(redis, { ttlSeconds: TTL_SECONDS, transcriptLimit: 20, now: fixedClock().now });
    return { redis, store };
  }

  it('refreshes the idle timeout with GETEX on every read', async () => {
    const { redis, store } = makeRedisStore(JSON.stringify({ customerName: 'Ali' }));

    expect(await store.get('id-1')).toEqual({ customerName: 'Ali' });
    expect(redis.getex).toHaveBeenCalledWith(key, 'EX', TTL_SECONDS);
  });

  it('writes the merged record with the idle timeout', async () => {
    const { redis, store } = makeRedisStore(JSON.stringify({ customerName: 'Ali' }));

    await store.update('id-1', { pendingLocation: true });

    expect(redis.set).toHaveBeenCalledTimes(1);
    const [writtenKey, json, mode, ttl] = redis.set.mock.calls[0];
    expect([writtenKey, mode, ttl]).toEqual([key, 'EX', TTL_SECONDS]);
    const written: SessionRecord = JSON.parse(json);
    expect(written).toEqual({ customerName: 'Ali', pendingLocation: true, lastActivity: new Date(T0).toISOString() });
  });

  it('treats an unreadable record as an expired session', async () => {
    const { store } = makeRedisStore('{not json');
    expect(await store.get('id-1')).toBeNull();
  });

  it('reports a failed read as StoreUnavailableError', async () => {
    const { redis, store } = makeRedisStore();
    redis.getex.mockRejectedValueOnce(new Error('ECONNREFUSED'));

    await expect(store.get('id-1')).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('deletes the key', async () => {
    const { redis, store } = makeRedisStore();
    await store.delete('id-1');
    expect(redis.del).toHaveBeenCalledWith(key);
  });
});

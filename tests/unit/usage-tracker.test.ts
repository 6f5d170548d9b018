import { env } from '../../src/config/env';
import { StoreUnavailableError } from '../../src/shared/errors';
import {
  computeCharge,
  dayKey,
  identityKey,
  InMemoryUsageTracker,
  monthKey,
  RedisUsageTracker,
} from '../../src/usage/usage-tracker';
import { UsagePricing } from '../../src/usage/types';
import { fixedClock, T0 } from '../helpers/fakes';

const PRICING: UsagePricing = {
  inputCostPer1M: 0.075,
  outputCostPer1M: 0.3,
  displayRate: 280,
  displayCurrency: 'PKR',
};

const DAY_MS = 24 * 60 * 60 * 1000;

describe('Usage accounting', () => {
  describe('computeCharge', () => {
    it('prices input and output tokens separately and converts to the display currency', () => {
      const charge = computeCharge(1_000_000, 1_000_000, PRICING);

      expect(charge.inputCostUsd).toBeCloseTo(0.075, 10);
      expect(charge.outputCostUsd).toBeCloseTo(0.3, 10);
      expect(charge.totalCostUsd).toBeCloseTo(0.375, 10);
      expect(charge.totalCostDisplay).toBeCloseTo(105, 6);
      expect(charge.totalTokens).toBe(2_000_000);
    });

    it('charges nothing for zero tokens', () => {
      expect(computeCharge(0, 0, PRICING).totalCostDisplay).toBe(0);
    });
  });

  describe('period keys', () => {
    it('uses UTC day and month', () => {
      expect(dayKey(T0)).toBe('2025-03-10');
      expect(monthKey(T0)).toBe('2025-03');
      expect(identityKey('923001234567', '2025-03-10')).toBe('923001234567:2025-03-10');
    });
  });

  describe('InMemoryUsageTracker', () => {
    it('sums concurrent records into the shared daily window', async () => {
      const clock = fixedClock();
      const tracker = new InMemoryUsageTracker(PRICING, clock.now);

      await Promise.all([
        tracker.record(100, 50, '923000000001'),
        tracker.record(200, 100, '923000000002'),
      ]);

      const day = await tracker.readWindow('day', '2025-03-10');
      expect(day.inputTokens).toBe(300);
      expect(day.outputTokens).toBe(150);
      expect(day.requests).toBe(2);
    });

    it('charges all three windows with every field', async () => {
      const clock = fixedClock();
      const tracker = new InMemoryUsageTracker(PRICING, clock.now);

      const charge = await tracker.record(4000, 1000, '923000000001');
      const expected = {
        inputTokens: 4000,
        outputTokens: 1000,
        requests: 1,
      };

      for (const [scope, key] of [
        ['day', '2025-03-10'],
        ['month', '2025-03'],
        ['identity', '923000000001:2025-03-10'],
      ] as const) {
        const window = await tracker.readWindow(scope, key);
        expect(window).toMatchObject(expected);
        expect(window.costUsd).toBeCloseTo(charge.totalCostUsd, 12);
        expect(window.costDisplay).toBeCloseTo(charge.totalCostDisplay, 10);
      }
    });

    it('keeps identities apart in the per-identity window', async () => {
      const tracker = new InMemoryUsageTracker(PRICING, fixedClock().now);
      await tracker.record(10, 5, 'a');
      await tracker.record(20, 5, 'b');

      expect((await tracker.readWindow('identity', 'a:2025-03-10')).inputTokens).toBe(10);
      expect((await tracker.readWindow('identity', 'b:2025-03-10')).inputTokens).toBe(20);
    });

    it('returns an empty window for a period with no usage', async () => {
      const tracker = new InMemoryUsageTracker(PRICING, fixedClock().now);
      expect(await tracker.readWindow('month', '1999-01')).toEqual({
        inputTokens: 0,
        outputTokens: 0,
        requests: 0,
        costUsd: 0,
        costDisplay: 0,
      });
    });

    it('discards each window after its own expiry', async () => {
      const clock = fixedClock();
      const tracker = new InMemoryUsageTracker(PRICING, clock.now);
      await tracker.record(100, 50, 'a');

      clock.advance(30 * DAY_MS);
      expect((await tracker.readWindow('identity', 'a:2025-03-10')).requests).toBe(0);
      expect((await tracker.readWindow('day', '2025-03-10')).requests).toBe(1);

      clock.advance(60 * DAY_MS);
      expect((await tracker.readWindow('day', '2025-03-10')).requests).toBe(0);
      expect((await tracker.readWindow('month', '2025-03')).requests).toBe(1);
    });

    it('extends the expiry when a window is charged again', async () => {
      const clock = fixedClock();
      const tracker = new InMemoryUsageTracker(PRICING, clock.now);
      await tracker.record(100, 50, 'a');

      // Same UTC day, eleven hours later
      clock.advance(11 * 60 * 60 * 1000);
      await tracker.record(1, 1, 'a');

      clock.set(T0 + 90 * DAY_MS + 5 * 60 * 60 * 1000);
      const day = await tracker.readWindow('day', '2025-03-10');
      expect(day.requests).toBe(2);
      expect(day.inputTokens).toBe(101);
    });
  });

  describe('RedisUsageTracker', () => {
    const DAY_SECONDS = 24 * 60 * 60;
    const dayWindow = `${env.redis.keyPrefix}usage:day:2025-03-10`;
    const monthWindow = `${env.redis.keyPrefix}usage:month:2025-03`;
    const identityWindow = `${env.redis.keyPrefix}usage:identity:923000000001:2025-03-10`;

    class FakeTransaction {
      hincrby = jest.fn().mockReturnThis();
      hincrbyfloat = jest.fn().mockReturnThis();
      expire = jest.fn().mockReturnThis();
      exec = jest.fn().mockResolvedValue([]);
    }

    function makeTracker() {
      const tx = new FakeTransaction();
      const redis = { multi: jest.fn().mockReturnValue(tx), hgetall: jest.fn().mockResolvedValue({}) };
      const tracker = new RedisUsageTracker(redis, PRICING, fixedClock().now);
      return { tx, redis, tracker };
    }

    it('increments every field of all three windows inside one MULTI', async () => {
      const { tx, redis, tracker } = makeTracker();
      const charge = computeCharge(120, 30, PRICING);

      await tracker.record(120, 30, '923000000001');

      expect(redis.multi).toHaveBeenCalledTimes(1);
      expect(tx.hincrby.mock.calls).toEqual(
        [dayWindow, monthWindow, identityWindow].flatMap((key) => [
          [key, 'input_tokens', 120],
          [key, 'output_tokens', 30],
          [key, 'requests', 1],
        ]),
      );
      expect(tx.hincrbyfloat.mock.calls).toEqual(
        [dayWindow, monthWindow, identityWindow].flatMap((key) => [
          [key, 'cost_usd', charge.totalCostUsd],
          [key, 'cost_display', charge.totalCostDisplay],
        ]),
      );
      expect(tx.exec).toHaveBeenCalledTimes(1);
    });

    it('re-applies a 90, 365 and 30 day expiry after each window is bumped', async () => {
      const { tx, tracker } = makeTracker();

      await tracker.record(1, 1, '923000000001');

      expect(tx.expire.mock.calls).toEqual([
        [dayWindow, 90 * DAY_SECONDS],
        [monthWindow, 365 * DAY_SECONDS],
        [identityWindow, 30 * DAY_SECONDS],
      ]);
      const [dayExpire] = tx.expire.mock.invocationCallOrder;
      expect(dayExpire).toBeGreaterThan(tx.hincrbyfloat.mock.invocationCallOrder[1]);
      expect(tx.exec.mock.invocationCallOrder[0]).toBeGreaterThan(tx.expire.mock.invocationCallOrder[2]);
    });

    it('reports a failed command inside the transaction as StoreUnavailableError', async () => {
      const { tx, tracker } = makeTracker();
      tx.exec.mockResolvedValueOnce([
        [null, 1],
        [new Error('WRONGTYPE Operation against a key holding the wrong kind of value'), null],
      ]);

      await expect(tracker.record(10, 5, '923000000001')).rejects.toBeInstanceOf(StoreUnavailableError);
    });

    it('reports an aborted transaction as StoreUnavailableError', async () => {
      const { tx, tracker } = makeTracker();
      tx.exec.mockResolvedValueOnce(null);

      await expect(tracker.record(10, 5, '923000000001')).rejects.toBeInstanceOf(StoreUnavailableError);
    });

    it('parses the counters of a stored window', async () => {
      const { redis, tracker } = makeTracker();
      redis.hgetall.mockResolvedValueOnce({ input_tokens: '240', output_tokens: '60', requests: '2', cost_usd: '0.000036', cost_display: '0.01008' });

      expect(await tracker.readWindow('day', '2025-03-10')).toEqual({
        inputTokens: 240,
        outputTokens: 60,
        requests: 2,
        costUsd: 0.000036,
        costDisplay: 0.01008,
      });
      expect(redis.hgetall).toHaveBeenCalledWith(dayWindow);
    });
  });
});

/**
 * Usage Accounting
 *
 * Token and cost counters in three windows: per day, per month and per
 * identity per day. Every field is bumped with an atomic increment so
 * concurrent turns from different customers never lose updates to the
 * shared daily/monthly windows.
 */

import Redis from 'ioredis';
import { UsageCharge, UsagePricing, UsageScope, UsageTracker, UsageWindow, WINDOW_TTL_DAYS } from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { StoreUnavailableError } from '../shared/errors';

const DAY_SECONDS = 24 * 60 * 60;

export const DEFAULT_PRICING: UsagePricing = {
  inputCostPer1M: env.usage.inputCostPer1M,
  outputCostPer1M: env.usage.outputCostPer1M,
  displayRate: env.usage.displayRate,
  displayCurrency: env.usage.displayCurrency,
};

export function emptyWindow(): UsageWindow {
  return { inputTokens: 0, outputTokens: 0, requests: 0, costUsd: 0, costDisplay: 0 };
}

export function computeCharge(inputTokens: number, outputTokens: number, pricing: UsagePricing): UsageCharge {
  const inputCostUsd = (inputTokens / 1_000_000) * pricing.inputCostPer1M;
  const outputCostUsd = (outputTokens / 1_000_000) * pricing.outputCostPer1M;
  const totalCostUsd = inputCostUsd + outputCostUsd;
  return {
    inputTokens,
    outputTokens,
    totalTokens: inputTokens + outputTokens,
    inputCostUsd,
    outputCostUsd,
    totalCostUsd,
    totalCostDisplay: totalCostUsd * pricing.displayRate,
  };
}

/** UTC period keys: YYYY-MM-DD for days, YYYY-MM for months */
export function dayKey(at: number): string {
  return new Date(at).toISOString().slice(0, 10);
}

export function monthKey(at: number): string {
  return new Date(at).toISOString().slice(0, 7);
}

export function identityKey(identity: string, day: string): string {
  return `${identity}:${day}`;
}

function windowsFor(identity: string, at: number): Array<{ scope: UsageScope; periodKey: string }> {
  const day = dayKey(at);
  return [
    { scope: 'day', periodKey: day },
    { scope: 'month', periodKey: monthKey(at) },
    { scope: 'identity', periodKey: identityKey(identity, day) },
  ];
}

// ───── Redis Implementation ─────────────────────────────────────

/** The commands the Redis tracker issues */
export type UsageRedis = Pick<Redis, 'multi' | 'hgetall'>;

/**
 * Redis-backed tracker: one hash per window, HINCRBY / HINCRBYFLOAT per
 * field inside a MULTI, EXPIRE re-applied on every record.
 */
export class RedisUsageTracker implements UsageTracker {
  private readonly prefix: string;
  private readonly log = logger.child({ component: 'usage-tracker-redis' });

  constructor(
    private readonly redis: UsageRedis,
    private readonly pricing: UsagePricing = DEFAULT_PRICING,
    private readonly now: () => number = Date.now,
  ) {
    this.prefix = `${env.redis.keyPrefix}usage:`;
  }

  private key(scope: UsageScope, periodKey: string): string {
    return `${this.prefix}${scope}:${periodKey}`;
  }

  async record(inputTokens: number, outputTokens: number, identity: string): Promise<UsageCharge> {
    const charge = computeCharge(inputTokens, outputTokens, this.pricing);
    const tx = this.redis.multi();
    for (const { scope, periodKey } of windowsFor(identity, this.now())) {
      const key = this.key(scope, periodKey);
      tx.hincrby(key, 'input_tokens', inputTokens)
        .hincrby(key, 'output_tokens', outputTokens)
        .hincrby(key, 'requests', 1)
        .hincrbyfloat(key, 'cost_usd', charge.totalCostUsd)
        .hincrbyfloat(key, 'cost_display', charge.totalCostDisplay)
        .expire(key, WINDOW_TTL_DAYS[scope] * DAY_SECONDS);
    }
    try {
      const results = await tx.exec();
      const failed = results?.find(([err]) => err !== null);
      if (!results || failed) throw failed?.[0] ?? new Error('Usage transaction aborted');
    } catch (err) {
      this.log.error({ err }, 'Failed to record usage');
      throw new StoreUnavailableError('usage-tracker', 'record', err);
    }
    return charge;
  }

  async readWindow(scope: UsageScope, periodKey: string): Promise<UsageWindow> {
    let stats: Record<string, string>;
    try {
      stats = await this.redis.hgetall(this.key(scope, periodKey));
    } catch (err) {
      this.log.error({ err, scope, periodKey }, 'Failed to read usage window');
      throw new StoreUnavailableError('usage-tracker', 'readWindow', err);
    }
    return {
      inputTokens: parseInt(stats.input_tokens ?? '0', 10),
      outputTokens: parseInt(stats.output_tokens ?? '0', 10),
      requests: parseInt(stats.requests ?? '0', 10),
      costUsd: parseFloat(stats.cost_usd ?? '0'),
      costDisplay: parseFloat(stats.cost_display ?? '0'),
    };
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

interface MemoryWindow {
  counters: UsageWindow;
  expiresAt: number;
}

/**
 * In-memory tracker (dev/test fallback). Each increment runs synchronously
 * between awaits, which gives the same per-field atomicity as Redis.
 */
export class InMemoryUsageTracker implements UsageTracker {
  private readonly windows = new Map<string, MemoryWindow>();

  constructor(
    private readonly pricing: UsagePricing = DEFAULT_PRICING,
    private readonly now: () => number = Date.now,
  ) {}

  private live(key: string): MemoryWindow | undefined {
    const entry = this.windows.get(key);
    if (entry && this.now() >= entry.expiresAt) {
      this.windows.delete(key);
      return undefined;
    }
    return entry;
  }

  async record(inputTokens: number, outputTokens: number, identity: string): Promise<UsageCharge> {
    const charge = computeCharge(inputTokens, outputTokens, this.pricing);
    for (const { scope, periodKey } of windowsFor(identity, this.now())) {
      const key = `${scope}:${periodKey}`;
      const entry = this.live(key) ?? { counters: emptyWindow(), expiresAt: 0 };
      entry.counters.inputTokens += inputTokens;
      entry.counters.outputTokens += outputTokens;
      entry.counters.requests += 1;
      entry.counters.costUsd += charge.totalCostUsd;
      entry.counters.costDisplay += charge.totalCostDisplay;
      entry.expiresAt = this.now() + WINDOW_TTL_DAYS[scope] * DAY_SECONDS * 1000;
      this.windows.set(key, entry);
    }
    return charge;
  }

  async readWindow(scope: UsageScope, periodKey: string): Promise<UsageWindow> {
    const entry = this.live(`${scope}:${periodKey}`);
    return entry ? { ...entry.counters } : emptyWindow();
  }
}

/**
 * Factory: create the appropriate tracker based on environment.
 */
export function createUsageTracker(redis?: Redis, pricing: UsagePricing = DEFAULT_PRICING): UsageTracker {
  if (redis) {
    return new RedisUsageTracker(redis, pricing);
  }
  logger.warn('Using in-memory usage tracker (no Redis)');
  return new InMemoryUsageTracker(pricing);
}

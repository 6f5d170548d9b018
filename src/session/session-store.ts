import Redis from 'ioredis';
import { SessionPatch, SessionRecord, SessionStore, SessionStoreOptions, TranscriptRole } from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { sessionStoreErrors } from '../observability/metrics';
import { StoreUnavailableError } from '../shared/errors';

export const DEFAULT_SESSION_OPTIONS: SessionStoreOptions = {
  ttlSeconds: env.session.timeoutMinutes * 60,
  transcriptLimit: env.session.transcriptLimit,
};

/**
 * Merge/TTL/transcript semantics shared by every backend. Subclasses only
 * provide raw read (with TTL refresh), write (with TTL) and delete.
 */
abstract class BaseSessionStore implements SessionStore {
  protected readonly ttlSeconds: number;
  protected readonly transcriptLimit: number;
  protected readonly now: () => number;

  constructor(options: SessionStoreOptions) {
    this.ttlSeconds = options.ttlSeconds;
    this.transcriptLimit = options.transcriptLimit;
    this.now = options.now ?? Date.now;
  }

  protected abstract read(identity: string): Promise<SessionRecord | null>;
  protected abstract write(identity: string, record: SessionRecord): Promise<void>;
  protected abstract remove(identity: string): Promise<void>;

  get(identity: string): Promise<SessionRecord | null> {
    return this.read(identity);
  }

  async update(identity: string, partial: SessionPatch): Promise<SessionRecord> {
    const current = (await this.read(identity)) ?? {};
    const next: SessionRecord = {
      ...current,
      ...partial,
      lastActivity: new Date(this.now()).toISOString(),
    };
    if (next.transcript) {
      next.transcript = next.transcript.slice(-this.transcriptLimit);
    }
    await this.write(identity, next);
    return next;
  }

  async appendTranscript(identity: string, role: TranscriptRole, text: string): Promise<SessionRecord> {
    const current = (await this.read(identity)) ?? {};
    const transcript = [
      ...(current.transcript ?? []),
      { role, text, timestamp: new Date(this.now()).toISOString() },
    ];
    return this.update(identity, { transcript });
  }

  delete(identity: string): Promise<void> {
    return this.remove(identity);
  }
}

/** The commands the Redis session store issues */
export type SessionRedis = Pick<Redis, 'getex' | 'set' | 'del'>;

/**
 * Redis-backed session store: one JSON string per identity.
 * GETEX refreshes the idle timeout atomically with the read.
 */
export class RedisSessionStore extends BaseSessionStore {
  private readonly prefix: string;
  private readonly log = logger.child({ component: 'session-store-redis' });

  constructor(private readonly redis: SessionRedis, options: SessionStoreOptions = DEFAULT_SESSION_OPTIONS) {
    super(options);
    this.prefix = `${env.redis.keyPrefix}session:`;
  }

  private key(identity: string): string {
    return `${this.prefix}${identity}`;
  }

  private unavailable(operation: string, err: unknown): StoreUnavailableError {
    sessionStoreErrors.inc({ operation });
    this.log.error({ err, operation }, 'Session store operation failed');
    return new StoreUnavailableError('session-store', operation, err);
  }

  protected async read(identity: string): Promise<SessionRecord | null> {
    let raw: string | null;
    try {
      raw = await this.redis.getex(this.key(identity), 'EX', this.ttlSeconds);
    } catch (err) {
      throw this.unavailable('get', err);
    }
    if (!raw) return null;
    try {
      return JSON.parse(raw) as SessionRecord;
    } catch (err) {
      // A corrupt record is treated like an expired one
      this.log.warn({ err }, 'Discarding unreadable session record');
      return null;
    }
  }

  protected async write(identity: string, record: SessionRecord): Promise<void> {
    try {
      await this.redis.set(this.key(identity), JSON.stringify(record), 'EX', this.ttlSeconds);
    } catch (err) {
      throw this.unavailable('set', err);
    }
  }

  protected async remove(identity: string): Promise<void> {
    try {
      await this.redis.del(this.key(identity));
    } catch (err) {
      throw this.unavailable('delete', err);
    }
  }
}

interface MemoryEntry {
  record: SessionRecord;
  expiresAt: number;
}

/**
 * In-memory session store (dev/test fallback). Records are cloned on the
 * way in and out so callers never share references with the store.
 */
export class InMemorySessionStore extends BaseSessionStore {
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(options: SessionStoreOptions = DEFAULT_SESSION_OPTIONS) {
    super(options);
  }

  protected async read(identity: string): Promise<SessionRecord | null> {
    const entry = this.entries.get(identity);
    if (!entry) return null;
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(identity);
      return null;
    }
    entry.expiresAt = this.now() + this.ttlSeconds * 1000;
    return structuredClone(entry.record);
  }

  protected async write(identity: string, record: SessionRecord): Promise<void> {
    this.entries.set(identity, {
      record: structuredClone(record),
      expiresAt: this.now() + this.ttlSeconds * 1000,
    });
  }

  protected async remove(identity: string): Promise<void> {
    this.entries.delete(identity);
  }

  /** Milliseconds until expiry, or null when absent (does not refresh) */
  ttlRemaining(identity: string): number | null {
    const entry = this.entries.get(identity);
    if (!entry) return null;
    const remaining = entry.expiresAt - this.now();
    return remaining > 0 ? remaining : null;
  }
}

/**
 * Factory: create the appropriate session store based on environment.
 */
export function createSessionStore(redis?: Redis, options: SessionStoreOptions = DEFAULT_SESSION_OPTIONS): SessionStore {
  if (redis) {
    return new RedisSessionStore(redis, options);
  }
  logger.warn('Using in-memory session store (no Redis)');
  return new InMemorySessionStore(options);
}

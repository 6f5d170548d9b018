import { OrderItem, OrderType } from '../restaurant/types';

export type TranscriptRole = 'user' | 'assistant';

export interface TranscriptEntry {
  role: TranscriptRole;
  text: string;
  /** ISO-8601 */
  timestamp: string;
}

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

/** Order as remembered in the session (in progress, or the last one placed) */
export interface OrderSnapshot {
  id?: number;
  items: OrderItem[];
  total: number;
  type?: OrderType;
  createdAt?: string;
  completedAt?: string;
}

/**
 * Ephemeral per-identity conversation state.
 * Known keys are typed; anything else goes under `extensions`.
 */
export interface SessionRecord {
  customerName?: string;
  currentOrder?: OrderSnapshot | null;
  lastOrder?: OrderSnapshot | null;
  pendingAddress?: boolean;
  pendingLocation?: boolean;
  /** Last delivery address the customer typed in this conversation */
  address?: string;
  location?: GeoPoint | null;
  shouldRequestFeedback?: boolean;
  /** Most recent turns, oldest first, capped */
  transcript?: TranscriptEntry[];
  lastActivity?: string;
  extensions?: Record<string, unknown>;
}

export type SessionPatch = Partial<Omit<SessionRecord, 'lastActivity'>>;

export interface SessionStoreOptions {
  /** Idle timeout; every read or write resets it */
  ttlSeconds: number;
  transcriptLimit: number;
  now?: () => number;
}

/** Session store interface */
export interface SessionStore {
  /** Returns null on miss or after expiry; a hit refreshes the TTL */
  get(identity: string): Promise<SessionRecord | null>;
  /** Shallow merge: each key in `partial` replaces the stored key wholesale */
  update(identity: string, partial: SessionPatch): Promise<SessionRecord>;
  appendTranscript(identity: string, role: TranscriptRole, text: string): Promise<SessionRecord>;
  delete(identity: string): Promise<void>;
}

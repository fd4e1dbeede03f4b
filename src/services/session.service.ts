import type { SessionState } from '../types/dialogue.types.ts';

/**
 * Per-user conversation state. Implementations must apply each call
 * atomically with respect to the others.
 */
export interface SessionStore {
  setState(userId: string, state: SessionState): void;
  getState(userId: string): SessionState | null;
  clearState(userId: string): void;
  cleanupExpired(): number;
  size(): number;
}

interface SessionRecord {
  state: SessionState;
  lastActivity: number;
}

interface SessionStoreConfig {
  ttlMs: number;
  now: () => number;
}

const DEFAULT_TTL_MS = 30 * 60 * 1000; // 30 minutes

/**
 * Sessions kept in process memory with a sliding TTL.
 *
 * Every method runs to completion synchronously, so on the event loop each
 * call is its own critical section; concurrent webhook deliveries can only
 * interleave between calls (last write wins).
 */
export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, SessionRecord>();
  private config: SessionStoreConfig;

  constructor(config: Partial<SessionStoreConfig> = {}) {
    this.config = {
      ttlMs: DEFAULT_TTL_MS,
      now: Date.now,
      ...config,
    };
  }

  setState(userId: string, state: SessionState): void {
    this.sessions.set(userId, {
      state: { ...state },
      lastActivity: this.config.now(),
    });
    console.log(`[Session] Set ${userId}: stage=${state.stage}`);
  }

  /**
   * Returns null when there is no session or it went stale (the stale record
   * is dropped). A live hit counts as activity.
   */
  getState(userId: string): SessionState | null {
    const record = this.sessions.get(userId);
    if (!record) {
      return null;
    }

    const now = this.config.now();
    if (this.isExpired(record, now)) {
      this.sessions.delete(userId);
      console.log(`[Session] Expired ${userId}`);
      return null;
    }

    record.lastActivity = now;
    return { ...record.state };
  }

  clearState(userId: string): void {
    if (this.sessions.delete(userId)) {
      console.log(`[Session] Cleared ${userId}`);
    }
  }

  cleanupExpired(): number {
    const now = this.config.now();
    let removed = 0;

    for (const [userId, record] of this.sessions) {
      if (this.isExpired(record, now)) {
        this.sessions.delete(userId);
        removed++;
      }
    }

    if (removed > 0) {
      console.log(`[Session] Cleaned up ${removed} expired sessions`);
    }
    return removed;
  }

  size(): number {
    return this.sessions.size;
  }

  private isExpired(record: SessionRecord, now: number): boolean {
    return now - record.lastActivity > this.config.ttlMs;
  }
}

interface IdempotencyConfig {
  retentionMs: number;
  now: () => number;
}

/**
 * Remembers webhook event ids for a while so LINE redeliveries are
 * processed once.
 */
export class IdempotencyService {
  private seen = new Map<string, number>();
  private config: IdempotencyConfig;

  constructor(config: Partial<IdempotencyConfig> = {}) {
    this.config = {
      retentionMs: 10 * 60 * 1000,
      now: Date.now,
      ...config,
    };
  }

  /**
   * Record the key. Returns false when it was already recorded and is still
   * within the retention window.
   */
  checkAndRecord(key: string): boolean {
    const now = this.config.now();
    const recordedAt = this.seen.get(key);

    if (recordedAt !== undefined && now - recordedAt <= this.config.retentionMs) {
      return false;
    }

    this.seen.set(key, now);
    return true;
  }

  cleanup(): number {
    const now = this.config.now();
    let deleted = 0;

    for (const [key, recordedAt] of this.seen) {
      if (now - recordedAt > this.config.retentionMs) {
        this.seen.delete(key);
        deleted++;
      }
    }

    return deleted;
  }

  size(): number {
    return this.seen.size;
  }
}

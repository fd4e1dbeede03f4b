import type { UsageLimiter } from '../types/dialogue.types.ts';

interface UsageTrackerConfig {
  timezone: string;
  monthlyCap: number;
  freeMode: boolean;
  now: () => Date;
}

export interface UsageSnapshot {
  month: string;
  count: number;
  cap: number;
  remaining: number | null;
}

/**
 * Monthly OCR call counter for the free tier. The count resets when the
 * month (in the configured time zone) changes.
 */
export class UsageTracker implements UsageLimiter {
  private config: UsageTrackerConfig;
  private monthFormatter: Intl.DateTimeFormat;
  private currentMonthKey: string;
  private counter = 0;

  constructor(config: Partial<UsageTrackerConfig> = {}) {
    this.config = {
      timezone: 'Asia/Tokyo',
      monthlyCap: 1000,
      freeMode: true,
      now: () => new Date(),
      ...config,
    };

    this.monthFormatter = createMonthFormatter(this.config.timezone);
    this.currentMonthKey = this.getMonthKey();

    console.log(
      `[Usage] Tracker initialized: timezone=${this.config.timezone}, ` +
      `cap=${this.config.monthlyCap}, free_mode=${this.config.freeMode}`
    );
  }

  /** Current month as YYYY-MM in the tracker's time zone. */
  getMonthKey(): string {
    const parts = this.monthFormatter.formatToParts(this.config.now());
    const year = parts.find(p => p.type === 'year')?.value ?? '0000';
    const month = parts.find(p => p.type === 'month')?.value ?? '00';
    return `${year}-${month}`;
  }

  increment(): number {
    this.checkMonthReset();
    this.counter++;
    console.log(`[Usage] Incremented to ${this.counter}/${this.config.monthlyCap}`);
    return this.counter;
  }

  getCurrentCount(): number {
    this.checkMonthReset();
    return this.counter;
  }

  isLimitExceeded(): boolean {
    if (!this.config.freeMode) {
      return false;
    }

    this.checkMonthReset();
    const exceeded = this.counter >= this.config.monthlyCap;
    if (exceeded) {
      console.warn(`[Usage] Monthly limit exceeded: ${this.counter}/${this.config.monthlyCap}`);
    }
    return exceeded;
  }

  /** Remaining calls this month, or null when the cap is not enforced. */
  getRemaining(): number | null {
    if (!this.config.freeMode) {
      return null;
    }

    this.checkMonthReset();
    return Math.max(0, this.config.monthlyCap - this.counter);
  }

  getSnapshot(): UsageSnapshot {
    const count = this.getCurrentCount();
    return {
      month: this.currentMonthKey,
      count,
      cap: this.config.monthlyCap,
      remaining: this.getRemaining(),
    };
  }

  reset(): void {
    this.counter = 0;
    console.log('[Usage] Counter manually reset');
  }

  private checkMonthReset(): void {
    const key = this.getMonthKey();
    if (key !== this.currentMonthKey) {
      this.currentMonthKey = key;
      this.counter = 0;
      console.log(`[Usage] Month changed to ${key}, counter reset`);
    }
  }
}

function createMonthFormatter(timezone: string): Intl.DateTimeFormat {
  const options: Intl.DateTimeFormatOptions = { year: 'numeric', month: '2-digit' };
  try {
    return new Intl.DateTimeFormat('en-US', { ...options, timeZone: timezone });
  } catch (error) {
    console.warn(`[Usage] Invalid timezone ${timezone}, using UTC:`, error);
    return new Intl.DateTimeFormat('en-US', { ...options, timeZone: 'UTC' });
  }
}

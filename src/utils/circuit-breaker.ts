export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerState {
  state: CircuitState;
  failureCount: number;
  lastOpenedAt: Date | null;
  lastSuccessAt: Date | null;
}

interface CircuitBreakerConfig {
  name: string;
  threshold: number;
  cooldownMs: number;
  now: () => number;
}

/**
 * Stops calling a failing provider for `cooldownMs` after `threshold`
 * consecutive failures, then lets one probe through.
 */
export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failureCount = 0;
  private lastOpenedAt: Date | null = null;
  private lastSuccessAt: Date | null = null;
  private config: CircuitBreakerConfig;

  constructor(config: Pick<CircuitBreakerConfig, 'threshold' | 'cooldownMs'> & Partial<CircuitBreakerConfig>) {
    this.config = {
      name: 'CircuitBreaker',
      now: Date.now,
      ...config,
    };
  }

  isAllowed(): boolean {
    if (this.state === 'closed') {
      return true;
    }

    if (this.state === 'open') {
      const elapsed = this.lastOpenedAt
        ? this.config.now() - this.lastOpenedAt.getTime()
        : Infinity;

      if (elapsed > this.config.cooldownMs) {
        this.state = 'half_open';
        this.failureCount = 0;
        console.log(`[${this.config.name}] Transitioning to half_open`);
        return true;
      }

      return false;
    }

    // half_open - allow the probe
    return true;
  }

  recordSuccess(): void {
    this.failureCount = 0;
    this.lastSuccessAt = new Date(this.config.now());

    if (this.state === 'half_open') {
      this.state = 'closed';
      console.log(`[${this.config.name}] Recovered, transitioning to closed`);
    }
  }

  recordFailure(): void {
    this.failureCount++;
    console.log(`[${this.config.name}] Failure recorded (${this.failureCount}/${this.config.threshold})`);

    // A failed probe reopens immediately
    if (this.state === 'half_open' || this.failureCount >= this.config.threshold) {
      this.state = 'open';
      this.lastOpenedAt = new Date(this.config.now());
      console.log(`[${this.config.name}] Circuit opened, will retry after cooldown`);
    }
  }

  getState(): CircuitBreakerState {
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastOpenedAt: this.lastOpenedAt,
      lastSuccessAt: this.lastSuccessAt,
    };
  }

  reset(): void {
    this.state = 'closed';
    this.failureCount = 0;
    this.lastOpenedAt = null;
    console.log(`[${this.config.name}] Reset to closed`);
  }
}

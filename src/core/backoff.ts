/**
 * Reconnect Backoff
 *
 * Exponential backoff with a ceiling; the delay doubles on every consecutive
 * failure and drops back to the floor after a successful connection.
 */

export interface BackoffPolicy {
  /** Floor delay (ms) */
  initialDelay: number;
  /** Ceiling delay (ms) */
  maxDelay: number;
}

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = {
  initialDelay: 2000,
  maxDelay: 60000,
};

export class Backoff {
  private readonly policy: BackoffPolicy;
  private delay: number;

  constructor(policy: Partial<BackoffPolicy> = {}) {
    this.policy = { ...DEFAULT_BACKOFF_POLICY, ...policy };
    this.delay = this.floor;
  }

  private get floor(): number {
    return Math.min(this.policy.initialDelay, this.policy.maxDelay);
  }

  /**
   * The delay the next failure will wait.
   */
  get current(): number {
    return this.delay;
  }

  /**
   * Consume the current delay and double it for the next failure.
   */
  next(): number {
    const delay = this.delay;
    this.delay = Math.min(this.delay * 2, this.policy.maxDelay);
    return delay;
  }

  reset(): void {
    this.delay = this.floor;
  }
}

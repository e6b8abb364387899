import { BackOffPolicy } from 'typescript-retry-decorator';

/**
 * Decides how long a worker waits before publishing the same message again.
 */
export interface RetryPolicy {
  /**
   * @param failedAttempts - Number of publish attempts that have failed so far (>= 1)
   * @returns Delay in ms before the next attempt, or null to give up on the message
   */
  nextDelayMs(failedAttempts: number): number | null;

  describe(): string;
}

export interface RetryPolicyOptions {
  readonly policy: BackOffPolicy;
  /** Delay before the first retry (ms) */
  readonly intervalMs: number;
  /** Total publish attempts per message; 0 retries forever */
  readonly maxAttempts: number;
  readonly multiplier: number;
  /** Upper bound for exponential delays (ms) */
  readonly maxIntervalMs: number;
}

export class FixedIntervalRetryPolicy implements RetryPolicy {
  constructor(
    private readonly intervalMs: number,
    private readonly maxAttempts = 0,
  ) {}

  nextDelayMs(failedAttempts: number): number | null {
    if (this.maxAttempts > 0 && failedAttempts >= this.maxAttempts) {
      return null;
    }
    return this.intervalMs;
  }

  describe(): string {
    return `fixed interval=${String(this.intervalMs)}ms maxAttempts=${formatAttempts(this.maxAttempts)}`;
  }
}

export class ExponentialBackoffRetryPolicy implements RetryPolicy {
  constructor(
    private readonly initialMs: number,
    private readonly multiplier: number,
    private readonly maxIntervalMs: number,
    private readonly maxAttempts = 0,
  ) {}

  nextDelayMs(failedAttempts: number): number | null {
    if (this.maxAttempts > 0 && failedAttempts >= this.maxAttempts) {
      return null;
    }
    const delay = this.initialMs * this.multiplier ** (failedAttempts - 1);
    return Math.min(Math.round(delay), this.maxIntervalMs);
  }

  describe(): string {
    return (
      `exponential initial=${String(this.initialMs)}ms multiplier=${String(this.multiplier)} ` +
      `maxInterval=${String(this.maxIntervalMs)}ms maxAttempts=${formatAttempts(this.maxAttempts)}`
    );
  }
}

export function createRetryPolicy(options: RetryPolicyOptions): RetryPolicy {
  switch (options.policy) {
    case BackOffPolicy.ExponentialBackOffPolicy:
      return new ExponentialBackoffRetryPolicy(
        options.intervalMs,
        options.multiplier,
        options.maxIntervalMs,
        options.maxAttempts,
      );
    case BackOffPolicy.FixedBackOffPolicy:
      return new FixedIntervalRetryPolicy(
        options.intervalMs,
        options.maxAttempts,
      );
  }
}

function formatAttempts(maxAttempts: number): string {
  return maxAttempts > 0 ? String(maxAttempts) : 'unlimited';
}

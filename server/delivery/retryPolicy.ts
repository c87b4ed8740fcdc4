import { DeliveryError } from '../errors';
import { sleep } from '../utils/async';

export type BackoffSchedule = 'fixed' | 'linear';

export interface RetryPolicyOptions {
  maxAttempts: number;
  backoffMs: number;
  schedule?: BackoffSchedule;
  sleep?: (ms: number) => Promise<void>;
}

export interface RetryHooks {
  isRetryable: (error: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly schedule: BackoffSchedule;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.backoffMs = Math.max(0, options.backoffMs);
    this.schedule = options.schedule ?? 'fixed';
    this.wait = options.sleep ?? ((ms) => sleep(ms));
  }

  /** Delay before retrying after failed attempt number `attempt` (1-based). */
  delayFor(attempt: number): number {
    return this.schedule === 'linear' ? this.backoffMs * attempt : this.backoffMs;
  }

  /**
   * Runs `task` until it succeeds, a non-retryable error is thrown (rethrown as is), or
   * attempts run out, which raises a non-transient `DeliveryError`.
   */
  async run<T>(task: (attempt: number) => Promise<T>, hooks: RetryHooks): Promise<T> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        return await task(attempt);
      } catch (error) {
        if (!hooks.isRetryable(error)) throw error;
        lastError = error;
        if (attempt === this.maxAttempts) break;
        const delayMs = this.delayFor(attempt);
        hooks.onRetry?.({ attempt, delayMs, error });
        await this.wait(delayMs);
      }
    }
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    throw new DeliveryError(`Gave up after ${this.maxAttempts} attempts: ${reason}`, {
      transient: false,
      attempts: this.maxAttempts,
      cause: lastError,
    });
  }
}

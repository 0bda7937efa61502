/**
 * Retry Scheduler
 *
 * Exponential backoff with jitter: base * 2^(attempt-1), +/- jitterRatio, clamped
 * to [minDelayMs, maxDelayMs]. rate_limited uses the backend's retry hint when one
 * was given. Gives up after maxRetries retries or once the next wait would overrun
 * maxElapsedMs.
 */

import type { RetryDecision, RetryPolicyConfig } from '../../types/RetryTypes';
import { DEFAULT_RETRY_POLICY } from '../../types/RetryTypes';
import type { RetryReason } from '../../types/TransportErrors';

export interface NextDelayOptions {
  retryAfterMs?: number;
  elapsedMs?: number;
}

export class RetryScheduler {
  constructor(
    private readonly config: RetryPolicyConfig = DEFAULT_RETRY_POLICY,
    private readonly random: () => number = Math.random
  ) {}

  /**
   * @param attemptNumber - 1-based number of the attempt that just failed
   */
  nextDelay(attemptNumber: number, reason: RetryReason, options: NextDelayOptions = {}): RetryDecision {
    if (attemptNumber > this.config.maxRetries) {
      return { kind: 'give_up', cause: 'max_retries' };
    }

    const hint = reason === 'rate_limited' ? options.retryAfterMs : undefined;
    const delayMs =
      hint !== undefined && hint >= 0
        ? Math.max(this.config.minDelayMs, Math.round(hint))
        : this.backoffDelay(attemptNumber);

    if ((options.elapsedMs ?? 0) + delayMs > this.config.maxElapsedMs) {
      return { kind: 'give_up', cause: 'max_elapsed' };
    }

    return {
      kind: 'retry',
      delay_ms: delayMs,
      attempt: {
        attempt_number: attemptNumber,
        next_delay_ms: delayMs,
        reason,
      },
    };
  }

  private backoffDelay(attemptNumber: number): number {
    const base = this.config.baseDelayMs * Math.pow(2, attemptNumber - 1);
    const jitter = (this.random() * 2 - 1) * this.config.jitterRatio * base;
    const delay = Math.round(base + jitter);
    return Math.min(this.config.maxDelayMs, Math.max(this.config.minDelayMs, delay));
  }
}

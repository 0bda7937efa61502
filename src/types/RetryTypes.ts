import type { RetryReason } from './TransportErrors';

export interface RetryAttempt {
  attempt_number: number;
  next_delay_ms: number;
  reason: RetryReason;
}

export type GiveUpCause = 'max_retries' | 'max_elapsed';

export type RetryDecision =
  | { kind: 'retry'; delay_ms: number; attempt: RetryAttempt }
  | { kind: 'give_up'; cause: GiveUpCause };

export interface RetryPolicyConfig {
  maxRetries: number;
  baseDelayMs: number;
  minDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the base delay applied as +/- jitter. */
  jitterRatio: number;
  maxElapsedMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicyConfig = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  minDelayMs: 100,
  maxDelayMs: 8_000,
  jitterRatio: 0.3,
  maxElapsedMs: 20_000,
};

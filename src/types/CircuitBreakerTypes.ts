/**
 * Circuit breaker state and configuration types.
 */

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerStateV1 {
  endpoint_id: string;
  status: CircuitState;
  consecutive_failures: number;
  window_start_ms: number;
  opened_at_ms?: number;
  open_until_ms?: number;
  current_cooldown_ms: number;
  trip_count: number;
  probe_in_flight: boolean;
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  windowMs: number;
  cooldownMs: number;
  /** Applied to the cooldown each time a HALF_OPEN probe fails. */
  cooldownMultiplier: number;
  maxCooldownMs: number;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  windowMs: 60_000,
  cooldownMs: 30_000,
  cooldownMultiplier: 2,
  maxCooldownMs: 300_000,
};

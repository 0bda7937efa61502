/**
 * Circuit Breaker Service
 *
 * In-memory state per endpoint, shared by every session in the process.
 * Failure window: N failures in T ms. Strict single probe in HALF_OPEN.
 * Cooldown grows by cooldownMultiplier on each failed probe, capped at maxCooldownMs.
 *
 * Callers report each resolution exactly once: recordSuccess, recordFailure, or
 * recordNeutral for outcomes that say nothing about backend health.
 */

import { Logger } from '../core/Logger';
import type { CircuitBreakerStateV1, CircuitState, CircuitBreakerConfig } from '../../types/CircuitBreakerTypes';
import { DEFAULT_CIRCUIT_BREAKER_CONFIG } from '../../types/CircuitBreakerTypes';

export interface AllowRequestResult {
  allowed: boolean;
  state: CircuitState;
  /** True when this caller holds the HALF_OPEN probe slot. */
  probe: boolean;
  retryAfterMs?: number;
}

export interface RecordOptions {
  probe?: boolean;
}

export class CircuitBreakerService {
  private readonly states = new Map<string, CircuitBreakerStateV1>();

  constructor(
    private readonly logger: Logger,
    private readonly config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG
  ) {}

  /**
   * Check if a request is allowed (circuit CLOSED or caller won the HALF_OPEN probe).
   * If OPEN and past cooldown, the caller becomes the probe.
   */
  allowRequest(endpointId: string): AllowRequestResult {
    const nowMs = Date.now();
    const state = this.states.get(endpointId);

    if (!state || state.status === 'CLOSED') {
      return { allowed: true, state: 'CLOSED', probe: false };
    }

    if (state.status === 'OPEN') {
      const openUntil = state.open_until_ms ?? 0;
      if (nowMs < openUntil) {
        return {
          allowed: false,
          state: 'OPEN',
          probe: false,
          retryAfterMs: openUntil - nowMs,
        };
      }
      state.status = 'HALF_OPEN';
      state.probe_in_flight = true;
      state.open_until_ms = undefined;
      this.logger.info('Circuit half-open; probe permitted', { endpointId });
      return { allowed: true, state: 'HALF_OPEN', probe: true };
    }

    if (!state.probe_in_flight) {
      // Previous probe was released without a verdict (cancelled or throttled).
      state.probe_in_flight = true;
      return { allowed: true, state: 'HALF_OPEN', probe: true };
    }
    return {
      allowed: false,
      state: 'HALF_OPEN',
      probe: false,
      retryAfterMs: state.current_cooldown_ms,
    };
  }

  /**
   * Record success: close circuit if the probe succeeded; otherwise reset the failure count.
   */
  recordSuccess(endpointId: string, options: RecordOptions = {}): void {
    const state = this.states.get(endpointId);
    if (!state) {
      return;
    }

    if (state.status === 'HALF_OPEN') {
      if (!options.probe) {
        return;
      }
      this.states.set(endpointId, this.closedState(endpointId, Date.now()));
      this.logger.info('Circuit closed after successful probe', { endpointId });
      return;
    }

    if (state.status === 'CLOSED') {
      state.consecutive_failures = 0;
      state.window_start_ms = Date.now();
    }
  }

  /**
   * Record failure: increment count; if >= threshold in window, open circuit.
   * A failed probe reopens the circuit with an extended cooldown.
   */
  recordFailure(endpointId: string, options: RecordOptions = {}): void {
    const nowMs = Date.now();
    const state = this.states.get(endpointId) ?? this.closedState(endpointId, nowMs);
    this.states.set(endpointId, state);

    if (state.status === 'OPEN') {
      return;
    }

    if (state.status === 'HALF_OPEN') {
      if (!options.probe) {
        return;
      }
      const extended = Math.min(
        state.current_cooldown_ms * this.config.cooldownMultiplier,
        this.config.maxCooldownMs
      );
      this.openCircuit(state, nowMs, extended);
      this.logger.info('Circuit reopened after probe failure', {
        endpointId,
        cooldownMs: extended,
      });
      return;
    }

    const inWindow = nowMs - state.window_start_ms <= this.config.windowMs;
    state.consecutive_failures = inWindow ? state.consecutive_failures + 1 : 1;
    if (!inWindow) {
      state.window_start_ms = nowMs;
    }

    if (state.consecutive_failures >= this.config.failureThreshold) {
      this.openCircuit(state, nowMs, state.current_cooldown_ms);
      this.logger.info('Circuit opened', {
        endpointId,
        failureCount: state.consecutive_failures,
        cooldownMs: state.current_cooldown_ms,
      });
    }
  }

  /**
   * Record an outcome that is not evidence of backend health (throttled, rejected
   * as malformed, or cancelled by the user). The failure count is untouched; a
   * probe holder gives its slot back.
   */
  recordNeutral(endpointId: string, options: RecordOptions = {}): void {
    const state = this.states.get(endpointId);
    if (!state || state.status !== 'HALF_OPEN' || !options.probe) {
      return;
    }
    state.probe_in_flight = false;
    this.logger.debug('Circuit probe released without verdict', { endpointId });
  }

  getState(endpointId: string): CircuitBreakerStateV1 | null {
    const state = this.states.get(endpointId);
    return state ? { ...state } : null;
  }

  reset(endpointId: string): void {
    this.states.delete(endpointId);
    this.logger.info('Circuit breaker manually reset', { endpointId });
  }

  resetAll(): void {
    this.states.clear();
    this.logger.info('All circuit breakers reset');
  }

  private closedState(endpointId: string, nowMs: number): CircuitBreakerStateV1 {
    return {
      endpoint_id: endpointId,
      status: 'CLOSED',
      consecutive_failures: 0,
      window_start_ms: nowMs,
      current_cooldown_ms: this.config.cooldownMs,
      trip_count: 0,
      probe_in_flight: false,
    };
  }

  private openCircuit(state: CircuitBreakerStateV1, nowMs: number, cooldownMs: number): void {
    state.status = 'OPEN';
    state.opened_at_ms = nowMs;
    state.open_until_ms = nowMs + cooldownMs;
    state.current_cooldown_ms = cooldownMs;
    state.trip_count += 1;
    state.probe_in_flight = false;
  }
}

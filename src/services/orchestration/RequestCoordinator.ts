/**
 * Request Coordinator - one per input-surface session
 *
 * Single choke point between user edits and the backend:
 *   edit -> stamp -> debounce -> cache -> circuit breaker -> transport (with retry) -> publish
 *
 * Invariants:
 * - At most one transport call in flight per session. Stamping a new candidate
 *   aborts the outstanding call before anything else happens.
 * - A result is published only when candidate.sequence === latest issued sequence.
 * - Each candidate is published at most once; cancelled work is never published.
 * - Each resolution that passed the breaker reports to it exactly once. Cancellation,
 *   throttling and client errors report neutral.
 */

import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../core/Logger';
import { CircuitBreakerService } from '../connector/CircuitBreakerService';
import { RetryScheduler } from '../connector/RetryScheduler';
import { ResponseCacheService } from './ResponseCacheService';
import { RequestSequencer } from './RequestSequencer';
import { DebounceGate } from './DebounceGate';
import { normalizeText } from './Fingerprint';
import { searchSnippets } from '../snippets/SharedSnippetSource';
import { abortableDelay } from '../../utils/abortable-delay';
import { userMessageForFailure } from '../../utils/failure-messages';
import type {
  BackendRequest,
  BackendResponse,
  BackendTransport,
  ResultSink,
  SnippetSource,
} from '../../types/BackendTypes';
import { DEFAULT_COMPOSE_OPTIONS, endpointIdForMode } from '../../types/ModeTypes';
import type { ComposeOptions, EndpointId, Mode } from '../../types/ModeTypes';
import type {
  CandidateTrigger,
  PublishedOutcome,
  RequestCandidate,
  ResultSource,
  SessionSnapshot,
} from '../../types/RequestTypes';
import type { Usage } from '../../types/CommonTypes';
import {
  CircuitOpenError,
  countsAgainstBreaker,
  isRetryReason,
  toTransportError,
  TransportError,
} from '../../types/TransportErrors';

export interface CoordinatorConfig {
  debounceMs: number;
  maxContextLength: number;
}

export const DEFAULT_COORDINATOR_CONFIG: CoordinatorConfig = {
  debounceMs: 300,
  maxContextLength: 2000,
};

export interface RequestCoordinatorDeps {
  transport: BackendTransport;
  circuitBreaker: CircuitBreakerService;
  cache: ResponseCacheService;
  retryScheduler: RetryScheduler;
  sink: ResultSink;
  logger: Logger;
  snippetSource?: SnippetSource;
  config?: CoordinatorConfig;
}

export interface SessionOptions {
  sessionId?: string;
  initialMode?: Mode;
  composeOptions?: ComposeOptions;
  onTeardown?: (coordinator: RequestCoordinator) => void;
}

interface InFlightCall {
  candidate: RequestCandidate;
  controller: AbortController;
  endpointId: EndpointId;
  /** Holds the HALF_OPEN probe slot. */
  probe: boolean;
  /** Slot already handed back at cancel time; the late resolution reports nothing. */
  probeReleased: boolean;
}

type Resolution =
  | { kind: 'success'; response: BackendResponse; attempts: number }
  | { kind: 'failure'; error: TransportError; attempts: number; exhausted: boolean }
  | { kind: 'cancelled'; attempts: number };

export class RequestCoordinator {
  readonly sessionId: string;

  private readonly logger: Logger;
  private readonly config: CoordinatorConfig;
  private readonly sequencer: RequestSequencer;
  private readonly gate: DebounceGate<RequestCandidate>;
  private readonly onTeardown?: (coordinator: RequestCoordinator) => void;

  private mode: Mode;
  private text = '';
  private composeOptions: ComposeOptions;
  private inFlight: InFlightCall | null = null;
  private lastPublishedSequence = 0;
  private tornDown = false;

  constructor(private readonly deps: RequestCoordinatorDeps, options: SessionOptions = {}) {
    this.sessionId = options.sessionId ?? uuidv4();
    this.logger = deps.logger.child({ sessionId: this.sessionId });
    this.config = deps.config ?? DEFAULT_COORDINATOR_CONFIG;
    this.mode = options.initialMode ?? 'compose';
    this.composeOptions = { ...(options.composeOptions ?? DEFAULT_COMPOSE_OPTIONS) };
    this.onTeardown = options.onTeardown;
    this.sequencer = new RequestSequencer(this.sessionId);
    this.gate = new DebounceGate(this.config.debounceMs, (candidate) => this.dispatch(candidate));
  }

  getSnapshot(): SessionSnapshot {
    return {
      session_id: this.sessionId,
      mode: this.mode,
      text: this.text,
      compose_options: { ...this.composeOptions },
      latest_sequence: this.sequencer.latestSequence,
      in_flight_sequence: this.inFlight?.candidate.sequence ?? null,
      pending_sequence: this.gate.pending?.sequence ?? null,
      last_published_sequence: this.lastPublishedSequence,
      torn_down: this.tornDown,
    };
  }

  /**
   * Text changed. Debounced; the outstanding call (if any) is cancelled now.
   */
  submitEdit(text: string): RequestCandidate | null {
    if (this.rejectAfterTeardown('submitEdit')) return null;
    this.text = text;
    const candidate = this.stampAndSupersede('edit');
    if (this.isDispatchable(candidate)) {
      this.gate.schedule(candidate);
    } else {
      this.gate.cancel();
    }
    return candidate;
  }

  /**
   * Explicit mode switch. Bypasses the debounce delay.
   */
  switchMode(mode: Mode): RequestCandidate | null {
    if (this.rejectAfterTeardown('switchMode')) return null;
    if (mode === this.mode) {
      return null;
    }
    this.logger.info('Mode switched', { from: this.mode, to: mode });
    this.mode = mode;
    const candidate = this.stampAndSupersede('mode_change');
    if (this.isDispatchable(candidate)) {
      this.gate.fireNow(candidate);
    } else {
      this.gate.cancel();
    }
    return candidate;
  }

  /**
   * Tone/length/preset changed. Debounced like an edit since sliders emit bursts.
   */
  setComposeOptions(options: ComposeOptions): RequestCandidate | null {
    if (this.rejectAfterTeardown('setComposeOptions')) return null;
    this.composeOptions = { ...options };
    if (this.mode !== 'compose') {
      return null;
    }
    return this.submitEdit(this.text);
  }

  /**
   * Resolve a fired candidate: publish a result, publish a failure, or drop it.
   */
  async handle(candidate: RequestCandidate): Promise<void> {
    if (this.rejectAfterTeardown('handle')) return;
    if (!this.sequencer.isCurrent(candidate)) {
      this.logger.debug('Dropping stale candidate before dispatch', { sequence: candidate.sequence });
      return;
    }

    if (candidate.mode === 'snippet') {
      this.resolveSnippets(candidate);
      return;
    }

    const cached = this.deps.cache.lookup(candidate.fingerprint);
    if (cached) {
      this.publishResult(candidate, cached.result, 'cache', cached.usage);
      return;
    }

    const endpointId = endpointIdForMode(candidate.mode);
    if (endpointId === null) {
      return;
    }

    const allow = this.deps.circuitBreaker.allowRequest(endpointId);
    if (!allow.allowed) {
      this.publishFailure(candidate, new CircuitOpenError(endpointId, allow.retryAfterMs), 0, false);
      return;
    }

    // Single-flight: release any slot still held before taking it.
    this.cancelInFlight();
    const call: InFlightCall = {
      candidate,
      controller: new AbortController(),
      endpointId,
      probe: allow.probe,
      probeReleased: false,
    };
    this.inFlight = call;

    const resolution = await this.resolveWithRetry(candidate, endpointId, call.controller.signal);
    if (this.inFlight === call) {
      this.inFlight = null;
    }

    this.report(call, resolution);

    switch (resolution.kind) {
      case 'cancelled':
        this.logger.debug('Call cancelled; response discarded', {
          sequence: candidate.sequence,
          endpointId,
        });
        return;
      case 'success':
        this.deps.cache.store(
          candidate.fingerprint,
          candidate.mode,
          resolution.response.result,
          resolution.response.usage
        );
        this.publishResult(candidate, resolution.response.result, 'backend', resolution.response.usage);
        return;
      case 'failure':
        this.logger.warn('Request failed', {
          sequence: candidate.sequence,
          endpointId,
          failureKind: resolution.error.failure_kind,
          attempts: resolution.attempts,
          error: resolution.error.message,
        });
        this.publishFailure(candidate, resolution.error, resolution.attempts, resolution.exhausted);
        return;
    }
  }

  /**
   * Cancel pending and in-flight work and forget the current text. Mode is kept;
   * cached results for it are dropped.
   */
  resetSession(): void {
    if (this.rejectAfterTeardown('resetSession')) return;
    this.text = '';
    this.stampAndSupersede('edit');
    this.gate.cancel();
    const removed = this.deps.cache.invalidateMode(this.mode);
    this.logger.debug('Session reset', { mode: this.mode, cacheEntriesRemoved: removed });
  }

  /**
   * Cancels the debounce timer, the in-flight call and any backoff wait.
   * Idempotent; every later call on this session is ignored.
   */
  teardown(): void {
    if (this.tornDown) return;
    this.tornDown = true;
    this.gate.cancel();
    this.cancelInFlight();
    this.logger.info('Session torn down');
    this.onTeardown?.(this);
  }

  private stampAndSupersede(trigger: CandidateTrigger): RequestCandidate {
    const candidate = this.sequencer.stamp(this.mode, this.text, trigger, this.composeOptions);
    this.cancelInFlight();
    return candidate;
  }

  private cancelInFlight(): void {
    const call = this.inFlight;
    if (!call) return;
    // Cleared synchronously; the transport may still be winding down.
    this.inFlight = null;
    call.controller.abort();
    // A superseding candidate may need the probe slot in this same tick.
    if (call.probe) {
      call.probeReleased = true;
      this.deps.circuitBreaker.recordNeutral(call.endpointId, { probe: true });
    }
    this.logger.debug('Cancelled in-flight call', { sequence: call.candidate.sequence });
  }

  private isDispatchable(candidate: RequestCandidate): boolean {
    return candidate.mode === 'snippet' || normalizeText(candidate.mode, candidate.text).length > 0;
  }

  private dispatch(candidate: RequestCandidate): void {
    this.handle(candidate).catch((error: unknown) => {
      this.logger.error('Unhandled error resolving candidate', {
        sequence: candidate.sequence,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  private async resolveWithRetry(
    candidate: RequestCandidate,
    endpointId: EndpointId,
    signal: AbortSignal
  ): Promise<Resolution> {
    const request = this.buildRequest(candidate);
    const startedAt = Date.now();
    let attempt = 0;

    for (;;) {
      attempt += 1;
      let error: TransportError;
      try {
        const response = await this.deps.transport.send(request, signal);
        if (signal.aborted) {
          return { kind: 'cancelled', attempts: attempt };
        }
        return { kind: 'success', response, attempts: attempt };
      } catch (thrown) {
        error = toTransportError(thrown);
      }

      if (signal.aborted || error.failure_kind === 'cancelled') {
        return { kind: 'cancelled', attempts: attempt };
      }
      if (!isRetryReason(error.failure_kind)) {
        return { kind: 'failure', error, attempts: attempt, exhausted: false };
      }

      const decision = this.deps.retryScheduler.nextDelay(attempt, error.failure_kind, {
        retryAfterMs: error.retry_after_ms,
        elapsedMs: Date.now() - startedAt,
      });
      if (decision.kind === 'give_up') {
        return { kind: 'failure', error, attempts: attempt, exhausted: true };
      }

      this.logger.warn('Retrying backend request', {
        sequence: candidate.sequence,
        endpointId,
        attempt: decision.attempt.attempt_number,
        reason: decision.attempt.reason,
        delayMs: decision.delay_ms,
      });
      const waited = await abortableDelay(decision.delay_ms, signal);
      if (!waited) {
        return { kind: 'cancelled', attempts: attempt };
      }
    }
  }

  private buildRequest(candidate: RequestCandidate): BackendRequest {
    const text =
      candidate.text.length > this.config.maxContextLength
        ? candidate.text.slice(candidate.text.length - this.config.maxContextLength)
        : candidate.text;
    return {
      mode: candidate.mode,
      text,
      contextLength: text.length,
      ...(candidate.compose_options ? { composeOptions: { ...candidate.compose_options } } : {}),
    };
  }

  private report(call: InFlightCall, resolution: Resolution): void {
    if (resolution.kind === 'cancelled' && call.probeReleased) {
      return;
    }
    const breaker = this.deps.circuitBreaker;
    const { endpointId, probe } = call;
    if (resolution.kind === 'success') {
      breaker.recordSuccess(endpointId, { probe });
    } else if (resolution.kind === 'failure' && countsAgainstBreaker(resolution.error.failure_kind)) {
      breaker.recordFailure(endpointId, { probe });
    } else {
      breaker.recordNeutral(endpointId, { probe });
    }
  }

  private resolveSnippets(candidate: RequestCandidate): void {
    const snippets = this.deps.snippetSource?.getSnippets() ?? [];
    const matches = searchSnippets(snippets, candidate.text);
    this.publish(candidate, {
      kind: 'result',
      session_id: this.sessionId,
      sequence: candidate.sequence,
      mode: candidate.mode,
      text: matches[0]?.text ?? '',
      source: 'snippets',
      snippets: matches,
    });
  }

  private publishResult(candidate: RequestCandidate, text: string, source: ResultSource, usage?: Usage): void {
    this.publish(candidate, {
      kind: 'result',
      session_id: this.sessionId,
      sequence: candidate.sequence,
      mode: candidate.mode,
      text,
      source,
      ...(usage ? { usage } : {}),
    });
  }

  private publishFailure(
    candidate: RequestCandidate,
    error: TransportError,
    attempts: number,
    exhausted: boolean
  ): void {
    const kind = error.failure_kind;
    if (kind === 'cancelled') {
      return;
    }
    const retries = exhausted ? Math.max(0, attempts - 1) : 0;
    this.publish(candidate, {
      kind: 'failure',
      session_id: this.sessionId,
      sequence: candidate.sequence,
      mode: candidate.mode,
      failure_kind: kind,
      message: error.message,
      user_message: userMessageForFailure(kind, error.status_code, retries),
      attempts,
      exhausted,
      ...(error.status_code !== undefined ? { status_code: error.status_code } : {}),
      ...(error.retry_after_ms !== undefined ? { retry_after_ms: error.retry_after_ms } : {}),
    });
  }

  private publish(candidate: RequestCandidate, outcome: PublishedOutcome): void {
    if (this.tornDown || !this.sequencer.isCurrent(candidate)) {
      this.logger.debug('Discarding stale outcome', {
        sequence: candidate.sequence,
        latest: this.sequencer.latestSequence,
      });
      return;
    }
    if (candidate.sequence <= this.lastPublishedSequence) {
      return;
    }
    this.lastPublishedSequence = candidate.sequence;
    try {
      this.deps.sink.publish(outcome);
    } catch (error) {
      this.logger.error('Result sink threw during publish', {
        sequence: candidate.sequence,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private rejectAfterTeardown(operation: string): boolean {
    if (this.tornDown) {
      this.logger.warn('Ignoring call on torn-down session', { operation });
      return true;
    }
    return false;
  }
}

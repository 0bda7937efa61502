/**
 * Transport Errors: typed failures for retry, breaker and publish decisions.
 *
 * Each error carries failure_kind and a retryable flag so the coordinator never
 * has to inspect HTTP details.
 */

export type FailureKind =
  | 'network'
  | 'timeout'
  | 'rate_limited'
  | 'server_error'
  | 'client_error'
  | 'circuit_open'
  | 'cancelled';

/** Failure kinds the retry scheduler may schedule another attempt for. */
export type RetryReason = 'network' | 'timeout' | 'server_error' | 'rate_limited';

/**
 * Base transport error with failure_kind for coordinator decision-making
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly failure_kind: FailureKind,
    public readonly retryable: boolean = false,
    public readonly status_code?: number,
    public readonly retry_after_ms?: number
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Connection failures: unreachable host, DNS, reset (retryable)
 */
export class NetworkError extends TransportError {
  constructor(message: string, cause?: unknown) {
    super(message, 'network', true);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class TimeoutError extends TransportError {
  constructor(message: string) {
    super(message, 'timeout', true);
  }
}

/**
 * HTTP 429. Retryable, but the backend is healthy, so it never counts against the breaker.
 */
export class RateLimitedError extends TransportError {
  constructor(message: string, retryAfterMs?: number) {
    super(message, 'rate_limited', true, 429, retryAfterMs);
  }
}

/**
 * HTTP 5xx and malformed success bodies (retryable)
 */
export class ServerError extends TransportError {
  constructor(message: string, statusCode?: number) {
    super(message, 'server_error', true, statusCode);
  }
}

/**
 * HTTP 4xx other than 429 (terminal, no retry budget consumed)
 */
export class ClientError extends TransportError {
  constructor(message: string, statusCode?: number) {
    super(message, 'client_error', false, statusCode);
  }
}

/**
 * Breaker rejected the call; no network attempt was made.
 */
export class CircuitOpenError extends TransportError {
  constructor(endpointId: string, retryAfterMs?: number) {
    super(`Circuit breaker OPEN for endpoint ${endpointId}; failing fast`, 'circuit_open', false, undefined, retryAfterMs);
  }
}

/**
 * Superseded by newer input. Not an error condition; never shown to the user.
 */
export class CancelledError extends TransportError {
  constructor(message: string = 'Request cancelled') {
    super(message, 'cancelled', false);
  }
}

export function isRetryReason(kind: FailureKind): kind is RetryReason {
  return kind === 'network' || kind === 'timeout' || kind === 'server_error' || kind === 'rate_limited';
}

/**
 * network, timeout and server_error say the backend is unhealthy. rate_limited,
 * client_error, circuit_open and cancelled do not.
 */
export function countsAgainstBreaker(kind: FailureKind): boolean {
  return kind === 'network' || kind === 'timeout' || kind === 'server_error';
}

/**
 * Normalize anything a transport throws into a TransportError.
 */
export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(message || 'Unknown transport failure', error);
}

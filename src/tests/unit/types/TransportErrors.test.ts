import {
  CircuitOpenError,
  countsAgainstBreaker,
  isRetryReason,
  NetworkError,
  RateLimitedError,
  toTransportError,
  TimeoutError,
  TransportError,
} from '../../../types/TransportErrors';
import { endpointIdForMode } from '../../../types/ModeTypes';

describe('TransportErrors', () => {
  it('names errors after their class', () => {
    expect(new TimeoutError('slow').name).toBe('TimeoutError');
    expect(new CircuitOpenError('chat', 1_000)).toMatchObject({
      name: 'CircuitOpenError',
      failure_kind: 'circuit_open',
      retryable: false,
      retry_after_ms: 1_000,
    });
  });

  it('marks rate limiting retryable with status 429', () => {
    expect(new RateLimitedError('HTTP 429', 2_000)).toMatchObject({
      failure_kind: 'rate_limited',
      retryable: true,
      status_code: 429,
      retry_after_ms: 2_000,
    });
  });

  it('counts only backend-health failures against the breaker', () => {
    expect(countsAgainstBreaker('network')).toBe(true);
    expect(countsAgainstBreaker('timeout')).toBe(true);
    expect(countsAgainstBreaker('server_error')).toBe(true);
    expect(countsAgainstBreaker('rate_limited')).toBe(false);
    expect(countsAgainstBreaker('client_error')).toBe(false);
    expect(countsAgainstBreaker('cancelled')).toBe(false);
  });

  it('retries transient kinds only', () => {
    expect(isRetryReason('rate_limited')).toBe(true);
    expect(isRetryReason('client_error')).toBe(false);
    expect(isRetryReason('circuit_open')).toBe(false);
  });

  describe('toTransportError', () => {
    it('passes transport errors through', () => {
      const error = new TimeoutError('slow');
      expect(toTransportError(error)).toBe(error);
    });

    it('wraps anything else as a network failure', () => {
      const wrapped = toTransportError(new Error('boom'));
      expect(wrapped).toBeInstanceOf(NetworkError);
      expect(wrapped.message).toBe('boom');
      expect(toTransportError('plain string')).toBeInstanceOf(TransportError);
      expect(toTransportError('')).toMatchObject({ message: 'Unknown transport failure' });
    });
  });
});

describe('endpointIdForMode', () => {
  it('routes compose and search queries to rewrite, conversation to chat, snippets nowhere', () => {
    expect(endpointIdForMode('compose')).toBe('rewrite');
    expect(endpointIdForMode('search_query')).toBe('rewrite');
    expect(endpointIdForMode('conversational')).toBe('chat');
    expect(endpointIdForMode('snippet')).toBeNull();
  });
});

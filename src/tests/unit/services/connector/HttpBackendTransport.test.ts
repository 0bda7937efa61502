/**
 * HttpBackendTransport Unit Tests
 */

import { AxiosError, AxiosHeaders, CanceledError } from 'axios';
import {
  HttpBackendTransport,
  HttpClient,
  parseRetryAfter,
} from '../../../../services/connector/HttpBackendTransport';
import { Logger } from '../../../../services/core/Logger';
import type { CredentialStore } from '../../../../types/BackendTypes';
import {
  CancelledError,
  ClientError,
  NetworkError,
  RateLimitedError,
  ServerError,
  TimeoutError,
  TransportError,
} from '../../../../types/TransportErrors';

const OPTIONS = {
  baseUrl: 'http://localhost:3000',
  locale: 'en-US',
  requestTimeoutMs: 10_000,
  healthCheckTimeoutMs: 3_000,
};

function httpError(status: number, data: unknown, headers: Record<string, string> = {}): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, {
    status,
    statusText: '',
    data,
    headers,
    config,
  });
}

describe('HttpBackendTransport', () => {
  let post: jest.Mock;
  let get: jest.Mock;
  let transport: HttpBackendTransport;
  let signal: AbortSignal;
  const logger = new Logger('HttpBackendTransportTest');

  const build = (credentials?: CredentialStore): HttpBackendTransport =>
    new HttpBackendTransport(OPTIONS, logger, credentials, { post, get } as unknown as HttpClient);

  const sendError = async (error: unknown): Promise<TransportError> => {
    post.mockRejectedValueOnce(error);
    try {
      await transport.send({ mode: 'compose', text: 'hi', contextLength: 2 }, signal);
    } catch (thrown) {
      if (thrown instanceof TransportError) return thrown;
      throw thrown;
    }
    throw new Error('send did not reject');
  };

  beforeEach(() => {
    post = jest.fn();
    get = jest.fn();
    signal = new AbortController().signal;
    transport = build({ getApiKey: async () => 'test-key' });
    jest.spyOn(console, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('send', () => {
    it('posts compose requests to /api/rewrite with tone, length and locale', async () => {
      post.mockResolvedValue({ data: { text: '  Hello there.  ' } });

      const response = await transport.send(
        { mode: 'compose', text: 'hello there', contextLength: 11, composeOptions: { tone: 0.8, length: 0.3 } },
        signal
      );

      expect(response).toEqual({ result: 'Hello there.' });
      expect(post).toHaveBeenCalledWith(
        'http://localhost:3000/api/rewrite',
        { text: 'hello there', tone: 0.8, length: 0.3, locale: 'en-US', contextLength: 11 },
        {
          headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-key' },
          timeout: 10_000,
          signal,
        }
      );
    });

    it('sends search queries to /api/rewrite with the search_query preset', async () => {
      post.mockResolvedValue({ data: { text: 'pizza near me' } });

      await transport.send({ mode: 'search_query', text: 'where can i get pizza', contextLength: 21 }, signal);

      expect(post.mock.calls[0][0]).toBe('http://localhost:3000/api/rewrite');
      expect(post.mock.calls[0][1]).toEqual({
        text: 'where can i get pizza',
        tone: 0.5,
        length: 0.5,
        locale: 'en-US',
        contextLength: 21,
        preset: 'search_query',
      });
    });

    it('posts conversational requests to /api/chat', async () => {
      post.mockResolvedValue({ data: { text: 'A breaker stops calls to a failing service.' } });

      await transport.send({ mode: 'conversational', text: 'what is a breaker?', contextLength: 18 }, signal);

      expect(post.mock.calls[0][0]).toBe('http://localhost:3000/api/chat');
      expect(post.mock.calls[0][1]).toEqual({ query: 'what is a breaker?', contextLength: 18 });
    });

    it('maps snake_case usage to camelCase', async () => {
      post.mockResolvedValue({
        data: { text: 'ok', usage: { prompt_tokens: 5, completion_tokens: 4, total_tokens: 9, model: 'test-model' } },
      });

      const response = await transport.send({ mode: 'compose', text: 'ok', contextLength: 2 }, signal);

      expect(response.usage).toEqual({ promptTokens: 5, completionTokens: 4, totalTokens: 9, model: 'test-model' });
    });

    it('omits Authorization when no key is stored', async () => {
      transport = build({ getApiKey: async () => null });
      post.mockResolvedValue({ data: { text: 'ok' } });

      await transport.send({ mode: 'compose', text: 'ok', contextLength: 2 }, signal);

      expect(post.mock.calls[0][2].headers).toEqual({ 'Content-Type': 'application/json' });
    });

    it('refuses snippet mode', async () => {
      await expect(transport.send({ mode: 'snippet', text: 'email', contextLength: 5 }, signal)).rejects.toBeInstanceOf(
        ClientError
      );
      expect(post).not.toHaveBeenCalled();
    });

    it('treats a malformed success body as a server error', async () => {
      post.mockResolvedValue({ data: { result: 'wrong field' } });

      const error = await transport
        .send({ mode: 'compose', text: 'hi', contextLength: 2 }, signal)
        .catch((thrown: unknown) => thrown);

      expect(error).toBeInstanceOf(ServerError);
      expect(error).toMatchObject({ failure_kind: 'server_error', status_code: 200, retryable: true });
    });

    it('turns a credential store failure into a client error', async () => {
      transport = build({
        getApiKey: async () => {
          throw new Error('keychain locked');
        },
      });

      const error = await transport
        .send({ mode: 'compose', text: 'hi', contextLength: 2 }, signal)
        .catch((thrown: unknown) => thrown);

      expect(error).toBeInstanceOf(ClientError);
      expect(error).toMatchObject({ message: 'Credential store unavailable: keychain locked' });
    });
  });

  describe('error classification', () => {
    it('classifies cancellation', async () => {
      expect(await sendError(new CanceledError())).toBeInstanceOf(CancelledError);
    });

    it('classifies request timeouts', async () => {
      const error = await sendError(new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED'));
      expect(error).toBeInstanceOf(TimeoutError);
      expect(error.message).toBe('Request timed out: timeout of 10000ms exceeded');
    });

    it('classifies unreachable hosts as network failures', async () => {
      const error = await sendError(new AxiosError('connect ECONNREFUSED 127.0.0.1:3000', 'ECONNREFUSED'));
      expect(error).toBeInstanceOf(NetworkError);
      expect(error.message).toBe('Network failure: connect ECONNREFUSED 127.0.0.1:3000');
    });

    it('classifies 429 with a Retry-After header', async () => {
      const error = await sendError(httpError(429, { error: 'Rate limit exceeded' }, { 'retry-after': '3' }));
      expect(error).toBeInstanceOf(RateLimitedError);
      expect(error).toMatchObject({
        message: 'HTTP 429: Rate limit exceeded',
        status_code: 429,
        retry_after_ms: 3_000,
      });
    });

    it('falls back to the body resetAt for the 429 hint', async () => {
      jest.useFakeTimers();
      jest.setSystemTime(new Date('2026-03-01T09:00:00.000Z'));
      try {
        const error = await sendError(
          httpError(429, { error: 'Rate limit exceeded', resetAt: '2026-03-01T09:00:05.000Z' })
        );
        expect(error.retry_after_ms).toBe(5_000);
      } finally {
        jest.useRealTimers();
      }
    });

    it('classifies 5xx as retryable server errors with the body details', async () => {
      const error = await sendError(httpError(503, { error: 'Unavailable', details: 'model overloaded' }));
      expect(error).toBeInstanceOf(ServerError);
      expect(error).toMatchObject({ message: 'HTTP 503: model overloaded', status_code: 503, retryable: true });
    });

    it('classifies 408 as a timeout', async () => {
      expect(await sendError(httpError(408, ''))).toBeInstanceOf(TimeoutError);
    });

    it('classifies other 4xx as terminal client errors', async () => {
      const error = await sendError(httpError(413, { error: 'Text too long' }));
      expect(error).toBeInstanceOf(ClientError);
      expect(error).toMatchObject({ message: 'HTTP 413: Text too long', status_code: 413, retryable: false });
    });

    it('maps bare socket errors by code', async () => {
      const reset = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
      const error = await sendError(reset);
      expect(error).toBeInstanceOf(NetworkError);
      expect(error.message).toBe('Network failure (ECONNRESET)');
    });
  });

  describe('checkHealth', () => {
    it('is healthy on HTTP 200', async () => {
      get.mockResolvedValue({ status: 200, data: { status: 'ok' } });

      await expect(transport.checkHealth()).resolves.toBe(true);
      expect(get.mock.calls[0][0]).toBe('http://localhost:3000/api/health');
      expect(get.mock.calls[0][1]).toMatchObject({ timeout: 3_000 });
    });

    it('is unhealthy on any other status', async () => {
      get.mockResolvedValue({ status: 503, data: {} });
      await expect(transport.checkHealth()).resolves.toBe(false);
    });

    it('is unhealthy when the request fails', async () => {
      get.mockRejectedValue(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'));
      await expect(transport.checkHealth()).resolves.toBe(false);
    });
  });
});

describe('parseRetryAfter', () => {
  const now = Date.parse('2026-03-01T09:00:00.000Z');

  it('reads delta-seconds', () => {
    expect(parseRetryAfter('2', now)).toBe(2_000);
    expect(parseRetryAfter('1.5', now)).toBe(1_500);
  });

  it('reads an HTTP date', () => {
    expect(parseRetryAfter('Sun, 01 Mar 2026 09:00:10 GMT', now)).toBe(10_000);
  });

  it('never returns a negative delay for a past date', () => {
    expect(parseRetryAfter('Sun, 01 Mar 2026 08:59:00 GMT', now)).toBe(0);
  });

  it('ignores values it cannot read', () => {
    expect(parseRetryAfter('soon', now)).toBeUndefined();
    expect(parseRetryAfter(undefined, now)).toBeUndefined();
    expect(parseRetryAfter('', now)).toBeUndefined();
  });
});

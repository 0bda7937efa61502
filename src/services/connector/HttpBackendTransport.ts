/**
 * HTTP Backend Transport
 *
 * POST /api/rewrite for compose and search_query, POST /api/chat for
 * conversational, GET /api/health for status checks.
 *
 * Every failure is rethrown as a TransportError:
 * - no response: TimeoutError (ECONNABORTED/ETIMEDOUT) or NetworkError
 * - 429: RateLimitedError with the Retry-After header or body resetAt as hint
 * - 5xx or a 2xx body that fails validation: ServerError
 * - other 4xx: ClientError
 * - aborted by the coordinator: CancelledError
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { Logger } from '../core/Logger';
import type {
  BackendRequest,
  BackendResponse,
  BackendTransport,
  CredentialStore,
} from '../../types/BackendTypes';
import { assertNever, DEFAULT_COMPOSE_OPTIONS } from '../../types/ModeTypes';
import type { Usage } from '../../types/CommonTypes';
import {
  CancelledError,
  ClientError,
  NetworkError,
  RateLimitedError,
  ServerError,
  TimeoutError,
  TransportError,
} from '../../types/TransportErrors';

export type HttpClient = Pick<AxiosInstance, 'get' | 'post'>;

export interface HttpBackendTransportOptions {
  baseUrl: string;
  locale: string;
  requestTimeoutMs: number;
  healthCheckTimeoutMs: number;
}

const SEARCH_QUERY_PRESET = 'search_query';

const TIMEOUT_CODES = ['ECONNABORTED', 'ETIMEDOUT'];
const NETWORK_CODES = ['ENOTFOUND', 'EAI_AGAIN', 'ECONNREFUSED', 'ECONNRESET', 'EHOSTUNREACH', 'ENETUNREACH'];

const UsageSchema = z
  .object({
    prompt_tokens: z.number().int().nonnegative().optional(),
    completion_tokens: z.number().int().nonnegative().optional(),
    total_tokens: z.number().int().nonnegative().optional(),
    model: z.string().optional(),
  })
  .transform((u): Usage => ({
    ...(u.prompt_tokens !== undefined ? { promptTokens: u.prompt_tokens } : {}),
    ...(u.completion_tokens !== undefined ? { completionTokens: u.completion_tokens } : {}),
    ...(u.total_tokens !== undefined ? { totalTokens: u.total_tokens } : {}),
    ...(u.model !== undefined ? { model: u.model } : {}),
  }));

const SuccessBodySchema = z.object({
  text: z.string(),
  usage: UsageSchema.optional(),
});

const ErrorBodySchema = z.object({
  error: z.string().optional(),
  details: z.string().optional(),
  message: z.string().optional(),
  resetAt: z.string().optional(),
});

type ErrorBody = z.infer<typeof ErrorBodySchema>;

export class HttpBackendTransport implements BackendTransport {
  constructor(
    private readonly options: HttpBackendTransportOptions,
    private readonly logger: Logger,
    private readonly credentials?: CredentialStore,
    private readonly client: HttpClient = axios.create()
  ) {}

  async send(request: BackendRequest, signal: AbortSignal): Promise<BackendResponse> {
    const { path, body } = this.buildCall(request);
    const headers = await this.buildHeaders();

    this.logger.debug('Backend request', {
      path,
      mode: request.mode,
      contextLength: request.contextLength,
    });

    let data: unknown;
    try {
      const response = await this.client.post<unknown>(`${this.options.baseUrl}${path}`, body, {
        headers,
        timeout: this.options.requestTimeoutMs,
        signal,
      });
      data = response.data;
    } catch (error) {
      throw this.classify(error);
    }

    const parsed = SuccessBodySchema.safeParse(data);
    if (!parsed.success) {
      const errorBody = ErrorBodySchema.safeParse(data);
      const detail = errorBody.success ? errorMessageFrom(errorBody.data) : '';
      throw new ServerError(
        `Invalid response from backend${detail ? `: ${detail}` : ''}. ${parsed.error.message}`,
        200
      );
    }

    return {
      result: parsed.data.text.trim(),
      ...(parsed.data.usage ? { usage: parsed.data.usage } : {}),
    };
  }

  /**
   * Any HTTP 200 counts as healthy; the body shape is not checked.
   */
  async checkHealth(): Promise<boolean> {
    try {
      const response = await this.client.get<unknown>(`${this.options.baseUrl}/api/health`, {
        timeout: this.options.healthCheckTimeoutMs,
        validateStatus: () => true,
      });
      if (response.status !== 200) {
        this.logger.warn('Health check non-200 status', { status: response.status });
      }
      return response.status === 200;
    } catch (error) {
      this.logger.warn('Health check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private buildCall(request: BackendRequest): { path: string; body: Record<string, unknown> } {
    switch (request.mode) {
      case 'compose':
      case 'search_query': {
        const options = request.composeOptions ?? DEFAULT_COMPOSE_OPTIONS;
        const preset = request.mode === 'search_query' ? SEARCH_QUERY_PRESET : options.preset;
        return {
          path: '/api/rewrite',
          body: {
            text: request.text,
            tone: options.tone,
            length: options.length,
            locale: this.options.locale,
            contextLength: request.contextLength,
            ...(preset ? { preset } : {}),
          },
        };
      }
      case 'conversational':
        return {
          path: '/api/chat',
          body: { query: request.text, contextLength: request.contextLength },
        };
      case 'snippet':
        throw new ClientError('Snippet mode is resolved locally and has no backend endpoint');
      default:
        return assertNever(request.mode);
    }
  }

  private async buildHeaders(): Promise<Record<string, string>> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (!this.credentials) {
      return headers;
    }
    let apiKey: string | null;
    try {
      apiKey = await this.credentials.getApiKey();
    } catch (error) {
      throw new ClientError(
        `Credential store unavailable: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (apiKey) {
      headers['Authorization'] = `Bearer ${apiKey}`;
    }
    return headers;
  }

  private classify(error: unknown): TransportError {
    if (error instanceof TransportError) {
      return error;
    }
    if (axios.isCancel(error)) {
      return new CancelledError();
    }
    if (axios.isAxiosError(error)) {
      const response = error.response;
      if (!response) {
        if (error.code === 'ERR_CANCELED') {
          return new CancelledError();
        }
        if (error.code && TIMEOUT_CODES.includes(error.code)) {
          return new TimeoutError(`Request timed out: ${error.message}`);
        }
        return new NetworkError(`Network failure: ${error.message}`, error);
      }

      const status = response.status;
      const body = ErrorBodySchema.safeParse(response.data);
      const detail = body.success ? errorMessageFrom(body.data) : '';
      const message = `HTTP ${status}${detail ? `: ${detail}` : ''}`;

      if (status === 429) {
        const hint =
          parseRetryAfter(response.headers['retry-after']) ??
          (body.success ? parseResetAt(body.data.resetAt) : undefined);
        return new RateLimitedError(message, hint);
      }
      if (status >= 500) {
        return new ServerError(message, status);
      }
      if (status === 408) {
        return new TimeoutError(message);
      }
      return new ClientError(message, status);
    }

    const code = errorCode(error);
    if (code && TIMEOUT_CODES.includes(code)) {
      return new TimeoutError(`Request timed out (${code})`);
    }
    if (code && NETWORK_CODES.includes(code)) {
      return new NetworkError(`Network failure (${code})`, error);
    }
    return new NetworkError(error instanceof Error ? error.message : String(error), error);
  }
}

function errorMessageFrom(body: ErrorBody): string {
  return body.details ?? body.message ?? body.error ?? '';
}

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Retry-After is either delta-seconds or an HTTP date.
 */
export function parseRetryAfter(value: unknown, nowMs: number = Date.now()): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0) {
    return value * 1000;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }
  const dateMs = Date.parse(trimmed);
  if (Number.isNaN(dateMs)) {
    return undefined;
  }
  return Math.max(0, dateMs - nowMs);
}

function parseResetAt(value: string | undefined, nowMs: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }
  const resetMs = Date.parse(value);
  return Number.isNaN(resetMs) ? undefined : Math.max(0, resetMs - nowMs);
}

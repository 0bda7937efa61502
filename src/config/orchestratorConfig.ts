/**
 * Orchestrator config: environment variables -> validated, typed settings.
 * Every variable is optional; defaults match the DEFAULT_* constants in src/types.
 */

import { z } from 'zod';
import type { CircuitBreakerConfig } from '../types/CircuitBreakerTypes';
import type { RetryPolicyConfig } from '../types/RetryTypes';
import type { ResponseCacheConfig } from '../types/CacheTypes';
import type { CoordinatorConfig } from '../services/orchestration/RequestCoordinator';
import type { HttpBackendTransportOptions } from '../services/connector/HttpBackendTransport';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const EnvSchema = z.object({
  BACKEND_BASE_URL: z.string().url('BACKEND_BASE_URL must be a valid URL').default('http://localhost:3000'),
  BACKEND_LOCALE: z.string().min(2).default('en-GB'),
  REQUEST_TIMEOUT_MS: positiveInt(15_000),
  HEALTH_CHECK_TIMEOUT_MS: positiveInt(2_000),
  DEBOUNCE_MS: nonNegativeInt(300),
  MAX_CONTEXT_LENGTH: positiveInt(2_000),
  CACHE_MAX_ENTRIES: positiveInt(64),
  // 0 disables expiry
  CACHE_TTL_MS: nonNegativeInt(300_000),
  CIRCUIT_FAILURE_THRESHOLD: positiveInt(5),
  CIRCUIT_WINDOW_MS: positiveInt(60_000),
  CIRCUIT_COOLDOWN_MS: positiveInt(30_000),
  CIRCUIT_MAX_COOLDOWN_MS: positiveInt(300_000),
  CIRCUIT_COOLDOWN_MULTIPLIER: z.coerce.number().min(1).default(2),
  RETRY_MAX_RETRIES: nonNegativeInt(3),
  RETRY_BASE_DELAY_MS: positiveInt(1_000),
  RETRY_MIN_DELAY_MS: nonNegativeInt(100),
  RETRY_MAX_DELAY_MS: positiveInt(8_000),
  RETRY_JITTER_RATIO: z.coerce.number().min(0).max(1).default(0.3),
  RETRY_MAX_ELAPSED_MS: positiveInt(20_000),
  SNIPPETS_CONTAINER_DIR: z.string().min(1).optional(),
});

export interface OrchestratorConfig {
  backend: HttpBackendTransportOptions;
  coordinator: CoordinatorConfig;
  cache: ResponseCacheConfig;
  circuitBreaker: CircuitBreakerConfig;
  retry: RetryPolicyConfig;
  snippetsContainerDir?: string;
}

export function loadOrchestratorConfig(
  env: Record<string, string | undefined> = process.env
): OrchestratorConfig {
  // Empty strings mean "unset" so .env placeholders fall back to defaults.
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid orchestrator configuration: ${issues}`);
  }
  const e = result.data;

  if (e.CIRCUIT_MAX_COOLDOWN_MS < e.CIRCUIT_COOLDOWN_MS) {
    throw new ConfigurationError(
      'Invalid orchestrator configuration: CIRCUIT_MAX_COOLDOWN_MS must be >= CIRCUIT_COOLDOWN_MS'
    );
  }

  return {
    backend: {
      baseUrl: e.BACKEND_BASE_URL.replace(/\/+$/, ''),
      locale: e.BACKEND_LOCALE,
      requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
      healthCheckTimeoutMs: e.HEALTH_CHECK_TIMEOUT_MS,
    },
    coordinator: {
      debounceMs: e.DEBOUNCE_MS,
      maxContextLength: e.MAX_CONTEXT_LENGTH,
    },
    cache: {
      maxEntries: e.CACHE_MAX_ENTRIES,
      ...(e.CACHE_TTL_MS > 0 ? { ttlMs: e.CACHE_TTL_MS } : {}),
    },
    circuitBreaker: {
      failureThreshold: e.CIRCUIT_FAILURE_THRESHOLD,
      windowMs: e.CIRCUIT_WINDOW_MS,
      cooldownMs: e.CIRCUIT_COOLDOWN_MS,
      cooldownMultiplier: e.CIRCUIT_COOLDOWN_MULTIPLIER,
      maxCooldownMs: e.CIRCUIT_MAX_COOLDOWN_MS,
    },
    retry: {
      maxRetries: e.RETRY_MAX_RETRIES,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      minDelayMs: e.RETRY_MIN_DELAY_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
      jitterRatio: e.RETRY_JITTER_RATIO,
      maxElapsedMs: e.RETRY_MAX_ELAPSED_MS,
    },
    ...(e.SNIPPETS_CONTAINER_DIR ? { snippetsContainerDir: e.SNIPPETS_CONTAINER_DIR } : {}),
  };
}

/**
 * OrchestratorRuntime - owner of process-wide orchestration state
 *
 * Lifecycle: created once at process start; owns the circuit breaker (per endpoint)
 * and the response cache shared by every session. Reset only by an explicit user
 * action (resetForSignOut), never implicitly. teardown() stops every session.
 */

import { Logger } from './Logger';
import { CircuitBreakerService } from '../connector/CircuitBreakerService';
import { RetryScheduler } from '../connector/RetryScheduler';
import { HttpBackendTransport } from '../connector/HttpBackendTransport';
import { ResponseCacheService } from '../orchestration/ResponseCacheService';
import { RequestCoordinator, SessionOptions } from '../orchestration/RequestCoordinator';
import { SharedSnippetSource } from '../snippets/SharedSnippetSource';
import { loadOrchestratorConfig, OrchestratorConfig } from '../../config/orchestratorConfig';
import type {
  BackendTransport,
  CredentialStore,
  ResultSink,
  SnippetSource,
} from '../../types/BackendTypes';

export interface OrchestratorRuntimeDeps {
  config: OrchestratorConfig;
  transport: BackendTransport;
  logger?: Logger;
  snippetSource?: SnippetSource;
  /** Jitter source for the retry scheduler. */
  random?: () => number;
}

export interface BackendStatus {
  healthy: boolean;
  message?: string;
}

export class OrchestratorRuntime {
  readonly circuitBreaker: CircuitBreakerService;
  readonly cache: ResponseCacheService;

  private readonly logger: Logger;
  private readonly retryScheduler: RetryScheduler;
  private readonly sessions = new Set<RequestCoordinator>();

  constructor(private readonly deps: OrchestratorRuntimeDeps) {
    this.logger = deps.logger ?? new Logger('OrchestratorRuntime');
    this.circuitBreaker = new CircuitBreakerService(new Logger('CircuitBreakerService'), deps.config.circuitBreaker);
    this.cache = new ResponseCacheService(new Logger('ResponseCacheService'), deps.config.cache);
    this.retryScheduler = new RetryScheduler(deps.config.retry, deps.random);
  }

  /**
   * Build a runtime from environment variables with the HTTP transport.
   */
  static fromEnv(
    env: Record<string, string | undefined> = process.env,
    credentials?: CredentialStore
  ): OrchestratorRuntime {
    const config = loadOrchestratorConfig(env);
    const logger = new Logger('OrchestratorRuntime');
    const transport = new HttpBackendTransport(config.backend, new Logger('HttpBackendTransport'), credentials);
    const snippetSource = config.snippetsContainerDir
      ? new SharedSnippetSource(config.snippetsContainerDir, new Logger('SharedSnippetSource'))
      : undefined;
    return new OrchestratorRuntime({ config, transport, logger, snippetSource });
  }

  get activeSessionCount(): number {
    return this.sessions.size;
  }

  createSession(sink: ResultSink, options: SessionOptions = {}): RequestCoordinator {
    const coordinator = new RequestCoordinator(
      {
        transport: this.deps.transport,
        circuitBreaker: this.circuitBreaker,
        cache: this.cache,
        retryScheduler: this.retryScheduler,
        sink,
        logger: new Logger('RequestCoordinator'),
        snippetSource: this.deps.snippetSource,
        config: this.deps.config.coordinator,
      },
      {
        ...options,
        onTeardown: (session) => {
          this.sessions.delete(session);
          options.onTeardown?.(session);
        },
      }
    );
    this.sessions.add(coordinator);
    this.logger.info('Session created', { sessionId: coordinator.sessionId });
    return coordinator;
  }

  /**
   * Proactive status check against the backend health endpoint.
   */
  async checkBackendStatus(): Promise<BackendStatus> {
    if (!this.deps.transport.checkHealth) {
      return { healthy: true };
    }
    const healthy = await this.deps.transport.checkHealth();
    return healthy ? { healthy } : { healthy, message: 'Backend service unavailable' };
  }

  /**
   * Explicit user reset (e.g. sign-out): forget breaker history and cached results.
   */
  resetForSignOut(): void {
    this.circuitBreaker.resetAll();
    this.cache.clear();
    this.logger.info('Runtime state reset for sign-out');
  }

  teardown(): void {
    for (const session of [...this.sessions]) {
      session.teardown();
    }
    this.sessions.clear();
  }
}

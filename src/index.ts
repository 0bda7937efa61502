/**
 * Keyboard assist orchestration core
 *
 * Library entry point. Hosts create one OrchestratorRuntime per process and one
 * session (RequestCoordinator) per input surface.
 *
 * Running this file directly loads .env and checks the configured backend.
 */

import { config } from 'dotenv';
import { OrchestratorRuntime } from './services/core/OrchestratorRuntime';
import { Logger } from './services/core/Logger';

export { OrchestratorRuntime } from './services/core/OrchestratorRuntime';
export type { BackendStatus, OrchestratorRuntimeDeps } from './services/core/OrchestratorRuntime';
export { Logger } from './services/core/Logger';
export { RequestCoordinator, DEFAULT_COORDINATOR_CONFIG } from './services/orchestration/RequestCoordinator';
export type { CoordinatorConfig, SessionOptions } from './services/orchestration/RequestCoordinator';
export { RequestSequencer } from './services/orchestration/RequestSequencer';
export { DebounceGate } from './services/orchestration/DebounceGate';
export { ResponseCacheService } from './services/orchestration/ResponseCacheService';
export { computeFingerprint, normalizeText } from './services/orchestration/Fingerprint';
export { CircuitBreakerService } from './services/connector/CircuitBreakerService';
export { RetryScheduler } from './services/connector/RetryScheduler';
export { HttpBackendTransport } from './services/connector/HttpBackendTransport';
export { SharedSnippetSource, searchSnippets } from './services/snippets/SharedSnippetSource';
export { loadOrchestratorConfig, ConfigurationError } from './config/orchestratorConfig';
export type { OrchestratorConfig } from './config/orchestratorConfig';
export * from './types/ModeTypes';
export * from './types/TransportErrors';
export * from './types/RequestTypes';
export * from './types/BackendTypes';
export * from './types/CircuitBreakerTypes';
export * from './types/CacheTypes';
export * from './types/RetryTypes';
export * from './types/CommonTypes';

async function main() {
  config();
  const logger = new Logger('main');
  const runtime = OrchestratorRuntime.fromEnv();
  try {
    const status = await runtime.checkBackendStatus();
    if (status.healthy) {
      logger.info('Backend healthy');
    } else {
      logger.error('Backend unhealthy', { message: status.message });
      process.exitCode = 1;
    }
  } finally {
    runtime.teardown();
  }
}

// Run main function if this file is executed directly
if (require.main === module) {
  main().catch((error) => {
    console.error('Error:', error);
    process.exit(1);
  });
}

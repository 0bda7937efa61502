/**
 * Input-surface modes and the per-mode routing rules.
 */

export type Mode = 'compose' | 'search_query' | 'conversational' | 'snippet';

export const MODES: readonly Mode[] = ['compose', 'search_query', 'conversational', 'snippet'];

/** Backend endpoints; snippet mode resolves locally and has none. */
export type EndpointId = 'rewrite' | 'chat';

/** Rewrite parameters for compose mode (0 = casual/detailed, 1 = formal/brief). */
export interface ComposeOptions {
  tone: number;
  length: number;
  preset?: string;
}

export const DEFAULT_COMPOSE_OPTIONS: ComposeOptions = {
  tone: 0.5,
  length: 0.5,
};

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}

/**
 * compose/search_query -> rewrite, conversational -> chat, snippet -> null (local).
 */
export function endpointIdForMode(mode: Mode): EndpointId | null {
  switch (mode) {
    case 'compose':
    case 'search_query':
      return 'rewrite';
    case 'conversational':
      return 'chat';
    case 'snippet':
      return null;
    default:
      return assertNever(mode);
  }
}

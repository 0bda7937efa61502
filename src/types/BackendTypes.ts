/**
 * External collaborator boundaries: backend transport, credentials, snippets, result sink.
 */

import type { ComposeOptions, Mode } from './ModeTypes';
import type { Usage } from './CommonTypes';
import type { PublishedOutcome } from './RequestTypes';

export interface BackendRequest {
  mode: Mode;
  text: string;
  contextLength: number;
  composeOptions?: ComposeOptions;
}

export interface BackendResponse {
  result: string;
  usage?: Usage;
}

/**
 * Implementations reject with a TransportError and must honour the abort signal.
 */
export interface BackendTransport {
  send(request: BackendRequest, signal: AbortSignal): Promise<BackendResponse>;
  checkHealth?(): Promise<boolean>;
}

/** Read-only; the core never persists secrets. */
export interface CredentialStore {
  getApiKey(): Promise<string | null>;
}

export interface Snippet {
  id: string;
  title: string;
  text: string;
  pinned: boolean;
  lastUsed?: string;
}

/** Read-only view of the shared snippet container. */
export interface SnippetSource {
  getSnippets(): readonly Snippet[];
}

/** Receives zero or one publish per candidate. */
export interface ResultSink {
  publish(outcome: PublishedOutcome): void;
}

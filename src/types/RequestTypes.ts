import type { ComposeOptions, Mode } from './ModeTypes';
import type { FailureKind } from './TransportErrors';
import type { Usage } from './CommonTypes';
import type { Snippet } from './BackendTypes';

export type CandidateTrigger = 'edit' | 'mode_change';

/**
 * One stamped unit of user intent. Superseded candidates are dropped, never mutated.
 */
export interface RequestCandidate {
  readonly session_id: string;
  readonly fingerprint: string;
  readonly sequence: number;
  readonly mode: Mode;
  readonly text: string;
  readonly trigger: CandidateTrigger;
  readonly created_at_ms: number;
  readonly compose_options?: ComposeOptions;
}

export type ResultSource = 'backend' | 'cache' | 'snippets';

export interface ResultOutcome {
  kind: 'result';
  session_id: string;
  sequence: number;
  mode: Mode;
  text: string;
  source: ResultSource;
  usage?: Usage;
  snippets?: readonly Snippet[];
}

export interface FailureOutcome {
  kind: 'failure';
  session_id: string;
  sequence: number;
  mode: Mode;
  failure_kind: Exclude<FailureKind, 'cancelled'>;
  message: string;
  user_message: string;
  status_code?: number;
  retry_after_ms?: number;
  attempts: number;
  exhausted: boolean;
}

export type PublishedOutcome = ResultOutcome | FailureOutcome;

/** Read-only view of a session for the UI layer. */
export interface SessionSnapshot {
  session_id: string;
  mode: Mode;
  text: string;
  compose_options: ComposeOptions;
  latest_sequence: number;
  in_flight_sequence: number | null;
  pending_sequence: number | null;
  last_published_sequence: number;
  torn_down: boolean;
}

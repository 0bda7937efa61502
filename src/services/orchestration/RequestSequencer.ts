import type { ComposeOptions, Mode } from '../../types/ModeTypes';
import type { CandidateTrigger, RequestCandidate } from '../../types/RequestTypes';
import { composeVariant, computeFingerprint } from './Fingerprint';

/**
 * Issues session-scoped sequence numbers. The only authority on whether a
 * result is still relevant.
 */
export class RequestSequencer {
  private latest = 0;

  constructor(private readonly sessionId: string) {}

  get latestSequence(): number {
    return this.latest;
  }

  /**
   * Always issues a new sequence, even for an unchanged fingerprint.
   */
  stamp(
    mode: Mode,
    text: string,
    trigger: CandidateTrigger = 'edit',
    composeOptions?: ComposeOptions
  ): RequestCandidate {
    this.latest += 1;
    const options = mode === 'compose' ? composeOptions : undefined;
    return {
      session_id: this.sessionId,
      fingerprint: computeFingerprint(mode, text, options ? composeVariant(options) : undefined),
      sequence: this.latest,
      mode,
      text,
      trigger,
      created_at_ms: Date.now(),
      ...(options ? { compose_options: { ...options } } : {}),
    };
  }

  /** Strict equality; a newer stamp makes every older candidate stale. */
  isCurrent(candidate: RequestCandidate): boolean {
    return candidate.sequence === this.latest;
  }
}

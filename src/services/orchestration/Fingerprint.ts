/**
 * Content fingerprints: mode + normalized text (+ compose options) -> SHA-256 hex.
 */

import { createHash } from 'crypto';
import { assertNever } from '../../types/ModeTypes';
import type { ComposeOptions, Mode } from '../../types/ModeTypes';

const WHITESPACE_RUN = /\s+/g;

/**
 * Collapse whitespace and trim. search_query and snippet lookups are case-insensitive;
 * compose and conversational keep case because the backend output depends on it.
 */
export function normalizeText(mode: Mode, text: string): string {
  const collapsed = text.replace(WHITESPACE_RUN, ' ').trim();
  switch (mode) {
    case 'search_query':
    case 'snippet':
      return collapsed.toLowerCase();
    case 'compose':
    case 'conversational':
      return collapsed;
    default:
      return assertNever(mode);
  }
}

/** Stable key for compose options; other modes have no variant. */
export function composeVariant(options: ComposeOptions): string {
  return `tone=${options.tone};length=${options.length};preset=${options.preset ?? ''}`;
}

export function computeFingerprint(mode: Mode, text: string, variant?: string): string {
  return createHash('sha256')
    .update(mode)
    .update('\u0000')
    .update(normalizeText(mode, text))
    .update('\u0000')
    .update(variant ?? '')
    .digest('hex');
}

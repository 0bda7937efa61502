/**
 * User-facing copy for published failures. Short, one action each.
 */

import type { FailureKind } from '../types/TransportErrors';
import { assertNever } from '../types/ModeTypes';

const OFFLINE = 'No connection. Check your internet and try again.';
const DEGRADED = "AI isn't responding. Please try again.";
const SLOW = 'Taking too long. Please try again.';
const THROTTLED = 'Too many requests. Please wait and try again.';
const GENERIC = 'Something went wrong. Please try again.';

export function userMessageForStatus(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return "Couldn't process that. Please try again.";
    case 401:
      return 'Authentication problem. Please sign in again.';
    case 403:
      return 'Access denied.';
    case 404:
      return "Couldn't find that. Please try again.";
    case 413:
      return 'That text is too long. Try a shorter selection.';
    case 429:
      return THROTTLED;
    case 500:
    case 502:
    case 503:
      return DEGRADED;
    case 504:
      return SLOW;
    default:
      return GENERIC;
  }
}

export function userMessageForFailure(
  kind: Exclude<FailureKind, 'cancelled'>,
  statusCode?: number,
  retriesExhausted: number = 0
): string {
  let message: string;
  switch (kind) {
    case 'network':
      message = OFFLINE;
      break;
    case 'timeout':
      message = SLOW;
      break;
    case 'rate_limited':
      message = THROTTLED;
      break;
    case 'circuit_open':
      message = DEGRADED;
      break;
    case 'server_error':
    case 'client_error':
      message = statusCode !== undefined ? userMessageForStatus(statusCode) : GENERIC;
      break;
    default:
      message = assertNever(kind);
  }
  if (retriesExhausted > 0) {
    const plural = retriesExhausted === 1 ? 'time' : 'times';
    message = `${message} Retried ${retriesExhausted} ${plural} without success.`;
  }
  return message;
}

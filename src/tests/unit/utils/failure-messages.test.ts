import { userMessageForFailure, userMessageForStatus } from '../../../utils/failure-messages';

describe('userMessageForStatus', () => {
  it.each([
    [400, "Couldn't process that. Please try again."],
    [401, 'Authentication problem. Please sign in again.'],
    [403, 'Access denied.'],
    [404, "Couldn't find that. Please try again."],
    [413, 'That text is too long. Try a shorter selection.'],
    [429, 'Too many requests. Please wait and try again.'],
    [502, "AI isn't responding. Please try again."],
    [504, 'Taking too long. Please try again.'],
    [418, 'Something went wrong. Please try again.'],
  ])('maps %i', (status, message) => {
    expect(userMessageForStatus(status)).toBe(message);
  });
});

describe('userMessageForFailure', () => {
  it('maps failure kinds without a status', () => {
    expect(userMessageForFailure('network')).toBe('No connection. Check your internet and try again.');
    expect(userMessageForFailure('timeout')).toBe('Taking too long. Please try again.');
    expect(userMessageForFailure('rate_limited')).toBe('Too many requests. Please wait and try again.');
    expect(userMessageForFailure('circuit_open')).toBe("AI isn't responding. Please try again.");
    expect(userMessageForFailure('server_error')).toBe('Something went wrong. Please try again.');
  });

  it('uses the status for server and client errors', () => {
    expect(userMessageForFailure('server_error', 503)).toBe("AI isn't responding. Please try again.");
    expect(userMessageForFailure('client_error', 401)).toBe('Authentication problem. Please sign in again.');
  });

  it('mentions exhausted retries', () => {
    expect(userMessageForFailure('timeout', undefined, 1)).toBe(
      'Taking too long. Please try again. Retried 1 time without success.'
    );
    expect(userMessageForFailure('server_error', 500, 3)).toBe(
      "AI isn't responding. Please try again. Retried 3 times without success."
    );
  });
});

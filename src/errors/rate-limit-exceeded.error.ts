/**
 * Returned inside a reject decision when a client has no tokens left.
 * Not thrown by the admission service itself; callers decide how to surface it.
 */
export class RateLimitExceededError extends Error {
  constructor(
    public readonly clientKey: string,
    public readonly retryAfterMs: number,
  ) {
    super(
      `Rate limit exceeded for client ${clientKey}, retry after ${retryAfterMs}ms`,
    );
    this.name = 'RateLimitExceededError';
  }
}

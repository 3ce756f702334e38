import { IClientBucket } from '../interfaces/bucket.interface';
import { ResolvedAdmissionPolicy } from '../interfaces/config.interface';
import {
  AdmissionDecision,
  DecisionType,
  QueueState,
} from '../interfaces/decision.interface';
import { RateLimitExceededError } from '../errors/rate-limit-exceeded.error';

// Absorbs float drift so a bucket refilled to exactly one token can spend it
const TOKEN_EPSILON = 1e-9;

export const NOT_QUEUED: QueueState = { queuedOthers: 0, waitedMs: 0 };

/**
 * A fresh bucket starts full
 */
export function createBucket(
  key: string,
  now: number,
  policy: ResolvedAdmissionPolicy,
): IClientBucket {
  return { key, tokens: policy.burst, lastRefill: now };
}

/**
 * Refill a token bucket based on elapsed time.
 * Elapsed time is clamped to the full refill time, and a clock that moved
 * backwards only resets the baseline.
 */
export function refillBucket(
  bucket: IClientBucket,
  now: number,
  policy: ResolvedAdmissionPolicy,
): void {
  // Stored state may predate a policy change
  bucket.tokens = Math.min(policy.burst, Math.max(0, bucket.tokens));

  const elapsedMs = now - bucket.lastRefill;

  if (elapsedMs < 0) {
    bucket.lastRefill = now;
    return;
  }

  if (elapsedMs === 0) {
    return;
  }

  const creditedMs = Math.min(elapsedMs, policy.fullRefillMs);
  bucket.tokens = Math.min(
    policy.burst,
    bucket.tokens + (creditedMs * policy.rate) / 1000,
  );
  bucket.lastRefill = now;
}

/**
 * Time until the bucket holds one whole token
 */
export function msUntilNextToken(
  bucket: IClientBucket,
  policy: ResolvedAdmissionPolicy,
): number {
  if (bucket.tokens + TOKEN_EPSILON >= 1) {
    return 0;
  }
  return Math.ceil(((1 - bucket.tokens) / policy.rate) * 1000);
}

/**
 * Spend one token from an already refilled bucket, or decide how the request
 * should be held back.
 */
export function takeToken(
  bucket: IClientBucket,
  policy: ResolvedAdmissionPolicy,
  queue: QueueState = NOT_QUEUED,
): AdmissionDecision {
  if (bucket.tokens + TOKEN_EPSILON >= 1) {
    bucket.tokens = Math.max(0, bucket.tokens - 1);
    return {
      type: DecisionType.ALLOW,
      clientKey: bucket.key,
      remainingTokens: bucket.tokens,
    };
  }

  const waitMs = msUntilNextToken(bucket, policy);

  if (
    policy.delayMode &&
    queue.queuedOthers < policy.maxQueuedPerClient &&
    queue.waitedMs + waitMs <= policy.maxDelayMs
  ) {
    return {
      type: DecisionType.DELAY,
      clientKey: bucket.key,
      delayMs: waitMs,
      remainingTokens: bucket.tokens,
    };
  }

  return {
    type: DecisionType.REJECT,
    clientKey: bucket.key,
    retryAfterMs: waitMs,
    remainingTokens: bucket.tokens,
    error: new RateLimitExceededError(bucket.key, waitMs),
  };
}

/**
 * Refill then take a token
 */
export function decide(
  bucket: IClientBucket,
  now: number,
  policy: ResolvedAdmissionPolicy,
  queue: QueueState = NOT_QUEUED,
): AdmissionDecision {
  refillBucket(bucket, now, policy);
  return takeToken(bucket, policy, queue);
}

import {
  createBucket,
  decide,
  msUntilNextToken,
  refillBucket,
  takeToken,
} from '../token-bucket';
import { resolvePolicy } from '../policy';
import { DecisionType } from '../../interfaces/decision.interface';
import { IClientBucket } from '../../interfaces/bucket.interface';
import { RateLimitExceededError } from '../../errors/rate-limit-exceeded.error';

describe('token bucket', () => {
  const policy = resolvePolicy({ rate: 5, burst: 15 });
  const delayPolicy = resolvePolicy({ rate: 5, burst: 15, delayMode: true });

  const drain = (bucket: IClientBucket, now: number): number => {
    let allowed = 0;
    while (decide(bucket, now, policy).type === DecisionType.ALLOW) {
      allowed++;
    }
    return allowed;
  };

  it('should start a new bucket full', () => {
    expect(createBucket('10.0.0.1', 1000, policy)).toEqual({
      key: '10.0.0.1',
      tokens: 15,
      lastRefill: 1000,
    });
  });

  it('should allow a full burst and reject the next request', () => {
    const bucket = createBucket('10.0.0.1', 0, policy);

    for (let i = 0; i < 15; i++) {
      expect(decide(bucket, 0, policy).type).toBe(DecisionType.ALLOW);
    }

    const decision = decide(bucket, 0, policy);
    expect(decision.type).toBe(DecisionType.REJECT);
    if (decision.type !== DecisionType.REJECT) {
      return;
    }
    expect(decision.retryAfterMs).toBe(200);
    expect(decision.error).toBeInstanceOf(RateLimitExceededError);
    expect(decision.error.message).toBe(
      'Rate limit exceeded for client 10.0.0.1, retry after 200ms',
    );
    expect(bucket.tokens).toBe(0);
  });

  it('should refill at the configured rate', () => {
    const bucket = createBucket('10.0.0.1', 0, policy);
    expect(drain(bucket, 0)).toBe(15);

    expect(drain(bucket, 1000)).toBe(5);
    expect(bucket.tokens).toBe(0);
  });

  it('should report remaining tokens on allow', () => {
    const bucket = createBucket('10.0.0.1', 0, policy);

    expect(decide(bucket, 0, policy)).toEqual({
      type: DecisionType.ALLOW,
      clientKey: '10.0.0.1',
      remainingTokens: 14,
    });
  });

  it('should cap the refill of an idle client at the burst size', () => {
    const bucket = createBucket('10.0.0.1', 0, policy);
    drain(bucket, 0);

    refillBucket(bucket, 10_000, policy);

    expect(bucket.tokens).toBe(15);
    expect(bucket.lastRefill).toBe(10_000);
  });

  it('should only reset the baseline when the clock goes backwards', () => {
    const bucket: IClientBucket = { key: 'k', tokens: 2, lastRefill: 5000 };

    refillBucket(bucket, 4000, policy);
    expect(bucket).toEqual({ key: 'k', tokens: 2, lastRefill: 4000 });

    refillBucket(bucket, 4200, policy);
    expect(bucket.tokens).toBe(3);
  });

  it('should clamp stored tokens into range', () => {
    const overfull: IClientBucket = { key: 'k', tokens: 20, lastRefill: 0 };
    const negative: IClientBucket = { key: 'k', tokens: -3, lastRefill: 0 };

    refillBucket(overfull, 0, policy);
    refillBucket(negative, 0, policy);

    expect(overfull.tokens).toBe(15);
    expect(negative.tokens).toBe(0);
  });

  it('should accrue fractional tokens', () => {
    const bucket: IClientBucket = { key: 'k', tokens: 0, lastRefill: 0 };

    refillBucket(bucket, 100, policy);

    expect(bucket.tokens).toBe(0.5);
    expect(msUntilNextToken(bucket, policy)).toBe(100);
    expect(takeToken(bucket, policy).type).toBe(DecisionType.REJECT);
  });

  it('should allow once exactly one token has accrued', () => {
    const bucket: IClientBucket = { key: 'k', tokens: 0, lastRefill: 0 };

    expect(decide(bucket, 200, policy).type).toBe(DecisionType.ALLOW);
    expect(bucket.tokens).toBe(0);
  });

  it('should report no wait while a token is available', () => {
    expect(
      msUntilNextToken({ key: 'k', tokens: 1, lastRefill: 0 }, policy),
    ).toBe(0);
  });

  it('should keep clients independent', () => {
    const a = createBucket('a', 0, policy);
    const b = createBucket('b', 0, policy);
    drain(a, 0);

    expect(decide(b, 0, policy).type).toBe(DecisionType.ALLOW);
  });

  describe('sustained rate', () => {
    it.each([3, 5, 7, 0.5])(
      'should never reject a client holding %p r/s from a full bucket',
      (rate) => {
        const sustained = resolvePolicy({ rate, burst: 15 });
        const bucket = createBucket('k', 0, sustained);

        for (let i = 0; i < 2000; i++) {
          const decision = decide(bucket, (i * 1000) / rate, sustained);
          expect(decision.type).toBe(DecisionType.ALLOW);
          expect(bucket.tokens).toBeGreaterThanOrEqual(0);
          expect(bucket.tokens).toBeLessThanOrEqual(15);
        }
      },
    );

    it.each([3, 7])(
      'should never reject a client holding %p r/s from an empty bucket',
      (rate) => {
        const sustained = resolvePolicy({ rate, burst: 15 });
        const bucket: IClientBucket = { key: 'k', tokens: 0, lastRefill: 0 };

        const rejected = Array.from({ length: 2000 }, (_, i) =>
          decide(bucket, ((i + 1) * 1000) / rate, sustained),
        ).filter((decision) => decision.type !== DecisionType.ALLOW);

        expect(rejected).toHaveLength(0);
      },
    );
  });

  describe('delay mode', () => {
    const empty = (): IClientBucket => ({ key: 'k', tokens: 0, lastRefill: 0 });

    it('should delay until the next token instead of rejecting', () => {
      expect(decide(empty(), 0, delayPolicy)).toEqual({
        type: DecisionType.DELAY,
        clientKey: 'k',
        delayMs: 200,
        remainingTokens: 0,
      });
    });

    it('should reject once the client queue is full', () => {
      const decision = decide(empty(), 0, delayPolicy, {
        queuedOthers: 15,
        waitedMs: 0,
      });

      expect(decision.type).toBe(DecisionType.REJECT);
    });

    it('should reject when the total wait would exceed maxDelayMs', () => {
      expect(
        decide(empty(), 0, delayPolicy, { queuedOthers: 0, waitedMs: 2900 })
          .type,
      ).toBe(DecisionType.REJECT);
      expect(
        decide(empty(), 0, delayPolicy, { queuedOthers: 0, waitedMs: 2800 })
          .type,
      ).toBe(DecisionType.DELAY);
    });

    it('should not take a token when delaying', () => {
      const bucket: IClientBucket = { key: 'k', tokens: 0.5, lastRefill: 0 };

      decide(bucket, 0, delayPolicy);

      expect(bucket.tokens).toBe(0.5);
    });
  });
});

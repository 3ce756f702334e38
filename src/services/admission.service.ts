import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { v4 as uuidv4 } from 'uuid';
import {
  RequestAdmissionConfig,
  ResolvedAdmissionPolicy,
  StorageFailureMode,
} from '../interfaces/config.interface';
import { IBucketStorageAdapter } from '../interfaces/storage-adapter.interface';
import {
  AdmissionDecision,
  DecisionType,
  FinalDecision,
} from '../interfaces/decision.interface';
import { RateLimitExceededError } from '../errors/rate-limit-exceeded.error';
import {
  DEFAULT_IDLE_SWEEP_INTERVAL_MS,
  DEFAULT_LOCK_DURATION_MS,
  DEFAULT_LOCK_RETRY_MS,
  DEFAULT_LOCK_WAIT_MS,
  IDLE_SWEEP_INTERVAL_NAME,
  REQUEST_ADMISSION_CLOCK,
  REQUEST_ADMISSION_CONFIG,
  REQUEST_ADMISSION_STORAGE_ADAPTER,
} from '../utils/constants';
import { AdmissionClock } from '../utils/clock';
import { KeyedMutex } from '../utils/keyed-mutex';
import { resolveIdleTtlMs, resolvePolicy } from '../utils/policy';
import { sleep } from '../utils/sleep';
import { normalizeClientKey } from '../utils/client-key';
import {
  createBucket,
  decide,
  msUntilNextToken,
  refillBucket,
} from '../utils/token-bucket';

interface EvaluationOptions {
  /**
   * The caller already holds one of the client's queue slots
   */
  holdsSlot: boolean;

  /**
   * Take a queue slot if the decision is a delay
   */
  reserveSlot: boolean;

  waitedMs: number;
}

export interface WaitForAdmissionOptions {
  /**
   * Abandons the wait, without taking a token, when aborted
   */
  signal?: AbortSignal;
}

/**
 * Per-client token bucket admission.
 * Every touch of a client's bucket is serialized in process by a keyed mutex
 * and across processes by the storage adapter's bucket lock.
 */
@Injectable()
export class AdmissionService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(AdmissionService.name);
  private readonly policy: ResolvedAdmissionPolicy;
  private readonly idleTtlMs: number;
  private readonly idleSweepIntervalMs: number;
  private readonly lockDurationMs: number;
  private readonly lockWaitMs: number;
  private readonly lockRetryMs: number;
  private readonly storageFailureMode: StorageFailureMode;
  private readonly mutex = new KeyedMutex();
  // Requests per client currently suspended in waitForAdmission
  private readonly queued: Map<string, number> = new Map();

  constructor(
    @Inject(REQUEST_ADMISSION_CONFIG)
    config: RequestAdmissionConfig,
    @Inject(REQUEST_ADMISSION_STORAGE_ADAPTER)
    private readonly storageAdapter: IBucketStorageAdapter,
    @Inject(REQUEST_ADMISSION_CLOCK)
    private readonly clock: AdmissionClock,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {
    this.policy = resolvePolicy(config.policy);
    this.idleTtlMs = resolveIdleTtlMs(config, this.policy);
    this.idleSweepIntervalMs =
      config.idleSweepIntervalMs ?? DEFAULT_IDLE_SWEEP_INTERVAL_MS;
    this.lockDurationMs = config.lockDurationMs ?? DEFAULT_LOCK_DURATION_MS;
    this.lockWaitMs = config.lockWaitMs ?? DEFAULT_LOCK_WAIT_MS;
    this.lockRetryMs = Math.max(1, config.lockRetryMs ?? DEFAULT_LOCK_RETRY_MS);
    this.storageFailureMode = config.storageFailureMode ?? 'allow';
  }

  onModuleInit() {
    this.logger.log(
      `Admission policy: rate=${this.policy.rate}/s burst=${this.policy.burst} delayMode=${this.policy.delayMode}`,
    );

    if (this.idleSweepIntervalMs <= 0) {
      return;
    }

    const interval = setInterval(() => {
      this.sweepIdleBuckets().catch((error: unknown) =>
        this.logger.error(
          `Idle bucket sweep failed: ${describeError(error)}`,
          error instanceof Error ? error.stack : undefined,
        ),
      );
    }, this.idleSweepIntervalMs);
    interval.unref();

    this.schedulerRegistry.addInterval(IDLE_SWEEP_INTERVAL_NAME, interval);
  }

  async onModuleDestroy() {
    if (this.schedulerRegistry.doesExist('interval', IDLE_SWEEP_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(IDLE_SWEEP_INTERVAL_NAME);
    }
    await this.storageAdapter.close();
  }

  get resolvedPolicy(): ResolvedAdmissionPolicy {
    return { ...this.policy };
  }

  /**
   * Decide whether a request from clientKey is admitted now, should be
   * delayed, or is rejected.
   *
   * @param clientKey Client identity, usually the remote address
   * @param now Clock reading in milliseconds, defaults to the injected clock
   */
  async admit(clientKey: string, now?: number): Promise<AdmissionDecision> {
    const key = this.requireKey(clientKey);

    return this.mutex.runExclusive(key, () =>
      this.evaluate(key, now ?? this.clock.now(), {
        holdsSlot: false,
        reserveSlot: false,
        waitedMs: 0,
      }),
    );
  }

  /**
   * Admit or reject, serving any delay first.
   * Only the calling task is suspended; other clients are decided meanwhile.
   * Rejects with the signal's reason if the signal aborts while waiting.
   */
  async waitForAdmission(
    clientKey: string,
    options: WaitForAdmissionOptions = {},
  ): Promise<FinalDecision> {
    const key = this.requireKey(clientKey);
    const { signal } = options;

    signal?.throwIfAborted();

    const startedAt = this.clock.now();
    let decision = await this.mutex.runExclusive(key, () =>
      this.evaluate(key, this.clock.now(), {
        holdsSlot: false,
        reserveSlot: true,
        waitedMs: 0,
      }),
    );

    if (decision.type !== DecisionType.DELAY) {
      return decision;
    }

    // A delay decision reserved a queue slot for this request
    try {
      for (;;) {
        if (decision.type !== DecisionType.DELAY) {
          return decision;
        }

        await sleep(decision.delayMs, signal);

        decision = await this.mutex.runExclusive(key, () => {
          const now = this.clock.now();
          return this.evaluate(key, now, {
            holdsSlot: true,
            reserveSlot: false,
            waitedMs: now - startedAt,
          });
        });
      }
    } finally {
      this.releaseQueueSlot(key);
    }
  }

  /**
   * Calculate time in ms until the client could be admitted, without consuming
   */
  async getWaitTimeMs(clientKey: string, now?: number): Promise<number> {
    const key = this.requireKey(clientKey);
    const bucket = await this.storageAdapter.getBucket(key);

    if (!bucket) {
      return 0;
    }

    refillBucket(bucket, now ?? this.clock.now(), this.policy);
    const waitTimeMs = msUntilNextToken(bucket, this.policy);
    this.logger.debug(`Wait time for client ${key}: ${waitTimeMs}ms`);

    return waitTimeMs;
  }

  /**
   * Forget a client's bucket so its next request starts from a full bucket
   *
   * @returns True if a bucket existed
   */
  async resetClient(clientKey: string): Promise<boolean> {
    const key = this.requireKey(clientKey);
    const deleted = await this.mutex.runExclusive(key, () =>
      this.storageAdapter.deleteBucket(key),
    );

    if (deleted) {
      this.logger.log(`Reset bucket for client ${key}`);
    }

    return deleted;
  }

  async getTrackedClientCount(): Promise<number> {
    return this.storageAdapter.countBuckets();
  }

  /**
   * Requests of a client currently suspended in waitForAdmission
   */
  getQueuedCount(clientKey: string): number {
    return this.queued.get(normalizeClientKey(clientKey)) ?? 0;
  }

  /**
   * Drop buckets untouched for longer than the idle TTL
   *
   * @returns Number of buckets dropped
   */
  async sweepIdleBuckets(now?: number): Promise<number> {
    const idleBefore = (now ?? this.clock.now()) - this.idleTtlMs;
    const evicted = await this.storageAdapter.evictIdleBuckets(idleBefore);

    if (evicted > 0) {
      this.logger.debug(`Swept ${evicted} idle buckets`);
    }

    return evicted;
  }

  private async evaluate(
    key: string,
    now: number,
    options: EvaluationOptions,
  ): Promise<AdmissionDecision> {
    const ownerId = uuidv4();
    let locked = false;

    try {
      locked = await this.acquireLock(key, ownerId);
      if (!locked) {
        return this.onStorageFailure(
          key,
          new Error(`Timed out waiting for the lock on bucket ${key}`),
        );
      }

      const bucket =
        (await this.storageAdapter.getBucket(key)) ??
        createBucket(key, now, this.policy);

      const queuedNow = this.queued.get(key) ?? 0;
      const decision = decide(bucket, now, this.policy, {
        queuedOthers: queuedNow - (options.holdsSlot ? 1 : 0),
        waitedMs: options.waitedMs,
      });

      await this.storageAdapter.saveBucket(bucket, this.idleTtlMs);

      if (
        decision.type === DecisionType.DELAY &&
        options.reserveSlot &&
        !options.holdsSlot
      ) {
        this.queued.set(key, queuedNow + 1);
      }

      this.logDecision(decision);
      return decision;
    } catch (error) {
      return this.onStorageFailure(key, error);
    } finally {
      if (locked) {
        await this.releaseLock(key, ownerId);
      }
    }
  }

  private async acquireLock(key: string, ownerId: string): Promise<boolean> {
    const attempts = Math.ceil(this.lockWaitMs / this.lockRetryMs) + 1;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const acquired = await this.storageAdapter.acquireBucketLock(
        key,
        ownerId,
        this.lockDurationMs,
      );
      if (acquired) {
        return true;
      }
      if (attempt < attempts) {
        await sleep(this.lockRetryMs);
      }
    }

    return false;
  }

  private async releaseLock(key: string, ownerId: string): Promise<void> {
    try {
      await this.storageAdapter.releaseBucketLock(key, ownerId);
    } catch (error) {
      // The lock expires after lockDurationMs regardless
      this.logger.warn(
        `Failed to release lock on bucket ${key}: ${describeError(error)}`,
      );
    }
  }

  private releaseQueueSlot(key: string): void {
    const remaining = (this.queued.get(key) ?? 1) - 1;
    if (remaining > 0) {
      this.queued.set(key, remaining);
    } else {
      this.queued.delete(key);
    }
  }

  private onStorageFailure(key: string, error: unknown): FinalDecision {
    this.logger.error(
      `Bucket store failed for client ${key}, applying '${this.storageFailureMode}': ${describeError(error)}`,
      error instanceof Error ? error.stack : undefined,
    );

    if (this.storageFailureMode === 'reject') {
      return {
        type: DecisionType.REJECT,
        clientKey: key,
        retryAfterMs: 0,
        remainingTokens: 0,
        error: new RateLimitExceededError(key, 0),
      };
    }

    return { type: DecisionType.ALLOW, clientKey: key, remainingTokens: 0 };
  }

  private logDecision(decision: AdmissionDecision): void {
    switch (decision.type) {
      case DecisionType.ALLOW:
        this.logger.verbose(
          `Admitted client ${decision.clientKey}, ${decision.remainingTokens} tokens remaining`,
        );
        break;
      case DecisionType.DELAY:
        this.logger.debug(
          `Delaying client ${decision.clientKey} by ${decision.delayMs}ms`,
        );
        break;
      case DecisionType.REJECT:
        this.logger.warn(
          `Rate limit exceeded for client ${decision.clientKey}, next token in ${decision.retryAfterMs}ms`,
        );
        break;
    }
  }

  private requireKey(clientKey: string): string {
    const key = normalizeClientKey(clientKey);
    if (key.length === 0) {
      throw new Error('Client key must not be empty');
    }
    return key;
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

import { Logger } from '@nestjs/common';
import { IBucketStorageAdapter } from '../interfaces/storage-adapter.interface';
import { IClientBucket } from '../interfaces/bucket.interface';
import { DEFAULT_MAX_TRACKED_CLIENTS } from '../utils/constants';

interface BucketLock {
  ownerId: string;
  lockedUntil: number;
}

/**
 * In-memory storage adapter.
 * Buckets live in process memory, so each process enforces its own limit.
 * The map is kept in least-recently-used order and capped at maxTrackedClients.
 */
export class MemoryStorageAdapter implements IBucketStorageAdapter {
  private readonly logger = new Logger(MemoryStorageAdapter.name);
  private readonly buckets: Map<string, IClientBucket> = new Map();
  private readonly locks: Map<string, BucketLock> = new Map();

  constructor(
    private readonly maxTrackedClients: number = DEFAULT_MAX_TRACKED_CLIENTS,
  ) {}

  /**
   * Initialize the storage adapter
   */
  async initialize(): Promise<void> {
    this.logger.log(
      `Initialized MemoryStorageAdapter for up to ${this.maxTrackedClients} clients`,
    );
  }

  /**
   * Get a bucket by its client key. Returns a copy.
   */
  async getBucket(key: string): Promise<IClientBucket | null> {
    const bucket = this.buckets.get(key);
    return bucket ? { ...bucket } : null;
  }

  /**
   * Save a bucket and mark it most recently used.
   * Idle expiry is handled by evictIdleBuckets, so idleTtlMs is unused here.
   */
  async saveBucket(
    bucket: IClientBucket,
    _idleTtlMs: number,
  ): Promise<IClientBucket> {
    const now = new Date();
    const existing = this.buckets.get(bucket.key);
    const updatedBucket: IClientBucket = {
      ...bucket,
      updatedAt: now,
      createdAt: existing?.createdAt ?? bucket.createdAt ?? now,
    };

    // Re-insert to move the key to the most recently used end
    this.buckets.delete(bucket.key);
    this.buckets.set(bucket.key, updatedBucket);

    this.enforceCapacity();

    return { ...updatedBucket };
  }

  /**
   * Delete a bucket
   */
  async deleteBucket(key: string): Promise<boolean> {
    return this.buckets.delete(key);
  }

  async countBuckets(): Promise<number> {
    return this.buckets.size;
  }

  /**
   * Acquire a bucket lock.
   * Fails while another owner holds an unexpired lock; the same owner may extend it.
   */
  async acquireBucketLock(
    key: string,
    ownerId: string,
    lockDurationMs: number,
  ): Promise<boolean> {
    const lock = this.locks.get(key);
    const now = Date.now();

    if (lock && lock.lockedUntil > now && lock.ownerId !== ownerId) {
      this.logger.debug(
        `Bucket ${key} is locked until ${new Date(lock.lockedUntil).toISOString()} by ${lock.ownerId}`,
      );
      return false;
    }

    this.locks.set(key, { ownerId, lockedUntil: now + lockDurationMs });
    return true;
  }

  /**
   * Release a bucket lock held by ownerId
   */
  async releaseBucketLock(key: string, ownerId: string): Promise<boolean> {
    const lock = this.locks.get(key);
    if (!lock || lock.ownerId !== ownerId) {
      return false;
    }

    this.locks.delete(key);
    return true;
  }

  /**
   * Drop buckets last refilled before idleBefore
   */
  async evictIdleBuckets(idleBefore: number): Promise<number> {
    let evicted = 0;

    for (const [key, bucket] of this.buckets) {
      if (bucket.lastRefill < idleBefore && !this.isLocked(key)) {
        this.buckets.delete(key);
        evicted++;
      }
    }

    if (evicted > 0) {
      this.logger.debug(`Evicted ${evicted} idle buckets`);
    }

    return evicted;
  }

  async close(): Promise<void> {
    this.buckets.clear();
    this.locks.clear();
  }

  private isLocked(key: string): boolean {
    const lock = this.locks.get(key);
    return !!lock && lock.lockedUntil > Date.now();
  }

  /**
   * Remove least recently used buckets beyond capacity
   */
  private enforceCapacity(): void {
    if (this.buckets.size <= this.maxTrackedClients) {
      return;
    }

    const overflow = this.buckets.size - this.maxTrackedClients;
    const keysToDelete = [...this.buckets.keys()].slice(0, overflow);
    keysToDelete.forEach((key) => this.buckets.delete(key));

    this.logger.debug(
      `Bucket capacity of ${this.maxTrackedClients} reached, dropped ${overflow} least recently used clients`,
    );
  }
}

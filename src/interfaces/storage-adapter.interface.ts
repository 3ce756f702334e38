import { IClientBucket } from './bucket.interface';

/**
 * Interface for storage adapters that hold per-client token buckets.
 * Adapters backed by a shared store let several processes enforce one limit.
 */
export interface IBucketStorageAdapter {
  /**
   * Initialize the storage adapter
   */
  initialize(): Promise<void>;

  /**
   * Get a bucket by its client key
   * @param key Client key
   */
  getBucket(key: string): Promise<IClientBucket | null>;

  /**
   * Save a bucket
   * @param bucket The bucket to save
   * @param idleTtlMs How long the bucket may stay untouched before the store drops it
   */
  saveBucket(bucket: IClientBucket, idleTtlMs: number): Promise<IClientBucket>;

  /**
   * Delete a bucket
   * @param key Client key
   */
  deleteBucket(key: string): Promise<boolean>;

  /**
   * Count the buckets currently held by the store
   */
  countBuckets(): Promise<number>;

  /**
   * Acquire the lock guarding a bucket's read-modify-write
   * @param key Client key
   * @param ownerId ID of the caller acquiring the lock
   * @param lockDurationMs How long to hold the lock in milliseconds
   */
  acquireBucketLock(
    key: string,
    ownerId: string,
    lockDurationMs: number,
  ): Promise<boolean>;

  /**
   * Release a bucket lock
   * @param key Client key
   * @param ownerId ID of the caller releasing the lock
   */
  releaseBucketLock(key: string, ownerId: string): Promise<boolean>;

  /**
   * Drop buckets whose last refill happened before the given instant.
   * Stores that expire keys natively may return 0.
   * @param idleBefore Admission clock timestamp in milliseconds
   */
  evictIdleBuckets(idleBefore: number): Promise<number>;

  /**
   * Release connections owned by the adapter
   */
  close(): Promise<void>;
}

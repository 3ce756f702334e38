import { Logger } from '@nestjs/common';
import { Redis } from 'ioredis';
import { IBucketStorageAdapter } from '../interfaces/storage-adapter.interface';
import { IClientBucket } from '../interfaces/bucket.interface';

// Delete the lock only if the caller still owns it
const RELEASE_LOCK_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`;

const SCAN_BATCH_SIZE = 500;

export interface RedisStorageAdapterOptions {
  host?: string;
  port?: number;
  password?: string;
  url?: string;
  keyPrefix?: string;
  client?: Redis;
}

interface StoredBucket {
  key: string;
  tokens: number;
  lastRefill: number;
  createdAt?: string;
  updatedAt?: string;
}

function isStoredBucket(value: unknown): value is StoredBucket {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'key' in value &&
    typeof value.key === 'string' &&
    'tokens' in value &&
    typeof value.tokens === 'number' &&
    'lastRefill' in value &&
    typeof value.lastRefill === 'number'
  );
}

/**
 * Redis storage adapter.
 * Buckets are shared by every process using the same Redis and key prefix.
 * Redis expires idle buckets itself through the TTL written on each save.
 */
export class RedisStorageAdapter implements IBucketStorageAdapter {
  private readonly logger = new Logger(RedisStorageAdapter.name);
  private readonly keyPrefix: string;
  private readonly client: Redis;
  private readonly ownsClient: boolean;

  constructor(options: RedisStorageAdapterOptions) {
    this.keyPrefix = options.keyPrefix || 'request-admission:';
    this.ownsClient = !options.client;

    if (options.client) {
      this.client = options.client;
    } else if (options.url) {
      this.client = new Redis(options.url);
    } else {
      this.client = new Redis({
        host: options.host || 'localhost',
        port: options.port || 6379,
        password: options.password,
      });
    }
  }

  /**
   * Generate a Redis key for a bucket
   */
  private getBucketKey(key: string): string {
    return `${this.keyPrefix}bucket:${key}`;
  }

  /**
   * Generate a Redis key for a bucket lock
   */
  private getLockKey(key: string): string {
    return `${this.keyPrefix}lock:${key}`;
  }

  /**
   * Initialize the Redis storage adapter
   */
  async initialize(): Promise<void> {
    this.logger.log(
      `Initialized RedisStorageAdapter with prefix: ${this.keyPrefix}`,
    );

    // Test connection
    await this.client.ping();
  }

  /**
   * Get a bucket by its client key
   */
  async getBucket(key: string): Promise<IClientBucket | null> {
    const data = await this.client.get(this.getBucketKey(key));

    if (!data) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      this.logger.warn(
        `Ignoring unreadable bucket for ${key}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }

    if (!isStoredBucket(parsed)) {
      this.logger.warn(`Ignoring malformed bucket for ${key}`);
      return null;
    }

    return {
      key: parsed.key,
      tokens: parsed.tokens,
      lastRefill: parsed.lastRefill,
      createdAt: parsed.createdAt ? new Date(parsed.createdAt) : undefined,
      updatedAt: parsed.updatedAt ? new Date(parsed.updatedAt) : undefined,
    };
  }

  /**
   * Save a bucket with an expiry of idleTtlMs
   */
  async saveBucket(
    bucket: IClientBucket,
    idleTtlMs: number,
  ): Promise<IClientBucket> {
    const now = new Date();
    const updatedBucket: IClientBucket = {
      ...bucket,
      updatedAt: now,
      createdAt: bucket.createdAt || now,
    };

    await this.client.set(
      this.getBucketKey(bucket.key),
      JSON.stringify(updatedBucket),
      'PX',
      Math.max(1, Math.ceil(idleTtlMs)),
    );

    return updatedBucket;
  }

  /**
   * Delete a bucket
   */
  async deleteBucket(key: string): Promise<boolean> {
    const result = await this.client.del(this.getBucketKey(key));
    return result > 0;
  }

  /**
   * Count bucket keys under this adapter's prefix
   */
  async countBuckets(): Promise<number> {
    const pattern = `${this.keyPrefix}bucket:*`;
    let cursor = '0';
    let count = 0;

    do {
      const [nextCursor, keys] = await this.client.scan(
        cursor,
        'MATCH',
        pattern,
        'COUNT',
        SCAN_BATCH_SIZE,
      );
      cursor = nextCursor;
      count += keys.length;
    } while (cursor !== '0');

    return count;
  }

  /**
   * Acquire a bucket lock with SET NX PX
   */
  async acquireBucketLock(
    key: string,
    ownerId: string,
    lockDurationMs: number,
  ): Promise<boolean> {
    const result = await this.client.set(
      this.getLockKey(key),
      ownerId,
      'PX',
      lockDurationMs,
      'NX',
    );

    if (result !== 'OK') {
      this.logger.debug(`Bucket ${key} is locked by another owner`);
      return false;
    }

    return true;
  }

  /**
   * Release a bucket lock if ownerId still holds it
   */
  async releaseBucketLock(key: string, ownerId: string): Promise<boolean> {
    const result = await this.client.eval(
      RELEASE_LOCK_SCRIPT,
      1,
      this.getLockKey(key),
      ownerId,
    );
    return result === 1;
  }

  /**
   * Redis expires idle buckets on its own
   */
  async evictIdleBuckets(_idleBefore: number): Promise<number> {
    return 0;
  }

  /**
   * Close the connection if the adapter created it
   */
  async close(): Promise<void> {
    if (this.ownsClient) {
      await this.client.quit();
    }
  }
}

/**
 * Example of how to create a custom storage adapter for RequestAdmission
 * and register it with the module
 */
import { Logger, Module } from '@nestjs/common';
import {
  IBucketStorageAdapter,
  IClientBucket,
  MemoryStorageAdapter,
  RequestAdmissionModule,
} from '../src';

/**
 * Keeps several independent limits apart on one underlying store by
 * prefixing every client key, e.g. a stricter limit for a login endpoint
 * sharing the same Redis as the general API limit.
 */
export class NamespacedStorageAdapter implements IBucketStorageAdapter {
  private readonly logger = new Logger(NamespacedStorageAdapter.name);

  constructor(
    private readonly inner: IBucketStorageAdapter,
    private readonly namespace: string,
  ) {}

  private scoped(key: string): string {
    return `${this.namespace}:${key}`;
  }

  async initialize(): Promise<void> {
    await this.inner.initialize();
    this.logger.log(`Using bucket namespace '${this.namespace}'`);
  }

  async getBucket(key: string): Promise<IClientBucket | null> {
    const bucket = await this.inner.getBucket(this.scoped(key));
    return bucket ? { ...bucket, key } : null;
  }

  async saveBucket(
    bucket: IClientBucket,
    idleTtlMs: number,
  ): Promise<IClientBucket> {
    const saved = await this.inner.saveBucket(
      { ...bucket, key: this.scoped(bucket.key) },
      idleTtlMs,
    );
    return { ...saved, key: bucket.key };
  }

  deleteBucket(key: string): Promise<boolean> {
    return this.inner.deleteBucket(this.scoped(key));
  }

  // Counts every namespace on the inner store
  countBuckets(): Promise<number> {
    return this.inner.countBuckets();
  }

  acquireBucketLock(
    key: string,
    ownerId: string,
    lockDurationMs: number,
  ): Promise<boolean> {
    return this.inner.acquireBucketLock(
      this.scoped(key),
      ownerId,
      lockDurationMs,
    );
  }

  releaseBucketLock(key: string, ownerId: string): Promise<boolean> {
    return this.inner.releaseBucketLock(this.scoped(key), ownerId);
  }

  evictIdleBuckets(idleBefore: number): Promise<number> {
    return this.inner.evictIdleBuckets(idleBefore);
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}

@Module({
  imports: [
    RequestAdmissionModule.forRoot({
      policy: { rate: '10r/m', burst: 3 },
      storageAdapter: 'custom',
      customStorageAdapterInstance: new NamespacedStorageAdapter(
        new MemoryStorageAdapter(),
        'login',
      ),
      applyGlobally: true,
    }),
  ],
})
export class LoginAdmissionModule {}

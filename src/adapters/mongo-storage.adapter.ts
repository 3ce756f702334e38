import { Logger } from '@nestjs/common';
import { Connection, Model, Schema } from 'mongoose';
import { IBucketStorageAdapter } from '../interfaces/storage-adapter.interface';
import { IClientBucket } from '../interfaces/bucket.interface';

const DUPLICATE_KEY_ERROR_CODE = 11000;

const BUCKET_MODEL_NAME = 'RequestAdmissionBucket';
const LOCK_MODEL_NAME = 'RequestAdmissionLock';
const DEFAULT_COLLECTION_NAME = 'request_admission_buckets';

export interface BucketDocument {
  key: string;
  tokens: number;
  lastRefill: number;
  expireAt: Date;
  createdAt?: Date;
  updatedAt?: Date;
}

export interface BucketLockDocument {
  key: string;
  ownerId: string;
  lockedUntil: Date;
}

/**
 * MongoDB schema for client buckets
 */
export const ClientBucketSchema = new Schema<BucketDocument>(
  {
    key: { type: String, required: true, unique: true },
    tokens: { type: Number, required: true },
    lastRefill: { type: Number, required: true, index: true },
    // TTL index, MongoDB removes the document once expireAt passes
    expireAt: { type: Date, required: true, expires: 0 },
  },
  {
    timestamps: true,
    collection: DEFAULT_COLLECTION_NAME,
  },
);

/**
 * MongoDB schema for bucket locks
 */
export const BucketLockSchema = new Schema<BucketLockDocument>(
  {
    key: { type: String, required: true, unique: true },
    ownerId: { type: String, required: true },
    lockedUntil: { type: Date, required: true, expires: 0 },
  },
  {
    collection: `${DEFAULT_COLLECTION_NAME}_locks`,
  },
);

function isDuplicateKeyError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === DUPLICATE_KEY_ERROR_CODE
  );
}

/**
 * MongoDB storage adapter.
 * Buckets are shared by every process using the same database.
 */
export class MongoStorageAdapter implements IBucketStorageAdapter {
  private readonly logger = new Logger(MongoStorageAdapter.name);
  private bucketModel?: Model<BucketDocument>;
  private lockModel?: Model<BucketLockDocument>;

  constructor(
    private readonly connection?: Connection,
    private readonly customCollectionName?: string,
  ) {
    this.logger.debug(
      `MongoStorageAdapter constructor called with: connection=${!!this
        .connection}, collectionName=${this.customCollectionName}`,
    );
    this.initModels();
  }

  private initModels() {
    if (!this.connection) {
      this.logger.warn('Cannot initialize bucket models without connection');
      return;
    }

    const bucketCollName = this.customCollectionName || DEFAULT_COLLECTION_NAME;
    const lockCollName = `${bucketCollName}_locks`;

    // Reuse models already registered on this connection
    if (this.connection.models[BUCKET_MODEL_NAME]) {
      this.logger.debug('Bucket model already exists on connection, reusing it');
      this.bucketModel = this.connection.models[BUCKET_MODEL_NAME];
    } else {
      this.bucketModel = this.connection.model<BucketDocument>(
        BUCKET_MODEL_NAME,
        ClientBucketSchema,
        bucketCollName,
      );
    }

    if (this.connection.models[LOCK_MODEL_NAME]) {
      this.lockModel = this.connection.models[LOCK_MODEL_NAME];
    } else {
      this.lockModel = this.connection.model<BucketLockDocument>(
        LOCK_MODEL_NAME,
        BucketLockSchema,
        lockCollName,
      );
    }
  }

  private requireBucketModel(): Model<BucketDocument> {
    if (!this.bucketModel) {
      throw new Error('Bucket model not initialized');
    }
    return this.bucketModel;
  }

  private requireLockModel(): Model<BucketLockDocument> {
    if (!this.lockModel) {
      throw new Error('Bucket lock model not initialized');
    }
    return this.lockModel;
  }

  /**
   * Build the indexes declared on the schemas
   */
  async initialize(): Promise<void> {
    await this.requireBucketModel().init();
    await this.requireLockModel().init();
    this.logger.log('Initialized MongoStorageAdapter');
  }

  /**
   * Get a bucket by its client key
   */
  async getBucket(key: string): Promise<IClientBucket | null> {
    const doc = await this.requireBucketModel()
      .findOne({ key })
      .lean<BucketDocument | null>()
      .exec();

    if (!doc) {
      return null;
    }

    return {
      key: doc.key,
      tokens: doc.tokens,
      lastRefill: doc.lastRefill,
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
    };
  }

  /**
   * Upsert a bucket and push its expiry idleTtlMs into the future
   */
  async saveBucket(
    bucket: IClientBucket,
    idleTtlMs: number,
  ): Promise<IClientBucket> {
    const now = new Date();

    await this.requireBucketModel()
      .updateOne(
        { key: bucket.key },
        {
          $set: {
            tokens: bucket.tokens,
            lastRefill: bucket.lastRefill,
            expireAt: new Date(now.getTime() + idleTtlMs),
          },
        },
        { upsert: true },
      )
      .exec();

    return {
      ...bucket,
      updatedAt: now,
      createdAt: bucket.createdAt || now,
    };
  }

  /**
   * Delete a bucket
   */
  async deleteBucket(key: string): Promise<boolean> {
    const result = await this.requireBucketModel().deleteOne({ key }).exec();
    return result.deletedCount > 0;
  }

  async countBuckets(): Promise<number> {
    return this.requireBucketModel().countDocuments().exec();
  }

  /**
   * Acquire a bucket lock.
   * The upsert only matches a lock this owner holds or one that has expired;
   * a live lock held elsewhere makes the upsert collide on the unique key.
   */
  async acquireBucketLock(
    key: string,
    ownerId: string,
    lockDurationMs: number,
  ): Promise<boolean> {
    const now = new Date();

    try {
      const lock = await this.requireLockModel()
        .findOneAndUpdate(
          {
            key,
            $or: [{ ownerId }, { lockedUntil: { $lte: now } }],
          },
          {
            $set: {
              ownerId,
              lockedUntil: new Date(now.getTime() + lockDurationMs),
            },
          },
          { upsert: true, new: true },
        )
        .lean<BucketLockDocument | null>()
        .exec();

      return lock?.ownerId === ownerId;
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        this.logger.debug(`Bucket ${key} is locked by another owner`);
        return false;
      }
      throw error;
    }
  }

  /**
   * Release a bucket lock held by ownerId
   */
  async releaseBucketLock(key: string, ownerId: string): Promise<boolean> {
    const result = await this.requireLockModel()
      .deleteOne({ key, ownerId })
      .exec();
    return result.deletedCount > 0;
  }

  /**
   * Drop buckets last refilled before idleBefore
   */
  async evictIdleBuckets(idleBefore: number): Promise<number> {
    const result = await this.requireBucketModel()
      .deleteMany({ lastRefill: { $lt: idleBefore } })
      .exec();

    if (result.deletedCount > 0) {
      this.logger.debug(`Evicted ${result.deletedCount} idle buckets`);
    }

    return result.deletedCount;
  }

  /**
   * The connection belongs to MongooseModule
   */
  async close(): Promise<void> {
    return;
  }
}

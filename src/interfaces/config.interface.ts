import {
  InjectionToken,
  ModuleMetadata,
  OptionalFactoryDependency,
  Type,
} from '@nestjs/common';
import type { Request } from 'express';
import { StorageAdapterType } from '../adapters/types';
import { IBucketStorageAdapter } from './storage-adapter.interface';

/**
 * Token bucket policy applied to every client
 */
export interface AdmissionPolicy {
  /**
   * Tokens added per second. Accepts a number or nginx notation such as '5r/s' or '30r/m'
   */
  rate: number | string;

  /**
   * Maximum number of tokens a client can accumulate
   */
  burst: number;

  /**
   * Delay requests that find the bucket empty instead of rejecting them
   * @default false
   */
  delayMode?: boolean;

  /**
   * Longest total time a single request may spend waiting in delay mode
   * @default burst / rate seconds
   */
  maxDelayMs?: number;

  /**
   * How many requests of one client may wait in delay at the same time
   * @default burst
   */
  maxQueuedPerClient?: number;
}

/**
 * Policy with defaults applied and the rate converted to tokens per second
 */
export interface ResolvedAdmissionPolicy {
  rate: number;
  burst: number;
  delayMode: boolean;
  maxDelayMs: number;
  maxQueuedPerClient: number;
  /**
   * Time to refill an empty bucket
   */
  fullRefillMs: number;
}

export type StorageFailureMode = 'allow' | 'reject';

export type RejectStatusCode = 429 | 503;

export type ClientKeyResolver = (request: Request) => string | undefined;

/**
 * Configuration for the RequestAdmission module
 */
export interface RequestAdmissionConfig {
  policy: AdmissionPolicy;

  /**
   * Name of the storage adapter to use ('memory', 'redis', 'mongo', or 'custom')
   */
  storageAdapter: StorageAdapterType;

  /**
   * Storage adapter specific options
   */
  storageOptions?: {
    /**
     * MongoDB connection string (for mongo adapter)
     */
    mongoUri?: string;

    /**
     * MongoDB collection name for buckets (defaults to 'request_admission_buckets')
     */
    collectionName?: string;

    /**
     * Redis connection options (for redis adapter)
     */
    redis?: {
      host?: string;
      port?: number;
      password?: string;
      url?: string;
      keyPrefix?: string;
    };

    /**
     * Upper bound on clients tracked by the memory adapter
     */
    maxTrackedClients?: number;

    /**
     * Memory budget for the memory adapter, in bytes or nginx notation ('10m')
     */
    zoneSize?: number | string;
  };

  /**
   * An instance of IBucketStorageAdapter to use when storageAdapter is 'custom'.
   */
  customStorageAdapterInstance?: IBucketStorageAdapter;

  /**
   * How long an untouched bucket is kept. Never shorter than the full refill time.
   */
  idleTtlMs?: number;

  /**
   * Interval of the idle bucket sweep, 0 to disable
   * @default 60000
   */
  idleSweepIntervalMs?: number;

  /**
   * How long a bucket lock may be held
   * @default 2000
   */
  lockDurationMs?: number;

  /**
   * How long to keep retrying a contended bucket lock
   * @default 100
   */
  lockWaitMs?: number;

  /**
   * Pause between lock attempts
   * @default 5
   */
  lockRetryMs?: number;

  /**
   * What to decide when the bucket store fails
   * @default 'allow'
   */
  storageFailureMode?: StorageFailureMode;

  /**
   * HTTP status used by AdmissionGuard for rejected requests
   * @default 503
   */
  rejectStatusCode?: RejectStatusCode;

  /**
   * Derive the client key from a request. Defaults to the remote address.
   */
  clientKeyResolver?: ClientKeyResolver;

  /**
   * Register AdmissionGuard for every route
   */
  applyGlobally?: boolean;
}

/**
 * Interface for async config factory
 */
export interface RequestAdmissionConfigFactory {
  createRequestAdmissionConfig():
    | Promise<RequestAdmissionConfig>
    | RequestAdmissionConfig;
}

/**
 * Options for async module configuration
 */
export interface RequestAdmissionAsyncConfig
  extends Pick<ModuleMetadata, 'imports'> {
  /**
   * Injection token for config
   */
  useExisting?: Type<RequestAdmissionConfigFactory>;

  /**
   * Class that implements config factory interface
   */
  useClass?: Type<RequestAdmissionConfigFactory>;

  /**
   * Factory function for config
   */
  useFactory?: (
    ...args: any[]
  ) => Promise<RequestAdmissionConfig> | RequestAdmissionConfig;

  /**
   * Dependencies to inject into factory function
   */
  inject?: Array<InjectionToken | OptionalFactoryDependency>;

  /**
   * Register AdmissionGuard for every route. Must be known before the factory runs.
   */
  applyGlobally?: boolean;
}

import { Provider } from '@nestjs/common';
import { getConnectionToken } from '@nestjs/mongoose';
import { Connection } from 'mongoose';
import {
  REQUEST_ADMISSION_CONFIG,
  REQUEST_ADMISSION_STORAGE_ADAPTER,
} from './constants';
import { RequestAdmissionConfig } from '../interfaces/config.interface';
import { IBucketStorageAdapter } from '../interfaces/storage-adapter.interface';
import { MongoStorageAdapter } from '../adapters/mongo-storage.adapter';
import { RedisStorageAdapter } from '../adapters/redis-storage.adapter';
import { MemoryStorageAdapter } from '../adapters/memory-storage.adapter';
import {
  CUSTOM_STORAGE_ADAPTER,
  MEMORY_STORAGE_ADAPTER,
  MONGO_STORAGE_ADAPTER,
  REDIS_STORAGE_ADAPTER,
} from '../adapters/types';
import { resolveMaxTrackedClients } from './policy';

/**
 * Build the storage adapter named by the configuration
 */
export function createStorageAdapter(
  config: RequestAdmissionConfig,
  connection?: Connection,
): IBucketStorageAdapter {
  const { storageAdapter, storageOptions, customStorageAdapterInstance } =
    config;

  switch (storageAdapter) {
    case MONGO_STORAGE_ADAPTER:
      if (!connection) {
        throw new Error(
          'RequestAdmission config uses the mongo storage adapter but no Mongoose connection is available',
        );
      }
      return new MongoStorageAdapter(
        connection,
        storageOptions?.collectionName,
      );
    case REDIS_STORAGE_ADAPTER:
      return new RedisStorageAdapter({
        host: storageOptions?.redis?.host,
        port: storageOptions?.redis?.port,
        password: storageOptions?.redis?.password,
        url: storageOptions?.redis?.url,
        keyPrefix: storageOptions?.redis?.keyPrefix,
      });
    case MEMORY_STORAGE_ADAPTER:
      return new MemoryStorageAdapter(resolveMaxTrackedClients(storageOptions));
    case CUSTOM_STORAGE_ADAPTER:
      if (!customStorageAdapterInstance) {
        throw new Error(
          'Storage adapter type is "custom" but no customStorageAdapterInstance was provided in RequestAdmissionConfig.',
        );
      }
      return customStorageAdapterInstance;
    default:
      throw new Error(`Unsupported storage adapter: ${String(storageAdapter)}`);
  }
}

/**
 * Creates the appropriate storage adapter provider based on the configuration
 *
 * @returns Provider for the storage adapter
 */
export function createStorageAdapterProvider(): Provider {
  return {
    provide: REQUEST_ADMISSION_STORAGE_ADAPTER,
    useFactory: async (
      config: RequestAdmissionConfig,
      connection?: Connection,
    ): Promise<IBucketStorageAdapter> => {
      const adapter = createStorageAdapter(config, connection);
      await adapter.initialize();
      return adapter;
    },
    inject: [
      REQUEST_ADMISSION_CONFIG,
      { token: getConnectionToken(), optional: true },
    ],
  };
}

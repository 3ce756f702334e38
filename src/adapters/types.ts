export const MONGO_STORAGE_ADAPTER = 'mongo';
export const REDIS_STORAGE_ADAPTER = 'redis';
export const MEMORY_STORAGE_ADAPTER = 'memory';
export const CUSTOM_STORAGE_ADAPTER = 'custom';

export type StorageAdapterType =
  | typeof MONGO_STORAGE_ADAPTER
  | typeof REDIS_STORAGE_ADAPTER
  | typeof MEMORY_STORAGE_ADAPTER
  | typeof CUSTOM_STORAGE_ADAPTER;

export const STORAGE_ADAPTER_TYPES: readonly StorageAdapterType[] = [
  MONGO_STORAGE_ADAPTER,
  REDIS_STORAGE_ADAPTER,
  MEMORY_STORAGE_ADAPTER,
  CUSTOM_STORAGE_ADAPTER,
];

export function isStorageAdapterType(value: string): value is StorageAdapterType {
  return STORAGE_ADAPTER_TYPES.some((type) => type === value);
}

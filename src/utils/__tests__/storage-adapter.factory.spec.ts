import { Test } from '@nestjs/testing';
import { Redis } from 'ioredis';
import {
  createStorageAdapter,
  createStorageAdapterProvider,
} from '../storage-adapter.factory';
import {
  REQUEST_ADMISSION_CONFIG,
  REQUEST_ADMISSION_STORAGE_ADAPTER,
} from '../constants';
import { MemoryStorageAdapter } from '../../adapters/memory-storage.adapter';
import { RedisStorageAdapter } from '../../adapters/redis-storage.adapter';
import { RequestAdmissionConfig } from '../../interfaces/config.interface';

jest.mock('ioredis', () => ({
  Redis: jest.fn().mockImplementation(() => ({
    ping: jest.fn().mockResolvedValue('PONG'),
    quit: jest.fn().mockResolvedValue('OK'),
  })),
}));

describe('storage adapter factory', () => {
  const policy = { rate: 5, burst: 15 };

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should build a memory adapter', () => {
    expect(
      createStorageAdapter({ policy, storageAdapter: 'memory' }),
    ).toBeInstanceOf(MemoryStorageAdapter);
  });

  it('should build a redis adapter from the connection options', () => {
    const adapter = createStorageAdapter({
      policy,
      storageAdapter: 'redis',
      storageOptions: { redis: { host: 'cache', port: 6380 } },
    });

    expect(adapter).toBeInstanceOf(RedisStorageAdapter);
    expect(Redis).toHaveBeenCalledWith({
      host: 'cache',
      port: 6380,
      password: undefined,
    });
  });

  it('should require a connection for the mongo adapter', () => {
    expect(() =>
      createStorageAdapter({ policy, storageAdapter: 'mongo' }),
    ).toThrow(
      'RequestAdmission config uses the mongo storage adapter but no Mongoose connection is available',
    );
  });

  it('should return the custom adapter instance', () => {
    const custom = new MemoryStorageAdapter(10);

    expect(
      createStorageAdapter({
        policy,
        storageAdapter: 'custom',
        customStorageAdapterInstance: custom,
      }),
    ).toBe(custom);
    expect(() =>
      createStorageAdapter({ policy, storageAdapter: 'custom' }),
    ).toThrow(
      'Storage adapter type is "custom" but no customStorageAdapterInstance was provided in RequestAdmissionConfig.',
    );
  });

  it('should provide an initialized adapter', async () => {
    const custom = new MemoryStorageAdapter();
    const initialize = jest.spyOn(custom, 'initialize');
    const config: RequestAdmissionConfig = {
      policy,
      storageAdapter: 'custom',
      customStorageAdapterInstance: custom,
    };

    const module = await Test.createTestingModule({
      providers: [
        { provide: REQUEST_ADMISSION_CONFIG, useValue: config },
        createStorageAdapterProvider(),
      ],
    }).compile();

    expect(module.get(REQUEST_ADMISSION_STORAGE_ADAPTER)).toBe(custom);
    expect(initialize).toHaveBeenCalledTimes(1);
  });
});

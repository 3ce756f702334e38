import { Injectable } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import {
  RequestAdmissionModule,
  validateConfig,
} from '../request-admission.module';
import { AdmissionService } from '../services/admission.service';
import { AdmissionGuard } from '../guards/admission.guard';
import {
  RequestAdmissionConfig,
  RequestAdmissionConfigFactory,
} from '../interfaces/config.interface';
import { DecisionType } from '../interfaces/decision.interface';
import { MemoryStorageAdapter } from '../adapters/memory-storage.adapter';
import { createAdmissionConfigFromEnv } from '../utils/env-config';

const memoryConfig: RequestAdmissionConfig = {
  policy: { rate: '5r/s', burst: 15 },
  storageAdapter: 'memory',
};

@Injectable()
class AdmissionConfigFactory implements RequestAdmissionConfigFactory {
  createRequestAdmissionConfig(): RequestAdmissionConfig {
    return { policy: { rate: 2, burst: 4 }, storageAdapter: 'memory' };
  }
}

describe('RequestAdmissionModule', () => {
  let module: TestingModule | undefined;

  afterEach(async () => {
    await module?.close();
    module = undefined;
  });

  describe('validateConfig', () => {
    it('should accept a minimal memory config', () => {
      expect(() => validateConfig(memoryConfig)).not.toThrow();
    });

    it('should validate the policy', () => {
      expect(() =>
        validateConfig({ ...memoryConfig, policy: { rate: 'fast', burst: 1 } }),
      ).toThrow("RequestAdmission config has an invalid rate 'fast'");
    });

    it('should require Redis connection details', () => {
      expect(() =>
        validateConfig({ ...memoryConfig, storageAdapter: 'redis' }),
      ).toThrow(
        'RequestAdmission config for the redis storage adapter requires either url or host in storageOptions.redis',
      );
    });

    it('should require a MongoDB URI only when asked to', () => {
      const mongoConfig: RequestAdmissionConfig = {
        ...memoryConfig,
        storageAdapter: 'mongo',
      };

      expect(() => validateConfig(mongoConfig)).not.toThrow();
      expect(() =>
        validateConfig(mongoConfig, { requireMongoUri: true }),
      ).toThrow(
        'RequestAdmission config for the mongo storage adapter requires storageOptions.mongoUri',
      );
    });

    it('should require an instance for a custom adapter', () => {
      expect(() =>
        validateConfig({ ...memoryConfig, storageAdapter: 'custom' }),
      ).toThrow(
        'RequestAdmission config for the custom storage adapter requires customStorageAdapterInstance',
      );
      expect(() =>
        validateConfig({
          ...memoryConfig,
          storageAdapter: 'custom',
          customStorageAdapterInstance: new MemoryStorageAdapter(),
        }),
      ).not.toThrow();
    });

    it('should validate the memory zone', () => {
      expect(() =>
        validateConfig({ ...memoryConfig, storageOptions: { zoneSize: 16 } }),
      ).toThrow(
        "RequestAdmission config zoneSize '16' is too small to track a single client",
      );
    });

    it('should validate lock timings', () => {
      expect(() => validateConfig({ ...memoryConfig, lockRetryMs: 0 })).toThrow(
        'RequestAdmission config lockRetryMs must be positive, got 0',
      );
      expect(() => validateConfig({ ...memoryConfig, lockWaitMs: -1 })).toThrow(
        'RequestAdmission config lockWaitMs must be zero or positive, got -1',
      );
    });
  });

  describe('forRoot', () => {
    it('should provide a working admission service', async () => {
      module = await Test.createTestingModule({
        imports: [RequestAdmissionModule.forRoot(memoryConfig)],
      }).compile();
      await module.init();

      const service = module.get(AdmissionService);

      expect((await service.admit('10.0.0.1')).type).toBe(DecisionType.ALLOW);
      expect(module.get(AdmissionGuard)).toBeInstanceOf(AdmissionGuard);
    });

    it('should register the guard globally when asked to', () => {
      const dynamicModule = RequestAdmissionModule.forRoot({
        ...memoryConfig,
        applyGlobally: true,
      });

      expect(dynamicModule.providers).toContainEqual({
        provide: APP_GUARD,
        useExisting: AdmissionGuard,
      });
    });

    it('should not register a global guard by default', () => {
      const dynamicModule = RequestAdmissionModule.forRoot(memoryConfig);

      expect(dynamicModule.providers).not.toContainEqual(
        expect.objectContaining({ provide: APP_GUARD }),
      );
    });

    it('should refuse an invalid config', () => {
      expect(() =>
        RequestAdmissionModule.forRoot({
          ...memoryConfig,
          policy: { rate: 5, burst: 0 },
        }),
      ).toThrow(
        'RequestAdmission config burst must be an integer of at least 1, got 0',
      );
    });
  });

  describe('forRootAsync', () => {
    it('should build the config with a factory', async () => {
      module = await Test.createTestingModule({
        imports: [
          RequestAdmissionModule.forRootAsync({
            imports: [
              ConfigModule.forRoot({
                ignoreEnvFile: true,
                load: [() => ({ ADMISSION_RATE: '10r/s', ADMISSION_BURST: 3 })],
              }),
            ],
            inject: [ConfigService],
            useFactory: createAdmissionConfigFromEnv,
          }),
        ],
      }).compile();

      expect(module.get(AdmissionService).resolvedPolicy).toEqual(
        expect.objectContaining({ rate: 10, burst: 3 }),
      );
    });

    it('should build the config with a factory class', async () => {
      module = await Test.createTestingModule({
        imports: [
          RequestAdmissionModule.forRootAsync({
            useClass: AdmissionConfigFactory,
          }),
        ],
      }).compile();

      expect(module.get(AdmissionService).resolvedPolicy).toEqual(
        expect.objectContaining({ rate: 2, burst: 4 }),
      );
    });

    it('should validate the resolved config', async () => {
      await expect(
        Test.createTestingModule({
          imports: [
            RequestAdmissionModule.forRootAsync({
              useFactory: () => ({ ...memoryConfig, lockRetryMs: -5 }),
            }),
          ],
        }).compile(),
      ).rejects.toThrow(
        'RequestAdmission config lockRetryMs must be positive, got -5',
      );
    });

    it('should require a way to build the config', () => {
      expect(() => RequestAdmissionModule.forRootAsync({})).toThrow(
        'Invalid RequestAdmissionAsyncConfig. Must provide useFactory, useClass, or useExisting.',
      );
    });
  });
});

import {
  DynamicModule,
  Global,
  Module,
  ModuleMetadata,
  Provider,
} from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { MongooseModule } from '@nestjs/mongoose';
import { ScheduleModule } from '@nestjs/schedule';
import { AdmissionService } from './services/admission.service';
import { AdmissionGuard } from './guards/admission.guard';
import {
  RequestAdmissionAsyncConfig,
  RequestAdmissionConfig,
  RequestAdmissionConfigFactory,
} from './interfaces/config.interface';
import {
  REQUEST_ADMISSION_CLOCK,
  REQUEST_ADMISSION_CONFIG,
} from './utils/constants';
import { createStorageAdapterProvider } from './utils/storage-adapter.factory';
import { systemClock } from './utils/clock';
import { resolveMaxTrackedClients, resolvePolicy } from './utils/policy';
import {
  CUSTOM_STORAGE_ADAPTER,
  isStorageAdapterType,
  MEMORY_STORAGE_ADAPTER,
  MONGO_STORAGE_ADAPTER,
  REDIS_STORAGE_ADAPTER,
} from './adapters/types';

type ModuleImports = NonNullable<ModuleMetadata['imports']>;

interface ValidateConfigOptions {
  /**
   * forRoot connects to MongoDB itself and needs the URI
   */
  requireMongoUri?: boolean;
}

function assertNonNegative(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
    throw new Error(
      `RequestAdmission config ${name} must be zero or positive, got ${value}`,
    );
  }
}

function assertPositive(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isFinite(value) || value <= 0)) {
    throw new Error(
      `RequestAdmission config ${name} must be positive, got ${value}`,
    );
  }
}

export function validateConfig(
  config: RequestAdmissionConfig,
  options: ValidateConfigOptions = {},
): void {
  if (!config.policy) {
    throw new Error('RequestAdmission config must include a policy');
  }

  // Throws on an invalid rate, burst or delay setting
  resolvePolicy(config.policy);

  // Validate storage adapter
  if (!config.storageAdapter) {
    throw new Error('RequestAdmission config must include a storageAdapter');
  }

  if (!isStorageAdapterType(config.storageAdapter)) {
    throw new Error(
      `RequestAdmission config has an unsupported storageAdapter '${String(config.storageAdapter)}'`,
    );
  }

  if (
    config.storageAdapter === REDIS_STORAGE_ADAPTER &&
    !config.storageOptions?.redis?.url &&
    !config.storageOptions?.redis?.host
  ) {
    throw new Error(
      'RequestAdmission config for the redis storage adapter requires either url or host in storageOptions.redis',
    );
  }

  if (
    config.storageAdapter === MONGO_STORAGE_ADAPTER &&
    options.requireMongoUri &&
    !config.storageOptions?.mongoUri
  ) {
    throw new Error(
      'RequestAdmission config for the mongo storage adapter requires storageOptions.mongoUri',
    );
  }

  if (
    config.storageAdapter === CUSTOM_STORAGE_ADAPTER &&
    !config.customStorageAdapterInstance
  ) {
    throw new Error(
      'RequestAdmission config for the custom storage adapter requires customStorageAdapterInstance',
    );
  }

  if (config.storageAdapter === MEMORY_STORAGE_ADAPTER) {
    resolveMaxTrackedClients(config.storageOptions);
  }

  assertNonNegative('idleTtlMs', config.idleTtlMs);
  assertNonNegative('idleSweepIntervalMs', config.idleSweepIntervalMs);
  assertPositive('lockDurationMs', config.lockDurationMs);
  assertNonNegative('lockWaitMs', config.lockWaitMs);
  assertPositive('lockRetryMs', config.lockRetryMs);

  if (
    config.storageFailureMode !== undefined &&
    config.storageFailureMode !== 'allow' &&
    config.storageFailureMode !== 'reject'
  ) {
    throw new Error(
      `RequestAdmission config storageFailureMode must be 'allow' or 'reject', got '${String(config.storageFailureMode)}'`,
    );
  }

  if (
    config.rejectStatusCode !== undefined &&
    config.rejectStatusCode !== 429 &&
    config.rejectStatusCode !== 503
  ) {
    throw new Error(
      `RequestAdmission config rejectStatusCode must be 429 or 503, got ${String(config.rejectStatusCode)}`,
    );
  }
}

function createCoreProviders(applyGlobally?: boolean): Provider[] {
  const providers: Provider[] = [
    createStorageAdapterProvider(),
    { provide: REQUEST_ADMISSION_CLOCK, useValue: systemClock },
    AdmissionService,
    AdmissionGuard,
  ];

  if (applyGlobally) {
    providers.push({ provide: APP_GUARD, useExisting: AdmissionGuard });
  }

  return providers;
}

/**
 * Main module for RequestAdmission. Use forRoot or forRootAsync to configure and register.
 */
@Global()
@Module({})
export class RequestAdmissionModule {
  /**
   * Register the RequestAdmission module with static configuration
   *
   * @param config Configuration for the RequestAdmission module
   * @returns Dynamic module
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     RequestAdmissionModule.forRoot({
   *       policy: { rate: '5r/s', burst: 15 },
   *       storageAdapter: 'redis',
   *       storageOptions: {
   *         redis: { url: 'redis://localhost:6379' },
   *       },
   *       applyGlobally: true,
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRoot(config: RequestAdmissionConfig): DynamicModule {
    validateConfig(config, { requireMongoUri: true });

    const imports: ModuleImports = [ScheduleModule.forRoot()];

    // Only connect to MongoDB if the storage adapter is 'mongo'
    const mongoUri = config.storageOptions?.mongoUri;
    if (config.storageAdapter === MONGO_STORAGE_ADAPTER && mongoUri) {
      imports.push(MongooseModule.forRoot(mongoUri));
    }

    return {
      module: RequestAdmissionModule,
      global: true,
      imports,
      providers: [
        { provide: REQUEST_ADMISSION_CONFIG, useValue: config },
        ...createCoreProviders(config.applyGlobally),
      ],
      exports: [AdmissionService, AdmissionGuard, REQUEST_ADMISSION_CONFIG],
    };
  }

  /**
   * Register the RequestAdmission module with async configuration.
   * With the mongo adapter, import MongooseModule in the host application.
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     ConfigModule.forRoot(),
   *     RequestAdmissionModule.forRootAsync({
   *       imports: [ConfigModule],
   *       inject: [ConfigService],
   *       useFactory: (configService: ConfigService) =>
   *         createAdmissionConfigFromEnv(configService),
   *       applyGlobally: true,
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRootAsync(asyncConfig: RequestAdmissionAsyncConfig): DynamicModule {
    const providers: Provider[] = [
      RequestAdmissionModule.createAsyncConfigProvider(asyncConfig),
      ...createCoreProviders(asyncConfig.applyGlobally),
    ];

    if (asyncConfig.useClass) {
      providers.push(asyncConfig.useClass);
    }

    return {
      module: RequestAdmissionModule,
      global: true,
      imports: [ScheduleModule.forRoot(), ...(asyncConfig.imports || [])],
      providers,
      exports: [AdmissionService, AdmissionGuard, REQUEST_ADMISSION_CONFIG],
    };
  }

  /**
   * Create async config provider
   * @internal
   */
  private static createAsyncConfigProvider(
    options: RequestAdmissionAsyncConfig,
  ): Provider {
    const { useFactory } = options;

    if (useFactory) {
      return {
        provide: REQUEST_ADMISSION_CONFIG,
        useFactory: async (...args: unknown[]) => {
          const config = await useFactory(...args);
          validateConfig(config);
          return config;
        },
        inject: options.inject || [],
      };
    }

    const factoryClass = options.useClass ?? options.useExisting;

    if (factoryClass) {
      return {
        provide: REQUEST_ADMISSION_CONFIG,
        useFactory: async (configFactory: RequestAdmissionConfigFactory) => {
          const config = await configFactory.createRequestAdmissionConfig();
          validateConfig(config);
          return config;
        },
        inject: [factoryClass],
      };
    }

    throw new Error(
      'Invalid RequestAdmissionAsyncConfig. Must provide useFactory, useClass, or useExisting.',
    );
  }
}

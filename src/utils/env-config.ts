import { ConfigService } from '@nestjs/config';
import {
  RejectStatusCode,
  RequestAdmissionConfig,
} from '../interfaces/config.interface';
import {
  CUSTOM_STORAGE_ADAPTER,
  isStorageAdapterType,
  MEMORY_STORAGE_ADAPTER,
  MONGO_STORAGE_ADAPTER,
  REDIS_STORAGE_ADAPTER,
  StorageAdapterType,
} from '../adapters/types';

export const DEFAULT_ENV_RATE = '5r/s';
export const DEFAULT_ENV_BURST = 15;

const TRUTHY_VALUES = ['true', '1', 'on'];

function readString(
  configService: ConfigService,
  name: string,
): string | undefined {
  const raw = configService.get<string | number | boolean>(name);
  if (raw === undefined || raw === null) {
    return undefined;
  }
  const value = String(raw).trim();
  return value.length > 0 ? value : undefined;
}

function readNumber(
  configService: ConfigService,
  name: string,
): number | undefined {
  const raw = readString(configService, name);
  if (raw === undefined) {
    return undefined;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(
      `RequestAdmission config ${name} must be a number, got '${raw}'`,
    );
  }
  return value;
}

function readBoolean(configService: ConfigService, name: string): boolean {
  const raw = readString(configService, name);
  return raw !== undefined && TRUTHY_VALUES.includes(raw.toLowerCase());
}

function readStorageAdapter(configService: ConfigService): StorageAdapterType {
  const raw = readString(configService, 'ADMISSION_STORAGE');
  if (raw === undefined) {
    return MEMORY_STORAGE_ADAPTER;
  }

  const storage = raw.toLowerCase();
  // A custom adapter is an object and cannot come from the environment
  if (!isStorageAdapterType(storage) || storage === CUSTOM_STORAGE_ADAPTER) {
    throw new Error(
      `RequestAdmission config ADMISSION_STORAGE must be one of memory, redis or mongo, got '${raw}'`,
    );
  }
  return storage;
}

function readRejectStatus(
  configService: ConfigService,
): RejectStatusCode | undefined {
  const status = readNumber(configService, 'ADMISSION_REJECT_STATUS');
  if (status === undefined || status === 429 || status === 503) {
    return status;
  }
  throw new Error(
    `RequestAdmission config ADMISSION_REJECT_STATUS must be 429 or 503, got ${status}`,
  );
}

/**
 * Build a module configuration from environment variables
 *
 * @example
 * ```typescript
 * RequestAdmissionModule.forRootAsync({
 *   imports: [ConfigModule],
 *   inject: [ConfigService],
 *   useFactory: createAdmissionConfigFromEnv,
 * });
 * ```
 */
export function createAdmissionConfigFromEnv(
  configService: ConfigService,
): RequestAdmissionConfig {
  const storageAdapter = readStorageAdapter(configService);
  const maxDelayMs = readNumber(configService, 'ADMISSION_MAX_DELAY_MS');
  const zoneSize = readString(configService, 'ADMISSION_ZONE_SIZE');
  const rejectStatusCode = readRejectStatus(configService);

  const config: RequestAdmissionConfig = {
    policy: {
      rate: readString(configService, 'ADMISSION_RATE') ?? DEFAULT_ENV_RATE,
      burst: readNumber(configService, 'ADMISSION_BURST') ?? DEFAULT_ENV_BURST,
      delayMode: readBoolean(configService, 'ADMISSION_DELAY_MODE'),
      ...(maxDelayMs !== undefined ? { maxDelayMs } : {}),
    },
    storageAdapter,
    ...(rejectStatusCode !== undefined ? { rejectStatusCode } : {}),
  };

  switch (storageAdapter) {
    case REDIS_STORAGE_ADAPTER:
      config.storageOptions = {
        redis: {
          url: readString(configService, 'REDIS_URL'),
          host: readString(configService, 'REDIS_HOST'),
          port: readNumber(configService, 'REDIS_PORT'),
          password: readString(configService, 'REDIS_PASSWORD'),
          keyPrefix: readString(configService, 'ADMISSION_REDIS_PREFIX'),
        },
      };
      break;
    case MONGO_STORAGE_ADAPTER:
      config.storageOptions = {
        mongoUri: readString(configService, 'MONGODB_URI'),
      };
      break;
    case MEMORY_STORAGE_ADAPTER:
      if (zoneSize !== undefined) {
        config.storageOptions = { zoneSize };
      }
      break;
  }

  return config;
}

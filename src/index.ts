// Module
export { RequestAdmissionModule } from './request-admission.module';

// Services
export {
  AdmissionService,
  WaitForAdmissionOptions,
} from './services/admission.service';

// Guards
export {
  AdmissionGuard,
  CLIENT_CLOSED_REQUEST_STATUS,
} from './guards/admission.guard';

// Interfaces
export {
  AdmissionPolicy,
  ClientKeyResolver,
  RejectStatusCode,
  RequestAdmissionAsyncConfig,
  RequestAdmissionConfig,
  RequestAdmissionConfigFactory,
  ResolvedAdmissionPolicy,
  StorageFailureMode,
} from './interfaces/config.interface';
export { IBucketStorageAdapter } from './interfaces/storage-adapter.interface';
export { IClientBucket } from './interfaces/bucket.interface';
export {
  AdmissionDecision,
  AllowDecision,
  DecisionType,
  DelayDecision,
  FinalDecision,
  RejectDecision,
} from './interfaces/decision.interface';

// Errors
export { RateLimitExceededError, AdmissionAbortedError } from './errors';

// Decorators
export {
  SkipAdmission,
  SKIP_ADMISSION_KEY,
} from './decorators/skip-admission.decorator';
export { AdmissionControlled } from './decorators/admission-controlled.decorator';

// Utilities
export { AdmissionClock, systemClock } from './utils/clock';
export { createAdmissionConfigFromEnv } from './utils/env-config';
export { parseRate, parseZoneSize } from './utils/policy';
export {
  REQUEST_ADMISSION_CLOCK,
  REQUEST_ADMISSION_CONFIG,
  REQUEST_ADMISSION_STORAGE_ADAPTER,
} from './utils/constants';

// Storage Adapters (for extending)
export { MemoryStorageAdapter } from './adapters/memory-storage.adapter';
export { MongoStorageAdapter } from './adapters/mongo-storage.adapter';
export { RedisStorageAdapter } from './adapters/redis-storage.adapter';

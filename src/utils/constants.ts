/**
 * Injection token for RequestAdmission configuration
 */
export const REQUEST_ADMISSION_CONFIG = 'REQUEST_ADMISSION_CONFIG';

/**
 * Injection token for the bucket storage adapter
 */
export const REQUEST_ADMISSION_STORAGE_ADAPTER =
  'REQUEST_ADMISSION_STORAGE_ADAPTER';

/**
 * Injection token for the clock used to time refills
 */
export const REQUEST_ADMISSION_CLOCK = 'REQUEST_ADMISSION_CLOCK';

export const IDLE_SWEEP_INTERVAL_NAME = 'request-admission:idle-sweep';

export const DEFAULT_IDLE_SWEEP_INTERVAL_MS = 60_000;
export const DEFAULT_LOCK_DURATION_MS = 2_000;
export const DEFAULT_LOCK_WAIT_MS = 100;
export const DEFAULT_LOCK_RETRY_MS = 5;
export const DEFAULT_REJECT_STATUS_CODE = 503;

/**
 * Per-client state size used to turn a zone size into a client count
 */
export const BYTES_PER_CLIENT_STATE = 64;
export const DEFAULT_MAX_TRACKED_CLIENTS = 16_384;

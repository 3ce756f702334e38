import {
  AdmissionPolicy,
  RequestAdmissionConfig,
  ResolvedAdmissionPolicy,
} from '../interfaces/config.interface';
import {
  BYTES_PER_CLIENT_STATE,
  DEFAULT_MAX_TRACKED_CLIENTS,
} from './constants';

const RATE_PATTERN = /^(\d+(?:\.\d+)?)(?:\s*r\/(s|m))?$/;
const SIZE_PATTERN = /^(\d+)\s*([kmg])?$/i;

const SIZE_MULTIPLIERS: Record<string, number> = {
  k: 1024,
  m: 1024 * 1024,
  g: 1024 * 1024 * 1024,
};

/**
 * Convert a rate to tokens per second.
 * Accepts a number or nginx notation: '5r/s', '30r/m', or a bare '5'.
 */
export function parseRate(rate: number | string): number {
  let perSecond: number;

  if (typeof rate === 'number') {
    perSecond = rate;
  } else {
    const match = RATE_PATTERN.exec(rate.trim());
    if (!match) {
      throw new Error(
        `RequestAdmission config has an invalid rate '${rate}', expected a number or a value like '5r/s'`,
      );
    }
    const value = parseFloat(match[1]);
    perSecond = (match[2] ?? 's') === 'm' ? value / 60 : value;
  }

  if (!Number.isFinite(perSecond) || perSecond <= 0) {
    throw new Error(
      `RequestAdmission config rate must be a positive number, got ${rate}`,
    );
  }

  return perSecond;
}

/**
 * Convert a zone size to bytes. Accepts a number or nginx notation: '512k', '10m', '1g'.
 */
export function parseZoneSize(size: number | string): number {
  if (typeof size === 'number') {
    if (!Number.isInteger(size) || size <= 0) {
      throw new Error(
        `RequestAdmission config zoneSize must be a positive integer, got ${size}`,
      );
    }
    return size;
  }

  const match = SIZE_PATTERN.exec(size.trim());
  if (!match) {
    throw new Error(
      `RequestAdmission config has an invalid zoneSize '${size}', expected a value like '10m'`,
    );
  }

  const unit = match[2]?.toLowerCase();
  const multiplier = unit ? SIZE_MULTIPLIERS[unit] : 1;
  const bytes = parseInt(match[1], 10) * multiplier;

  if (bytes <= 0) {
    throw new Error(
      `RequestAdmission config zoneSize must be positive, got '${size}'`,
    );
  }

  return bytes;
}

/**
 * Apply defaults to a policy and validate it
 */
export function resolvePolicy(policy: AdmissionPolicy): ResolvedAdmissionPolicy {
  const rate = parseRate(policy.rate);
  const { burst } = policy;

  if (!Number.isInteger(burst) || burst < 1) {
    throw new Error(
      `RequestAdmission config burst must be an integer of at least 1, got ${burst}`,
    );
  }

  const fullRefillMs = (burst / rate) * 1000;
  const maxDelayMs = policy.maxDelayMs ?? fullRefillMs;
  const maxQueuedPerClient = policy.maxQueuedPerClient ?? burst;

  if (!Number.isFinite(maxDelayMs) || maxDelayMs < 0) {
    throw new Error(
      `RequestAdmission config maxDelayMs must be zero or positive, got ${maxDelayMs}`,
    );
  }

  if (!Number.isInteger(maxQueuedPerClient) || maxQueuedPerClient < 0) {
    throw new Error(
      `RequestAdmission config maxQueuedPerClient must be a non-negative integer, got ${maxQueuedPerClient}`,
    );
  }

  return {
    rate,
    burst,
    delayMode: policy.delayMode ?? false,
    maxDelayMs,
    maxQueuedPerClient,
    fullRefillMs,
  };
}

/**
 * Number of clients the memory adapter may track
 */
export function resolveMaxTrackedClients(
  storageOptions: RequestAdmissionConfig['storageOptions'],
): number {
  if (storageOptions?.maxTrackedClients !== undefined) {
    const { maxTrackedClients } = storageOptions;
    if (!Number.isInteger(maxTrackedClients) || maxTrackedClients < 1) {
      throw new Error(
        `RequestAdmission config maxTrackedClients must be a positive integer, got ${maxTrackedClients}`,
      );
    }
    return maxTrackedClients;
  }

  if (storageOptions?.zoneSize !== undefined) {
    const clients = Math.floor(
      parseZoneSize(storageOptions.zoneSize) / BYTES_PER_CLIENT_STATE,
    );
    if (clients < 1) {
      throw new Error(
        `RequestAdmission config zoneSize '${storageOptions.zoneSize}' is too small to track a single client`,
      );
    }
    return clients;
  }

  return DEFAULT_MAX_TRACKED_CLIENTS;
}

/**
 * Idle time after which a bucket may be dropped. A bucket untouched for the
 * full refill time is full again, so dropping it earlier would hand out tokens.
 */
export function resolveIdleTtlMs(
  config: Pick<RequestAdmissionConfig, 'idleTtlMs'>,
  policy: ResolvedAdmissionPolicy,
): number {
  return Math.ceil(Math.max(config.idleTtlMs ?? 0, policy.fullRefillMs));
}

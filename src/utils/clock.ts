import { performance } from 'node:perf_hooks';

export interface AdmissionClock {
  /**
   * Current time in milliseconds
   */
  now(): number;
}

/**
 * Monotonic within a process and anchored to the epoch, so readings stay
 * comparable across processes sharing a bucket store.
 */
export const systemClock: AdmissionClock = {
  now: () => performance.timeOrigin + performance.now(),
};

export { RateLimitExceededError } from './rate-limit-exceeded.error';
export { AdmissionAbortedError } from './admission-aborted.error';

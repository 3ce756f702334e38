import { RateLimitExceededError } from '../errors/rate-limit-exceeded.error';

/**
 * Outcome of an admission check
 */
export enum DecisionType {
  ALLOW = 'allow',
  DELAY = 'delay',
  REJECT = 'reject',
}

export interface AllowDecision {
  type: DecisionType.ALLOW;
  clientKey: string;
  remainingTokens: number;
}

export interface DelayDecision {
  type: DecisionType.DELAY;
  clientKey: string;
  /**
   * How long the caller should wait before checking again
   */
  delayMs: number;
  remainingTokens: number;
}

export interface RejectDecision {
  type: DecisionType.REJECT;
  clientKey: string;
  /**
   * Time until the client's next token accrues
   */
  retryAfterMs: number;
  remainingTokens: number;
  error: RateLimitExceededError;
}

export type AdmissionDecision = AllowDecision | DelayDecision | RejectDecision;

/**
 * A decision reached after any delay has been served
 */
export type FinalDecision = AllowDecision | RejectDecision;

/**
 * Queue state of the request being decided
 */
export interface QueueState {
  /**
   * Requests of the same client currently suspended in delay, excluding this one
   */
  queuedOthers: number;

  /**
   * Time this request has already spent waiting
   */
  waitedMs: number;
}

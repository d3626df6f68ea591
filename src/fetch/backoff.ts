import type { FailedOutcome } from '../types/index.js';

export interface BackoffPolicyOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  rateLimitPaddingMs?: number;
}

export type RetryDecision =
  | { action: 'retry'; delayMs: number }
  | { action: 'stop'; reason: 'permanent' | 'exhausted' };

export const DEFAULT_MAX_ATTEMPTS = 10;

/**
 * Decides whether a failed attempt is retried and how long to wait first.
 * Attempts are numbered from zero.
 */
export class BackoffPolicy {
  readonly maxAttempts: number;
  private readonly initialDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly rateLimitPaddingMs: number;

  constructor(options: BackoffPolicyOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.initialDelayMs = options.initialDelayMs ?? 50;
    this.maxDelayMs = options.maxDelayMs ?? 1000;
    this.rateLimitPaddingMs = options.rateLimitPaddingMs ?? 1000;
    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts <= 0) {
      throw new Error('maxAttempts must be a positive integer');
    }
  }

  decide(outcome: FailedOutcome, attempt: number, now: number): RetryDecision {
    if (outcome.kind === 'permanent') {
      return { action: 'stop', reason: 'permanent' };
    }
    if (attempt + 1 >= this.maxAttempts) {
      return { action: 'stop', reason: 'exhausted' };
    }

    switch (outcome.kind) {
      case 'rate-limited':
        return { action: 'retry', delayMs: this.rateLimitDelayMs(outcome.resetAt, now) };
      case 'transient':
        return { action: 'retry', delayMs: this.transientDelayMs(attempt) };
      default:
        return assertNever(outcome);
    }
  }

  transientDelayMs(attempt: number): number {
    return Math.min(this.initialDelayMs * 2 ** attempt, this.maxDelayMs);
  }

  rateLimitDelayMs(resetAt: number, now: number): number {
    return Math.max(0, resetAt + this.rateLimitPaddingMs - now);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled fetch outcome: ${JSON.stringify(value)}`);
}

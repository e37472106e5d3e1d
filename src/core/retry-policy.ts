// Retry Policy
// Bounded retry with exponential backoff around a single remote attempt

import { RequestFailedError, errorMessage } from './errors';

export interface RetryPolicy {
  maxAttempts: number;
  // Delay before the next attempt, given the zero-based attempt that just failed
  backoffMs(attempt: number): number;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export function exponentialBackoff(baseDelayMs: number = 1000, jitterStepMs: number = 100): (attempt: number) => number {
  return attempt => baseDelayMs * Math.pow(2, attempt) + attempt * jitterStepMs;
}

export function createRetryPolicy(maxAttempts: number = 3, baseDelayMs: number = 1000): RetryPolicy {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }
  return { maxAttempts, backoffMs: exponentialBackoff(baseDelayMs) };
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = createRetryPolicy();

export type TransportFailure = 'timeout' | 'connection' | 'status';

/** Failure of one HTTP attempt, before any retry decision. */
export class TransportError extends Error {
  readonly kind: TransportFailure;
  readonly status?: number;
  readonly transient: boolean;

  constructor(
    message: string,
    options: { kind: TransportFailure; status?: number; transient: boolean; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.kind = options.kind;
    this.status = options.status;
    this.transient = options.transient;
  }
}

export function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 429;
}

export function isRetryable(err: unknown): boolean {
  return err instanceof TransportError && err.transient;
}

export interface RetryOptions {
  sleep?: Sleep;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  label?: string;
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {}
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const retryable = options.isRetryable ?? isRetryable;
  const label = options.label ?? 'Request';

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      const status = err instanceof TransportError ? err.status : undefined;
      const attempts = attempt + 1;

      if (!retryable(err)) {
        throw new RequestFailedError(`${label} failed: ${errorMessage(err)}`, { cause: err, status, attempts });
      }

      if (attempts >= policy.maxAttempts) {
        throw new RequestFailedError(
          `${label} failed after ${attempts} attempts: ${errorMessage(err)}`,
          { cause: err, status, attempts }
        );
      }

      const delayMs = policy.backoffMs(attempt);
      options.onRetry?.(err, attempt, delayMs);
      await wait(delayMs);
    }
  }
}

import { sleep as realSleep, type Sleeper } from './sleep.js';

/** Delay before the next attempt, given the 1-based number of the attempt that just failed. */
export type BackoffStrategy = (failedAttempt: number) => number;

export const fixedBackoff =
  (ms: number): BackoffStrategy =>
  () =>
    ms;

export const linearBackoff =
  (ms: number): BackoffStrategy =>
  (failedAttempt) =>
    ms * failedAttempt;

export interface RetryPolicyOptions {
  maxAttempts: number;
  backoff: BackoffStrategy;
  sleep?: Sleeper;
  /** Return false to fail immediately instead of retrying. */
  shouldRetry?: (error: unknown) => boolean;
  /** Lets a failure dictate its own wait (for example a Retry-After header). */
  delayFor?: (error: unknown) => number | undefined;
  onRetry?: (error: unknown, failedAttempt: number, waitMs: number) => void;
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(`Gave up after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${describeError(lastError)}`, {
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
  }
}

export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly backoff: BackoffStrategy;
  private readonly sleep: Sleeper;
  private readonly shouldRetry: (error: unknown) => boolean;
  private readonly delayFor: ((error: unknown) => number | undefined) | undefined;
  private readonly onRetry: RetryPolicyOptions['onRetry'];

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new Error('maxAttempts must be a positive integer');
    }
    this.maxAttempts = options.maxAttempts;
    this.backoff = options.backoff;
    this.sleep = options.sleep ?? realSleep;
    this.shouldRetry = options.shouldRetry ?? (() => true);
    this.delayFor = options.delayFor;
    this.onRetry = options.onRetry;
  }

  async run<T>(task: (attempt: number) => Promise<T>): Promise<T> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        return await task(attempt);
      } catch (error) {
        lastError = error;
        if (!this.shouldRetry(error)) {
          throw error;
        }
        if (attempt === this.maxAttempts) {
          break;
        }
        const waitMs = this.delayFor?.(error) ?? this.backoff(attempt);
        this.onRetry?.(error, attempt, waitMs);
        await this.sleep(waitMs);
      }
    }

    throw new RetryExhaustedError(this.maxAttempts, lastError);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

import { AppError } from '../errors/AppError';

/** Options for repeating an async attempt until it succeeds. */
export interface PollOptions<T> {
  /** One attempt; resolving ends the poll. */
  readonly attempt: (attemptNo: number) => Promise<T>;
  /** Delay between attempts. */
  readonly intervalMs: number;
  /** Total time limit across all attempts; 0 means no limit. */
  readonly timeoutMs: number;
  /** Whether a failed attempt may be retried. Defaults to always. */
  readonly isRetriable?: (err: unknown) => boolean;
  /** Called after each retriable failure, before sleeping. */
  readonly onRetry?: (err: unknown, attemptNo: number, delayMs: number) => void;
}

/** Result of a successful poll. */
export interface PollResult<T> {
  readonly value: T;
  readonly attempts: number;
}

/** The poll ran out of time; `lastError` is the last attempt's failure. */
export class PollTimeoutError extends AppError {
  public readonly attempts: number;
  public readonly timeoutMs: number;
  public readonly lastError: unknown;

  public constructor(attempts: number, timeoutMs: number, lastError: unknown) {
    super(
      `Gave up after ${attempts} attempt(s) in ${timeoutMs}ms`,
      'POLL_TIMEOUT',
      lastError,
    );
    this.name = 'PollTimeoutError';
    this.attempts = attempts;
    this.timeoutMs = timeoutMs;
    this.lastError = lastError;
  }
}

function delay(ms: number): Promise<void> {
  return new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Run `attempt` until it resolves.
 * Non-retriable failures are rethrown as-is; running out of time rejects
 * with PollTimeoutError. Sleeps never overshoot the deadline.
 */
export async function pollUntil<T>(options: PollOptions<T>): Promise<PollResult<T>> {
  const { attempt, intervalMs, timeoutMs, isRetriable, onRetry } = options;
  const start = Date.now();
  const bounded = timeoutMs > 0;
  let attempts = 0;

  for (;;) {
    attempts += 1;
    try {
      const value = await attempt(attempts);
      return { value, attempts };
    } catch (err) {
      if (isRetriable && !isRetriable(err)) throw err;

      const elapsed = Date.now() - start;
      if (bounded && elapsed >= timeoutMs) {
        throw new PollTimeoutError(attempts, timeoutMs, err);
      }

      const delayMs = bounded
        ? Math.min(intervalMs, timeoutMs - elapsed)
        : intervalMs;
      onRetry?.(err, attempts, delayMs);
      if (delayMs > 0) {
        await delay(delayMs);
      }
    }
  }
}

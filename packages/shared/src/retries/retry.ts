import { setTimeout as delay } from 'node:timers/promises';
import { computeExponentialBackoff, type BackoffOptions } from './backoff';

export type RetryState<T> =
  | { kind: 'attempting'; attempt: number }
  | { kind: 'backoff'; attempt: number; delayMs: number; error: unknown }
  | { kind: 'succeeded'; attempt: number; value: T }
  | { kind: 'exhausted'; attempt: number; error: unknown; retryable: boolean };

export type RetryOptions = {
  maxAttempts: number;
  backoff?: BackoffOptions;
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  onTransition?: (state: RetryState<unknown>) => void;
};

export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;
  readonly retryable: boolean;

  constructor(attempts: number, lastError: unknown, retryable: boolean) {
    const cause = lastError instanceof Error ? lastError.message : String(lastError);
    super(
      retryable
        ? `Operation failed after ${attempts} attempt(s): ${cause}`
        : `Operation failed with a non-retryable error on attempt ${attempts}: ${cause}`
    );
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
    this.retryable = retryable;
  }
}

const defaultSleep = async (ms: number): Promise<void> => {
  await delay(ms);
};

/**
 * Pure transition for a failed attempt: either schedule a backoff or stop.
 */
export function nextStateAfterFailure(
  attempt: number,
  error: unknown,
  options: Pick<RetryOptions, 'maxAttempts' | 'backoff' | 'isRetryable'>
): Extract<RetryState<never>, { kind: 'backoff' | 'exhausted' }> {
  const retryable = options.isRetryable ? options.isRetryable(error) : true;
  if (!retryable || attempt >= options.maxAttempts) {
    return { kind: 'exhausted', attempt, error, retryable };
  }
  return {
    kind: 'backoff',
    attempt,
    delayMs: computeExponentialBackoff(attempt, options.backoff),
    error
  };
}

export async function retryWithBackoff<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  const sleep = options.sleep ?? defaultSleep;
  const emit = options.onTransition ?? (() => undefined);

  let state: RetryState<T> = { kind: 'attempting', attempt: 1 };
  for (;;) {
    switch (state.kind) {
      case 'attempting': {
        emit(state);
        try {
          const value = await operation(state.attempt);
          state = { kind: 'succeeded', attempt: state.attempt, value };
        } catch (error) {
          state = nextStateAfterFailure(state.attempt, error, { ...options, maxAttempts });
        }
        break;
      }
      case 'backoff': {
        emit(state);
        await sleep(state.delayMs);
        state = { kind: 'attempting', attempt: state.attempt + 1 };
        break;
      }
      case 'succeeded':
        emit(state);
        return state.value;
      case 'exhausted':
        emit(state);
        throw new RetryExhaustedError(state.attempt, state.error, state.retryable);
    }
  }
}

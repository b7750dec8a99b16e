import { RetryExhaustedError, retryWithBackoff, type BackoffOptions, type Logger } from '@nyc311/shared';
import { isTransientSodaError, type SodaRow, type SoqlQuery } from '@nyc311/soda-client';
import { IngestionError } from '../errors';

/**
 * The part of the SODA client the pipeline talks to. Tests substitute
 * in-memory implementations.
 */
export interface SodaQueryClient {
  query(datasetId: string, query: SoqlQuery): Promise<SodaRow[]>;
  count(datasetId: string, where?: string): Promise<number>;
}

export type FetchRetryOptions = {
  maxRetries: number;
  logger: Logger;
  backoff?: BackoffOptions;
  sleep?: (ms: number) => Promise<void>;
  isTransient?: (error: unknown) => boolean;
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs one remote call under the retry policy. Transient failures are
 * retried with exponential backoff; anything else, or running out of
 * attempts, surfaces as an `IngestionError`.
 */
export async function withFetchRetry<T>(
  label: string,
  operation: () => Promise<T>,
  options: FetchRetryOptions
): Promise<T> {
  const { logger, maxRetries } = options;
  try {
    return await retryWithBackoff(() => operation(), {
      maxAttempts: maxRetries,
      backoff: options.backoff,
      sleep: options.sleep,
      isRetryable: options.isTransient ?? isTransientSodaError,
      onTransition: (state) => {
        if (state.kind === 'backoff') {
          logger.warn(
            { attempt: state.attempt, maxAttempts: maxRetries, delayMs: state.delayMs, err: state.error },
            `Request failed (attempt ${state.attempt}/${maxRetries}): ${describeError(state.error)}`
          );
        } else if (state.kind === 'exhausted' && state.retryable) {
          logger.error(
            { attempt: state.attempt, maxAttempts: maxRetries, err: state.error },
            `${label}: max retries reached`
          );
        }
      }
    });
  } catch (err) {
    if (err instanceof RetryExhaustedError) {
      throw new IngestionError(`${label} failed: ${err.message}`, { attempts: err.attempts, cause: err.lastError });
    }
    throw err;
  }
}

export function fetchWithRetry(
  client: SodaQueryClient,
  datasetId: string,
  query: SoqlQuery,
  options: FetchRetryOptions
): Promise<SodaRow[]> {
  return withFetchRetry(`Query ${datasetId}`, () => client.query(datasetId, query), options);
}

export function countRowsWithRetry(
  client: SodaQueryClient,
  datasetId: string,
  where: string,
  options: FetchRetryOptions
): Promise<number> {
  return withFetchRetry(`Count ${datasetId}`, () => client.count(datasetId, where), options);
}

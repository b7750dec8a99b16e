export class SodaClientError extends Error {
  readonly statusCode: number;
  readonly code: string | null;
  readonly details: unknown;

  constructor(message: string, options: { statusCode: number; code?: string | null; details?: unknown }) {
    super(message);
    this.name = 'SodaClientError';
    this.statusCode = options.statusCode;
    this.code = options.code ?? null;
    this.details = options.details;
  }
}

/**
 * The request never produced an HTTP response: timeout, refused or reset
 * connection, DNS failure.
 */
export class SodaTransportError extends Error {
  readonly timedOut: boolean;

  constructor(message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.name = 'SodaTransportError';
    this.timedOut = options.timedOut ?? false;
  }
}

export function isTransientSodaError(error: unknown): boolean {
  if (error instanceof SodaTransportError) {
    return true;
  }
  if (error instanceof SodaClientError) {
    return error.statusCode === 429 || error.statusCode >= 500;
  }
  return false;
}

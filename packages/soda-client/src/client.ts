import { fetch, Headers } from 'undici';
import type { Response } from 'undici';
import { SodaClientError, SodaTransportError } from './errors';
import type { SodaClientOptions, SodaRow, SoqlQuery, TokenSupplier } from './types';

export const SOQL_CLAUSES = ['select', 'where', 'order', 'group', 'limit', 'offset'] as const satisfies ReadonlyArray<
  keyof SoqlQuery
>;

function resolveToken(token: TokenSupplier | null | undefined): string | null {
  if (!token) {
    return null;
  }
  const resolved = typeof token === 'function' ? token() : token;
  const trimmed = resolved?.trim() ?? '';
  return trimmed.length > 0 ? trimmed : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value && typeof value === 'object' && !Array.isArray(value));
}

/**
 * Thin client for the Socrata Open Data (SODA 2.x) resource endpoint.
 */
export class SodaClient {
  private readonly baseUrl: URL;
  private readonly appToken: TokenSupplier | null;
  private readonly timeoutMs: number | null;
  private readonly userAgent?: string;

  constructor(options: SodaClientOptions) {
    if (!options.domain) {
      throw new Error('SodaClient requires a domain');
    }
    const protocol = options.protocol ?? 'https';
    const port = options.port ? `:${options.port}` : '';
    this.baseUrl = new URL(`${protocol}://${options.domain}${port}`);
    this.appToken = options.appToken ?? null;
    this.timeoutMs = options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : null;
    this.userAgent = options.userAgent;
  }

  buildUrl(datasetId: string, query: SoqlQuery = {}): URL {
    const url = new URL(`/resource/${encodeURIComponent(datasetId)}.json`, this.baseUrl);
    for (const clause of SOQL_CLAUSES) {
      const value = query[clause];
      if (value === undefined || value === '') {
        continue;
      }
      url.searchParams.set(`$${clause}`, String(value));
    }
    return url;
  }

  async query<T extends SodaRow = SodaRow>(datasetId: string, query: SoqlQuery = {}): Promise<T[]> {
    const payload = await this.request(this.buildUrl(datasetId, query));
    if (!Array.isArray(payload)) {
      throw new SodaClientError('Expected an array of rows from the resource endpoint', {
        statusCode: 200,
        code: 'INVALID_RESPONSE',
        details: payload
      });
    }
    return payload.filter((row): row is T => isRecord(row));
  }

  /**
   * Runs `count(1)` under the given filter. SODA answers with a single row
   * whose only value is the count as a string.
   */
  async count(datasetId: string, where?: string): Promise<number> {
    const rows = await this.query(datasetId, { select: 'count(1)', where });
    const first = rows[0];
    if (!first) {
      return 0;
    }
    const raw = first.count_1 ?? first.count ?? Object.values(first)[0];
    const parsed = typeof raw === 'number' ? raw : Number.parseInt(String(raw ?? ''), 10);
    if (!Number.isFinite(parsed)) {
      throw new SodaClientError('Count query returned a non-numeric value', {
        statusCode: 200,
        code: 'INVALID_RESPONSE',
        details: first
      });
    }
    return parsed;
  }

  private buildHeaders(): Headers {
    const headers = new Headers({ Accept: 'application/json' });
    if (this.userAgent) {
      headers.set('User-Agent', this.userAgent);
    }
    const token = resolveToken(this.appToken);
    if (token) {
      headers.set('X-App-Token', token);
    }
    return headers;
  }

  private async request(url: URL): Promise<unknown> {
    const controller = new AbortController();
    let timeout: NodeJS.Timeout | undefined;
    if (this.timeoutMs !== null) {
      timeout = setTimeout(() => {
        controller.abort(new Error('Request timed out'));
      }, this.timeoutMs);
    }

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: this.buildHeaders(),
        signal: controller.signal
      });
      if (!response.ok) {
        await this.handleErrorResponse(response);
      }
      return await response.json();
    } catch (err) {
      if (err instanceof SodaClientError) {
        throw err;
      }
      if (controller.signal.aborted) {
        throw new SodaTransportError(`Request to ${url.host} timed out after ${this.timeoutMs}ms`, {
          cause: err,
          timedOut: true
        });
      }
      if (err instanceof SyntaxError) {
        throw new SodaClientError('Resource endpoint returned malformed JSON', {
          statusCode: 200,
          code: 'INVALID_RESPONSE',
          details: err.message
        });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new SodaTransportError(`Request to ${url.host} failed: ${message}`, { cause: err });
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
    }
  }

  private async handleErrorResponse(response: Response): Promise<never> {
    const text = await response.text().catch(() => '');
    let payload: unknown = text;
    try {
      payload = text ? JSON.parse(text) : null;
    } catch {
      payload = text;
    }

    if (isRecord(payload)) {
      const message = typeof payload.message === 'string' ? payload.message : null;
      throw new SodaClientError(message ?? (response.statusText || 'SODA request failed'), {
        statusCode: response.status,
        code: typeof payload.code === 'string' ? payload.code : null,
        details: payload.data ?? payload
      });
    }

    throw new SodaClientError(response.statusText || 'SODA request failed', {
      statusCode: response.status,
      code: null,
      details: payload
    });
  }
}

export type TokenSupplier = string | (() => string | null | undefined);

export interface SodaClientOptions {
  /** Host name of the Socrata portal, e.g. `data.cityofnewyork.us`. */
  domain: string;
  appToken?: TokenSupplier | null;
  timeoutMs?: number;
  userAgent?: string;
  /** Defaults to `https`; tests point the client at a local `http` server. */
  protocol?: 'http' | 'https';
  port?: number;
}

/**
 * SoQL clauses accepted by the resource endpoint. Anything else (timeouts,
 * tokens) is client configuration and never reaches the query string.
 */
export interface SoqlQuery {
  select?: string;
  where?: string;
  order?: string;
  group?: string;
  limit?: number;
  offset?: number;
}

export type SodaRow = Record<string, unknown>;

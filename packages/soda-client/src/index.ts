export { SodaClient, SOQL_CLAUSES } from './client';
export { SodaClientError, SodaTransportError, isTransientSodaError } from './errors';
export type { SodaClientOptions, SodaRow, SoqlQuery, TokenSupplier } from './types';

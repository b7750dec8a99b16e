export * from './envConfig';
export * from './logger';
export * from './retries/backoff';
export * from './retries/retry';

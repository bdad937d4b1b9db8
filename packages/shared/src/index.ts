export * from './async';
export * from './envConfig';
export * from './errors';
export * from './json';
export * from './logger';
export * from './retries/backoff';

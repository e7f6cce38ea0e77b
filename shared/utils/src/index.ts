// Logger
export { logger, Logger, isLogLevel, sanitizeString } from './logger';
export type { LogSink } from './logger';

// Errors
export * from './errors';

// Environment helpers
export * from './env';

// Service authentication
export * from './service-auth';

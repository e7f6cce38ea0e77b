import type { ServiceError } from '@tfguard/shared-types';

/**
 * Base tfguard error. Every typed error carries a stable `code`, the
 * service that raised it, and a details object with enough context
 * (file, offset, check id, command) to act on.
 */
export class ToolkitError extends Error {
  code: string;
  service: string;
  timestamp: string;
  details?: unknown;

  constructor(message: string, code: string, service: string, details?: unknown) {
    super(message);
    this.name = 'ToolkitError';
    this.code = code;
    this.service = service;
    this.timestamp = new Date().toISOString();
    this.details = details;
  }

  toJSON(): ServiceError {
    return {
      code: this.code,
      message: this.message,
      service: this.service,
      timestamp: this.timestamp,
      details: this.details,
    };
  }
}

export class ValidationError extends ToolkitError {
  constructor(message: string, service: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', service, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ToolkitError {
  constructor(message: string, service: string, details?: unknown) {
    super(message, 'NOT_FOUND', service, details);
    this.name = 'NotFoundError';
  }
}

export class TimeoutError extends ToolkitError {
  constructor(operation: string, service: string, timeoutMs: number) {
    super(`Operation ${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT_ERROR', service, {
      operation,
      timeoutMs,
    });
    this.name = 'TimeoutError';
  }
}

export class ConfigurationError extends ToolkitError {
  constructor(message: string, service: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', service, details);
    this.name = 'ConfigurationError';
  }
}

export class CancelledError extends ToolkitError {
  constructor(operation: string, service: string) {
    super(`Operation ${operation} was cancelled`, 'CANCELLED', service, { operation });
    this.name = 'CancelledError';
  }
}

/**
 * Convert anything thrown into the wire shape. Unknown values become
 * INTERNAL_ERROR so callers never see a bare string.
 */
export function toServiceError(error: unknown, service: string): ServiceError {
  if (error instanceof ToolkitError) {
    return error.toJSON();
  }
  return {
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : String(error),
    service,
    timestamp: new Date().toISOString(),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Node system errors carry a string `code` such as ENOENT
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error !== null && typeof error === 'object' && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

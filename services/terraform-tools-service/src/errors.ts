/**
 * Typed pipeline errors. Each stage raises exactly one of these classes;
 * `kind` names the failure and `details` carries the file, offset, check id
 * or command needed to act on it.
 */

import { ToolkitError } from '@tfguard/shared-utils';

export const SERVICE_NAME = 'terraform-tools-service';

export type FetchErrorKind = 'tooLarge' | 'unsupportedFormat' | 'notFound' | 'networkFailure' | 'timeout';

export class FetchError extends ToolkitError {
  readonly kind: FetchErrorKind;

  constructor(kind: FetchErrorKind, message: string, details?: Record<string, unknown>) {
    super(message, 'FETCH_ERROR', SERVICE_NAME, { kind, ...details });
    this.name = 'FetchError';
    this.kind = kind;
  }
}

export type ExtractErrorKind = 'malformed' | 'duplicateSymbol';

export class ExtractError extends ToolkitError {
  readonly kind: ExtractErrorKind;

  constructor(kind: ExtractErrorKind, message: string, details: Record<string, unknown>) {
    super(message, 'EXTRACT_ERROR', SERVICE_NAME, { kind, ...details });
    this.name = 'ExtractError';
    this.kind = kind;
  }

  static malformed(file: string, line: number, reason: string): ExtractError {
    return new ExtractError('malformed', `${file}:${line}: ${reason}`, { file, line, reason });
  }

  static duplicateSymbol(symbol: string, files: string[]): ExtractError {
    return new ExtractError('duplicateSymbol', `Duplicate declaration of ${symbol} in ${files.join(', ')}`, {
      symbol,
      files,
    });
  }
}

export type ScanErrorKind = 'engineFailed' | 'malformedOutput';

export class ScanError extends ToolkitError {
  readonly kind: ScanErrorKind;

  constructor(kind: ScanErrorKind, message: string, details?: Record<string, unknown>) {
    super(message, 'SCAN_ERROR', SERVICE_NAME, { kind, ...details });
    this.name = 'ScanError';
    this.kind = kind;
  }
}

export type RemediationErrorKind = 'ioFailure';

export class RemediationError extends ToolkitError {
  readonly kind: RemediationErrorKind;

  constructor(kind: RemediationErrorKind, message: string, details?: Record<string, unknown>) {
    super(message, 'REMEDIATION_ERROR', SERVICE_NAME, { kind, ...details });
    this.name = 'RemediationError';
    this.kind = kind;
  }
}

export type RunnerErrorKind = 'timeout' | 'notFound' | 'nonZeroExit';

export class RunnerError extends ToolkitError {
  readonly kind: RunnerErrorKind;

  constructor(kind: RunnerErrorKind, message: string, details?: Record<string, unknown>) {
    super(message, 'RUNNER_ERROR', SERVICE_NAME, { kind, ...details });
    this.name = 'RunnerError';
    this.kind = kind;
  }
}

/** Keep the tail of noisy subprocess output, where the actual error usually is. */
export function excerpt(text: string, max = 2000): string {
  const trimmed = text.trim();
  return trimmed.length > max ? `…${trimmed.slice(trimmed.length - max)}` : trimmed;
}

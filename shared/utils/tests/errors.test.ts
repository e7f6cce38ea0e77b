import { describe, test, expect } from 'vitest';
import {
  ToolkitError,
  ValidationError,
  NotFoundError,
  TimeoutError,
  CancelledError,
  toServiceError,
  systemErrorCode,
} from '../src/errors';

describe('ToolkitError', () => {
  test('creates error with required fields', () => {
    const error = new ToolkitError('Test error', 'TEST_CODE', 'test-service');

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_CODE');
    expect(error.service).toBe('test-service');
    expect(error.timestamp).toBeDefined();
  });

  test('toJSON returns ServiceError object', () => {
    const error = new ToolkitError('Test error', 'TEST_CODE', 'test-service', { foo: 'bar' });
    const json = error.toJSON();

    expect(json.code).toBe('TEST_CODE');
    expect(json.message).toBe('Test error');
    expect(json.service).toBe('test-service');
    expect(json.details).toEqual({ foo: 'bar' });
  });
});

describe('subclasses', () => {
  test('ValidationError', () => {
    const error = new ValidationError('Invalid input', 'test-service');
    expect(error.name).toBe('ValidationError');
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error).toBeInstanceOf(ToolkitError);
  });

  test('NotFoundError', () => {
    const error = new NotFoundError('No such resource', 'test-service', { name: 'x' });
    expect(error.code).toBe('NOT_FOUND');
    expect(error.toJSON().details).toEqual({ name: 'x' });
  });

  test('TimeoutError', () => {
    const error = new TimeoutError('checkov', 'scanner', 500);
    expect(error.message).toBe('Operation checkov timed out after 500ms');
    expect(error.details).toEqual({ operation: 'checkov', timeoutMs: 500 });
  });

  test('CancelledError', () => {
    const error = new CancelledError('fetch', 'fetcher');
    expect(error.code).toBe('CANCELLED');
  });
});

describe('toServiceError', () => {
  test('passes typed errors through', () => {
    const result = toServiceError(new ValidationError('bad', 'svc', { field: 'path' }), 'other');
    expect(result.code).toBe('VALIDATION_ERROR');
    expect(result.service).toBe('svc');
    expect(result.details).toEqual({ field: 'path' });
  });

  test('wraps unknown values as INTERNAL_ERROR', () => {
    const result = toServiceError('boom', 'svc');
    expect(result.code).toBe('INTERNAL_ERROR');
    expect(result.message).toBe('boom');
  });
});

describe('systemErrorCode', () => {
  test('reads string codes from Node errors', () => {
    expect(systemErrorCode(Object.assign(new Error('x'), { code: 'ENOENT' }))).toBe('ENOENT');
    expect(systemErrorCode(new Error('x'))).toBeUndefined();
    expect(systemErrorCode(null)).toBeUndefined();
  });
});

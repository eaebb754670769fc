/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  AcpError,
  AnnotationError,
  CacheError,
  ConfigError,
  SystemError,
  ErrorCodes,
  errorMessage,
} from '../../../src/utils/errors.js';

describe('AcpError', () => {
  it('should create error with code and message', () => {
    const error = new AcpError('C001', 'Test error message');

    expect(error.code).toBe('C001');
    expect(error.message).toBe('Test error message');
    expect(error.name).toBe('AcpError');
  });

  it('should include optional details', () => {
    const details = { file: 'src/a.ts', line: 10 };
    const error = new AcpError('A001', 'Test error', details);

    expect(error.details).toEqual(details);
  });

  it('should be instance of Error', () => {
    const error = new AcpError('S004', 'Test');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(AcpError);
  });

  describe('toJSON', () => {
    it('should serialize error to JSON', () => {
      const error = new AcpError('Q001', 'Test error', { key: 'value' });

      expect(error.toJSON()).toEqual({
        name: 'AcpError',
        code: 'Q001',
        message: 'Test error',
        details: { key: 'value' },
      });
    });

    it('should handle undefined details', () => {
      expect(new AcpError('Q001', 'Test').toJSON().details).toBeUndefined();
    });
  });
});

describe('error subclasses', () => {
  it.each([
    [ConfigError, 'ConfigError'],
    [AnnotationError, 'AnnotationError'],
    [CacheError, 'CacheError'],
    [SystemError, 'SystemError'],
  ] as const)('%o should carry its own name', (ErrorClass, name) => {
    const error = new ErrorClass('S001', 'message', { path: 'x' });

    expect(error.name).toBe(name);
    expect(error).toBeInstanceOf(AcpError);
    expect(error.details).toEqual({ path: 'x' });
  });
});

describe('ErrorCodes', () => {
  it('should assign annotation codes', () => {
    expect(ErrorCodes.MALFORMED_ANNOTATION).toBe('A001');
    expect(ErrorCodes.DUPLICATE_ANNOTATION).toBe('A002');
    expect(ErrorCodes.INVALID_PROVENANCE).toBe('A003');
  });

  it('should assign cache and query codes', () => {
    expect(ErrorCodes.INCOMPATIBLE_CACHE).toBe('C001');
    expect(ErrorCodes.STALE_CACHE).toBe('C002');
    expect(ErrorCodes.NOT_FOUND).toBe('Q001');
    expect(ErrorCodes.AMBIGUOUS).toBe('Q002');
    expect(ErrorCodes.INVALID_REQUEST).toBe('Q003');
  });
});

describe('errorMessage', () => {
  it('should read the message of an Error', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
  });

  it('should stringify other values', () => {
    expect(errorMessage(42)).toBe('42');
  });
});

/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  CodeprintError,
  ConfigError,
  SystemError,
  PipelineError,
  ErrorCodes,
  isErrorCode,
} from '../../../src/utils/errors.js';

describe('CodeprintError', () => {
  it('should create error with code and message', () => {
    const error = new CodeprintError('C001', 'Test error message');

    expect(error.code).toBe('C001');
    expect(error.message).toBe('Test error message');
    expect(error.name).toBe('CodeprintError');
  });

  it('should include optional details', () => {
    const details = { file: 'a.java', size: 10 };
    const error = new CodeprintError('S004', 'Too large', details);

    expect(error.details).toEqual(details);
  });

  it('should be instance of Error', () => {
    const error = new CodeprintError('S001', 'Test');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(CodeprintError);
  });

  it('should serialize error to JSON', () => {
    const error = new CodeprintError('S002', 'Read failed', { file: 'x.ts' });

    expect(error.toJSON()).toEqual({
      name: 'CodeprintError',
      code: 'S002',
      message: 'Read failed',
      details: { file: 'x.ts' },
    });
  });
});

describe('error subclasses', () => {
  it.each([
    ['ConfigError', new ConfigError('C001', 'message')],
    ['SystemError', new SystemError('S002', 'message')],
    ['PipelineError', new PipelineError('S006', 'message')],
  ])('%s should extend CodeprintError with its own name', (name, error) => {
    expect(error).toBeInstanceOf(CodeprintError);
    expect(error.name).toBe(name);
    expect(error.toJSON().name).toBe(name);
  });
});

describe('ErrorCodes', () => {
  it('should have distinct configuration and system codes', () => {
    expect(ErrorCodes.INVALID_SHINGLE_SIZE).toBe('C002');
    expect(ErrorCodes.EMPTY_KEYWORDS).toBe('C003');
    expect(ErrorCodes.BINARY_CONTENT).toBe('S003');
    expect(new Set(Object.values(ErrorCodes)).size).toBe(Object.values(ErrorCodes).length);
  });

  it('should recognise known codes only', () => {
    expect(isErrorCode('S006')).toBe(true);
    expect(isErrorCode('E999')).toBe(false);
  });
});

import { describe, it, expect } from 'vitest';
import { createError, createErrorFromException } from '../Types/StandardResponse.js';
import { BaseError, ConfigurationError, ValidationError } from '../Types/errors.js';

describe('createError', () => {
  it('should return success: false with error message', () => {
    expect(createError('something broke')).toEqual({ success: false, error: 'something broke' });
  });

  it('should include errorCode and errorDetails when provided', () => {
    const result = createError('bad input', 'VALIDATION_ERROR', { field: 'code' });
    expect(result).toEqual({
      success: false,
      error: 'bad input',
      errorCode: 'VALIDATION_ERROR',
      errorDetails: { field: 'code' },
    });
  });

  it('should omit errorCode and errorDetails when not provided', () => {
    const result = createError('plain error');
    expect(result).not.toHaveProperty('errorCode');
    expect(result).not.toHaveProperty('errorDetails');
  });
});

describe('createErrorFromException', () => {
  it('should keep code and details from BaseError subclasses', () => {
    const result = createErrorFromException(new ValidationError('bad body', { field: 'code' }), false);
    expect(result).toEqual({
      success: false,
      error: 'bad body',
      errorCode: 'VALIDATION_ERROR',
      errorDetails: { field: 'code' },
    });
  });

  it('should omit details that are not a plain object', () => {
    const result = createErrorFromException(new BaseError('odd', 'ODD', ['a', 'b']), false);
    expect(result).toEqual({ success: false, error: 'odd', errorCode: 'ODD' });
  });

  it('should attach the stack only when asked', () => {
    const withStack = createErrorFromException(new ConfigurationError('bad env'), true);
    expect(typeof withStack.errorDetails?.stack).toBe('string');

    const withoutStack = createErrorFromException(new ConfigurationError('bad env'), false);
    expect(withoutStack).not.toHaveProperty('errorDetails');
  });

  it('should map plain Errors to INTERNAL_ERROR', () => {
    const result = createErrorFromException(new Error('plain'), false);
    expect(result).toEqual({ success: false, error: 'plain', errorCode: 'INTERNAL_ERROR' });
  });

  it('should map strings and other values to UNKNOWN_ERROR', () => {
    expect(createErrorFromException('string error')).toEqual({
      success: false,
      error: 'string error',
      errorCode: 'UNKNOWN_ERROR',
    });
    expect(createErrorFromException(42)).toEqual({ success: false, error: '42', errorCode: 'UNKNOWN_ERROR' });
  });
});

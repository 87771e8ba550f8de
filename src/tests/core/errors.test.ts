import { describe, it, expect } from 'vitest';
import { SampleSizeError, ErrorCode, isSampleSizeError, wrapError } from '../../core/errors';

describe('SampleSizeError', () => {
  describe('constructor', () => {
    it('should create error with code and message', () => {
      const error = new SampleSizeError(ErrorCode.INVALID_PARAMETER, 'mde cannot be zero');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(SampleSizeError);
      expect(error.name).toBe('SampleSizeError');
      expect(error.code).toBe(ErrorCode.INVALID_PARAMETER);
      expect(error.message).toBe('mde cannot be zero');
      expect(error.context).toBeUndefined();
    });

    it('should keep the context', () => {
      const context = { baseline: 0.95, target: 1.05 };
      const error = new SampleSizeError(ErrorCode.DOMAIN_ERROR, 'Target out of bounds', context);

      expect(error.context).toEqual(context);
    });

    it('should preserve stack trace', () => {
      const error = new SampleSizeError(ErrorCode.INTERNAL_ERROR, 'Test');
      expect(error.stack).toContain('SampleSizeError');
    });
  });

  it('should match its own code only', () => {
    const error = new SampleSizeError(ErrorCode.CANCELLED, 'Cancelled.');
    expect(error.is(ErrorCode.CANCELLED)).toBe(true);
    expect(error.is(ErrorCode.INVALID_INPUT)).toBe(false);
  });
});

describe('isSampleSizeError', () => {
  it('should recognise only SampleSizeError instances', () => {
    expect(isSampleSizeError(new SampleSizeError(ErrorCode.INTERNAL_ERROR, 'Test'))).toBe(true);
    expect(isSampleSizeError(new Error('Regular error'))).toBe(false);
    expect(isSampleSizeError('string')).toBe(false);
    expect(isSampleSizeError(null)).toBe(false);
  });
});

describe('wrapError', () => {
  it('should return SampleSizeError as-is', () => {
    const error = new SampleSizeError(ErrorCode.CANCELLED, 'Cancelled.');
    expect(wrapError(error)).toBe(error);
  });

  it('should turn other errors into INTERNAL_ERROR', () => {
    const cause = new TypeError('stream closed');
    const wrapped = wrapError(cause);

    expect(wrapped.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(wrapped.message).toBe('stream closed');
    expect(wrapped.context).toEqual({ cause: 'TypeError', stack: cause.stack });
  });

  it('should wrap thrown values that are not errors', () => {
    const wrapped = wrapError(42);
    expect(wrapped.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(wrapped.message).toBe('42');
    expect(wrapped.context).toEqual({ thrown: 42 });
  });
});

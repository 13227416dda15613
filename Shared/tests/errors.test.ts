import { describe, it, expect } from 'vitest';
import { BaseError, ConfigurationError, ValidationError } from '../Types/errors.js';

describe('BaseError', () => {
  it('should set message, code, and details', () => {
    const err = new BaseError('test message', 'TEST_CODE', { key: 'val' });
    expect(err.message).toBe('test message');
    expect(err.code).toBe('TEST_CODE');
    expect(err.details).toEqual({ key: 'val' });
    expect(err.name).toBe('BaseError');
  });

  it('should be instanceof Error', () => {
    const err = new BaseError('msg', 'CODE');
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(BaseError);
    expect(err.details).toBeUndefined();
  });
});

describe('Error subclasses', () => {
  it('ConfigurationError carries its code and stays a BaseError', () => {
    const err = new ConfigurationError('BOT_TOKEN is not set', { variable: 'BOT_TOKEN' });
    expect(err).toBeInstanceOf(BaseError);
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err.name).toBe('ConfigurationError');
    expect(err.code).toBe('CONFIGURATION_ERROR');
    expect(err.details).toEqual({ variable: 'BOT_TOKEN' });
  });

  it('ValidationError carries its code', () => {
    const err = new ValidationError('expected 7 days');
    expect(err.name).toBe('ValidationError');
    expect(err.code).toBe('VALIDATION_ERROR');
    expect(err).not.toBeInstanceOf(ConfigurationError);
  });
});

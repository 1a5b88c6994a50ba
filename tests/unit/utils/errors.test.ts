/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  BracecheckError,
  ConfigError,
  FileAccessError,
  ErrorCodes,
} from '../../../src/utils/errors.js';

describe('BracecheckError', () => {
  it('should create error with code and message', () => {
    const error = new BracecheckError('U001', 'Test error message');

    expect(error.code).toBe('U001');
    expect(error.message).toBe('Test error message');
    expect(error.name).toBe('BracecheckError');
  });

  it('should include optional details', () => {
    const details = { path: 'a.kt' };
    const error = new BracecheckError('S001', 'Test error', details);

    expect(error.details).toEqual(details);
  });

  it('should be instance of Error', () => {
    const error = new BracecheckError('S001', 'Test');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(BracecheckError);
  });

  it('should serialize to JSON', () => {
    const error = new BracecheckError('S001', 'Test error', { key: 'value' });

    expect(error.toJSON()).toEqual({
      name: 'BracecheckError',
      code: 'S001',
      message: 'Test error',
      details: { key: 'value' },
    });
  });
});

describe('subclasses', () => {
  it('should name ConfigError and keep the base class', () => {
    const error = new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, 'bad config');

    expect(error.name).toBe('ConfigError');
    expect(error).toBeInstanceOf(BracecheckError);
    expect(error.code).toBe('C001');
  });

  it('should name FileAccessError and keep the base class', () => {
    const error = new FileAccessError(ErrorCodes.FILE_NOT_FOUND, 'gone', { path: '/x' });

    expect(error.name).toBe('FileAccessError');
    expect(error).toBeInstanceOf(BracecheckError);
    expect(error.toJSON().name).toBe('FileAccessError');
  });
});

describe('ErrorCodes', () => {
  it('should give file access failures distinct codes', () => {
    expect(ErrorCodes.FILE_NOT_FOUND).toBe('S001');
    expect(ErrorCodes.FILE_UNREADABLE).toBe('S002');
    expect(ErrorCodes.FILE_NOT_DECODABLE).toBe('S003');
  });
});

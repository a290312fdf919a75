import { describe, it, expect } from 'vitest';
import {
  InvalidConfigurationError,
  MappingError,
  UnsupportedTypeError,
  ValidationError,
  formatPath,
  isMappingError,
  toMappingError,
} from '../errors';

describe('error taxonomy', () => {
  it('assigns stable codes', () => {
    expect(new InvalidConfigurationError('bad').code).toBe('INVALID_CONFIGURATION');
    expect(new UnsupportedTypeError('geometry', 'Shape.outline').code).toBe('UNSUPPORTED_TYPE');
    expect(new ValidationError([]).code).toBe('VALIDATION');
  });

  it('keeps the unsupported kind in details', () => {
    const e = new UnsupportedTypeError('geometry', 'Shape.outline');
    expect(e.kind).toBe('geometry');
    expect(e.details).toEqual({ kind: 'geometry', path: 'Shape.outline' });
    expect(e.name).toBe('UnsupportedTypeError');
  });

  it('formats validation messages from issues', () => {
    const e = new ValidationError([
      { path: ['alchemists', 0, 'name'], message: 'Not a valid string.' },
      { path: [], message: 'Invalid input type.' },
    ]);
    expect(e.message).toBe('Validation failed: alchemists.0.name: Not a valid string.; _root: Invalid input type.');
    expect(new ValidationError([]).message).toBe('Validation failed');
  });

  it('formats paths', () => {
    expect(formatPath(['a', 1, 'b'])).toBe('a.1.b');
    expect(formatPath([])).toBe('_root');
  });
});

describe('toMappingError', () => {
  it('returns mapping errors unchanged', () => {
    const e = new ValidationError([]);
    expect(toMappingError(e)).toBe(e);
  });

  it('wraps other values as configuration errors', () => {
    const cause = new RangeError('Invalid time value');
    const e = toMappingError(cause);
    expect(e).toBeInstanceOf(InvalidConfigurationError);
    expect(e.message).toBe('Invalid time value');
    expect(e.cause).toBe(cause);
    expect(toMappingError('boom').message).toBe('boom');
  });

  it('narrows with isMappingError', () => {
    expect(isMappingError(new MappingError('VALIDATION', 'x'))).toBe(true);
    expect(isMappingError(new Error('x'))).toBe(false);
  });
});

import { describe, it, expect } from 'vitest';
import {
  isParseError, formatParseError, isClargsError, isSchemaError,
  schemaError, configError, formatClargsError, describeError,
  type ParseError,
} from '../../utils/errors.js';

describe('isParseError', () => {
  it('recognizes ParseError', () => {
    const err: ParseError = { category: 'TOO_MANY_ARGUMENTS', value: 'extra', message: 'Too many arguments were supplied.' };
    expect(isParseError(err)).toBe(true);
  });
  it('rejects unknown category', () => {
    expect(isParseError({ category: 'NOPE', message: 'x' })).toBe(false);
  });
  it('rejects plain Error', () => {
    expect(isParseError(new Error('oops'))).toBe(false);
  });
  it('rejects null', () => {
    expect(isParseError(null)).toBe(false);
  });
});

describe('formatParseError', () => {
  it('category prefix + message', () => {
    const err: ParseError = {
      category: 'UNKNOWN_ARGUMENT',
      argumentName: 'x',
      message: "Unknown argument name 'x'.",
    };
    expect(formatParseError(err)).toBe("[UNKNOWN_ARGUMENT] Unknown argument name 'x'.");
  });
});

describe('schemaError / configError', () => {
  it('schemaError without argument name has no argumentName key', () => {
    expect(schemaError('AMBIGUOUS_CONSTRUCTOR', 'two constructors')).toEqual({
      code: 'SCHEMA_INVALID',
      reason: 'AMBIGUOUS_CONSTRUCTOR',
      message: 'two constructors',
    });
  });
  it('isSchemaError distinguishes codes', () => {
    expect(isSchemaError(schemaError('DUPLICATE_NAME', 'dup', 'a'))).toBe(true);
    expect(isSchemaError(configError('bad'))).toBe(false);
    expect(isClargsError(configError('bad'))).toBe(true);
  });
});

describe('formatClargsError', () => {
  it('schema error with argument', () => {
    expect(formatClargsError(schemaError('DUPLICATE_NAME', 'dup', 'Verbose')))
      .toBe('Invalid argument schema (DUPLICATE_NAME) [Verbose]: dup');
  });
  it('config error', () => {
    expect(formatClargsError(configError('mode must be one of default, long-short')))
      .toBe('Invalid configuration: mode must be one of default, long-short');
  });
});

describe('describeError', () => {
  it('Error → message', () => expect(describeError(new Error('boom'))).toBe('boom'));
  it('string → itself', () => expect(describeError('boom')).toBe('boom'));
  it('config error → formatted', () => expect(describeError(configError('x'))).toBe('Invalid configuration: x'));
});

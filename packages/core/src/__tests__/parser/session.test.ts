import { describe, it, expect, vi } from 'vitest';
import { defineArguments } from '../../schema/define.js';
import { parse } from '../../parser/parse.js';
import type { ParseResult } from '../../parser/session.js';
import type { ParseOptionsInput } from '../../config.js';
import type { ArgumentSet } from '../../schema/types.js';
import type { ParseError } from '../../utils/errors.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { requires, requiresAny, validateRange } from '../../validation/validators.js';

function run<T>(set: ArgumentSet<T>, args: string[], options: ParseOptionsInput = {}): ParseResult<T> {
  return parse(set, args, { logger: silentLogger, ...options });
}

function success<T>(result: ParseResult<T>) {
  if (result.status !== 'success') throw new Error(`expected success, got ${result.status}`);
  return result;
}

function failure<T>(result: ParseResult<T>): ParseError {
  if (result.status !== 'error') throw new Error(`expected error, got ${result.status}`);
  return result.error;
}

function recordingLogger() {
  return { ...silentLogger, warn: vi.fn(), debug: vi.fn() } satisfies Logger;
}

describe('token binding', () => {
  it('a named switch is never taken as a positional value', () => {
    const set = defineArguments({ arguments: [{ member: 'text', position: 0 }, { member: 'v', type: 'boolean' }] });
    expect(success(run(set, ['-v', 'hello'])).value).toMatchObject({ text: 'hello', v: true });
  });

  it('negative number binds to a positional integer', () => {
    const set = defineArguments({ arguments: [{ member: 'n', position: 0, type: 'integer' }] });
    expect(success(run(set, ['-2'])).value).toMatchObject({ n: -2 });
  });

  it('positional slots already filled by name are skipped', () => {
    const set = defineArguments({ arguments: [{ member: 'src', position: 0 }, { member: 'dst', position: 1 }] });
    expect(success(run(set, ['-src', 'a', 'b'])).value).toMatchObject({ src: 'a', dst: 'b' });
  });

  it('too many positional values', () => {
    const set = defineArguments({ arguments: [{ member: 'src', position: 0 }, { member: 'dst', position: 1 }] });
    expect(failure(run(set, ['a', 'b', 'c']))).toEqual({
      category: 'TOO_MANY_ARGUMENTS',
      value: 'c',
      message: 'Too many arguments were supplied.',
    });
  });

  it('inline values with either separator', () => {
    const set = defineArguments({ arguments: [{ member: 'out' }, { member: 'level', type: 'integer' }] });
    expect(success(run(set, ['-out:a.txt', '-level=3'])).value).toMatchObject({ out: 'a.txt', level: 3 });
  });

  it('missing value for a named argument', () => {
    const set = defineArguments({ arguments: [{ member: 'port', type: 'integer' }] });
    expect(failure(run(set, ['-port']))).toEqual({
      category: 'MISSING_NAMED_ARGUMENT_VALUE',
      argumentName: 'port',
      message: "No value was supplied for argument 'port'.",
    });
  });

  it('white-space value separator can be turned off', () => {
    const set = defineArguments({ arguments: [{ member: 'port', type: 'integer' }] });
    const options = { allowWhiteSpaceValueSeparator: false };
    expect(failure(run(set, ['-port', '80'], options)).category).toBe('MISSING_NAMED_ARGUMENT_VALUE');
    expect(success(run(set, ['-port:80'], options)).value).toMatchObject({ port: 80 });
  });

  it('unknown argument with a custom message', () => {
    const set = defineArguments({ arguments: [{ member: 'name' }] });
    const result = run(set, ['-nope'], { messages: { unknownArgument: name => `unbekannt: ${name}` } });
    expect(failure(result)).toEqual({ category: 'UNKNOWN_ARGUMENT', argumentName: 'nope', message: 'unbekannt: nope' });
  });

  it('case-sensitive names', () => {
    const set = defineArguments({ arguments: [{ member: 'Name' }] });
    expect(success(run(set, ['-name', 'x'])).value).toMatchObject({ Name: 'x' });
    expect(failure(run(set, ['-name', 'x'], { caseSensitive: true })).category).toBe('UNKNOWN_ARGUMENT');
  });

  it('logs token classification at debug level', () => {
    const logger = recordingLogger();
    const set = defineArguments({ arguments: [{ member: 'v', type: 'boolean' }] });
    run(set, ['-v'], { logger });
    expect(logger.debug).toHaveBeenCalledWith("token '-v' classified as named");
  });
});

describe('prefix aliases', () => {
  const set = defineArguments({
    arguments: [{ member: 'verbose', type: 'boolean' }, { member: 'version', type: 'boolean' }],
  });

  it('a unique prefix selects the argument', () => {
    expect(success(run(set, ['-verb'])).value).toMatchObject({ verbose: true });
  });

  it('an ambiguous prefix is unknown', () => {
    expect(failure(run(set, ['-ver']))).toMatchObject({ category: 'UNKNOWN_ARGUMENT', argumentName: 'ver' });
  });

  it('can be disabled', () => {
    expect(failure(run(set, ['-verb'], { autoPrefixAliases: false })).category).toBe('UNKNOWN_ARGUMENT');
  });
});

describe('required arguments', () => {
  it('missing required named argument', () => {
    const set = defineArguments({ arguments: [{ member: 'Arg6', required: true }] });
    expect(failure(run(set, []))).toEqual({
      category: 'MISSING_REQUIRED_ARGUMENT',
      argumentName: 'Arg6',
      missingArguments: ['Arg6'],
      message: "The required argument 'Arg6' was not supplied.",
    });
  });

  it('lists every missing argument', () => {
    const set = defineArguments({ constructors: [{ parameters: [{ member: 'source' }, { member: 'dest' }] }] });
    expect(failure(run(set, []))).toMatchObject({
      missingArguments: ['source', 'dest'],
      message: "The required arguments 'source', 'dest' were not supplied.",
    });
  });
});

describe('multi-value arguments', () => {
  it('repeated occurrences accumulate in order', () => {
    const set = defineArguments({ arguments: [{ member: 'val', collection: 'array' }] });
    expect(success(run(set, ['-val', 'foo', '-val', 'bar', '-val', 'baz'])).value).toMatchObject({
      val: ['foo', 'bar', 'baz'],
    });
  });

  it('multiValueSeparator splits one token', () => {
    const set = defineArguments({ arguments: [{ member: 'tags', collection: 'array', multiValueSeparator: ',' }] });
    expect(success(run(set, ['-tags', 'a,b', '-tags', 'c'])).value).toMatchObject({ tags: ['a', 'b', 'c'] });
  });

  it('following values are appended until the next name', () => {
    const set = defineArguments({ arguments: [{ member: 'files', collection: 'array' }, { member: 'out' }] });
    const options = { allowMultiValueWhiteSpaceSeparator: true };
    expect(success(run(set, ['-files', 'a', 'b', 'c', '-out', 'x'], options)).value).toMatchObject({
      files: ['a', 'b', 'c'],
      out: 'x',
    });
    expect(failure(run(set, ['-files', 'a', 'b']))).toMatchObject({ category: 'TOO_MANY_ARGUMENTS', value: 'b' });
  });

  it('following values are left for a required positional that is still empty', () => {
    const set = defineArguments({
      arguments: [{ member: 'out', position: 0, required: true }, { member: 'files', collection: 'array' }],
    });
    const options = { allowMultiValueWhiteSpaceSeparator: true };
    expect(success(run(set, ['-files', 'a', 'b', 'dest'], options)).value).toMatchObject({
      out: 'dest',
      files: ['a', 'b'],
    });
    expect(success(run(set, ['dest', '-files', 'a', 'b'], options)).value).toMatchObject({
      out: 'dest',
      files: ['a', 'b'],
    });
  });

  it('multi-value positional takes the rest', () => {
    const set = defineArguments({
      arguments: [{ member: 'cmd', position: 0 }, { member: 'rest', position: 1, collection: 'array' }],
    });
    expect(success(run(set, ['run', 'a', 'b'])).value).toMatchObject({ cmd: 'run', rest: ['a', 'b'] });
  });
});

describe('duplicate arguments', () => {
  const set = defineArguments({ arguments: [{ member: 'name' }] });
  const args = ['-name', 'a', '-name', 'b'];

  it('error by default', () => {
    expect(failure(run(set, args))).toEqual({
      category: 'DUPLICATE_ARGUMENT',
      argumentName: 'name',
      message: "Argument 'name' was supplied more than once.",
    });
  });

  it('warning keeps the last value and logs', () => {
    const logger = recordingLogger();
    expect(success(run(set, args, { duplicateArguments: 'warning', logger })).value).toMatchObject({ name: 'b' });
    expect(logger.warn).toHaveBeenCalledWith("Argument 'name' was supplied more than once.");
  });

  it('allowDuplicateArguments', () => {
    expect(success(run(set, args, { allowDuplicateArguments: true })).value).toMatchObject({ name: 'b' });
  });
});

describe('dictionary arguments', () => {
  const set = defineArguments({ arguments: [{ member: 'define', collection: 'dictionary', type: 'integer' }] });

  it('collects key=value pairs', () => {
    const { value } = success(run(set, ['-define', 'a=1', '-define:b=2']));
    expect(value['define']).toEqual(new Map([['a', 1], ['b', 2]]));
  });

  it('duplicate key', () => {
    expect(failure(run(set, ['-define', 'a=1', '-define', 'a=2']))).toEqual({
      category: 'INVALID_DICTIONARY_VALUE',
      argumentName: 'define',
      value: 'a=2',
      message: "The value 'a=2' provided for argument 'define' is not valid: duplicate key 'a'",
    });
  });

  it('allowDuplicateKeys keeps the last value', () => {
    const lenient = defineArguments({
      arguments: [{ member: 'define', collection: 'dictionary', type: 'integer', allowDuplicateKeys: true }],
    });
    expect(success(run(lenient, ['-define', 'a=1', '-define', 'a=2'])).value['define']).toEqual(new Map([['a', 2]]));
  });

  it('missing separator is a conversion error', () => {
    expect(failure(run(set, ['-define', 'a']))).toMatchObject({
      category: 'ARGUMENT_VALUE_CONVERSION',
      reason: "missing key/value separator '='",
    });
  });
});

describe('conversion', () => {
  it('conversion failure', () => {
    const set = defineArguments({ arguments: [{ member: 'port', type: 'integer' }] });
    expect(failure(run(set, ['-port', 'abc']))).toEqual({
      category: 'ARGUMENT_VALUE_CONVERSION',
      argumentName: 'port',
      value: 'abc',
      reason: "'abc' is not an integer",
      message: "The value 'abc' provided for argument 'port' could not be interpreted as a integer.",
    });
  });

  it('uses the culture', () => {
    const set = defineArguments({ arguments: [{ member: 'ratio', type: 'float' }] });
    expect(success(run(set, ['-ratio', '0,5'], { culture: 'de-DE' })).value).toMatchObject({ ratio: 0.5 });
  });

  it('per-argument converter', () => {
    const set = defineArguments({
      arguments: [{ member: 'name', converter: { convert: value => ({ ok: true, value: value.toUpperCase() }) } }],
    });
    expect(success(run(set, ['-name', 'abc'])).value).toMatchObject({ name: 'ABC' });
  });
});

describe('defaults and provenance', () => {
  const set = defineArguments({
    arguments: [
      { member: 'count', type: 'integer', defaultValue: '5' },
      { member: 'name', defaultValue: 'anon' },
      { member: 'tags', collection: 'array', defaultValue: ['a', 'b'] },
      { member: 'level', type: 'integer' },
    ],
  });

  it('string defaults are converted, supplied values win', () => {
    const result = success(run(set, ['-name', 'bob']));
    expect(result.value).toMatchObject({ count: 5, name: 'bob', tags: ['a', 'b'], level: undefined });
    expect(result.provenance).toEqual({
      count: 'default',
      name: 'supplied',
      tags: 'default',
      level: 'unset',
      help: 'unset',
    });
  });

  it('dictionary default from a plain object', () => {
    const env = defineArguments({
      arguments: [{ member: 'env', collection: 'dictionary', type: 'integer', defaultValue: { a: '1', b: 2 } }],
    });
    expect(success(run(env, [])).value['env']).toEqual(new Map([['a', 1], ['b', 2]]));
  });

  it('object defaults are copied into each result', () => {
    const newYear = new Date(Date.UTC(2024, 0, 1));
    const dated = defineArguments({
      arguments: [
        { member: 'when', type: 'date', defaultValue: newYear },
        { member: 'stamps', type: 'date', collection: 'array', defaultValue: [newYear] },
      ],
    });

    const first = success(run(dated, [])).value;
    const when = first['when'];
    if (!(when instanceof Date)) throw new Error('expected a date');
    when.setUTCFullYear(1999);

    const second = success(run(dated, [])).value;
    expect(second['when']).toEqual(new Date(Date.UTC(2024, 0, 1)));
    expect(second['stamps']).toEqual([new Date(Date.UTC(2024, 0, 1))]);
    expect(second['stamps']).not.toBe(first['stamps']);
    expect(newYear.getUTCFullYear()).toBe(2024);
  });
});

describe('validation', () => {
  it('range validator', () => {
    const set = defineArguments({
      arguments: [{ member: 'port', type: 'integer', validators: [validateRange({ min: 1, max: 100 })] }],
    });
    expect(failure(run(set, ['-port', '500']))).toEqual({
      category: 'VALIDATION_FAILED',
      argumentName: 'port',
      message: "The argument 'port' must be between 1 and 100.",
    });
  });

  it('requires: Port needs Ip', () => {
    const set = defineArguments({
      arguments: [{ member: 'Port', type: 'integer', validators: [requires('Ip')] }, { member: 'Ip' }],
    });
    expect(failure(run(set, ['-Port', '80']))).toEqual({
      category: 'DEPENDENCY_FAILED',
      argumentName: 'Port',
      message: "The argument 'Port' must be used together with: Ip.",
    });
    expect(success(run(set, ['-Port', '80', '-Ip', '10.0.0.1'])).value).toMatchObject({ Port: 80, Ip: '10.0.0.1' });
  });

  it('class-level requiresAny', () => {
    const set = defineArguments({
      arguments: [{ member: 'a' }, { member: 'b' }],
      validators: [requiresAny('a', 'b')],
    });
    expect(failure(run(set, []))).toEqual({
      category: 'DEPENDENCY_FAILED',
      argumentName: undefined,
      message: 'You must use at least one of: a, b.',
    });
    expect(run(set, ['-b', 'x']).status).toBe('success');
  });
});

describe('long/short mode', () => {
  const set = defineArguments({
    arguments: [
      { member: 'verbose', type: 'boolean', shortName: 'v' },
      { member: 'print', type: 'boolean', shortName: 'p' },
      { member: 'file', shortName: 'f' },
    ],
  });
  const options: ParseOptionsInput = { mode: 'long-short' };

  it('combined short switches', () => {
    expect(success(run(set, ['-vp'], options)).value).toMatchObject({ verbose: true, print: true });
  });

  it('long names use the long prefix', () => {
    expect(success(run(set, ['--file', 'a.txt', '-v'], options)).value).toMatchObject({ file: 'a.txt', verbose: true });
  });

  it('combined short names must be switches', () => {
    expect(failure(run(set, ['-vf'], options))).toEqual({
      category: 'COMBINED_SHORT_NAME_NON_SWITCH',
      argumentName: 'file',
      message: "The combined short argument 'vf' contains an argument that is not a switch.",
    });
  });

  it('the last combined name may take an inline value', () => {
    expect(success(run(set, ['-vf:out.txt'], options)).value).toMatchObject({ verbose: true, file: 'out.txt' });
  });
});

describe('cancellation', () => {
  it('cancel with success skips later required arguments', () => {
    const set = defineArguments({
      arguments: [
        { member: 'first', position: 0, required: true },
        { member: 'second', position: 1, required: true },
        { member: 'third', position: 2, required: true },
        { member: 'help', type: 'boolean', cancelParsing: 'success' },
      ],
    });
    const result = success(run(set, ['foo', 'bar', '-help', 'extra']));
    expect(result.value).toMatchObject({ first: 'foo', second: 'bar', help: true });
    expect(result.cancelledBy).toBe('help');
    expect(result.remainingArguments).toEqual(['extra']);
    expect(result.provenance['third']).toBe('unset');
  });

  it('automatic help aborts before the required check', () => {
    const set = defineArguments({ arguments: [{ member: 'name', required: true }] });
    expect(run(set, ['-?', 'x'])).toEqual({
      status: 'cancelled',
      argumentName: 'Help',
      helpRequested: true,
      versionRequested: false,
      remainingArguments: ['x'],
    });
  });

  it('automatic version argument cancels without asking for help', () => {
    const set = defineArguments({ arguments: [{ member: 'name', required: true }] });
    expect(run(set, ['-version'], { autoVersionArgument: true })).toEqual({
      status: 'cancelled',
      argumentName: 'Version',
      helpRequested: false,
      versionRequested: true,
      remainingArguments: [],
    });
    expect(failure(run(set, ['-version'])).category).toBe('UNKNOWN_ARGUMENT');
  });
});

describe('prefix termination', () => {
  const set = defineArguments({
    arguments: [{ member: 'items', position: 0, collection: 'array' }, { member: 'v', type: 'boolean' }],
  });

  it('positional-only', () => {
    const result = success(run(set, ['-v', '--', '-x', '-v'], { prefixTermination: 'positional-only' }));
    expect(result.value).toMatchObject({ items: ['-x', '-v'], v: true });
  });

  it('cancel-with-success returns the rest', () => {
    const result = success(run(set, ['-v', '--', 'rest', '-x'], { prefixTermination: 'cancel-with-success' }));
    expect(result.remainingArguments).toEqual(['rest', '-x']);
    expect(result.value).toMatchObject({ items: [], v: true });
  });

  it('cancel-with-success still requires arguments', () => {
    const required = defineArguments({ arguments: [{ member: 'name', required: true }] });
    expect(failure(run(required, ['--', 'x'], { prefixTermination: 'cancel-with-success' })).category)
      .toBe('MISSING_REQUIRED_ARGUMENT');
  });
});

describe('creating the result', () => {
  it('create() builds the typed value', () => {
    const set = defineArguments({ arguments: [{ member: 'n', type: 'integer', defaultValue: 1 }] }, values => ({
      doubled: Number(values['n']) * 2,
    }));
    expect(success(run(set, ['-n', '4'])).value).toEqual({ doubled: 8 });
  });

  it('a throwing create() becomes CREATE_ARGUMENTS_TYPE_ERROR', () => {
    const set = defineArguments({ arguments: [{ member: 'n', type: 'integer' }] }, values => {
      if (values['n'] === undefined) throw new Error('n is missing');
      return values;
    });
    expect(failure(run(set, []))).toEqual({
      category: 'CREATE_ARGUMENTS_TYPE_ERROR',
      reason: 'n is missing',
      message: 'An error occurred creating an instance of the arguments type: n is missing',
    });
  });

  it('schema errors are thrown, not returned', () => {
    const set = defineArguments({
      arguments: [{ member: 'a', position: 0, collection: 'array' }, { member: 'b', position: 1 }],
    });
    let error: unknown;
    try {
      run(set, []);
    } catch (err) {
      error = err;
    }
    expect(error).toMatchObject({ code: 'SCHEMA_INVALID', reason: 'MULTI_VALUE_NOT_LAST' });
  });

  it('an invalid culture option is a config error before any token is read', () => {
    const set = defineArguments({ arguments: [{ member: 'ratio', type: 'float' }] });
    let error: unknown;
    try {
      run(set, ['-ratio', '1.5'], { culture: 'not a tag!' });
    } catch (err) {
      error = err;
    }
    expect(error).toEqual({ code: 'CONFIG_INVALID', reason: "culture 'not a tag!' is not a valid BCP 47 language tag" });
  });
});

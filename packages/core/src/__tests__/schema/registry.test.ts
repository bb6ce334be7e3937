import { describe, it, expect } from 'vitest';
import { resolveOptions, type ParseOptionsInput } from '../../config.js';
import { SchemaRegistry, getSchema } from '../../schema/registry.js';
import type { ArgumentSetDeclaration } from '../../schema/types.js';
import { requires, requiresAny } from '../../validation/validators.js';

function build(declaration: ArgumentSetDeclaration, options?: ParseOptionsInput): SchemaRegistry {
  return SchemaRegistry.build(declaration, resolveOptions(options));
}

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('descriptor order', () => {
  const declaration: ArgumentSetDeclaration = {
    constructors: [{ parameters: [{ member: 'source' }, { member: 'dest' }] }],
    arguments: [
      { member: 'verbose', type: 'boolean' },
      { member: 'extra', position: 5, collection: 'array' },
      { member: 'mode', position: 1 },
    ],
  };

  it('constructor parameters, then positional by position, then named, then help', () => {
    const registry = build(declaration);
    expect(registry.descriptors.map(d => d.name)).toEqual(['source', 'dest', 'mode', 'extra', 'verbose', 'Help']);
  });

  it('normalizes positions to indexes', () => {
    const registry = build(declaration);
    expect(registry.positional.map(d => [d.name, d.position])).toEqual([
      ['source', 0],
      ['dest', 1],
      ['mode', 2],
      ['extra', 3],
    ]);
  });

  it('constructor parameters are required unless defaulted', () => {
    const registry = build({
      constructors: [{ parameters: [{ member: 'a' }, { member: 'b', defaultValue: 'x' }] }],
    });
    expect(registry.positional.map(d => d.isRequired)).toEqual([true, false]);
  });

  it('building twice yields equal descriptors', () => {
    expect(build(declaration).descriptors).toEqual(build(declaration).descriptors);
  });

  it('getSchema caches per declaration and options', () => {
    const options = resolveOptions();
    expect(getSchema(declaration, options)).toBe(getSchema(declaration, options));
    expect(getSchema(declaration, resolveOptions({ mode: 'long-short' }))).not.toBe(getSchema(declaration, options));
  });
});

describe('schema errors', () => {
  it('required positional after optional', () => {
    const err = thrown(() => build({
      arguments: [{ member: 'a', position: 0 }, { member: 'b', position: 1, required: true }],
    }));
    expect(err).toMatchObject({ code: 'SCHEMA_INVALID', reason: 'REQUIRED_AFTER_OPTIONAL', argumentName: 'b' });
  });

  it('multi-value positional that is not last', () => {
    const err = thrown(() => build({
      arguments: [{ member: 'a', position: 0, collection: 'array' }, { member: 'b', position: 1 }],
    }));
    expect(err).toMatchObject({ reason: 'MULTI_VALUE_NOT_LAST', argumentName: 'a' });
  });

  it('two arguments with the same position', () => {
    const err = thrown(() => build({
      arguments: [{ member: 'a', position: 1 }, { member: 'b', position: 1 }],
    }));
    expect(err).toMatchObject({ reason: 'DUPLICATE_POSITION' });
  });

  it('name collision respects case sensitivity', () => {
    const declaration: ArgumentSetDeclaration = {
      arguments: [{ member: 'Verbose' }, { member: 'other', aliases: ['verbose'] }],
    };
    expect(thrown(() => build(declaration))).toMatchObject({ reason: 'DUPLICATE_NAME', argumentName: 'other' });
    expect(build(declaration, { caseSensitive: true }).getArgument('verbose')?.memberName).toBe('other');
  });

  it('several constructors without a designated one', () => {
    const err = thrown(() => build({
      constructors: [{ parameters: [{ member: 'a' }] }, { parameters: [{ member: 'b' }] }],
    }));
    expect(err).toMatchObject({ reason: 'AMBIGUOUS_CONSTRUCTOR' });
  });

  it('designated constructor wins', () => {
    const registry = build({
      constructors: [{ parameters: [{ member: 'a' }] }, { parameters: [{ member: 'b' }], designated: true }],
    });
    expect(registry.positional.map(d => d.name)).toEqual(['b']);
  });

  it('name containing a value separator', () => {
    expect(thrown(() => build({ arguments: [{ member: 'a', name: 'a:b' }] })))
      .toMatchObject({ reason: 'INVALID_NAME' });
  });

  it('validator depending on an unknown argument', () => {
    expect(thrown(() => build({ arguments: [{ member: 'port', validators: [requires('ip')] }] })))
      .toMatchObject({ reason: 'UNKNOWN_DEPENDENCY', argumentName: 'port' });
    expect(thrown(() => build({ arguments: [{ member: 'a' }], validators: [requiresAny('a', 'b')] })))
      .toMatchObject({ reason: 'UNKNOWN_DEPENDENCY' });
  });
});

describe('automatic help argument', () => {
  it('default mode: Help with ? and h', () => {
    const help = build({}).getArgument('?');
    expect(help?.name).toBe('Help');
    expect(help?.aliases).toEqual(['?', 'h']);
    expect(help?.cancelMode).toBe('abort');
    expect(help?.automatic).toBe('help');
  });

  it('drops only the conflicting alias', () => {
    const registry = build({ arguments: [{ member: 'host', aliases: ['h'] }] });
    expect(registry.getArgument('Help')?.aliases).toEqual(['?']);
    expect(registry.getArgument('h')?.name).toBe('host');
  });

  it('skipped when the name is taken', () => {
    const registry = build({ arguments: [{ member: 'Help', type: 'string' }] });
    expect(registry.descriptors.filter(d => d.automatic !== undefined)).toEqual([]);
  });

  it('long/short mode: --help, -?, -h', () => {
    const registry = build({}, { mode: 'long-short' });
    const help = registry.getArgument('help');
    expect(help?.shortName).toBe('?');
    expect(registry.getShortArgument('h')).toBe(help);
  });

  it('disabled by option', () => {
    expect(build({}, { autoHelpArgument: false }).descriptors).toEqual([]);
  });
});

describe('automatic version argument', () => {
  it('off unless requested', () => {
    expect(build({}).getArgument('Version')).toBeUndefined();
  });

  it('default mode: Version after Help', () => {
    const registry = build({}, { autoVersionArgument: true });
    expect(registry.descriptors.map(d => d.name)).toEqual(['Help', 'Version']);
    const version = registry.getArgument('version');
    expect(version?.automatic).toBe('version');
    expect(version?.cancelMode).toBe('abort');
    expect(version?.isSwitch).toBe(true);
    expect(version?.description).toBe('Displays version information.');
  });

  it('long/short mode and name transform', () => {
    expect(build({}, { mode: 'long-short', autoVersionArgument: true }).getArgument('version')?.name).toBe('version');
    expect(build({}, { nameTransform: 'dash-case', autoVersionArgument: true }).getArgument('version')?.name)
      .toBe('version');
  });

  it('skipped when the name is taken', () => {
    const registry = build({ arguments: [{ member: 'Version', type: 'string' }] }, { autoVersionArgument: true });
    expect(registry.getArgument('Version')?.automatic).toBeUndefined();
    expect(registry.descriptors.map(d => d.name)).toEqual(['Version', 'Help']);
  });
});

describe('long/short names', () => {
  const declaration: ArgumentSetDeclaration = {
    arguments: [
      { member: 'verbose', type: 'boolean', shortName: true },
      { member: 'port', shortName: 'p', isLong: false },
      { member: 'version', type: 'boolean' },
    ],
  };

  it('shortName true takes the first character', () => {
    expect(build(declaration, { mode: 'long-short' }).getShortArgument('v')?.name).toBe('verbose');
  });

  it('short-only argument has no long name', () => {
    const registry = build(declaration, { mode: 'long-short' });
    expect(registry.getArgument('port')).toBeUndefined();
    expect(registry.getShortArgument('p')?.hasLongName).toBe(false);
  });

  it('short names are ignored in default mode', () => {
    const registry = build(declaration);
    expect(registry.getShortArgument('v')).toBeUndefined();
    expect(registry.getArgument('port')?.shortName).toBeUndefined();
  });

  it('matchPrefix returns every argument sharing the prefix', () => {
    const registry = build(declaration, { mode: 'long-short' });
    expect(registry.matchPrefix('ver').map(d => d.name)).toEqual(['verbose', 'version']);
    expect(registry.matchPrefix('verb').map(d => d.name)).toEqual(['verbose']);
  });
});

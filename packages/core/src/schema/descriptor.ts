/**
 * ArgumentDeclaration → ArgumentDescriptor
 * 이름 변환, short 이름, 컬렉션 종류, 필수 여부 기본값을 여기서 확정한다.
 */

import { schemaError } from '../utils/errors.js';
import { transformName } from '../utils/naming.js';
import { typeName } from '../conversion/registry.js';
import type { ParseOptions } from '../config.js';
import type { ArgumentDeclaration, ArgumentDescriptor, ArgumentKind, AutomaticArgument } from './types.js';

export type DescriptorOptions = Pick<ParseOptions, 'mode' | 'nameTransform' | 'nameValueSeparators'>;

interface DescriptorPlacement {
  position?: number;
  isConstructorParameter: boolean;
}

export function checkName(name: string, options: DescriptorOptions, argumentName: string): void {
  if (name.length === 0 || /\s/.test(name)) {
    throw schemaError('INVALID_NAME', `argument name '${name}' is empty or contains white space`, argumentName);
  }
  const separator = options.nameValueSeparators.find(s => name.includes(s));
  if (separator !== undefined) {
    throw schemaError('INVALID_NAME', `argument name '${name}' contains the separator '${separator}'`, argumentName);
  }
}

function checkShortName(short: string, argumentName: string): void {
  if ([...short].length !== 1 || /\s/.test(short)) {
    throw schemaError('INVALID_NAME', `short name '${short}' must be a single character`, argumentName);
  }
}

function kindOf(decl: ArgumentDeclaration): ArgumentKind {
  switch (decl.collection) {
    case 'array':      return 'multi';
    case 'dictionary': return 'dictionary';
    default:           return 'single';
  }
}

export function createDescriptor(
  decl: ArgumentDeclaration,
  placement: DescriptorPlacement,
  options: DescriptorOptions,
): ArgumentDescriptor {
  if (decl.member.length === 0) {
    throw schemaError('INVALID_DECLARATION', 'argument member name must not be empty');
  }

  const name = decl.name ?? transformName(decl.member, options.nameTransform);
  checkName(name, options, name);

  const aliases = decl.aliases ?? [];
  aliases.forEach(alias => checkName(alias, options, name));

  // short 이름은 long/short 모드에서만 의미가 있음
  const longShort = options.mode === 'long-short';
  const shortName = !longShort
    ? undefined
    : decl.shortName === true
      ? name.charAt(0)
      : decl.shortName;
  const shortAliases = longShort ? decl.shortAliases ?? [] : [];
  const hasLongName = longShort ? decl.isLong ?? true : true;

  if (shortName !== undefined) checkShortName(shortName, name);
  shortAliases.forEach(alias => checkShortName(alias, name));
  if (!hasLongName && shortName === undefined) {
    throw schemaError('INVALID_DECLARATION', 'an argument without a long name needs a short name', name);
  }

  const kind = kindOf(decl);
  const valueType = decl.type ?? 'string';
  const keyType = kind === 'dictionary' ? decl.keyType ?? 'string' : undefined;
  const keyValueSeparator = decl.keyValueSeparator ?? '=';
  if (keyValueSeparator.length === 0) {
    throw schemaError('INVALID_DECLARATION', 'keyValueSeparator must not be empty', name);
  }
  if (decl.multiValueSeparator !== undefined && (kind === 'single' || decl.multiValueSeparator.length === 0)) {
    throw schemaError('INVALID_DECLARATION', 'multiValueSeparator needs a non-empty separator on a collection', name);
  }

  const isRequired = placement.isConstructorParameter
    ? decl.required ?? (decl.defaultValue === undefined)
    : decl.required ?? false;

  const descriptor: ArgumentDescriptor = {
    memberName: decl.member,
    name,
    aliases: Object.freeze([...aliases]),
    hasLongName,
    shortName,
    shortAliases: Object.freeze([...shortAliases]),
    position: placement.position,
    isConstructorParameter: placement.isConstructorParameter,
    valueType,
    keyType,
    kind,
    isRequired,
    defaultValue: decl.defaultValue,
    isMultiValue: kind !== 'single',
    multiValueSeparator: decl.multiValueSeparator,
    keyValueSeparator,
    allowDuplicateKeys: decl.allowDuplicateKeys ?? false,
    isSwitch: valueType === 'boolean' && kind !== 'dictionary',
    converter: decl.converter,
    validators: Object.freeze([...(decl.validators ?? [])]),
    cancelMode: decl.cancelParsing ?? 'none',
    automatic: undefined,
    description: decl.description,
    valueDescription:
      decl.valueDescription ??
      (keyType !== undefined ? `${typeName(keyType)}${keyValueSeparator}${typeName(valueType)}` : typeName(valueType)),
  };
  return Object.freeze(descriptor);
}

// ─── 자동 help / version 인자 ───────────────────────────────────────────────

export interface AutomaticNames {
  name: string;
  aliases: string[];
  shortName?: string;
  shortAliases: string[];
}

/** 모드별 help 이름 후보 (충돌 검사 전) */
export function helpNames(options: DescriptorOptions): AutomaticNames {
  if (options.mode === 'long-short') {
    return { name: transformName('help', options.nameTransform), aliases: [], shortName: '?', shortAliases: ['h'] };
  }
  return { name: transformName('Help', options.nameTransform), aliases: ['?', 'h'], shortAliases: [] };
}

export function versionNames(options: DescriptorOptions): AutomaticNames {
  const name = options.mode === 'long-short' ? 'version' : 'Version';
  return { name: transformName(name, options.nameTransform), aliases: [], shortAliases: [] };
}

const AUTOMATIC_DESCRIPTIONS: Record<AutomaticArgument, string> = {
  help: 'Displays this help message.',
  version: 'Displays version information.',
};

/** 둘 다 abort로 파싱을 취소하는 switch. 멤버 이름은 kind 그대로 */
export function createAutomaticDescriptor(kind: AutomaticArgument, names: AutomaticNames): ArgumentDescriptor {
  return Object.freeze({
    memberName: kind,
    name: names.name,
    aliases: Object.freeze([...names.aliases]),
    hasLongName: true,
    shortName: names.shortName,
    shortAliases: Object.freeze([...names.shortAliases]),
    position: undefined,
    isConstructorParameter: false,
    valueType: 'boolean',
    keyType: undefined,
    kind: 'single',
    isRequired: false,
    defaultValue: undefined,
    isMultiValue: false,
    multiValueSeparator: undefined,
    keyValueSeparator: '=',
    allowDuplicateKeys: false,
    isSwitch: true,
    converter: undefined,
    validators: Object.freeze([]),
    cancelMode: 'abort',
    automatic: kind,
    description: AUTOMATIC_DESCRIPTIONS[kind],
    valueDescription: 'boolean',
  } satisfies ArgumentDescriptor);
}

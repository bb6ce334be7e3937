/**
 * cli/src/schema-file.ts
 * YAML 인자 스키마 → ArgumentSet
 *
 * 형식:
 *   name: deploy
 *   options:            # ParseOptions (clargs.config.yml과 같은 키)
 *     mode: long-short
 *   parameters:         # 생성자 파라미터 (앞쪽 positional, 기본 필수)
 *     - member: source
 *   arguments:
 *     - member: level
 *       type: { enum: [low, high] }
 *       validators:
 *         requires: [source]
 *   requiresAny: [a, b]
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  configError,
  defineArguments,
  isRecord,
  parseConfig,
  pickBoolean,
  pickEnum,
  pickString,
  pickStringArray,
  prohibits,
  readConfigFile,
  requires,
  requiresAny,
  validateCount,
  validateEnumValue,
  validateNotEmpty,
  validateNotWhiteSpace,
  validatePattern,
  validateRange,
  validateStringLength,
  type ArgumentDeclaration,
  type ArgumentSet,
  type ArgumentSetDeclaration,
  type ArgumentValidator,
  type ArgumentValues,
  type CancelMode,
  type ClassValidator,
  type CollectionKind,
  type PrimitiveType,
  type RangeBounds,
  type ValueType,
} from '@clargs/core';

const PRIMITIVES: readonly PrimitiveType[] = ['string', 'integer', 'float', 'boolean', 'date', 'bigint'];
const COLLECTIONS: readonly CollectionKind[] = ['array', 'dictionary'];
const CANCEL_MODES: readonly CancelMode[] = ['none', 'abort', 'success'];

const ARGUMENT_KEYS = new Set([
  'member', 'name', 'aliases', 'shortName', 'shortAliases', 'isLong', 'position', 'type', 'collection',
  'keyType', 'keyValueSeparator', 'allowDuplicateKeys', 'required', 'defaultValue', 'multiValueSeparator',
  'validators', 'cancelParsing', 'description', 'valueDescription',
]);

// ─── 필드 단위 ────────────────────────────────────────────────────────────────

function asRecord(value: unknown, where: string): Record<string, unknown> {
  if (!isRecord(value)) throw configError(`${where}: mapping이 필요합니다`);
  return value;
}

function asList(value: unknown, where: string): unknown[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw configError(`${where}: 목록이 필요합니다`);
  return value;
}

function pickNumber(raw: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) throw configError(`${where}.${key}: 숫자가 필요합니다`);
  return value;
}

function pickBounds(value: unknown, where: string): RangeBounds {
  const raw = asRecord(value, where);
  const min = pickNumber(raw, 'min', where);
  const max = pickNumber(raw, 'max', where);
  if (min === undefined && max === undefined) throw configError(`${where}: min 또는 max가 필요합니다`);
  return { ...(min !== undefined ? { min } : {}), ...(max !== undefined ? { max } : {}) };
}

function names(value: unknown, where: string): string[] {
  if (typeof value === 'string') return [value];
  const list = asList(value, where);
  if (list.length === 0 || !list.every((item): item is string => typeof item === 'string')) {
    throw configError(`${where}: 인자 이름 목록이 필요합니다`);
  }
  return list;
}

function pickShortName(value: unknown, where: string): string | true | undefined {
  if (value === undefined || value === true || typeof value === 'string') return value;
  throw configError(`${where}.shortName: 한 글자 문자열 또는 true가 필요합니다`);
}

function parseValueType(value: unknown, where: string): ValueType | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'string') {
    const primitive = PRIMITIVES.find(p => p === value);
    if (!primitive) throw configError(`${where}: 알 수 없는 타입 '${value}' (${PRIMITIVES.join(', ')})`);
    return primitive;
  }

  const raw = asRecord(value, where);
  const members = names(raw['enum'], `${where}.enum`);
  return {
    kind: 'enum',
    name: pickString(raw, 'name') ?? 'enum',
    values: Object.fromEntries(members.map(member => [member, member])),
    caseSensitive: pickBoolean(raw, 'caseSensitive') ?? false,
  };
}

function parseValidators(value: unknown, where: string): ArgumentValidator[] {
  if (value === undefined) return [];
  const raw = asRecord(value, where);

  return Object.entries(raw).map(([key, setting]): ArgumentValidator => {
    const at = `${where}.${key}`;
    switch (key) {
      case 'notEmpty':      return validateNotEmpty();
      case 'notWhiteSpace': return validateNotWhiteSpace();
      case 'pattern':
        if (typeof setting !== 'string') throw configError(`${at}: 정규식 문자열이 필요합니다`);
        try {
          return validatePattern(new RegExp(setting));
        } catch (e) {
          throw configError(`${at}: ${e instanceof Error ? e.message : String(e)}`);
        }
      case 'stringLength':  return validateStringLength(pickBounds(setting, at));
      case 'range':         return validateRange(pickBounds(setting, at));
      case 'count':         return validateCount(pickBounds(setting, at));
      case 'enumValue':     return validateEnumValue(names(setting, at));
      case 'requires':      return requires(...names(setting, at));
      case 'prohibits':     return prohibits(...names(setting, at));
      default:
        throw configError(`${at}: 알 수 없는 검증기`);
    }
  });
}

function parseArgument(value: unknown, where: string): ArgumentDeclaration {
  const raw = asRecord(value, where);
  for (const key of Object.keys(raw)) {
    if (!ARGUMENT_KEYS.has(key)) throw configError(`${where}: 알 수 없는 키 '${key}'`);
  }

  const member = pickString(raw, 'member');
  if (!member) throw configError(`${where}.member: 필수 항목입니다`);

  const shortName = pickShortName(raw['shortName'], where);
  const position = pickNumber(raw, 'position', where);
  if (position !== undefined && (!Number.isInteger(position) || position < 0)) {
    throw configError(`${where}.position: 0 이상의 정수가 필요합니다`);
  }

  return {
    member,
    name: pickString(raw, 'name'),
    aliases: pickStringArray(raw, 'aliases'),
    shortName,
    shortAliases: pickStringArray(raw, 'shortAliases'),
    isLong: pickBoolean(raw, 'isLong'),
    position,
    type: parseValueType(raw['type'], `${where}.type`),
    collection: pickEnum(raw, 'collection', COLLECTIONS),
    keyType: parseValueType(raw['keyType'], `${where}.keyType`),
    keyValueSeparator: pickString(raw, 'keyValueSeparator'),
    allowDuplicateKeys: pickBoolean(raw, 'allowDuplicateKeys'),
    required: pickBoolean(raw, 'required'),
    defaultValue: raw['defaultValue'],
    multiValueSeparator: pickString(raw, 'multiValueSeparator'),
    validators: parseValidators(raw['validators'], `${where}.validators`),
    cancelParsing: pickEnum(raw, 'cancelParsing', CANCEL_MODES),
    description: pickString(raw, 'description'),
    valueDescription: pickString(raw, 'valueDescription'),
  };
}

// ─── 문서 ─────────────────────────────────────────────────────────────────────

export function parseSchemaDocument(doc: unknown): ArgumentSetDeclaration {
  const raw = asRecord(doc, 'schema');

  const parameters = asList(raw['parameters'], 'parameters').map((p, i) => parseArgument(p, `parameters[${i}]`));
  const args = asList(raw['arguments'], 'arguments').map((a, i) => parseArgument(a, `arguments[${i}]`));
  const validators: ClassValidator[] =
    raw['requiresAny'] !== undefined ? [requiresAny(...names(raw['requiresAny'], 'requiresAny'))] : [];

  return {
    name: pickString(raw, 'name'),
    description: pickString(raw, 'description'),
    constructors: parameters.length > 0 ? [{ parameters }] : [],
    arguments: args,
    validators,
    options: parseConfig(raw['options']),
  };
}

export function loadSchemaFile(filePath: string): ArgumentSet<ArgumentValues> {
  const abs = resolve(filePath);
  if (!existsSync(abs)) throw configError(`스키마 파일을 찾을 수 없음: ${abs}`);
  return defineArguments(parseSchemaDocument(readConfigFile(abs)));
}

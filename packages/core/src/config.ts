/**
 * 파싱 옵션 + clargs.config.yml 로더
 *
 * 옵션은 항상 parse() 호출에 명시적으로 전달된다 (전역 상태 없음).
 * 병합 순서: DEFAULTS < 인자 집합 선언의 options < 호출자 options
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { configError } from './utils/errors.js';
import { logger, type Logger } from './utils/logger.js';
import { defaultMessages, type MessageProvider } from './messages.js';
import type { ArgumentConverter } from './conversion/converter.js';
import { canonicalCulture } from './conversion/builtin.js';
import type { NameTransform, ParsingMode } from './schema/types.js';

export type DuplicateArgumentPolicy = 'error' | 'warning' | 'allow';

/**
 * "-5" 같은 토큰 처리
 * - name-first: 이름과 정확히 일치하는 인자가 있을 때만 named, 아니면 값
 * - value:      숫자처럼 보이면 항상 값
 */
export type NegativeNumberPolicy = 'name-first' | 'value';

/** "--" 토큰 처리 */
export type PrefixTermination = 'none' | 'positional-only' | 'cancel-with-success';

export interface ParseOptions {
  mode: ParsingMode;
  caseSensitive: boolean;
  /** default 모드의 이름 접두사, long/short 모드에서는 short 접두사 */
  argumentNamePrefixes: readonly string[];
  /** long/short 모드 전용 */
  longArgumentNamePrefix: string;
  nameValueSeparators: readonly string[];
  allowWhiteSpaceValueSeparator: boolean;
  duplicateArguments: DuplicateArgumentPolicy;
  /** BCP 47 (en-US, de-DE ...) */
  culture: string;
  nameTransform: NameTransform;
  autoPrefixAliases: boolean;
  negativeNumbers: NegativeNumberPolicy;
  allowMultiValueWhiteSpaceSeparator: boolean;
  prefixTermination: PrefixTermination;
  autoHelpArgument: boolean;
  /** Version(long/short 모드는 --version) switch 추가. 주어지면 파싱을 취소한다 */
  autoVersionArgument: boolean;
  /** 타입 이름('integer', enum/parsable의 name) → converter */
  converters: Readonly<Record<string, ArgumentConverter>>;
  messages: MessageProvider;
  logger: Logger;
}

export type ParseOptionsInput = Partial<Omit<ParseOptions, 'messages'>> & {
  messages?: Partial<MessageProvider>;
  /** duplicateArguments: 'allow' | 'error'의 축약 */
  allowDuplicateArguments?: boolean;
};

// ─── 기본값 ──────────────────────────────────────────────────────────────────

export const DEFAULTS: ParseOptions = {
  mode: 'default',
  caseSensitive: false,
  argumentNamePrefixes: process.platform === 'win32' ? ['-', '/'] : ['-'],
  longArgumentNamePrefix: '--',
  nameValueSeparators: [':', '='],
  allowWhiteSpaceValueSeparator: true,
  duplicateArguments: 'error',
  culture: 'en-US',
  nameTransform: 'none',
  autoPrefixAliases: true,
  negativeNumbers: 'name-first',
  allowMultiValueWhiteSpaceSeparator: false,
  prefixTermination: 'none',
  autoHelpArgument: true,
  autoVersionArgument: false,
  converters: {},
  messages: defaultMessages,
  logger,
};

const SCALAR_KEYS = [
  'mode',
  'caseSensitive',
  'argumentNamePrefixes',
  'longArgumentNamePrefix',
  'nameValueSeparators',
  'allowWhiteSpaceValueSeparator',
  'duplicateArguments',
  'culture',
  'nameTransform',
  'autoPrefixAliases',
  'negativeNumbers',
  'allowMultiValueWhiteSpaceSeparator',
  'prefixTermination',
  'autoHelpArgument',
  'autoVersionArgument',
  'logger',
] as const satisfies readonly (keyof ParseOptions)[];

function assignDefined<K extends keyof ParseOptions>(
  target: ParseOptions,
  key: K,
  value: ParseOptions[K] | undefined,
): void {
  if (value !== undefined) target[key] = value;
}

function checkCulture(culture: string): string {
  const canonical = canonicalCulture(culture);
  if (canonical === undefined) throw configError(`culture '${culture}' is not a valid BCP 47 language tag`);
  return canonical;
}

/**
 * 옵션 레이어 병합 (뒤쪽이 우선)
 * messages, converters는 키 단위로 합치고 나머지는 통째로 교체한다.
 * culture가 BCP 47 태그가 아니면 ConfigError를 throw.
 */
export function resolveOptions(...layers: Array<ParseOptionsInput | undefined>): ParseOptions {
  const result: ParseOptions = { ...DEFAULTS };

  for (const layer of layers) {
    if (!layer) continue;

    for (const key of SCALAR_KEYS) assignDefined(result, key, layer[key]);
    if (layer.culture !== undefined) result.culture = checkCulture(layer.culture);

    if (layer.allowDuplicateArguments !== undefined && layer.duplicateArguments === undefined) {
      result.duplicateArguments = layer.allowDuplicateArguments ? 'allow' : 'error';
    }
    if (layer.messages) result.messages = { ...result.messages, ...layer.messages };
    if (layer.converters) result.converters = { ...result.converters, ...layer.converters };
  }

  return result;
}

// ─── ENV 변수 치환 ─────────────────────────────────────────────────────────────

function substituteEnv(value: string): string {
  // ${ENV_VAR} 형식 치환
  return value.replace(/\$\{([^}]+)\}/g, (_, key: string) => {
    const envVal = process.env[key];
    if (envVal === undefined) {
      throw configError(`environment variable ${key} is not set`);
    }
    return envVal;
  });
}

export function substituteEnvDeep(obj: unknown): unknown {
  if (typeof obj === 'string') return substituteEnv(obj);
  if (Array.isArray(obj)) return obj.map(substituteEnvDeep);
  if (isRecord(obj)) {
    return Object.fromEntries(Object.entries(obj).map(([k, v]) => [k, substituteEnvDeep(v)]));
  }
  return obj;
}

// ─── 검증 헬퍼 ────────────────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function pickEnum<T extends string>(
  raw: Record<string, unknown>,
  key: string,
  allowed: readonly T[],
): T | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  const match = allowed.find(a => a === value);
  if (match === undefined) {
    throw configError(`${key} must be one of ${allowed.join(', ')} (got ${JSON.stringify(value)})`);
  }
  return match;
}

export function pickBoolean(raw: Record<string, unknown>, key: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') throw configError(`${key} must be a boolean`);
  return value;
}

export function pickString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw configError(`${key} must be a string`);
  return value;
}

export function pickStringArray(raw: Record<string, unknown>, key: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw configError(`${key} must be a list of strings`);
  }
  return value;
}

// ─── parseConfig ──────────────────────────────────────────────────────────────

const MODES: readonly ParsingMode[] = ['default', 'long-short'];
const NAME_TRANSFORMS: readonly NameTransform[] = ['none', 'PascalCase', 'camelCase', 'dash-case', 'snake_case'];
const DUPLICATE_POLICIES: readonly DuplicateArgumentPolicy[] = ['error', 'warning', 'allow'];
const NEGATIVE_NUMBER_POLICIES: readonly NegativeNumberPolicy[] = ['name-first', 'value'];
const PREFIX_TERMINATIONS: readonly PrefixTermination[] = ['none', 'positional-only', 'cancel-with-success'];

const KNOWN_KEYS = new Set<string>([...SCALAR_KEYS.filter(k => k !== 'logger'), 'allowDuplicateArguments']);

function pickCulture(raw: Record<string, unknown>): string | undefined {
  const culture = pickString(raw, 'culture');
  return culture === undefined ? undefined : checkCulture(culture);
}

function nonEmptyList(raw: Record<string, unknown>, key: string): string[] | undefined {
  const list = pickStringArray(raw, key);
  if (list !== undefined && (list.length === 0 || list.some(item => item.length === 0))) {
    throw configError(`${key} must contain at least one non-empty string`);
  }
  return list;
}

/**
 * YAML에서 읽은 값 → ParseOptionsInput
 * 함수가 필요한 항목(converters, messages, logger)은 파일로 지정할 수 없다.
 */
export function parseConfig(raw: unknown): ParseOptionsInput {
  if (raw === null || raw === undefined) return {};
  if (!isRecord(raw)) throw configError('configuration must be a mapping');

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) throw configError(`unknown option '${key}'`);
  }

  // 지정되지 않은 항목은 undefined로 남고 resolveOptions에서 무시된다
  const options: ParseOptionsInput = {
    mode: pickEnum(raw, 'mode', MODES),
    caseSensitive: pickBoolean(raw, 'caseSensitive'),
    argumentNamePrefixes: nonEmptyList(raw, 'argumentNamePrefixes'),
    longArgumentNamePrefix: pickString(raw, 'longArgumentNamePrefix'),
    nameValueSeparators: pickStringArray(raw, 'nameValueSeparators'),
    allowWhiteSpaceValueSeparator: pickBoolean(raw, 'allowWhiteSpaceValueSeparator'),
    allowDuplicateArguments: pickBoolean(raw, 'allowDuplicateArguments'),
    duplicateArguments: pickEnum(raw, 'duplicateArguments', DUPLICATE_POLICIES),
    culture: pickCulture(raw),
    nameTransform: pickEnum(raw, 'nameTransform', NAME_TRANSFORMS),
    autoPrefixAliases: pickBoolean(raw, 'autoPrefixAliases'),
    negativeNumbers: pickEnum(raw, 'negativeNumbers', NEGATIVE_NUMBER_POLICIES),
    allowMultiValueWhiteSpaceSeparator: pickBoolean(raw, 'allowMultiValueWhiteSpaceSeparator'),
    prefixTermination: pickEnum(raw, 'prefixTermination', PREFIX_TERMINATIONS),
    autoHelpArgument: pickBoolean(raw, 'autoHelpArgument'),
    autoVersionArgument: pickBoolean(raw, 'autoVersionArgument'),
  };

  if (options.longArgumentNamePrefix === '') {
    throw configError('longArgumentNamePrefix must not be empty');
  }

  return options;
}

// ─── loadConfig ───────────────────────────────────────────────────────────────

export const CONFIG_FILES = [
  'clargs.config.yml',
  'clargs.config.yaml',
  '.clargs.yml',
];

/**
 * 설정 파일 로드
 * @param configPath 명시적 경로 (없으면 현재 디렉토리에서 자동 탐색, 없으면 빈 옵션)
 */
export function loadConfig(configPath?: string): ParseOptionsInput {
  const filePath = resolveConfigPath(configPath);
  if (!filePath) return {};

  const raw = readConfigFile(filePath);
  return parseConfig(substituteEnvDeep(raw));
}

// ─── Internal ────────────────────────────────────────────────────────────────

function resolveConfigPath(configPath?: string): string | undefined {
  if (configPath) {
    const abs = resolve(configPath);
    if (!existsSync(abs)) {
      throw configError(`file not found: ${abs}`);
    }
    return abs;
  }

  for (const name of CONFIG_FILES) {
    const abs = resolve(process.cwd(), name);
    if (existsSync(abs)) return abs;
  }
  return undefined;
}

export function readConfigFile(filePath: string): unknown {
  try {
    const content = readFileSync(filePath, 'utf-8');
    return parseYaml(content);
  } catch (e) {
    throw configError(e instanceof Error ? e.message : String(e));
  }
}

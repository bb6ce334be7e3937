/**
 * clargs 에러 타입 정의 및 유틸리티
 *
 * - ParseError: 사용자 입력(argv) 때문에 실패한 파싱. parse()가 결과로 돌려준다.
 * - SchemaError: 인자 선언 자체가 잘못됨. 프로그래머 오류이므로 throw 된다.
 * - ConfigError: 설정 파일(clargs.config.yml) / 스키마 파일 오류.
 */

// ─── ParseError ─────────────────────────────────────────────────────────────

interface ParseErrorBase {
  message: string;
  argumentName?: string;
}

export type ParseError = ParseErrorBase & (
  | { category: 'UNKNOWN_ARGUMENT';               argumentName: string }
  | { category: 'UNKNOWN_COMMAND';                commandName: string }
  | { category: 'MISSING_COMMAND_NAME' }
  | { category: 'MISSING_NAMED_ARGUMENT_VALUE';   argumentName: string }
  | { category: 'DUPLICATE_ARGUMENT';             argumentName: string }
  | { category: 'TOO_MANY_ARGUMENTS';             value: string }
  | { category: 'MISSING_REQUIRED_ARGUMENT';      argumentName: string; missingArguments: string[] }
  | { category: 'ARGUMENT_VALUE_CONVERSION';      argumentName: string; value: string; reason: string }
  | { category: 'VALIDATION_FAILED' }
  | { category: 'DEPENDENCY_FAILED' }
  | { category: 'COMBINED_SHORT_NAME_NON_SWITCH'; argumentName: string }
  | { category: 'INVALID_DICTIONARY_VALUE';       argumentName: string; value: string }
  | { category: 'CREATE_ARGUMENTS_TYPE_ERROR';    reason: string }
);

export type ParseErrorCategory = ParseError['category'];

const PARSE_ERROR_CATEGORIES: ReadonlySet<string> = new Set<ParseErrorCategory>([
  'UNKNOWN_ARGUMENT',
  'UNKNOWN_COMMAND',
  'MISSING_COMMAND_NAME',
  'MISSING_NAMED_ARGUMENT_VALUE',
  'DUPLICATE_ARGUMENT',
  'TOO_MANY_ARGUMENTS',
  'MISSING_REQUIRED_ARGUMENT',
  'ARGUMENT_VALUE_CONVERSION',
  'VALIDATION_FAILED',
  'DEPENDENCY_FAILED',
  'COMBINED_SHORT_NAME_NON_SWITCH',
  'INVALID_DICTIONARY_VALUE',
  'CREATE_ARGUMENTS_TYPE_ERROR',
]);

/** ParseError인지 타입 가드 */
export function isParseError(err: unknown): err is ParseError {
  return (
    typeof err === 'object' &&
    err !== null &&
    'category' in err &&
    typeof err.category === 'string' &&
    PARSE_ERROR_CATEGORIES.has(err.category) &&
    'message' in err &&
    typeof err.message === 'string'
  );
}

/** 한 줄 표시용: "[UNKNOWN_ARGUMENT] Unknown argument name 'x'." */
export function formatParseError(err: ParseError): string {
  return `[${err.category}] ${err.message}`;
}

// ─── SchemaError / ConfigError ──────────────────────────────────────────────

export type SchemaErrorReason =
  | 'DUPLICATE_NAME'
  | 'DUPLICATE_POSITION'
  | 'MULTI_VALUE_NOT_LAST'
  | 'REQUIRED_AFTER_OPTIONAL'
  | 'AMBIGUOUS_CONSTRUCTOR'
  | 'INVALID_NAME'
  | 'UNKNOWN_DEPENDENCY'
  | 'INVALID_DECLARATION';

export type ClargsError =
  | { code: 'SCHEMA_INVALID'; reason: SchemaErrorReason; message: string; argumentName?: string }
  | { code: 'CONFIG_INVALID'; reason: string };

export type SchemaError = Extract<ClargsError, { code: 'SCHEMA_INVALID' }>;
export type ConfigError = Extract<ClargsError, { code: 'CONFIG_INVALID' }>;

/** ClargsError인지 타입 가드 */
export function isClargsError(err: unknown): err is ClargsError {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    (err.code === 'SCHEMA_INVALID' || err.code === 'CONFIG_INVALID')
  );
}

export function isSchemaError(err: unknown): err is SchemaError {
  return isClargsError(err) && err.code === 'SCHEMA_INVALID';
}

export function schemaError(
  reason: SchemaErrorReason,
  message: string,
  argumentName?: string,
): SchemaError {
  return { code: 'SCHEMA_INVALID', reason, message, ...(argumentName !== undefined ? { argumentName } : {}) };
}

export function configError(reason: string): ConfigError {
  return { code: 'CONFIG_INVALID', reason };
}

/** ClargsError를 사람이 읽을 수 있는 메시지로 변환 */
export function formatClargsError(err: ClargsError): string {
  switch (err.code) {
    case 'SCHEMA_INVALID':
      return err.argumentName
        ? `Invalid argument schema (${err.reason}) [${err.argumentName}]: ${err.message}`
        : `Invalid argument schema (${err.reason}): ${err.message}`;
    case 'CONFIG_INVALID':
      return `Invalid configuration: ${err.reason}`;
  }
}

/** catch 블록에서 받은 값을 메시지 문자열로 */
export function describeError(err: unknown): string {
  if (isParseError(err)) return formatParseError(err);
  if (isClargsError(err)) return formatClargsError(err);
  return err instanceof Error ? err.message : String(err);
}

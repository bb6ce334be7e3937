// @clargs/core

// 스키마 선언
export * from './schema/types.js';
export { defineArguments } from './schema/define.js';
export { SchemaRegistry, getSchema, type SchemaOptions } from './schema/registry.js';

// 변환
export * from './conversion/converter.js';
export {
  stringConverter,
  booleanConverter,
  integerConverter,
  floatConverter,
  bigintConverter,
  dateConverter,
  cultureConverter,
  canonicalCulture,
  createEnumConverter,
  createParsableConverter,
  enumMemberNames,
} from './conversion/builtin.js';
export {
  ConverterRegistry,
  getConverterRegistry,
  createKeyValueConverter,
  typeName,
  type KeyValuePair,
} from './conversion/registry.js';

// 검증
export * from './validation/types.js';
export * from './validation/validators.js';

// 파싱
export { parse, optionsFor } from './parser/parse.js';
export type { ParseResult } from './parser/session.js';
export { classifyToken, getPrefixes, splitInlineValue, type Token, type NamePrefix } from './parser/tokenizer.js';

// 커맨드
export * from './commands/command-manager.js';

// 설정 / 메시지
export * from './config.js';
export * from './messages.js';

// 유틸리티
export * from './utils/naming.js';
export * from './utils/logger.js';
export * from './utils/errors.js';

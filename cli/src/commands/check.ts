/**
 * cli/src/commands/check.ts
 * clargs check <schema.yml> [options] -- <args...>
 *
 * 스키마 파일로 "--" 뒤의 인자를 파싱하고 결과를 JSON으로 출력한다.
 * 옵션 우선순위: 스키마 파일 options < --config 파일 < 명령줄 플래그
 */

import {
  cultureConverter,
  defineArguments,
  defineCommand,
  describeError,
  formatParseError,
  isClargsError,
  loadConfig,
  parse,
  type ArgumentValues,
  type EnumType,
  type ParseOptionsInput,
  type ParseResult,
  type ParsingMode,
} from '@clargs/core';
import { loadSchemaFile } from '../schema-file.js';
import { log, summarizeProvenance } from '../logger.js';
import { flagValue, oneOf, requiredString, stringValue } from '../values.js';

const MODES: readonly ParsingMode[] = ['default', 'long-short'];

const PARSING_MODE: EnumType = {
  kind: 'enum',
  name: 'mode',
  values: { default: 'default', 'long-short': 'long-short' },
};

export interface CheckArguments {
  schema: string;
  mode?: ParsingMode;
  culture?: string;
  caseSensitive: boolean;
  config?: string;
  pretty: boolean;
}

export const checkArguments = defineArguments(
  {
    constructors: [
      { parameters: [{ member: 'schema', description: '인자 스키마 YAML 파일', valueDescription: 'file' }] },
    ],
    arguments: [
      { member: 'mode', type: PARSING_MODE, description: '파싱 모드 (default | long-short)' },
      { member: 'culture', converter: cultureConverter, description: '값 변환 culture (예: de-DE)' },
      { member: 'caseSensitive', type: 'boolean', description: '이름 대소문자 구분' },
      { member: 'config', shortName: true, description: 'clargs.config.yml 경로' },
      { member: 'pretty', type: 'boolean', shortName: true, description: 'JSON 들여쓰기' },
    ],
  },
  (values): CheckArguments => {
    const mode = oneOf(values['mode'], MODES);
    const culture = stringValue(values, 'culture');
    const config = stringValue(values, 'config');
    return {
      schema: requiredString(values, 'schema'),
      ...(mode !== undefined ? { mode } : {}),
      ...(culture !== undefined ? { culture } : {}),
      ...(config !== undefined ? { config } : {}),
      caseSensitive: flagValue(values, 'caseSensitive'),
      pretty: flagValue(values, 'pretty'),
    };
  },
);

/** Map, Date, bigint도 JSON으로 */
export function toJson(value: unknown, pretty: boolean): string {
  return JSON.stringify(
    value,
    (_key, item: unknown) => {
      if (item instanceof Map) return Object.fromEntries(item);
      if (typeof item === 'bigint') return item.toString();
      return item;
    },
    pretty ? 2 : undefined,
  );
}

/** 명령줄 플래그 중 지정된 것만 옵션으로 */
function flagOptions(args: CheckArguments): ParseOptionsInput {
  return {
    ...(args.mode !== undefined ? { mode: args.mode } : {}),
    ...(args.culture !== undefined ? { culture: args.culture } : {}),
    ...(args.caseSensitive ? { caseSensitive: true } : {}),
  };
}

export function runCheck(args: CheckArguments, input: readonly string[]): number {
  let result: ParseResult<ArgumentValues>;
  try {
    const schema = loadSchemaFile(args.schema);
    const options: ParseOptionsInput = { ...loadConfig(args.config), ...flagOptions(args) };
    result = parse(schema, input, { ...options, logger: log });
  } catch (err) {
    if (!isClargsError(err)) throw err;
    log.error(describeError(err));
    return 1;
  }

  switch (result.status) {
    case 'error':
      log.error(formatParseError(result.error));
      return 1;

    case 'cancelled':
      log.info(`'${result.argumentName}' 인자로 파싱이 취소되었습니다.`);
      log.plain(toJson({ status: 'cancelled', argumentName: result.argumentName }, args.pretty));
      return 0;

    case 'success':
      log.plain(
        toJson(
          {
            status: 'success',
            values: result.value,
            provenance: result.provenance,
            remainingArguments: result.remainingArguments,
          },
          args.pretty,
        ),
      );
      log.dim(summarizeProvenance(result.provenance));
      return 0;
  }
}

export const checkCommand = defineCommand({
  name: 'check',
  description: '스키마 파일로 인자 목록을 파싱해 결과 출력',
  arguments: checkArguments,
  run: (args, context) => runCheck(args, context.remainingArguments),
});

/**
 * parse() 진입점
 *
 * 사용자 입력 때문에 실패하면 throw 하지 않고 { status: 'error' }를 돌려준다.
 * 스키마 선언이 잘못된 경우(SchemaError)는 프로그래머 오류이므로 그대로 throw.
 */

import { isParseError } from '../utils/errors.js';
import { resolveOptions, type ParseOptions, type ParseOptionsInput } from '../config.js';
import { getSchema } from '../schema/registry.js';
import type { ArgumentSet } from '../schema/types.js';
import { ParseSession, type ParseResult } from './session.js';

/** 인자 집합 선언의 옵션과 호출자 옵션을 합친 최종 옵션 */
export function optionsFor<T>(set: ArgumentSet<T>, options?: ParseOptionsInput): ParseOptions {
  return resolveOptions(set.declaration.options, options);
}

export function parse<T>(
  set: ArgumentSet<T>,
  args: readonly string[],
  options?: ParseOptionsInput,
): ParseResult<T> {
  const resolved = optionsFor(set, options);
  const registry = getSchema(set.declaration, resolved);

  try {
    return new ParseSession(set, registry, resolved).run(args);
  } catch (err) {
    if (isParseError(err)) {
      resolved.logger.debug(`parse failed: ${err.category}`);
      return { status: 'error', error: err };
    }
    throw err;
  }
}

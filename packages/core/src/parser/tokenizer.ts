/**
 * 토큰 분류기
 *
 * raw 토큰 하나 → positional 값 후보 | named 토큰 (접두사, 이름, inline 값)
 *
 * 음수 처리: "-5"처럼 '-' 다음이 숫자면 negativeNumbers 정책을 따른다.
 *   name-first  이름이 정확히 일치하는 인자가 있을 때만 named
 *   value       항상 positional 값
 */

import type { ParseOptions } from '../config.js';

export interface NamePrefix {
  prefix: string;
  /** long/short 모드의 short 접두사 */
  isShort: boolean;
}

export type Token =
  | { kind: 'positional'; value: string }
  | { kind: 'named'; raw: string; prefix: NamePrefix; name: string; inlineValue?: string };

export type TokenizerOptions = Pick<
  ParseOptions,
  'mode' | 'argumentNamePrefixes' | 'longArgumentNamePrefix' | 'nameValueSeparators' | 'negativeNumbers'
>;

/** 이름이 스키마에 정확히 있는지 (음수 판별용) */
export type NameLookup = (name: string, isShort: boolean) => boolean;

const NUMERIC_START = /^-\.?\d/;

/** 긴 접두사부터 검사하도록 정렬 */
export function getPrefixes(options: TokenizerOptions): NamePrefix[] {
  const prefixes: NamePrefix[] =
    options.mode === 'long-short'
      ? [
          { prefix: options.longArgumentNamePrefix, isShort: false },
          ...options.argumentNamePrefixes
            .filter(p => p !== options.longArgumentNamePrefix)
            .map(prefix => ({ prefix, isShort: true })),
        ]
      : options.argumentNamePrefixes.map(prefix => ({ prefix, isShort: false }));

  return prefixes.sort((a, b) => b.prefix.length - a.prefix.length);
}

/** "name:value" → ["name", "value"], 가장 앞에 나오는 구분자 기준 */
export function splitInlineValue(
  text: string,
  separators: readonly string[],
): { name: string; inlineValue?: string } {
  let best: { index: number; separator: string } | undefined;
  for (const separator of separators) {
    const index = text.indexOf(separator);
    if (index > 0 && (!best || index < best.index)) best = { index, separator };
  }
  if (!best) return { name: text };
  return { name: text.slice(0, best.index), inlineValue: text.slice(best.index + best.separator.length) };
}

export function classifyToken(
  arg: string,
  prefixes: readonly NamePrefix[],
  options: TokenizerOptions,
  isKnownName: NameLookup,
): Token {
  const prefix = prefixes.find(p => arg.length > p.prefix.length && arg.startsWith(p.prefix));
  if (!prefix) return { kind: 'positional', value: arg };

  const { name, inlineValue } = splitInlineValue(arg.slice(prefix.prefix.length), options.nameValueSeparators);

  if (prefix.prefix === '-' && NUMERIC_START.test(arg)) {
    if (options.negativeNumbers === 'value' || !isKnownName(name, prefix.isShort)) {
      return { kind: 'positional', value: arg };
    }
  }

  return inlineValue === undefined
    ? { kind: 'named', raw: arg, prefix, name }
    : { kind: 'named', raw: arg, prefix, name, inlineValue };
}

/**
 * named 토큰 → ArgumentDescriptor 매칭
 *
 * - long 이름: 정확히 일치 → 없으면 유일한 prefix 일치 (autoPrefixAliases)
 * - long/short 모드의 short 접두사: 한 글자면 short 이름, 여러 글자면 결합 switch (-abc)
 */

import type { ParseError } from '../utils/errors.js';
import type { MessageProvider } from '../messages.js';
import type { ArgumentDescriptor } from '../schema/types.js';
import type { SchemaRegistry } from '../schema/registry.js';
import type { Token } from './tokenizer.js';

export interface MatchedArgument {
  argument: ArgumentDescriptor;
  /** 토큰에 붙어 온 값. 없으면 switch는 "true", 나머지는 다음 토큰에서 */
  inlineValue?: string;
}

export interface MatcherOptions {
  autoPrefixAliases: boolean;
  messages: MessageProvider;
}

type NamedToken = Extract<Token, { kind: 'named' }>;

function unknownArgument(name: string, messages: MessageProvider): ParseError {
  return { category: 'UNKNOWN_ARGUMENT', argumentName: name, message: messages.unknownArgument(name) };
}

function matchLong(token: NamedToken, registry: SchemaRegistry, options: MatcherOptions): ArgumentDescriptor {
  const exact = registry.getArgument(token.name);
  if (exact) return exact;

  if (options.autoPrefixAliases) {
    const candidates = registry.matchPrefix(token.name);
    const [only] = candidates;
    if (only && candidates.length === 1) return only;
  }
  throw unknownArgument(token.name, options.messages);
}

function matchCombined(token: NamedToken, registry: SchemaRegistry, options: MatcherOptions): MatchedArgument[] {
  const chars = [...token.name];
  const resolved = chars.map(ch => {
    const argument = registry.getShortArgument(ch);
    if (!argument) throw unknownArgument(ch, options.messages);
    return argument;
  });

  const last = resolved[resolved.length - 1];
  const nonSwitch = (argument: ArgumentDescriptor): ParseError => ({
    category: 'COMBINED_SHORT_NAME_NON_SWITCH',
    argumentName: argument.name,
    message: options.messages.combinedShortNameNonSwitch(token.name),
  });

  if (token.inlineValue === undefined || !last || last.isSwitch) {
    // 모두 switch, inline 값이 있으면 전부 같은 값
    const offending = resolved.find(a => !a.isSwitch);
    if (offending) throw nonSwitch(offending);
    return resolved.map(argument =>
      token.inlineValue === undefined ? { argument } : { argument, inlineValue: token.inlineValue },
    );
  }

  // 마지막 인자만 inline 값을 받는다 (-vf:out.txt)
  const leading = resolved.slice(0, -1);
  const offending = leading.find(a => !a.isSwitch);
  if (offending) throw nonSwitch(offending);
  return [...leading.map(argument => ({ argument })), { argument: last, inlineValue: token.inlineValue }];
}

export function matchNamedToken(
  token: NamedToken,
  registry: SchemaRegistry,
  options: MatcherOptions,
): MatchedArgument[] {
  let matched: MatchedArgument[];

  if (token.prefix.isShort) {
    if ([...token.name].length === 1) {
      const argument = registry.getShortArgument(token.name);
      if (!argument) throw unknownArgument(token.name, options.messages);
      matched = [{ argument }];
    } else {
      return matchCombined(token, registry, options);
    }
  } else {
    matched = [{ argument: matchLong(token, registry, options) }];
  }

  return token.inlineValue === undefined
    ? matched
    : matched.map(m => ({ ...m, inlineValue: token.inlineValue }));
}

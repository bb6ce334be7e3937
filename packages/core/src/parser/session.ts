/**
 * Parse Session
 * parse() 호출 하나의 상태 머신. 매 호출마다 새로 만들고 공유하지 않는다.
 *
 *   토큰마다: 분류 → 매칭 → 값 획득 → before-conversion 검증 → 변환 → after-conversion 검증
 *   끝나면:   필수 인자 확인 → 기본값 → after-parsing 검증 → class 검증 → create()
 *
 * 실패는 ParseError 객체를 throw 하고 parse()가 결과로 바꾼다.
 * 취소(cancelParsing)는 각 바인딩 직후에만 확인한다.
 */

import type { ParseError } from '../utils/errors.js';
import type { ParseOptions } from '../config.js';
import type { SchemaRegistry } from '../schema/registry.js';
import type { ArgumentDescriptor, ArgumentSet, ArgumentValues, ValueProvenance } from '../schema/types.js';
import type { ArgumentLookup, ValidationCategory, ValidationContext, ValidationMode } from '../validation/types.js';
import { getConverterRegistry, type ConverterRegistry } from '../conversion/registry.js';
import { classifyToken, getPrefixes, type NamePrefix, type Token } from './tokenizer.js';
import { matchNamedToken } from './matcher.js';

// ─── 결과 ───────────────────────────────────────────────────────────────────

export type ParseResult<T> =
  | {
      status: 'success';
      value: T;
      /** 멤버 이름 → 값 출처 */
      provenance: Record<string, ValueProvenance>;
      /** cancel-with-success 이후 처리하지 않은 토큰 */
      remainingArguments: string[];
      /** cancel-with-success를 일으킨 인자 (없으면 끝까지 파싱) */
      cancelledBy?: string;
    }
  | {
      status: 'cancelled';
      argumentName: string;
      /** abort 취소는 보통 사용법 출력 요청 (자동 version 인자는 제외) */
      helpRequested: boolean;
      /** 자동 version 인자로 취소됨 */
      versionRequested: boolean;
      remainingArguments: string[];
    }
  | { status: 'error'; error: ParseError };

// ─── 인자 상태 ──────────────────────────────────────────────────────────────

interface ArgumentState {
  readonly argument: ArgumentDescriptor;
  /** 명령줄에서 값이 주어졌는지 (기본값은 제외) */
  hasValue: boolean;
  defaulted: boolean;
  /** 마지막 raw 토큰 (에러 메시지용) */
  rawValue?: string;
  value?: unknown;
  readonly values: unknown[];
  readonly map: Map<unknown, unknown>;
}

function validationError(
  category: ValidationCategory | undefined,
  message: string,
  argumentName?: string,
): ParseError {
  return category === 'DEPENDENCY_FAILED'
    ? { category, message, argumentName }
    : { category: 'VALIDATION_FAILED', message, argumentName };
}

const CLONEABLE = new Set<unknown>([Object.prototype, Array.prototype, Date.prototype, Map.prototype, Set.prototype]);

/** 스키마의 기본값은 공유되므로 결과에는 복사본을 넣는다 (클래스 인스턴스는 그대로) */
function copyDefault(value: unknown): unknown {
  if (typeof value !== 'object' || value === null) return value;
  return CLONEABLE.has(Object.getPrototypeOf(value)) ? structuredClone(value) : value;
}

function finalValue(state: ArgumentState): unknown {
  switch (state.argument.kind) {
    case 'single':     return state.value;
    case 'multi':      return state.values;
    case 'dictionary': return state.map;
  }
}

export class ParseSession<T> {
  private readonly states = new Map<ArgumentDescriptor, ArgumentState>();
  private readonly converters: ConverterRegistry;
  private readonly prefixes: NamePrefix[];
  private readonly lookup: ArgumentLookup;
  private readonly terminator: string;
  private positionalIndex = 0;
  /** allowMultiValueWhiteSpaceSeparator: 뒤따르는 값 토큰을 받을 인자 */
  private carry: ArgumentState | undefined;

  constructor(
    private readonly set: ArgumentSet<T>,
    private readonly registry: SchemaRegistry,
    private readonly options: ParseOptions,
  ) {
    this.converters = getConverterRegistry(options.converters);
    this.prefixes = getPrefixes(options);
    this.terminator = options.mode === 'long-short' ? options.longArgumentNamePrefix : '--';
    for (const argument of registry.descriptors) {
      this.states.set(argument, { argument, hasValue: false, defaulted: false, values: [], map: new Map() });
    }

    this.lookup = {
      has: name => registry.findArgument(name) !== undefined,
      hasValue: name => {
        const argument = registry.findArgument(name);
        return argument ? this.state(argument).hasValue : false;
      },
      value: name => {
        const argument = registry.findArgument(name);
        return argument ? finalValue(this.state(argument)) : undefined;
      },
    };
  }

  run(args: readonly string[]): ParseResult<T> {
    const { options, terminator } = this;
    let positionalOnly = false;

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      if (arg === undefined) continue;

      if (!positionalOnly && arg === terminator && options.prefixTermination !== 'none') {
        if (options.prefixTermination === 'cancel-with-success') {
          return this.finish(args.slice(i + 1));
        }
        positionalOnly = true;
        this.carry = undefined;
        continue;
      }

      const token: Token = positionalOnly ? { kind: 'positional', value: arg } : this.classify(arg);
      options.logger.debug(`token '${arg}' classified as ${token.kind}`);

      let bound: ArgumentDescriptor[];
      if (token.kind === 'named') {
        const result = this.bindNamed(token, args, i);
        bound = result.bound;
        i = result.index;
      } else if (this.carry && !positionalOnly && !this.neededByPositional(args, i)) {
        this.bind(this.carry, token.value);
        bound = [this.carry.argument];
      } else {
        this.carry = undefined;
        bound = [this.bindPositional(token.value)];
      }

      const cancelling = bound.find(argument => argument.cancelMode !== 'none');
      if (cancelling?.cancelMode === 'abort') {
        options.logger.debug(`parsing cancelled by '${cancelling.name}'`);
        return {
          status: 'cancelled',
          argumentName: cancelling.name,
          helpRequested: cancelling.automatic !== 'version',
          versionRequested: cancelling.automatic === 'version',
          remainingArguments: args.slice(i + 1),
        };
      }
      if (cancelling?.cancelMode === 'success') {
        return this.finish(args.slice(i + 1), cancelling);
      }
    }

    return this.finish([]);
  }

  // ─── 토큰 처리 ──────────────────────────────────────────────────────────

  private classify(arg: string): Token {
    return classifyToken(arg, this.prefixes, this.options, (name, isShort) =>
      (isShort ? this.registry.getShortArgument(name) : this.registry.getArgument(name)) !== undefined,
    );
  }

  private bindNamed(
    token: Extract<Token, { kind: 'named' }>,
    args: readonly string[],
    index: number,
  ): { bound: ArgumentDescriptor[]; index: number } {
    const matched = matchNamedToken(token, this.registry, this.options);
    let next = index;

    this.carry = undefined;
    for (const { argument, inlineValue } of matched) {
      let value = inlineValue;
      if (value === undefined) {
        if (argument.isSwitch) {
          value = 'true';
        } else {
          value = this.takeValueToken(argument, args, next + 1);
          next += 1;
        }
      }

      const state = this.state(argument);
      this.bind(state, value);
      if (this.options.allowMultiValueWhiteSpaceSeparator && argument.isMultiValue && !argument.isSwitch) {
        this.carry = state;
      }
    }

    return { bound: matched.map(m => m.argument), index: next };
  }

  /**
   * carry 중인 토큰을 남은 필수 positional 슬롯에 넘겨야 하는지.
   * 다음 named 토큰까지 남은 값 토큰 수가 빈 필수 슬롯 수 이하이면 positional 몫이다.
   */
  private neededByPositional(args: readonly string[], index: number): boolean {
    const unfilled = this.registry.positional.filter(argument => argument.isRequired && !this.state(argument).hasValue);
    if (unfilled.length === 0) return false;

    let values = 0;
    for (let i = index; i < args.length; i++) {
      const arg = args[i];
      if (arg === undefined || arg === this.terminator || this.classify(arg).kind === 'named') break;
      values += 1;
    }
    return values <= unfilled.length;
  }

  /** 공백으로 구분된 값: 다음 토큰이 positional 값이어야 한다 */
  private takeValueToken(argument: ArgumentDescriptor, args: readonly string[], index: number): string {
    const candidate = args[index];
    if (
      candidate === undefined ||
      !this.options.allowWhiteSpaceValueSeparator ||
      this.classify(candidate).kind === 'named'
    ) {
      const error: ParseError = {
        category: 'MISSING_NAMED_ARGUMENT_VALUE',
        argumentName: argument.name,
        message: this.options.messages.missingNamedArgumentValue(argument.name),
      };
      throw error;
    }
    return candidate;
  }

  /** 다음 빈 positional 슬롯 (이름으로 이미 채워진 슬롯은 건너뜀) */
  private bindPositional(value: string): ArgumentDescriptor {
    const { positional } = this.registry;

    while (this.positionalIndex < positional.length) {
      const argument = positional[this.positionalIndex];
      if (!argument) break;
      const state = this.state(argument);

      if (argument.isMultiValue) {
        this.bind(state, value);
        return argument;
      }
      this.positionalIndex += 1;
      if (!state.hasValue) {
        this.bind(state, value);
        return argument;
      }
    }

    const error: ParseError = {
      category: 'TOO_MANY_ARGUMENTS',
      value,
      message: this.options.messages.tooManyArguments(),
    };
    throw error;
  }

  // ─── 값 저장 ────────────────────────────────────────────────────────────

  private bind(state: ArgumentState, raw: string): void {
    const { argument } = state;
    const { messages, logger } = this.options;

    if (state.hasValue && !argument.isMultiValue) {
      switch (this.options.duplicateArguments) {
        case 'error': {
          const error: ParseError = {
            category: 'DUPLICATE_ARGUMENT',
            argumentName: argument.name,
            message: messages.duplicateArgument(argument.name),
          };
          throw error;
        }
        case 'warning':
          logger.warn(messages.duplicateArgument(argument.name));
          break;
        case 'allow':
          break;
      }
    }

    state.rawValue = raw;
    const pieces = argument.multiValueSeparator !== undefined ? raw.split(argument.multiValueSeparator) : [raw];
    for (const piece of pieces) this.accept(state, piece);
    state.hasValue = true;
  }

  private accept(state: ArgumentState, raw: string): void {
    const { argument } = state;
    this.validate(state, 'before-conversion', raw, true);

    if (argument.kind === 'dictionary') {
      const result = this.converters.forDictionary(argument).convert(raw, this.options.culture);
      if (!result.ok) throw this.conversionError(argument, raw, result.reason);

      const [key, value] = result.value;
      if (state.map.has(key) && !argument.allowDuplicateKeys) {
        const error: ParseError = {
          category: 'INVALID_DICTIONARY_VALUE',
          argumentName: argument.name,
          value: raw,
          message: this.options.messages.invalidDictionaryValue(argument.name, raw, `duplicate key '${String(key)}'`),
        };
        throw error;
      }
      state.map.set(key, value);
      this.validate(state, 'after-conversion', value, true);
      return;
    }

    const value = this.convert(argument, raw);
    if (argument.kind === 'multi') state.values.push(value);
    else state.value = value;
    this.validate(state, 'after-conversion', value, true);
  }

  private convert(argument: ArgumentDescriptor, raw: string): unknown {
    const result = this.converters.forArgument(argument).convert(raw, this.options.culture);
    if (!result.ok) throw this.conversionError(argument, raw, result.reason);
    return result.value;
  }

  private conversionError(argument: ArgumentDescriptor, raw: string, reason: string): ParseError {
    return {
      category: 'ARGUMENT_VALUE_CONVERSION',
      argumentName: argument.name,
      value: raw,
      reason,
      message: this.options.messages.argumentValueConversion(argument.name, raw, argument.valueDescription),
    };
  }

  // ─── 검증 ───────────────────────────────────────────────────────────────

  private validate(state: ArgumentState, mode: ValidationMode, value: unknown, hasValue: boolean): void {
    const { argument } = state;
    const context: ValidationContext = {
      argument,
      value,
      hasValue,
      arguments: this.lookup,
      messages: this.options.messages,
    };

    for (const validator of argument.validators) {
      if (validator.mode !== mode || validator.isValid(context)) continue;
      throw validationError(validator.category, validator.errorMessage(context), argument.name);
    }
  }

  private validateClass(): void {
    const context = { arguments: this.lookup, messages: this.options.messages };
    for (const validator of this.registry.classValidators) {
      if (validator.isValid(context)) continue;
      throw validationError(validator.category, validator.errorMessage(context));
    }
  }

  // ─── 마무리 ─────────────────────────────────────────────────────────────

  private finish(remainingArguments: string[], cancelledBy?: ArgumentDescriptor): ParseResult<T> {
    const { descriptors } = this.registry;

    // cancel-with-success는 남은 필수 인자를 요구하지 않는다
    if (!cancelledBy) this.checkRequired();

    for (const argument of descriptors) this.applyDefault(this.state(argument));
    for (const argument of descriptors) {
      const state = this.state(argument);
      this.validate(state, 'after-parsing', finalValue(state), state.hasValue);
    }
    this.validateClass();

    const values: ArgumentValues = {};
    const provenance: Record<string, ValueProvenance> = {};
    for (const argument of descriptors) {
      const state = this.state(argument);
      values[argument.memberName] = finalValue(state);
      provenance[argument.memberName] = state.hasValue ? 'supplied' : state.defaulted ? 'default' : 'unset';
    }

    return {
      status: 'success',
      value: this.create(values),
      provenance,
      remainingArguments,
      ...(cancelledBy ? { cancelledBy: cancelledBy.name } : {}),
    };
  }

  private checkRequired(): void {
    const missing = this.registry.descriptors.filter(argument => argument.isRequired && !this.state(argument).hasValue);
    const [first] = missing;
    if (!first) return;

    const names = missing.map(argument => argument.name);
    const error: ParseError = {
      category: 'MISSING_REQUIRED_ARGUMENT',
      argumentName: first.name,
      missingArguments: names,
      message: this.options.messages.missingRequiredArguments(names),
    };
    throw error;
  }

  /** 문자열 기본값은 명령줄 입력과 같은 converter를 거친다 */
  private applyDefault(state: ArgumentState): void {
    const { argument } = state;
    const fallback = argument.defaultValue;
    if (state.hasValue || fallback === undefined) return;

    const element = (item: unknown) => (typeof item === 'string' ? this.convert(argument, item) : copyDefault(item));

    switch (argument.kind) {
      case 'single':
        state.value = element(fallback);
        break;
      case 'multi': {
        const items: unknown[] = Array.isArray(fallback) ? fallback : [fallback];
        state.values.push(...items.map(element));
        break;
      }
      case 'dictionary':
        for (const [key, value] of this.defaultEntries(argument, fallback)) state.map.set(key, value);
        break;
    }
    state.defaulted = true;
  }

  private defaultEntries(argument: ArgumentDescriptor, fallback: unknown): Iterable<readonly [unknown, unknown]> {
    if (fallback instanceof Map) {
      return [...fallback.entries()].map(([key, value]: [unknown, unknown]) => [key, copyDefault(value)] as const);
    }
    if (typeof fallback === 'string') {
      const result = this.converters.forDictionary(argument).convert(fallback, this.options.culture);
      if (!result.ok) throw this.conversionError(argument, fallback, result.reason);
      return [result.value];
    }
    if (typeof fallback === 'object' && fallback !== null) {
      return Object.entries(fallback).map(
        ([key, value]: [string, unknown]) =>
          [key, typeof value === 'string' ? this.convert(argument, value) : copyDefault(value)] as const,
      );
    }
    return [];
  }

  private create(values: ArgumentValues): T {
    try {
      return this.set.create(values);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      const error: ParseError = {
        category: 'CREATE_ARGUMENTS_TYPE_ERROR',
        reason,
        message: this.options.messages.createArgumentsTypeError(reason),
      };
      throw error;
    }
  }

  private state(argument: ArgumentDescriptor): ArgumentState {
    let state = this.states.get(argument);
    if (!state) {
      state = { argument, hasValue: false, defaulted: false, values: [], map: new Map() };
      this.states.set(argument, state);
    }
    return state;
  }
}

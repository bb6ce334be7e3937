/**
 * ConverterRegistry
 * 값 타입 → ArgumentConverter 해석. 타입별로 한 번만 해석하고 캐시한다.
 *
 * 우선순위: 인자별 converter > options.converters[타입 이름] > 기본 제공
 */

import type { ArgumentDescriptor, EnumType, Parsable, PrimitiveType, ValueType } from '../schema/types.js';
import { converted, rejected, type ArgumentConverter, type ConversionResult } from './converter.js';
import {
  stringConverter,
  booleanConverter,
  integerConverter,
  floatConverter,
  bigintConverter,
  dateConverter,
  createEnumConverter,
  createParsableConverter,
} from './builtin.js';

/** 값 타입의 표시 이름 ('integer', enum/parsable은 선언된 name) */
export function typeName(type: ValueType): string {
  return typeof type === 'string' ? type : type.name;
}

function builtinConverter(type: ValueType): ArgumentConverter {
  if (typeof type !== 'string') {
    return type.kind === 'enum' ? createEnumConverter(type) : createParsableConverter(type);
  }
  switch (type) {
    case 'string':  return stringConverter;
    case 'boolean': return booleanConverter;
    case 'integer': return integerConverter;
    case 'float':   return floatConverter;
    case 'bigint':  return bigintConverter;
    case 'date':    return dateConverter;
  }
}

export class ConverterRegistry {
  private readonly primitives = new Map<PrimitiveType, ArgumentConverter>();
  // enum/parsable 객체 키는 약한 참조
  private readonly objects = new WeakMap<EnumType | Parsable, ArgumentConverter>();

  constructor(private readonly overrides: Readonly<Record<string, ArgumentConverter>> = {}) {}

  resolve(type: ValueType): ArgumentConverter {
    const cached = typeof type === 'string' ? this.primitives.get(type) : this.objects.get(type);
    if (cached) return cached;

    const resolved = this.overrides[typeName(type)] ?? builtinConverter(type);
    if (typeof type === 'string') this.primitives.set(type, resolved);
    else this.objects.set(type, resolved);
    return resolved;
  }

  /** 디스크립터의 요소 converter (dictionary면 value 쪽) */
  forArgument(argument: ArgumentDescriptor): ArgumentConverter {
    return argument.converter ?? this.resolve(argument.valueType);
  }

  /** dictionary 인자의 "key=value" converter */
  forDictionary(argument: ArgumentDescriptor): ArgumentConverter<KeyValuePair> {
    return createKeyValueConverter(
      this.resolve(argument.keyType ?? 'string'),
      this.forArgument(argument),
      argument.keyValueSeparator,
    );
  }
}

const registryCache = new WeakMap<object, ConverterRegistry>();

/** overrides 객체별로 registry 재사용 */
export function getConverterRegistry(overrides: Readonly<Record<string, ArgumentConverter>>): ConverterRegistry {
  let registry = registryCache.get(overrides);
  if (!registry) {
    registry = new ConverterRegistry(overrides);
    registryCache.set(overrides, registry);
  }
  return registry;
}

// ─── key=value ──────────────────────────────────────────────────────────────

export type KeyValuePair = readonly [key: unknown, value: unknown];

/**
 * dictionary 인자용: "key=value" → [key, value]
 * 구분자는 첫 번째 등장 위치에서만 나눈다 ("a=b=c" → ["a", "b=c"]).
 */
export function createKeyValueConverter(
  keyConverter: ArgumentConverter,
  valueConverter: ArgumentConverter,
  separator: string,
): ArgumentConverter<KeyValuePair> {
  return {
    convert(value: string, culture: string): ConversionResult<KeyValuePair> {
      const index = value.indexOf(separator);
      if (index < 0) return rejected(`missing key/value separator '${separator}'`);

      const key = keyConverter.convert(value.slice(0, index), culture);
      if (!key.ok) return key;
      const item = valueConverter.convert(value.slice(index + separator.length), culture);
      if (!item.ok) return item;

      return converted([key.value, item.value] as const);
    },
  };
}

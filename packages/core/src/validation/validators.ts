/**
 * 기본 제공 검증기
 * 모두 순수 함수: 검증 대상 외의 상태를 바꾸지 않는다.
 */

import { enumMemberNames } from '../conversion/builtin.js';
import type { RangeBounds } from '../messages.js';
import type { ArgumentValidator, ClassValidator } from './types.js';

// ─── before-conversion ──────────────────────────────────────────────────────

export function validateNotEmpty(): ArgumentValidator {
  return {
    name: 'notEmpty',
    mode: 'before-conversion',
    isValid: ({ value }) => typeof value !== 'string' || value.length > 0,
    errorMessage: ({ argument, messages }) => messages.validateNotEmptyFailed(argument.name),
  };
}

export function validateNotWhiteSpace(): ArgumentValidator {
  return {
    name: 'notWhiteSpace',
    mode: 'before-conversion',
    isValid: ({ value }) => typeof value !== 'string' || value.trim().length > 0,
    errorMessage: ({ argument, messages }) => messages.validateNotWhiteSpaceFailed(argument.name),
  };
}

export function validatePattern(pattern: RegExp, message?: string): ArgumentValidator {
  // g/y 플래그는 lastIndex 상태를 남긴다
  const regex = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  return {
    name: 'pattern',
    mode: 'before-conversion',
    isValid: ({ value }) => typeof value !== 'string' || regex.test(value),
    errorMessage: ({ argument, messages }) =>
      message ?? messages.validatePatternFailed(argument.name, regex.source),
  };
}

export function validateStringLength(bounds: RangeBounds): ArgumentValidator {
  return {
    name: 'stringLength',
    mode: 'before-conversion',
    isValid({ value }) {
      if (typeof value !== 'string') return true;
      if (bounds.min !== undefined && value.length < bounds.min) return false;
      if (bounds.max !== undefined && value.length > bounds.max) return false;
      return true;
    },
    errorMessage: ({ argument, messages }) => messages.validateStringLengthFailed(argument.name, bounds),
  };
}

// ─── after-conversion ───────────────────────────────────────────────────────

export type Comparable = number | bigint | Date;

function isComparable(value: unknown): value is Comparable {
  return typeof value === 'number' || typeof value === 'bigint' || value instanceof Date;
}

function compare(a: Comparable, b: Comparable): number {
  const x = a instanceof Date ? a.getTime() : a;
  const y = b instanceof Date ? b.getTime() : b;
  if (typeof x === 'bigint' && typeof y === 'bigint') return x < y ? -1 : x > y ? 1 : 0;
  const nx = Number(x);
  const ny = Number(y);
  return nx < ny ? -1 : nx > ny ? 1 : 0;
}

function display(value: Comparable): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

export function validateRange(bounds: RangeBounds<Comparable>): ArgumentValidator {
  const shown: RangeBounds<string> = {
    ...(bounds.min !== undefined ? { min: display(bounds.min) } : {}),
    ...(bounds.max !== undefined ? { max: display(bounds.max) } : {}),
  };
  return {
    name: 'range',
    mode: 'after-conversion',
    isValid({ value }) {
      if (!isComparable(value)) return false;
      if (bounds.min !== undefined && compare(value, bounds.min) < 0) return false;
      if (bounds.max !== undefined && compare(value, bounds.max) > 0) return false;
      return true;
    },
    errorMessage: ({ argument, messages }) => messages.validateRangeFailed(argument.name, shown),
  };
}

/**
 * enum 값 제한
 * allowed가 없으면 enum 타입에 정의된 값 전부, 있으면 그 부분집합만 허용
 */
export function validateEnumValue(allowed?: readonly (string | number)[]): ArgumentValidator {
  return {
    name: 'enumValue',
    mode: 'after-conversion',
    isValid({ argument, value }) {
      if (typeof value !== 'string' && typeof value !== 'number') return false;
      if (allowed) return allowed.includes(value);
      const type = argument.valueType;
      if (typeof type === 'string' || type.kind !== 'enum') return true;
      return Object.values(type.values).includes(value);
    },
    errorMessage({ argument, value, messages }) {
      const type = argument.valueType;
      const names = allowed
        ? allowed.map(String)
        : typeof type !== 'string' && type.kind === 'enum'
          ? enumMemberNames(type)
          : [];
      return messages.validateEnumValueFailed(argument.name, String(value), names);
    },
  };
}

// ─── after-parsing ──────────────────────────────────────────────────────────

function countOf(value: unknown): number {
  if (Array.isArray(value)) return value.length;
  if (value instanceof Map) return value.size;
  return value === undefined ? 0 : 1;
}

/** 컬렉션 요소 수. 값이 없으면 검사하지 않는다 (필수 여부는 required로) */
export function validateCount(bounds: RangeBounds): ArgumentValidator {
  return {
    name: 'count',
    mode: 'after-parsing',
    isValid({ value, hasValue }) {
      if (!hasValue) return true;
      const count = countOf(value);
      if (bounds.min !== undefined && count < bounds.min) return false;
      if (bounds.max !== undefined && count > bounds.max) return false;
      return true;
    },
    errorMessage: ({ argument, messages }) => messages.validateCountFailed(argument.name, bounds),
  };
}

/** 이 인자를 쓰면 names도 모두 있어야 함 */
export function requires(...names: string[]): ArgumentValidator {
  return {
    name: 'requires',
    mode: 'after-parsing',
    category: 'DEPENDENCY_FAILED',
    dependencies: names,
    isValid: ({ hasValue, arguments: args }) => !hasValue || names.every(n => args.hasValue(n)),
    errorMessage: ({ argument, messages }) => messages.validateRequiresFailed(argument.name, names),
  };
}

/** 이 인자를 쓰면 names는 하나도 있으면 안 됨 */
export function prohibits(...names: string[]): ArgumentValidator {
  return {
    name: 'prohibits',
    mode: 'after-parsing',
    category: 'DEPENDENCY_FAILED',
    dependencies: names,
    isValid: ({ hasValue, arguments: args }) => !hasValue || names.every(n => !args.hasValue(n)),
    errorMessage: ({ argument, arguments: args, messages }) =>
      messages.validateProhibitsFailed(argument.name, names.filter(n => args.hasValue(n))),
  };
}

// ─── class 단위 ─────────────────────────────────────────────────────────────

/** names 중 최소 하나는 있어야 함 */
export function requiresAny(...names: string[]): ClassValidator {
  return {
    name: 'requiresAny',
    category: 'DEPENDENCY_FAILED',
    dependencies: names,
    isValid: ({ arguments: args }) => names.some(n => args.hasValue(n)),
    errorMessage: ({ messages }) => messages.validateRequiresAnyFailed(names),
  };
}

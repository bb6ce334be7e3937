/**
 * cli/src/values.ts
 * 파싱된 ArgumentValues(unknown) → 커맨드 인자 타입
 */

import type { ArgumentValues } from '@clargs/core';

export function stringValue(values: ArgumentValues, member: string): string | undefined {
  const value = values[member];
  return typeof value === 'string' ? value : undefined;
}

export function requiredString(values: ArgumentValues, member: string): string {
  const value = stringValue(values, member);
  if (value === undefined) throw new Error(`${member} 값이 없습니다.`);
  return value;
}

export function flagValue(values: ArgumentValues, member: string): boolean {
  return values[member] === true;
}

export function oneOf<T extends string>(value: unknown, allowed: readonly T[]): T | undefined {
  return allowed.find(candidate => candidate === value);
}

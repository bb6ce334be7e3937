/**
 * 검증기 타입
 *
 * 실행 시점 (ValidationMode)
 *   before-conversion  raw 문자열, 값 토큰을 얻은 직후
 *   after-conversion   변환된 값 하나 (multi-value면 값마다)
 *   after-parsing      토큰을 모두 소비한 뒤, 인자마다 한 번 (값이 없어도 실행)
 */

import type { MessageProvider } from '../messages.js';
import type { ArgumentDescriptor } from '../schema/types.js';

export type ValidationMode = 'before-conversion' | 'after-conversion' | 'after-parsing';

export type ValidationCategory = 'VALIDATION_FAILED' | 'DEPENDENCY_FAILED';

/** 다른 인자 상태 조회 (교차 검증용, 읽기 전용) */
export interface ArgumentLookup {
  /** 스키마에 있는 이름인지 (이름/별칭, 대소문자 규칙 적용) */
  has(name: string): boolean;
  hasValue(name: string): boolean;
  value(name: string): unknown;
}

export interface ValidationContext {
  argument: ArgumentDescriptor;
  /**
   * before-conversion: raw 문자열
   * after-conversion:  변환된 요소 값
   * after-parsing:     최종 값 (배열/Map 포함), 값이 없으면 undefined
   */
  value: unknown;
  hasValue: boolean;
  arguments: ArgumentLookup;
  messages: MessageProvider;
}

export interface ArgumentValidator {
  /** 진단용 이름 ('range', 'requires' ...) */
  name: string;
  mode: ValidationMode;
  /** 기본 VALIDATION_FAILED */
  category?: ValidationCategory;
  /** 참조하는 다른 인자 이름. 스키마 빌드 때 존재 여부를 확인 */
  dependencies?: readonly string[];
  isValid(context: ValidationContext): boolean;
  errorMessage(context: ValidationContext): string;
}

export interface ClassValidationContext {
  arguments: ArgumentLookup;
  messages: MessageProvider;
}

/** 인자 집합 전체에 대한 검증 (after-parsing 이후 한 번) */
export interface ClassValidator {
  name: string;
  category?: ValidationCategory;
  dependencies?: readonly string[];
  isValid(context: ClassValidationContext): boolean;
  errorMessage(context: ClassValidationContext): string;
}

/**
 * 인자 스키마 타입 정의
 *
 * ArgumentSetDeclaration (작성자가 쓰는 선언)
 *   → SchemaRegistry.build()
 *   → ArgumentDescriptor[] (불변, 파싱 간 공유)
 */

import type { ArgumentConverter } from '../conversion/converter.js';
import type { ArgumentValidator, ClassValidator } from '../validation/types.js';
import type { ParseOptionsInput } from '../config.js';

export type ParsingMode = 'default' | 'long-short';

/**
 * 인자가 매칭된 직후 파싱을 멈출지 여부
 * - abort:   실패로 중단 (보통 help). 결과 없음
 * - success: 지금까지의 값으로 성공 처리, 남은 토큰은 remainingArguments로 반환
 */
export type CancelMode = 'none' | 'abort' | 'success';

export type NameTransform = 'none' | 'PascalCase' | 'camelCase' | 'dash-case' | 'snake_case';

// ─── 값 타입 ────────────────────────────────────────────────────────────────

export type PrimitiveType = 'string' | 'integer' | 'float' | 'boolean' | 'date' | 'bigint';

export interface EnumType {
  kind: 'enum';
  name: string;
  /** TS enum 객체 또는 { Name: value } 맵. 숫자 enum의 역방향 키는 무시됨 */
  values: Readonly<Record<string, string | number>>;
  /** 기본 false: 멤버 이름을 대소문자 구분 없이 매칭 */
  caseSensitive?: boolean;
}

/**
 * 문자열 파싱 계약을 가진 사용자 타입
 * parse()는 실패 시 throw, 메시지가 변환 오류 reason이 된다.
 */
export interface Parsable<T = unknown> {
  kind: 'parsable';
  name: string;
  parse(value: string, culture: string): T;
}

export type ValueType = PrimitiveType | EnumType | Parsable;

export type CollectionKind = 'array' | 'dictionary';

// ─── 선언 ───────────────────────────────────────────────────────────────────

export interface ArgumentDeclaration {
  /** 결과 객체의 키 */
  member: string;
  /** 명시적 인자 이름 (없으면 member에 nameTransform 적용) */
  name?: string;
  aliases?: string[];
  /** long/short 모드 전용. true면 이름의 첫 글자 */
  shortName?: string | true;
  shortAliases?: string[];
  /** long/short 모드에서 long 이름을 가질지 (기본 true) */
  isLong?: boolean;
  position?: number;
  type?: ValueType;
  collection?: CollectionKind;
  /** dictionary 전용 */
  keyType?: ValueType;
  keyValueSeparator?: string;
  allowDuplicateKeys?: boolean;
  required?: boolean;
  /** 문자열이면 런타임 입력과 같은 변환기를 거친다 */
  defaultValue?: unknown;
  multiValueSeparator?: string;
  converter?: ArgumentConverter;
  validators?: ArgumentValidator[];
  cancelParsing?: CancelMode;
  description?: string;
  valueDescription?: string;
}

/** 생성자 역할: 앞쪽 positional 슬롯들. 여러 개면 하나만 designated 여야 함 */
export interface ConstructorDeclaration {
  parameters: ArgumentDeclaration[];
  designated?: boolean;
}

export interface ArgumentSetDeclaration {
  name?: string;
  description?: string;
  constructors?: ConstructorDeclaration[];
  arguments?: ArgumentDeclaration[];
  validators?: ClassValidator[];
  /** 이 인자 집합 전용 기본 옵션 (호출자 옵션이 우선) */
  options?: ParseOptionsInput;
}

export type ArgumentValues = Record<string, unknown>;

export interface ArgumentSet<T> {
  readonly declaration: ArgumentSetDeclaration;
  readonly create: (values: ArgumentValues) => T;
}

// ─── 디스크립터 ─────────────────────────────────────────────────────────────

export type ArgumentKind = 'single' | 'multi' | 'dictionary';

export interface ArgumentDescriptor {
  readonly memberName: string;
  /** 매칭에 쓰는 정식 이름 */
  readonly name: string;
  readonly aliases: readonly string[];
  /** long/short 모드에서 long 이름으로 매칭 가능한지 */
  readonly hasLongName: boolean;
  readonly shortName?: string;
  readonly shortAliases: readonly string[];
  /** positional 순서 (0부터, 레지스트리가 정규화) */
  readonly position?: number;
  readonly isConstructorParameter: boolean;
  readonly valueType: ValueType;
  readonly keyType?: ValueType;
  readonly kind: ArgumentKind;
  readonly isRequired: boolean;
  readonly defaultValue?: unknown;
  readonly isMultiValue: boolean;
  readonly multiValueSeparator?: string;
  readonly keyValueSeparator: string;
  readonly allowDuplicateKeys: boolean;
  readonly isSwitch: boolean;
  readonly converter?: ArgumentConverter;
  readonly validators: readonly ArgumentValidator[];
  readonly cancelMode: CancelMode;
  /** 파서가 자동으로 추가한 인자 */
  readonly automatic?: AutomaticArgument;
  readonly description?: string;
  readonly valueDescription: string;
}

export type AutomaticArgument = 'help' | 'version';

/** 값의 출처 */
export type ValueProvenance = 'supplied' | 'default' | 'unset';

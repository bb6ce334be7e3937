/**
 * Argument Converter 인터페이스
 * 문자열 하나 → 타입 값 하나. 같은 (raw, culture) 입력이면 항상 같은 결과.
 */

export type ConversionResult<T = unknown> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

export interface ArgumentConverter<T = unknown> {
  convert(value: string, culture: string): ConversionResult<T>;
}

export const converted = <T>(value: T): ConversionResult<T> => ({ ok: true, value });

export const rejected = (reason: string): ConversionResult<never> => ({ ok: false, reason });

/** 함수 하나로 converter 생성 (throw → 실패로 변환) */
export function createConverter<T>(parse: (value: string, culture: string) => T): ArgumentConverter<T> {
  return {
    convert(value: string, culture: string): ConversionResult<T> {
      try {
        return converted(parse(value, culture));
      } catch (err) {
        return rejected(err instanceof Error ? err.message : String(err));
      }
    },
  };
}

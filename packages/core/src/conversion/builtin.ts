/**
 * 기본 제공 converter
 *
 * - string / boolean / integer / float / bigint
 * - date: ISO 8601 우선, 그다음 culture의 숫자 날짜 순서 (en-US: M/D/Y, de-DE: D.M.Y ...)
 *         뒤에 시각이 붙을 수 있다 ("11/22/2023, 10:30:00 AM", "22.11.2023, 10:30:00")
 * - enum: 멤버 이름 (기본 대소문자 무시) 또는 숫자 enum 값
 * - parsable: 타입이 노출하는 parse(value, culture)
 *
 * 날짜는 모두 UTC로 만든다 (로컬 타임존 의존 없음).
 */

import type { EnumType, Parsable } from '../schema/types.js';
import {
  converted,
  rejected,
  createConverter,
  type ArgumentConverter,
  type ConversionResult,
} from './converter.js';

// ─── culture 심볼 ───────────────────────────────────────────────────────────

interface NumberSymbols {
  group: string;
  decimal: string;
}

type DatePart = 'day' | 'month' | 'year';

interface DayPeriods {
  am: string;
  pm: string;
}

const numberSymbolCache = new Map<string, NumberSymbols>();
const dateOrderCache = new Map<string, DatePart[]>();
const dayPeriodCache = new Map<string, DayPeriods>();

/** BCP 47 태그 정규화 ('en-us' → 'en-US'). 잘못된 태그면 undefined */
export function canonicalCulture(culture: string): string | undefined {
  try {
    return Intl.getCanonicalLocales(culture)[0];
  } catch (err) {
    if (err instanceof RangeError) return undefined;
    throw err;
  }
}

export function getNumberSymbols(culture: string): NumberSymbols {
  const cached = numberSymbolCache.get(culture);
  if (cached) return cached;

  const parts = new Intl.NumberFormat(culture).formatToParts(12345.6);
  const symbols: NumberSymbols = {
    group: parts.find(p => p.type === 'group')?.value ?? ',',
    decimal: parts.find(p => p.type === 'decimal')?.value ?? '.',
  };
  numberSymbolCache.set(culture, symbols);
  return symbols;
}

function isDatePart(type: string): type is DatePart {
  return type === 'day' || type === 'month' || type === 'year';
}

export function getDateOrder(culture: string): DatePart[] {
  const cached = dateOrderCache.get(culture);
  if (cached) return cached;

  const parts = new Intl.DateTimeFormat(culture, {
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    timeZone: 'UTC',
  }).formatToParts(new Date(Date.UTC(2000, 10, 22)));

  const order = parts.map(p => p.type).filter(isDatePart);
  const result: DatePart[] = order.length === 3 ? order : ['year', 'month', 'day'];
  dateOrderCache.set(culture, result);
  return result;
}

/** 12시간제 표기의 오전/오후 표시 (en-US: AM/PM) */
export function getDayPeriods(culture: string): DayPeriods {
  const cached = dayPeriodCache.get(culture);
  if (cached) return cached;

  const format = new Intl.DateTimeFormat(culture, { hour: 'numeric', hour12: true, timeZone: 'UTC' });
  const period = (hour: number, fallback: string) =>
    format.formatToParts(new Date(Date.UTC(2000, 0, 1, hour))).find(p => p.type === 'dayPeriod')?.value ?? fallback;

  const periods: DayPeriods = { am: period(1, 'AM'), pm: period(13, 'PM') };
  dayPeriodCache.set(culture, periods);
  return periods;
}

function stripGroups(text: string, group: string): string {
  // fr-FR 등은 그룹 구분자가 (좁은) 공백
  return /\s/.test(group) ? text.replace(/\s/g, '') : text.split(group).join('');
}

// ─── 스칼라 ─────────────────────────────────────────────────────────────────

export const stringConverter: ArgumentConverter<string> = {
  convert: value => converted(value),
};

export const booleanConverter: ArgumentConverter<boolean> = {
  convert(value) {
    const text = value.trim().toLowerCase();
    if (text === 'true') return converted(true);
    if (text === 'false') return converted(false);
    return rejected(`'${value}' is not a boolean value`);
  },
};

export const integerConverter: ArgumentConverter<number> = {
  convert(value, culture) {
    const text = stripGroups(value.trim(), getNumberSymbols(culture).group);
    if (!/^[+-]?\d+$/.test(text)) return rejected(`'${value}' is not an integer`);
    const result = Number(text);
    if (!Number.isSafeInteger(result)) return rejected(`'${value}' is outside the safe integer range`);
    return converted(result);
  },
};

export const floatConverter: ArgumentConverter<number> = {
  convert(value, culture) {
    const { group, decimal } = getNumberSymbols(culture);
    let text = stripGroups(value.trim(), group);
    if (decimal !== '.') text = text.split(decimal).join('.');

    if (!/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(text)) {
      return rejected(`'${value}' is not a number`);
    }
    return converted(Number(text));
  },
};

export const bigintConverter: ArgumentConverter<bigint> = {
  convert(value, culture) {
    const text = stripGroups(value.trim(), getNumberSymbols(culture).group);
    if (!/^[+-]?\d+$/.test(text)) return rejected(`'${value}' is not an integer`);
    return converted(BigInt(text));
  },
};

/** culture 이름을 값으로 받는 인자용 */
export const cultureConverter: ArgumentConverter<string> = {
  convert(value) {
    const culture = canonicalCulture(value.trim());
    return culture !== undefined ? converted(culture) : rejected(`'${value}' is not a valid BCP 47 language tag`);
  },
};

// ─── 날짜 ───────────────────────────────────────────────────────────────────

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?Z?)?$/;
const CULTURE_DATE =
  /^(\d{1,4})[./\-\s]+(\d{1,4})[./\-\s]+(\d{1,4})\.?(?:,?\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s*([^\d\s]+))?)?$/;

function makeUtcDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
  millis = 0,
): Date | undefined {
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds, millis));
  // Date.UTC는 2월 30일 같은 값을 조용히 넘겨버림
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  if (hours > 23 || minutes > 59 || seconds > 59) return undefined;
  return date;
}

/** 오전/오후 표시가 있으면 12시간제 → 24시간제 */
function toHours(hours: number, marker: string | undefined, culture: string): number | undefined {
  if (marker === undefined) return hours;
  if (hours < 1 || hours > 12) return undefined;

  const { am, pm } = getDayPeriods(culture);
  const text = marker.toLowerCase();
  if (text === am.toLowerCase()) return hours % 12;
  if (text === pm.toLowerCase()) return (hours % 12) + 12;
  return undefined;
}

function expandYear(text: string): number {
  const year = Number(text);
  if (text.length > 2) return year;
  return year + (year < 50 ? 2000 : 1900);
}

export const dateConverter: ArgumentConverter<Date> = {
  convert(value, culture) {
    const text = value.trim();

    const iso = ISO_DATE.exec(text);
    if (iso) {
      const [, y, mo, d, h, mi, s, ms] = iso;
      const date = makeUtcDate(
        Number(y),
        Number(mo),
        Number(d),
        Number(h ?? 0),
        Number(mi ?? 0),
        Number(s ?? 0),
        Number((ms ?? '0').padEnd(3, '0')),
      );
      return date ? converted(date) : rejected(`'${value}' is not a valid date`);
    }

    const local = CULTURE_DATE.exec(text);
    if (!local) return rejected(`'${value}' is not a date`);

    const fields: Partial<Record<DatePart, string>> = {};
    getDateOrder(culture).forEach((part, i) => {
      fields[part] = local[i + 1];
    });
    if (fields.year === undefined || fields.month === undefined || fields.day === undefined) {
      return rejected(`'${value}' is not a date`);
    }

    const [, , , , h, mi, s, marker] = local;
    const hours = toHours(Number(h ?? 0), marker, culture);
    if (hours === undefined) return rejected(`'${value}' is not a valid date`);

    const date = makeUtcDate(
      expandYear(fields.year),
      Number(fields.month),
      Number(fields.day),
      hours,
      Number(mi ?? 0),
      Number(s ?? 0),
    );
    return date ? converted(date) : rejected(`'${value}' is not a valid date`);
  },
};

// ─── enum ───────────────────────────────────────────────────────────────────

/** 숫자 enum의 역방향 키("0", "1")를 뺀 멤버 이름 */
export function enumMemberNames(type: EnumType): string[] {
  return Object.keys(type.values).filter(key => !/^-?\d+$/.test(key));
}

export function createEnumConverter(type: EnumType): ArgumentConverter<string | number> {
  const names = enumMemberNames(type);

  return {
    convert(value): ConversionResult<string | number> {
      const text = value.trim();
      const name = type.caseSensitive
        ? names.find(n => n === text)
        : names.find(n => n.toLowerCase() === text.toLowerCase());

      if (name !== undefined) {
        const member = type.values[name];
        if (member !== undefined) return converted(member);
      }

      if (/^-?\d+$/.test(text)) {
        const numeric = Number(text);
        const match = names.map(n => type.values[n]).find(v => v === numeric);
        if (match !== undefined) return converted(match);
      }

      return rejected(`'${value}' is not one of: ${names.join(', ')}`);
    },
  };
}

// ─── parsable ───────────────────────────────────────────────────────────────

export function createParsableConverter<T>(type: Parsable<T>): ArgumentConverter<T> {
  return createConverter((value, culture) => type.parse(value, culture));
}

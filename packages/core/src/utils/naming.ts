/**
 * 이름 변환 유틸리티
 * 멤버 이름(sourcePath, ip_address ...) → 인자 이름 규칙(NameTransform)에 맞게 변환
 */

import type { NameTransform } from '../schema/types.js';

/** "sourcePath" | "source_path" | "IPAddress" → 단어 목록 */
export function splitWords(str: string): string[] {
  return str
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')        // camelCase 경계
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')     // IPAddress → IP Address
    .replace(/[^a-zA-Z0-9]+/g, ' ')
    .split(/\s+/)
    .filter(Boolean);
}

/** "source path" | "source_path" | "sourcePath" → "SourcePath" */
export function toPascalCase(str: string): string {
  return splitWords(str)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join('');
}

/** "SourcePath" | "source_path" → "sourcePath" */
export function toCamelCase(str: string): string {
  const pascal = toPascalCase(str);
  return pascal.charAt(0).toLowerCase() + pascal.slice(1);
}

/** "SourcePath" | "source_path" → "source-path" */
export function toDashCase(str: string): string {
  return splitWords(str).map(word => word.toLowerCase()).join('-');
}

/** "SourcePath" | "source-path" → "source_path" */
export function toSnakeCase(str: string): string {
  return splitWords(str).map(word => word.toLowerCase()).join('_');
}

/** 명시적 이름이 없는 인자의 이름 결정 */
export function transformName(name: string, transform: NameTransform): string {
  switch (transform) {
    case 'none':
      return name;
    case 'PascalCase':
      return toPascalCase(name);
    case 'camelCase':
      return toCamelCase(name);
    case 'dash-case':
      return toDashCase(name);
    case 'snake_case':
      return toSnakeCase(name);
  }
}

/** 대소문자 규칙에 맞춘 비교용 키 */
export function nameKey(name: string, caseSensitive: boolean): string {
  return caseSensitive ? name : name.toLowerCase();
}

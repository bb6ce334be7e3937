import { describe, it, expect } from 'vitest';
import {
  splitWords, toPascalCase, toCamelCase, toDashCase, toSnakeCase,
  transformName, nameKey,
} from '../../utils/naming.js';

describe('splitWords', () => {
  it('camelCase boundary', () => expect(splitWords('sourcePath')).toEqual(['source', 'Path']));
  it('acronym followed by word', () => expect(splitWords('IPAddress')).toEqual(['IP', 'Address']));
  it('snake and dash separators', () => expect(splitWords('ip_address-v4')).toEqual(['ip', 'address', 'v4']));
});

describe('toPascalCase', () => {
  it('camel → Pascal', () => expect(toPascalCase('sourcePath')).toBe('SourcePath'));
  it('snake → Pascal', () => expect(toPascalCase('ip_address')).toBe('IpAddress'));
  it('keeps acronym case', () => expect(toPascalCase('IPAddress')).toBe('IPAddress'));
});

describe('toCamelCase', () => {
  it('Pascal → camel', () => expect(toCamelCase('SourcePath')).toBe('sourcePath'));
  it('single word', () => expect(toCamelCase('Help')).toBe('help'));
});

describe('toDashCase', () => {
  it('camel → dash', () => expect(toDashCase('sourcePath')).toBe('source-path'));
  it('acronym → dash', () => expect(toDashCase('IPAddress')).toBe('ip-address'));
});

describe('toSnakeCase', () => {
  it('camel → snake', () => expect(toSnakeCase('sourcePath')).toBe('source_path'));
});

describe('transformName', () => {
  it('none keeps the member name', () => expect(transformName('sourcePath', 'none')).toBe('sourcePath'));
  it('dash-case', () => expect(transformName('caseSensitive', 'dash-case')).toBe('case-sensitive'));
  it('PascalCase', () => expect(transformName('caseSensitive', 'PascalCase')).toBe('CaseSensitive'));
  it('snake_case', () => expect(transformName('caseSensitive', 'snake_case')).toBe('case_sensitive'));
});

describe('nameKey', () => {
  it('case-insensitive → lowercase', () => expect(nameKey('Verbose', false)).toBe('verbose'));
  it('case-sensitive → unchanged', () => expect(nameKey('Verbose', true)).toBe('Verbose'));
});

/**
 * 스키마 선언 빌더
 *
 * @example
 * const Args = defineArguments(
 *   {
 *     constructors: [{ parameters: [{ member: 'source' }] }],
 *     arguments: [{ member: 'verbose', type: 'boolean', shortName: true }],
 *   },
 *   values => new Options(values),
 * );
 */

import type { ArgumentSet, ArgumentSetDeclaration, ArgumentValues } from './types.js';

export function defineArguments(declaration: ArgumentSetDeclaration): ArgumentSet<ArgumentValues>;
export function defineArguments<T>(
  declaration: ArgumentSetDeclaration,
  create: (values: ArgumentValues) => T,
): ArgumentSet<T>;
export function defineArguments<T>(
  declaration: ArgumentSetDeclaration,
  create?: (values: ArgumentValues) => T,
): ArgumentSet<T | ArgumentValues> {
  return { declaration, create: create ?? (values => values) };
}

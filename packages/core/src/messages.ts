/**
 * 에러/검증 메시지 문자열 제공자
 * options.messages로 일부만 덮어써도 된다 (나머지는 기본 영어 문구).
 */

export interface RangeBounds<T = number> {
  min?: T;
  max?: T;
}

export interface MessageProvider {
  unknownArgument(name: string): string;
  unknownCommand(name: string): string;
  missingCommandName(): string;
  missingNamedArgumentValue(name: string): string;
  duplicateArgument(name: string): string;
  tooManyArguments(): string;
  missingRequiredArguments(names: readonly string[]): string;
  argumentValueConversion(name: string, value: string, valueDescription: string): string;
  combinedShortNameNonSwitch(name: string): string;
  invalidDictionaryValue(name: string, value: string, reason: string): string;
  createArgumentsTypeError(reason: string): string;

  validationFailed(name: string): string;
  validateNotEmptyFailed(name: string): string;
  validateNotWhiteSpaceFailed(name: string): string;
  validatePatternFailed(name: string, pattern: string): string;
  validateStringLengthFailed(name: string, bounds: RangeBounds): string;
  validateRangeFailed(name: string, bounds: RangeBounds<string>): string;
  validateCountFailed(name: string, bounds: RangeBounds): string;
  validateEnumValueFailed(name: string, value: string, allowed: readonly string[]): string;
  validateRequiresFailed(name: string, dependencies: readonly string[]): string;
  validateProhibitsFailed(name: string, prohibited: readonly string[]): string;
  validateRequiresAnyFailed(names: readonly string[]): string;
}

const quoteList = (names: readonly string[]) => names.map(n => `'${n}'`).join(', ');

function bounded<T>(bounds: RangeBounds<T>, min: (v: T) => string, max: (v: T) => string, both: (lo: T, hi: T) => string): string {
  if (bounds.min !== undefined && bounds.max !== undefined) return both(bounds.min, bounds.max);
  if (bounds.min !== undefined) return min(bounds.min);
  if (bounds.max !== undefined) return max(bounds.max);
  return '';
}

export const defaultMessages: MessageProvider = {
  unknownArgument: name => `Unknown argument name '${name}'.`,
  unknownCommand: name => `Unknown command '${name}'.`,
  missingCommandName: () => 'No command name was supplied.',
  missingNamedArgumentValue: name => `No value was supplied for argument '${name}'.`,
  duplicateArgument: name => `Argument '${name}' was supplied more than once.`,
  tooManyArguments: () => 'Too many arguments were supplied.',
  missingRequiredArguments: names =>
    names.length === 1
      ? `The required argument '${names[0]}' was not supplied.`
      : `The required arguments ${quoteList(names)} were not supplied.`,
  argumentValueConversion: (name, value, valueDescription) =>
    `The value '${value}' provided for argument '${name}' could not be interpreted as a ${valueDescription}.`,
  combinedShortNameNonSwitch: name =>
    `The combined short argument '${name}' contains an argument that is not a switch.`,
  invalidDictionaryValue: (name, value, reason) =>
    `The value '${value}' provided for argument '${name}' is not valid: ${reason}`,
  createArgumentsTypeError: reason =>
    `An error occurred creating an instance of the arguments type: ${reason}`,

  validationFailed: name => `The value for argument '${name}' is not valid.`,
  validateNotEmptyFailed: name => `The argument '${name}' must have a non-empty value.`,
  validateNotWhiteSpaceFailed: name =>
    `The argument '${name}' must have a value that is not empty or only white space.`,
  validatePatternFailed: (name, pattern) =>
    `The value for argument '${name}' does not match the pattern '${pattern}'.`,
  validateStringLengthFailed: (name, bounds) =>
    bounded(
      bounds,
      min => `The argument '${name}' must be at least ${min} characters.`,
      max => `The argument '${name}' must be at most ${max} characters.`,
      (min, max) => `The argument '${name}' must be between ${min} and ${max} characters.`,
    ),
  validateRangeFailed: (name, bounds) =>
    bounded(
      bounds,
      min => `The argument '${name}' must be at least ${min}.`,
      max => `The argument '${name}' must be at most ${max}.`,
      (min, max) => `The argument '${name}' must be between ${min} and ${max}.`,
    ),
  validateCountFailed: (name, bounds) =>
    bounded(
      bounds,
      min => `The argument '${name}' must have at least ${min} items.`,
      max => `The argument '${name}' must have at most ${max} items.`,
      (min, max) => `The argument '${name}' must have between ${min} and ${max} items.`,
    ),
  validateEnumValueFailed: (name, value, allowed) =>
    `The value '${value}' is not valid for argument '${name}'. Accepted values: ${allowed.join(', ')}.`,
  validateRequiresFailed: (name, dependencies) =>
    `The argument '${name}' must be used together with: ${dependencies.join(', ')}.`,
  validateProhibitsFailed: (name, prohibited) =>
    `The argument '${name}' cannot be used together with: ${prohibited.join(', ')}.`,
  validateRequiresAnyFailed: names => `You must use at least one of: ${names.join(', ')}.`,
};

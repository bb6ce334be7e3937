/**
 * CommandManager
 * 첫 번째 positional 토큰을 커맨드 이름으로 읽고, 그 커맨드의 인자 집합으로 나머지를 파싱한다.
 *
 * 커맨드는 평평한 목록. 계층은 parent + filter로 호출자가 구성한다:
 *   new CommandManager(all, { filter: c => c.parent === 'remote' })
 *
 * applicationVersion을 주면 'version' 커맨드가 자동으로 붙는다 (같은 이름이 있으면 생략).
 */

import { formatParseError, type ParseError } from '../utils/errors.js';
import { nameKey } from '../utils/naming.js';
import { resolveOptions, type ParseOptions, type ParseOptionsInput } from '../config.js';
import { parse } from '../parser/parse.js';
import { defineArguments } from '../schema/define.js';
import type { Logger } from '../utils/logger.js';
import type { ParseResult } from '../parser/session.js';
import type { ArgumentSet, ValueProvenance } from '../schema/types.js';

export interface CommandContext {
  /** cancel-with-success 이후 남은 토큰 */
  remainingArguments: string[];
  provenance: Record<string, ValueProvenance>;
}

export interface CommandDefinition<T = unknown> {
  name: string;
  aliases?: string[];
  description?: string;
  /** 상위 커맨드 이름 (filter에서 쓰는 관례일 뿐, 코어는 해석하지 않음) */
  parent?: string;
  arguments: ArgumentSet<T>;
  /** 반환값이 종료 코드 (없으면 0) */
  run(args: T, context: CommandContext): number | void | Promise<number | void>;
}

/** 타입 추론용 */
export function defineCommand<T>(command: CommandDefinition<T>): CommandDefinition<T> {
  return command;
}

export interface CommandOptions extends ParseOptionsInput {
  /** 기본 false */
  commandNameCaseSensitive?: boolean;
  /** 유일한 접두사로 커맨드 선택 (기본 true) */
  autoCommandPrefixAliases?: boolean;
  filter?: (command: CommandDefinition) => boolean;
  /** 자동 version 커맨드가 출력할 버전 */
  applicationVersion?: string;
  /** 자동 version 커맨드 출력의 앞부분 */
  applicationName?: string;
}

export const VERSION_COMMAND_NAME = 'version';

/** "<이름> <버전>"을 info로 출력하는 커맨드 */
export function createVersionCommand(version: string, logger: Logger, applicationName?: string): CommandDefinition {
  return defineCommand({
    name: VERSION_COMMAND_NAME,
    description: 'Displays version information.',
    arguments: defineArguments({}),
    run: () => {
      logger.info(applicationName !== undefined ? `${applicationName} ${version}` : version);
    },
  });
}

export type CommandParseResult =
  | {
      status: 'success';
      command: CommandDefinition;
      value: unknown;
      context: CommandContext;
      cancelledBy?: string;
    }
  | {
      status: 'cancelled';
      command: CommandDefinition;
      argumentName: string;
      helpRequested: boolean;
      versionRequested: boolean;
      remainingArguments: string[];
    }
  | { status: 'error'; error: ParseError; command?: CommandDefinition };

export class CommandManager {
  private readonly commands: readonly CommandDefinition[];
  private readonly resolved: ParseOptions;

  constructor(
    commands: readonly CommandDefinition[],
    private readonly options: CommandOptions = {},
  ) {
    this.resolved = resolveOptions(options);

    const listed = options.filter ? commands.filter(options.filter) : [...commands];
    const { applicationVersion } = options;
    this.commands =
      applicationVersion !== undefined && !this.hasName(listed, VERSION_COMMAND_NAME)
        ? [...listed, createVersionCommand(applicationVersion, this.resolved.logger, options.applicationName)]
        : listed;
  }

  /** filter 적용 후 이름순 */
  getCommands(): CommandDefinition[] {
    return [...this.commands].sort((a, b) => a.name.localeCompare(b.name));
  }

  /** 이름/별칭 정확히 일치 → 없으면 유일한 접두사 */
  getCommand(name: string): CommandDefinition | undefined {
    const key = nameKey(name, this.caseSensitive);
    const exact = this.commands.find(command => this.namesOf(command).includes(key));
    if (exact || !(this.options.autoCommandPrefixAliases ?? true)) return exact;

    const candidates = this.commands.filter(command => this.namesOf(command).some(n => n.startsWith(key)));
    return candidates.length === 1 ? candidates[0] : undefined;
  }

  /** args[index]가 커맨드 이름, 그 뒤가 커맨드 인자 */
  parseCommand(args: readonly string[], index = 0): CommandParseResult {
    const { messages } = this.resolved;
    const name = args[index];

    if (name === undefined) {
      return {
        status: 'error',
        error: { category: 'MISSING_COMMAND_NAME', message: messages.missingCommandName() },
      };
    }

    const command = this.getCommand(name);
    if (!command) {
      return {
        status: 'error',
        error: { category: 'UNKNOWN_COMMAND', commandName: name, message: messages.unknownCommand(name) },
      };
    }

    this.resolved.logger.debug(`command '${name}' resolved to '${command.name}'`);
    return withCommand(command, parse(command.arguments, args.slice(index + 1), this.options));
  }

  private get caseSensitive(): boolean {
    return this.options.commandNameCaseSensitive ?? false;
  }

  private namesOf(command: CommandDefinition): string[] {
    return [command.name, ...(command.aliases ?? [])].map(n => nameKey(n, this.caseSensitive));
  }

  private hasName(commands: readonly CommandDefinition[], name: string): boolean {
    const key = nameKey(name, this.caseSensitive);
    return commands.some(command => this.namesOf(command).includes(key));
  }

  /** 파싱 후 실행. 에러/취소면 1 */
  async runCommand(args: readonly string[], index = 0): Promise<number> {
    const result = this.parseCommand(args, index);

    switch (result.status) {
      case 'error':
        this.resolved.logger.error(formatParseError(result.error));
        return 1;
      case 'cancelled':
        this.resolved.logger.debug(`command '${result.command.name}' cancelled by '${result.argumentName}'`);
        return 1;
      case 'success': {
        const code = await result.command.run(result.value, result.context);
        return typeof code === 'number' ? code : 0;
      }
    }
  }
}

function withCommand(command: CommandDefinition, result: ParseResult<unknown>): CommandParseResult {
  switch (result.status) {
    case 'error':
      return { ...result, command };
    case 'cancelled':
      return { ...result, command };
    case 'success':
      return {
        status: 'success',
        command,
        value: result.value,
        context: { remainingArguments: result.remainingArguments, provenance: result.provenance },
        ...(result.cancelledBy !== undefined ? { cancelledBy: result.cancelledBy } : {}),
      };
  }
}

/** 커맨드 목록(또는 만들어 둔 manager)으로 바로 실행 */
export function runCommand(
  commands: readonly CommandDefinition[] | CommandManager,
  args: readonly string[],
  options?: CommandOptions,
): Promise<number> {
  const manager = commands instanceof CommandManager ? commands : new CommandManager(commands, options);
  return manager.runCommand(args);
}

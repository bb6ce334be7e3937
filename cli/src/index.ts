#!/usr/bin/env node
/**
 * clargs CLI 진입점
 *
 * 사용법:
 *   clargs init [file] [--force]             스키마 템플릿 생성
 *   clargs check <schema> [options] -- ...   스키마로 인자 파싱, 결과 JSON 출력
 *   clargs version                           버전
 *   clargs help                              도움말
 *
 * CLI 자신의 명령줄도 @clargs/core로 파싱한다 (long/short 모드, dash-case 이름).
 */

import { CommandManager, formatParseError, type CommandDefinition } from '@clargs/core';
import { checkCommand } from './commands/check.js';
import { initCommand } from './commands/init.js';
import { log } from './logger.js';

const VERSION = '0.1.0';

const HELP = `
clargs v${VERSION}: 선언형 명령줄 인자 파서

사용법:
  clargs <command> [options]

커맨드:
  init      clargs.schema.yml 템플릿 생성
  check     스키마 파일로 인자 목록 파싱
  version   버전 출력
  help      도움말 출력

옵션 (check):
  --mode <mode>         파싱 모드 override (default | long-short)
  --culture <tag>       값 변환 culture (예: de-DE)
  --case-sensitive      이름 대소문자 구분
  -c, --config <path>   clargs.config.yml 경로
  -p, --pretty          JSON 들여쓰기
  --                    이후 토큰은 모두 스키마로 파싱할 인자

옵션 (init):
  -f, --force           이미 있으면 덮어쓰기

예시:
  clargs init
  clargs check clargs.schema.yml -p -- ./a.txt ./b.txt --overwrite
  clargs check deploy.yml --mode default -- -Target prod -Verbose
`.trim();

const COMMANDS: CommandDefinition[] = [checkCommand, initCommand];

// version 커맨드는 CommandManager가 자동으로 추가
const manager = new CommandManager(COMMANDS, {
  applicationName: 'clargs',
  applicationVersion: `v${VERSION}`,
  mode: 'long-short',
  nameTransform: 'dash-case',
  prefixTermination: 'cancel-with-success',
  logger: log,
});

async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const [command] = argv;
  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    log.plain(HELP);
    return 0;
  }

  const result = manager.parseCommand(argv);
  switch (result.status) {
    case 'error':
      log.error(formatParseError(result.error));
      log.dim('clargs help 로 사용법 확인');
      return 1;

    case 'cancelled':
      log.plain(HELP);
      return 0;

    case 'success': {
      const code = await result.command.run(result.value, result.context);
      return typeof code === 'number' ? code : 0;
    }
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    const msg = err instanceof Error ? err.message : String(err);
    log.error(`예상치 못한 오류: ${msg}`);
    if (process.env['CLARGS_DEBUG']) {
      console.error(err);
    }
    process.exitCode = 1;
  });

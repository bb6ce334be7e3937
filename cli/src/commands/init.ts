/**
 * cli/src/commands/init.ts
 * clargs init [file] [--force]: 인자 스키마 템플릿 생성
 *
 * 이미 존재하면 경고 후 종료 (--force 로 덮어쓰기 가능)
 */

import fs from 'node:fs';
import path from 'node:path';
import { defineArguments, defineCommand } from '@clargs/core';
import { log } from '../logger.js';
import { flagValue, requiredString } from '../values.js';

export const SCHEMA_FILENAME = 'clargs.schema.yml';

export const TEMPLATE = `# clargs 인자 스키마
# clargs check ${SCHEMA_FILENAME} -- <인자...> 로 파싱 결과 확인

name: copy
description: 파일 복사

options:
  mode: long-short            # default | long-short
  nameTransform: dash-case    # none | PascalCase | camelCase | dash-case | snake_case
  culture: en-US

# 생성자 파라미터: 앞쪽 positional 인자 (기본 필수)
parameters:
  - member: source
    description: 원본 경로
  - member: destination
    description: 대상 경로

arguments:
  - member: overwrite
    type: boolean
    shortName: true
  - member: retries
    type: integer
    defaultValue: 3
    validators:
      range: { min: 0, max: 10 }
  - member: exclude
    collection: array
    multiValueSeparator: ","
  - member: mode
    type: { enum: [fast, safe] }
    cancelParsing: none
`;

export interface InitArguments {
  file: string;
  force: boolean;
}

export const initArguments = defineArguments(
  {
    arguments: [
      { member: 'file', position: 0, defaultValue: SCHEMA_FILENAME, description: '생성할 파일 경로' },
      { member: 'force', type: 'boolean', shortName: true, description: '이미 있으면 덮어쓰기' },
    ],
  },
  (values): InitArguments => ({
    file: requiredString(values, 'file'),
    force: flagValue(values, 'force'),
  }),
);

export function runInit(options: { file: string; force?: boolean; cwd?: string }): number {
  const cwd = options.cwd ?? process.cwd();
  const schemaPath = path.resolve(cwd, options.file);

  if (fs.existsSync(schemaPath) && !options.force) {
    log.warn(`${options.file} 이미 존재합니다. --force 옵션으로 덮어쓰기 가능`);
    return 1;
  }

  fs.writeFileSync(schemaPath, TEMPLATE, 'utf-8');
  log.success(`${options.file} 생성 완료`);

  console.log('');
  log.info('다음 단계:');
  log.step(`1. ${options.file}의 parameters / arguments 수정`);
  log.step(`2. clargs check ${options.file} -- ./a.txt ./b.txt --overwrite 실행`);
  return 0;
}

export const initCommand = defineCommand({
  name: 'init',
  description: `${SCHEMA_FILENAME} 템플릿 생성`,
  arguments: initArguments,
  run: args => runInit({ file: args.file, force: args.force }),
});

/**
 * cli/src/logger.ts
 * CLI 전용 출력 유틸 (@clargs/core의 Logger로도 쓴다)
 */

import type { Logger, ValueProvenance } from '@clargs/core';

const RESET = '\x1b[0m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const CYAN = '\x1b[36m';
const DIM = '\x1b[2m';

export const log = {
  success: (msg: string) => console.log(`${GREEN}✅${RESET} ${msg}`),
  warn: (msg: string) => console.warn(`${YELLOW}⚠️${RESET}  ${msg}`),
  error: (msg: string) => console.error(`${RED}❌${RESET} ${msg}`),
  info: (msg: string) => console.log(`${CYAN}ℹ️${RESET}  ${msg}`),
  debug: (msg: string) => {
    if (process.env['CLARGS_DEBUG'] === 'true') console.log(`${DIM}[debug] ${msg}${RESET}`);
  },
  step: (msg: string) => console.log(`   ${DIM}→${RESET} ${msg}`),
  dim: (msg: string) => console.log(`${DIM}${msg}${RESET}`),
  plain: (msg: string) => console.log(msg),
} satisfies Logger & {
  step(msg: string): void;
  dim(msg: string): void;
  plain(msg: string): void;
};

/**
 * 값 출처 요약
 *
 * 지정: 3 | 기본값: 2 | 미지정: 1
 */
export function summarizeProvenance(provenance: Record<string, ValueProvenance>): string {
  const count = (kind: ValueProvenance) => Object.values(provenance).filter(p => p === kind).length;
  return [
    `${GREEN}지정: ${count('supplied')}${RESET}`,
    `${YELLOW}기본값: ${count('default')}${RESET}`,
    `미지정: ${count('unset')}`,
  ].join(' | ');
}

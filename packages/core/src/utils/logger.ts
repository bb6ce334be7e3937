/**
 * 콘솔 로거
 * 로그 레벨: info / success / warn / error / debug
 *
 * ParseOptions.logger로 교체 가능. 라이브러리 내부는 전역 logger를 직접 쓰지 않고
 * 항상 options.logger를 거친다.
 */

// ANSI 색상 코드
const C = {
  reset:  '\x1b[0m',
  blue:   '\x1b[34m',
  green:  '\x1b[32m',
  yellow: '\x1b[33m',
  red:    '\x1b[31m',
  gray:   '\x1b[90m',
} as const;

export interface Logger {
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
  debug(msg: string): void;
}

function isDebug(): boolean {
  return process.env['CLARGS_DEBUG'] === 'true' || process.env['DEBUG'] === 'clargs';
}

function format(prefix: string, color: string, msg: string): string {
  return `${color}${prefix}${C.reset} ${msg}`;
}

export const logger: Logger = {
  info(msg: string): void {
    console.log(format('ℹ', C.blue, msg));
  },

  success(msg: string): void {
    console.log(format('✔', C.green, msg));
  },

  warn(msg: string): void {
    console.warn(format('⚠', C.yellow, msg));
  },

  error(msg: string, err?: unknown): void {
    console.error(format('✖', C.red, msg));
    if (err instanceof Error) {
      console.error(`${C.gray}   ${err.message}${C.reset}`);
      if (isDebug() && err.stack) {
        console.error(`${C.gray}${err.stack}${C.reset}`);
      }
    } else if (err !== undefined) {
      console.error(`${C.gray}   ${String(err)}${C.reset}`);
    }
  },

  debug(msg: string): void {
    if (isDebug()) {
      console.log(format('[debug]', C.gray, msg));
    }
  },
};

/** 아무것도 출력하지 않는 로거 (테스트, 임베딩용) */
export const silentLogger: Logger = {
  info: () => undefined,
  success: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

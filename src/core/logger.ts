/**
 * Logger - 레벨/출처 태그가 붙는 간단한 로거
 *
 * stdout 은 테이블과 스크립트 출력 전용이므로 모든 로그는 stderr(console.error)로 나갑니다.
 * 레벨은 SEQPLOT_LOG 환경 변수로 정합니다. (기본: warn)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * 문자열이 로그 레벨인지 확인
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

class Logger {
  private level: LogLevel;

  constructor(level: LogLevel) {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  write(level: Exclude<LogLevel, 'silent'>, source: string, message: string, data?: unknown): void {
    if (!this.isEnabled(level)) return;

    const line = `[${level.toUpperCase()}] ${source}: ${message}`;
    if (data === undefined) {
      console.error(line);
    } else {
      console.error(line, data);
    }
  }
}

/**
 * 출처가 고정된 로거
 */
export interface ScopedLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

function levelFromEnv(): LogLevel {
  const raw = process.env['SEQPLOT_LOG']?.toLowerCase();
  return raw !== undefined && isLogLevel(raw) ? raw : 'warn';
}

export const logger = new Logger(levelFromEnv());

/**
 * 모듈별 로거 생성
 *
 * @example
 * const log = createLogger('CachedPipeline');
 * log.info('cache hit', { key: 'id1000' });
 */
export function createLogger(source: string): ScopedLogger {
  return {
    debug: (message, data) => logger.write('debug', source, message, data),
    info: (message, data) => logger.write('info', source, message, data),
    warn: (message, data) => logger.write('warn', source, message, data),
    error: (message, data) => logger.write('error', source, message, data),
  };
}

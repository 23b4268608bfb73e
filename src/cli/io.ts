/**
 * CLI 공용 입출력
 *
 * 명령은 process 를 직접 만지지 않고 CliIO 를 받습니다. 테스트는 메모리 싱크를 넘깁니다.
 */

import { describeError } from '../core/errors';
import type { OutputSink } from '../processor/dump/OutputDumper';
import type { Renderer } from '../render/GnuplotRenderer';

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_USAGE = 2;

export interface CliIO {
  readonly stdout: OutputSink;
  readonly stderr: OutputSink;
  readonly env: NodeJS.ProcessEnv;
  readonly cwd: string;

  /** stdin 읽기 (없으면 process.stdin) */
  readonly readStdin?: () => Promise<string>;

  /** 렌더러 교체 (없으면 gnuplot 실행) */
  readonly renderer?: Renderer;
}

/**
 * 잘못된 명령행
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * node:util parseArgs 가 던지는 에러인지
 */
export function isArgumentError(error: unknown): error is Error {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('ERR_PARSE_ARGS_')
  );
}

/**
 * `--header true|false` 값 해석
 */
export function parseBooleanFlag(name: string, value: string): boolean {
  switch (value.toLowerCase()) {
    case 'true':
    case 'yes':
    case '1':
      return true;
    case 'false':
    case 'no':
    case '0':
      return false;
    default:
      throw new UsageError(`--${name} expects true or false, got '${value}'`);
  }
}

/**
 * 에러를 stderr 에 쓰고 종료 코드 반환
 */
export function reportError(error: unknown, io: CliIO, usage: string): number {
  if (error instanceof UsageError || isArgumentError(error)) {
    io.stderr.write(`Error: ${error.message}\n\n${usage}\n`);
    return EXIT_USAGE;
  }

  const [first = 'unknown error', ...causes] = describeError(error);
  io.stderr.write(`Error: ${first}\n`);
  for (const cause of causes) {
    io.stderr.write(`  caused by: ${cause}\n`);
  }
  return EXIT_ERROR;
}

/**
 * 실제 프로세스에 연결된 CliIO
 */
export function processIO(): CliIO {
  return {
    stdout: { write: text => void process.stdout.write(text) },
    stderr: { write: text => void process.stderr.write(text) },
    env: process.env,
    cwd: process.cwd(),
  };
}

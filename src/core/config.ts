/**
 * 실행 설정
 *
 * 기본값 ← 환경 변수 ← CLI 옵션 순서로 덮어씁니다.
 *
 * 환경 변수:
 * - SEQPLOT_LOG     : 로그 레벨 (debug | info | warn | error | silent)
 * - SEQPLOT_GNUPLOT : gnuplot 실행 파일 경로
 */

import type { PlotAppearance } from '../types';
import type { LogLevel } from './logger';
import { isLogLevel } from './logger';

export type RunMode = 'plot' | 'dump' | 'dry-run';

export type InputFormat = 'csv' | 'lineage';

export const RUN_MODES: readonly RunMode[] = ['plot', 'dump', 'dry-run'];

export const INPUT_FORMATS: readonly InputFormat[] = ['csv', 'lineage'];

export interface RunConfig {
  /** 입력 경로 (`-` 는 stdin, lineage 형식이면 계보가 있는 디렉터리) */
  input: string;

  /** 연산자 시퀀스 */
  opseq: string;

  /** x 선택자 */
  x: string;

  /** y 선택자 */
  y: string;

  /** 입력 첫 행이 헤더인지 */
  hasHeader: boolean;

  format: InputFormat;

  mode: RunMode;

  /** 캐시, 계보, 플롯 데이터 파일을 쓰는 디렉터리 */
  outdir: string;

  /** `plot` 앞에 넣을 gnuplot 명령 줄 */
  gnuplotLines: string[];

  terminal: string;

  /** 레이블, 범위, 눈금 같은 플롯 모양 */
  appearance: PlotAppearance;

  /** O 출력에 헤더 행을 쓸지 */
  headerOut: boolean;

  /** 캐시 재사용 여부 */
  useCache: boolean;

  gnuplotBinary: string;

  logLevel: LogLevel;
}

export const DEFAULT_RUN_CONFIG: Readonly<RunConfig> = {
  input: '-',
  opseq: '',
  x: '$1',
  y: '$2',
  hasHeader: false,
  format: 'csv',
  mode: 'plot',
  outdir: '.',
  gnuplotLines: [],
  terminal: 'dumb',
  appearance: {},
  headerOut: true,
  useCache: true,
  gnuplotBinary: 'gnuplot',
  logLevel: 'warn',
};

/**
 * 환경 변수에서 읽은 설정
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Partial<RunConfig> {
  const config: Partial<RunConfig> = {};

  const level = env['SEQPLOT_LOG']?.toLowerCase();
  if (level !== undefined && isLogLevel(level)) {
    config.logLevel = level;
  }

  const binary = env['SEQPLOT_GNUPLOT'];
  if (binary !== undefined && binary !== '') {
    config.gnuplotBinary = binary;
  }

  return config;
}

/**
 * 최종 설정
 */
export function resolveRunConfig(
  overrides: Partial<RunConfig>,
  env: NodeJS.ProcessEnv = process.env
): RunConfig {
  return {
    ...DEFAULT_RUN_CONFIG,
    gnuplotLines: [...DEFAULT_RUN_CONFIG.gnuplotLines],
    ...configFromEnv(env),
    ...overrides,
  };
}

export function isRunMode(value: string): value is RunMode {
  return RUN_MODES.some(mode => mode === value);
}

export function isInputFormat(value: string): value is InputFormat {
  return INPUT_FORMATS.some(format => format === value);
}

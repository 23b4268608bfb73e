/**
 * 플롯 타입 정의
 *
 * gnuplot 스크립트 템플릿에 들어가는 설정입니다.
 */

/**
 * 데이터 시리즈를 그리는 방식
 */
export type PlotType = 'points' | 'lines' | 'linespoints';

/**
 * 시리즈가 사용할 축 (x1/x2, y1/y2)
 *
 * @example
 * { x: 1, y: 2 } // x1y2
 */
export interface AxisPair {
  readonly x: 1 | 2;
  readonly y: 1 | 2;
}

/**
 * 스크립트 설정이 가리키는 축
 */
export type AxisId = 'x' | 'y' | 'x2' | 'y2';

/**
 * 축 값 범위 `[start:end]`
 */
export interface AxisRange {
  readonly start: number;
  readonly end: number;
}

/**
 * 눈금 간격 (start/end 가 있으면 그 구간에만)
 */
export interface AxisTics {
  readonly step: number;
  readonly start?: number;
  readonly end?: number;
}

/**
 * 캔버스 대비 플롯 크기
 */
export interface PlotSize {
  readonly width: number;
  readonly height: number;
}

/**
 * 데이터 시리즈 하나의 플롯 옵션
 */
export interface SeriesOptions {
  /** 2컬럼 CSV 데이터 파일 경로 */
  readonly dataPath: string;

  /** 그리기 방식 (기본: points) */
  readonly plotType?: PlotType;

  /** 축 (기본: x1y1) */
  readonly axis?: AxisPair;

  /** 범례 제목 (없으면 컬럼 헤더 사용) */
  readonly title?: string;

  /** `plot` 줄 끝에 덧붙이는 추가 옵션 */
  readonly extra?: string;
}

/**
 * 템플릿 전체 설정
 */
export interface PlotTemplateOptions {
  /** gnuplot terminal 설정 (기본: dumb) */
  readonly terminal?: string;

  /** `plot` 직전에 넣는 사용자 명령 줄 */
  readonly customLines?: readonly string[];

  /** 출력 파일 (`set output`), 없으면 terminal 기본 출력 */
  readonly output?: string;

  /** 범례 위치 (기본: top right) */
  readonly keyPosition?: string;

  /** 격자 표시 */
  readonly grid?: boolean;

  /** 기본: 1,1 */
  readonly size?: PlotSize;

  /** 축별 레이블 */
  readonly labels?: Partial<Record<AxisId, string>>;

  /** 로그 스케일 축 */
  readonly logScale?: readonly AxisId[];

  readonly ranges?: Partial<Record<AxisId, AxisRange>>;

  readonly tics?: Partial<Record<AxisId, AxisTics>>;

  /** 그릴 시리즈 (호출자 순서 유지) */
  readonly series: readonly SeriesOptions[];
}

/**
 * 명령행에서 정하는 플롯 모양 (terminal, 사용자 명령, 시리즈 제외)
 */
export type PlotAppearance = Omit<PlotTemplateOptions, 'series' | 'terminal' | 'customLines'>;

/**
 * 다중 시리즈 실행에서 시리즈 하나의 요청
 */
export interface SeriesSpec {
  /** 입력 CSV 경로 (`-` 는 stdin) */
  readonly file: string;

  readonly x: string;

  readonly y: string;

  /** 연산자 시퀀스 (P 는 쓸 수 없음) */
  readonly opseq: string;

  readonly title?: string;

  /** `plot` 줄에 덧붙일 스타일 */
  readonly style?: string;

  readonly plotType: PlotType;

  readonly axis: AxisPair;
}

/**
 * CachedPipeline - 캐시 재사용이 있는 실행기
 *
 * 실행 순서:
 * 1. 계보가 있고 캐시를 쓰도록 설정되어 있으면 CacheResolver 로 재사용 지점을 찾는다
 * 2. 찾으면 캐시 테이블을, 못 찾으면 원본 테이블을 시작점으로 삼는다
 * 3. DataPipeline 으로 남은 연산자를 실행한다
 *
 * 원본은 캐시를 놓쳤을 때만 읽습니다.
 */

import type { LineageRef, Operator } from '../../types';
import type { XYTable } from '../../core/XYTable';
import { createLogger } from '../../core/logger';
import type { CacheStore } from '../cache/CacheStore';
import { CacheResolver } from '../cache/CacheResolver';
import { DataPipeline } from './DataPipeline';
import type { PipelineOptions, PipelineResult, PipelineStart } from './Transformer';
import type { StepFactory } from './TransformerFactory';

const log = createLogger('CachedPipeline');

// =============================================================================
// 타입
// =============================================================================

/**
 * 실행 입력
 */
export interface PipelineSource {
  /** 계보 (없으면 캐시를 읽지도 쓰지도 않음) */
  readonly lineage: LineageRef | null;

  /** 원본 테이블 읽기 (캐시를 놓쳤을 때만 호출) */
  load(): Promise<XYTable>;
}

export interface CachedPipelineOptions extends PipelineOptions {
  /** 캐시 저장소 (없으면 항상 원본에서 시작) */
  store?: CacheStore | null;

  /** false 면 재사용 지점을 찾지 않음 (기록은 그대로) */
  useCache?: boolean;
}

export interface CacheStats {
  hits: number;
  misses: number;
  /** 캐시 덕분에 건너뛴 연산자 수 합계 */
  skippedOperators: number;
}

// =============================================================================
// CachedPipeline 클래스
// =============================================================================

export class CachedPipeline {
  private readonly factory: StepFactory;

  private readonly options: CachedPipelineOptions;

  /** 캐시 통계 */
  private stats: CacheStats = {
    hits: 0,
    misses: 0,
    skippedOperators: 0,
  };

  constructor(factory: StepFactory, options: CachedPipelineOptions = {}) {
    this.factory = factory;
    this.options = {
      debug: false,
      store: null,
      useCache: true,
      ...options,
    };
  }

  /**
   * 연산자 시퀀스 실행
   */
  async execute(operators: readonly Operator[], source: PipelineSource): Promise<PipelineResult> {
    const pipeline = DataPipeline.fromOperators(operators, this.factory, { debug: this.options.debug });
    pipeline.resolve(await this.startFor(operators, source));
    return pipeline.run();
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = { hits: 0, misses: 0, skippedOperators: 0 };
  }

  // ==========================================================================
  // 시작점 결정
  // ==========================================================================

  private async startFor(operators: readonly Operator[], source: PipelineSource): Promise<PipelineStart> {
    const { store, useCache } = this.options;
    const lineage = source.lineage;

    if (store && useCache && lineage !== null) {
      const resolution = await new CacheResolver(store).resolve(operators, lineage);
      if (resolution !== null) {
        this.stats.hits++;
        this.stats.skippedOperators += resolution.skip;
        return {
          table: await store.load(resolution.entry),
          skip: resolution.skip,
          resolvedKey: resolution.entry.key,
          lineage,
        };
      }
      this.stats.misses++;
    } else if (lineage === null) {
      log.debug('input has no lineage, starting from the source table');
    }

    return { table: await source.load(), skip: 0, resolvedKey: null, lineage };
  }
}

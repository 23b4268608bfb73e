/**
 * 변환 연산자 테스트
 *
 * 연산자마다 값, 컬럼 이름, 실패 조건을 확인합니다.
 */

import { describe, it, expect } from 'vitest';
import { XYTable } from '../../../src/core/XYTable';
import { DuplicateKeyError, NonFiniteValueError } from '../../../src/core/errors';
import { AverageTransformer } from '../../../src/processor/pipeline/AverageTransformer';
import { CdfTransformer } from '../../../src/processor/pipeline/CdfTransformer';
import { DerivativeTransformer } from '../../../src/processor/pipeline/DerivativeTransformer';
import { FilterTransformer } from '../../../src/processor/pipeline/FilterTransformer';
import { IntegralTransformer } from '../../../src/processor/pipeline/IntegralTransformer';
import { MergeTransformer } from '../../../src/processor/pipeline/MergeTransformer';
import { RotateTransformer } from '../../../src/processor/pipeline/RotateTransformer';
import { SortTransformer } from '../../../src/processor/pipeline/SortTransformer';
import { StepTransformer } from '../../../src/processor/pipeline/StepTransformer';
import { UniqueTransformer } from '../../../src/processor/pipeline/UniqueTransformer';
import { xy } from '../../fixtures/tables';

describe('Transformers', () => {
  // ===========================================================================
  // o: 정렬
  // ===========================================================================

  describe('SortTransformer (o)', () => {
    const sort = new SortTransformer();

    it('x 오름차순 안정 정렬', () => {
      const result = sort.transform(xy([3, 1], [1, 2], [2, 3], [1, 4]));

      expect(result.rows()).toEqual([[1, 2], [1, 4], [2, 3], [3, 1]]);
      expect(result.names).toEqual({ x: 'x', y: 'y' });
    });

    it('두 번 적용해도 같음', () => {
      const once = sort.transform(xy([5, 1], [2, 2], [5, 3], [-1, 4]));
      expect(sort.transform(once).equals(once)).toBe(true);
    });

    it('입력 테이블은 그대로', () => {
      const input = xy([2, 1], [1, 2]);
      sort.transform(input);
      expect(input.rows()).toEqual([[2, 1], [1, 2]]);
    });

    it('유한하지 않은 x 는 실패', () => {
      expect(() => sort.transform(xy([1, 1], [Infinity, 2]))).toThrow(NonFiniteValueError);
    });
  });

  // ===========================================================================
  // c: 누적 분포
  // ===========================================================================

  describe('CdfTransformer (c)', () => {
    const cdf = new CdfTransformer();

    it('y 정렬 후 순위/개수', () => {
      const input = XYTable.fromRows([[10, 3], [20, 1], [30, 2]], { x: 't', y: 'v' });
      const result = cdf.transform(input);

      expect(result.rows()).toEqual([[1, 1 / 3], [2, 2 / 3], [3, 1]]);
      expect(result.names).toEqual({ x: 'v', y: 'CDF' });
    });

    it('y 는 감소하지 않고 1.0 에서 끝남', () => {
      const result = cdf.transform(xy([1, 5], [2, -1], [3, 5], [4, 0], [5, 2]));

      for (let i = 1; i < result.rowCount; i++) {
        expect(result.ys[i]).toBeGreaterThanOrEqual(result.ys[i - 1]);
      }
      expect(result.ys[result.rowCount - 1]).toBe(1);
    });

    it('빈 테이블은 빈 결과', () => {
      expect(cdf.transform(xy()).rowCount).toBe(0);
    });

    it('유한하지 않은 y 는 실패', () => {
      expect(() => cdf.transform(xy([1, NaN]))).toThrow(NonFiniteValueError);
    });
  });

  // ===========================================================================
  // d: 미분
  // ===========================================================================

  describe('DerivativeTransformer (d)', () => {
    it('윈도우 (0, 0) 은 이웃 기울기', () => {
      const result = new DerivativeTransformer().transform(xy([0, 0], [1, 2], [2, 6], [4, 10]));

      expect(result.rows()).toEqual([[1, 2], [2, 4], [4, 2]]);
      expect(result.names).toEqual({ x: 'x', y: 'y:Derivation' });
    });

    it('정렬되지 않은 입력도 x 순서로 계산', () => {
      const result = new DerivativeTransformer().transform(xy([4, 10], [0, 0], [2, 6], [1, 2]));
      expect(result.rows()).toEqual([[1, 2], [2, 4], [4, 2]]);
    });

    it('윈도우 폭만큼 나아갈 때마다 기준점 이동', () => {
      const result = new DerivativeTransformer({ left: 1, right: 1 }).transform(
        xy([0, 0], [1, 2], [2, 6], [4, 10])
      );

      expect(result.rows()).toEqual([[2, 3], [4, 2]]);
      expect(result.names.y).toBe('y:Derivation(1,1)');
    });

    it('0 이 아닌 윈도우는 이름에 표시', () => {
      const result = new DerivativeTransformer({ left: 1.5, right: 0 }).transform(xy([0, 0], [2, 1]));
      expect(result.names.y).toBe('y:Derivation(1.5,0)');
    });

    it('중복 x 는 DuplicateKeyError', () => {
      const derive = new DerivativeTransformer();
      expect(() => derive.transform(xy([1, 1], [2, 2], [1, 3]))).toThrow(DuplicateKeyError);
      expect(() => derive.transform(xy([1, 1], [2, 2], [1, 3]))).toThrow(
        'Derivation: x column contains duplicated value 1'
      );
    });

    it('기울기가 넘치면 NonFiniteValueError', () => {
      expect(() => new DerivativeTransformer().transform(xy([0, -1.7e308], [1, 1.7e308]))).toThrow(
        'Derivation: non-finite y value at row 0'
      );
    });

    it('빈 테이블은 빈 결과', () => {
      const result = new DerivativeTransformer().transform(xy());
      expect(result.rowCount).toBe(0);
      expect(result.names.y).toBe('y:Derivation');
    });
  });

  // ===========================================================================
  // i: 적분
  // ===========================================================================

  describe('IntegralTransformer (i)', () => {
    const integrate = new IntegralTransformer();

    it('오른쪽 끝점 누적합', () => {
      const result = integrate.transform(xy([0, 5], [1, 2], [3, 4]));

      expect(result.rows()).toEqual([[0, 0], [1, 2], [3, 10]]);
      expect(result.names).toEqual({ x: 'x', y: 'y:Integral' });
    });

    it('적분 후 미분하면 첫 점을 뺀 y 복원', () => {
      const input = xy([0, 5], [1, 2], [3, 4], [6, -1]);
      const restored = new DerivativeTransformer().transform(integrate.transform(input));

      expect(restored.xs).toEqual([1, 3, 6]);
      expect(restored.ys).toEqual([2, 4, -1]);
    });

    it('중복 x 는 DuplicateKeyError', () => {
      expect(() => integrate.transform(xy([1, 1], [1, 2]))).toThrow(DuplicateKeyError);
    });

    it('누적합이 넘치면 NonFiniteValueError', () => {
      expect(() => integrate.transform(xy([0, 1], [1, 1.7e308], [3, 1.7e308]))).toThrow(
        'Integral: non-finite y value at row 2'
      );
    });
  });

  // ===========================================================================
  // m: 병합
  // ===========================================================================

  describe('MergeTransformer (m)', () => {
    it('연속된 같은 x 만 합침', () => {
      const result = new MergeTransformer().transform(xy([1, 2], [1, 3], [2, 4], [1, 2]));

      expect(result.rows()).toEqual([[1, 5], [2, 4], [1, 2]]);
      expect(result.names.y).toBe('y:Merge');
    });

    it('합이 넘치면 NonFiniteValueError', () => {
      expect(() => new MergeTransformer().transform(xy([1, 1.7e308], [1, 1.7e308]))).toThrow(
        'Merge: non-finite y value at row 0'
      );
    });
  });

  // ===========================================================================
  // s: 차분
  // ===========================================================================

  describe('StepTransformer (s)', () => {
    const step = new StepTransformer();

    it('이전 행과의 y 차이', () => {
      const result = step.transform(xy([1, 1], [2, 4], [3, 9]));

      expect(result.rows()).toEqual([[2, 3], [3, 5]]);
      expect(result.names.y).toBe('y:Step');
    });

    it('한 행이면 빈 결과', () => {
      expect(step.transform(xy([1, 1])).rowCount).toBe(0);
    });

    it('차이가 넘치면 NonFiniteValueError', () => {
      expect(() => step.transform(xy([1, -1.7e308], [2, 1.7e308]))).toThrow(NonFiniteValueError);
      expect(() => step.transform(xy([1, -1.7e308], [2, 1.7e308]))).toThrow('Step: non-finite y value at row 0');
    });
  });

  // ===========================================================================
  // a: 이동 평균
  // ===========================================================================

  describe('AverageTransformer (a)', () => {
    it('[x - left, x + right] 구간 평균', () => {
      const result = new AverageTransformer({ left: 1, right: 1 }).transform(
        xy([0, 1], [1, 2], [2, 3], [3, 4])
      );

      expect(result.rows()).toEqual([[0, 1.5], [1, 2], [2, 3], [3, 3.5]]);
      expect(result.names.y).toBe('y:Average');
    });

    it('입력 순서와 행 수 유지', () => {
      const result = new AverageTransformer({ left: 0, right: 1 }).transform(
        xy([2, 30], [0, 10], [1, 20])
      );
      expect(result.rows()).toEqual([[2, 30], [0, 15], [1, 25]]);
    });

    it('윈도우 (0, 0) 은 같은 x 끼리 평균', () => {
      const result = new AverageTransformer().transform(xy([1, 2], [2, 7], [1, 4]));
      expect(result.rows()).toEqual([[1, 3], [2, 7], [1, 3]]);
    });

    it('유한하지 않은 결과는 실패', () => {
      expect(() => new AverageTransformer().transform(xy([1, 1], [2, Infinity]))).toThrow(
        NonFiniteValueError
      );
    });

    it('큰 값 옆의 작은 값을 잃지 않음', () => {
      const result = new AverageTransformer().transform(xy([1, 1e17], [2, 1], [3, 1]));
      expect(result.ys).toEqual([1e17, 1, 1]);
    });

    it('구간 안에서 상쇄되는 큰 값', () => {
      const result = new AverageTransformer({ left: 0, right: 2 }).transform(xy([0, 1e17], [1, 1], [2, -1e17]));
      expect(result.ys[0]).toBe(1 / 3);
    });

    it('유한한 값의 평균은 합이 넘쳐도 유한', () => {
      const single = new AverageTransformer().transform(xy([1, 1.7e308], [2, 1.7e308], [3, 1]));
      expect(single.ys).toEqual([1.7e308, 1.7e308, 1]);

      const pair = new AverageTransformer({ left: 0, right: 1 }).transform(xy([0, 1.7e308], [1, 1.7e308]));
      expect(pair.ys).toEqual([1.7e308, 1.7e308]);
    });
  });

  // ===========================================================================
  // f: 유한값 필터
  // ===========================================================================

  describe('FilterTransformer (f)', () => {
    it('y 가 Infinity 또는 NaN 인 행 제거', () => {
      const result = new FilterTransformer().transform(
        xy([1, 1], [2, NaN], [3, Infinity], [4, -Infinity], [5, 5])
      );

      expect(result.rows()).toEqual([[1, 1], [5, 5]]);
      expect(result.names).toEqual({ x: 'x', y: 'y' });
    });
  });

  // ===========================================================================
  // u: 중복 제거
  // ===========================================================================

  describe('UniqueTransformer (u)', () => {
    it('x 별 첫 행만 원래 순서로', () => {
      const result = new UniqueTransformer().transform(xy([2, 1], [1, 2], [2, 3], [1, 4], [3, 5]));
      expect(result.rows()).toEqual([[2, 1], [1, 2], [3, 5]]);
    });
  });

  // ===========================================================================
  // r: 축 교환
  // ===========================================================================

  describe('RotateTransformer (r)', () => {
    it('x 와 y 를 이름과 함께 교환', () => {
      const input = XYTable.fromRows([[1, 2], [3, 4]], { x: 'a', y: 'b' });
      const result = new RotateTransformer().transform(input);

      expect(result.rows()).toEqual([[2, 1], [4, 3]]);
      expect(result.names).toEqual({ x: 'b', y: 'a' });
    });
  });
});

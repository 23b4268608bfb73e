/**
 * CacheIndex - 캐시 키 토큰 트라이
 *
 * 키를 정규 연산자 토큰(`i`, `d1000`, `c`, ...) 단위로 나눠 트라이에 넣습니다.
 * 연산자 경계에서만 일치하므로 `d1` 은 `d10` 의 프리픽스가 아닙니다.
 *
 * 같은 키가 여러 번 기록되었으면 순번이 가장 큰 엔트리가 노드를 차지합니다.
 * 빈 키는 넣지 않으므로 어떤 요청과도 일치하지 않습니다.
 */

import type { CacheEntryMeta } from '../../types';
import { tokenizeKey } from '../parser/OperatorParser';

interface TrieNode {
  readonly children: Map<string, TrieNode>;
  entry: CacheEntryMeta | null;
}

/**
 * 최장 프리픽스 검색 결과
 */
export interface PrefixMatch {
  readonly entry: CacheEntryMeta;

  /** 일치한 변환 토큰 수 */
  readonly length: number;
}

export class CacheIndex {
  private readonly root: TrieNode = { children: new Map(), entry: null };

  private count = 0;

  /**
   * 엔트리 목록으로 인덱스 생성
   *
   * @throws ParseError 키가 연산자 문법에 맞지 않을 때
   */
  static build(entries: Iterable<CacheEntryMeta>): CacheIndex {
    const index = new CacheIndex();
    for (const entry of entries) {
      index.insert(entry);
    }
    return index;
  }

  /** 키가 있는 노드 수 */
  get size(): number {
    return this.count;
  }

  insert(entry: CacheEntryMeta): void {
    const tokens = tokenizeKey(entry.key);
    if (tokens.length === 0) return;

    let node = this.root;
    for (const token of tokens) {
      let child = node.children.get(token);
      if (!child) {
        child = { children: new Map(), entry: null };
        node.children.set(token, child);
      }
      node = child;
    }

    if (node.entry === null) {
      this.count++;
      node.entry = entry;
    } else if (entry.sequence > node.entry.sequence) {
      node.entry = entry;
    }
  }

  /**
   * 토큰 목록의 가장 긴 프리픽스에 해당하는 엔트리
   */
  longestPrefix(tokens: readonly string[]): PrefixMatch | null {
    let best: PrefixMatch | null = null;
    let node = this.root;

    for (let i = 0; i < tokens.length; i++) {
      const child = node.children.get(tokens[i]);
      if (!child) break;
      node = child;
      if (node.entry !== null) {
        best = { entry: node.entry, length: i + 1 };
      }
    }

    return best;
  }
}

// === src/core/logs/LogFilter.ts ===
import { measure } from '../logging/perf.js';
import type { LineIndex } from './LineIndex.js';
import type { FilterState } from './types.js';

/** 필터 결과: 원래 인덱스 오름차순, [0, n)의 부분열 */
export function visibleIndices(index: LineIndex, filter: FilterState): number[] {
  const out: number[] = [];
  if (filter.mode === 'all') {
    for (let i = 0; i < index.lineCount; i++) out.push(i);
    return out;
  }
  for (let i = 0; i < index.lineCount; i++) {
    if (index.hasLevel(i, filter.level)) out.push(i);
  }
  return out;
}

export function filterKey(filter: FilterState): string {
  return filter.mode === 'all' ? 'all' : `level:${filter.level}`;
}

export interface ILogFilter {
  visible(filter: FilterState): readonly number[];
}

/**
 * 인덱스는 빌드 후 불변이므로 필터 키별 결과를 그대로 캐시한다(무효화 불필요).
 * 같은 필터에 대해 항상 같은 배열 인스턴스를 돌려준다.
 */
export class LogFilter implements ILogFilter {
  private cache = new Map<string, readonly number[]>();

  constructor(private readonly index: LineIndex) {}

  @measure('LogFilter.visible')
  visible(filter: FilterState): readonly number[] {
    const key = filterKey(filter);
    const hit = this.cache.get(key);
    if (hit) return hit;
    const result = Object.freeze(visibleIndices(this.index, filter));
    this.cache.set(key, result);
    return result;
  }
}

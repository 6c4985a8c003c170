// === src/core/logs/LogSearch.ts ===
import { lowerBound } from '../../shared/utils.js';
import { measure } from '../logging/perf.js';
import type { LineIndex } from './LineIndex.js';
import type { SearchState } from './types.js';

export type SearchOptions = {
  caseSensitive: boolean;
};

export interface ILogSearch {
  findMatches(visible: readonly number[], query: string, opts: SearchOptions): number[];
}

export class LogSearch implements ILogSearch {
  constructor(private readonly index: LineIndex) {}

  /** 가시 라인을 순서대로 디코딩해 부분 문자열 포함 여부를 본다. 결과는 가시 위치. */
  @measure('LogSearch.findMatches')
  findMatches(visible: readonly number[], query: string, opts: SearchOptions): number[] {
    const out: number[] = [];
    if (!query) return out;
    const needle = opts.caseSensitive ? query : query.toLowerCase();
    for (let pos = 0; pos < visible.length; pos++) {
      const text = this.index.text(visible[pos]);
      const hay = opts.caseSensitive ? text : text.toLowerCase();
      if (hay.includes(needle)) out.push(pos);
    }
    return out;
  }

  /**
   * 새 검색 상태. 커서는 anchor(가시 위치) 이후 첫 매치, 없으면 처음으로 감는다.
   */
  create(visible: readonly number[], query: string, caseSensitive: boolean, anchor = 0): SearchState {
    const matches = Object.freeze(this.findMatches(visible, query, { caseSensitive }));
    return { query, caseSensitive, matches, cursor: initialCursor(matches, anchor), source: visible };
  }
}

// 편의 함수
export function findMatches(
  visible: readonly number[],
  index: LineIndex,
  query: string,
  opts: SearchOptions = { caseSensitive: true },
): number[] {
  return new LogSearch(index).findMatches(visible, query, opts);
}

export function createSearch(
  visible: readonly number[],
  index: LineIndex,
  query: string,
  caseSensitive: boolean,
  anchor = 0,
): SearchState {
  return new LogSearch(index).create(visible, query, caseSensitive, anchor);
}

export function emptySearch(caseSensitive: boolean, source: readonly number[] = []): SearchState {
  return { query: '', caseSensitive, matches: [], cursor: undefined, source };
}

function initialCursor(matches: readonly number[], anchor: number): number | undefined {
  if (matches.length === 0) return undefined;
  const i = lowerBound(matches, anchor);
  return i < matches.length ? i : 0;
}

/** 다음 매치(마지막 다음은 처음). 매치가 없으면 그대로. */
export function nextMatch(state: SearchState): SearchState {
  const n = state.matches.length;
  if (n === 0) return state;
  const cur = state.cursor ?? -1;
  return { ...state, cursor: (cur + 1) % n };
}

/** 이전 매치(처음 이전은 마지막). 매치가 없으면 그대로. */
export function prevMatch(state: SearchState): SearchState {
  const n = state.matches.length;
  if (n === 0) return state;
  const cur = state.cursor ?? 0;
  return { ...state, cursor: (cur - 1 + n) % n };
}

/** 현재 매치의 가시 위치 */
export function currentMatch(state: SearchState): number | undefined {
  return state.cursor === undefined ? undefined : state.matches[state.cursor];
}

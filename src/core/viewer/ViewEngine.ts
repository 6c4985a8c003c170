// === src/core/viewer/ViewEngine.ts ===
import { DEFAULT_JUMP_ALIGN } from '../../shared/const.js';
import { lowerBound } from '../../shared/utils.js';
import { getLogger } from '../logging/app-logger.js';
import { measure } from '../logging/perf.js';
import type { LineIndex } from '../logs/LineIndex.js';
import { LogFilter } from '../logs/LogFilter.js';
import { currentMatch, emptySearch, LogSearch, nextMatch, prevMatch } from '../logs/LogSearch.js';
import * as nav from '../logs/Navigator.js';
import {
  type FilterState,
  type JumpAlign,
  levelLabel,
  type LogLevel,
  type SearchState,
  SHOW_ALL,
  type ViewState,
} from '../logs/types.js';

/**
 * 엔진 상태. 핸들러마다 새 객체로 교체된다(전역 보관 금지).
 * - Browsing: filter=all, query=''
 * - Filtered: filter=level
 * - Searching: query!=''  (Filtered와 동시에 가능: 인덱스 → 필터 → 검색)
 */
export interface EngineState {
  readonly filter: FilterState;
  readonly visible: readonly number[];
  readonly search: SearchState;
  readonly view: ViewState;
}

export interface WindowRow {
  /** 원래 라인 인덱스 */
  index: number;
  /** 가시 위치 */
  position: number;
  text: string;
  level: LogLevel | null;
  match: boolean;
  currentMatch: boolean;
}

export interface EngineStatus {
  totalLines: number;
  visibleCount: number;
  filter: string;
  query: string;
  caseSensitive: boolean;
  matchCount: number;
  /** 1-based 현재 매치 번호 (없으면 0) */
  matchNumber: number;
  /** 현재 매치의 원래 라인 인덱스 */
  matchLine: number | undefined;
  topLine: number;
  /** 파일 전체 레벨별 라인 수(필터와 무관) */
  levelCounts: Readonly<Record<LogLevel, number>>;
  /** 0..100 */
  percent: number;
}

export type ViewEngineOptions = {
  jumpAlign?: JumpAlign;
};

export class ViewEngine {
  private log = getLogger('ViewEngine');
  private readonly filterEngine: LogFilter;
  private readonly searchEngine: LogSearch;
  private readonly jumpAlign: JumpAlign;
  private readonly levelTotals: Readonly<Record<LogLevel, number>>;

  constructor(
    readonly index: LineIndex,
    opts: ViewEngineOptions = {},
  ) {
    this.filterEngine = new LogFilter(index);
    this.searchEngine = new LogSearch(index);
    this.jumpAlign = opts.jumpAlign ?? DEFAULT_JUMP_ALIGN;
    this.levelTotals = Object.freeze(index.levelCounts());
  }

  initialState(viewportHeight: number, caseSensitive: boolean): EngineState {
    const visible = this.filterEngine.visible(SHOW_ALL);
    return {
      filter: SHOW_ALL,
      visible,
      search: emptySearch(caseSensitive, visible),
      view: nav.resize({ topLine: 0, viewportHeight: 0 }, viewportHeight, visible.length),
    };
  }

  // ── 스크롤 ─────────────────────────────────────────────────────
  scroll(s: EngineState, delta: number): EngineState {
    return this.withView(s, nav.scroll(s.view, delta, s.visible.length));
  }

  scrollPage(s: EngineState, pages: number): EngineState {
    return this.withView(s, nav.scrollPage(s.view, pages, s.visible.length));
  }

  scrollToTop(s: EngineState): EngineState {
    return this.withView(s, nav.scrollToTop(s.view));
  }

  scrollToBottom(s: EngineState): EngineState {
    return this.withView(s, nav.scrollToBottom(s.view, s.visible.length));
  }

  resize(s: EngineState, viewportHeight: number): EngineState {
    return this.withView(s, nav.resize(s.view, viewportHeight, s.visible.length));
  }

  // ── 필터 ──────────────────────────────────────────────────────
  /** visible 재계산 → 검색 재계산 → 뷰 재클램프 */
  @measure('ViewEngine.setFilter')
  setFilter(s: EngineState, filter: FilterState): EngineState {
    const visible = this.filterEngine.visible(filter);
    if (visible === s.visible) return { ...s, filter };

    // 화면 맨 위에 있던 원래 라인을 새 가시 목록에서 이어서 보여준다
    const topIndex = s.visible[s.view.topLine];
    const anchor = topIndex === undefined ? 0 : lowerBound(visible, topIndex);
    const view = nav.resize({ ...s.view, topLine: anchor }, s.view.viewportHeight, visible.length);

    const search = this.recomputeSearch(s.search, s.visible, visible);
    this.log.debug(`filter=${levelLabel(filter)} visible=${visible.length} matches=${search.matches.length}`);
    return this.followMatch({ filter, visible, search, view }, s.search.query !== '');
  }

  /** 같은 레벨이면 해제(all), 아니면 해당 레벨로 */
  toggleFilter(s: EngineState, level: LogLevel): EngineState {
    const active = s.filter.mode === 'level' && s.filter.level === level;
    return this.setFilter(s, active ? SHOW_ALL : { mode: 'level', level });
  }

  clearFilter(s: EngineState): EngineState {
    return this.setFilter(s, SHOW_ALL);
  }

  // ── 검색 ──────────────────────────────────────────────────────
  setQuery(s: EngineState, query: string): EngineState {
    if (!query) return this.clearQuery(s);
    const search = this.searchEngine.create(s.visible, query, s.search.caseSensitive, s.view.topLine);
    this.log.debug(`search q.len=${query.length} matches=${search.matches.length}`);
    return this.followMatch({ ...s, search }, true);
  }

  clearQuery(s: EngineState): EngineState {
    if (s.search.query === '' && s.search.source === s.visible) return s;
    return { ...s, search: emptySearch(s.search.caseSensitive, s.visible) };
  }

  setCaseSensitive(s: EngineState, caseSensitive: boolean): EngineState {
    if (s.search.caseSensitive === caseSensitive) return s;
    if (!s.search.query) return { ...s, search: { ...s.search, caseSensitive } };
    const anchor = currentMatch(s.search) ?? s.view.topLine;
    const search = this.searchEngine.create(s.visible, s.search.query, caseSensitive, anchor);
    return this.followMatch({ ...s, search }, true);
  }

  nextMatch(s: EngineState): EngineState {
    return this.stepMatch(s, nextMatch);
  }

  prevMatch(s: EngineState): EngineState {
    return this.stepMatch(s, prevMatch);
  }

  // ── 렌더링용 파생값 ────────────────────────────────────────────
  window(s: EngineState): WindowRow[] {
    const lines = nav.windowOf(s.visible, s.view);
    const cur = s.search.source === s.visible ? currentMatch(s.search) : undefined;
    const matchSet = s.search.source === s.visible ? s.search.matches : [];
    return lines.map((index, i) => {
      const position = s.view.topLine + i;
      return {
        index,
        position,
        text: this.index.text(index),
        level: this.index.level(index),
        match: binaryHas(matchSet, position),
        currentMatch: position === cur,
      };
    });
  }

  status(s: EngineState): EngineStatus {
    const cur = currentMatch(s.search);
    const count = s.visible.length;
    const top = nav.maxTop(count, s.view.viewportHeight);
    return {
      totalLines: this.index.lineCount,
      visibleCount: count,
      filter: levelLabel(s.filter),
      query: s.search.query,
      caseSensitive: s.search.caseSensitive,
      matchCount: s.search.matches.length,
      matchNumber: s.search.cursor === undefined ? 0 : s.search.cursor + 1,
      matchLine: cur === undefined ? undefined : s.visible[cur],
      topLine: s.view.topLine,
      levelCounts: this.levelTotals,
      percent: top === 0 ? 100 : Math.round((s.view.topLine / top) * 100),
    };
  }

  // ── 내부 ──────────────────────────────────────────────────────
  private withView(s: EngineState, view: ViewState): EngineState {
    return view === s.view ? s : { ...s, view };
  }

  private stepMatch(s: EngineState, step: (state: SearchState) => SearchState): EngineState {
    const fresh = this.ensureFresh(s);
    const search = step(fresh.search);
    // 매치가 없으면 no-op
    if (search === fresh.search) return fresh;
    return this.followMatch({ ...fresh, search }, true);
  }

  /** 검색 결과가 현재 visible 기준이 아니면 다시 계산 */
  private ensureFresh(s: EngineState): EngineState {
    if (s.search.source === s.visible) return s;
    this.log.debug('stale search state → recompute');
    return { ...s, search: this.recomputeSearch(s.search, s.search.source, s.visible) };
  }

  /**
   * 가시 집합이 바뀐 뒤 매치를 다시 계산한다.
   * 커서는 이전 현재 매치의 원래 라인 이후 첫 매치로 옮긴다.
   */
  private recomputeSearch(prev: SearchState, prevVisible: readonly number[], visible: readonly number[]): SearchState {
    if (!prev.query) return emptySearch(prev.caseSensitive, visible);
    const cur = currentMatch(prev);
    const curLine = cur === undefined ? undefined : prevVisible[cur];
    const anchor = curLine === undefined ? 0 : lowerBound(visible, curLine);
    return this.searchEngine.create(visible, prev.query, prev.caseSensitive, anchor);
  }

  private followMatch(s: EngineState, jump: boolean): EngineState {
    const pos = currentMatch(s.search);
    if (!jump || pos === undefined) return s;
    return this.withView(s, nav.jumpTo(s.view, pos, s.visible.length, this.jumpAlign));
  }
}

function binaryHas(sorted: readonly number[], v: number): boolean {
  const i = lowerBound(sorted, v);
  return i < sorted.length && sorted[i] === v;
}

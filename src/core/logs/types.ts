// === src/core/logs/types.ts ===
import { LOG_LEVEL_TOKENS, UI_STR } from '../../shared/const.js';

export type LogLevel = (typeof LOG_LEVEL_TOKENS)[number];

export const LOG_LEVELS: readonly LogLevel[] = LOG_LEVEL_TOKENS;

/** [start, end) 바이트 구간. 줄 종결자(\n, \r\n)를 포함한다. */
export type ByteSpan = { readonly start: number; readonly end: number };

export interface LogLine {
  /** 파일 내 0-based 순번 (불변) */
  readonly index: number;
  readonly byteSpan: ByteSpan;
  /** 라인에서 가장 왼쪽에 나온 레벨 토큰, 없으면 null */
  readonly level: LogLevel | null;
}

export type FilterState = { readonly mode: 'all' } | { readonly mode: 'level'; readonly level: LogLevel };

export const SHOW_ALL: FilterState = Object.freeze({ mode: 'all' });

export interface SearchState {
  /** 빈 문자열 = 검색 비활성 */
  readonly query: string;
  readonly caseSensitive: boolean;
  /** 오름차순 가시 위치(visible position). 라인 인덱스가 아님 */
  readonly matches: readonly number[];
  /** matches 내 현재 커서. 매치가 없으면 undefined */
  readonly cursor: number | undefined;
  /** matches를 계산할 때 사용한 visible 배열(동일성 비교로 stale 감지) */
  readonly source: readonly number[];
}

export interface ViewState {
  /** 첫 번째로 보이는 가시 위치 */
  readonly topLine: number;
  readonly viewportHeight: number;
}

export type JumpAlign = 'top' | 'center';

export function levelLabel(filter: FilterState): string {
  return filter.mode === 'all' ? UI_STR.FILTER_ALL : filter.level;
}

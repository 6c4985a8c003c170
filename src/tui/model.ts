// === src/tui/model.ts ===
import { DEFAULT_CASE_SENSITIVE, DEFAULT_SCROLL_STEP, TUI_CHROME_ROWS } from '../shared/const.js';
import type { ViewEngine } from '../core/viewer/ViewEngine.js';
import type { Model } from './types.js';

/** 로그 영역 높이: 전체 행에서 상태줄/검색줄/도움말을 뺀 값 (최소 1) */
export function viewportHeight(rows: number): number {
  return Math.max(1, rows - TUI_CHROME_ROWS);
}

export type InitOptions = {
  rows: number;
  cols: number;
  fileName: string;
  caseSensitive?: boolean;
  scrollStep?: number;
};

export const initModel = (engine: ViewEngine, opts: InitOptions): Model => ({
  engine: engine.initialState(viewportHeight(opts.rows), opts.caseSensitive ?? DEFAULT_CASE_SENSITIVE),
  mode: 'normal',
  prompt: { text: '', cursor: 0 },

  rows: opts.rows,
  cols: opts.cols,

  fileName: opts.fileName,
  scrollStep: Math.max(1, opts.scrollStep ?? DEFAULT_SCROLL_STEP),

  running: true,
});

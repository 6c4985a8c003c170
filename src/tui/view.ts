// === src/tui/view.ts ===
import { displayWidth, padToWidth, sanitizeLine, truncate } from '../core/logs/Sanitizer.js';
import { LOG_LEVELS, type LogLevel } from '../core/logs/types.js';
import type { EngineStatus, ViewEngine, WindowRow } from '../core/viewer/ViewEngine.js';
import { UI_STR } from '../shared/const.js';
import { paint, SGR } from './ansi.js';
import type { Model } from './types.js';

export interface Frame {
  /** 화면 행 순서대로. 각 행은 SGR 포함 문자열 */
  lines: string[];
  /** 검색 입력 중일 때만 커서 위치(0-based) */
  cursor?: { row: number; col: number };
}

const LEVEL_STYLE: Record<LogLevel, readonly number[]> = {
  INFO: [SGR.fgCyan],
  WARNING: [SGR.fgYellow],
  ERROR: [SGR.fgRed],
  CRITICAL: [SGR.bold, SGR.bgRed],
};

const CURRENT_MATCH_STYLE: readonly number[] = [SGR.inverse, SGR.fgCyan];

export function rowStyle(row: WindowRow): number[] {
  if (row.currentMatch) return [...CURRENT_MATCH_STYLE];
  const base = row.level ? [...LEVEL_STYLE[row.level]] : [];
  if (row.match) base.push(SGR.underline);
  return base;
}

export function renderRow(row: WindowRow, cols: number): string {
  return paint(truncate(sanitizeLine(row.text), cols), rowStyle(row));
}

/** 'I:3 W:1 E:0 C:0' */
export function levelSummary(counts: Readonly<Record<LogLevel, number>>): string {
  return LOG_LEVELS.map((lv) => `${lv[0]}:${counts[lv]}`).join(' ');
}

export function statusText(model: Model, st: EngineStatus): string {
  const parts = [
    ` ${model.fileName}`,
    `${st.visibleCount}/${st.totalLines} lines`,
    `filter: ${st.filter}`,
    levelSummary(st.levelCounts),
  ];
  if (st.query) {
    parts.push(st.matchCount ? `match ${st.matchNumber}/${st.matchCount}` : UI_STR.NO_MATCHES);
  }
  parts.push(st.caseSensitive ? UI_STR.CASE_SENSITIVE : UI_STR.CASE_INSENSITIVE);
  parts.push(`${st.percent}%`);
  return parts.join(' | ');
}

function promptText(model: Model, st: EngineStatus): string {
  if (model.mode === 'search') return UI_STR.SEARCH_LABEL + model.prompt.text;
  return st.query ? UI_STR.SEARCH_LABEL + st.query : '';
}

function helpText(model: Model): string {
  switch (model.mode) {
    case 'search':
      return UI_STR.HELP_SEARCH;
    case 'filterSelect':
      return UI_STR.HELP_FILTER;
    default:
      return UI_STR.HELP_NORMAL;
  }
}

/** 모델 → 프레임(순수 함수). 실제 출력은 terminal.ts가 한다. */
export function renderFrame(model: Model, engine: ViewEngine): Frame {
  const { cols } = model;
  const height = model.engine.view.viewportHeight;
  const rows = engine.window(model.engine);
  const st = engine.status(model.engine);

  const lines: string[] = [];
  for (let i = 0; i < height; i++) {
    const row = rows[i];
    if (row) lines.push(renderRow(row, cols));
    else if (i === 0 && st.visibleCount === 0) lines.push(truncate(UI_STR.EMPTY_VIEW, cols));
    else lines.push('');
  }

  lines.push(paint(truncate(padToWidth(statusText(model, st), cols), cols), [SGR.inverse]));
  lines.push(truncate(promptText(model, st), cols));
  lines.push(truncate(helpText(model), cols));

  if (model.mode !== 'search') return { lines };
  const beforeCursor = Array.from(model.prompt.text).slice(0, model.prompt.cursor).join('');
  const col = displayWidth(UI_STR.SEARCH_LABEL + beforeCursor);
  return { lines, cursor: { row: height + 1, col: Math.min(col, Math.max(0, cols - 1)) } };
}

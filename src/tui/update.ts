// === src/tui/update.ts ===
import type { EngineState, ViewEngine } from '../core/viewer/ViewEngine.js';
import { viewportHeight } from './model.js';
import type { Model, Msg, PromptState } from './types.js';

export type Update = (model: Model, msg: Msg) => Model;

/** 엔진 핸들러를 묶은 update. 엔진 상태 교체는 모두 여기서만 일어난다. */
export function createUpdate(engine: ViewEngine): Update {
  const withEngine = (model: Model, next: EngineState): Model =>
    next === model.engine ? model : { ...model, engine: next };

  return function update(model: Model, msg: Msg): Model {
    switch (msg.type) {
      case 'ScrollLines':
        return withEngine(model, engine.scroll(model.engine, msg.delta * model.scrollStep));

      case 'ScrollPages':
        return withEngine(model, engine.scrollPage(model.engine, msg.pages));

      case 'ScrollTop':
        return withEngine(model, engine.scrollToTop(model.engine));

      case 'ScrollBottom':
        return withEngine(model, engine.scrollToBottom(model.engine));

      case 'Resize': {
        const rows = Math.max(1, msg.rows);
        const cols = Math.max(1, msg.cols);
        const next = engine.resize(model.engine, viewportHeight(rows));
        return { ...model, rows, cols, engine: next };
      }

      // ── 필터 ────────────────────────────────────────────────
      case 'OpenFilterSelect':
        return { ...model, mode: 'filterSelect' };

      case 'CloseFilterSelect':
        return model.mode === 'filterSelect' ? { ...model, mode: 'normal' } : model;

      case 'ToggleLevel':
        return withEngine(model, engine.toggleFilter(model.engine, msg.level));

      case 'ShowAll': {
        const next = withEngine(model, engine.clearFilter(model.engine));
        return msg.close ? { ...next, mode: 'normal' } : next;
      }

      // ── 검색 프롬프트 ──────────────────────────────────────
      case 'OpenSearch': {
        // 직전 검색어를 이어서 편집
        const text = model.engine.search.query;
        return { ...model, mode: 'search', prompt: { text, cursor: codePoints(text).length } };
      }

      case 'PromptInsert':
        return { ...model, prompt: insertAt(model.prompt, msg.text) };

      case 'PromptBackspace':
        return { ...model, prompt: deleteBefore(model.prompt) };

      case 'PromptDelete':
        return { ...model, prompt: deleteAt(model.prompt) };

      case 'PromptCursor':
        return { ...model, prompt: moveCursor(model.prompt, msg.delta) };

      case 'PromptHome':
        return { ...model, prompt: { ...model.prompt, cursor: 0 } };

      case 'PromptEnd':
        return { ...model, prompt: { ...model.prompt, cursor: codePoints(model.prompt.text).length } };

      case 'SubmitSearch': {
        const next = engine.setQuery(model.engine, model.prompt.text);
        return { ...model, engine: next, mode: 'normal', prompt: { text: '', cursor: 0 } };
      }

      case 'CancelSearch':
        return { ...model, mode: 'normal', prompt: { text: '', cursor: 0 } };

      case 'ClearSearch':
        return withEngine(model, engine.clearQuery(model.engine));

      case 'NextMatch':
        return withEngine(model, engine.nextMatch(model.engine));

      case 'PrevMatch':
        return withEngine(model, engine.prevMatch(model.engine));

      case 'ToggleCase':
        return withEngine(model, engine.setCaseSensitive(model.engine, !model.engine.search.caseSensitive));

      case 'Quit':
        return { ...model, running: false };

      default:
        return model;
    }
  };
}

// ── 프롬프트 편집 (코드 포인트 단위) ───────────────────────────────
function codePoints(s: string): string[] {
  return Array.from(s);
}

export function insertAt(p: PromptState, text: string): PromptState {
  const cps = codePoints(p.text);
  const add = codePoints(text);
  cps.splice(p.cursor, 0, ...add);
  return { text: cps.join(''), cursor: p.cursor + add.length };
}

export function deleteBefore(p: PromptState): PromptState {
  if (p.cursor === 0) return p;
  const cps = codePoints(p.text);
  cps.splice(p.cursor - 1, 1);
  return { text: cps.join(''), cursor: p.cursor - 1 };
}

export function deleteAt(p: PromptState): PromptState {
  const cps = codePoints(p.text);
  if (p.cursor >= cps.length) return p;
  cps.splice(p.cursor, 1);
  return { text: cps.join(''), cursor: p.cursor };
}

export function moveCursor(p: PromptState, delta: number): PromptState {
  const len = codePoints(p.text).length;
  const cursor = Math.max(0, Math.min(len, p.cursor + delta));
  return cursor === p.cursor ? p : { ...p, cursor };
}

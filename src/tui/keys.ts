// === src/tui/keys.ts ===
import type { InputMode, Msg } from './types.js';

/** readline 'keypress' 이벤트의 key 인자 */
export type KeyPress = {
  sequence?: string;
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
};

// eslint-disable-next-line no-control-regex
const CONTROL_RE = /[\u0000-\u001F\u007F-\u009F]/;

/** 프롬프트에 그대로 넣을 수 있는 입력인지 */
export function isPrintable(key: KeyPress): boolean {
  const seq = key.sequence ?? '';
  return !key.ctrl && !key.meta && seq.length > 0 && !CONTROL_RE.test(seq);
}

/** 모드별 키 → Msg. 해당 없으면 undefined */
export function keyToMsg(mode: InputMode, key: KeyPress): Msg | undefined {
  switch (mode) {
    case 'search':
      return searchKey(key);
    case 'filterSelect':
      return filterSelectKey(key);
    default:
      return normalKey(key);
  }
}

function normalKey(key: KeyPress): Msg | undefined {
  if (key.ctrl) {
    switch (key.name) {
      case 'c':
        return { type: 'Quit' };
      case 'd':
        return { type: 'ScrollPages', pages: 1 };
      case 'u':
        return { type: 'ScrollPages', pages: -1 };
      default:
        return undefined;
    }
  }

  switch (key.name) {
    case 'down':
      return { type: 'ScrollLines', delta: 1 };
    case 'up':
      return { type: 'ScrollLines', delta: -1 };
    case 'pagedown':
    case 'space':
      return { type: 'ScrollPages', pages: 1 };
    case 'pageup':
      return { type: 'ScrollPages', pages: -1 };
    case 'home':
      return { type: 'ScrollTop' };
    case 'end':
      return { type: 'ScrollBottom' };
    case 'escape':
      return { type: 'ClearSearch' };
  }

  // 문자 키는 sequence로 구분 (대소문자 포함)
  switch (key.sequence) {
    case 'j':
      return { type: 'ScrollLines', delta: 1 };
    case 'k':
      return { type: 'ScrollLines', delta: -1 };
    case 'g':
      return { type: 'ScrollTop' };
    case 'G':
      return { type: 'ScrollBottom' };
    case 's':
    case '/':
      return { type: 'OpenSearch' };
    case 'n':
      return { type: 'NextMatch' };
    case 'N':
      return { type: 'PrevMatch' };
    case 'I':
      return { type: 'ToggleCase' };
    case 'f':
      return { type: 'OpenFilterSelect' };
    case 'q':
      return { type: 'Quit' };
    default:
      return undefined;
  }
}

function filterSelectKey(key: KeyPress): Msg | undefined {
  if (key.ctrl && key.name === 'c') return { type: 'Quit' };
  if (key.name === 'escape') return { type: 'CloseFilterSelect' };
  switch (key.sequence) {
    case 'i':
      return { type: 'ToggleLevel', level: 'INFO' };
    case 'w':
      return { type: 'ToggleLevel', level: 'WARNING' };
    case 'e':
      return { type: 'ToggleLevel', level: 'ERROR' };
    case 'c':
      return { type: 'ToggleLevel', level: 'CRITICAL' };
    case 'a':
      return { type: 'ShowAll', close: false };
    case 'f':
      return { type: 'ShowAll', close: true };
    default:
      return undefined;
  }
}

function searchKey(key: KeyPress): Msg | undefined {
  if (key.ctrl && key.name === 'c') return { type: 'CancelSearch' };
  switch (key.name) {
    case 'escape':
      return { type: 'CancelSearch' };
    case 'return':
    case 'enter':
      return { type: 'SubmitSearch' };
    case 'backspace':
      return { type: 'PromptBackspace' };
    case 'delete':
      return { type: 'PromptDelete' };
    case 'left':
      return { type: 'PromptCursor', delta: -1 };
    case 'right':
      return { type: 'PromptCursor', delta: 1 };
    case 'home':
      return { type: 'PromptHome' };
    case 'end':
      return { type: 'PromptEnd' };
  }
  if (key.ctrl && key.name === 'a') return { type: 'PromptHome' };
  if (key.ctrl && key.name === 'e') return { type: 'PromptEnd' };
  if (isPrintable(key)) return { type: 'PromptInsert', text: key.sequence ?? '' };
  return undefined;
}

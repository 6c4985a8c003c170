// === src/tui/types.ts ===
import type { EngineState } from '../core/viewer/ViewEngine.js';
import type { LogLevel } from '../core/logs/types.js';

export type InputMode = 'normal' | 'filterSelect' | 'search';

export interface PromptState {
  /** 입력 중인 검색어 */
  text: string;
  /** 코드 포인트 단위 커서 (0..길이) */
  cursor: number;
}

export interface Model {
  engine: EngineState;
  mode: InputMode;
  prompt: PromptState;

  // 터미널 크기
  rows: number;
  cols: number;

  fileName: string;
  /** j/k 한 번에 움직이는 줄 수 */
  scrollStep: number;

  running: boolean;
}

export type Msg =
  // 스크롤
  | { type: 'ScrollLines'; delta: number }
  | { type: 'ScrollPages'; pages: number }
  | { type: 'ScrollTop' }
  | { type: 'ScrollBottom' }
  | { type: 'Resize'; rows: number; cols: number }
  // 필터
  | { type: 'OpenFilterSelect' }
  | { type: 'CloseFilterSelect' }
  | { type: 'ToggleLevel'; level: LogLevel }
  | { type: 'ShowAll'; close: boolean }
  // 검색
  | { type: 'OpenSearch' }
  | { type: 'PromptInsert'; text: string }
  | { type: 'PromptBackspace' }
  | { type: 'PromptDelete' }
  | { type: 'PromptCursor'; delta: number }
  | { type: 'PromptHome' }
  | { type: 'PromptEnd' }
  | { type: 'SubmitSearch' }
  | { type: 'CancelSearch' }
  | { type: 'ClearSearch' }
  | { type: 'NextMatch' }
  | { type: 'PrevMatch' }
  | { type: 'ToggleCase' }
  | { type: 'Quit' };

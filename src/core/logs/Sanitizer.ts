// === src/core/logs/Sanitizer.ts ===
// 화면 출력용 라인 정규화를 한 군데에서 관리한다.
// 엔진(검색/필터)은 원문을 그대로 쓰고, 여기서는 렌더링 직전 문자열만 다룬다.

import stringWidth from 'string-width';

import { TUI_TAB_WIDTH } from '../../shared/const.js';

export type SanitizeOptions = {
  /** ANSI 이스케이프 제거 (로그에 섞인 색상 코드가 TUI 색과 충돌하지 않도록) */
  stripAnsi: boolean;
  /** 탭 → 공백 (0이면 확장하지 않음) */
  tabWidth: number;
  /** 탭 제외 제어문자 제거 */
  dropControl: boolean;
  /** 라인 내부의 U+FEFF 제거 */
  dropIntralineBOM: boolean;
};

export const DEFAULT_SANITIZE: SanitizeOptions = {
  stripAnsi: true,
  tabWidth: TUI_TAB_WIDTH,
  dropControl: true,
  dropIntralineBOM: true,
};

// ANSI escape (CSI/OSC 시작 + 파라미터 + 종결 문자)
// eslint-disable-next-line no-control-regex
const ANSI_RE = /[\u001B\u009B][[\]()#;?]*(?:[0-9]{1,4}(?:;[0-9]{0,4})*)?[0-9A-PR-TZcf-ntqry=><~]/g;

// 탭을 제외한 C0 제어 + DEL + C1
// eslint-disable-next-line no-control-regex
const CTRL_EXCEPT_TAB_RE = /[\u0000-\u0008\u000A-\u001F\u007F-\u009F]/g;

// 파일 BOM 포함 U+FEFF 전부
const INTRALINE_BOM_RE = /\uFEFF/g;

export function stripAnsi(s: string): string {
  return s.replace(ANSI_RE, '');
}

export function dropControlExceptTab(s: string): string {
  return s.replace(CTRL_EXCEPT_TAB_RE, '');
}

export function dropIntralineBOM(s: string): string {
  return s.replace(INTRALINE_BOM_RE, '');
}

const graphemes = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/** 터미널 표시 폭(전각/이모지 = 2칸, 결합 문자 = 0칸) */
export function displayWidth(s: string): number {
  return stringWidth(s);
}

/** 탭을 다음 탭 정지 위치(표시 폭 기준)까지 공백으로 */
export function expandTabs(s: string, width = TUI_TAB_WIDTH): string {
  if (width <= 0 || !s.includes('\t')) return s;
  let out = '';
  let col = 0;
  for (const { segment } of graphemes.segment(s)) {
    if (segment === '\t') {
      const n = width - (col % width);
      out += ' '.repeat(n);
      col += n;
    } else {
      out += segment;
      col += stringWidth(segment);
    }
  }
  return out;
}

/** 표시 폭 width칸 안에 들어가는 앞부분. 걸치는 전각 문자는 통째로 뺀다 */
export function truncate(s: string, width: number): string {
  if (width <= 0) return '';
  if (stringWidth(s) <= width) return s;
  let out = '';
  let w = 0;
  for (const { segment } of graphemes.segment(s)) {
    const cw = stringWidth(segment);
    if (w + cw > width) break;
    out += segment;
    w += cw;
  }
  return out;
}

/** 표시 폭이 cols가 되도록 공백을 채운다(넘치면 그대로) */
export function padToWidth(s: string, cols: number): string {
  const w = stringWidth(s);
  return w >= cols ? s : s + ' '.repeat(cols - w);
}

/** 단일 라인 정리. ANSI 제거가 제어문자 제거보다 먼저 (ESC가 먼저 사라지면 잔여물이 남는다) */
export function sanitizeLine(line: string, opt: Partial<SanitizeOptions> = {}): string {
  const o = { ...DEFAULT_SANITIZE, ...opt };
  let s = line;
  if (o.stripAnsi) s = stripAnsi(s);
  if (o.dropIntralineBOM) s = dropIntralineBOM(s);
  if (o.dropControl) s = dropControlExceptTab(s);
  return expandTabs(s, o.tabWidth);
}

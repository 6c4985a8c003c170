// === src/tui/ansi.ts ===
// SGR/커서 제어 시퀀스 모음. 화면에 쓰는 건 terminal.ts 뿐이다.

const ESC = '\x1b[';

export const SGR = {
  reset: 0,
  bold: 1,
  underline: 4,
  inverse: 7,
  fgRed: 31,
  fgYellow: 33,
  fgCyan: 36,
  bgRed: 41,
} as const;

export function sgr(...codes: number[]): string {
  return `${ESC}${codes.join(';')}m`;
}

/** codes가 비어 있으면 원문 그대로 */
export function paint(text: string, codes: readonly number[]): string {
  if (codes.length === 0 || text === '') return text;
  return `${sgr(...codes)}${text}${sgr(SGR.reset)}`;
}

export const ansi = {
  altScreenOn: '\x1b[?1049h',
  altScreenOff: '\x1b[?1049l',
  hideCursor: '\x1b[?25l',
  showCursor: '\x1b[?25h',
  clearScreen: `${ESC}2J`,
  clearLine: `${ESC}2K`,
  home: `${ESC}H`,
  /** 1-based 행/열 */
  moveTo: (row: number, col: number) => `${ESC}${row};${col}H`,
};

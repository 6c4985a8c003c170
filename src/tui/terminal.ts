// === src/tui/terminal.ts ===
import * as readline from 'readline';

import { getLogger } from '../core/logging/app-logger.js';
import { TUI_DEFAULT_COLS, TUI_DEFAULT_ROWS } from '../shared/const.js';
import { ansi } from './ansi.js';
import type { KeyPress } from './keys.js';
import type { Frame } from './view.js';

const log = getLogger('terminal');

export type TerminalSize = { rows: number; cols: number };

/** process.stdin에서 실제로 쓰는 부분 */
export type TerminalInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

/** process.stdout에서 실제로 쓰는 부분 */
export type TerminalOutput = NodeJS.WritableStream & {
  isTTY?: boolean;
  rows?: number;
  columns?: number;
};

/**
 * stdin/stdout을 점유하는 유일한 모듈.
 * raw 모드 + 대체 화면(alt screen)을 켜고, close()에서 반드시 원복한다.
 */
export class Terminal {
  private opened = false;
  private disposed = false;
  private keyListener?: (str: string | undefined, key: KeyPress | undefined) => void;
  private resizeListener?: () => void;

  constructor(
    private readonly input: TerminalInput = process.stdin,
    private readonly output: TerminalOutput = process.stdout,
  ) {}

  static isInteractive(input: TerminalInput = process.stdin, output: TerminalOutput = process.stdout) {
    return !!input.isTTY && !!output.isTTY;
  }

  size(): TerminalSize {
    return { rows: this.output.rows || TUI_DEFAULT_ROWS, cols: this.output.columns || TUI_DEFAULT_COLS };
  }

  open(onKey: (key: KeyPress) => void, onResize: (size: TerminalSize) => void): void {
    if (this.opened || this.disposed) return;
    this.opened = true;

    readline.emitKeypressEvents(this.input);
    if (this.input.isTTY) this.input.setRawMode?.(true);
    this.input.resume();

    this.keyListener = (str, key) => onKey(key ?? { sequence: str });
    this.resizeListener = () => onResize(this.size());
    this.input.on('keypress', this.keyListener);
    this.output.on('resize', this.resizeListener);

    this.output.write(ansi.altScreenOn + ansi.hideCursor + ansi.clearScreen);
    log.debug('terminal opened', this.size());
  }

  /** 프레임 전체를 한 번의 write로 그린다 */
  draw(frame: Frame): void {
    if (!this.opened || this.disposed) return;
    let out = ansi.home;
    frame.lines.forEach((line, i) => {
      out += ansi.moveTo(i + 1, 1) + ansi.clearLine + line;
    });
    out += frame.cursor ? ansi.moveTo(frame.cursor.row + 1, frame.cursor.col + 1) + ansi.showCursor : ansi.hideCursor;
    this.output.write(out);
  }

  close(): void {
    if (this.disposed) return;
    this.disposed = true;
    if (!this.opened) return;
    if (this.keyListener) this.input.off('keypress', this.keyListener);
    if (this.resizeListener) this.output.off('resize', this.resizeListener);
    if (this.input.isTTY) this.input.setRawMode?.(false);
    this.input.pause();
    this.output.write(ansi.showCursor + ansi.altScreenOff);
    log.debug('terminal restored');
  }
}

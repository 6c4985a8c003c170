// === src/core/logs/LineIndex.ts ===
import { isUtf8 } from 'buffer';

import { LINE_INDEX_AVG_LINE_BYTES, LINE_INDEX_MIN_CAPACITY } from '../../shared/const.js';
import { ErrorCategory, XError } from '../../shared/errors.js';
import { measure } from '../logging/perf.js';
import { type ByteSpan, LOG_LEVELS, type LogLevel, type LogLine } from './types.js';

const LF = 0x0a;
const CR = 0x0d;

// 가장 왼쪽 매치 우선. 네 토큰은 첫 글자가 모두 달라 같은 위치에서 둘이 걸리지 않는다.
const LEVEL_RE = /INFO|WARNING|ERROR|CRITICAL/;

// levels[] 코드: 0 = 없음, 1.. = LOG_LEVELS 순서
const LEVEL_CODE: Record<LogLevel, number> = { INFO: 1, WARNING: 2, ERROR: 3, CRITICAL: 4 };
const CODE_BY_TOKEN = new Map<string, number>(Object.entries(LEVEL_CODE));

/**
 * 파일 바이트에 대한 1회 스캔 결과.
 * - starts[i] = i번째 라인의 시작 바이트, starts[n] = 파일 길이
 * - 텍스트는 보관하지 않고 text(i) 호출 시 span에서 디코딩한다.
 */
export class LineIndex {
  private constructor(
    private readonly bytes: Buffer,
    private readonly starts: Float64Array,
    private readonly levels: Uint8Array,
    readonly lineCount: number,
  ) {}

  /** 유효한 UTF-8이 아니면 XError(Io) */
  @measure('LineIndex.build')
  static build(input: Uint8Array): LineIndex {
    const bytes = Buffer.isBuffer(input) ? input : Buffer.from(input.buffer, input.byteOffset, input.byteLength);
    assertUtf8(bytes);

    const size = bytes.length;
    let starts: Float64Array = new Float64Array(Math.max(LINE_INDEX_MIN_CAPACITY, Math.floor(size / LINE_INDEX_AVG_LINE_BYTES)) + 1);
    let count = 0;

    let pos = 0;
    while (pos < size) {
      if (count + 1 >= starts.length) starts = grow(starts);
      starts[count++] = pos;
      const nl = bytes.indexOf(LF, pos);
      pos = nl < 0 ? size : nl + 1;
    }
    starts[count] = size;
    starts = starts.slice(0, count + 1);

    const levels = new Uint8Array(count);
    for (let i = 0; i < count; i++) {
      // 토큰은 ASCII이고 UTF-8 멀티바이트에는 ASCII 바이트가 없으므로 latin1로 충분
      const m = LEVEL_RE.exec(bytes.toString('latin1', starts[i], starts[i + 1]));
      if (m) levels[i] = CODE_BY_TOKEN.get(m[0]) ?? 0;
    }

    return new LineIndex(bytes, starts, levels, count);
  }

  get byteLength(): number {
    return this.bytes.length;
  }

  span(i: number): ByteSpan {
    this.check(i);
    return { start: this.starts[i], end: this.starts[i + 1] };
  }

  level(i: number): LogLevel | null {
    this.check(i);
    const code = this.levels[i];
    return code === 0 ? null : LOG_LEVELS[code - 1];
  }

  line(i: number): LogLine {
    return Object.freeze({ index: i, byteSpan: Object.freeze(this.span(i)), level: this.level(i) });
  }

  /** 줄 종결자를 제외한 라인 텍스트(요청 시 디코딩, 캐시 없음) */
  text(i: number): string {
    const { start, end } = this.span(i);
    return this.bytes.toString('utf8', start, contentEnd(this.bytes, start, end));
  }

  levelCounts(): Record<LogLevel, number> {
    const out: Record<LogLevel, number> = { INFO: 0, WARNING: 0, ERROR: 0, CRITICAL: 0 };
    for (let i = 0; i < this.lineCount; i++) {
      const code = this.levels[i];
      if (code !== 0) out[LOG_LEVELS[code - 1]]++;
    }
    return out;
  }

  /** 특정 레벨 코드와 일치하는지 (필터 엔진 내부 경로) */
  hasLevel(i: number, level: LogLevel): boolean {
    return this.levels[i] === LEVEL_CODE[level];
  }

  private check(i: number) {
    if (!Number.isInteger(i) || i < 0 || i >= this.lineCount) {
      throw new RangeError(`line index out of range: ${i} (lines=${this.lineCount})`);
    }
  }
}

function contentEnd(bytes: Buffer, start: number, end: number): number {
  let e = end;
  if (e > start && bytes[e - 1] === LF) {
    e--;
    if (e > start && bytes[e - 1] === CR) e--;
  }
  return e;
}

// 문자열로 디코딩하지 않고 검증만
function assertUtf8(bytes: Buffer) {
  if (!isUtf8(bytes)) throw new XError(ErrorCategory.Io, 'file is not valid UTF-8 text');
}

function grow(buf: Float64Array): Float64Array {
  const bigger = new Float64Array(Math.floor(buf.length * 1.6) + LINE_INDEX_MIN_CAPACITY);
  bigger.set(buf, 0);
  return bigger;
}

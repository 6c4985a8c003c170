// === src/core/logging/app-logger.ts ===
import * as fs from 'fs';

import { ENV_LOG_LEVEL, LOG_LEVEL_DEFAULT, LOG_MAX_BUFFER } from '../../shared/const.js';
import { getConsoleLogger } from './console-logger.js';
// test 모드(npm test)에서는 파일 싱크 대신 테스트 로거로 보냄
import { isTestMode } from './test-mode.js';
import { LEVEL_ORDER, type Logger, type LogLevel, parseLogLevel } from './types.js';

export type { Logger, LogLevel } from './types.js';
type Sink = (line: string) => void;

/**
 * TUI가 stdout을 점유하므로 로그는 화면에 찍지 않는다.
 * - 파일 싱크(--log-file / LOG_VIEWER_LOG_FILE / config.logFile)
 * - 메모리 링버퍼(getBufferedLogs)
 * - 추가 싱크(addLogSink)
 */
class AppLoggerCore {
  private level: LogLevel = parseLogLevel(process.env[ENV_LOG_LEVEL]) ?? LOG_LEVEL_DEFAULT;
  private file: fs.WriteStream | null = null;
  private sinks = new Set<Sink>();
  private buffer: string[] = [];

  private consolePatched = false;
  private origConsole?: {
    log: typeof console.log;
    info: typeof console.info;
    warn: typeof console.warn;
    error: typeof console.error;
  };

  setLevel(level: LogLevel) {
    this.level = level;
  }
  getLevel() {
    return this.level;
  }

  /** 파일 싱크 교체. undefined면 닫기만 한다. */
  setLogFile(filePath: string | undefined) {
    this.closeFile();
    if (!filePath) return;
    const ws = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
    ws.on('error', (e) => {
      // 파일 싱크 오류는 버퍼에만 남기고 싱크를 끊는다
      this.pushBuffer(`[log-file] ${e.message}`);
      if (this.file === ws) this.file = null;
    });
    this.file = ws;
  }

  closeFile() {
    if (!this.file) return;
    this.file.end();
    this.file = null;
  }

  addSink(sink: Sink) {
    this.sinks.add(sink);
    for (const line of this.buffer) sink(line);
  }
  removeSink(sink: Sink) {
    this.sinks.delete(sink);
  }

  getLogger(scope: string): Logger {
    const emit = (lvl: LogLevel, args: unknown[]) => this._emit(lvl, scope, args);
    return {
      debug: (...a: unknown[]) => emit('debug', a),
      info: (...a: unknown[]) => emit('info', a),
      warn: (...a: unknown[]) => emit('warn', a),
      error: (...a: unknown[]) => emit('error', a),
    };
  }

  /** console.*을 로거로 돌린다 (TUI 화면 오염 방지) */
  patchConsole() {
    if (this.consolePatched) return;
    this.consolePatched = true;
    this.origConsole = {
      log: console.log,
      info: console.info,
      warn: console.warn,
      error: console.error,
    };
    const c = this.getLogger('console');
    console.log = (...a: unknown[]) => c.info(...a);
    console.info = (...a: unknown[]) => c.info(...a);
    console.warn = (...a: unknown[]) => c.warn(...a);
    console.error = (...a: unknown[]) => c.error(...a);
  }

  unpatchConsole() {
    if (!this.consolePatched || !this.origConsole) return;
    console.log = this.origConsole.log;
    console.info = this.origConsole.info;
    console.warn = this.origConsole.warn;
    console.error = this.origConsole.error;
    this.consolePatched = false;
    this.origConsole = undefined;
  }

  private _emit(level: LogLevel, scope: string, args: unknown[]) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    const line = formatLine(new Date(), level, scope, args);

    // 1) 파일
    this.file?.write(line + '\n');
    // 2) 메모리 버퍼
    this.pushBuffer(line);
    // 3) 추가 싱크
    for (const sink of this.sinks) sink(line);
  }

  private pushBuffer(line: string) {
    this.buffer.push(line);
    if (this.buffer.length > LOG_MAX_BUFFER) {
      this.buffer.splice(0, this.buffer.length - LOG_MAX_BUFFER);
    }
  }

  /** ✅ 버퍼 읽기 */
  getBuffer(): string[] {
    return [...this.buffer];
  }
}

export function formatLine(now: Date, level: LogLevel, scope: string, args: unknown[]): string {
  const ts = now.toTimeString().split(' ')[0] + '.' + now.getMilliseconds().toString().padStart(3, '0');
  const body = args
    .map((a) => {
      if (a instanceof Error) return a.stack || a.message;
      if (typeof a === 'object' && a !== null) {
        try {
          return JSON.stringify(a);
        } catch {
          return String(a);
        }
      }
      return String(a);
    })
    .join(' ');
  const shortLevel = level === 'debug' ? 'D' : level === 'info' ? 'I' : level === 'warn' ? 'W' : 'E';
  return `[${ts}] [${shortLevel}] [${scope}] ${body}`;
}

const core = new AppLoggerCore();

export function setLogLevel(level: LogLevel) {
  core.setLevel(level);
}
export function getLogLevel() {
  return core.getLevel();
}
export function setLogFile(filePath: string | undefined) {
  core.setLogFile(filePath);
}
export function closeLogFile() {
  core.closeFile();
}
export function getLogger(scope: string): Logger {
  // ✅ 테스트 실행 시엔 테스트 로그 파일로 직행
  if (isTestMode()) {
    return getConsoleLogger(scope);
  }
  return core.getLogger(scope);
}
export function addLogSink(sink: Sink) {
  core.addSink(sink);
}
export function removeLogSink(sink: Sink) {
  core.removeSink(sink);
}
export function patchConsole() {
  core.patchConsole();
}
export function unpatchConsole() {
  core.unpatchConsole();
}
export function getBufferedLogs(): string[] {
  return core.getBuffer();
}

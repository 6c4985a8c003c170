// === src/core/logging/console-logger.ts ===
import * as fs from 'fs';
import * as path from 'path';
import { inspect } from 'util';

import { ENV_LOG_LEVEL, LOG_LEVEL_DEFAULT } from '../../shared/const.js';
import { LEVEL_ORDER, type LogFn, type Logger, type LogLevel, parseLogLevel } from './types.js';

const currentLevel: LogLevel = parseLogLevel(process.env[ENV_LOG_LEVEL]) ?? LOG_LEVEL_DEFAULT;

function enabled(lv: LogLevel) {
  return LEVEL_ORDER[lv] >= LEVEL_ORDER[currentLevel];
}

// 테스트 시 파일로 로그를 모은다: src/__test__/out/console.log
const TEST_LOG_PATH = path.resolve(__dirname, '..', '..', '__test__', 'out', 'console.log');

let _dirReady = false;
let _warned = false;
function fileSinkWrite(level: LogLevel, parts: unknown[]) {
  const ts = new Date().toISOString();
  const body = parts
    .filter((p) => p !== undefined)
    .map((p) =>
      typeof p === 'string' ? p : inspect(p, { depth: 5, maxArrayLength: 200, breakLength: Infinity }),
    )
    .join(' ');
  try {
    if (!_dirReady) {
      fs.mkdirSync(path.dirname(TEST_LOG_PATH), { recursive: true });
      _dirReady = true;
    }
    // 동기 append: 열린 스트림 핸들을 남기지 않는다
    fs.appendFileSync(TEST_LOG_PATH, `${ts} ${level.toUpperCase()} ${body}\n`, 'utf8');
  } catch (e) {
    // 테스트 흐름은 계속 진행, 경고는 한 번만
    if (!_warned) {
      _warned = true;
      process.stderr.write(`[console-logger] cannot write ${TEST_LOG_PATH}: ${String(e)}\n`);
    }
  }
}

/** 테스트 백엔드 로거: 호출부 포맷은 유지하고, prefix만 붙여 파일로 남긴다. */
export function getConsoleLogger(name: string): Logger {
  const prefix = `[${name}]`;
  const mk =
    (lv: LogLevel): LogFn =>
    (...args: unknown[]) => {
      if (!enabled(lv)) return;
      fileSinkWrite(lv, [prefix, ...args]);
    };
  return { debug: mk('debug'), info: mk('info'), warn: mk('warn'), error: mk('error') };
}

import * as fs from 'fs';
import * as path from 'path';

import { LineIndex } from '../../core/logs/LineIndex.js';
import { errnoCode } from '../../shared/utils.js';

/** 테스트 산출물의 "고정" 루트 폴더 */
export const OUT_ROOT = path.resolve(__dirname, '..', 'out');

export function cleanDir(p: string) {
  try {
    fs.rmSync(p, { recursive: true, force: true });
  } catch {}
}

export function ensureDir(p: string) {
  fs.mkdirSync(p, { recursive: true });
}

function tsForPath() {
  const d = new Date();
  const pad = (n: number, w = 2) => String(n).padStart(w, '0');
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}-${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}-${pad(d.getMilliseconds(), 3)}`;
}

function randSuffix(len = 5) {
  return Math.random()
    .toString(36)
    .slice(2, 2 + len);
}

export function prepareUniqueOutDir(label?: string): string {
  ensureDir(OUT_ROOT);
  const safeLabel = label ? `-${label.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 24)}` : '';
  for (let k = 0; ; k++) {
    const candidate = path.join(OUT_ROOT, `run-${tsForPath()}-${randSuffix()}${safeLabel}${k ? `-${k}` : ''}`);
    try {
      fs.mkdirSync(candidate, { recursive: false });
      return candidate;
    } catch (e) {
      if (errnoCode(e) !== 'EEXIST') throw e;
    }
  }
}

/** 문자열 → 라인 인덱스 (UTF-8) */
export function indexOf(text: string): LineIndex {
  return LineIndex.build(Buffer.from(text, 'utf8'));
}

/** 라인 배열을 '\n'으로 이어 붙인 인덱스 */
export function indexOfLines(lines: string[]): LineIndex {
  return indexOf(lines.join('\n'));
}

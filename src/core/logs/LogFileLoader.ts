// === src/core/logs/LogFileLoader.ts ===
import * as fs from 'fs';
import * as path from 'path';

import { ErrorCategory, XError } from '../../shared/errors.js';
import { errnoCode } from '../../shared/utils.js';
import { getLogger } from '../logging/app-logger.js';
import { measureBlock } from '../logging/perf.js';
import { LineIndex } from './LineIndex.js';

const log = getLogger('LogFileLoader');

export interface LoadedLog {
  filePath: string;
  fileName: string;
  index: LineIndex;
}

/** 시스템 에러 코드 → 사용자용 문구 */
function describeFsError(filePath: string, e: unknown): string {
  switch (errnoCode(e)) {
    case 'ENOENT':
      return `${filePath}: no such file`;
    case 'EACCES':
    case 'EPERM':
      return `${filePath}: permission denied`;
    case 'EISDIR':
      return `${filePath}: is a directory`;
    default:
      return `${filePath}: cannot read (${e instanceof Error ? e.message : String(e)})`;
  }
}

/**
 * 파일 전체를 한 번 읽고 라인 인덱스를 만든다.
 * 이후 엔진은 파일을 다시 읽지 않는다. 실패는 모두 XError(Io).
 */
export async function loadLogFile(filePath: string): Promise<LoadedLog> {
  return measureBlock('loadLogFile', async () => {
    let bytes: Buffer;
    try {
      const st = await fs.promises.stat(filePath);
      if (st.isDirectory()) throw new XError(ErrorCategory.Io, `${filePath}: is a directory`);
      bytes = await fs.promises.readFile(filePath);
    } catch (e) {
      if (e instanceof XError) throw e;
      throw new XError(ErrorCategory.Io, describeFsError(filePath, e), e);
    }

    const index = LineIndex.build(bytes);
    log.info(`loaded ${filePath} bytes=${bytes.length} lines=${index.lineCount}`);
    return { filePath, fileName: path.basename(filePath), index };
  });
}

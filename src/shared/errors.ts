// === src/shared/errors.ts ===
import { EXIT_IO, EXIT_USAGE } from './const.js';

export enum ErrorCategory {
  Io = 'IO',
  Usage = 'USAGE',
  Config = 'CONFIG',
  Unknown = 'UNKNOWN',
}

export class XError extends Error {
  constructor(
    public category: ErrorCategory,
    message: string,
    public detail?: unknown,
  ) {
    super(message);
    this.name = `XError/${category}`;
  }
}

export function isXError(e: unknown): e is XError {
  return e instanceof XError;
}

/** 파일 열기/읽기/디코딩 실패. 시작 시점의 치명 오류 */
export function isIoError(e: unknown): e is XError {
  return isXError(e) && e.category === ErrorCategory.Io;
}

/** 프로세스 종료 코드 매핑 (Io=1, 사용법/설정=2, 그 외=1) */
export function errorExitCode(e: unknown): number {
  if (!isXError(e)) return EXIT_IO;
  switch (e.category) {
    case ErrorCategory.Usage:
    case ErrorCategory.Config:
      return EXIT_USAGE;
    default:
      return EXIT_IO;
  }
}

/** stderr 한 줄 표현 */
export function describeError(e: unknown): string {
  if (isXError(e)) return e.message;
  if (e instanceof Error) return `${e.name}: ${e.message}`;
  return String(e);
}

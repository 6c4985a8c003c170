// === src/core/logging/types.ts ===

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFn = (...args: unknown[]) => void;
export type Logger = { debug: LogFn; info: LogFn; warn: LogFn; error: LogFn };

export const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(v: string | undefined): LogLevel | undefined {
  const s = (v ?? '').trim().toLowerCase();
  return s === 'debug' || s === 'info' || s === 'warn' || s === 'error' ? s : undefined;
}

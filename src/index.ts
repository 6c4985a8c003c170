// === src/index.ts ===
// 라이브러리로 쓸 때의 공개 API (엔진 + 로더 + 설정)

export { LineIndex } from './core/logs/LineIndex.js';
export { loadLogFile, type LoadedLog } from './core/logs/LogFileLoader.js';
export { filterKey, LogFilter, visibleIndices } from './core/logs/LogFilter.js';
export {
  createSearch,
  currentMatch,
  emptySearch,
  findMatches,
  LogSearch,
  nextMatch,
  prevMatch,
  type SearchOptions,
} from './core/logs/LogSearch.js';
export * as navigator from './core/logs/Navigator.js';
export { sanitizeLine } from './core/logs/Sanitizer.js';
export * from './core/logs/types.js';
export { type EngineState, type EngineStatus, ViewEngine, type WindowRow } from './core/viewer/ViewEngine.js';
export { defaultConfig, type ViewerConfig } from './core/config/schema.js';
export { loadViewerConfig } from './core/config/userconfig.js';
export { ErrorCategory, XError } from './shared/errors.js';
export { run } from './cli.js';

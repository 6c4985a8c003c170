// === src/shared/const.ts ===

// 공용 상수 모음 (엔진/TUI/CLI 공통)

// 앱 식별자
export const APP_BIN = 'log_viewer' as const;

// Logger
export const LOG_LEVEL_DEFAULT = 'info' as const; // 'debug' | 'info' | 'warn' | 'error'
export const LOG_MAX_BUFFER = 500;
/** 로그 레벨/파일 환경변수 (CLI 플래그가 최우선) */
export const ENV_LOG_LEVEL = 'LOG_VIEWER_LOG_LEVEL' as const;
export const ENV_LOG_FILE = 'LOG_VIEWER_LOG_FILE' as const;
/** 테스트 로그를 콘솔로 강제 */
export const ENV_LOG_TO_CONSOLE = 'LOG_VIEWER_LOG_TO_CONSOLE' as const;

// Config
export const ENV_CONFIG_PATH = 'LOG_VIEWER_CONFIG' as const;
/** $XDG_CONFIG_HOME(없으면 ~/.config) 하위 상대 경로 */
export const CONFIG_REL = 'log-viewer/config.json' as const;

// Perf
export const LOG_TOTAL_CALLS_THRESHOLD = 1000;

// ── 엔진 ─────────────────────────────────────────────────────────
/** 인식하는 로그 레벨 토큰(대문자, 대소문자 구분) */
export const LOG_LEVEL_TOKENS = ['INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;
/** 라인 오프셋 배열 초기 용량 추정: 평균 라인 길이(바이트) */
export const LINE_INDEX_AVG_LINE_BYTES = 48;
export const LINE_INDEX_MIN_CAPACITY = 1024;

// ── 내비게이션 기본값 ───────────────────────────────────────────
export const DEFAULT_SCROLL_STEP = 1;
export const DEFAULT_JUMP_ALIGN = 'center' as const;
export const DEFAULT_CASE_SENSITIVE = true;

// ── TUI 레이아웃 ────────────────────────────────────────────────
/** 로그 영역 아래 고정 행 수: 상태줄 + 검색줄 + 키 도움말 */
export const TUI_CHROME_ROWS = 3;
export const TUI_TAB_WIDTH = 4;
/** TTY 크기를 모를 때의 기본값 */
export const TUI_DEFAULT_ROWS = 24;
export const TUI_DEFAULT_COLS = 80;

// ── 종료 코드 ───────────────────────────────────────────────────
export const EXIT_OK = 0;
export const EXIT_IO = 1;
export const EXIT_USAGE = 2;

// ─────────────────────────────────────────────────────────────
// UI 문자열(라벨/도움말): SSOT
// ─────────────────────────────────────────────────────────────
export const UI_STR = {
  HELP_NORMAL: ' quit: q | filter: f | search: s or / | next/prev: n/N | case: I | top/bottom: g/G',
  HELP_FILTER: ' info: i | warning: w | error: e | critical: c | all: a | clear: f | back: Esc',
  HELP_SEARCH: ' submit: Enter | exit search: Esc/Ctrl-c',
  SEARCH_LABEL: 'search: ',
  NO_MATCHES: 'no matches',
  EMPTY_VIEW: '(no lines)',
  FILTER_ALL: 'all',
  CASE_SENSITIVE: 'Aa',
  CASE_INSENSITIVE: 'aa',
} as const;

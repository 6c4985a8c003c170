// === src/core/config/schema.ts ===
import { z } from 'zod';

import { DEFAULT_CASE_SENSITIVE, DEFAULT_JUMP_ALIGN, DEFAULT_SCROLL_STEP, LOG_LEVEL_DEFAULT } from '../../shared/const.js';

/* ─────────────────────────────────────────────────────────────
 * 사용자 설정 파일 (JSON)
 *  - search.caseSensitive : 부분 문자열 검색 대소문자 구분(기본 true)
 *  - navigation.jumpAlign : 매치로 이동할 때 'top' | 'center'(기본)
 *  - navigation.scrollStep: j/k 한 번에 움직일 줄 수(기본 1)
 *  - logLevel / logFile   : 진단 로그 레벨과 파일 경로
 * 모든 항목은 선택. 없으면 기본값과 병합된다.
 * ───────────────────────────────────────────────────────────── */
export const ZViewerConfig = z
  .object({
    search: z.object({ caseSensitive: z.boolean().optional() }).strict().optional(),
    navigation: z
      .object({
        jumpAlign: z.enum(['top', 'center']).optional(),
        scrollStep: z.number().int().min(1).max(1000).optional(),
      })
      .strict()
      .optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    logFile: z.string().min(1).optional(),
  })
  .strict();

export type ViewerConfigFile = z.infer<typeof ZViewerConfig>;

export type ViewerConfig = {
  search: { caseSensitive: boolean };
  navigation: { jumpAlign: 'top' | 'center'; scrollStep: number };
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  logFile?: string;
};

export const defaultConfig: ViewerConfig = {
  search: { caseSensitive: DEFAULT_CASE_SENSITIVE },
  navigation: { jumpAlign: DEFAULT_JUMP_ALIGN, scrollStep: DEFAULT_SCROLL_STEP },
  logLevel: LOG_LEVEL_DEFAULT,
};

export function mergeConfig(base: ViewerConfig, file: ViewerConfigFile): ViewerConfig {
  return {
    search: { caseSensitive: file.search?.caseSensitive ?? base.search.caseSensitive },
    navigation: {
      jumpAlign: file.navigation?.jumpAlign ?? base.navigation.jumpAlign,
      scrollStep: file.navigation?.scrollStep ?? base.navigation.scrollStep,
    },
    logLevel: file.logLevel ?? base.logLevel,
    logFile: file.logFile ?? base.logFile,
  };
}

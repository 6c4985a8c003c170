// === src/core/config/userconfig.ts ===
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { CONFIG_REL, ENV_CONFIG_PATH, ENV_LOG_FILE, ENV_LOG_LEVEL } from '../../shared/const.js';
import { ErrorCategory, XError } from '../../shared/errors.js';
import { errnoCode, safeParseJson } from '../../shared/utils.js';
import { getLogger } from '../logging/app-logger.js';
import { measureBlock } from '../logging/perf.js';
import { parseLogLevel } from '../logging/types.js';
import { defaultConfig, mergeConfig, type ViewerConfig, ZViewerConfig } from './schema.js';

const log = getLogger('userconfig');

export type ConfigSource = {
  /** --config 로 명시된 경로 */
  explicitPath?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
};

/** 명시 경로 → 환경변수 → XDG 기본 경로 순. explicit 여부도 함께 돌려준다. */
export function resolveConfigPath(src: ConfigSource = {}): { path: string; explicit: boolean } {
  const env = src.env ?? process.env;
  if (src.explicitPath) return { path: path.resolve(src.explicitPath), explicit: true };
  const fromEnv = env[ENV_CONFIG_PATH];
  if (fromEnv) return { path: path.resolve(fromEnv), explicit: true };
  const base = env.XDG_CONFIG_HOME || path.join(src.homeDir ?? os.homedir(), '.config');
  return { path: path.join(base, ...CONFIG_REL.split('/')), explicit: false };
}

/** 설정 JSON 문자열 검증(zod) → 기본값 병합 */
export function parseConfigText(text: string, origin: string): ViewerConfig {
  const json = safeParseJson(text);
  if (json === undefined) {
    throw new XError(ErrorCategory.Config, `config: invalid JSON in ${origin}`);
  }
  const parsed = ZViewerConfig.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`)
      .join('; ');
    throw new XError(ErrorCategory.Config, `config: ${origin}: ${issues}`, parsed.error.issues);
  }
  return mergeConfig(defaultConfig, parsed.data);
}

/**
 * 사용자 설정 읽기.
 * - 암묵 경로에 파일이 없으면 기본값
 * - 명시 경로가 없거나, JSON/스키마 오류면 XError(Config)
 * - 마지막으로 환경변수(LOG_VIEWER_LOG_LEVEL / LOG_VIEWER_LOG_FILE) 덮어쓰기
 */
export async function loadViewerConfig(src: ConfigSource = {}): Promise<ViewerConfig> {
  return measureBlock('config.load', async () => {
    const env = src.env ?? process.env;
    const { path: cfgPath, explicit } = resolveConfigPath(src);

    let cfg: ViewerConfig = defaultConfig;
    try {
      const text = await fs.promises.readFile(cfgPath, 'utf8');
      cfg = parseConfigText(text, cfgPath);
      log.info(`config loaded (${cfgPath})`);
    } catch (e) {
      if (e instanceof XError) throw e;
      if (!explicit && errnoCode(e) === 'ENOENT') {
        log.debug(`config not found, using defaults (${cfgPath})`);
      } else {
        throw new XError(ErrorCategory.Config, `config: cannot read ${cfgPath} (${errnoCode(e) ?? String(e)})`, e);
      }
    }

    const envLevel = parseLogLevel(env[ENV_LOG_LEVEL]);
    const envFile = env[ENV_LOG_FILE];
    return {
      ...cfg,
      logLevel: envLevel ?? cfg.logLevel,
      logFile: envFile || cfg.logFile,
    };
  });
}

// === src/cli.ts ===
import { parseArgs } from 'util';

import type { ViewerConfig } from './core/config/schema.js';
import { loadViewerConfig } from './core/config/userconfig.js';
import {
  closeLogFile,
  getLogger,
  patchConsole,
  setLogFile,
  setLogLevel,
  unpatchConsole,
} from './core/logging/app-logger.js';
import { globalProfiler } from './core/logging/perf.js';
import { type LoadedLog, loadLogFile } from './core/logs/LogFileLoader.js';
import { runViewer } from './tui/index.js';
import { Terminal } from './tui/terminal.js';
import { APP_BIN, EXIT_OK } from './shared/const.js';
import { describeError, ErrorCategory, errorExitCode, XError } from './shared/errors.js';

const log = getLogger('cli');

export const USAGE = `usage: ${APP_BIN} [options] <path>

options:
  --config <path>     config file (default: $XDG_CONFIG_HOME/log-viewer/config.json)
  --ignore-case       case-insensitive search
  --log-file <path>   write diagnostic logs to <path>
  -h, --help          show this help
`;

export interface CliArgs {
  filePath: string;
  configPath?: string;
  ignoreCase: boolean;
  logFile?: string;
  help: boolean;
}

/** 인자 오류는 XError(Usage) */
export function parseCliArgs(argv: string[]): CliArgs {
  let parsed: ReturnType<typeof parseOptions>;
  try {
    parsed = parseOptions(argv);
  } catch (e) {
    throw new XError(ErrorCategory.Usage, e instanceof Error ? e.message : String(e), e);
  }
  const { values, positionals } = parsed;
  const help = values.help ?? false;
  if (!help && positionals.length !== 1) {
    throw new XError(
      ErrorCategory.Usage,
      positionals.length === 0 ? 'missing <path> argument' : `expected one <path>, got ${positionals.length}`,
    );
  }
  return {
    filePath: positionals[0] ?? '',
    configPath: values.config,
    ignoreCase: values['ignore-case'] ?? false,
    logFile: values['log-file'],
    help,
  };
}

function parseOptions(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      config: { type: 'string' },
      'ignore-case': { type: 'boolean' },
      'log-file': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

/** CLI 플래그가 설정 파일/환경변수보다 우선 */
export function applyCliOverrides(config: ViewerConfig, args: CliArgs): ViewerConfig {
  return {
    ...config,
    search: { caseSensitive: args.ignoreCase ? false : config.search.caseSensitive },
    logFile: args.logFile ?? config.logFile,
  };
}

export interface CliDeps {
  env: NodeJS.ProcessEnv;
  stdout: (s: string) => void;
  stderr: (s: string) => void;
  isInteractive: () => boolean;
  runViewer: (loaded: LoadedLog, config: ViewerConfig) => Promise<void>;
}

const defaultDeps: CliDeps = {
  env: process.env,
  stdout: (s) => process.stdout.write(s),
  stderr: (s) => process.stderr.write(s),
  isInteractive: () => Terminal.isInteractive(),
  runViewer: (loaded, config) => runViewer(loaded, config),
};

/** 전체 실행. 종료 코드를 돌려준다 (0 정상, 1 Io, 2 사용법/설정). */
export async function run(argv: string[], deps: Partial<CliDeps> = {}): Promise<number> {
  const d: CliDeps = { ...defaultDeps, ...deps };
  const perf = d.env.PERF === '1';
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      d.stdout(USAGE);
      return EXIT_OK;
    }

    const config = applyCliOverrides(await loadViewerConfig({ explicitPath: args.configPath, env: d.env }), args);
    setLogLevel(config.logLevel);
    setLogFile(config.logFile);
    if (perf) {
      globalProfiler.enable();
      globalProfiler.startCapture();
    }

    const loaded = await loadLogFile(args.filePath);
    if (!d.isInteractive()) {
      throw new XError(ErrorCategory.Usage, 'stdin and stdout must be a terminal');
    }

    patchConsole();
    try {
      await d.runViewer(loaded, config);
    } finally {
      unpatchConsole();
    }
    return EXIT_OK;
  } catch (e) {
    log.error('exit with error', e);
    d.stderr(`${APP_BIN}: ${describeError(e)}\n`);
    if (e instanceof XError && e.category === ErrorCategory.Usage) d.stderr(USAGE);
    return errorExitCode(e);
  } finally {
    if (perf) {
      const { duration, analysis } = globalProfiler.stopCapture();
      log.info(`perf duration=${duration.toFixed(1)}ms`, analysis.functionSummary, analysis.insights);
      globalProfiler.disable();
    }
    closeLogFile();
  }
}

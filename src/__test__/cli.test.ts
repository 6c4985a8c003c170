import * as fs from 'fs';
import * as path from 'path';

import { applyCliOverrides, parseCliArgs, run, USAGE } from '../cli.js';
import { defaultConfig, type ViewerConfig } from '../core/config/schema.js';
import type { LoadedLog } from '../core/logs/LogFileLoader.js';
import { XError } from '../shared/errors.js';
import { cleanDir, prepareUniqueOutDir } from './helpers/testFs.js';

let DIR: string;
beforeEach(() => {
  DIR = prepareUniqueOutDir('cli');
});
afterEach(() => cleanDir(DIR));

describe('parseCliArgs', () => {
  it('옵션 + 경로', () => {
    expect(parseCliArgs(['--ignore-case', '--log-file', 'viewer.log', 'app.log'])).toEqual({
      filePath: 'app.log',
      configPath: undefined,
      ignoreCase: true,
      logFile: 'viewer.log',
      help: false,
    });
  });

  it('경로가 없거나 둘 이상이면 사용법 오류', () => {
    expect(() => parseCliArgs([])).toThrow('missing <path> argument');
    expect(() => parseCliArgs(['a.log', 'b.log'])).toThrow('expected one <path>, got 2');
    expect(() => parseCliArgs(['--bogus', 'a.log'])).toThrow(XError);
  });

  it('--help는 경로 없이 허용', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
  });

  it('--ignore-case가 설정 파일을 이긴다', () => {
    const args = parseCliArgs(['--ignore-case', 'a.log']);
    expect(applyCliOverrides(defaultConfig, args).search.caseSensitive).toBe(false);
  });
});

describe('run', () => {
  function deps(over: { isInteractive?: () => boolean } = {}) {
    const out: string[] = [];
    const err: string[] = [];
    const viewer = jest.fn(async (_loaded: LoadedLog, _config: ViewerConfig) => {});
    return {
      out,
      err,
      viewer,
      d: {
        env: { XDG_CONFIG_HOME: DIR },
        stdout: (s: string) => out.push(s),
        stderr: (s: string) => err.push(s),
        isInteractive: over.isInteractive ?? (() => true),
        runViewer: viewer,
      },
    };
  }

  it('--help → 0', async () => {
    const t = deps();
    await expect(run(['--help'], t.d)).resolves.toBe(0);
    expect(t.out).toEqual([USAGE]);
  });

  it('사용법 오류 → 2', async () => {
    const t = deps();
    await expect(run([], t.d)).resolves.toBe(2);
    expect(t.err[0]).toBe('log_viewer: missing <path> argument\n');
  });

  it('없는 파일 → 1 + 원인 출력', async () => {
    const t = deps();
    const fp = path.join(DIR, 'missing.log');
    await expect(run([fp], t.d)).resolves.toBe(1);
    expect(t.err).toEqual([`log_viewer: ${fp}: no such file\n`]);
    expect(t.viewer).not.toHaveBeenCalled();
  });

  it('설정 오류 → 2', async () => {
    const t = deps();
    const fp = path.join(DIR, 'app.log');
    fs.writeFileSync(fp, 'INFO a\n');
    await expect(run(['--config', path.join(DIR, 'nope.json'), fp], t.d)).resolves.toBe(2);
  });

  it('터미널이 아니면 → 2', async () => {
    const t = deps({ isInteractive: () => false });
    const fp = path.join(DIR, 'app.log');
    fs.writeFileSync(fp, 'INFO a\n');
    await expect(run([fp], t.d)).resolves.toBe(2);
    expect(t.err[0]).toBe('log_viewer: stdin and stdout must be a terminal\n');
  });

  it('정상 실행 → 뷰어에 인덱스와 설정 전달 후 0', async () => {
    const t = deps();
    const fp = path.join(DIR, 'app.log');
    fs.writeFileSync(fp, 'INFO a\nERROR b\n');
    await expect(run(['--ignore-case', fp], t.d)).resolves.toBe(0);
    expect(t.viewer).toHaveBeenCalledTimes(1);
    const [loaded, config] = t.viewer.mock.calls[0];
    expect(loaded.fileName).toBe('app.log');
    expect(loaded.index.lineCount).toBe(2);
    expect(config.search.caseSensitive).toBe(false);
    expect(t.err).toEqual([]);
  });
});

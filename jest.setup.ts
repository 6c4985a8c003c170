/// <reference types="jest" />
import * as fs from 'fs';
import * as path from 'path';

import { type CaptureResult, globalProfiler } from './src/core/logging/perf.js';

const __PERF_ON__ = process.env.PERF === '1';

// ── 테스트 중에만 console.* 활성화 + CustomConsole 우회 ───────────────
// (teardown 이후 늦게 오는 로그는 무시. 허용 시에도 process.stdout/stderr로 직접 출력)
let testActive = false;

const format = (args: unknown[]) => args.map((a) => (typeof a === 'string' ? a : JSON.stringify(a))).join(' ');

function guarded(stream: NodeJS.WriteStream) {
  return (...args: unknown[]) => {
    // 테스트 컨텍스트 밖(tear-down 포함)에서는 드랍
    if (!testActive) return;
    stream.write(format(args) + '\n');
  };
}

// 원본 대신 직접 writer 사용(= Jest CustomConsole를 거치지 않음)
console.log = guarded(process.stdout);
console.info = guarded(process.stdout);
console.debug = guarded(process.stdout);
console.warn = guarded(process.stderr);
console.error = guarded(process.stderr);

// 각 테스트 생명주기에 맞춰 on/off
beforeAll(() => {
  testActive = true;
});
beforeEach(() => {
  testActive = true;
});
afterEach(() => {
  testActive = false;
});

// ── PERF=1 일 때 테스트 전역 성능 캡처 on/off + 요약 출력 ──────────
beforeAll(() => {
  if (!__PERF_ON__) return;
  globalProfiler.enable();
  globalProfiler.startCapture();
});

afterAll(() => {
  if (!__PERF_ON__) return;
  testActive = true;
  const result: CaptureResult = globalProfiler.stopCapture();
  const { duration, analysis } = result;

  const top = Object.entries(analysis.functionSummary)
    .map(([name, s]) => ({ name, calls: s.count, total: s.totalTime, avg: s.avgTime, max: s.maxTime }))
    .sort((a, b) => b.total - a.total)
    .slice(0, 15);

  console.log('\n=== PERF (node/jest) ===');
  console.log(`duration: ${duration.toFixed(1)} ms`);
  console.table(
    top.map((r) => ({
      name: r.name,
      calls: r.calls,
      total_ms: r.total.toFixed(1),
      avg_ms: r.avg.toFixed(2),
      max_ms: r.max.toFixed(1),
    })),
  );
  if (analysis.insights.length) console.log('insights:', analysis.insights.join(' | '));

  // 성능 JSON 출력(옵션): <repo>/src/__test__/out/perf
  if (process.env.PERF_JSON === '1') {
    const testPath = expect.getState().testPath;
    const testBase = testPath ? path.basename(testPath).replace(/\.[^.]+$/, '') : 'unknown';
    const repoRoot = process.cwd();
    const outDir = process.env.PERF_JSON_DIR
      ? path.resolve(repoRoot, process.env.PERF_JSON_DIR)
      : path.resolve(repoRoot, 'src', '__test__', 'out', 'perf');
    fs.mkdirSync(outDir, { recursive: true });
    const worker = String(process.env.JEST_WORKER_ID || '0');
    const outPath = path.join(outDir, `perf-${testBase}-${Date.now()}-w${worker}.json`);
    const payload = {
      schema: 'log-viewer.perf.v1',
      ts: Date.now(),
      testFile: testPath ? path.relative(repoRoot, testPath) : undefined,
      node: process.versions.node,
      perf: result,
    };
    // 콘솔에는 JSON을 찍지 않고 파일에만 저장
    fs.writeFileSync(outPath, JSON.stringify(payload, null, 2), 'utf8');
  }

  testActive = false;
});

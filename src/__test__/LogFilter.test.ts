import { LogFilter, visibleIndices } from '../core/logs/LogFilter.js';
import { windowOf } from '../core/logs/Navigator.js';
import { LOG_LEVELS, SHOW_ALL } from '../core/logs/types.js';
import { indexOfLines } from './helpers/testFs.js';

const SAMPLE = ['a INFO x', 'b WARNING y', 'c ERROR z', 'd plain'];

describe('LogFilter', () => {
  it('ERROR 필터 → [2], 높이 2 창은 "c ERROR z" 하나', () => {
    const idx = indexOfLines(SAMPLE);
    const visible = visibleIndices(idx, { mode: 'level', level: 'ERROR' });
    expect(visible).toEqual([2]);
    const win = windowOf(visible, { topLine: 0, viewportHeight: 2 });
    expect(win.map((i) => idx.text(i))).toEqual(['c ERROR z']);
  });

  it('show all은 원래 순서 전체', () => {
    const idx = indexOfLines(SAMPLE);
    expect(visibleIndices(idx, SHOW_ALL)).toEqual([0, 1, 2, 3]);
  });

  it('모든 필터 결과는 [0, n)의 오름차순 부분열', () => {
    const lines = Array.from({ length: 200 }, (_, i) => `${i} ${LOG_LEVELS[i % 5] ?? 'plain'} msg`);
    const idx = indexOfLines(lines);
    for (const level of LOG_LEVELS) {
      const v = visibleIndices(idx, { mode: 'level', level });
      expect(v.length).toBeGreaterThan(0);
      for (let i = 0; i < v.length; i++) {
        expect(v[i]).toBeGreaterThanOrEqual(0);
        expect(v[i]).toBeLessThan(idx.lineCount);
        if (i > 0) expect(v[i]).toBeGreaterThan(v[i - 1]);
        expect(idx.level(v[i])).toBe(level);
      }
    }
  });

  it('같은 입력이면 같은 결과 (멱등)', () => {
    const idx = indexOfLines(SAMPLE);
    const f = { mode: 'level', level: 'WARNING' } as const;
    expect(visibleIndices(idx, f)).toEqual(visibleIndices(idx, f));
  });

  it('캐시: 같은 필터 키면 같은 배열 인스턴스(동결)', () => {
    const filter = new LogFilter(indexOfLines(SAMPLE));
    const a = filter.visible({ mode: 'level', level: 'ERROR' });
    const b = filter.visible({ mode: 'level', level: 'ERROR' });
    expect(a).toBe(b);
    expect(Object.isFrozen(a)).toBe(true);
    expect(filter.visible(SHOW_ALL)).not.toBe(a);
  });

  it('레벨 토큰이 없는 파일: 모든 레벨 필터가 빈 결과', () => {
    const idx = indexOfLines(['alpha', 'beta', 'gamma']);
    for (const level of LOG_LEVELS) {
      expect(visibleIndices(idx, { mode: 'level', level })).toEqual([]);
    }
    expect(visibleIndices(idx, SHOW_ALL)).toEqual([0, 1, 2]);
  });
});

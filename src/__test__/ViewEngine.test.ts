import { ViewEngine } from '../core/viewer/ViewEngine.js';
import { indexOfLines } from './helpers/testFs.js';

const SAMPLE = ['a INFO x', 'b WARNING y', 'c ERROR z', 'd plain'];
const DISK = ['INFO boot', 'ERROR disk full', 'INFO disk ok', 'ERROR net down', 'WARNING disk slow'];

describe('ViewEngine', () => {
  it('필터 ERROR → 창에는 "c ERROR z"만', () => {
    const engine = new ViewEngine(indexOfLines(SAMPLE));
    const s = engine.setFilter(engine.initialState(2, true), { mode: 'level', level: 'ERROR' });
    expect(s.visible).toEqual([2]);
    expect(engine.window(s)).toEqual([
      { index: 2, position: 0, text: 'c ERROR z', level: 'ERROR', match: false, currentMatch: false },
    ]);
  });

  it('"y" 검색: 매치 [1], next는 같은 매치로 감긴다', () => {
    const engine = new ViewEngine(indexOfLines(SAMPLE));
    const s = engine.setQuery(engine.initialState(2, true), 'y');
    expect(s.search.matches).toEqual([1]);
    expect(s.search.cursor).toBe(0);

    const n = engine.nextMatch(s);
    expect(n.search.cursor).toBe(0);
    expect(engine.status(n)).toMatchObject({ matchCount: 1, matchNumber: 1, matchLine: 1 });

    const rows = engine.window(n);
    expect(rows.map((r) => r.index)).toEqual([0, 1]);
    expect(rows[1]).toMatchObject({ match: true, currentMatch: true });
    expect(rows[0]).toMatchObject({ match: false, currentMatch: false });
  });

  it('레벨 토큰이 없는 파일: 필터는 비고, 스크롤/검색은 정상', () => {
    const engine = new ViewEngine(indexOfLines(['alpha', 'beta', 'gamma']));
    const init = engine.initialState(2, true);
    for (const level of ['INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const) {
      const f = engine.toggleFilter(init, level);
      expect(f.visible).toEqual([]);
      expect(engine.window(f)).toEqual([]);
      expect(engine.status(f)).toMatchObject({ visibleCount: 0, totalLines: 3, percent: 100 });
    }
    expect(engine.scroll(init, 5).view.topLine).toBe(1);
    expect(engine.setQuery(init, 'a').search.matches).toEqual([0, 1, 2]);
  });

  it('필터 변경 시 검색을 다시 계산한다 (인덱스 → 필터 → 검색)', () => {
    const engine = new ViewEngine(indexOfLines(DISK));
    const searched = engine.setQuery(engine.initialState(10, true), 'disk');
    expect(searched.search.matches).toEqual([1, 2, 4]);

    const filtered = engine.toggleFilter(searched, 'ERROR');
    expect(filtered.visible).toEqual([1, 3]);
    expect(filtered.search.matches).toEqual([0]);
    expect(filtered.search.source).toBe(filtered.visible);

    const back = engine.toggleFilter(filtered, 'ERROR');
    expect(back.filter).toEqual({ mode: 'all' });
    expect(back.visible).toBe(searched.visible);
    expect(back.search.matches).toEqual([1, 2, 4]);
    expect(back.search.cursor).toBe(0);
  });

  it('오래된 검색 상태는 next 전에 다시 계산한다', () => {
    const engine = new ViewEngine(indexOfLines(DISK));
    const init = engine.initialState(10, true);
    const searched = engine.setQuery(init, 'disk');
    const filtered = engine.setFilter(init, { mode: 'level', level: 'ERROR' });
    const stale = { ...filtered, search: searched.search };

    const next = engine.nextMatch(stale);
    expect(next.search.source).toBe(filtered.visible);
    expect(next.search.matches).toEqual([0]);
    expect(next.search.cursor).toBe(0);
  });

  it('필터를 바꿔도 화면 맨 위의 원래 라인 근처를 유지한다', () => {
    const lines = Array.from({ length: 100 }, (_, i) => (i % 2 === 0 ? `INFO ${i}` : `WARNING ${i}`));
    const engine = new ViewEngine(indexOfLines(lines));
    const at40 = engine.scroll(engine.initialState(10, true), 40);
    expect(at40.view.topLine).toBe(40);

    const warn = engine.setFilter(at40, { mode: 'level', level: 'WARNING' });
    expect(warn.view.topLine).toBe(20);
    expect(engine.window(warn)[0].index).toBe(41);
  });

  it('매치로 이동하면 뷰가 매치를 보여준다 (center / top)', () => {
    const lines = Array.from({ length: 100 }, (_, i) => (i === 80 ? 'needle here' : `line ${i}`));
    const idx = indexOfLines(lines);

    const center = new ViewEngine(idx);
    expect(center.setQuery(center.initialState(10, true), 'needle').view.topLine).toBe(76);

    const top = new ViewEngine(idx, { jumpAlign: 'top' });
    expect(top.setQuery(top.initialState(10, true), 'needle').view.topLine).toBe(80);
  });

  it('대소문자 토글은 매치를 다시 계산한다', () => {
    const engine = new ViewEngine(indexOfLines(['Error one', 'ERROR two']));
    const sensitive = engine.setQuery(engine.initialState(5, true), 'error');
    expect(sensitive.search.matches).toEqual([]);
    expect(engine.status(sensitive)).toMatchObject({ query: 'error', matchCount: 0, matchNumber: 0 });

    const insensitive = engine.setCaseSensitive(sensitive, false);
    expect(insensitive.search.caseSensitive).toBe(false);
    expect(insensitive.search.matches).toEqual([0, 1]);
    expect(insensitive.search.cursor).toBe(0);
  });

  it('clearQuery / 빈 검색어 제출은 검색을 끈다', () => {
    const engine = new ViewEngine(indexOfLines(SAMPLE));
    const s = engine.setQuery(engine.initialState(4, true), 'y');
    for (const cleared of [engine.clearQuery(s), engine.setQuery(s, '')]) {
      expect(cleared.search.query).toBe('');
      expect(cleared.search.matches).toEqual([]);
      expect(cleared.search.cursor).toBeUndefined();
    }
  });

  it('빈 파일도 모든 핸들러가 동작한다', () => {
    const engine = new ViewEngine(indexOfLines([]));
    let s = engine.initialState(5, true);
    s = engine.scroll(s, 3);
    s = engine.scrollPage(s, -2);
    s = engine.scrollToBottom(s);
    s = engine.setQuery(s, 'x');
    s = engine.nextMatch(s);
    s = engine.prevMatch(s);
    expect(s.visible).toEqual([]);
    expect(s.view.topLine).toBe(0);
    expect(s.search.cursor).toBeUndefined();
    expect(engine.window(s)).toEqual([]);
  });

  it('status: 스크롤 퍼센트와 resize 클램프', () => {
    const lines = Array.from({ length: 100 }, (_, i) => `line ${i}`);
    const engine = new ViewEngine(indexOfLines(lines));
    const s = engine.scroll(engine.initialState(10, true), 45);
    expect(engine.status(s).percent).toBe(50);

    const bigger = engine.resize(s, 80);
    expect(bigger.view).toEqual({ topLine: 20, viewportHeight: 80 });
    expect(engine.status(bigger).percent).toBe(100);
  });

  it('NaN 스크롤은 상태를 그대로 둔다', () => {
    const engine = new ViewEngine(indexOfLines(Array.from({ length: 30 }, (_, i) => `line ${i}`)));
    const s = engine.scroll(engine.initialState(10, true), 5);
    expect(engine.scroll(s, NaN)).toBe(s);
    expect(engine.scrollPage(s, NaN)).toBe(s);
    expect(engine.resize(s, NaN).view).toEqual({ topLine: 5, viewportHeight: 10 });
  });
});

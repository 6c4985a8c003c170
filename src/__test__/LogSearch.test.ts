import {
  createSearch,
  currentMatch,
  emptySearch,
  findMatches,
  LogSearch,
  nextMatch,
  prevMatch,
} from '../core/logs/LogSearch.js';
import { indexOfLines } from './helpers/testFs.js';

const SAMPLE = ['a INFO x', 'b WARNING y', 'c ERROR z', 'd plain'];
const ALL = [0, 1, 2, 3];

describe('LogSearch', () => {
  it('"y" 검색 → 가시 위치 [1], 유일 매치라 next도 [1]로 감긴다', () => {
    const idx = indexOfLines(SAMPLE);
    expect(findMatches(ALL, idx, 'y')).toEqual([1]);
    const s = createSearch(ALL, idx, 'y', true);
    expect(s.cursor).toBe(0);
    const n = nextMatch(s);
    expect(n.cursor).toBe(0);
    expect(currentMatch(n)).toBe(1);
  });

  it('wraparound: len(matches)번 next/prev 하면 제자리', () => {
    const idx = indexOfLines(['hit 0', 'miss', 'hit 2', 'hit 3', 'miss']);
    const visible = [0, 1, 2, 3, 4];
    const s = createSearch(visible, idx, 'hit', true);
    expect(s.matches).toEqual([0, 2, 3]);

    let fwd = s;
    for (let i = 0; i < s.matches.length; i++) fwd = nextMatch(fwd);
    expect(fwd.cursor).toBe(s.cursor);

    let back = s;
    for (let i = 0; i < s.matches.length; i++) back = prevMatch(back);
    expect(back.cursor).toBe(s.cursor);
  });

  it('처음에서 prev → 마지막, 마지막에서 next → 처음', () => {
    const idx = indexOfLines(['hit', 'hit', 'hit']);
    const s = createSearch([0, 1, 2], idx, 'hit', true);
    expect(prevMatch(s).cursor).toBe(2);
    expect(nextMatch({ ...s, cursor: 2 }).cursor).toBe(0);
  });

  it('대소문자 구분 옵션', () => {
    const idx = indexOfLines(['Disk ERROR full', 'disk ok']);
    expect(findMatches([0, 1], idx, 'error', { caseSensitive: true })).toEqual([]);
    expect(findMatches([0, 1], idx, 'error', { caseSensitive: false })).toEqual([0]);
    expect(findMatches([0, 1], idx, 'DISK', { caseSensitive: false })).toEqual([0, 1]);
  });

  it('빈 검색어는 매치 없음, 커서 없음', () => {
    const idx = indexOfLines(SAMPLE);
    expect(findMatches(ALL, idx, '')).toEqual([]);
    const s = createSearch(ALL, idx, '', true);
    expect(s.matches).toEqual([]);
    expect(s.cursor).toBeUndefined();
    expect(emptySearch(false)).toEqual({ query: '', caseSensitive: false, matches: [], cursor: undefined, source: [] });
  });

  it('매치가 없으면 next/prev는 같은 상태를 돌려준다', () => {
    const idx = indexOfLines(SAMPLE);
    const s = createSearch(ALL, idx, 'nothing-here', true);
    expect(s.cursor).toBeUndefined();
    expect(nextMatch(s)).toBe(s);
    expect(prevMatch(s)).toBe(s);
    expect(currentMatch(s)).toBeUndefined();
  });

  it('anchor 이후 첫 매치에서 시작, 없으면 처음으로', () => {
    const idx = indexOfLines(['hit', 'x', 'hit', 'hit', 'x']);
    const search = new LogSearch(idx);
    const visible = [0, 1, 2, 3, 4];
    expect(search.create(visible, 'hit', true, 1).cursor).toBe(1);
    expect(search.create(visible, 'hit', true, 4).cursor).toBe(0);
  });

  it('결과는 원래 인덱스가 아니라 가시 위치', () => {
    const idx = indexOfLines(['INFO a', 'ERROR b', 'INFO c', 'ERROR needle']);
    // ERROR 필터 결과 [1, 3]
    expect(findMatches([1, 3], idx, 'needle')).toEqual([1]);
  });
});

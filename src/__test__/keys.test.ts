import { isPrintable, keyToMsg } from '../tui/keys.js';

describe('keyToMsg', () => {
  describe('normal', () => {
    it.each([
      [{ name: 'j', sequence: 'j' }, { type: 'ScrollLines', delta: 1 }],
      [{ name: 'up', sequence: '\x1b[A' }, { type: 'ScrollLines', delta: -1 }],
      [{ name: 'space', sequence: ' ' }, { type: 'ScrollPages', pages: 1 }],
      [{ name: 'd', sequence: '\x04', ctrl: true }, { type: 'ScrollPages', pages: 1 }],
      [{ name: 'u', sequence: '\x15', ctrl: true }, { type: 'ScrollPages', pages: -1 }],
      [{ name: 'g', sequence: 'g' }, { type: 'ScrollTop' }],
      [{ name: 'g', sequence: 'G', shift: true }, { type: 'ScrollBottom' }],
      [{ sequence: '/' }, { type: 'OpenSearch' }],
      [{ name: 's', sequence: 's' }, { type: 'OpenSearch' }],
      [{ name: 'n', sequence: 'n' }, { type: 'NextMatch' }],
      [{ name: 'n', sequence: 'N', shift: true }, { type: 'PrevMatch' }],
      [{ name: 'i', sequence: 'I', shift: true }, { type: 'ToggleCase' }],
      [{ name: 'escape', sequence: '\x1b' }, { type: 'ClearSearch' }],
      [{ name: 'f', sequence: 'f' }, { type: 'OpenFilterSelect' }],
      [{ name: 'q', sequence: 'q' }, { type: 'Quit' }],
      [{ name: 'c', sequence: '\x03', ctrl: true }, { type: 'Quit' }],
    ])('%o', (key, msg) => {
      expect(keyToMsg('normal', key)).toEqual(msg);
    });

    it('모르는 키는 무시', () => {
      expect(keyToMsg('normal', { name: 'x', sequence: 'x' })).toBeUndefined();
      expect(keyToMsg('normal', { name: 'z', sequence: '\x1a', ctrl: true })).toBeUndefined();
    });
  });

  describe('filterSelect', () => {
    it.each([
      ['i', { type: 'ToggleLevel', level: 'INFO' }],
      ['w', { type: 'ToggleLevel', level: 'WARNING' }],
      ['e', { type: 'ToggleLevel', level: 'ERROR' }],
      ['c', { type: 'ToggleLevel', level: 'CRITICAL' }],
      ['a', { type: 'ShowAll', close: false }],
      ['f', { type: 'ShowAll', close: true }],
    ])('%s', (ch, msg) => {
      expect(keyToMsg('filterSelect', { name: ch, sequence: ch })).toEqual(msg);
    });

    it('Esc는 모드만 빠져나간다', () => {
      expect(keyToMsg('filterSelect', { name: 'escape', sequence: '\x1b' })).toEqual({ type: 'CloseFilterSelect' });
      expect(keyToMsg('filterSelect', { name: 'j', sequence: 'j' })).toBeUndefined();
    });
  });

  describe('search', () => {
    it('문자는 그대로 입력 (q, 공백, 한글 포함)', () => {
      expect(keyToMsg('search', { name: 'q', sequence: 'q' })).toEqual({ type: 'PromptInsert', text: 'q' });
      expect(keyToMsg('search', { name: 'space', sequence: ' ' })).toEqual({ type: 'PromptInsert', text: ' ' });
      expect(keyToMsg('search', { sequence: '한' })).toEqual({ type: 'PromptInsert', text: '한' });
    });

    it.each([
      [{ name: 'return', sequence: '\r' }, { type: 'SubmitSearch' }],
      [{ name: 'backspace', sequence: '\x7f' }, { type: 'PromptBackspace' }],
      [{ name: 'delete', sequence: '\x1b[3~' }, { type: 'PromptDelete' }],
      [{ name: 'left', sequence: '\x1b[D' }, { type: 'PromptCursor', delta: -1 }],
      [{ name: 'right', sequence: '\x1b[C' }, { type: 'PromptCursor', delta: 1 }],
      [{ name: 'escape', sequence: '\x1b' }, { type: 'CancelSearch' }],
      [{ name: 'c', sequence: '\x03', ctrl: true }, { type: 'CancelSearch' }],
      [{ name: 'a', sequence: '\x01', ctrl: true }, { type: 'PromptHome' }],
    ])('%o', (key, msg) => {
      expect(keyToMsg('search', key)).toEqual(msg);
    });

    it('제어 문자는 입력하지 않는다', () => {
      expect(keyToMsg('search', { name: 'tab', sequence: '\t' })).toBeUndefined();
      expect(isPrintable({ sequence: 'x', meta: true })).toBe(false);
      expect(isPrintable({})).toBe(false);
    });
  });
});

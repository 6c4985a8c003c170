import * as fs from 'fs';
import * as path from 'path';

import { loadLogFile } from '../core/logs/LogFileLoader.js';
import { ErrorCategory } from '../shared/errors.js';
import { cleanDir, prepareUniqueOutDir } from './helpers/testFs.js';

let DIR: string;
beforeEach(() => {
  DIR = prepareUniqueOutDir('loader');
});
afterEach(() => cleanDir(DIR));

describe('loadLogFile', () => {
  it('파일을 읽어 인덱스를 만든다 (EOF 개행 없어도 마지막 라인 포함)', async () => {
    const fp = path.join(DIR, 'app.log');
    fs.writeFileSync(fp, 'INFO start\r\nERROR broken\nlast line', 'utf8');
    const loaded = await loadLogFile(fp);
    expect(loaded.fileName).toBe('app.log');
    expect(loaded.index.lineCount).toBe(3);
    expect(loaded.index.text(1)).toBe('ERROR broken');
    expect(loaded.index.text(2)).toBe('last line');
  });

  it('빈 파일은 0 라인', async () => {
    const fp = path.join(DIR, 'empty.log');
    fs.writeFileSync(fp, '');
    expect((await loadLogFile(fp)).index.lineCount).toBe(0);
  });

  it('없는 파일 → XError(Io)', async () => {
    const fp = path.join(DIR, 'missing.log');
    await expect(loadLogFile(fp)).rejects.toMatchObject({
      category: ErrorCategory.Io,
      message: `${fp}: no such file`,
    });
  });

  it('디렉터리 → XError(Io)', async () => {
    await expect(loadLogFile(DIR)).rejects.toMatchObject({
      category: ErrorCategory.Io,
      message: `${DIR}: is a directory`,
    });
  });

  it('텍스트가 아닌 파일 → XError(Io)', async () => {
    const fp = path.join(DIR, 'bin.log');
    fs.writeFileSync(fp, Buffer.from([0xc3, 0x28, 0x0a]));
    await expect(loadLogFile(fp)).rejects.toMatchObject({
      category: ErrorCategory.Io,
      message: 'file is not valid UTF-8 text',
    });
  });
});

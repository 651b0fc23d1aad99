import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readWorkbook } from '../readers/WorkbookReader';
import type { SheetData } from '../types';
import { CosmicErrorType } from '../utils/errorUtils';
import { extractFiles } from '../utils/zipUtils';
import { packageWorkbook, writeWorkbook } from '../writers/WorkbookPackager';

const sheets: SheetData[] = [
  { name: 'Summary', rows: [['Metric', 'Value'], ['Total CFP', 8]] },
  { name: 'Dates', rows: [['Day', new Date(Date.UTC(2024, 0, 1))], [null, 'x']] },
  { name: 'Empty', rows: [] },
];

describe('packageWorkbook', () => {
  it('stores the five fixed parts and one part per sheet', async () => {
    const files = await extractFiles(await packageWorkbook(sheets), () => true);
    expect(files.map(f => f.path)).toEqual([
      '[Content_Types].xml',
      '_rels/.rels',
      'xl/workbook.xml',
      'xl/_rels/workbook.xml.rels',
      'xl/styles.xml',
      'xl/worksheets/sheet1.xml',
      'xl/worksheets/sheet2.xml',
      'xl/worksheets/sheet3.xml',
    ]);

    const contentTypes = files[0].content.toString('utf8');
    for (const file of files.filter(f => f.path.startsWith('xl/worksheets/'))) {
      expect(contentTypes).toContain(`PartName="/${file.path}"`);
    }
  });

  it('produces identical bytes for identical sheets', async () => {
    const first = await packageWorkbook(sheets);
    const second = await packageWorkbook(sheets);
    expect(first.equals(second)).toBe(true);
  });

  it('can be read back from a buffer', async () => {
    const contents = await readWorkbook(await packageWorkbook(sheets));
    expect(contents.sheets.map(s => s.name)).toEqual(['Summary', 'Dates', 'Empty']);
    expect(contents.sheets[0].rows).toEqual([['Metric', 'Value'], ['Total CFP', 8]]);
    expect(contents.sheets[1].rows).toEqual([['Day', 45292], [null, 'x']]);
    expect(contents.sheets[2].rows).toEqual([]);
  });
});

describe('writeWorkbook', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cosmic-cfp-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the archive and returns the absolute path', async () => {
    const target = path.join(dir, 'report.xlsx');
    await expect(writeWorkbook(sheets, target, {})).resolves.toBe(target);
    expect(fs.readdirSync(dir)).toEqual(['report.xlsx']);

    const contents = await readWorkbook(target);
    expect(contents.parts).toHaveLength(8);
  });

  it('replaces an existing file', async () => {
    const target = path.join(dir, 'report.xlsx');
    fs.writeFileSync(target, 'old');
    await writeWorkbook(sheets, target, {});
    expect(fs.readFileSync(target).subarray(0, 2).toString('latin1')).toBe('PK');
  });

  it('fails with the target path and leaves no file behind', async () => {
    const target = path.join(dir, 'missing', 'report.xlsx');
    await expect(writeWorkbook(sheets, target, {})).rejects.toMatchObject({ type: CosmicErrorType.WRITE_FAILED });
    await expect(writeWorkbook(sheets, target, {})).rejects.toThrow(target);
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('removes the temporary file when the rename fails', async () => {
    const target = path.join(dir, 'taken');
    fs.mkdirSync(target);
    await expect(writeWorkbook(sheets, target, {})).rejects.toMatchObject({ type: CosmicErrorType.WRITE_FAILED });
    expect(fs.readdirSync(dir)).toEqual(['taken']);
  });
});

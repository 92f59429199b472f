import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { ClassificationResult } from '../types/index.js';
import { CsvStreamWriter, csvEscape, formatCsvLine, resultToRow, writeCsv } from './writer.js';

const result: ClassificationResult = {
  comment: {
    text: '30匹, 大漁 "最高"\n次も行く',
    postedAt: '2025年04月01日 23:15',
    sourceUrl: 'https://example.test/board/',
    pageIndex: 1,
  },
  label: 'moderate',
  source: 'local',
  reason: 'quantity 30',
};

describe('csvEscape', () => {
  it('quotes fields with separators and flattens newlines', () => {
    expect(csvEscape('plain')).toBe('plain');
    expect(csvEscape('a,b')).toBe('"a,b"');
    expect(csvEscape('say "hi"')).toBe('"say ""hi"""');
    expect(csvEscape('line\r\nbreak')).toBe('"line break"');
  });
});

describe('formatCsvLine', () => {
  it('writes the columns in header order', () => {
    expect(formatCsvLine(resultToRow(result))).toBe(
      '2025年04月01日 23:15,"30匹, 大漁 ""最高"" 次も行く",moderate,https://example.test/board/,1',
    );
  });
});

describe('CSV files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'surge-csv-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts with a byte-order mark and the header', async () => {
    const file = path.join(dir, 'nested', 'out.csv');
    await writeCsv(file, [resultToRow(result)]);

    expect(await readFile(file, 'utf8')).toBe(
      '\uFEFFdate,comment,surge_level,source_url,page_number\n' +
        '2025年04月01日 23:15,"30匹, 大漁 ""最高"" 次も行く",moderate,https://example.test/board/,1\n',
    );
  });

  it('streams rows as they arrive', async () => {
    const file = path.join(dir, 'backup.csv');
    const writer = await CsvStreamWriter.create(file);
    await writer.writeRow({ ...resultToRow(result), comment: 'いない', surge_level: 'none' });
    await writer.close();

    const lines = (await readFile(file, 'utf8')).split('\n');
    expect(lines[1]).toBe('2025年04月01日 23:15,いない,none,https://example.test/board/,1');
    expect(writer.path).toBe(file);
  });

  it('rejects later writes once the file cannot be opened', async () => {
    const writer = await CsvStreamWriter.create(dir);

    await expect(writer.close()).rejects.toThrow(/^EISDIR/);
    await expect(writer.writeRow(resultToRow(result))).rejects.toThrow(/^EISDIR/);
  });

  it('reports an unwritable destination instead of hanging', async () => {
    await expect(writeCsv(dir, [resultToRow(result)])).rejects.toThrow(/^EISDIR/);
  });
});

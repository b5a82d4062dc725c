import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { readRecords } from '../../../src/lib/reader/index.js';
import { zipRow } from '../../../src/lib/reader/delimited-reader.js';
import type { SourceRecord } from '../../../src/types/records.js';
import { InputReadError, UnsupportedFileTypeError } from '../../../src/utils/errors.js';
import { createTempDir, removeTempDir, writeTempFile } from '../../helpers/temp-dir.js';

async function collect(records: AsyncIterable<SourceRecord>): Promise<SourceRecord[]> {
  const collected: SourceRecord[] = [];
  for await (const record of records) {
    collected.push(record);
  }
  return collected;
}

describe('zipRow', () => {
  it('should pair headers and values by position', () => {
    expect(zipRow(['a', 'b'], ['1', '2'])).toEqual({ a: '1', b: '2' });
  });

  it('should leave out keys for short rows and drop extra columns', () => {
    expect(zipRow(['a', 'b', 'c'], ['1'])).toEqual({ a: '1' });
    expect(zipRow(['a'], ['1', '2', '3'])).toEqual({ a: '1' });
  });
});

describe('readRecords', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('csv', () => {
    it('should use the first row as headers', async () => {
      const file = await writeTempFile(dir, 'events.csv', 'id,name\n1,alice\n2,"bob, jr"\n');

      expect(await collect(readRecords(file))).toEqual([
        { record: { id: '1', name: 'alice' }, line: 2 },
        { record: { id: '2', name: 'bob, jr' }, line: 3 },
      ]);
    });

    it('should tolerate ragged rows', async () => {
      const file = await writeTempFile(dir, 'events.csv', 'a,b,c\n1,2\n1,2,3,4\n');

      expect(await collect(readRecords(file))).toEqual([
        { record: { a: '1', b: '2' }, line: 2 },
        { record: { a: '1', b: '2', c: '3' }, line: 3 },
      ]);
    });

    it('should honour a custom separator', async () => {
      const file = await writeTempFile(dir, 'events.csv', 'a;b\n1;2\n');

      expect(await collect(readRecords(file, { separator: ';' }))).toEqual([
        { record: { a: '1', b: '2' }, line: 2 },
      ]);
    });

    it('should fail with InputReadError for missing files', async () => {
      await expect(collect(readRecords(join(dir, 'missing.csv')))).rejects.toThrow(InputReadError);
    });
  });

  describe('tsv', () => {
    it('should treat every line as data when headers are supplied', async () => {
      const file = await writeTempFile(dir, 'events.tsv', '1\t2\n3\t4\n');

      expect(await collect(readRecords(file, { headers: ['a', 'b'] }))).toEqual([
        { record: { a: '1', b: '2' }, line: 1 },
        { record: { a: '3', b: '4' }, line: 2 },
      ]);
    });

    it('should read .txt files as tab separated', async () => {
      const file = await writeTempFile(dir, 'events.txt', 'a\tb\nx,y\tz\n');

      expect(await collect(readRecords(file))).toEqual([
        { record: { a: 'x,y', b: 'z' }, line: 2 },
      ]);
    });
  });

  describe('json', () => {
    it('should yield one record per top-level object', async () => {
      const file = await writeTempFile(
        dir,
        'events.json',
        '{"a":1}\n[1,2]\n{"b":\n  {"c":true}}\n',
      );

      expect(await collect(readRecords(file))).toEqual([
        { record: { a: 1 }, line: 1 },
        { record: { b: { c: true } }, line: 3 },
      ]);
    });

    it('should fail on malformed values with their line', async () => {
      const file = await writeTempFile(dir, 'events.ndjson', '{"a":1}\n{"a":}\n');

      await expect(collect(readRecords(file))).rejects.toThrow(
        `Invalid JSON value on line 2 of ${file}`,
      );
    });

    it('should read a csv file as json when told to', async () => {
      const file = await writeTempFile(dir, 'events.csv', '{"a":"b"}');

      expect(await collect(readRecords(file, { fileType: 'json' }))).toEqual([
        { record: { a: 'b' }, line: 1 },
      ]);
    });
  });

  it('should reject unsupported files before reading', () => {
    expect(() => readRecords(join(dir, 'events.xml'))).toThrow(UnsupportedFileTypeError);
  });
});

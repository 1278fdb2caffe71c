import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'path';
import { readJsonDocument, readTextDocument, timestampedPath, writeJsonDocument } from '../outputs';
import { localDate, makeTempDir, removeDir } from './helpers';

describe('outputs', () => {
  let dir = '';

  afterEach(() => {
    if (dir) removeDir(dir);
  });

  it('names files after the local time', () => {
    expect(timestampedPath('out', 'campaign_calendar', 'json', localDate(2024, 3, 5, 7, 8, 9))).toBe(
      join('out', 'campaign_calendar_20240305_070809.json')
    );
  });

  it('creates missing directories when writing', () => {
    dir = makeTempDir();
    const file = join(dir, 'nested', 'deeper', 'doc.json');
    writeJsonDocument(file, { a: [1, 2] });
    expect(readJsonDocument(file)).toEqual({ a: [1, 2] });
  });

  it('reads missing files as null', () => {
    dir = makeTempDir();
    expect(readJsonDocument(join(dir, 'none.json'))).toBeNull();
    expect(readTextDocument(join(dir, 'none.txt'))).toBeNull();
  });
});

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { rotateFile } from '../src/utils/rotateFile.js';

const NOW = new Date('2024-01-02T12:00:00Z');

describe('rotateFile', () => {
  let dir: string;

  const write = (name: string, content = 'x') => fs.writeFileSync(path.join(dir, name), content);

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lanlure-rotate-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('renames the file with the current date', () => {
    write('app.log', 'today');

    const rotated = rotateFile({ dir, filename: 'app.log', now: NOW });

    expect(rotated).toBe(path.join(dir, 'app-2024-01-02.log'));
    expect(fs.existsSync(path.join(dir, 'app.log'))).toBe(false);
    expect(fs.readFileSync(path.join(dir, 'app-2024-01-02.log'), 'utf8')).toBe('today');
  });

  it('rotates at most once per day', () => {
    write('app-2024-01-02.log', 'first');
    write('app.log', 'second');

    expect(rotateFile({ dir, filename: 'app.log', now: NOW })).toBeUndefined();
    expect(fs.readFileSync(path.join(dir, 'app.log'), 'utf8')).toBe('second');
    expect(fs.readFileSync(path.join(dir, 'app-2024-01-02.log'), 'utf8')).toBe('first');
  });

  it('returns nothing when there is no file to rotate', () => {
    expect(rotateFile({ dir, filename: 'app.log', now: NOW })).toBeUndefined();
  });

  it('deletes rotated copies past the retention period', () => {
    write('app-2023-12-01.log');
    write('app-2024-01-01.log');
    write('other-2023-01-01.log');
    write('app-notes.log');

    rotateFile({ dir, filename: 'app.log', retentionDays: 7, now: NOW });

    expect(fs.readdirSync(dir).sort()).toEqual([
      'app-2024-01-01.log',
      'app-notes.log',
      'other-2023-01-01.log',
    ]);
  });
});

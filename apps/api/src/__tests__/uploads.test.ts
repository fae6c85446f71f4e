import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { pruneUploads, saveUpload } from '../ingest/uploads';

const HOUR = 60 * 60 * 1000;
let dir = '';

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'order-canon-uploads-'));
  vi.spyOn(console, 'info').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('saveUpload', () => {
  it('writes the buffer under a sanitised, time-prefixed id', async () => {
    const fileId = await saveUpload(path.join(dir, 'uploads'), 'March export (1).csv', Buffer.from('a,b\n'), 1700000000000);
    expect(fileId).toMatch(/^1700000000000-[a-z0-9]+-March_export__1_\.csv$/);
    expect(fs.readFileSync(path.join(dir, 'uploads', fileId), 'utf8')).toBe('a,b\n');
  });
});

describe('pruneUploads', () => {
  it('removes only files older than the retention window', async () => {
    const now = Date.now();
    fs.writeFileSync(path.join(dir, 'old.csv'), 'x');
    fs.writeFileSync(path.join(dir, 'fresh.csv'), 'y');
    const old = new Date(now - 30 * HOUR);
    fs.utimesSync(path.join(dir, 'old.csv'), old, old);

    const removed = await pruneUploads(dir, 24 * HOUR, now);
    expect(removed).toEqual(['old.csv']);
    expect(fs.readdirSync(dir)).toEqual(['fresh.csv']);
  });

  it('treats a missing directory as empty', async () => {
    expect(await pruneUploads(path.join(dir, 'missing'), HOUR)).toEqual([]);
  });
});

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { vi } from 'vitest';

export function silentLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function makeTempDir() {
  return mkdtempSync(join(tmpdir(), 'campaign-pipeline-'));
}

export function removeDir(dir: string) {
  rmSync(dir, { recursive: true, force: true });
}

// Local wall-clock time, matching how ISO strings without an offset are parsed.
export function localDate(y: number, m: number, d: number, hh = 0, mm = 0, ss = 0) {
  return new Date(y, m - 1, d, hh, mm, ss);
}

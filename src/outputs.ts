import { LowSync, JSONFileSync, TextFileSync } from 'lowdb';
import { dirname, join } from 'path';
import { existsSync, mkdirSync } from 'fs';
import { format } from 'date-fns';


function ensureDir(dir: string) {
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
}


// Whole-document JSON write through lowdb. Parent directories are created.
export function writeJsonDocument<T>(file: string, data: T) {
  ensureDir(dirname(file));
  const db = new LowSync<T>(new JSONFileSync<T>(file));
  db.data = data;
  db.write();
}


// Returns null when the file does not exist.
export function readJsonDocument(file: string): unknown {
  const db = new LowSync<unknown>(new JSONFileSync<unknown>(file));
  db.read();
  return db.data;
}


export function writeTextDocument(file: string, text: string) {
  ensureDir(dirname(file));
  new TextFileSync(file).write(text);
}


export function readTextDocument(file: string) {
  return new TextFileSync(file).read();
}


// outputs/<prefix>_20240101_090000.<ext>
export function timestampedPath(outputDir: string, prefix: string, ext: string, at: Date = new Date()) {
  return join(outputDir, `${prefix}_${format(at, 'yyyyMMdd_HHmmss')}.${ext}`);
}

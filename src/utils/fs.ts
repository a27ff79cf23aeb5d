import {
  mkdirSync,
  readdirSync,
  rmSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';

export function ensureDir(path: string, mode?: number): void {
  mkdirSync(path, { recursive: true, mode });
}

export function dirExists(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function fileExists(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

export function pathExists(path: string): boolean {
  return dirExists(path) || fileExists(path);
}

/** Names of the entries of a directory, sorted; empty when unreadable. */
export function listEntries(path: string): string[] {
  try {
    return readdirSync(path).sort();
  } catch {
    return [];
  }
}

export function listDirs(path: string): string[] {
  return listEntries(path).filter((name) => dirExists(join(path, name)));
}

export function removeDir(path: string): void {
  rmSync(path, { recursive: true, force: true });
}

/** True when any file below `dir` ends with one of `exts`. Stops at the first hit. */
export function containsFileWithExt(dir: string, exts: string[]): boolean {
  let entries;
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch {
    return false;
  }
  for (const entry of entries) {
    if (entry.isFile() && exts.some((ext) => entry.name.endsWith(ext))) return true;
  }
  for (const entry of entries) {
    if (entry.isDirectory() && containsFileWithExt(join(dir, entry.name), exts)) return true;
  }
  return false;
}

export function isWritableDir(path: string): boolean {
  const probe = join(path, '.write-probe');
  try {
    writeFileSync(probe, 'ok', 'utf-8');
    unlinkSync(probe);
    return true;
  } catch {
    return false;
  }
}

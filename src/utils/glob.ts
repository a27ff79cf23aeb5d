import { join } from 'node:path';
import { minimatch } from 'minimatch';
import type { SearchGlob } from './platform.js';
import { dirExists, listDirs, listEntries } from './fs.js';

/**
 * Expands a directory glob one segment at a time. Only directories are
 * returned; results are sorted so expansion is deterministic.
 */
export function expandDirGlob(glob: SearchGlob, nocase = false): string[] {
  if (!dirExists(glob.base)) return [];
  let current = [glob.base];
  for (const segment of glob.pattern.split('/').filter(Boolean)) {
    const next: string[] = [];
    for (const dir of current) {
      for (const name of listDirs(dir)) {
        if (minimatch(name, segment, { nocase, dot: false })) {
          next.push(join(dir, name));
        }
      }
    }
    current = next;
  }
  return current;
}

/** File names in `dir` matching any of `patterns`. */
export function matchEntries(dir: string, patterns: string[], nocase = false): string[] {
  return listEntries(dir).filter((name) =>
    patterns.some((pattern) => minimatch(name, pattern, { nocase, dot: false })),
  );
}

/** Splits a search-path variable; empty entries are dropped. */
export function splitPathList(value: string | undefined, separator: string): string[] {
  return (value ?? '').split(separator).filter((p) => p.length > 0);
}

export function joinPathList(paths: string[], separator: string): string {
  return paths.join(separator);
}

/**
 * Splits a CMake-style list, which may use `;` whatever the host separator is.
 * On `:` hosts both separators are honoured.
 */
export function splitPrefixList(value: string | undefined, separator: string): string[] {
  const normalized = (value ?? '').split(';').join(separator);
  return splitPathList(normalized, separator);
}

export function dedupe<T>(items: Iterable<T>): T[] {
  return [...new Set(items)];
}

export function toCMakePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/** Lower-cased, forward-slashed form used by the layout heuristics. */
export function comparablePath(p: string): string {
  return toCMakePath(p).toLowerCase();
}

export function parseVersion(text: string): number[] {
  return (text.match(/\d+/g) ?? []).map(Number);
}

/** Numeric, part-by-part comparison; missing parts count as zero. */
export function compareVersions(a: number[], b: number[]): number {
  const len = Math.max(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

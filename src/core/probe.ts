import { extname, join } from 'node:path';
import type { PlatformProfile } from '../utils/platform.js';
import { containsFileWithExt, dirExists, fileExists, pathExists } from '../utils/fs.js';
import { matchEntries } from '../utils/glob.js';
import { comparablePath } from '../utils/paths.js';

// Pure predicates over the filesystem. Absence is always an empty result.

export const LIB_SUBDIRS = [
  'lib',
  'lib64',
  'lib/x86_64-linux-gnu',
  'lib/aarch64-linux-gnu',
  'lib/arm-linux-gnueabihf',
];

export const QT_MODULES = ['QtCore', 'QtGui', 'QtWidgets', 'QtOpenGL', 'QtOpenGLWidgets'];

// ── Toolkit (Qt 6) ──────────────────────────────────────────────────

export function qt6ConfigDir(prefix: string): string | null {
  const dir = join(prefix, 'lib', 'cmake', 'Qt6');
  return dirExists(dir) ? dir : null;
}

export function isQtPrefix(prefix: string): boolean {
  return qt6ConfigDir(prefix) !== null;
}

/** `<prefix>/lib` when it holds Qt frameworks (macOS installer layout). */
export function qtFrameworkDir(prefix: string): string | null {
  const lib = join(prefix, 'lib');
  return pathExists(join(lib, 'QtCore.framework')) ? lib : null;
}

export interface QtPluginDirs {
  plugins: string;
  platforms: string;
}

export function qtPluginDirs(prefix: string): QtPluginDirs | null {
  for (const plugins of [join(prefix, 'plugins'), join(prefix, 'lib', 'qt6', 'plugins')]) {
    const platforms = join(plugins, 'platforms');
    if (dirExists(platforms)) return { plugins, platforms };
  }
  return null;
}

// ── Math headers (Eigen) ────────────────────────────────────────────

const EIGEN_MARKER = join('Eigen', 'Core');

export function eigenLayoutCandidates(root: string): string[] {
  return [root, join(root, 'include', 'eigen3'), join(root, 'eigen3')];
}

/** The directory that makes `#include <Eigen/Core>` work for `root`, if any. */
export function eigenIncludeRoot(root: string): string | null {
  for (const candidate of eigenLayoutCandidates(root)) {
    if (fileExists(join(candidate, EIGEN_MARKER))) return candidate;
  }
  return null;
}

export function hasEigenHeaders(dir: string): boolean {
  return fileExists(join(dir, EIGEN_MARKER));
}

// ── Boundary library (Boost) ────────────────────────────────────────

export function boostHeaderDirCandidates(root: string): string[] {
  return [join(root, 'boost'), join(root, 'include', 'boost')];
}

export function hasBoostHeaders(root: string): boolean {
  return boostHeaderDirCandidates(root).some(
    (dir) => dirExists(dir) && containsFileWithExt(dir, ['.hpp', '.h']),
  );
}

export function hasBoostVersionHeader(root: string): boolean {
  return (
    fileExists(join(root, 'boost', 'version.hpp')) ||
    fileExists(join(root, 'include', 'boost', 'version.hpp'))
  );
}

// ── Prefix shape ────────────────────────────────────────────────────

/**
 * Entries that name a header directory rather than a prefix: anything ending
 * in `include` or inside one, and Eigen's `eigen3` directory.
 */
export function isRawIncludeDir(p: string): boolean {
  const low = comparablePath(p).replace(/\/+$/, '');
  return (
    low.endsWith('/include') ||
    low === 'include' ||
    low.includes('/include/') ||
    low.endsWith('/eigen3')
  );
}

export function hasLibDir(prefix: string): boolean {
  return LIB_SUBDIRS.slice(0, 2).some((sub) => dirExists(join(prefix, sub)));
}

// ── Library files ───────────────────────────────────────────────────

/**
 * Library files for `base` directly under `libDir`. Link-time artifacts sort
 * before runtime-only ones, then by path.
 */
export function findLibFiles(libDir: string, base: string, platform: PlatformProfile): string[] {
  if (!dirExists(libDir)) return [];
  const nocase = platform.os === 'windows';
  const isRuntimeOnly = (p: string) =>
    platform.runtimeOnlyExts.includes(extname(p).toLowerCase());

  return matchEntries(libDir, platform.libraryPatterns(base), nocase)
    .map((name) => join(libDir, name))
    .filter((p) => fileExists(p) || dirExists(p))
    .sort((a, b) => {
      const rank = Number(isRuntimeOnly(a)) - Number(isRuntimeOnly(b));
      if (rank !== 0) return rank;
      return a < b ? -1 : a > b ? 1 : 0;
    });
}

function exactLibraryCandidates(libDir: string, base: string, platform: PlatformProfile): string[] {
  switch (platform.os) {
    case 'windows':
      return [join(libDir, `${base}.lib`), join(libDir, `${base}.dll`)];
    case 'macos':
      return [
        join(libDir, `lib${base}.dylib`),
        join(libDir, `lib${base}.a`),
        join(libDir, `${base}.framework`, 'Versions', 'A', base),
        join(libDir, `${base}.framework`, base),
      ];
    case 'linux':
      return [
        join(libDir, `lib${base}.so`),
        join(libDir, `lib${base}.a`),
        ...matchEntries(libDir, [`lib${base}.so.*`]).map((name) => join(libDir, name)),
      ];
  }
}

/**
 * Absolute paths for library base names, searching every lib subdirectory of
 * every prefix in order. Names that resolve nowhere are left out.
 */
export function resolveLibraryPaths(
  bases: string[],
  prefixes: string[],
  platform: PlatformProfile,
): string[] {
  const results: string[] = [];
  for (const base of bases) {
    const found = findFirstLibrary(base, prefixes, platform);
    if (found) results.push(found);
  }
  return results;
}

function findFirstLibrary(base: string, prefixes: string[], platform: PlatformProfile): string | null {
  for (const prefix of prefixes) {
    for (const sub of LIB_SUBDIRS) {
      const libDir = join(prefix, sub);
      if (!dirExists(libDir)) continue;
      const hit = exactLibraryCandidates(libDir, base, platform).find(pathExists);
      if (hit) return hit;
    }
  }
  return null;
}

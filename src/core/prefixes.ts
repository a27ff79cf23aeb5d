import { basename, dirname, join, normalize, parse, resolve } from 'node:path';
import type { ResolveContext } from './context.js';
import { firstDetection, type Detection, type Strategy } from './strategy.js';
import {
  eigenIncludeRoot,
  hasBoostVersionHeader,
  hasEigenHeaders,
  hasLibDir,
  isQtPrefix,
  isRawIncludeDir,
  qt6ConfigDir,
} from './probe.js';
import { dirExists, fileExists } from '../utils/fs.js';
import { expandDirGlob } from '../utils/glob.js';
import { compareVersions, dedupe, parseVersion, splitPrefixList } from '../utils/paths.js';
import type { CpuArch } from '../utils/platform.js';

// ── Toolkit (Qt 6) ──────────────────────────────────────────────────

function qtVersionKey(p: string): number[] {
  const segment = p.split(/[\\/]/).find((part) => part.startsWith('6.'));
  return segment ? parseVersion(segment) : [0];
}

function matchesArch(p: string, arch: CpuArch): boolean {
  const kit = basename(p).toLowerCase();
  const isArm = kit.includes('arm64');
  return arch === 'arm64' ? isArm : !isArm;
}

/** Qt prefixes found in the default install trees, newest version first. */
export function detectQtInstallations(ctx: ResolveContext): string[] {
  const { platform } = ctx;
  const nocase = platform.os === 'windows';
  const candidates = platform.locations.qtInstallGlobs
    .flatMap((glob) => expandDirGlob(glob, nocase))
    .filter(isQtPrefix)
    .filter((p) => platform.os !== 'windows' || matchesArch(p, platform.arch));

  return dedupe(candidates)
    .map((p, index) => ({ p, index, version: qtVersionKey(p) }))
    .sort((a, b) => compareVersions(b.version, a.version) || a.index - b.index)
    .map(({ p }) => p);
}

function qtPrefixFromConfigDir(configDir: string): string | null {
  if (!dirExists(configDir)) return null;
  // <prefix>/lib/cmake/Qt6
  const prefix = resolve(configDir, '..', '..', '..');
  return isQtPrefix(prefix) ? prefix : null;
}

function nonEmpty(list: string[]): string[] | null {
  return list.length > 0 ? list : null;
}

export function qtStrategies(ctx: ResolveContext): Strategy<string[]>[] {
  const { env, overrides, platform } = ctx;
  return [
    {
      name: 'override',
      detect: () => (overrides.qtRoot ? [overrides.qtRoot] : null),
    },
    {
      name: 'environment',
      detect: () => {
        const root = env.QT_ROOT_DIR;
        return root && isQtPrefix(root) ? [root] : null;
      },
    },
    {
      name: 'inherited',
      detect: () => {
        const found = splitPrefixList(env.CMAKE_PREFIX_PATH, platform.pathListSeparator).filter(isQtPrefix);
        const configDir = env.Qt6_DIR ?? env.QT6_DIR;
        const fromConfig = configDir ? qtPrefixFromConfigDir(configDir) : null;
        if (fromConfig) found.push(fromConfig);
        return nonEmpty(dedupe(found));
      },
    },
    {
      name: 'autodetect',
      detect: () => nonEmpty(detectQtInstallations(ctx)),
    },
  ];
}

export function resolveQtPrefixes(ctx: ResolveContext): Detection<string[]> | null {
  return firstDetection(qtStrategies(ctx));
}

/** `Qt6_DIR` for configure: explicit env, then the override, then the first Qt prefix. */
export function resolveQtConfigDir(ctx: ResolveContext, prefixes: string[]): string | null {
  const fromEnv = ctx.env.Qt6_DIR ?? ctx.env.QT6_DIR;
  if (fromEnv && dirExists(fromEnv)) return fromEnv;
  if (ctx.overrides.qtRoot) return qt6ConfigDir(ctx.overrides.qtRoot);
  for (const p of prefixes) {
    const dir = qt6ConfigDir(p);
    if (dir) return dir;
  }
  return null;
}

// ── Boundary library (Boost) ────────────────────────────────────────

function boostVersionKey(p: string): number[] {
  const nums = basename(p)
    .split('_')
    .filter((part) => /^\d+$/.test(part))
    .map(Number);
  return nums.length > 0 ? nums : [0];
}

export function boostStrategies(ctx: ResolveContext): Strategy<string>[] {
  const { env, overrides, platform } = ctx;
  return [
    {
      name: 'override',
      detect: () => overrides.boostRoot,
    },
    {
      name: 'environment',
      detect: () => {
        for (const key of ['BOOST_ROOT', 'Boost_ROOT']) {
          const value = env[key];
          if (value && hasBoostVersionHeader(value)) return value;
        }
        return null;
      },
    },
    {
      name: 'versioned-install',
      detect: () => {
        const nocase = platform.os === 'windows';
        const valid = platform.locations.boostGlobs
          .flatMap((glob) => expandDirGlob(glob, nocase))
          .filter((p) => hasBoostVersionHeader(p))
          .map((p, index) => ({ p, index, version: boostVersionKey(p) }))
          .sort((a, b) => compareVersions(b.version, a.version) || a.index - b.index);
        return valid[0]?.p ?? null;
      },
    },
    {
      name: 'system',
      detect: () =>
        platform.locations.boostSystemPrefixes.find((p) =>
          fileExists(join(p, 'include', 'boost', 'version.hpp')),
        ) ?? null,
    },
  ];
}

export function resolveBoostRoot(ctx: ResolveContext): string | null {
  return firstDetection(boostStrategies(ctx))?.value ?? null;
}

/**
 * A Boost root that is really a headers directory (`<prefix>/include`) is
 * rewritten to `<prefix>` when that parent has a library directory.
 */
export function normalizeBoostPrefix(root: string): string {
  const clean = normalize(root).replace(/[\\/]+$/, '');
  if (basename(clean).toLowerCase() === 'include') {
    const parent = dirname(clean);
    if (hasLibDir(parent)) return parent;
  }
  return clean;
}

// ── Math headers (Eigen) ────────────────────────────────────────────

export function eigenStrategies(ctx: ResolveContext): Strategy<string>[] {
  const { env, overrides, platform, host, installRoot } = ctx;
  return [
    {
      name: 'override',
      detect: () => (overrides.eigenRoot ? eigenIncludeRoot(overrides.eigenRoot) : null),
    },
    {
      name: 'environment',
      detect: () => {
        for (const key of ['EIGEN3_INCLUDE_DIR', 'EIGEN3_ROOT', 'EIGEN_ROOT']) {
          const value = env[key];
          if (value && dirExists(value)) {
            const root = eigenIncludeRoot(value);
            if (root) return root;
          }
        }
        return null;
      },
    },
    {
      name: 'install-root',
      detect: () =>
        [join(installRoot, 'include', 'eigen3'), join(installRoot, 'eigen3'), installRoot].find(
          hasEigenHeaders,
        ) ?? null,
    },
    {
      name: 'system',
      detect: () => platform.locations.eigenSystemDirs.find(hasEigenHeaders) ?? null,
    },
    {
      name: 'homebrew',
      detect: () => {
        if (platform.os !== 'macos' || !host.which('brew')) return null;
        const prefix = host.capture('brew', ['--prefix', 'eigen']);
        if (!prefix) return null;
        const dir = join(prefix, 'include', 'eigen3');
        return hasEigenHeaders(dir) ? dir : null;
      },
    },
    {
      name: 'versioned-install',
      detect: () => {
        for (const glob of platform.locations.eigenGlobs) {
          for (const base of expandDirGlob(glob, platform.os === 'windows')) {
            const root = eigenIncludeRoot(base);
            if (root) return root;
          }
        }
        return null;
      },
    },
  ];
}

export function detectMathHeaderIncludeRoot(ctx: ResolveContext): Detection<string> | null {
  return firstDetection(eigenStrategies(ctx));
}

/**
 * Include root for `#include <Eigen/Core>`. Kept out of the prefix list: it is
 * written to its own hints variable.
 */
export function resolveMathHeaderIncludeRoot(ctx: ResolveContext): string | null {
  return detectMathHeaderIncludeRoot(ctx)?.value ?? null;
}

// ── Prefix list ─────────────────────────────────────────────────────

export function systemPrefixes(ctx: ResolveContext): string[] {
  return ctx.platform.locations.systemPrefixes.filter(dirExists);
}

/**
 * Ordered, de-duplicated installation prefixes. Earlier entries win during
 * searches. Rebuilt on every call.
 */
export function resolvePrefixes(ctx: ResolveContext): string[] {
  const prefixes: string[] = [];
  const add = (p: string | null | undefined) => {
    if (!p) return;
    const clean = normalize(p);
    const trimmed = parse(clean).root === clean ? clean : clean.replace(/[\\/]+$/, '');
    if (!prefixes.includes(trimmed)) prefixes.push(trimmed);
  };

  add(ctx.installRoot);

  for (const p of resolveQtPrefixes(ctx)?.value ?? []) add(p);

  const boostRoot = resolveBoostRoot(ctx);
  if (boostRoot) add(normalizeBoostPrefix(boostRoot));

  for (const p of splitPrefixList(ctx.env.CMAKE_PREFIX_PATH, ctx.platform.pathListSeparator)) {
    if (!isRawIncludeDir(p)) add(p);
  }

  for (const p of systemPrefixes(ctx)) add(p);

  const eigenRoot = ctx.overrides.eigenRoot;
  if (eigenRoot && !isRawIncludeDir(eigenRoot)) add(eigenRoot);

  return prefixes;
}

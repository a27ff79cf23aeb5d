import { join, resolve } from 'node:path';
import type { ProjectLayout } from '../config/settings.js';
import type { Manifest } from '../types/manifest.js';
import type { ResolveContext } from './context.js';
import { readHints } from './hints.js';
import { qt6ConfigDir } from './probe.js';
import {
  detectMathHeaderIncludeRoot,
  resolvePrefixes,
  resolveQtPrefixes,
  boostStrategies,
} from './prefixes.js';
import { firstDetection } from './strategy.js';
import { isVerified } from './state.js';
import { describeSystemPackage, detectSystemPackage } from './system-package.js';
import { findVsDevCmd, is32BitCl, locateCompiler, probeSdkLibPaths } from './toolchain.js';
import { dirExists, fileExists, isWritableDir } from '../utils/fs.js';
import { envGet } from '../utils/env-parser.js';
import { joinPathList } from '../utils/paths.js';

export type CheckStatus = 'ok' | 'warn' | 'fail' | 'info';

export interface DoctorCheck {
  section: string;
  label: string;
  status: CheckStatus;
  detail: string;
}

export interface DoctorContext extends ResolveContext {
  layout: ProjectLayout;
}

/** Soft limits past which some shells and tools start truncating PATH. */
export const PATH_LENGTH_LIMIT = { windows: 4096, posix: 8192 } as const;

function firstLine(text: string | null): string | null {
  return text ? (text.split(/\r?\n/)[0] ?? null) : null;
}

function toolCheck(ctx: DoctorContext, tool: string): DoctorCheck {
  const version = ctx.host.which(tool) ? firstLine(ctx.host.capture(tool, ['--version'])) : null;
  return version
    ? { section: 'Tools', label: tool, status: 'ok', detail: version }
    : { section: 'Tools', label: tool, status: 'fail', detail: 'not found on PATH' };
}

/**
 * Qt `bin` named by the generated hints: from `Qt6_DIR` (`<prefix>/lib/cmake/Qt6`),
 * else the first listed prefix that is a Qt install.
 */
export function hintsQtBin(hintsPath: string): string | null {
  const doc = readHints(hintsPath);
  if (!doc) return null;
  if (doc.qt6Dir) {
    const bin = resolve(doc.qt6Dir, '..', '..', '..', 'bin');
    if (dirExists(bin)) return bin;
  }
  for (const prefix of doc.prefixes) {
    const bin = join(prefix, 'bin');
    if (qt6ConfigDir(prefix) && dirExists(bin)) return bin;
  }
  return null;
}

function toolkitChecks(ctx: DoctorContext): DoctorCheck[] {
  const section = 'Toolkit';
  const detection = resolveQtPrefixes(ctx);
  const prefix = detection?.value[0] ?? null;
  const checks: DoctorCheck[] = [
    detection && prefix
      ? { section, label: 'Qt 6', status: 'ok', detail: `${prefix} (${detection.strategy})` }
      : { section, label: 'Qt 6', status: 'warn', detail: 'not detected (pass --qt-root)' },
  ];

  const hintsBin = hintsQtBin(ctx.layout.hintsPath);
  if (hintsBin) {
    checks.push({ section, label: 'Qt bin (hints)', status: 'ok', detail: hintsBin });
  }
  const bin = hintsBin ?? (prefix ? join(prefix, 'bin') : null);

  if (ctx.platform.os === 'windows') {
    const local = bin ? join(bin, `windeployqt${ctx.platform.exeSuffix}`) : null;
    const deploy = local && fileExists(local) ? local : ctx.host.which('windeployqt');
    checks.push(
      deploy
        ? { section, label: 'windeployqt', status: 'ok', detail: deploy }
        : { section, label: 'windeployqt', status: 'warn', detail: 'not found (needed only for packaging)' },
    );
  } else if (!hintsBin) {
    const local = prefix ? [join(prefix, 'bin', 'moc'), join(prefix, 'libexec', 'moc')] : [];
    const moc =
      [...local, ...ctx.platform.locations.mocCandidates].find(fileExists) ?? ctx.host.which('moc');
    checks.push(
      moc
        ? { section, label: 'moc', status: 'ok', detail: moc }
        : { section, label: 'moc', status: 'warn', detail: 'not found' },
    );
  }
  return checks;
}

function compilerChecks(ctx: DoctorContext): DoctorCheck[] {
  const section = 'Compiler';
  const compiler = locateCompiler(ctx);
  const checks: DoctorCheck[] = [
    compiler
      ? { section, label: 'C++', status: 'ok', detail: `${compiler.path} (${compiler.id})` }
      : { section, label: 'C++', status: 'fail', detail: 'no cl, c++, g++ or clang++ found' },
  ];
  if (ctx.platform.os !== 'windows') return checks;

  const onPath = ctx.host.which('cl');
  if (onPath && is32BitCl(onPath)) {
    checks.push({ section, label: 'cl on PATH', status: 'warn', detail: `32-bit compiler ignored: ${onPath}` });
  }
  const devCmd = findVsDevCmd(ctx);
  checks.push(
    devCmd
      ? { section, label: 'Developer shell', status: 'ok', detail: devCmd }
      : { section, label: 'Developer shell', status: 'warn', detail: 'VsDevCmd.bat not found' },
  );
  const sdk = probeSdkLibPaths(ctx.platform);
  checks.push(
    sdk.length > 0
      ? { section, label: 'Windows SDK', status: 'ok', detail: sdk.join(', ') }
      : { section, label: 'Windows SDK', status: 'warn', detail: 'ucrt/um x64 libraries not found' },
  );
  return checks;
}

function prefixChecks(ctx: DoctorContext): DoctorCheck[] {
  const section = 'Prefixes';
  const checks: DoctorCheck[] = resolvePrefixes(ctx).map((p, i) => ({
    section,
    label: `#${i + 1}`,
    status: 'info',
    detail: qt6ConfigDir(p) ? `${p} (Qt 6)` : p,
  }));

  const eigen = detectMathHeaderIncludeRoot(ctx);
  checks.push(
    eigen
      ? { section, label: 'Eigen include', status: 'ok', detail: `${eigen.value} (${eigen.strategy})` }
      : { section, label: 'Eigen include', status: 'warn', detail: 'not detected (pass --eigen-root)' },
  );
  const boost = firstDetection(boostStrategies(ctx));
  checks.push(
    boost
      ? { section, label: 'Boost root', status: 'ok', detail: `${boost.value} (${boost.strategy})` }
      : { section, label: 'Boost root', status: 'warn', detail: 'not detected (pass --boost-root)' },
  );
  return checks;
}

function dependencyChecks(ctx: DoctorContext, manifest: Manifest): DoctorCheck[] {
  return manifest.deps.map((dep): DoctorCheck => {
    const section = 'Dependencies';
    if (isVerified(ctx.layout, dep.name)) {
      return { section, label: dep.name, status: 'ok', detail: 'verified (.ok present)' };
    }
    const system = detectSystemPackage(dep.system_package, ctx);
    if (system) {
      return { section, label: dep.name, status: 'info', detail: `provided by ${describeSystemPackage(system)}` };
    }
    return { section, label: dep.name, status: 'warn', detail: 'not built yet' };
  });
}

const SYSTEM_PATH_DIRS = {
  windows: ['C:\\Windows\\System32', 'C:\\Windows'],
  posix: ['/usr/bin', '/bin'],
} as const;

/** The PATH a project shell needs: system dirs, the install `bin`, then the Qt `bin`. */
export function effectiveProjectPath(ctx: DoctorContext): string {
  const windows = ctx.platform.os === 'windows';
  const entries: string[] = [...(windows ? SYSTEM_PATH_DIRS.windows : SYSTEM_PATH_DIRS.posix)];

  const installBin = join(ctx.installRoot, 'bin');
  if (dirExists(installBin)) entries.push(installBin);

  let qtBin = hintsQtBin(ctx.layout.hintsPath);
  if (!qtBin && ctx.overrides.qtRoot) {
    const candidate = join(ctx.overrides.qtRoot, 'bin');
    if (dirExists(candidate)) qtBin = candidate;
  }
  if (qtBin) entries.push(qtBin);
  return joinPathList(entries, ctx.platform.pathListSeparator);
}

function pathLengthChecks(ctx: DoctorContext): DoctorCheck[] {
  const section = 'Environment';
  const windows = ctx.platform.os === 'windows';
  const limit = windows ? PATH_LENGTH_LIMIT.windows : PATH_LENGTH_LIMIT.posix;
  const globalLength = (envGet(ctx.env, 'PATH', windows) ?? '').length;
  const effective = effectiveProjectPath(ctx).length;
  return [
    { section, label: 'Global PATH length', status: 'info', detail: `${globalLength} characters` },
    effective > limit
      ? { section, label: 'Effective PATH length', status: 'warn', detail: `${effective} characters (limit ${limit})` }
      : { section, label: 'Effective PATH length', status: 'ok', detail: `${effective} characters` },
  ];
}

function installRootCheck(installRoot: string): DoctorCheck {
  const section = 'Project';
  const label = 'Install root';
  if (!dirExists(installRoot)) {
    return { section, label, status: 'info', detail: `${installRoot} (not created yet)` };
  }
  return isWritableDir(installRoot)
    ? { section, label, status: 'ok', detail: `${installRoot} (writable)` }
    : { section, label, status: 'fail', detail: `${installRoot} (not writable)` };
}

/**
 * Reports what a build would see. Nothing is written except a probe file in
 * the install root, removed again immediately.
 */
export function runDoctor(ctx: DoctorContext, manifest: Manifest | null, nodeVersion: string): DoctorCheck[] {
  const { layout, platform } = ctx;
  const checks: DoctorCheck[] = [
    { section: 'Host', label: 'Platform', status: 'info', detail: `${platform.os} (${platform.arch})` },
    { section: 'Host', label: 'Node.js', status: 'info', detail: nodeVersion },
    toolCheck(ctx, 'git'),
    toolCheck(ctx, 'cmake'),
    installRootCheck(layout.installRoot),
    fileExists(layout.manifestPath)
      ? { section: 'Project', label: 'Manifest', status: 'ok', detail: layout.manifestPath }
      : { section: 'Project', label: 'Manifest', status: 'warn', detail: `missing: ${layout.manifestPath}` },
    ...toolkitChecks(ctx),
    ...compilerChecks(ctx),
    ...prefixChecks(ctx),
    ...(manifest ? dependencyChecks(ctx, manifest) : []),
    ...pathLengthChecks(ctx),
  ];
  return checks;
}

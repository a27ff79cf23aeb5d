import { join, resolve } from 'node:path';
import type { HostQuery } from './host.js';
import { ToolNotFoundError } from './errors.js';
import type { PlatformProfile } from '../utils/platform.js';
import { dirExists, fileExists, listDirs } from '../utils/fs.js';
import { envGet, envSet, parseEnvDump } from '../utils/env-parser.js';
import { compareVersions, dedupe, joinPathList, parseVersion, splitPathList } from '../utils/paths.js';

export type CompilerId = 'cl' | 'c++' | 'g++' | 'clang++';

export interface Compiler {
  id: CompilerId;
  path: string;
}

export interface ToolchainContext {
  platform: PlatformProfile;
  host: HostQuery;
}

const POSIX_COMPILERS: CompilerId[] = ['c++', 'g++', 'clang++'];
const VS_EDITIONS = ['BuildTools', 'Community', 'Professional', 'Enterprise'];
const VC_TOOLS_COMPONENT = 'Microsoft.VisualStudio.Component.VC.Tools.x86.x64';

function winLower(p: string): string {
  return p.replace(/\//g, '\\').toLowerCase();
}

/** A `cl.exe` that targets x86 (either host). */
export function is32BitCl(clPath: string): boolean {
  const low = winLower(clPath);
  return low.includes('hostx86\\x86') || low.includes('hostx64\\x86');
}

export function isMsvc(compiler: Compiler): boolean {
  return compiler.id === 'cl';
}

// ── Visual Studio discovery ─────────────────────────────────────────

export function findVsInstallation(ctx: ToolchainContext): string | null {
  const vswhere = ctx.platform.locations.vswherePath;
  if (ctx.platform.os !== 'windows' || !vswhere || !fileExists(vswhere)) return null;
  return ctx.host.capture(vswhere, [
    '-latest',
    '-requires',
    VC_TOOLS_COMPONENT,
    '-property',
    'installationPath',
  ]);
}

/** Newest `Hostx64/x64/cl.exe` under the latest Visual Studio instance. */
export function findClViaVswhere(ctx: ToolchainContext): string | null {
  const installation = findVsInstallation(ctx);
  if (!installation) return null;
  const toolsRoot = join(installation, 'VC', 'Tools', 'MSVC');
  const versions = listDirs(toolsRoot).sort((a, b) =>
    compareVersions(parseVersion(b), parseVersion(a)),
  );
  for (const version of versions) {
    const candidate = join(toolsRoot, version, 'bin', 'Hostx64', 'x64', 'cl.exe');
    if (fileExists(candidate)) return candidate;
  }
  return null;
}

export function findVsDevCmd(ctx: ToolchainContext): string | null {
  if (ctx.platform.os !== 'windows') return null;

  const installation = findVsInstallation(ctx);
  if (installation) {
    const candidate = join(installation, 'Common7', 'Tools', 'VsDevCmd.bat');
    if (fileExists(candidate)) return candidate;
  }

  for (const base of ctx.platform.locations.visualStudioBases) {
    for (const year of listDirs(base)) {
      for (const edition of VS_EDITIONS) {
        const candidate = join(base, year, edition, 'Common7', 'Tools', 'VsDevCmd.bat');
        if (fileExists(candidate)) return candidate;
      }
    }
  }
  return null;
}

// ── Compiler ────────────────────────────────────────────────────────

/**
 * On Windows an activated 64-bit `cl` wins, then the newest one the installer
 * knows about. Everywhere the POSIX driver names follow in a fixed order.
 */
export function locateCompiler(ctx: ToolchainContext): Compiler | null {
  if (ctx.platform.os === 'windows') {
    const onPath = ctx.host.which('cl');
    if (onPath && !is32BitCl(onPath)) return { id: 'cl', path: onPath };
    const fromVs = findClViaVswhere(ctx);
    if (fromVs) return { id: 'cl', path: fromVs };
  }
  for (const id of POSIX_COMPILERS) {
    const path = ctx.host.which(id);
    if (path) return { id, path };
  }
  return null;
}

export function requireCompiler(ctx: ToolchainContext, purpose: string): Compiler {
  const compiler = locateCompiler(ctx);
  if (!compiler) {
    throw new ToolNotFoundError(`No C++ compiler found for ${purpose} (cl, c++, g++, or clang++).`);
  }
  return compiler;
}

// ── Developer environment (MSVC) ────────────────────────────────────

/** Drops 32-bit entries and moves 64-bit ones first; order within each class is kept. */
export function preferX64(paths: string[]): string[] {
  const x64: string[] = [];
  const neutral: string[] = [];
  for (const p of paths) {
    const low = winLower(p);
    if (low.includes('\\lib\\x86') || low.includes('\\hostx86\\x86')) continue;
    if (low.includes('\\lib\\x64') || low.includes('\\hostx64\\x64')) {
      x64.push(p);
    } else {
      neutral.push(p);
    }
  }
  return [...x64, ...neutral];
}

/** `...\MSVC\<ver>\bin\Hostx64\x64\cl.exe` sits four levels below `<ver>`. */
export function deriveCompilerDirs(clPath: string): { include: string[]; lib: string[] } {
  const toolsRoot = resolve(clPath, '..', '..', '..', '..');
  const include = join(toolsRoot, 'include');
  const lib = join(toolsRoot, 'lib', 'x64');
  return {
    include: dirExists(include) ? [include] : [],
    lib: dirExists(lib) ? [lib] : [],
  };
}

/** `ucrt\x64` and `um\x64` of the newest SDK version present. */
export function probeSdkLibPaths(platform: PlatformProfile): string[] {
  for (const root of platform.locations.sdkLibRoots) {
    const versions = listDirs(root).sort((a, b) => compareVersions(parseVersion(b), parseVersion(a)));
    for (const version of versions) {
      const found = ['ucrt', 'um']
        .map((kind) => join(root, version, kind, 'x64'))
        .filter(dirExists);
      if (found.length > 0) return found;
    }
  }
  return [];
}

export function captureDevShell(ctx: ToolchainContext, vsDevCmd: string): Record<string, string> | null {
  const out = ctx.host.capture('cmd.exe', [
    '/s',
    '/c',
    `""${vsDevCmd}" -arch=x64 -host_arch=x64 >nul && set"`,
  ]);
  if (!out) return null;
  const captured: Record<string, string> = {};
  for (const { key, value } of parseEnvDump(out)) {
    captured[key.toUpperCase()] = value;
  }
  return captured;
}

function prependMissing(front: string[], current: string[]): string[] {
  return dedupe([...front.filter((p) => !current.includes(p)), ...current]);
}

/**
 * The environment a 64-bit MSVC build needs. Non-Windows hosts get an
 * unchanged copy. Running it on its own output changes nothing.
 */
export function deriveDevEnvironment(
  baseEnv: NodeJS.ProcessEnv,
  ctx: ToolchainContext,
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...baseEnv };
  if (ctx.platform.os !== 'windows') return env;
  const sep = ctx.platform.pathListSeparator;

  const vsDevCmd = findVsDevCmd(ctx);
  const captured = vsDevCmd ? captureDevShell(ctx, vsDevCmd) : null;
  if (captured) {
    for (const [key, value] of Object.entries(captured)) envSet(env, key, value, true);
  }

  const read = (key: string) => splitPathList(envGet(env, key, true), sep);
  const write = (key: string, paths: string[]) => envSet(env, key, joinPathList(paths, sep), true);

  const compiler = locateCompiler(ctx);
  if (compiler && isMsvc(compiler)) {
    const vc = deriveCompilerDirs(compiler.path);
    const sdkLib = probeSdkLibPaths(ctx.platform);
    const lib = read('LIB');
    const wantedLib = [...sdkLib, ...vc.lib];
    if (wantedLib.length > 0) write('LIB', prependMissing(wantedLib, lib));
    if (vc.include.length > 0) write('INCLUDE', prependMissing(vc.include, read('INCLUDE')));
  }

  for (const key of ['LIB', 'PATH', 'INCLUDE']) {
    const values = read(key);
    if (values.length > 0) write(key, preferX64(values));
  }
  return env;
}

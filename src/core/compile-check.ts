import { dirname, join } from 'node:path';
import type { CompileCheck } from '../types/manifest.js';
import type { PlatformProfile } from '../utils/platform.js';
import { OVERRIDE_ENV } from './overrides.js';
import { LIB_SUBDIRS, QT_MODULES, hasEigenHeaders, qtPluginDirs } from './probe.js';
import type { Compiler } from './toolchain.js';
import { isMsvc } from './toolchain.js';
import { dirExists, fileExists, listEntries } from '../utils/fs.js';
import { dedupe, joinPathList, splitPathList } from '../utils/paths.js';
import { envGet, envSet } from '../utils/env-parser.js';

/** Import/export macros that only mean something to an MSVC build. */
export const WINDOWS_ONLY_DEFINES = new Set(['SOQT_DLL', 'SIMAGE_DLL', 'COIN_DLL']);

/** Environment variables that may name a Qt installation. */
export const QT_ROOT_VARS = ['QT_ROOT_DIR', 'QTDIR', 'Qt_ROOT_DIR', 'Qt6_ROOT', 'Qt6_ROOT_DIR'];

export function probeDefines(check: CompileCheck, platform: PlatformProfile): string[] {
  if (platform.os === 'windows') return [...check.defines];
  return check.defines.filter((d) => !WINDOWS_ONLY_DEFINES.has(d));
}

export function probeSource(check: CompileCheck): string {
  return `${check.include_lines.join('\n')}\n${check.code}`;
}

export interface SearchDirs {
  includes: string[];
  libPaths: string[];
  frameworkRoots: string[];
}

export interface SearchDirOptions {
  platform: PlatformProfile;
  msvc: boolean;
  eigenIncludeRoot: string | null;
  /** System Qt 6 include roots (Linux distro packages). */
  systemQtIncludeRoots: string[];
}

/** Include, library and framework directories contributed by each prefix. */
export function collectSearchDirs(prefixes: string[], opts: SearchDirOptions): SearchDirs {
  const includes: string[] = [];
  const libPaths: string[] = [];
  const frameworkRoots: string[] = [];

  if (opts.eigenIncludeRoot && dirExists(opts.eigenIncludeRoot)) {
    includes.push(opts.eigenIncludeRoot);
  }

  for (const prefix of prefixes) {
    const includeRoot = join(prefix, 'include');
    if (dirExists(includeRoot)) {
      includes.push(includeRoot);
      for (const mod of QT_MODULES) {
        if (dirExists(join(includeRoot, mod))) includes.push(join(includeRoot, mod));
      }
      if (dirExists(join(includeRoot, 'eigen3'))) includes.push(join(includeRoot, 'eigen3'));
    }
    if (hasEigenHeaders(prefix)) includes.push(prefix);
    if (hasEigenHeaders(join(prefix, 'eigen3'))) includes.push(join(prefix, 'eigen3'));
    if (fileExists(join(prefix, 'boost', 'version.hpp'))) includes.push(prefix);

    for (const sub of LIB_SUBDIRS) {
      const libDir = join(prefix, sub);
      if (!dirExists(libDir)) continue;
      libPaths.push(libDir);

      if (opts.platform.os === 'macos' && !opts.msvc) {
        const frameworks = listEntries(libDir).filter((name) => name.endsWith('.framework'));
        for (const fw of frameworks) {
          const headers = join(libDir, fw, 'Headers');
          if (dirExists(headers)) includes.push(headers);
        }
        if (frameworks.length > 0) frameworkRoots.push(libDir);
      }
    }
  }

  for (const root of opts.systemQtIncludeRoots) {
    includes.push(root);
    for (const mod of QT_MODULES) {
      if (dirExists(join(root, mod))) includes.push(join(root, mod));
    }
  }

  return {
    includes: dedupe(includes),
    libPaths: dedupe(libPaths),
    frameworkRoots: dedupe(frameworkRoots),
  };
}

export interface ProbeBuild {
  compiler: Compiler;
  sourcePath: string;
  exePath: string;
  defines: string[];
  installRoot: string;
  prefixes: string[];
  search: SearchDirs;
  linkLib: string | null;
  extraLibPaths: string[];
  /** macOS only: `-framework` names and the directories holding them. */
  frameworks: string[];
  frameworkDirs: string[];
}

export interface ProbeCommand {
  command: string[];
  runtimeLibDirs: string[];
}

export function buildProbeCommand(build: ProbeBuild): ProbeCommand {
  return isMsvc(build.compiler) ? msvcCommand(build) : gnuCommand(build);
}

function installDirs(build: ProbeBuild): { include: string | null; lib: string | null } {
  const include = join(build.installRoot, 'include');
  const lib = join(build.installRoot, 'lib');
  return {
    include: dirExists(include) ? include : null,
    lib: dirExists(lib) ? lib : null,
  };
}

function msvcCommand(build: ProbeBuild): ProbeCommand {
  const own = installDirs(build);
  const includes = dedupe([...(own.include ? [own.include] : []), ...build.search.includes]);
  const libPaths = dedupe([...(own.lib ? [own.lib] : []), ...build.search.libPaths]);

  const command = [
    build.compiler.path,
    '/nologo',
    '/EHsc',
    '/std:c++17',
    '/Zc:__cplusplus',
    '/permissive-',
    ...build.defines.map((d) => `/D${d}`),
    ...includes.map((dir) => `/I${dir}`),
    build.sourcePath,
    '/link',
    ...libPaths.map((dir) => `/LIBPATH:${dir}`),
    '/MACHINE:X64',
    ...(build.linkLib ? [build.linkLib] : []),
    ...build.extraLibPaths,
    `/OUT:${build.exePath}`,
  ];
  return { command, runtimeLibDirs: [] };
}

function gnuCommand(build: ProbeBuild): ProbeCommand {
  const own = installDirs(build);
  const includes = dedupe([...(own.include ? [own.include] : []), ...build.search.includes]);
  const libPaths = dedupe([...(own.lib ? [own.lib] : []), ...build.search.libPaths]);

  const runtime = new Set<string>();
  if (own.lib) runtime.add(own.lib);
  for (const prefix of build.prefixes) {
    const lib = join(prefix, 'lib');
    if (dirExists(lib)) runtime.add(lib);
  }
  if (build.linkLib) runtime.add(dirname(build.linkLib));
  for (const p of build.extraLibPaths) runtime.add(dirname(p));

  const frameworkRoots = dedupe([...build.search.frameworkRoots, ...[...build.frameworkDirs].sort()]);
  if (build.frameworks.length > 0) {
    for (const dir of build.frameworkDirs) runtime.add(dir);
  }
  const runtimeLibDirs = [...runtime].sort();

  const command = [
    build.compiler.path,
    '-std=c++17',
    ...build.defines.map((d) => `-D${d}`),
    build.sourcePath,
    ...includes.map((dir) => `-I${dir}`),
    ...libPaths.flatMap((dir) => ['-L', dir]),
    ...frameworkRoots.map((dir) => `-F${dir}`),
    ...build.frameworks.flatMap((fw) => ['-framework', fw]),
    ...runtimeLibDirs.map((dir) => `-Wl,-rpath,${dir}`),
    '-o',
    build.exePath,
    ...(build.linkLib ? [build.linkLib] : []),
    ...build.extraLibPaths,
  ];
  return { command, runtimeLibDirs };
}

/** `Qt6Core` → `QtCore`; `null` for anything that is not a Qt 6 module. */
export function qtFrameworkName(lib: string): string | null {
  return lib.startsWith('Qt6') ? `Qt${lib.slice(3)}` : null;
}

export function looksLikeQtProbe(check: CompileCheck, linkLib: string | null): boolean {
  const includes = check.include_lines.join('\n');
  if (includes.includes('Qt') || check.code.includes('QApplication') || check.code.includes('QGuiApplication')) {
    return true;
  }
  if (check.link_libs.some((lib) => lib.startsWith('Qt'))) return true;
  return linkLib !== null && linkLib.includes('Qt');
}

export interface ProbeEnvOptions {
  platform: PlatformProfile;
  baseEnv: NodeJS.ProcessEnv;
  runtimeLibDirs: string[];
  /** Windows: directories holding DLLs, searched through PATH. */
  binDirs: string[];
  qtProbe: boolean;
  prefixes: string[];
}

/** The environment the probe binary runs under. */
export function probeEnvironment(opts: ProbeEnvOptions): NodeJS.ProcessEnv {
  const { platform } = opts;
  const env: NodeJS.ProcessEnv = { ...opts.baseEnv };
  const sep = platform.pathListSeparator;

  if (platform.os === 'windows') {
    const path = splitPathList(envGet(env, 'PATH', true), sep);
    envSet(env, 'PATH', joinPathList(dedupe([...opts.binDirs, ...path]), sep), true);
    return env;
  }

  if (opts.runtimeLibDirs.length > 0) {
    const existing = env[platform.runtimeLibraryVar];
    const joined = joinPathList(opts.runtimeLibDirs, sep);
    env[platform.runtimeLibraryVar] = existing ? `${joined}${sep}${existing}` : joined;
  }

  const headless = !env.DISPLAY && !env.WAYLAND_DISPLAY;
  if (platform.os === 'linux' && opts.qtProbe && headless) {
    env.QT_QPA_PLATFORM ??= 'offscreen';
    if (!(env.QT_QPA_PLATFORM_PLUGIN_PATH && env.QT_PLUGIN_PATH)) {
      const roots = dedupe([
        ...opts.prefixes,
        ...[...QT_ROOT_VARS, OVERRIDE_ENV.qt].map((k) => env[k]).filter((v): v is string => !!v),
      ]);
      for (const root of roots) {
        const dirs = qtPluginDirs(root);
        if (dirs) {
          env.QT_PLUGIN_PATH ??= dirs.plugins;
          env.QT_QPA_PLATFORM_PLUGIN_PATH ??= dirs.platforms;
          break;
        }
      }
    }
  }
  return env;
}

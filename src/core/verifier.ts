import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { DependencySpec } from '../types/manifest.js';
import type { EngineContext, ResolveContext } from './context.js';
import {
  QT_ROOT_VARS,
  buildProbeCommand,
  collectSearchDirs,
  looksLikeQtProbe,
  probeDefines,
  probeEnvironment,
  probeSource,
  qtFrameworkName,
} from './compile-check.js';
import { ExternalProcessError, ToolNotFoundError, VerificationError } from './errors.js';
import { libNameCandidates } from './manifest.js';
import { OVERRIDE_ENV } from './overrides.js';
import { resolveMathHeaderIncludeRoot, resolvePrefixes } from './prefixes.js';
import { findLibFiles, qtFrameworkDir, resolveLibraryPaths } from './probe.js';
import { dependencyPaths } from './state.js';
import { deriveDevEnvironment, is32BitCl, isMsvc, requireCompiler } from './toolchain.js';
import { dirExists, ensureDir, pathExists } from '../utils/fs.js';
import { dedupe } from '../utils/paths.js';

const TAG = 'compile-check';

export function checkHeader(dep: DependencySpec, installRoot: string): void {
  const header = dep.verify.header;
  if (!header) return;
  const path = join(installRoot, header);
  if (!pathExists(path)) {
    throw new VerificationError(dep.name, `header not found: ${path}`);
  }
}

/**
 * The first library file matching any candidate base name, in declared order.
 * `null` when the dependency declares no library.
 */
export function checkLibrary(dep: DependencySpec, ctx: Pick<ResolveContext, 'installRoot' | 'platform'>): string | null {
  const candidates = libNameCandidates(dep);
  if (candidates.length === 0) return null;

  const libDir = join(ctx.installRoot, 'lib');
  for (const base of candidates) {
    const [first] = findLibFiles(libDir, base, ctx.platform);
    if (first) return first;
  }
  throw new VerificationError(
    dep.name,
    `none of the libraries ${candidates.map((c) => `'${c}'`).join(', ')} found under ${libDir}`,
  );
}

/** Qt 6 include roots from distro packages, present only with a system Qt 6 CMake package. */
export function systemQtIncludeRoots(ctx: Pick<ResolveContext, 'platform' | 'host'>): string[] {
  const { platform, host } = ctx;
  if (platform.os !== 'linux') return [];
  if (!platform.locations.qtSystemCmakeDirs.some(dirExists)) return [];

  const base = platform.locations.linuxIncludeBase;
  const triplet = host.which('dpkg-architecture')
    ? host.capture('dpkg-architecture', ['-qDEB_HOST_MULTIARCH'])
    : null;
  const candidates = [...(triplet ? [join(base, triplet, 'qt6')] : []), join(base, 'qt6')];
  return candidates.filter(dirExists);
}

function qtFrameworkDirs(prefixes: string[], env: NodeJS.ProcessEnv): string[] {
  const roots = [
    ...prefixes,
    ...[...QT_ROOT_VARS, OVERRIDE_ENV.qt].map((k) => env[k]).filter((v): v is string => !!v),
  ];
  return dedupe(roots.map(qtFrameworkDir).filter((dir): dir is string => dir !== null));
}

/**
 * Builds a one-file program against the installed library and runs it. Any
 * compile, link or run failure is a verification error.
 */
export async function compileCheck(dep: DependencySpec, linkLib: string | null, ctx: EngineContext): Promise<void> {
  const check = dep.verify.compile_check;
  if (!check) return;
  const { platform, reporter, runner } = ctx;

  const compiler = requireCompiler(ctx, 'compile_check');
  if (isMsvc(compiler) && is32BitCl(compiler.path)) {
    throw new ToolNotFoundError('MSVC cl.exe appears to be x86. Use an x64 Native Tools prompt.');
  }

  const paths = dependencyPaths(ctx.layout, dep.name);
  ensureDir(paths.probeDir);
  const sourcePath = join(paths.probeDir, 'probe.cpp');
  const exePath = join(paths.probeDir, `probe${platform.exeSuffix}`);
  writeFileSync(sourcePath, probeSource(check), 'utf-8');

  const env = platform.os === 'windows' ? deriveDevEnvironment(ctx.env, ctx) : { ...ctx.env };
  const prefixes = resolvePrefixes({ ...ctx, env });

  let frameworks: string[] = [];
  let frameworkDirs: string[] = [];
  let linkBases = check.link_libs;
  if (platform.os === 'macos' && !isMsvc(compiler)) {
    frameworks = check.link_libs.map(qtFrameworkName).filter((n): n is string => n !== null);
    linkBases = check.link_libs.filter((lib) => qtFrameworkName(lib) === null);
    frameworkDirs = qtFrameworkDirs(prefixes, env);
    if (frameworks.length > 0 && frameworkDirs.length === 0) {
      throw new VerificationError(
        dep.name,
        'Qt frameworks not found on macOS. Expected QtCore.framework under <QtPrefix>/lib; pass --qt-root.',
      );
    }
  }
  const extraLibPaths = resolveLibraryPaths(linkBases, prefixes, platform);

  const search = collectSearchDirs(prefixes, {
    platform,
    msvc: isMsvc(compiler),
    eigenIncludeRoot: resolveMathHeaderIncludeRoot({ ...ctx, env }),
    systemQtIncludeRoots: systemQtIncludeRoots(ctx),
  });
  const defines = probeDefines(check, platform);

  const { command, runtimeLibDirs } = buildProbeCommand({
    compiler,
    sourcePath,
    exePath,
    defines,
    installRoot: ctx.installRoot,
    prefixes,
    search,
    linkLib,
    extraLibPaths,
    frameworks,
    frameworkDirs,
  });

  reporter.step(TAG, `compiler: ${compiler.path} (name=${compiler.id})`);
  reporter.step(TAG, `source:   ${sourcePath}`);
  reporter.step(TAG, `include:  ${join(ctx.installRoot, 'include')}`);
  reporter.step(TAG, `libdir:   ${join(ctx.installRoot, 'lib')}`);
  if (defines.length > 0) reporter.step(TAG, `defines:  ${defines.join(', ')}`);
  if (linkLib) reporter.step(TAG, `linklib:  ${linkLib}`);
  reporter.debug(command.join(' '));

  const binDirs = [ctx.installRoot, ...prefixes]
    .map((p) => join(p, 'bin'))
    .filter(dirExists);
  const buildEnv = probeEnvironment({
    platform,
    baseEnv: env,
    runtimeLibDirs: [],
    binDirs,
    qtProbe: false,
    prefixes,
  });

  await runProbeStep(dep, () => runner.run(command, { cwd: paths.probeDir, env: buildEnv }), 'compilation failed');

  reporter.step(TAG, `run:      ${exePath}`);
  const runEnv = probeEnvironment({
    platform,
    baseEnv: env,
    runtimeLibDirs,
    binDirs,
    qtProbe: looksLikeQtProbe(check, linkLib),
    prefixes,
  });
  await runProbeStep(dep, () => runner.run([exePath], { cwd: paths.probeDir, env: runEnv }), 'probe exited with an error');
  reporter.step(TAG, 'OK');
}

async function runProbeStep(dep: DependencySpec, step: () => Promise<string>, what: string): Promise<void> {
  try {
    await step();
  } catch (err) {
    if (err instanceof ExternalProcessError) {
      throw new VerificationError(dep.name, `${what} (exit code ${err.exitCode})`, err.output);
    }
    throw err;
  }
}

/** Header, then library file, then the optional compile-and-run probe. */
export async function verifyDependency(dep: DependencySpec, ctx: EngineContext): Promise<void> {
  checkHeader(dep, ctx.installRoot);
  const linkLib = checkLibrary(dep, ctx);
  await compileCheck(dep, linkLib, ctx);
}

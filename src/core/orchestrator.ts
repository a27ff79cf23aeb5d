import type { DependencySpec, Manifest } from '../types/manifest.js';
import type { EngineContext } from './context.js';
import { ConfigurationError, capturedOutput, isProvisionError } from './errors.js';
import { refreshHints } from './hints.js';
import { resolveBoostRoot, resolveMathHeaderIncludeRoot, resolvePrefixes, resolveQtConfigDir } from './prefixes.js';
import {
  dependencyPaths,
  isVerified,
  readFetchedTag,
  writeFetchedTag,
  writeMarker,
  type DependencyPaths,
} from './state.js';
import { describeSystemPackage, detectSystemPackage } from './system-package.js';
import { deriveDevEnvironment, requireCompiler } from './toolchain.js';
import { verifyDependency } from './verifier.js';
import type { OsKind, PlatformProfile } from '../utils/platform.js';
import { dirExists, ensureDir, removeDir } from '../utils/fs.js';

export const BUILD_CONFIGS = ['Debug', 'Release', 'RelWithDebInfo', 'MinSizeRel'] as const;
export type BuildConfig = (typeof BUILD_CONFIGS)[number];

export interface BuildOptions {
  config: BuildConfig;
  only?: string;
  from?: string;
  force: boolean;
  native: boolean;
  clean: boolean;
  /** Record a failure and carry on with the next dependency. */
  keepGoing: boolean;
}

export const DEFAULT_BUILD_OPTIONS: BuildOptions = {
  config: 'Release',
  force: false,
  native: false,
  clean: false,
  keepGoing: false,
};

/** Lifecycle of one dependency during a run. Nothing follows `failed`. */
export type DependencyState =
  | 'fetched'
  | 'configured'
  | 'built'
  | 'installed'
  | 'verified'
  | 'failed';

export type Outcome = 'built' | 'checked' | 'system' | 'skipped' | 'failed';

export interface DependencyResult {
  name: string;
  outcome: Outcome;
  detail: string;
  error?: unknown;
}

export interface RunSummary {
  results: DependencyResult[];
  failed: number;
}

// ── Selection ───────────────────────────────────────────────────────

/** Applies `--only` and `--from` (inclusive) in manifest order. */
export function selectDependencies(
  deps: DependencySpec[],
  filters: Pick<BuildOptions, 'only' | 'from'>,
): DependencySpec[] {
  const names = deps.map((d) => d.name);
  for (const [flag, value] of [
    ['--only', filters.only],
    ['--from', filters.from],
  ] as const) {
    if (value !== undefined && !names.includes(value)) {
      throw new ConfigurationError(`Unknown dependency for ${flag}: ${value} (known: ${names.join(', ')})`);
    }
  }

  let selected = deps;
  if (filters.from !== undefined) {
    selected = selected.slice(names.indexOf(filters.from));
  }
  if (filters.only !== undefined) {
    selected = selected.filter((d) => d.name === filters.only);
  }
  return selected;
}

// ── Configure command ───────────────────────────────────────────────

interface OptionRule {
  dependency: string;
  /** Options with this prefix are dropped off the listed systems. */
  prefix: string;
  onlyOn: OsKind[];
}

const OPTION_RULES: OptionRule[] = [
  { dependency: 'simage', prefix: '-DSIMAGE_USE_GDIPLUS=', onlyOn: ['windows'] },
];

/** Declared options with invalid ones for this OS removed and per-OS extras appended. */
export function sanitizeCmakeOptions(dep: DependencySpec, platform: PlatformProfile): string[] {
  const rules = OPTION_RULES.filter(
    (r) => r.dependency === dep.name.toLowerCase() && !r.onlyOn.includes(platform.os),
  );
  const kept = dep.cmake_options.filter((opt) => !rules.some((r) => opt.startsWith(r.prefix)));
  return [...kept, ...(dep.platform_options?.[platform.os] ?? [])];
}

export function nativeFlags(platform: PlatformProfile): string[] {
  const flags = platform.os === 'windows' ? '/O2 /DNDEBUG /arch:AVX2' : '-O3 -DNDEBUG -march=native';
  return [`-DCMAKE_C_FLAGS_RELEASE=${flags}`, `-DCMAKE_CXX_FLAGS_RELEASE=${flags}`];
}

export function cmakeGenerator(ctx: Pick<EngineContext, 'host'>): string[] {
  return ctx.host.which('ninja') ? ['-G', 'Ninja'] : [];
}

export function configureCommand(
  dep: DependencySpec,
  paths: DependencyPaths,
  ctx: EngineContext,
  opts: Pick<BuildOptions, 'config' | 'native'>,
  env: NodeJS.ProcessEnv,
): string[] {
  const resolveCtx = { ...ctx, env };
  const command = [
    'cmake',
    '-S',
    paths.srcDir,
    '-B',
    paths.buildDir,
    `-DCMAKE_INSTALL_PREFIX=${ctx.installRoot}`,
    ...cmakeGenerator(ctx),
    ...sanitizeCmakeOptions(dep, ctx.platform),
  ];

  const boostRoot = resolveBoostRoot(resolveCtx);
  if (boostRoot) {
    command.push(`-DBOOST_ROOT=${boostRoot}`);
    ctx.reporter.step('deps', `Using Boost from: ${boostRoot}`);
  } else {
    ctx.reporter.warn('Boost not detected automatically.');
  }

  const eigen = resolveMathHeaderIncludeRoot(resolveCtx);
  if (eigen) command.push(`-DEIGEN3_INCLUDE_DIR=${eigen}`);

  command.push(`-DCMAKE_BUILD_TYPE=${opts.config}`);

  const prefixes = resolvePrefixes(resolveCtx);
  if (prefixes.length > 0) command.push(`-DCMAKE_PREFIX_PATH=${prefixes.join(';')}`);

  const qtConfig = resolveQtConfigDir(resolveCtx, prefixes);
  if (qtConfig) command.push(`-DQt6_DIR=${qtConfig}`);

  if (opts.native) command.push(...nativeFlags(ctx.platform));
  return command;
}

export function buildAndInstallCommands(
  paths: DependencyPaths,
  platform: PlatformProfile,
  config: BuildConfig,
): { build: string[]; install: string[] } {
  if (platform.os === 'windows') {
    return {
      build: ['cmake', '--build', paths.buildDir, '--config', config],
      install: ['cmake', '--install', paths.buildDir, '--config', config],
    };
  }
  return {
    build: ['cmake', '--build', paths.buildDir, '--verbose'],
    install: ['cmake', '--install', paths.buildDir],
  };
}

// ── Steps ───────────────────────────────────────────────────────────

/**
 * Clones on first use. An existing checkout is moved only when the declared
 * tag differs from the one recorded at the last fetch.
 */
export async function fetchSource(dep: DependencySpec, paths: DependencyPaths, ctx: EngineContext): Promise<void> {
  const repo = dep.repo;
  if (!repo) {
    throw new ConfigurationError(`Dependency ${dep.name} has kind cmake but no repo`);
  }

  if (!dirExists(paths.srcDir)) {
    await ctx.reporter.task(`Cloning ${dep.name}`, () => ctx.git.clone(repo, paths.srcDir));
    if (dep.tag) await checkoutTag(dep.tag, paths, ctx);
    writeFetchedTag(paths, dep.tag);
    return;
  }

  if (!dep.tag) return;
  const recorded = readFetchedTag(paths);
  if (recorded === dep.tag) return;

  ctx.reporter.step(dep.name, `Tag changed (${recorded || 'untracked'} → ${dep.tag}); updating checkout`);
  await checkoutTag(dep.tag, paths, ctx);
  writeFetchedTag(paths, dep.tag);
}

async function checkoutTag(tag: string, paths: DependencyPaths, ctx: EngineContext): Promise<void> {
  await ctx.git.fetchTags(paths.srcDir);
  await ctx.git.checkout(paths.srcDir, tag);
}

function hintsAfterStep(ctx: EngineContext, env: NodeJS.ProcessEnv): void {
  refreshHints({ ...ctx, env }, ctx.layout.hintsPath);
}

function advanceTo(ctx: EngineContext, dep: DependencySpec, state: DependencyState): void {
  ctx.reporter.debug(`${dep.name}: ${state}`);
}

async function buildFromSource(dep: DependencySpec, ctx: EngineContext, opts: BuildOptions): Promise<void> {
  const paths = dependencyPaths(ctx.layout, dep.name);
  const advance = (state: DependencyState) => advanceTo(ctx, dep, state);

  ensureDir(paths.stepDir);
  ensureDir(ctx.installRoot);

  await fetchSource(dep, paths, ctx);
  advance('fetched');

  // Every process sees the derived developer environment on Windows.
  const env = deriveDevEnvironment(ctx.env, ctx);

  const configure = configureCommand(dep, paths, ctx, opts, env);
  ctx.reporter.debug(configure.join(' '));
  await ctx.reporter.task(`Configuring ${dep.name}`, () => ctx.runner.run(configure, { env }));
  advance('configured');

  const { build, install } = buildAndInstallCommands(paths, ctx.platform, opts.config);
  await ctx.reporter.task(`Building ${dep.name}`, () => ctx.runner.run(build, { env }));
  advance('built');
  await ctx.reporter.task(`Installing ${dep.name}`, () => ctx.runner.run(install, { env }));
  advance('installed');
  hintsAfterStep(ctx, env);

  await verifyDependency(dep, ctx);
  writeMarker(ctx.layout, dep.name);
  advance('verified');
  hintsAfterStep(ctx, env);
}

async function checkPresence(dep: DependencySpec, ctx: EngineContext): Promise<void> {
  ctx.reporter.step('check', `Verifying presence of ${dep.name} via compile-check…`);
  requireCompiler(ctx, `check dependency ${dep.name}`);
  await verifyDependency(dep, ctx);
  writeMarker(ctx.layout, dep.name);
  hintsAfterStep(ctx, ctx.env);
}

/**
 * Takes one dependency from wherever it stands to verified. Returns what was
 * done; errors propagate.
 */
export async function provisionDependency(
  dep: DependencySpec,
  ctx: EngineContext,
  opts: BuildOptions,
): Promise<DependencyResult> {
  const { reporter, layout } = ctx;

  if (isVerified(layout, dep.name) && !opts.force) {
    reporter.info(`Skipping ${dep.name}: already verified (.ok). Use --force to rebuild.`);
    return { name: dep.name, outcome: 'skipped', detail: 'already verified' };
  }

  const system = detectSystemPackage(dep.system_package, ctx);
  if (system) {
    const how = describeSystemPackage(system);
    reporter.step('deps', `Using system ${dep.name} (${how}); skipping local build.`);
    writeMarker(layout, dep.name);
    hintsAfterStep(ctx, ctx.env);
    return { name: dep.name, outcome: 'system', detail: how };
  }

  const paths = dependencyPaths(layout, dep.name);
  if (opts.clean && dirExists(paths.buildDir)) {
    reporter.step('clean', `Removing ${paths.buildDir}`);
    removeDir(paths.buildDir);
  }

  if (dep.kind === 'check') {
    await checkPresence(dep, ctx);
    reporter.ok(`${dep.name} OK (presence verified)`);
    return { name: dep.name, outcome: 'checked', detail: 'presence verified' };
  }

  await buildFromSource(dep, ctx, opts);
  reporter.ok(`${dep.name} OK (installed to ${ctx.installRoot})`);
  return { name: dep.name, outcome: 'built', detail: `installed to ${ctx.installRoot}` };
}

/** Processes the manifest in order, one dependency at a time. */
export async function runBuild(manifest: Manifest, ctx: EngineContext, opts: BuildOptions): Promise<RunSummary> {
  const { reporter } = ctx;
  hintsAfterStep(ctx, ctx.env);

  if (manifest.deps.length === 0) {
    reporter.warn('Manifest is empty.');
    return { results: [], failed: 0 };
  }

  const selected = selectDependencies(manifest.deps, opts);
  reporter.info(`Loaded ${manifest.deps.length} dependencies; ${selected.length} selected.`);

  const results: DependencyResult[] = [];
  for (const dep of selected) {
    reporter.info(`=== [${dep.name}] ===`);
    try {
      results.push(await provisionDependency(dep, ctx, opts));
    } catch (err) {
      advanceTo(ctx, dep, 'failed');
      if (!opts.keepGoing || !isProvisionError(err)) throw err;
      reporter.warn(`${dep.name} failed: ${err.message}`);
      const output = capturedOutput(err);
      if (output) reporter.output(output);
      results.push({ name: dep.name, outcome: 'failed', detail: err.message, error: err });
    }
  }

  return { results, failed: results.filter((r) => r.outcome === 'failed').length };
}

import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { resolveLayout, type ProjectLayout } from '../../src/config/settings.js';
import { createEngineContext, type EngineContext } from '../../src/core/context.js';
import type { HostQuery } from '../../src/core/host.js';
import { NO_OVERRIDES, type OverrideSet } from '../../src/core/overrides.js';
import type { Reporter } from '../../src/core/reporter.js';
import type { ProcessRunner, RunOptions } from '../../src/core/runner.js';
import type { SourceControl } from '../../src/core/source.js';
import {
  platformProfile,
  type HostLocations,
  type OsKind,
  type PlatformProfile,
} from '../../src/utils/platform.js';

export function makeTempDir(label: string): string {
  return mkdtempSync(join(tmpdir(), `nativedeps-${label}-`));
}

export function touch(path: string, content = ''): string {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, 'utf-8');
  return path;
}

export function mkdirs(...paths: string[]): void {
  for (const p of paths) mkdirSync(p, { recursive: true });
}

/** Host locations that point nowhere, so nothing on the real machine leaks in. */
export function emptyLocations(): HostLocations {
  return {
    systemPrefixes: [],
    qtInstallGlobs: [],
    qtSystemCmakeDirs: [],
    linuxIncludeBase: '',
    boostGlobs: [],
    boostSystemPrefixes: [],
    eigenSystemDirs: [],
    eigenGlobs: [],
    mocCandidates: [],
    sdkLibRoots: [],
    vswherePath: null,
    visualStudioBases: [],
  };
}

export function testProfile(os: OsKind, locations: Partial<HostLocations> = {}): PlatformProfile {
  return platformProfile(os, {
    arch: 'x64',
    home: '/nonexistent-home',
    locations: { ...emptyLocations(), ...locations },
  });
}

export interface StubHostOptions {
  which?: Record<string, string>;
  capture?: (command: string, args: string[]) => string | null;
  succeeds?: (command: string, args: string[]) => boolean;
}

export function stubHost(opts: StubHostOptions = {}): HostQuery {
  return {
    which: (command) => opts.which?.[command] ?? null,
    capture: (command, args) => opts.capture?.(command, args) ?? null,
    succeeds: (command, args) => opts.succeeds?.(command, args) ?? false,
  };
}

export interface RecordedRun {
  command: string[];
  opts: RunOptions;
}

/** Records every invocation; the handler may simulate side effects or throw. */
export class FakeRunner implements ProcessRunner {
  readonly calls: RecordedRun[] = [];

  constructor(private readonly handler: (command: string[], opts: RunOptions) => string | void = () => {}) {}

  async run(command: string[], opts: RunOptions = {}): Promise<string> {
    this.calls.push({ command, opts });
    const out = this.handler(command, opts);
    return typeof out === 'string' ? out : '';
  }

  commands(): string[] {
    return this.calls.map((c) => c.command.join(' '));
  }
}

/** Records git operations; a clone creates an empty checkout directory. */
export class FakeGit implements SourceControl {
  readonly calls: string[] = [];

  constructor(private readonly failWith?: Error) {}

  async clone(repo: string, dest: string): Promise<void> {
    this.record(`clone ${repo} ${dest}`);
    mkdirs(dest);
  }

  async fetchTags(dir: string): Promise<void> {
    this.record(`fetch --tags in ${dir}`);
  }

  async checkout(dir: string, ref: string): Promise<void> {
    this.record(`checkout ${ref} in ${dir}`);
  }

  private record(call: string): void {
    this.calls.push(call);
    if (this.failWith) throw this.failWith;
  }
}

export class RecordingReporter implements Reporter {
  readonly lines: string[] = [];

  info(msg: string): void {
    this.lines.push(`info: ${msg}`);
  }

  ok(msg: string): void {
    this.lines.push(`ok: ${msg}`);
  }

  warn(msg: string): void {
    this.lines.push(`warn: ${msg}`);
  }

  step(tag: string, msg: string): void {
    this.lines.push(`[${tag}] ${msg}`);
  }

  debug(msg: string): void {
    this.lines.push(`debug: ${msg}`);
  }

  output(text: string): void {
    this.lines.push(`output: ${text}`);
  }

  task<T>(label: string, fn: () => Promise<T>): Promise<T> {
    this.lines.push(`task: ${label}`);
    return fn();
  }
}

export interface EngineFixture {
  ctx: EngineContext;
  layout: ProjectLayout;
  runner: FakeRunner;
  git: FakeGit;
  reporter: RecordingReporter;
}

export interface EngineFixtureOptions {
  os?: OsKind;
  env?: NodeJS.ProcessEnv;
  overrides?: OverrideSet;
  host?: HostQuery;
  runner?: FakeRunner;
  git?: FakeGit;
  locations?: Partial<HostLocations>;
}

export function engineFixture(root: string, opts: EngineFixtureOptions = {}): EngineFixture {
  const layout = resolveLayout(root, {});
  const runner = opts.runner ?? new FakeRunner();
  const git = opts.git ?? new FakeGit();
  const reporter = new RecordingReporter();
  const ctx = createEngineContext({
    platform: testProfile(opts.os ?? 'linux', opts.locations),
    env: opts.env ?? {},
    overrides: opts.overrides ?? NO_OVERRIDES,
    host: opts.host ?? stubHost(),
    layout,
    runner,
    git,
    reporter,
  });
  return { ctx, layout, runner, git, reporter };
}

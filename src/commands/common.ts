import type { Command } from 'commander';
import { envVar } from '../config/branding.js';
import { resolveLayout } from '../config/settings.js';
import { createEngineContext, type EngineContext } from '../core/context.js';
import { capturedOutput, isProvisionError } from '../core/errors.js';
import { createHostQuery } from '../core/host.js';
import { OVERRIDE_ENV, buildOverrideSet } from '../core/overrides.js';
import { createProcessRunner } from '../core/runner.js';
import { createSourceControl } from '../core/source.js';
import { findRepoRoot } from '../utils/git.js';
import { detectPlatform } from '../utils/platform.js';
import { consoleReporter, fail } from '../ui/output.js';
import { spinnerProgress } from '../ui/spinner.js';

export interface CommonOptions {
  qtRoot?: string;
  boostRoot?: string;
  eigenRoot?: string;
  project?: string;
  verbose?: boolean;
}

export function withCommonOptions(cmd: Command): Command {
  return cmd
    .option('--qt-root <dir>', `Qt 6 prefix containing lib/cmake/Qt6 (env ${OVERRIDE_ENV.qt})`)
    .option('--boost-root <dir>', `Boost root with boost/ headers (env ${OVERRIDE_ENV.boost})`)
    .option('--eigen-root <dir>', `Eigen root or include dir (env ${OVERRIDE_ENV.eigen})`)
    .option('--project <dir>', `Project root (env ${envVar('PROJECT_ROOT')})`)
    .option('-v, --verbose', `Show commands and process output (env ${envVar('VERBOSE')}=1)`);
}

export function resolveProjectRoot(flag: string | undefined, env: NodeJS.ProcessEnv): string {
  return flag ?? env[envVar('PROJECT_ROOT')] ?? findRepoRoot() ?? process.cwd();
}

export function isVerbose(opts: CommonOptions, env: NodeJS.ProcessEnv): boolean {
  return opts.verbose === true || env[envVar('VERBOSE')] === '1';
}

/** Validates overrides and wires the console into a fresh engine context. */
export function openSession(opts: CommonOptions, env: NodeJS.ProcessEnv = process.env): EngineContext {
  const platform = detectPlatform();
  const layout = resolveLayout(resolveProjectRoot(opts.project, env), env);
  const overrides = buildOverrideSet(opts, env);
  const verbose = isVerbose(opts, env);
  const interactive = process.stdout.isTTY === true;

  const onOutput = verbose
    ? (chunk: string) => {
        process.stdout.write(chunk);
      }
    : interactive
      ? spinnerProgress
      : undefined;

  return createEngineContext({
    platform,
    env,
    overrides,
    host: createHostQuery(platform),
    layout,
    runner: createProcessRunner(onOutput),
    git: createSourceControl(),
    reporter: consoleReporter({ verbose, interactive }),
  });
}

/** Prints the error (and any captured process output) and exits non-zero. */
export function reportError(err: unknown, outputShown = false): never {
  if (isProvisionError(err)) {
    fail(err.message);
    const output = capturedOutput(err);
    if (output && !outputShown) console.error(output.trimEnd());
  } else {
    fail(err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
}

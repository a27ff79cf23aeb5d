import { Option, type Command } from 'commander';
import { ConfigurationError } from '../core/errors.js';
import { loadManifest } from '../core/manifest.js';
import {
  BUILD_CONFIGS,
  runBuild,
  type BuildConfig,
  type BuildOptions,
  type RunSummary,
} from '../core/orchestrator.js';
import { fail, ok } from '../ui/output.js';
import { printTable } from '../ui/table.js';
import { isVerbose, openSession, reportError, withCommonOptions, type CommonOptions } from './common.js';

interface BuildCommandOptions extends CommonOptions {
  config: string;
  only?: string;
  from?: string;
  force?: boolean;
  native?: boolean;
  clean?: boolean;
  keepGoing?: boolean;
}

function parseConfig(value: string): BuildConfig {
  const config = BUILD_CONFIGS.find((c) => c === value);
  if (!config) {
    throw new ConfigurationError(`Unknown build configuration: ${value}`);
  }
  return config;
}

export function toBuildOptions(opts: BuildCommandOptions): BuildOptions {
  return {
    config: parseConfig(opts.config),
    only: opts.only,
    from: opts.from,
    force: opts.force === true,
    native: opts.native === true,
    clean: opts.clean === true,
    keepGoing: opts.keepGoing === true,
  };
}

function printSummary(summary: RunSummary): void {
  if (summary.results.length === 0) return;
  console.log('');
  printTable(
    ['Dependency', 'Outcome', 'Detail'],
    summary.results.map((r) => [r.name, r.outcome, r.detail]),
  );
}

export function registerBuild(program: Command): void {
  withCommonOptions(
    program
      .command('build')
      .description('Fetch, build, install and verify the dependencies in the manifest')
      .addOption(
        new Option('--config <name>', 'CMake build configuration')
          .choices(BUILD_CONFIGS)
          .default('Release'),
      )
      .option('--only <name>', 'Build only this dependency')
      .option('--from <name>', 'Start from this dependency (inclusive)')
      .option('--force', 'Rebuild even if already verified')
      .option('--native', 'CPU-tuned release flags (-march=native or /arch:AVX2)')
      .option('--clean', 'Remove each build directory before configuring')
      .option('--keep-going', 'Continue with the next dependency after a failure'),
  ).action(async (opts: BuildCommandOptions) => {
    const verbose = isVerbose(opts, process.env);
    try {
      const ctx = openSession(opts);
      const manifest = loadManifest(ctx.layout.manifestPath);
      const summary = await runBuild(manifest, ctx, toBuildOptions(opts));
      printSummary(summary);

      if (summary.failed > 0) {
        fail(`${summary.failed} of ${summary.results.length} dependencies failed.`);
        process.exit(1);
      }
      if (summary.results.length > 0) ok('All selected dependencies are verified.');
    } catch (err) {
      reportError(err, verbose);
    }
  });
}

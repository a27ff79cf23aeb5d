import type { Command } from 'commander';
import chalk from 'chalk';
import { runDoctor, type CheckStatus, type DoctorCheck } from '../core/doctor.js';
import { loadManifest } from '../core/manifest.js';
import type { Manifest } from '../types/manifest.js';
import { DISPLAY_NAME } from '../config/branding.js';
import { fileExists } from '../utils/fs.js';
import { fail, info, ok, warn } from '../ui/output.js';
import { openSession, reportError, withCommonOptions, type CommonOptions } from './common.js';

const PRINTERS: Record<CheckStatus, (msg: string) => void> = { ok, warn, fail, info };

export function formatCheck(check: DoctorCheck): string {
  return `  ${check.label}: ${check.detail}`;
}

function printChecks(checks: DoctorCheck[]): void {
  let section = '';
  for (const check of checks) {
    if (check.section !== section) {
      section = check.section;
      console.log(`\n${chalk.bold(`${section}:`)}`);
    }
    PRINTERS[check.status](formatCheck(check));
  }
  console.log('');
}

export function registerDoctor(program: Command): void {
  withCommonOptions(
    program.command('doctor').description('Report toolchain, prefixes and dependency state (read-only)'),
  ).action((opts: CommonOptions) => {
    try {
      const ctx = openSession(opts);
      let manifest: Manifest | null = null;
      if (fileExists(ctx.layout.manifestPath)) {
        manifest = loadManifest(ctx.layout.manifestPath);
      }

      console.log(`\n${DISPLAY_NAME} Doctor`);
      const checks = runDoctor(ctx, manifest, process.version);
      printChecks(checks);

      const problems = checks.filter((c) => c.status === 'fail').length;
      if (problems > 0) {
        warn(`Doctor found ${problems} problem(s).`);
      } else {
        ok('Doctor complete.');
      }
    } catch (err) {
      reportError(err);
    }
  });
}

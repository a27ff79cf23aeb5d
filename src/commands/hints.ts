import type { Command } from 'commander';
import { refreshHints } from '../core/hints.js';
import { info, ok } from '../ui/output.js';
import { openSession, reportError, withCommonOptions, type CommonOptions } from './common.js';

export function registerHints(program: Command): void {
  withCommonOptions(
    program.command('hints').description('Regenerate the CMake hints file without building anything'),
  ).action((opts: CommonOptions) => {
    try {
      const ctx = openSession(opts);
      const doc = refreshHints(ctx, ctx.layout.hintsPath);
      ok(`Wrote ${ctx.layout.hintsPath}`);
      info(`CMAKE_PREFIX_PATH: ${doc.prefixes.length} entries`);
      if (doc.qt6Dir) info(`Qt6_DIR: ${doc.qt6Dir}`);
      if (doc.eigenIncludeDir) info(`EIGEN3_INCLUDE_DIR: ${doc.eigenIncludeDir}`);
      if (doc.boostRoot) info(`BOOST_ROOT: ${doc.boostRoot}`);
    } catch (err) {
      reportError(err);
    }
  });
}

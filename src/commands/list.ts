import type { Command } from 'commander';
import { loadManifest, libNameCandidates } from '../core/manifest.js';
import { isVerified } from '../core/state.js';
import { printTable } from '../ui/table.js';
import { openSession, reportError, withCommonOptions, type CommonOptions } from './common.js';

interface ListCommandOptions extends CommonOptions {
  json?: boolean;
}

export function registerList(program: Command): void {
  withCommonOptions(
    program
      .command('list')
      .description('List manifest dependencies and whether they are verified')
      .option('--json', 'Output as JSON'),
  ).action((opts: ListCommandOptions) => {
    try {
      const ctx = openSession(opts);
      const manifest = loadManifest(ctx.layout.manifestPath);
      const entries = manifest.deps.map((dep) => ({
        name: dep.name,
        kind: dep.kind,
        tag: dep.tag ?? null,
        libraries: libNameCandidates(dep),
        verified: isVerified(ctx.layout, dep.name),
      }));

      if (opts.json) {
        console.log(JSON.stringify(entries, null, 2));
        return;
      }

      if (entries.length === 0) {
        console.log('Manifest is empty.');
        return;
      }

      printTable(
        ['Name', 'Kind', 'Tag', 'Libraries', 'Verified'],
        entries.map((e) => [e.name, e.kind, e.tag ?? '-', e.libraries.join(', ') || '-', e.verified ? 'yes' : 'no']),
      );
    } catch (err) {
      reportError(err);
    }
  });
}

import type { SystemPackage } from '../types/manifest.js';
import type { ResolveContext } from './context.js';
import { fileExists } from '../utils/fs.js';

export interface SystemSatisfaction {
  /** `pkg-config` module that answered, or the header that was found. */
  source: string;
  via: 'pkg-config' | 'header';
  version: string | null;
}

/**
 * Whether the OS already provides a dependency. `pkg-config` modules are asked
 * first, in declared order; header paths are the fallback.
 */
export function detectSystemPackage(
  pkg: SystemPackage | undefined,
  ctx: Pick<ResolveContext, 'platform' | 'host'>,
): SystemSatisfaction | null {
  if (!pkg || !pkg.platforms.includes(ctx.platform.os)) return null;

  if (pkg.pkg_config.length > 0 && ctx.host.which('pkg-config')) {
    for (const module of pkg.pkg_config) {
      if (!ctx.host.succeeds('pkg-config', ['--exists', module])) continue;
      return {
        source: module,
        via: 'pkg-config',
        version: ctx.host.capture('pkg-config', ['--modversion', module]),
      };
    }
  }

  const header = pkg.headers.find(fileExists);
  return header ? { source: header, via: 'header', version: null } : null;
}

export function describeSystemPackage(found: SystemSatisfaction): string {
  if (found.via === 'header') return `system headers (${found.source})`;
  return found.version
    ? `pkg-config ${found.source} ${found.version}`
    : `pkg-config ${found.source}`;
}

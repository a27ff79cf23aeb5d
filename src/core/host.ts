import { execFileSync } from 'node:child_process';
import type { PlatformProfile } from '../utils/platform.js';

/**
 * Read-only queries against tools already on the host. Every method is
 * best-effort: a missing tool or a failing query yields `null`.
 */
export interface HostQuery {
  which(command: string): string | null;
  capture(command: string, args: string[]): string | null;
  /** True when the command exits 0; output is discarded. */
  succeeds(command: string, args: string[]): boolean;
}

export function createHostQuery(platform: PlatformProfile): HostQuery {
  const locator = platform.os === 'windows' ? 'where' : 'which';

  return {
    which(command) {
      try {
        const out = execFileSync(locator, [command], {
          encoding: 'utf-8',
          stdio: ['ignore', 'pipe', 'ignore'],
        });
        const first = out.split(/\r?\n/).find((line) => line.trim().length > 0);
        return first ? first.trim() : null;
      } catch {
        return null;
      }
    },

    capture(command, args) {
      try {
        const out = execFileSync(command, args, {
          encoding: 'utf-8',
          stdio: ['ignore', 'pipe', 'ignore'],
          windowsVerbatimArguments: command.toLowerCase().endsWith('cmd.exe'),
        }).trim();
        return out.length > 0 ? out : null;
      } catch {
        return null;
      }
    },

    succeeds(command, args) {
      try {
        execFileSync(command, args, { stdio: 'ignore' });
        return true;
      } catch {
        return false;
      }
    },
  };
}

import { execFileSync } from 'node:child_process';

export function findRepoRoot(cwd?: string): string | null {
  try {
    return execFileSync('git', ['rev-parse', '--show-toplevel'], {
      cwd: cwd ?? process.cwd(),
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'ignore'],
    }).trim();
  } catch {
    return null;
  }
}

export function cloneCommand(repo: string, dest: string): string[] {
  return ['git', 'clone', '--recurse-submodules', repo, dest];
}

export function fetchTagsCommand(): string[] {
  return ['git', 'fetch', '--tags'];
}

export function checkoutCommand(ref: string): string[] {
  return ['git', 'checkout', ref];
}

import { GitError, simpleGit } from 'simple-git';
import { ExternalProcessError } from './errors.js';
import { checkoutCommand, cloneCommand, fetchTagsCommand } from '../utils/git.js';

/** The git operations the fetch step needs. */
export interface SourceControl {
  clone(repo: string, dest: string): Promise<void>;
  fetchTags(dir: string): Promise<void>;
  checkout(dir: string, ref: string): Promise<void>;
}

async function gitStep(command: string[], fn: () => Promise<unknown>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    if (err instanceof GitError) {
      throw new ExternalProcessError(command, 1, err.message);
    }
    throw err;
  }
}

export function createSourceControl(): SourceControl {
  return {
    clone: (repo, dest) =>
      gitStep(cloneCommand(repo, dest), () => simpleGit().clone(repo, dest, ['--recurse-submodules'])),
    fetchTags: (dir) => gitStep(fetchTagsCommand(), () => simpleGit(dir).fetch(['--tags'])),
    checkout: (dir, ref) => gitStep(checkoutCommand(ref), () => simpleGit(dir).checkout(ref)),
  };
}

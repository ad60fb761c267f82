import { simpleGit } from 'simple-git';
import type { CloneOptions, RepositoryCloner } from './repository-cache.js';

/**
 * Shallow clones through the git binary. git runs as a child process, so a
 * long clone never blocks the event loop.
 */
export class GitCloner implements RepositoryCloner {
  async clone(url: string, destination: string, options: CloneOptions): Promise<void> {
    const git = simpleGit({ abort: AbortSignal.timeout(options.timeoutMs) });
    await git.clone(url, destination, ['--depth', String(options.depth), '--single-branch']);
  }
}

import { existsSync, mkdirSync } from 'node:fs';
import { rm } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { logger } from '@task-transformer/logger';
import { CloneError, TemplateNotFoundError, formatError } from '../errors.js';

const log = logger.cache;

/** History is never needed */
export const CLONE_DEPTH = 1;

export interface CloneOptions {
  depth: number;
  timeoutMs: number;
}

export interface RepositoryCloner {
  clone(url: string, destination: string, options: CloneOptions): Promise<void>;
}

export interface RepositoryCacheOptions {
  /** Cache root; created when the cache is constructed */
  root: string;
  cloner: RepositoryCloner;
  cloneUrl: (repository: string) => string;
  cloneTimeoutMs: number;
}

/**
 * Local cache of template clones, one directory per repository name.
 *
 * An existing directory is a cache hit: it is never re-fetched or checked.
 * Concurrent `materialize` calls for the same name share one clone.
 */
export class RepositoryCache {
  readonly root: string;
  private inFlight = new Map<string, Promise<string>>();

  constructor(private options: RepositoryCacheOptions) {
    this.root = resolve(options.root);
    mkdirSync(this.root, { recursive: true });
  }

  pathFor(repository: string): string {
    if (!repository || repository === '.' || repository === '..' || /[\\/]/.test(repository)) {
      throw new TemplateNotFoundError(`Invalid repository name: "${repository}"`);
    }
    return join(this.root, repository);
  }

  /**
   * Local path holding a shallow clone of `repository`, cloning only if absent
   */
  materialize(repository: string): Promise<string> {
    const pending = this.inFlight.get(repository);
    if (pending) {
      log.debug(`Joining in-flight clone of ${repository}`);
      return pending;
    }

    let destination: string;
    try {
      destination = this.pathFor(repository);
    } catch (error) {
      return Promise.reject(error);
    }

    if (existsSync(destination)) {
      log.debug(`Cache hit: ${destination}`);
      return Promise.resolve(destination);
    }

    const clone = this.clone(repository, destination).finally(() => {
      this.inFlight.delete(repository);
    });
    this.inFlight.set(repository, clone);
    return clone;
  }

  private async clone(repository: string, destination: string): Promise<string> {
    log.info(`Cloning ${repository} into ${destination}`);

    try {
      await this.options.cloner.clone(this.options.cloneUrl(repository), destination, {
        depth: CLONE_DEPTH,
        timeoutMs: this.options.cloneTimeoutMs,
      });
    } catch (error) {
      // A partial directory would otherwise count as a cache hit
      await rm(destination, { recursive: true, force: true });
      throw new CloneError(repository, `Failed to clone ${repository}: ${formatError(error)}`, { cause: error });
    }

    log.success(`Cloned ${repository}`);
    return destination;
  }
}

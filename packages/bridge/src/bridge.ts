import { GitCloner } from './cache/git-cloner.js';
import { RepositoryCache, type RepositoryCloner } from './cache/repository-cache.js';
import { TaskCatalog } from './catalog.js';
import type { BridgeConfig } from './config.js';
import { TaskBuilder } from './builder.js';
import { GitHubRepositoryHost } from './host/github-host.js';
import type { RepositoryHost } from './host/types.js';

export interface Bridge {
  config: BridgeConfig;
  host: RepositoryHost;
  catalog: TaskCatalog;
  cache: RepositoryCache;
  builder: TaskBuilder;
}

export interface BridgeDependencies {
  host?: RepositoryHost;
  cloner?: RepositoryCloner;
}

/**
 * Wire the catalog, cache and builder for one configuration
 */
export function createBridge(config: BridgeConfig, dependencies: BridgeDependencies = {}): Bridge {
  const host = dependencies.host ?? new GitHubRepositoryHost({
    organization: config.organization,
    token: config.githubToken,
    readmeRef: config.readmeRef,
    limits: config.limits,
    timeouts: config.timeouts,
  });

  const catalog = new TaskCatalog(host, {
    excludedRepositories: config.excludedRepositories,
    limits: config.limits,
  });

  const cache = new RepositoryCache({
    root: config.cacheDir,
    cloner: dependencies.cloner ?? new GitCloner(),
    cloneUrl: repository => host.cloneUrl(repository),
    cloneTimeoutMs: config.timeouts.cloneMs,
  });

  return { config, host, catalog, cache, builder: new TaskBuilder(catalog, cache) };
}

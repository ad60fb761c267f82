/**
 * Template catalog
 *
 * Lists the organization's task template repositories and enriches them with
 * README snippets and branch names. Catalog failures propagate; enrichment
 * failures degrade to empty values.
 */

import { logger } from '@task-transformer/logger';
import type { BridgeLimits } from './config.js';
import { DegradedFetchError, RemoteServiceError, formatError } from './errors.js';
import type { RepositoryHost } from './host/types.js';

const log = logger.catalog;

export interface RepositoryDescriptor {
  name: string;
  readmeSnippet: string;
  branches: string[];
}

export interface TaskCatalogOptions {
  excludedRepositories: readonly string[];
  limits: Pick<BridgeLimits, 'maxBranches' | 'readmeSnippetLength'>;
}

/**
 * Truncate first, then collapse newlines, so the snippet never exceeds `maxLength`
 */
export function toReadmeSnippet(text: string, maxLength: number): string {
  return text.slice(0, maxLength).replace(/\r?\n/g, ' ');
}

export class TaskCatalog {
  private excluded: ReadonlySet<string>;

  constructor(private host: RepositoryHost, private options: TaskCatalogOptions) {
    this.excluded = new Set(options.excludedRepositories);
  }

  /**
   * Eligible template repositories in the order the host returned them.
   * Throws `RemoteServiceError` when the host cannot list the organization.
   */
  async listTaskRepositories(): Promise<string[]> {
    let names: string[];
    try {
      names = await this.host.listOrganizationRepositories();
    } catch (error) {
      if (error instanceof RemoteServiceError) {
        throw error;
      }
      throw new RemoteServiceError(`Failed to list template repositories: ${formatError(error)}`, { cause: error });
    }

    const repositories = names.filter(name => !this.excluded.has(name));
    log.debug(`${repositories.length} template repositories (${names.length - repositories.length} excluded)`);
    return repositories;
  }

  /**
   * Up to `maxBranches` branch names; empty when the lookup fails
   */
  async listBranches(repository: string): Promise<string[]> {
    try {
      const branches = await this.host.listBranches(repository);
      return branches.slice(0, this.options.limits.maxBranches);
    } catch (error) {
      this.reportDegraded(error, `branches of ${repository}`);
      return [];
    }
  }

  /**
   * README excerpt bounded to `readmeSnippetLength`; empty when the fetch fails
   */
  async readmeSnippet(repository: string): Promise<string> {
    try {
      const readme = await this.host.fetchReadme(repository);
      return toReadmeSnippet(readme, this.options.limits.readmeSnippetLength);
    } catch (error) {
      this.reportDegraded(error, `README of ${repository}`);
      return '';
    }
  }

  /**
   * Enrich every repository concurrently. Each result carries its own name,
   * and the output follows the input order.
   */
  async describe(
    repositories: readonly string[],
    options: { branches: boolean }
  ): Promise<RepositoryDescriptor[]> {
    return Promise.all(repositories.map(async (name): Promise<RepositoryDescriptor> => {
      const [readmeSnippet, branches] = await Promise.all([
        this.readmeSnippet(name),
        options.branches ? this.listBranches(name) : Promise.resolve<string[]>([]),
      ]);
      return { name, readmeSnippet, branches };
    }));
  }

  private reportDegraded(error: unknown, what: string): void {
    const degraded = error instanceof DegradedFetchError
      ? error
      : new DegradedFetchError(`${what} unavailable: ${formatError(error)}`, { cause: error });
    log.debug(`Degraded fetch: ${degraded.message}`);
  }
}

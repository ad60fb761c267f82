import { Octokit } from '@octokit/rest';
import { logger } from '@task-transformer/logger';
import type { BridgeLimits, BridgeTimeouts } from '../config.js';
import { DegradedFetchError, RemoteServiceError, formatError, statusOf } from '../errors.js';
import type { RepositoryHost } from './types.js';

const log = logger.github;

export interface GitHubRepositoryHostOptions {
  organization: string;
  token?: string;
  readmeRef: string;
  limits: Pick<BridgeLimits, 'reposPerPage' | 'branchesPerPage'>;
  timeouts: Pick<BridgeTimeouts, 'catalogMs' | 'branchesMs' | 'readmeMs'>;
  /** Replaces the global fetch for API and raw content requests */
  fetch?: typeof fetch;
  apiBaseUrl?: string;
  rawBaseUrl?: string;
  webBaseUrl?: string;
}

export class GitHubRepositoryHost implements RepositoryHost {
  private octokit: Octokit;
  private fetchImpl: typeof fetch;
  private rawBaseUrl: string;
  private webBaseUrl: string;

  constructor(private options: GitHubRepositoryHostOptions) {
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.rawBaseUrl = (options.rawBaseUrl ?? 'https://raw.githubusercontent.com').replace(/\/$/, '');
    this.webBaseUrl = (options.webBaseUrl ?? 'https://github.com').replace(/\/$/, '');
    this.octokit = new Octokit({
      auth: options.token,
      baseUrl: options.apiBaseUrl,
      userAgent: 'task-transformer',
      request: { fetch: this.fetchImpl },
      log: { debug: log.debug, info: log.debug, warn: log.warn, error: log.error },
    });
  }

  async listOrganizationRepositories(): Promise<string[]> {
    const { organization, limits, timeouts } = this.options;

    // Octokit surfaces an aborted request as a RequestError with status 500
    const signal = AbortSignal.timeout(timeouts.catalogMs);
    try {
      const response = await this.octokit.rest.repos.listForOrg({
        org: organization,
        per_page: limits.reposPerPage,
        request: { signal },
      });
      log.debug(`Listed ${response.data.length} repositories for ${organization}`);
      return response.data.map(repo => repo.name);
    } catch (error) {
      if (signal.aborted) {
        throw new RemoteServiceError(
          `Listing repositories for ${organization} timed out after ${timeouts.catalogMs}ms`,
          { cause: error }
        );
      }
      const status = statusOf(error);
      throw new RemoteServiceError(
        `Failed to list repositories for ${organization}${status ? ` (HTTP ${status})` : ''}: ${formatError(error)}`,
        { status, cause: error }
      );
    }
  }

  async listBranches(repository: string): Promise<string[]> {
    const { organization, limits, timeouts } = this.options;

    const signal = AbortSignal.timeout(timeouts.branchesMs);
    try {
      const response = await this.octokit.rest.repos.listBranches({
        owner: organization,
        repo: repository,
        per_page: limits.branchesPerPage,
        request: { signal },
      });
      return response.data.map(branch => branch.name);
    } catch (error) {
      if (signal.aborted) {
        throw new DegradedFetchError(
          `Branches of ${repository} timed out after ${timeouts.branchesMs}ms`,
          { cause: error }
        );
      }
      throw new DegradedFetchError(
        `Branches of ${repository} unavailable: ${formatError(error)}`,
        { status: statusOf(error), cause: error }
      );
    }
  }

  async fetchReadme(repository: string): Promise<string> {
    const { organization, readmeRef, timeouts } = this.options;
    const url = `${this.rawBaseUrl}/${organization}/${repository}/${readmeRef}/README.md`;

    const signal = AbortSignal.timeout(timeouts.readmeMs);
    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal });
    } catch (error) {
      const reason = signal.aborted ? `timed out after ${timeouts.readmeMs}ms` : formatError(error);
      throw new DegradedFetchError(`README of ${repository} unavailable: ${reason}`, { cause: error });
    }

    if (!response.ok) {
      throw new DegradedFetchError(
        `README of ${repository} unavailable: HTTP ${response.status}`,
        { status: response.status }
      );
    }
    return await response.text();
  }

  cloneUrl(repository: string): string {
    const url = `${this.webBaseUrl}/${this.options.organization}/${repository}.git`;
    if (this.options.token && url.startsWith('https://')) {
      return url.replace('https://', `https://${this.options.token}@`);
    }
    return url;
  }
}

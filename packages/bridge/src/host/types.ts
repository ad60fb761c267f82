/**
 * Remote repository hosting seam used by the catalog and the cache.
 *
 * `listOrganizationRepositories` failures are fatal (`RemoteServiceError`);
 * `listBranches` and `fetchReadme` failures are enrichment failures
 * (`DegradedFetchError`).
 */
export interface RepositoryHost {
  /** Names of the organization's repositories, first page only */
  listOrganizationRepositories(): Promise<string[]>;
  listBranches(repository: string): Promise<string[]>;
  /** Raw README.md text on the configured ref */
  fetchReadme(repository: string): Promise<string>;
  /** HTTPS remote used for shallow clones */
  cloneUrl(repository: string): string;
}

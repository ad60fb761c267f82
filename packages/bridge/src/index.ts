// Main exports for the bridge package
export { createBridge } from './bridge.js';
export type { Bridge, BridgeDependencies } from './bridge.js';
export {
  TaskBuilder,
  isSelectionRequest,
  resolveSourceTemplate,
  selectionDescription,
  SELECTION_NOTE
} from './builder.js';
export type {
  BuildResult,
  DownloadResult,
  SelectionRequest,
  TaskListing,
  TransformationResult,
  TranslateConfigResult
} from './builder.js';
export { TaskCatalog, toReadmeSnippet } from './catalog.js';
export type { RepositoryDescriptor, TaskCatalogOptions } from './catalog.js';
export { RepositoryCache, CLONE_DEPTH } from './cache/repository-cache.js';
export type { CloneOptions, RepositoryCacheOptions, RepositoryCloner } from './cache/repository-cache.js';
export { GitCloner } from './cache/git-cloner.js';
export {
  loadBridgeConfig,
  CONFIG_FILE_NAME,
  DEFAULT_EXCLUDED_REPOSITORIES,
  DEFAULT_LIMITS,
  DEFAULT_TIMEOUTS
} from './config.js';
export type { BridgeConfig, BridgeConfigInput, BridgeLimits, BridgeTimeouts, LoadBridgeConfigOptions } from './config.js';
export {
  BridgeError,
  CloneError,
  ConfigError,
  DegradedFetchError,
  RemoteServiceError,
  TemplateNotFoundError,
  formatError
} from './errors.js';
export type { BridgeErrorCode } from './errors.js';
export { GitHubRepositoryHost } from './host/github-host.js';
export type { GitHubRepositoryHostOptions } from './host/github-host.js';
export type { RepositoryHost } from './host/types.js';
export { createBridgeServer, parseCandidates, toPromptResult, SERVER_INFO } from './server.js';
export { readTaskConfig, TASK_CONFIG_FILE } from './task-config.js';

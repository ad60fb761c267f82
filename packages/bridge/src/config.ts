import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { logger } from '@task-transformer/logger';
import { ConfigError, formatError } from './errors.js';

const log = logger.config;

export const CONFIG_FILE_NAME = 'task-bridge.config.json';

/**
 * Organizational/meta repositories that are never task templates.
 * Matched case-sensitively against the names the hosting API returns.
 */
export const DEFAULT_EXCLUDED_REPOSITORIES: readonly string[] = [
  'task-registry',
  '.github',
  'psyflow',
  'psyflow-mcp',
  'community',
  'taskbeacon.github.io',
];

export interface BridgeLimits {
  /** Single catalog page; repositories beyond it are not listed */
  reposPerPage: number;
  branchesPerPage: number;
  /** Branches kept per repository, whatever the upstream count */
  maxBranches: number;
  readmeSnippetLength: number;
}

export interface BridgeTimeouts {
  catalogMs: number;
  branchesMs: number;
  readmeMs: number;
  cloneMs: number;
}

export interface BridgeConfig {
  organization: string;
  excludedRepositories: readonly string[];
  /** Absolute path of the repository cache root */
  cacheDir: string;
  githubToken?: string;
  /** Ref README snippets are read from */
  readmeRef: string;
  limits: BridgeLimits;
  timeouts: BridgeTimeouts;
}

export const DEFAULT_LIMITS: BridgeLimits = {
  reposPerPage: 100,
  branchesPerPage: 100,
  maxBranches: 10,
  readmeSnippetLength: 2000,
};

export const DEFAULT_TIMEOUTS: BridgeTimeouts = {
  catalogMs: 30_000,
  branchesMs: 15_000,
  readmeMs: 10_000,
  cloneMs: 300_000,
};

const DEFAULT_CONFIG = {
  organization: 'TaskBeacon',
  cacheDir: './task_cache',
  readmeRef: 'main',
};

const positiveInt = z.number().int().positive();

const fileConfigSchema = z.object({
  organization: z.string().min(1).optional(),
  excludedRepositories: z.array(z.string()).optional(),
  cacheDir: z.string().min(1).optional(),
  githubToken: z.string().min(1).optional(),
  readmeRef: z.string().min(1).optional(),
  limits: z.object({
    reposPerPage: positiveInt.max(100).optional(),
    branchesPerPage: positiveInt.max(100).optional(),
    maxBranches: positiveInt.optional(),
    readmeSnippetLength: positiveInt.optional(),
  }).optional(),
  timeouts: z.object({
    catalogMs: positiveInt.optional(),
    branchesMs: positiveInt.optional(),
    readmeMs: positiveInt.optional(),
    cloneMs: positiveInt.optional(),
  }).optional(),
});

export type BridgeConfigInput = z.infer<typeof fileConfigSchema>;

export interface LoadBridgeConfigOptions {
  /** Directory the config file and relative paths are resolved against */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: BridgeConfigInput;
}

/**
 * Read task-bridge.config.json from `cwd`.
 * A missing file is fine; a file that cannot be parsed is reported and ignored.
 */
function loadConfigFile(cwd: string): BridgeConfigInput {
  const configPath = join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    return {};
  }

  try {
    const parsed = fileConfigSchema.safeParse(JSON.parse(readFileSync(configPath, 'utf-8')));
    if (!parsed.success) {
      log.warn(`Ignoring ${CONFIG_FILE_NAME}: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
      return {};
    }
    log.debug(`Loaded ${configPath}`);
    return parsed.data;
  } catch (error) {
    log.warn(`Failed to parse ${CONFIG_FILE_NAME}: ${formatError(error)}`);
    log.warn('Using default configuration');
    return {};
  }
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function loadEnvConfig(env: NodeJS.ProcessEnv): BridgeConfigInput {
  const cloneMs = readPositiveInt(env, 'TASK_BRIDGE_CLONE_TIMEOUT_MS');
  return {
    organization: readString(env, 'TASK_BRIDGE_ORG'),
    cacheDir: readString(env, 'TASK_BRIDGE_CACHE_DIR'),
    githubToken: readString(env, 'GITHUB_TOKEN'),
    readmeRef: readString(env, 'TASK_BRIDGE_README_REF'),
    timeouts: cloneMs === undefined ? undefined : { cloneMs },
  };
}

/**
 * Load bridge configuration.
 * Priority: overrides > environment > task-bridge.config.json > defaults
 */
export function loadBridgeConfig(options: LoadBridgeConfigOptions = {}): BridgeConfig {
  const cwd = options.cwd ?? process.cwd();
  const layers: BridgeConfigInput[] = [options.overrides ?? {}, loadEnvConfig(options.env ?? process.env), loadConfigFile(cwd)];

  const pick = <K extends keyof BridgeConfigInput>(key: K): BridgeConfigInput[K] =>
    layers.map(layer => layer[key]).find(value => value !== undefined);
  const first = <T>(values: Array<T | undefined>): T | undefined => values.find(value => value !== undefined);

  const limits: BridgeLimits = {
    reposPerPage: first(layers.map(l => l.limits?.reposPerPage)) ?? DEFAULT_LIMITS.reposPerPage,
    branchesPerPage: first(layers.map(l => l.limits?.branchesPerPage)) ?? DEFAULT_LIMITS.branchesPerPage,
    maxBranches: first(layers.map(l => l.limits?.maxBranches)) ?? DEFAULT_LIMITS.maxBranches,
    readmeSnippetLength: first(layers.map(l => l.limits?.readmeSnippetLength)) ?? DEFAULT_LIMITS.readmeSnippetLength,
  };

  const timeouts: BridgeTimeouts = {
    catalogMs: first(layers.map(l => l.timeouts?.catalogMs)) ?? DEFAULT_TIMEOUTS.catalogMs,
    branchesMs: first(layers.map(l => l.timeouts?.branchesMs)) ?? DEFAULT_TIMEOUTS.branchesMs,
    readmeMs: first(layers.map(l => l.timeouts?.readmeMs)) ?? DEFAULT_TIMEOUTS.readmeMs,
    cloneMs: first(layers.map(l => l.timeouts?.cloneMs)) ?? DEFAULT_TIMEOUTS.cloneMs,
  };

  const config: BridgeConfig = {
    organization: pick('organization') ?? DEFAULT_CONFIG.organization,
    excludedRepositories: pick('excludedRepositories') ?? DEFAULT_EXCLUDED_REPOSITORIES,
    cacheDir: resolve(cwd, pick('cacheDir') ?? DEFAULT_CONFIG.cacheDir),
    githubToken: pick('githubToken'),
    readmeRef: pick('readmeRef') ?? DEFAULT_CONFIG.readmeRef,
    limits,
    timeouts,
  };

  log.debug(`Organization ${config.organization}, cache ${config.cacheDir}`);
  return config;
}


import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createBridge, type Bridge } from '../src/bridge.js';
import type { CloneOptions, RepositoryCloner } from '../src/cache/repository-cache.js';
import { loadBridgeConfig, type BridgeConfigInput } from '../src/config.js';
import { DegradedFetchError } from '../src/errors.js';
import type { RepositoryHost } from '../src/host/types.js';

export function makeTempDir(prefix = 'task-bridge-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(path: string): void {
  rmSync(path, { recursive: true, force: true });
}

export interface FakeHostData {
  repositories: string[];
  readmes?: Record<string, string>;
  branches?: Record<string, string[]>;
  catalogError?: Error;
}

/**
 * In-memory repository host. Repositories without a README or branch entry
 * fail the way an unavailable remote would.
 */
export class FakeRepositoryHost implements RepositoryHost {
  catalogCalls = 0;
  readmeCalls: string[] = [];
  branchCalls: string[] = [];

  constructor(private data: FakeHostData) {}

  async listOrganizationRepositories(): Promise<string[]> {
    this.catalogCalls++;
    if (this.data.catalogError) {
      throw this.data.catalogError;
    }
    return [...this.data.repositories];
  }

  async listBranches(repository: string): Promise<string[]> {
    this.branchCalls.push(repository);
    const branches = this.data.branches?.[repository];
    if (!branches) {
      throw new DegradedFetchError(`no branches for ${repository}`, { status: 404 });
    }
    return [...branches];
  }

  async fetchReadme(repository: string): Promise<string> {
    this.readmeCalls.push(repository);
    const readme = this.data.readmes?.[repository];
    if (readme === undefined) {
      throw new DegradedFetchError(`no README for ${repository}`, { status: 404 });
    }
    return readme;
  }

  cloneUrl(repository: string): string {
    return `https://git.example.test/TestOrg/${repository}.git`;
  }
}

export interface RecordedClone {
  url: string;
  destination: string;
  options: CloneOptions;
}

/**
 * Writes a README into the destination instead of running git
 */
export class FakeCloner implements RepositoryCloner {
  clones: RecordedClone[] = [];
  failWith?: Error;
  delayMs = 0;

  async clone(url: string, destination: string, options: CloneOptions): Promise<void> {
    this.clones.push({ url, destination, options });
    mkdirSync(destination, { recursive: true });
    if (this.delayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.delayMs));
    }
    if (this.failWith) {
      writeFileSync(join(destination, 'partial'), '');
      throw this.failWith;
    }
    writeFileSync(join(destination, 'README.md'), `# ${url}\n`);
  }
}

export interface TestBridge extends Bridge {
  fakeHost: FakeRepositoryHost;
  cloner: FakeCloner;
  cwd: string;
}

export function createTestBridge(data: FakeHostData, overrides: BridgeConfigInput = {}): TestBridge {
  const cwd = makeTempDir();
  const fakeHost = new FakeRepositoryHost(data);
  const cloner = new FakeCloner();
  const config = loadBridgeConfig({ cwd, env: {}, overrides });
  return { ...createBridge(config, { host: fakeHost, cloner }), fakeHost, cloner, cwd };
}

// engine/sync/engine.ts — Fetches provider contracts into the local cache

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { BridgeConfig, Contract, Dependency, SyncProgressCallback, SyncProgressStatus, SyncResult } from '../types.js';
import { MAX_SYNC_CONCURRENCY, getDependency, listDependencies, resolveInRepo } from '../config.js';
import { loadContract, readContractText, tryLoadContract, writeFileAtomic } from '../contract/store.js';
import { compareContracts, describeDiff } from '../contract/diff.js';
import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { logger as defaultLogger } from '../logger.js';
import { findApiCalls } from '../scanner/call-extractor.js';
import type { ContractFetcher } from './fetcher.js';
import { GitFetcher } from './fetcher.js';
import { buildExpectations, expectationsPath, saveExpectations } from './expectations.js';
import { runPool } from './pool.js';
import { withTempWorkspace } from './workspace.js';

export interface SyncEngineOptions {
  /** Defaults to a {@link GitFetcher} honouring `sync.fetchTimeoutMs`. */
  fetcher?: ContractFetcher;
  onProgress?: SyncProgressCallback;
  logger?: Logger;
  /** Clock for result and expectation timestamps. */
  now?: () => Date;
}

/**
 * Pulls each dependency's published contract into its local cache.
 *
 * Every public method resolves to {@link SyncResult}s; failures are reported
 * in the result rather than thrown.
 */
export class SyncEngine {
  private readonly config: BridgeConfig;
  private readonly fetcher: ContractFetcher;
  private readonly onProgress: SyncProgressCallback | undefined;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(config: BridgeConfig, options: SyncEngineOptions = {}) {
    this.config = config;
    this.fetcher = options.fetcher ?? new GitFetcher({ timeoutMs: config.sync.fetchTimeoutMs });
    this.onProgress = options.onProgress;
    this.log = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Sync one dependency.
   *
   * 1. Resolve it from the registry and check its sync method
   * 2. Shallow-fetch the provider into a temporary workspace
   *    - fetch failures fall back to the cached contract
   * 3. Read and parse the contract at `contractPath`
   *    - a missing or malformed contract fails outright
   * 4. Diff against the cache, record consumer expectations, replace the cache
   */
  async syncDependency(name: string): Promise<SyncResult> {
    const dependency = getDependency(this.config, name);
    if (!dependency) {
      return this.failure(name, [`Dependency '${name}' not found in configuration`]);
    }

    switch (dependency.syncMethod) {
      case 'git':
        break;
      case 'http':
      case 's3':
        return this.failure(name, [`Unsupported sync method: ${dependency.syncMethod}`]);
    }

    if (!dependency.gitUrl) {
      return this.failure(name, [`Dependency '${name}': git_url is required for git sync method`]);
    }

    try {
      return await withTempWorkspace(
        async (workspace) => {
          let repoDir: string;
          try {
            repoDir = await this.fetcher.fetch(dependency, workspace);
          } catch (err) {
            return this.offlineFallback(dependency, errorMessage(err));
          }
          return this.installContract(dependency, repoDir);
        },
        { logger: this.log },
      );
    } catch (err) {
      return this.failure(name, [`Unexpected error during sync: ${errorMessage(err)}`]);
    }
  }

  /**
   * Sync every registered dependency, at most `sync.maxConcurrency` (never
   * more than MAX_SYNC_CONCURRENCY) at a time. Results are sorted by
   * dependency name in code-point order.
   */
  async syncAll(): Promise<SyncResult[]> {
    const names = listDependencies(this.config);
    if (names.length === 0) return [];

    const recover = (name: string, err: unknown): SyncResult =>
      this.failure(name, [`Unexpected error during sync: ${errorMessage(err)}`]);

    const results =
      names.length === 1
        ? [await this.syncReporting(names[0]).catch((err: unknown) => recover(names[0], err))]
        : await runPool(names, {
            concurrency: Math.min(this.config.sync.maxConcurrency, MAX_SYNC_CONCURRENCY),
            run: (name) => this.syncReporting(name),
            recover,
          });

    return results.sort((a, b) => compareNames(a.dependencyName, b.dependencyName));
  }

  // ─── Steps ──────────────────────────────────────────────────────────────

  private installContract(dependency: Dependency, repoDir: string): SyncResult {
    const source = path.join(repoDir, dependency.contractPath);
    if (!fs.existsSync(source)) {
      return this.failure(dependency.name, [`Contract file not found: ${dependency.contractPath}`]);
    }

    let text: string;
    let contract: Contract;
    try {
      text = fs.readFileSync(source, 'utf-8');
      contract = readContractText(text, dependency.contractPath);
    } catch (err) {
      return this.failure(dependency.name, [`Invalid contract: ${errorMessage(err)}`]);
    }

    const cachePath = resolveInRepo(this.config, dependency.localCache);
    const previous = tryLoadContract(cachePath);

    this.recordExpectations(dependency.name, contract);
    try {
      writeFileAtomic(cachePath, text);
    } catch (err) {
      return this.failure(dependency.name, [`Failed to write cache ${dependency.localCache}: ${errorMessage(err)}`]);
    }

    return {
      dependencyName: dependency.name,
      success: true,
      changes: describeDiff(compareContracts(previous, contract)),
      errors: [],
      endpointCount: contract.endpoints.length,
      cachedFile: cachePath,
      timestamp: this.timestamp(),
    };
  }

  private recordExpectations(dependencyName: string, contract: Contract): void {
    try {
      const expectations = buildExpectations(findApiCalls(this.config.repoRoot), contract);
      saveExpectations(expectationsPath(this.config, dependencyName), {
        dependency: dependencyName,
        lastUpdated: this.timestamp(),
        expectations,
      });
    } catch (err) {
      this.log.warn(`Could not record consumer expectations for ${dependencyName}: ${errorMessage(err)}`);
    }
  }

  private offlineFallback(dependency: Dependency, reason: string): SyncResult {
    const cachePath = resolveInRepo(this.config, dependency.localCache);
    if (!fs.existsSync(cachePath)) {
      return this.failure(dependency.name, [reason, 'No cached contract available']);
    }

    let cached: Contract;
    try {
      cached = loadContract(cachePath);
    } catch (err) {
      return this.failure(dependency.name, [reason, `Failed to load cached contract: ${errorMessage(err)}`]);
    }

    this.log.warn(`Sync of ${dependency.name} failed, using cached contract`);
    return {
      dependencyName: dependency.name,
      success: true,
      changes: [`Using cached contract (sync failed: ${reason})`],
      errors: [reason],
      endpointCount: cached.endpoints.length,
      cachedFile: cachePath,
      timestamp: this.timestamp(),
    };
  }

  /**
   * One unit of pool work: "starting", the sync, then "completed" or
   * "failed". A throw still reports "failed" before it propagates.
   */
  private async syncReporting(name: string): Promise<SyncResult> {
    this.report(name, 'starting');
    let result: SyncResult;
    try {
      result = await this.syncDependency(name);
    } catch (err) {
      this.report(name, 'failed');
      throw err;
    }
    this.report(name, result.success ? 'completed' : 'failed');
    return result;
  }

  private report(name: string, status: SyncProgressStatus): void {
    if (!this.onProgress) return;
    try {
      this.onProgress(name, status);
    } catch (err) {
      this.log.warn(`Progress callback failed for ${name}: ${errorMessage(err)}`);
    }
  }

  private failure(dependencyName: string, errors: [string, ...string[]]): SyncResult {
    return {
      dependencyName,
      success: false,
      changes: [],
      errors,
      endpointCount: 0,
      cachedFile: null,
      timestamp: this.timestamp(),
    };
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// engine/index.ts — Top-level pipelines: extract, sync, drift, breaking, status

import * as fs from 'node:fs';
import type {
  BridgeConfig,
  BreakingChange,
  Contract,
  DriftReport,
  SyncMethod,
  SyncProgressCallback,
  SyncResult,
} from './types.js';
import { getDependency, listDependencies, resolveInRepo } from './config.js';
import { loadContract, tryLoadContract } from './contract/store.js';
import { extractProviderContract } from './scanner/index.js';
import { SyncEngine } from './sync/engine.js';
import type { ContractFetcher } from './sync/fetcher.js';
import { DriftDetector } from './drift/detector.js';
import { generateDriftReport } from './drift/report.js';
import { applyConsumerExpectations, detectBreakingChanges, loadConsumerExpectations } from './breaking/detector.js';
import { BridgeConfigError } from './errors.js';

export type * from './types.js';
export { BridgeConfigError, ContractFormatError, FetchError } from './errors.js';
export {
  loadConfig,
  saveConfig,
  validateConfig,
  createDefaultConfig,
  addDependency,
  removeDependency,
  makeGitDependency,
  resolveConfigPath,
} from './config.js';
export { loadContract, saveContract } from './contract/store.js';
export { compareContracts } from './contract/diff.js';
export { extractContract, extractProviderContract } from './scanner/index.js';
export { findApiCalls } from './scanner/call-extractor.js';
export { SyncEngine } from './sync/engine.js';
export { GitFetcher } from './sync/fetcher.js';
export type { ContractFetcher } from './sync/fetcher.js';
export { DriftDetector } from './drift/detector.js';
export { generateDriftReport } from './drift/report.js';
export {
  detectBreakingChanges,
  loadConsumerExpectations,
  applyConsumerExpectations,
  updateContractWithConsumers,
} from './breaking/detector.js';

// ---- Extract ----

export interface ExtractResult {
  contractFile: string;
  endpointCount: number;
  modelCount: number;
}

/**
 * Extract this repository's provided contract and write it to disk.
 */
export function extract(config: BridgeConfig): ExtractResult {
  if (!config.provides) {
    throw new BridgeConfigError(`Role '${config.role}' does not provide a contract`, [
      'Add a "provides" block to the bridge config',
    ]);
  }
  const contractFile = extractProviderContract(config);
  const contract = loadContract(contractFile);
  return {
    contractFile,
    endpointCount: contract.endpoints.length,
    modelCount: Object.keys(contract.models).length,
  };
}

// ---- Sync ----

export interface SyncOptions {
  /** Sync only this dependency. */
  dependency?: string;
  onProgress?: SyncProgressCallback;
  fetcher?: ContractFetcher;
}

export async function sync(config: BridgeConfig, options: SyncOptions = {}): Promise<SyncResult[]> {
  const engine = new SyncEngine(config, { onProgress: options.onProgress, fetcher: options.fetcher });
  if (options.dependency !== undefined) {
    return [await engine.syncDependency(options.dependency)];
  }
  return engine.syncAll();
}

// ---- Drift ----

/**
 * Drift reports for one dependency, or for every registered dependency.
 */
export function drift(config: BridgeConfig, dependency?: string): DriftReport[] {
  const detector = new DriftDetector(config);
  if (dependency !== undefined) {
    return [generateDriftReport(dependency, detector.detectDrift(dependency))];
  }
  return Object.entries(detector.detectAllDrift()).map(([name, issues]) => generateDriftReport(name, issues));
}

// ---- Breaking Changes ----

export interface BreakingOptions {
  /**
   * Record these consumers' expectations on both contracts before comparing.
   * Expectations are read from `config`'s contracts directory, one
   * `<name>-expectations.yaml` per consumer.
   */
  consumers?: string[];
  config?: BridgeConfig;
}

/**
 * Compare two contract files.
 */
export function breaking(previousFile: string, nextFile: string, options: BreakingOptions = {}): BreakingChange[] {
  let previous: Contract = loadContract(previousFile);
  let next: Contract = loadContract(nextFile);

  const { config } = options;
  if (config) {
    for (const consumer of options.consumers ?? []) {
      const expectations = loadConsumerExpectations(config, consumer);
      previous = applyConsumerExpectations(previous, consumer, expectations);
      next = applyConsumerExpectations(next, consumer, expectations);
    }
  }

  return detectBreakingChanges(previous, next);
}

// ---- Status ----

export interface DependencyStatus {
  name: string;
  syncMethod: SyncMethod;
  gitUrl: string | null;
  localCache: string;
  cached: boolean;
  endpointCount: number | null;
  lastUpdated: string | null;
}

export interface StatusResult {
  role: BridgeConfig['role'];
  repoId: string;
  providedContract: string | null;
  dependencies: DependencyStatus[];
}

/**
 * Registry summary plus the state of each dependency's cache.
 */
export function status(config: BridgeConfig): StatusResult {
  const dependencies: DependencyStatus[] = [];

  for (const name of listDependencies(config)) {
    const dep = getDependency(config, name);
    if (!dep) continue;
    const cachePath = resolveInRepo(config, dep.localCache);
    const cached = tryLoadContract(cachePath);
    dependencies.push({
      name,
      syncMethod: dep.syncMethod,
      gitUrl: dep.gitUrl,
      localCache: dep.localCache,
      cached: fs.existsSync(cachePath),
      endpointCount: cached ? cached.endpoints.length : null,
      lastUpdated: cached ? cached.lastUpdated : null,
    });
  }

  return {
    role: config.role,
    repoId: config.repoId,
    providedContract: config.provides?.contractFile ?? null,
    dependencies,
  };
}

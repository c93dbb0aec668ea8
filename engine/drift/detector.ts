// engine/drift/detector.ts — Matches consumer call sites against a cached provider contract

import * as fs from 'node:fs';
import type { ApiCall, BridgeConfig, Contract, DriftIssue } from '../types.js';
import { getDependency, listDependencies, resolveInRepo } from '../config.js';
import { loadContract } from '../contract/store.js';
import { normalizePath, splitSegments } from '../contract/paths.js';
import { errorMessage } from '../errors.js';
import { findApiCalls } from '../scanner/call-extractor.js';

/**
 * Detects drift between a consumer's outbound calls and the contracts it has
 * synced. Drift is reported as data; nothing here throws for a bad
 * dependency or cache.
 */
export class DriftDetector {
  private readonly config: BridgeConfig;

  constructor(config: BridgeConfig) {
    this.config = config;
  }

  /**
   * Check every recognized call in the repository against one dependency's
   * cached contract.
   *
   * Preconditions, each reported as a single issue when unmet: the dependency
   * is registered, its cache file exists, and the cache parses.
   */
  detectDrift(dependencyName: string): DriftIssue[] {
    return this.detectDriftWith(dependencyName, () => findApiCalls(this.config.repoRoot));
  }

  /**
   * Drift for every registered dependency, keyed by name. The repository is
   * scanned at most once per call and shared across dependencies.
   */
  detectAllDrift(): Record<string, DriftIssue[]> {
    let calls: ApiCall[] | null = null;
    const scan = (): ApiCall[] => calls ?? (calls = findApiCalls(this.config.repoRoot));

    const results: Record<string, DriftIssue[]> = {};
    for (const name of listDependencies(this.config)) {
      results[name] = this.detectDriftWith(name, scan);
    }
    return results;
  }

  /** The scan runs only once every precondition holds. */
  private detectDriftWith(dependencyName: string, scan: () => ApiCall[]): DriftIssue[] {
    const dependency = getDependency(this.config, dependencyName);
    if (!dependency) {
      return [
        setupIssue(
          'configuration_error',
          `Dependency '${dependencyName}' not found in configuration`,
          'Add the dependency with `contract-bridge add-dependency`',
        ),
      ];
    }

    const cachePath = resolveInRepo(this.config, dependency.localCache);
    if (!fs.existsSync(cachePath)) {
      return [
        setupIssue(
          'missing_contract',
          `Contract file not found: ${dependency.localCache}`,
          'Run `contract-bridge sync` to fetch the contract',
        ),
      ];
    }

    let contract: Contract;
    try {
      contract = loadContract(cachePath);
    } catch (err) {
      return [
        setupIssue(
          'invalid_contract',
          `Failed to load contract: ${errorMessage(err)}`,
          'Check the contract file format or re-sync',
        ),
      ];
    }

    return checkCalls(scan(), contract);
  }
}

// ─── Matching ───────────────────────────────────────────────────────────────

/**
 * One `missing_endpoint` error per call with no endpoint of the same method
 * and normalized path.
 */
export function checkCalls(calls: ApiCall[], contract: Contract): DriftIssue[] {
  const known = new Set(contract.endpoints.map((ep) => `${ep.method} ${normalizePath(ep.path)}`));
  const issues: DriftIssue[] = [];

  for (const call of calls) {
    if (known.has(`${call.method} ${normalizePath(call.path)}`)) continue;
    issues.push({
      type: 'missing_endpoint',
      severity: 'error',
      endpoint: call.path,
      method: call.method,
      location: `${call.file}:${call.line}`,
      message: `API call to ${call.method} ${call.path} does not match any endpoint in contract`,
      suggestion: suggestFix(call, contract),
    });
  }

  return issues;
}

/**
 * (a) endpoints with the same segment count differing in at most one literal
 * segment, (b) the same path under another method, (c) a generic hint.
 */
export function suggestFix(call: Pick<ApiCall, 'method' | 'path'>, contract: Contract): string {
  const callParts = splitSegments(call.path);
  const similar: string[] = [];

  for (const ep of contract.endpoints) {
    const parts = splitSegments(ep.path);
    if (parts.length !== callParts.length) continue;
    const matches = callParts.filter((part, i) => part === parts[i] || parts[i].includes('{')).length;
    if (matches >= callParts.length - 1) similar.push(`${ep.method} ${ep.path}`);
  }

  if (similar.length > 0) {
    return `Did you mean one of these endpoints? ${similar.join(', ')}`;
  }

  const normalized = normalizePath(call.path);
  const samePath = contract.endpoints.find((ep) => normalizePath(ep.path) === normalized);
  if (samePath) {
    return `Endpoint path exists but method is ${samePath.method}, not ${call.method}`;
  }

  return 'Either sync the latest contract or remove this API call';
}

function setupIssue(type: DriftIssue['type'], message: string, suggestion: string): DriftIssue {
  return { type, severity: 'error', endpoint: '', method: '', location: '', message, suggestion };
}

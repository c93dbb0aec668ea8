// engine/scanner/index.ts — Contract extraction: walks a provider repo and assembles its Contract
import * as fs from 'node:fs';
import * as path from 'node:path';

import type { BridgeConfig, Contract, ContractRole, Endpoint, ModelDef } from '../types.js';
import { endpointKey } from '../contract/paths.js';
import { saveContract } from '../contract/store.js';
import { resolveInRepo, DEFAULT_PROVIDED_CONTRACT } from '../config.js';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { detectLanguage } from './tree-sitter.js';
import { extractFromSource } from './route-extractor.js';
import { toPosix, walkSourceFiles } from './walker.js';

export const CONTRACT_VERSION = '1.0';

export interface ExtractOptions {
  repoRoot: string;
  /** Repository-relative globs selecting the files to scan. */
  patterns: string[];
  repoId?: string;
  role?: ContractRole;
  version?: string;
  /** Timestamp for `last_updated` and every endpoint's `implemented_at`. */
  timestamp?: string;
}

/**
 * Scan a provider repository and assemble its Contract.
 *
 * 1. Collect files matching any pattern, in lexicographic path order
 * 2. Extract route registrations and data models from each file
 *    - files that cannot be read or parsed are skipped
 * 3. Aggregate: the first occurrence of a (method, path) pair wins, and
 *    likewise the first model of a given name
 */
export function extractContract(options: ExtractOptions): Contract {
  const { repoRoot, patterns } = options;
  const timestamp = options.timestamp ?? new Date().toISOString();

  const endpoints: Endpoint[] = [];
  const seen = new Set<string>();
  const models: Record<string, ModelDef> = {};

  for (const filePath of walkSourceFiles(repoRoot, { include: patterns })) {
    const language = detectLanguage(filePath);
    if (!language) continue;

    const relPath = toPosix(path.relative(repoRoot, filePath));

    let extraction: ReturnType<typeof extractFromSource>;
    try {
      extraction = extractFromSource(fs.readFileSync(filePath, 'utf-8'), relPath, language, timestamp);
    } catch (err) {
      logger.debug(`Skipping ${relPath}: ${errorMessage(err)}`);
      continue;
    }
    if (!extraction) {
      logger.debug(`Skipping ${relPath}: syntax errors`);
      continue;
    }

    for (const endpoint of extraction.endpoints) {
      const key = endpointKey(endpoint.method, endpoint.path);
      if (seen.has(key)) continue;
      seen.add(key);
      endpoints.push(endpoint);
    }

    for (const [name, model] of Object.entries(extraction.models)) {
      if (!Object.prototype.hasOwnProperty.call(models, name)) models[name] = model;
    }
  }

  return {
    version: options.version ?? CONTRACT_VERSION,
    repoId: options.repoId ?? path.basename(path.resolve(repoRoot)),
    role: options.role ?? 'provider',
    lastUpdated: timestamp,
    endpoints,
    models,
  };
}

/**
 * Extract this repository's contract per its `provides` settings and write it
 * to the configured contract file. Returns the absolute path written.
 */
export function extractProviderContract(config: BridgeConfig): string {
  const contractFile = config.provides?.contractFile ?? DEFAULT_PROVIDED_CONTRACT;
  const contract = extractContract({
    repoRoot: config.repoRoot,
    patterns: config.provides?.extractFrom ?? [],
    repoId: config.repoId || undefined,
    role: config.role === 'both' ? 'both' : 'provider',
  });
  logger.debug(`Extracted ${contract.endpoints.length} endpoint(s) from ${config.repoRoot}`);
  return saveContract(contract, resolveInRepo(config, contractFile));
}

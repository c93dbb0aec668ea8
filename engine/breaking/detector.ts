// engine/breaking/detector.ts — Provider-side impact of a contract change on recorded consumers

import type { BridgeConfig, BreakingChange, Contract, Endpoint } from '../types.js';
import { BREAKING_IGNORED_FIELDS, endpointsDiffer, indexEndpoints } from '../contract/diff.js';
import { endpointKey, normalizePath } from '../contract/paths.js';
import { loadContract, saveContract } from '../contract/store.js';
import { expectationsPath, readExpectations } from '../sync/expectations.js';

/**
 * Compare two versions of a provider contract.
 *
 * Removed endpoints with consumers are errors, modified endpoints with
 * consumers are warnings, and every endpoint of `next` nobody consumes is
 * reported as info. Output order follows those three groups.
 */
export function detectBreakingChanges(previous: Contract, next: Contract): BreakingChange[] {
  const before = indexEndpoints(previous);
  const after = indexEndpoints(next);

  const removed: BreakingChange[] = [];
  const modified: BreakingChange[] = [];

  for (const [key, old] of before) {
    const current = after.get(key);
    if (!current) {
      if (old.consumers.length > 0) removed.push(removedChange(old));
    } else if (old.consumers.length > 0 && endpointsDiffer(old, current, BREAKING_IGNORED_FIELDS)) {
      modified.push(modifiedChange(old));
    }
  }

  return [...removed, ...modified, ...findUnusedEndpoints(next)];
}

export function findUnusedEndpoints(contract: Contract): BreakingChange[] {
  return contract.endpoints
    .filter((ep) => ep.consumers.length === 0)
    .map((ep): BreakingChange => ({
      type: 'unused_endpoint',
      severity: 'info',
      endpoint: ep.path,
      method: ep.method,
      message: `Endpoint ${ep.method} ${ep.path} has no recorded consumers`,
      affectedConsumers: [],
      suggestion: 'This endpoint may be safe to remove or deprecate',
    }));
}

function removedChange(ep: Endpoint): BreakingChange {
  return {
    type: 'endpoint_removed',
    severity: 'error',
    endpoint: ep.path,
    method: ep.method,
    message: `Endpoint ${ep.method} ${ep.path} was removed but has active consumers`,
    affectedConsumers: [...ep.consumers],
    suggestion: `Consider deprecating instead of removing, or notify consumers: ${ep.consumers.join(', ')}`,
  };
}

function modifiedChange(ep: Endpoint): BreakingChange {
  return {
    type: 'endpoint_modified',
    severity: 'warning',
    endpoint: ep.path,
    method: ep.method,
    message: `Endpoint ${ep.method} ${ep.path} was modified and has active consumers`,
    affectedConsumers: [...ep.consumers],
    suggestion: `Verify changes are backward compatible, or notify consumers: ${ep.consumers.join(', ')}`,
  };
}

// ─── Consumer Expectations ──────────────────────────────────────────────────

/**
 * "METHOD /path" → call-site locations, as last recorded by a sync of
 * `dependencyName`. Empty when nothing has been recorded.
 */
export function loadConsumerExpectations(config: BridgeConfig, dependencyName: string): Map<string, string[]> {
  const record = readExpectations(expectationsPath(config, dependencyName));
  const expectations = new Map<string, string[]>();
  for (const e of record?.expectations ?? []) {
    expectations.set(e.endpoint, e.usageLocations);
  }
  return expectations;
}

/**
 * A copy of `contract` with `consumer` added to every endpoint it calls.
 * Call paths match endpoint paths after parameter normalization.
 */
export function applyConsumerExpectations(
  contract: Contract,
  consumer: string,
  expectations: ReadonlyMap<string, readonly string[]>,
): Contract {
  const used = new Set<string>();
  for (const key of expectations.keys()) {
    const space = key.indexOf(' ');
    if (space === -1) continue;
    used.add(endpointKey(key.slice(0, space), normalizePath(key.slice(space + 1))));
  }

  return {
    ...contract,
    endpoints: contract.endpoints.map((ep) => {
      if (!used.has(endpointKey(ep.method, normalizePath(ep.path))) || ep.consumers.includes(consumer)) {
        return ep;
      }
      return { ...ep, consumers: [...ep.consumers, consumer] };
    }),
  };
}

/**
 * Rewrite a contract file in place with `consumer` recorded on the
 * endpoints it calls.
 *
 * @throws {ContractFormatError} when the file cannot be loaded
 */
export function updateContractWithConsumers(
  contractFile: string,
  consumer: string,
  expectations: ReadonlyMap<string, readonly string[]>,
): Contract {
  const updated = applyConsumerExpectations(loadContract(contractFile), consumer, expectations);
  saveContract(updated, contractFile);
  return updated;
}

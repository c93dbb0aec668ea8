// engine/contract/diff.ts — Endpoint-level comparison of two contract versions

import { isDeepStrictEqual } from 'node:util';
import type { Contract, ContractDiff, Endpoint } from '../types.js';
import { endpointKey } from './paths.js';

/** Fields a sync diff ignores: timestamps and the consumer list. */
export const DIFF_IGNORED_FIELDS = ['implementedAt', 'consumers'] as const satisfies readonly (keyof Endpoint)[];

/** Fields a breaking-change comparison ignores: the above plus provenance. */
export const BREAKING_IGNORED_FIELDS = [
  'implementedAt',
  'consumers',
  'sourceFile',
  'functionName',
] as const satisfies readonly (keyof Endpoint)[];

export function indexEndpoints(contract: Contract): Map<string, Endpoint> {
  const index = new Map<string, Endpoint>();
  for (const ep of contract.endpoints) {
    index.set(endpointKey(ep.method, ep.path), ep);
  }
  return index;
}

/**
 * Structural inequality of two endpoints, ignoring the given fields.
 */
export function endpointsDiffer(
  a: Endpoint,
  b: Endpoint,
  ignored: readonly (keyof Endpoint)[] = DIFF_IGNORED_FIELDS,
): boolean {
  return !isDeepStrictEqual(comparable(a, ignored), comparable(b, ignored));
}

function comparable(ep: Endpoint, ignored: readonly (keyof Endpoint)[]): Partial<Endpoint> {
  const copy: Partial<Endpoint> = { ...ep };
  for (const field of ignored) delete copy[field];
  return copy;
}

/**
 * Compare two contract versions keyed by (method, path).
 * With no prior contract every endpoint counts as added.
 */
export function compareContracts(previous: Contract | null, next: Contract): ContractDiff {
  if (previous === null) {
    return { added: [...next.endpoints], removed: [], modified: [] };
  }

  const before = indexEndpoints(previous);
  const after = indexEndpoints(next);
  const diff: ContractDiff = { added: [], removed: [], modified: [] };

  for (const [key, ep] of after) {
    const old = before.get(key);
    if (!old) diff.added.push(ep);
    else if (endpointsDiffer(old, ep)) diff.modified.push(ep);
  }
  for (const [key, ep] of before) {
    if (!after.has(key)) diff.removed.push(ep);
  }

  return diff;
}

export function hasChanges(diff: ContractDiff): boolean {
  return diff.added.length > 0 || diff.removed.length > 0 || diff.modified.length > 0;
}

export function describeDiff(diff: ContractDiff): string[] {
  return [
    ...diff.added.map((ep) => `Added: ${ep.method} ${ep.path}`),
    ...diff.removed.map((ep) => `Removed: ${ep.method} ${ep.path}`),
    ...diff.modified.map((ep) => `Modified: ${ep.method} ${ep.path}`),
  ];
}

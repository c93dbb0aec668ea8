// tests/sync/helpers.ts — Fake fetcher and contract fixtures for sync tests

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Dependency } from '../../engine/types.js';
import type { ContractFetcher } from '../../engine/sync/fetcher.js';
import { FetchError } from '../../engine/errors.js';
import { dumpYaml } from '../../engine/contract/store.js';

export function contractYaml(endpoints: Array<[string, string]>, repoId = 'provider'): string {
  return dumpYaml({
    version: '1.0',
    repo_id: repoId,
    role: 'provider',
    last_updated: '2024-11-27T10:00:00Z',
    endpoints: endpoints.map(([method, endpointPath]) => ({ path: endpointPath, method })),
    models: {},
  });
}

/** What the fake "remote" holds for a dependency. */
export type Remote =
  | { kind: 'contract'; text: string }
  | { kind: 'empty' }
  | { kind: 'unreachable'; message?: string };

/**
 * Materializes contracts from memory instead of cloning. Tracks how many
 * fetches are in flight and which workspaces it was handed.
 */
export class FakeFetcher implements ContractFetcher {
  active = 0;
  peak = 0;
  calls: string[] = [];
  workspaces: string[] = [];

  constructor(
    private readonly remotes: Record<string, Remote>,
    private readonly delayMs = 5,
  ) {}

  async fetch(dependency: Dependency, workspace: string): Promise<string> {
    this.calls.push(dependency.name);
    this.workspaces.push(workspace);
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    try {
      await new Promise<void>((resolve) => setTimeout(resolve, this.delayMs));
    } finally {
      this.active--;
    }

    const remote = this.remotes[dependency.name] ?? { kind: 'unreachable' };
    if (remote.kind === 'unreachable') {
      throw new FetchError(`git clone --depth 1 ${dependency.gitUrl}`, remote.message ?? 'could not resolve host');
    }

    const repo = path.join(workspace, 'repo');
    fs.mkdirSync(repo, { recursive: true });
    if (remote.kind === 'contract') {
      const target = path.join(repo, dependency.contractPath);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, remote.text);
    }
    return repo;
  }
}

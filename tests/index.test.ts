import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import type { BridgeConfig } from '../engine/types.js';
import { breaking, drift, extract, status, sync } from '../engine/index.js';
import { BridgeConfigError } from '../engine/errors.js';
import { createDefaultConfig, makeGitDependency } from '../engine/config.js';
import { saveContract } from '../engine/contract/store.js';
import { parseContract } from '../engine/contract/schema.js';
import { expectationsPath, saveExpectations } from '../engine/sync/expectations.js';
import { FakeFetcher, contractYaml } from './sync/helpers.js';

describe('pipelines', () => {
  let root: string;
  let config: BridgeConfig;

  const write = (rel: string, content: string) => {
    fs.mkdirSync(path.dirname(path.join(root, rel)), { recursive: true });
    fs.writeFileSync(path.join(root, rel), content);
  };

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'bridge-pipeline-'));
    config = createDefaultConfig('consumer', { repoRoot: root, repoId: 'web' });
    config.dependencies.users = makeGitDependency(config, 'users', 'https://git.example.test/users.git');
  });
  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('extract refuses a repository that provides nothing', () => {
    expect(() => extract(config)).toThrow(BridgeConfigError);
  });

  it('extract writes the provided contract and summarises it', () => {
    const provider = createDefaultConfig('provider', { repoRoot: root });
    write('backend/api.py', '@app.get("/ping")\ndef ping():\n    pass\n\nclass Pong(BaseModel):\n    ok: bool\n');

    expect(extract(provider)).toEqual({
      contractFile: path.join(root, '.bridge', 'contracts', 'provided-api.yaml'),
      endpointCount: 1,
      modelCount: 1,
    });
  });

  it('sync, then status and drift read the cache', async () => {
    write('src/client.ts', "axios.get('/users');\naxios.delete('/users');\n");
    const onProgress = vi.fn();
    const fetcher = new FakeFetcher({ users: { kind: 'contract', text: contractYaml([['GET', '/users']]) } });

    const results = await sync(config, { fetcher, onProgress });
    expect(results.map((r) => [r.dependencyName, r.success, r.endpointCount])).toEqual([['users', true, 1]]);
    expect(onProgress.mock.calls).toEqual([
      ['users', 'starting'],
      ['users', 'completed'],
    ]);

    expect(status(config)).toEqual({
      role: 'consumer',
      repoId: 'web',
      providedContract: null,
      dependencies: [
        {
          name: 'users',
          syncMethod: 'git',
          gitUrl: 'https://git.example.test/users.git',
          localCache: path.join('.bridge', 'contracts', 'users-api.yaml'),
          cached: true,
          endpointCount: 1,
          lastUpdated: '2024-11-27T10:00:00Z',
        },
      ],
    });

    const [report] = drift(config);
    expect(report).toMatchObject({ dependencyName: 'users', totalIssues: 1, errors: 1, success: false });
    expect(report.issues[0].location).toBe('src/client.ts:2');
  });

  it('sync of one named dependency skips progress reporting', async () => {
    const onProgress = vi.fn();
    const results = await sync(config, { dependency: 'users', fetcher: new FakeFetcher({}), onProgress });
    expect(results[0].errors[1]).toBe('No cached contract available');
    expect(onProgress).not.toHaveBeenCalled();
  });

  it('status reports a dependency that has not been synced', () => {
    expect(status(config).dependencies[0]).toMatchObject({ cached: false, endpointCount: null, lastUpdated: null });
  });

  it('breaking applies recorded consumer expectations before comparing', () => {
    const doc = (paths: string[]) =>
      parseContract({
        version: '1.0',
        last_updated: '2024-11-27T10:00:00Z',
        endpoints: paths.map((p) => ({ path: p, method: 'GET' })),
      });
    const previousFile = path.join(root, 'old.yaml');
    const nextFile = path.join(root, 'new.yaml');
    saveContract(doc(['/users', '/users/{id}']), previousFile);
    saveContract(doc(['/users']), nextFile);
    saveExpectations(expectationsPath(config, 'users'), {
      dependency: 'users',
      lastUpdated: '2024-12-01T08:30:00.000Z',
      expectations: [{ endpoint: 'GET /users/{param}', status: 'using', usageLocations: ['src/a.ts:3'] }],
    });

    expect(breaking(previousFile, nextFile).map((c) => c.type)).toEqual(['unused_endpoint']);

    const changes = breaking(previousFile, nextFile, { consumers: ['users'], config });
    expect(changes.map((c) => [c.type, c.endpoint, c.affectedConsumers])).toEqual([
      ['endpoint_removed', '/users/{id}', ['users']],
      ['unused_endpoint', '/users', []],
    ]);
  });
});

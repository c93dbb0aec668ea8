import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import type { BridgeConfig } from '../../engine/types.js';
import { createDefaultConfig, makeGitDependency } from '../../engine/config.js';
import { parseContract } from '../../engine/contract/schema.js';
import { DriftDetector, checkCalls, suggestFix } from '../../engine/drift/detector.js';
import { contractYaml } from '../sync/helpers.js';

describe('DriftDetector', () => {
  let root: string;
  let config: BridgeConfig;

  const write = (rel: string, content: string) => {
    fs.mkdirSync(path.dirname(path.join(root, rel)), { recursive: true });
    fs.writeFileSync(path.join(root, rel), content);
  };

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'bridge-drift-'));
    config = createDefaultConfig('consumer', { repoRoot: root });
    config.dependencies.users = makeGitDependency(config, 'users', 'https://git.example.test/users.git');
  });
  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('reports a call with no matching endpoint', () => {
    write('.bridge/contracts/users-api.yaml', contractYaml([['GET', '/users']]));
    write(
      'src/profile.ts',
      ["import axios from 'axios';", '', "export const loadProfile = () => axios.get('/users/profile');", ''].join('\n'),
    );

    expect(new DriftDetector(config).detectDrift('users')).toEqual([
      {
        type: 'missing_endpoint',
        severity: 'error',
        endpoint: '/users/profile',
        method: 'GET',
        location: 'src/profile.ts:3',
        message: 'API call to GET /users/profile does not match any endpoint in contract',
        suggestion: 'Either sync the latest contract or remove this API call',
      },
    ]);
  });

  it('matches calls against endpoints regardless of parameter names', () => {
    write('.bridge/contracts/users-api.yaml', contractYaml([['GET', '/users/{user_id}'], ['POST', '/users']]));
    write(
      'client.py',
      ['import requests', '', 'def load(uid):', '    requests.get(f"/users/{uid}")', '    requests.post("/users")', ''].join('\n'),
    );

    expect(new DriftDetector(config).detectDrift('users')).toEqual([]);
  });

  it('ignores calls in test files', () => {
    write('.bridge/contracts/users-api.yaml', contractYaml([['GET', '/users']]));
    write('tests/test_client.py', 'requests.get("/nowhere")\n');
    write('src/client.test.ts', "axios.get('/nowhere');\n");

    expect(new DriftDetector(config).detectDrift('users')).toEqual([]);
  });

  it('reports an unknown dependency as a configuration error', () => {
    expect(new DriftDetector(config).detectDrift('billing')).toEqual([
      {
        type: 'configuration_error',
        severity: 'error',
        endpoint: '',
        method: '',
        location: '',
        message: "Dependency 'billing' not found in configuration",
        suggestion: 'Add the dependency with `contract-bridge add-dependency`',
      },
    ]);
  });

  it('reports a dependency that was never synced', () => {
    const issues = new DriftDetector(config).detectDrift('users');
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({
      type: 'missing_contract',
      severity: 'error',
      message: `Contract file not found: ${path.join('.bridge', 'contracts', 'users-api.yaml')}`,
    });
  });

  it('reports an unreadable cache', () => {
    write('.bridge/contracts/users-api.yaml', 'endpoints: [');
    const issues = new DriftDetector(config).detectDrift('users');
    expect(issues).toHaveLength(1);
    expect(issues[0].type).toBe('invalid_contract');
    expect(issues[0].message).toMatch(/^Failed to load contract: Invalid YAML: /);
  });

  it('checks every dependency', () => {
    config.dependencies.orders = makeGitDependency(config, 'orders', 'https://git.example.test/orders.git');
    write('.bridge/contracts/users-api.yaml', contractYaml([['GET', '/users']]));
    write('src/client.ts', "axios.get('/users');\n");

    const results = new DriftDetector(config).detectAllDrift();
    expect(Object.keys(results)).toEqual(['users', 'orders']);
    expect(results.users).toEqual([]);
    expect(results.orders.map((i) => i.type)).toEqual(['missing_contract']);
  });

  it('rescans the repository on every check', () => {
    write('.bridge/contracts/users-api.yaml', contractYaml([['GET', '/users']]));
    write('client.py', 'import requests\n\nrequests.get("/users")\n');
    const detector = new DriftDetector(config);

    expect(detector.detectDrift('users')).toEqual([]);
    expect(detector.detectAllDrift()).toEqual({ users: [] });

    write('client.py', 'import requests\n\nrequests.get("/orders")\n');

    expect(detector.detectDrift('users').map((i) => [i.endpoint, i.location])).toEqual([['/orders', 'client.py:3']]);
    expect(detector.detectAllDrift().users.map((i) => i.endpoint)).toEqual(['/orders']);
  });
});

describe('suggestFix', () => {
  const contract = parseContract({
    version: '1.0',
    last_updated: '2024-11-27T10:00:00Z',
    endpoints: [
      { path: '/users', method: 'GET' },
      { path: '/users/{id}', method: 'GET' },
      { path: '/orders', method: 'POST' },
    ],
  });

  it('suggests endpoints of the same shape differing in one segment', () => {
    expect(suggestFix({ method: 'GET', path: '/users/profile' }, contract)).toBe(
      'Did you mean one of these endpoints? GET /users/{id}',
    );
  });

  it('treats every single-segment endpoint as similar to a single-segment call', () => {
    expect(suggestFix({ method: 'DELETE', path: '/orders' }, contract)).toBe(
      'Did you mean one of these endpoints? GET /users, POST /orders',
    );
  });

  it('falls back to a generic hint', () => {
    expect(suggestFix({ method: 'GET', path: '/a/b/c' }, contract)).toBe(
      'Either sync the latest contract or remove this API call',
    );
  });

  it('checkCalls reports only unmatched calls', () => {
    const issues = checkCalls(
      [
        { method: 'GET', path: '/users/{param}', file: 'a.ts', line: 1 },
        { method: 'PUT', path: '/users/{param}', file: 'a.ts', line: 2 },
      ],
      contract,
    );
    expect(issues.map((i) => `${i.method} ${i.endpoint} @ ${i.location}`)).toEqual(['PUT /users/{param} @ a.ts:2']);
    expect(issues[0].suggestion).toBe('Did you mean one of these endpoints? GET /users/{id}');
  });
});

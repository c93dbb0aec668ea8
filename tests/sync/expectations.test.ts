import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import type { ApiCall, Contract } from '../../engine/types.js';
import { createDefaultConfig } from '../../engine/config.js';
import { parseContract } from '../../engine/contract/schema.js';
import {
  buildExpectations,
  expectationsPath,
  readExpectations,
  saveExpectations,
} from '../../engine/sync/expectations.js';

const contract: Contract = parseContract({
  version: '1.0',
  last_updated: '2024-11-27T10:00:00Z',
  endpoints: [
    { path: '/users', method: 'GET' },
    { path: '/users/{id}', method: 'GET' },
  ],
});

const call = (method: ApiCall['method'], callPath: string, file: string, line: number): ApiCall => ({
  method,
  path: callPath,
  file,
  line,
});

describe('consumer expectations', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'bridge-expect-'));
  });
  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('keeps only calls the contract serves, grouped by endpoint', () => {
    const expectations = buildExpectations(
      [
        call('GET', '/users', 'a.ts', 1),
        call('GET', '/users/{param}', 'a.ts', 2),
        call('GET', '/users', 'b.ts', 7),
        call('GET', '/users', 'a.ts', 1),
        call('POST', '/users', 'a.ts', 3),
        call('GET', '/orders', 'a.ts', 4),
      ],
      contract,
    );
    expect(expectations).toEqual([
      { endpoint: 'GET /users', status: 'using', usageLocations: ['a.ts:1', 'b.ts:7'] },
      { endpoint: 'GET /users/{param}', status: 'using', usageLocations: ['a.ts:2'] },
    ]);
  });

  it('writes and reads the expectations file', () => {
    const config = createDefaultConfig('consumer', { repoRoot: root });
    const file = expectationsPath(config, 'users');
    expect(file).toBe(path.join(root, '.bridge', 'contracts', 'users-expectations.yaml'));

    const record = {
      dependency: 'users',
      lastUpdated: '2024-12-01T08:30:00.000Z',
      expectations: [{ endpoint: 'GET /users', status: 'using' as const, usageLocations: ['a.ts:1'] }],
    };
    saveExpectations(file, record);

    expect(fs.readFileSync(file, 'utf-8')).toContain('usage_locations:');
    expect(readExpectations(file)).toEqual(record);
  });

  it('reads nothing from absent or malformed files', () => {
    const file = path.join(root, 'x-expectations.yaml');
    expect(readExpectations(file)).toBeNull();
    fs.writeFileSync(file, 'expectations: [\n');
    expect(readExpectations(file)).toBeNull();
    fs.writeFileSync(file, 'expectations: 3\n');
    expect(readExpectations(file)).toBeNull();
  });
});

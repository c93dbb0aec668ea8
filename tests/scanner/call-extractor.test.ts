import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { extractApiCalls, extractPathFromUrl, findApiCalls } from '../../engine/scanner/call-extractor.js';

const TS_CLIENT = [
  "import axios from 'axios';",
  '',
  "const BASE_URL = 'https://api.example.test';",
  '',
  'export async function loadUser(id: string) {',
  '  return axios.get(`${BASE_URL}/users/${id}`);',
  '}',
  '',
  'export async function saveUser(user: unknown) {',
  "  return axios.post('/users', user);",
  '}',
  '',
  'export function ignored(self: { http: { get(url: string): void } }) {',
  "  self.http.get('/nope');",
  "  fetch('/also-nope');",
  '}',
  '',
].join('\n');

const PY_CLIENT = [
  'import requests',
  '',
  'BASE = "http://localhost:8000"',
  '',
  '',
  'def load(uid):',
  '    requests.get(f"{BASE}/users/{uid}")',
  '    requests.delete("https://api.example.test/users/" + str(uid))',
  '    session.patch("http://api.example.test/orders?expand=1")',
  '    requests.get(url=BASE)',
  '    httpx.Client().get("/skipped")',
  '',
].join('\n');

describe('call-extractor', () => {
  it('finds client calls in TypeScript', () => {
    expect(extractApiCalls(TS_CLIENT, 'src/api.ts', 'typescript')).toEqual([
      { method: 'GET', path: '/users/{param}', file: 'src/api.ts', line: 6 },
      { method: 'POST', path: '/users', file: 'src/api.ts', line: 10 },
    ]);
  });

  it('finds client calls in Python', () => {
    expect(extractApiCalls(PY_CLIENT, 'client.py', 'python')).toEqual([
      { method: 'GET', path: '/users/{param}', file: 'client.py', line: 7 },
      { method: 'PATCH', path: '/orders', file: 'client.py', line: 9 },
    ]);
  });

  it('resolves concatenations of literals', () => {
    const ts = "api.get('/orders/' + 'recent');\n";
    const py = 'client.put("/orders" "/{order_id}")\n';
    expect(extractApiCalls(ts, 'a.ts', 'typescript').map((c) => c.path)).toEqual(['/orders/recent']);
    expect(extractApiCalls(py, 'a.py', 'python').map((c) => c.path)).toEqual(['/orders/{order_id}']);
  });

  it('returns no calls for a file with syntax errors', () => {
    expect(extractApiCalls("axios.get('/users'\n]]]", 'a.ts', 'typescript')).toEqual([]);
  });

  describe('extractPathFromUrl', () => {
    it('strips scheme, host, query and fragment', () => {
      expect(extractPathFromUrl('http://api.example.com/users?x=1')).toBe('/users');
      expect(extractPathFromUrl('https://api.example.com')).toBe('/');
      expect(extractPathFromUrl('/a/b#section')).toBe('/a/b');
    });

    it('drops a leading base-URL placeholder and adds the leading slash', () => {
      expect(extractPathFromUrl('{param}/users')).toBe('/users');
      expect(extractPathFromUrl('users')).toBe('/users');
    });
  });

  describe('findApiCalls', () => {
    let root: string;

    beforeEach(() => {
      root = fs.mkdtempSync(path.join(os.tmpdir(), 'bridge-calls-'));
      const write = (rel: string, content: string) => {
        fs.mkdirSync(path.dirname(path.join(root, rel)), { recursive: true });
        fs.writeFileSync(path.join(root, rel), content);
      };
      write('src/client.ts', TS_CLIENT);
      write('src/client.spec.ts', "axios.get('/from-spec');\n");
      write('tests/client.ts', "axios.get('/from-tests');\n");
      write('node_modules/lib/index.js', "axios.get('/from-deps');\n");
      write('broken.py', 'def broken(:\n    ]]]\n');
    });
    afterEach(() => {
      fs.rmSync(root, { recursive: true, force: true });
    });

    it('scans sources only, with repository-relative locations', () => {
      expect(findApiCalls(root)).toEqual([
        { method: 'GET', path: '/users/{param}', file: 'src/client.ts', line: 6 },
        { method: 'POST', path: '/users', file: 'src/client.ts', line: 10 },
      ]);
    });
  });
});

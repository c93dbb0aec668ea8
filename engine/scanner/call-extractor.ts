// engine/scanner/call-extractor.ts — Finds outbound HTTP calls in consumer source
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ApiCall } from '../types.js';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import type { SourceLanguage, SyntaxNode } from './tree-sitter.js';
import { detectLanguage, parseSource } from './tree-sitter.js';
import { firstPositionalArgument, lineOf, readUrlExpression, DYNAMIC_SEGMENT } from './syntax.js';
import { toHttpMethod } from './route-extractor.js';
import { toPosix, walkSourceFiles } from './walker.js';

/**
 * Receiver identifiers recognized as HTTP clients. Supporting another client
 * library is one entry here.
 */
export const HTTP_CLIENT_RECEIVERS: ReadonlySet<string> = new Set([
  'requests',
  'httpx',
  'client',
  'session',
  'axios',
  'http',
  'api',
]);

/** Call and member-access node types per grammar. */
const CALL_SHAPES: Record<SourceLanguage, { call: string; member: string; property: string }> = {
  python: { call: 'call', member: 'attribute', property: 'attribute' },
  typescript: { call: 'call_expression', member: 'member_expression', property: 'property' },
  tsx: { call: 'call_expression', member: 'member_expression', property: 'property' },
  javascript: { call: 'call_expression', member: 'member_expression', property: 'property' },
};

/**
 * Extract `<client>.<verb>(url, ...)` calls from one source file.
 * Files that do not parse yield no calls.
 */
export function extractApiCalls(source: string, file: string, language: SourceLanguage): ApiCall[] {
  const root = parseSource(source, language);
  if (!root) return [];

  const shape = CALL_SHAPES[language];
  const results: ApiCall[] = [];

  for (const call of root.descendantsOfType(shape.call)) {
    const parsed = parseApiCall(call, shape.member, shape.property);
    if (!parsed) continue;
    results.push({ ...parsed, file, line: lineOf(call) });
  }

  return results;
}

function parseApiCall(call: SyntaxNode, memberType: string, propertyField: string): Omit<ApiCall, 'file' | 'line'> | null {
  const fn = call.childForFieldName('function');
  if (!fn || fn.type !== memberType) return null;

  const method = toHttpMethod(fn.childForFieldName(propertyField)?.text);
  if (!method) return null;

  // Only bare identifiers: `httpx.AsyncClient().get` and `this.http.get` are not recognized
  const receiver = fn.childForFieldName('object');
  if (!receiver || receiver.type !== 'identifier' || !HTTP_CLIENT_RECEIVERS.has(receiver.text)) return null;

  const urlArg = firstPositionalArgument(call.childForFieldName('arguments'));
  if (!urlArg) return null;

  const url = readUrlExpression(urlArg);
  if (url === null) return null;

  return { method, path: extractPathFromUrl(url) };
}

/**
 * Reduce a URL to its path:
 *   "http://api.example.com/users?x=1" → "/users"
 *   "{param}/users"                    → "/users"   (base URL held in a variable)
 *   "users"                            → "/users"
 */
export function extractPathFromUrl(url: string): string {
  let result = url;

  const scheme = result.indexOf('://');
  if (scheme !== -1) {
    const rest = result.slice(scheme + 3);
    const slash = rest.indexOf('/');
    result = slash === -1 ? '/' : rest.slice(slash);
  } else if (result.startsWith(`${DYNAMIC_SEGMENT}/`)) {
    result = result.slice(DYNAMIC_SEGMENT.length);
  }

  if (!result.startsWith('/')) result = `/${result}`;

  return result.split('?')[0].split('#')[0];
}

/**
 * Walk a repository (tests and dependency directories excluded) and collect
 * every recognized API call. A file that cannot be read or parsed is skipped.
 */
export function findApiCalls(repoRoot: string): ApiCall[] {
  const calls: ApiCall[] = [];

  for (const filePath of walkSourceFiles(repoRoot, { excludeTests: true })) {
    const language = detectLanguage(filePath);
    if (!language) continue;

    const relPath = toPosix(path.relative(repoRoot, filePath));
    try {
      const source = fs.readFileSync(filePath, 'utf-8');
      calls.push(...extractApiCalls(source, relPath, language));
    } catch (err) {
      logger.debug(`Skipping ${relPath}: ${errorMessage(err)}`);
    }
  }

  return calls;
}

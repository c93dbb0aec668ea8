// engine/sync/expectations.ts — Which provider endpoints this consumer calls, and from where

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { ApiCall, BridgeConfig, ConsumerExpectation, ConsumerExpectations, Contract } from '../types.js';
import { endpointKey, normalizePath } from '../contract/paths.js';
import { dumpYaml, parseYaml, writeFileAtomic } from '../contract/store.js';
import { resolveInRepo } from '../config.js';

const ExpectationsDocSchema = z.object({
  dependency: z.string().default(''),
  last_updated: z.string().default(''),
  expectations: z
    .array(
      z.object({
        endpoint: z.string(),
        status: z.literal('using').default('using'),
        usage_locations: z.array(z.string()).default([]),
      }),
    )
    .default([]),
});

export function expectationsPath(config: BridgeConfig, dependencyName: string): string {
  return resolveInRepo(config, path.join(config.contractsDir, `${dependencyName}-expectations.yaml`));
}

/**
 * Calls that hit an endpoint of `contract`, one entry per "METHOD /path" as
 * written at the call site, with every `file:line` it occurs at.
 */
export function buildExpectations(calls: ApiCall[], contract: Contract): ConsumerExpectation[] {
  const known = new Set(contract.endpoints.map((ep) => endpointKey(ep.method, normalizePath(ep.path))));
  const byEndpoint = new Map<string, ConsumerExpectation>();

  for (const call of calls) {
    if (!known.has(endpointKey(call.method, normalizePath(call.path)))) continue;

    const key = endpointKey(call.method, call.path);
    const location = `${call.file}:${call.line}`;
    const existing = byEndpoint.get(key);
    if (!existing) {
      byEndpoint.set(key, { endpoint: key, status: 'using', usageLocations: [location] });
    } else if (!existing.usageLocations.includes(location)) {
      existing.usageLocations.push(location);
    }
  }

  return [...byEndpoint.values()];
}

export function saveExpectations(file: string, record: ConsumerExpectations): string {
  writeFileAtomic(
    file,
    dumpYaml({
      dependency: record.dependency,
      last_updated: record.lastUpdated,
      expectations: record.expectations.map((e) => ({
        endpoint: e.endpoint,
        status: e.status,
        usage_locations: e.usageLocations,
      })),
    }),
  );
  return file;
}

/**
 * Read an expectations file. Returns null when it is absent or malformed.
 */
export function readExpectations(file: string): ConsumerExpectations | null {
  if (!fs.existsSync(file)) return null;
  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(file, 'utf-8'), file);
  } catch {
    return null;
  }
  const parsed = ExpectationsDocSchema.safeParse(raw);
  if (!parsed.success) return null;
  return {
    dependency: parsed.data.dependency,
    lastUpdated: parsed.data.last_updated,
    expectations: parsed.data.expectations.map((e) => ({
      endpoint: e.endpoint,
      status: e.status,
      usageLocations: e.usage_locations,
    })),
  };
}

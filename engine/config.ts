// engine/config.ts — Dependency registry: load, validate, mutate, persist

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { BridgeConfig, ContractRole, Dependency, ProviderSettings, SyncMethod } from './types.js';
import { BridgeConfigError } from './errors.js';
import { writeFileAtomic } from './contract/store.js';

export const DEFAULT_CONFIG_PATH = path.join('.bridge', 'settings', 'bridge.json');
export const DEFAULT_CONTRACTS_DIR = path.join('.bridge', 'contracts');
export const DEFAULT_PROVIDED_CONTRACT = path.join(DEFAULT_CONTRACTS_DIR, 'provided-api.yaml');

/** Upper bound on simultaneous dependency syncs. */
export const MAX_SYNC_CONCURRENCY = 5;

export const DEFAULT_CONFIG: Pick<BridgeConfig, 'enabled' | 'role' | 'repoId' | 'contractsDir' | 'sync'> = {
  enabled: true,
  role: 'consumer',
  repoId: '',
  contractsDir: DEFAULT_CONTRACTS_DIR,
  sync: {
    maxConcurrency: MAX_SYNC_CONCURRENCY,
  },
};

const ROLES: readonly ContractRole[] = ['consumer', 'provider', 'both'];
const SYNC_METHODS: readonly SyncMethod[] = ['git', 'http', 's3'];

// ─── Registry Document ──────────────────────────────────────────────────────
// Structural shape only; semantic checks live in validateConfig so that every
// problem is reported at once with a readable message.

const DependencyDocSchema = z.object({
  name: z.string().default(''),
  type: z.string().default(''),
  sync_method: z.string().default(''),
  git_url: z.string().nullish(),
  contract_path: z.string().default(''),
  local_cache: z.string().default(''),
  sync_on_commit: z.boolean().default(true),
});

const RegistryDocSchema = z.object({
  enabled: z.boolean().default(true),
  role: z.string().default(DEFAULT_CONFIG.role),
  repo_id: z.string().default(''),
  provides: z
    .object({
      contract_file: z.string().default(DEFAULT_PROVIDED_CONTRACT),
      extract_from: z.array(z.string()).default([]),
      auto_update: z.boolean().default(true),
    })
    .nullish(),
  dependencies: z.record(DependencyDocSchema).default({}),
  contracts_dir: z.string().optional(),
  sync: z
    .object({
      max_concurrency: z.number().int().positive().max(MAX_SYNC_CONCURRENCY).optional(),
      fetch_timeout_ms: z.number().int().positive().optional(),
    })
    .optional(),
});

type RegistryDocument = z.infer<typeof RegistryDocSchema>;
type DependencyDocument = z.infer<typeof DependencyDocSchema>;

// ─── Resolution ─────────────────────────────────────────────────────────────

export function resolveConfigPath(cwd: string): string | null {
  const localPath = path.join(cwd, DEFAULT_CONFIG_PATH);
  if (fs.existsSync(localPath)) return localPath;
  return null;
}

// ─── Validation ─────────────────────────────────────────────────────────────

/**
 * Validate a registry document. Accepts the raw file content (snake_case).
 */
export function validateConfig(raw: unknown): { valid: boolean; errors: string[] } {
  const parsed = RegistryDocSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`),
    };
  }

  const doc = parsed.data;
  const errors: string[] = [];

  if (!doc.role) {
    errors.push('Role is required');
  } else if (!isRole(doc.role)) {
    errors.push(`Invalid role: ${doc.role}`);
  }

  for (const [key, dep] of Object.entries(doc.dependencies)) {
    if (!dep.name) errors.push(`Dependency ${key}: name is required`);
    if (!dep.type) errors.push(`Dependency ${key}: type is required`);
    if (!dep.sync_method) {
      errors.push(`Dependency ${key}: sync_method is required`);
    } else if (!isSyncMethod(dep.sync_method)) {
      errors.push(`Dependency ${key}: Invalid sync_method: ${dep.sync_method}`);
    }
    if (dep.sync_method === 'git' && !dep.git_url) {
      errors.push(`Dependency ${key}: git_url is required for git sync method`);
    }
    if (!dep.contract_path) errors.push(`Dependency ${key}: contract_path is required`);
    if (!dep.local_cache) errors.push(`Dependency ${key}: local_cache is required`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Validate an in-memory config, e.g. after mutating it.
 */
export function validateBridgeConfig(config: BridgeConfig): { valid: boolean; errors: string[] } {
  return validateConfig(toDocument(config));
}

function isRole(value: string): value is ContractRole {
  return (ROLES as readonly string[]).includes(value);
}

function isSyncMethod(value: string): value is SyncMethod {
  return (SYNC_METHODS as readonly string[]).includes(value);
}

// ─── Load / Save ────────────────────────────────────────────────────────────

/**
 * Load and validate the registry. Relative paths inside it resolve against
 * `repoRoot`, which defaults to the directory holding `.bridge/`.
 *
 * @throws {BridgeConfigError}
 */
export function loadConfig(configPath: string, repoRoot?: string): BridgeConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new BridgeConfigError(`Cannot read bridge config ${configPath}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }

  const validation = validateConfig(raw);
  if (!validation.valid) {
    throw new BridgeConfigError('Invalid bridge config', validation.errors);
  }

  return fromDocument(RegistryDocSchema.parse(raw), configPath, repoRoot ?? inferRepoRoot(configPath));
}

export function saveConfig(config: BridgeConfig): void {
  writeFileAtomic(config.configPath, JSON.stringify(toDocument(config), null, 2) + '\n');
}

/**
 * A fresh registry. Providers get a `provides` block pointing at the default
 * contract location.
 */
export function createDefaultConfig(
  role: ContractRole = DEFAULT_CONFIG.role,
  options: { repoRoot: string; configPath?: string; repoId?: string },
): BridgeConfig {
  const repoRoot = path.resolve(options.repoRoot);
  return {
    ...DEFAULT_CONFIG,
    sync: { ...DEFAULT_CONFIG.sync },
    role,
    repoId: options.repoId ?? path.basename(repoRoot),
    provides:
      role === 'provider' || role === 'both'
        ? { contractFile: DEFAULT_PROVIDED_CONTRACT, extractFrom: ['backend/**/*.py'], autoUpdate: true }
        : null,
    dependencies: {},
    repoRoot,
    configPath: options.configPath ?? path.join(repoRoot, DEFAULT_CONFIG_PATH),
  };
}

function inferRepoRoot(configPath: string): string {
  const abs = path.resolve(configPath);
  if (abs.endsWith(DEFAULT_CONFIG_PATH)) {
    return abs.slice(0, abs.length - DEFAULT_CONFIG_PATH.length - 1) || path.parse(abs).root;
  }
  return path.dirname(abs);
}

function fromDocument(doc: RegistryDocument, configPath: string, repoRoot: string): BridgeConfig {
  const dependencies: Record<string, Dependency> = {};
  for (const [key, dep] of Object.entries(doc.dependencies)) {
    dependencies[key] = fromDependencyDocument(dep);
  }

  const provides: ProviderSettings | null = doc.provides
    ? {
        contractFile: doc.provides.contract_file,
        extractFrom: doc.provides.extract_from,
        autoUpdate: doc.provides.auto_update,
      }
    : null;

  return {
    enabled: doc.enabled,
    role: isRole(doc.role) ? doc.role : DEFAULT_CONFIG.role,
    repoId: doc.repo_id,
    provides,
    dependencies,
    repoRoot: path.resolve(repoRoot),
    configPath,
    contractsDir: doc.contracts_dir ?? DEFAULT_CONFIG.contractsDir,
    sync: {
      maxConcurrency: doc.sync?.max_concurrency ?? DEFAULT_CONFIG.sync.maxConcurrency,
      fetchTimeoutMs: doc.sync?.fetch_timeout_ms,
    },
  };
}

function fromDependencyDocument(dep: DependencyDocument): Dependency {
  return {
    name: dep.name,
    type: dep.type,
    syncMethod: isSyncMethod(dep.sync_method) ? dep.sync_method : 'git',
    gitUrl: dep.git_url ?? null,
    contractPath: dep.contract_path,
    localCache: dep.local_cache,
    syncOnCommit: dep.sync_on_commit,
  };
}

function toDocument(config: BridgeConfig): Record<string, unknown> {
  const doc: Record<string, unknown> = {
    enabled: config.enabled,
    role: config.role,
    repo_id: config.repoId,
    provides: config.provides
      ? {
          contract_file: config.provides.contractFile,
          extract_from: config.provides.extractFrom,
          auto_update: config.provides.autoUpdate,
        }
      : null,
    dependencies: Object.fromEntries(
      Object.entries(config.dependencies).map(([key, dep]) => [
        key,
        {
          name: dep.name,
          type: dep.type,
          sync_method: dep.syncMethod,
          git_url: dep.gitUrl,
          contract_path: dep.contractPath,
          local_cache: dep.localCache,
          sync_on_commit: dep.syncOnCommit,
        },
      ]),
    ),
  };
  if (config.contractsDir !== DEFAULT_CONFIG.contractsDir) doc.contracts_dir = config.contractsDir;
  const sync: Record<string, number> = {};
  if (config.sync.maxConcurrency !== DEFAULT_CONFIG.sync.maxConcurrency) {
    sync.max_concurrency = config.sync.maxConcurrency;
  }
  if (config.sync.fetchTimeoutMs !== undefined) sync.fetch_timeout_ms = config.sync.fetchTimeoutMs;
  if (Object.keys(sync).length > 0) doc.sync = sync;
  return doc;
}

// ─── Dependencies ───────────────────────────────────────────────────────────

export function getDependency(config: BridgeConfig, name: string): Dependency | null {
  return Object.prototype.hasOwnProperty.call(config.dependencies, name) ? config.dependencies[name] : null;
}

export function listDependencies(config: BridgeConfig): string[] {
  return Object.keys(config.dependencies);
}

/** Absolute path of a registry-relative path. */
export function resolveInRepo(config: BridgeConfig, relPath: string): string {
  return path.resolve(config.repoRoot, relPath);
}

/**
 * Register (or replace) a dependency and persist the registry.
 */
export function addDependency(config: BridgeConfig, dependency: Dependency): void {
  config.dependencies[dependency.name] = dependency;
  saveConfig(config);
}

/**
 * Drop a dependency, persist the registry and delete its cached contract.
 * Returns false when no such dependency was registered.
 */
export function removeDependency(config: BridgeConfig, name: string): boolean {
  const dep = getDependency(config, name);
  if (!dep) return false;

  delete config.dependencies[name];
  saveConfig(config);

  fs.rmSync(resolveInRepo(config, dep.localCache), { force: true });
  return true;
}

/**
 * Defaults for a git dependency; the cache lands in the contracts directory.
 */
export function makeGitDependency(
  config: BridgeConfig,
  name: string,
  gitUrl: string,
  overrides: Partial<Omit<Dependency, 'name' | 'gitUrl' | 'syncMethod'>> = {},
): Dependency {
  return {
    name,
    type: overrides.type ?? 'http-api',
    syncMethod: 'git',
    gitUrl,
    contractPath: overrides.contractPath ?? DEFAULT_PROVIDED_CONTRACT,
    localCache: overrides.localCache ?? path.join(config.contractsDir, `${name}-api.yaml`),
    syncOnCommit: overrides.syncOnCommit ?? true,
  };
}

#!/usr/bin/env node
// engine/cli.ts — CLI entry point for contract-bridge

import * as fs from 'node:fs';
import * as path from 'node:path';
import { breaking, drift, extract, status, sync } from './index.js';
import type { BridgeConfig, ContractRole } from './types.js';
import {
  DEFAULT_CONFIG_PATH,
  addDependency,
  createDefaultConfig,
  loadConfig,
  makeGitDependency,
  removeDependency,
  resolveConfigPath,
  saveConfig,
  validateConfig,
} from './config.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';

const USAGE = `
contract-bridge — Keep API consumers in step with their providers' contracts

Usage:
  contract-bridge <command> [arguments] [options]

Commands:
  init [--role <role>] [--repo-id <id>]
                       Create ${DEFAULT_CONFIG_PATH} (role: consumer, provider, both)
  add-dependency <name> --git-url <url> [--contract-path <path>] [--local-cache <path>] [--type <type>]
                       Register a provider repository
  remove-dependency <name>
                       Unregister a provider and delete its cached contract
  sync [name]          Fetch provider contracts into the local cache
  drift [name]         Check outbound API calls against cached contracts
  breaking <old> <new> [--consumer <name>]...
                       Report consumer-visible changes between two contract files
  extract              Extract this repository's provided contract
  status               Show the registry and cache state
  validate             Validate the bridge config

Options:
  --config <path>   Path to bridge.json (defaults to ./${DEFAULT_CONFIG_PATH})
  --help            Show this help message

All commands print JSON to stdout. Exit status is 1 on failed syncs,
drift errors, breaking errors and invalid configuration.
`.trim();

interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  options: Map<string, string[]>;
}

function parseArgs(argv: string[]): ParsedArgs {
  let command: string | undefined;
  const positionals: string[] = [];
  const options = new Map<string, string[]>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      console.log(USAGE);
      process.exit(0);
    }

    if (arg.startsWith('--')) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        fail(`Missing value for ${arg}`);
      }
      options.set(arg.slice(2), [...(options.get(arg.slice(2)) ?? []), value]);
      i++; // skip value
      continue;
    }

    // First positional argument is the command
    if (!command) command = arg;
    else positionals.push(arg);
  }

  return { command, positionals, options };
}

function option(args: ParsedArgs, name: string): string | undefined {
  const values = args.options.get(name);
  return values ? values[values.length - 1] : undefined;
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function configPathOf(args: ParsedArgs): string {
  return option(args, 'config') ?? resolveConfigPath(process.cwd()) ?? path.join(process.cwd(), DEFAULT_CONFIG_PATH);
}

function resolveConfig(args: ParsedArgs): BridgeConfig {
  const configPath = configPathOf(args);
  if (!fs.existsSync(configPath)) {
    fail(`No bridge config at ${configPath}. Run \`contract-bridge init\` or pass --config <path>`);
  }
  return loadConfig(configPath);
}

function parseRole(value: string | undefined): ContractRole {
  if (value === undefined) return 'consumer';
  if (value === 'consumer' || value === 'provider' || value === 'both') return value;
  return fail(`Invalid role: ${value}`);
}

async function run(args: ParsedArgs): Promise<number> {
  switch (args.command) {
    case 'init': {
      const configPath = option(args, 'config') ?? path.join(process.cwd(), DEFAULT_CONFIG_PATH);
      if (fs.existsSync(configPath)) fail(`Bridge config already exists: ${configPath}`);
      const config = createDefaultConfig(parseRole(option(args, 'role')), {
        repoRoot: process.cwd(),
        configPath,
        repoId: option(args, 'repo-id'),
      });
      saveConfig(config);
      print({ configPath, role: config.role, repoId: config.repoId });
      return 0;
    }

    case 'add-dependency': {
      const [name] = args.positionals;
      const gitUrl = option(args, 'git-url');
      if (!name || !gitUrl) fail('Usage: contract-bridge add-dependency <name> --git-url <url>');
      const config = resolveConfig(args);
      const dependency = makeGitDependency(config, name, gitUrl, {
        type: option(args, 'type'),
        contractPath: option(args, 'contract-path'),
        localCache: option(args, 'local-cache'),
      });
      addDependency(config, dependency);
      print(dependency);
      return 0;
    }

    case 'remove-dependency': {
      const [name] = args.positionals;
      if (!name) fail('Usage: contract-bridge remove-dependency <name>');
      const removed = removeDependency(resolveConfig(args), name);
      print({ name, removed });
      return removed ? 0 : 1;
    }

    case 'sync': {
      const results = await sync(resolveConfig(args), {
        dependency: args.positionals[0],
        onProgress: (name, state) => logger.info(`${name}: ${state}`),
      });
      print(results);
      return results.every((r) => r.success) ? 0 : 1;
    }

    case 'drift': {
      const reports = drift(resolveConfig(args), args.positionals[0]);
      print(reports);
      return reports.some((r) => r.errors > 0) ? 1 : 0;
    }

    case 'breaking': {
      const [previous, next] = args.positionals;
      if (!previous || !next) fail('Usage: contract-bridge breaking <old-contract> <new-contract>');
      const consumers = args.options.get('consumer') ?? [];
      const changes = breaking(previous, next, {
        consumers,
        config: consumers.length > 0 ? resolveConfig(args) : undefined,
      });
      print(changes);
      return changes.some((c) => c.severity === 'error') ? 1 : 0;
    }

    case 'extract': {
      print(extract(resolveConfig(args)));
      return 0;
    }

    case 'status': {
      print(status(resolveConfig(args)));
      return 0;
    }

    case 'validate': {
      const configPath = configPathOf(args);
      let raw: unknown;
      try {
        raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      } catch (err) {
        print({ valid: false, errors: [`Cannot read ${configPath}: ${errorMessage(err)}`] });
        return 1;
      }
      const result = validateConfig(raw);
      print(result);
      return result.valid ? 0 : 1;
    }

    default:
      console.error(`Unknown command: ${args.command}`);
      console.error('');
      console.log(USAGE);
      return 1;
  }
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const args = parseArgs(argv);

  if (!args.command) {
    console.log(USAGE);
    process.exit(0);
  }

  try {
    process.exitCode = await run(args);
  } catch (err) {
    fail(errorMessage(err));
  }
}

main().catch((err: unknown) => fail(errorMessage(err)));

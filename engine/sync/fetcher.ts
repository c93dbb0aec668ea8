// engine/sync/fetcher.ts — Shallow fetch of a provider repository into a local directory

import { execFile } from 'node:child_process';
import * as path from 'node:path';
import { promisify } from 'node:util';
import type { Dependency } from '../types.js';
import { FetchError, errorMessage } from '../errors.js';

const execFileAsync = promisify(execFile);

/**
 * Materializes a dependency's provider repository inside `workspace` and
 * returns the directory the contract path resolves against.
 *
 * Implementations throw {@link FetchError} for connectivity failures; the
 * sync engine treats any throw as one and falls back to the cache.
 */
export interface ContractFetcher {
  fetch(dependency: Dependency, workspace: string): Promise<string>;
}

export interface GitFetcherOptions {
  /** Kill the clone after this many milliseconds. Unset means no limit. */
  timeoutMs?: number;
  /** Git executable, for environments where it is not on PATH. */
  gitBinary?: string;
}

/**
 * `git clone --depth 1 <url> <workspace>/repo`.
 */
export class GitFetcher implements ContractFetcher {
  private readonly timeoutMs: number | undefined;
  private readonly gitBinary: string;

  constructor(options: GitFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs;
    this.gitBinary = options.gitBinary ?? 'git';
  }

  async fetch(dependency: Dependency, workspace: string): Promise<string> {
    if (!dependency.gitUrl) {
      throw new FetchError(`clone ${dependency.name}`, 'git_url is not set');
    }

    const target = path.join(workspace, 'repo');
    const args = ['clone', '--depth', '1', dependency.gitUrl, target];
    try {
      await execFileAsync(this.gitBinary, args, {
        timeout: this.timeoutMs ?? 0,
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
      });
    } catch (err) {
      throw new FetchError(`git ${args.join(' ')}`, stderrOf(err), { cause: err });
    }
    return target;
  }
}

function stderrOf(err: unknown): string {
  if (err instanceof Error && 'stderr' in err && typeof err.stderr === 'string' && err.stderr.trim()) {
    return err.stderr;
  }
  if (err instanceof Error && 'killed' in err && err.killed === true) {
    return 'timed out';
  }
  return errorMessage(err);
}

// engine/sync/workspace.ts — Private temporary directory scoped to one callback

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Logger } from '../logger.js';
import { logger as defaultLogger } from '../logger.js';
import { errorMessage } from '../errors.js';

/**
 * Run `fn` with a fresh temporary directory that is removed afterwards,
 * whether `fn` resolves or throws. Removal failures are logged, not raised.
 */
export async function withTempWorkspace<T>(
  fn: (workspace: string) => Promise<T>,
  options: { prefix?: string; logger?: Logger } = {},
): Promise<T> {
  const workspace = fs.mkdtempSync(path.join(os.tmpdir(), options.prefix ?? 'contract-bridge-'));
  try {
    return await fn(workspace);
  } finally {
    try {
      fs.rmSync(workspace, { recursive: true, force: true });
    } catch (err) {
      (options.logger ?? defaultLogger).warn(`Failed to remove ${workspace}: ${errorMessage(err)}`);
    }
  }
}

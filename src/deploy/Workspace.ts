/**
 * Per-unit temporary workspace.
 *
 * withWorkspace() creates a fresh directory, hands it to the callback and
 * removes it on every exit path. If removal fails, the callback's own error
 * (when there is one) wins and the cleanup failure is only logged; otherwise
 * a CleanupError is thrown.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { getLogger, registerComponent } from '../logging/index.js';
import { CleanupError } from './errors.js';

registerComponent('deploy.workspace', 'Temporary workspace lifecycle');
const logger = getLogger('deploy.workspace');

export const WORKSPACE_PREFIX = 'deploy-repo-';

export interface WorkspaceOptions {
  /** Parent directory of the workspace */
  workRoot: string;
  /** Override for directory removal (tests) */
  remove?: (dir: string) => Promise<void>;
}

async function removeTree(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function withWorkspace<T>(options: WorkspaceOptions, fn: (dir: string) => Promise<T>): Promise<T> {
  await fs.mkdir(options.workRoot, { recursive: true });
  const dir = await fs.mkdtemp(path.join(options.workRoot, WORKSPACE_PREFIX));
  logger.debug(`created workspace ${dir}`);

  const remove = options.remove ?? removeTree;
  let outcome: { ok: true; value: T } | { ok: false; error: unknown };
  try {
    outcome = { ok: true, value: await fn(dir) };
  } catch (error) {
    outcome = { ok: false, error };
  }

  try {
    await remove(dir);
    logger.debug(`removed workspace ${dir}`);
  } catch (cleanupFailure) {
    const cleanupError = new CleanupError(dir, { cause: cleanupFailure });
    if (outcome.ok) {
      throw cleanupError;
    }
    logger.warn(cleanupError.message, cleanupFailure instanceof Error ? cleanupFailure : undefined);
  }

  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}

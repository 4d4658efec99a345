import * as path from 'path';
import { PathEscapeError } from './errors.js';

/**
 * Throws PathEscapeError unless `absolutePath` is `workspaceRoot` or lies below it.
 * Compares path strings only; symlinks are not followed.
 */
export function assertInsideWorkspace(absolutePath: string, workspaceRoot: string): void {
  const root = path.resolve(workspaceRoot);
  const candidate = path.resolve(absolutePath);
  const prefix = root.endsWith(path.sep) ? root : root + path.sep;
  if (candidate !== root && !candidate.startsWith(prefix)) {
    throw new PathEscapeError(candidate, root);
  }
}

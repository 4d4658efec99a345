/**
 * Resolves logical file names from the instruction document into ResolvedPath values.
 */

import * as path from 'path';
import { getLogger, registerComponent } from '../logging/index.js';
import type { ResolvedPath, SubstitutionMap } from './types.js';

registerComponent('deploy.paths', 'Path placeholder substitution');
const logger = getLogger('deploy.paths');

/**
 * Replace every `[[key]]` in `name`, one key at a time in map order.
 * Keys not present in the map are left as written.
 */
export function substitutePlaceholders(name: string, substitutions: SubstitutionMap): string {
  let result = name;
  for (const [key, value] of Object.entries(substitutions)) {
    result = result.split(`[[${key}]]`).join(value);
  }
  return result;
}

/**
 * Everything after the first `.` of a base name, or '' without one.
 */
export function extensionOf(baseName: string): string {
  const dot = baseName.indexOf('.');
  return dot === -1 ? '' : baseName.slice(dot + 1);
}

/**
 * Resolve `name` (after substitution) against `baseDir`, or the working
 * directory when no base is given. Absolute names ignore the base.
 */
export function resolvePath(name: string, baseDir?: string, substitutions: SubstitutionMap = {}): ResolvedPath {
  const substituted = substitutePlaceholders(name, substitutions);
  if (substituted !== name) {
    logger.info(`substituted [${name}] -> [${substituted}]`);
  }

  const absolutePath = baseDir === undefined ? path.resolve(substituted) : path.resolve(baseDir, substituted);
  const baseName = path.basename(absolutePath);

  return Object.freeze({
    absolutePath,
    containingDirectory: path.dirname(absolutePath),
    baseName,
    extension: extensionOf(baseName),
  });
}

/**
 * A sibling of `file` whose name is `file`'s name plus `suffix`.
 */
export function withSuffix(file: ResolvedPath, suffix: string): ResolvedPath {
  return resolvePath(file.absolutePath + suffix);
}

/**
 * Final placement of a (possibly transformed) file at its destination.
 *
 * Destinations under a privileged root are not writable by the deploying
 * account: the file is copied to the staging directory and then moved into
 * place as the privileged user. Everything else is a plain copy.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { ResolvedPath } from '../types.js';
import type { ActionContext } from './context.js';

export type PlacementStrategy = 'direct' | 'privileged';

/**
 * True when `destination` starts with any of `privilegedRoots`.
 */
export function isPrivilegedDestination(destination: string, privilegedRoots: readonly string[]): boolean {
  return privilegedRoots.some((root) => destination.startsWith(root));
}

export function selectPlacementStrategy(destination: ResolvedPath, privilegedRoots: readonly string[]): PlacementStrategy {
  return isPrivilegedDestination(destination.absolutePath, privilegedRoots) ? 'privileged' : 'direct';
}

export async function placeFile(context: ActionContext, source: ResolvedPath, destination: ResolvedPath): Promise<void> {
  const { settings, tools, logger } = context;

  if (selectPlacementStrategy(destination, settings.privilegedRoots) === 'direct') {
    logger.info(` [${source.absolutePath}] -> [${destination.absolutePath}]`);
    await fs.mkdir(destination.containingDirectory, { recursive: true });
    await fs.copyFile(source.absolutePath, destination.absolutePath);
    return;
  }

  const staged = path.join(settings.stagingDir, `${source.baseName}__tmp`);
  logger.info(` [${source.absolutePath}] -> [${staged}]`);
  await fs.copyFile(source.absolutePath, staged);

  const mkdirArgs = ['-u', settings.privilegedUser, 'mkdir', '-p', destination.containingDirectory];
  logger.info(`  [sudo ${mkdirArgs.join(' ')}]`);
  await tools.run('sudo', mkdirArgs);

  const moveArgs = ['-u', settings.privilegedUser, 'mv', '-f', staged, destination.absolutePath];
  logger.info(`  [sudo ${moveArgs.join(' ')}]`);
  await tools.run('sudo', moveArgs);
}

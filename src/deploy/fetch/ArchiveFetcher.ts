/**
 * ArchiveFetcher — deploys a local tar or zip file as if it were a repo.
 *
 * The archive's SHA-1 stands in for a commit hash. Archives of a repo usually
 * hold a single top-level directory; that directory is flattened into the
 * workspace root so the instruction document ends up where it is expected.
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { getLogger, registerComponent } from '../../logging/index.js';
import { FetchError, errorMessage } from '../errors.js';
import type { ToolRunner } from '../ToolRunner.js';
import { targetIdentity } from '../types.js';
import type { FetchResult } from '../types.js';
import type { Fetcher, PackageTarget } from './types.js';

registerComponent('fetch.archive', 'Archive extraction');
const logger = getLogger('fetch.archive');

export type ArchiveKind = 'tar' | 'zip';

const TAR_SUFFIXES = ['.tar', '.tar.gz', '.tgz', '.tar.bz2', '.tbz2', '.tar.xz', '.txz'];

export function detectArchiveKind(file: string): ArchiveKind | null {
  const lower = file.toLowerCase();
  if (lower.endsWith('.zip')) return 'zip';
  if (TAR_SUFFIXES.some((suffix) => lower.endsWith(suffix))) return 'tar';
  return null;
}

export async function sha1File(file: string): Promise<string> {
  const hash = createHash('sha1');
  for await (const chunk of createReadStream(file)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/**
 * If `dir` holds exactly one visible entry and it is a directory, move that
 * directory's contents up into `dir`. Dot-entries beside it (.DS_Store and
 * the like) are not counted. Returns whether anything moved.
 */
export async function flattenSingleDirectory(dir: string): Promise<boolean> {
  const entries = (await fs.readdir(dir, { withFileTypes: true })).filter((entry) => !entry.name.startsWith('.'));
  const only = entries.length === 1 ? entries[0] : undefined;
  if (!only || !only.isDirectory()) {
    return false;
  }

  // rename first so a child sharing the parent's name cannot collide
  const holding = path.join(dir, `.flatten-${process.pid}-${Date.now()}`);
  await fs.rename(path.join(dir, only.name), holding);
  for (const child of await fs.readdir(holding)) {
    await fs.rename(path.join(holding, child), path.join(dir, child));
  }
  await fs.rmdir(holding);
  return true;
}

export class ArchiveFetcher implements Fetcher<PackageTarget> {
  constructor(private readonly tools: ToolRunner) {}

  async fetch(target: PackageTarget, workspace: string): Promise<FetchResult> {
    const identity = targetIdentity(target);
    const archive = path.resolve(target.path);
    const provenanceUrl = `file://${archive}`;
    logger.info(`deploying package ${identity} (${provenanceUrl})`);

    const kind = detectArchiveKind(archive);
    if (kind === null) {
      throw new FetchError(identity, `unsupported archive type [${path.basename(archive)}]`);
    }

    try {
      const commit = await sha1File(archive);
      logger.info(` file SHA1 hash is ${commit}`);

      if (kind === 'zip') {
        await this.tools.run('unzip', ['-q', '-o', archive, '-d', workspace]);
      } else {
        await this.tools.run('tar', ['-xf', archive, '-C', workspace]);
      }

      if (await flattenSingleDirectory(workspace)) {
        logger.info(' flattened single top-level directory');
      }
      return { provenanceUrl, commit };
    } catch (error) {
      throw new FetchError(identity, errorMessage(error), { cause: error });
    }
  }
}

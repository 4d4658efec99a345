/**
 * copy / move
 *
 * Without `match`, `src` and `dst` are single files. With `match`, they are
 * directories and every regular, non-hidden file directly inside `src` whose
 * name matches the expression is copied to `dst` under the same name.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { assertInsideWorkspace } from '../AccessGuard.js';
import { InvalidConfigError } from '../errors.js';
import { addHeader } from '../HeaderInjector.js';
import { resolvePath } from '../PathResolver.js';
import { replaceKeywords } from '../TemplateEngine.js';
import type { CopyAction, CopyModifiers, ResolvedPath } from '../types.js';
import type { ActionContext } from './context.js';
import { placeFile } from './placement.js';

export interface FilePair {
  source: ResolvedPath;
  destination: ResolvedPath;
}

/**
 * Copy one file: guard the source, apply the header and keyword modifiers to
 * temporary copies, place the result, then (for a move) delete the original.
 */
export async function copySingleFile(
  context: ActionContext,
  modifiers: CopyModifiers,
  source: ResolvedPath,
  destination: ResolvedPath,
  isMove: boolean
): Promise<void> {
  context.logger.info(` ${isMove ? 'move' : 'copy'} ${source.baseName} -> ${destination.baseName}`);

  assertInsideWorkspace(source.absolutePath, context.workspaceRoot);

  let prepared = source;
  if (modifiers.addHeaderComment) {
    prepared = await addHeader(context.provenanceUrl, context.commit, prepared, destination.extension, context.now());
  }
  if (modifiers.replaceKeywords.length > 0) {
    const templates = modifiers.replaceKeywords.map((name) => resolvePath(name, context.workspaceRoot));
    prepared = await replaceKeywords(prepared, templates);
  }

  await placeFile(context, prepared, destination);

  if (isMove) {
    await fs.unlink(source.absolutePath);
  }
}

function compileMatcher(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new InvalidConfigError(`invalid match expression [${pattern}]`, { cause: error });
  }
}

/**
 * Pair each matching file in `sourceDir` with its namesake in `destinationDir`, sorted by name.
 */
export async function matchFiles(
  sourceDir: ResolvedPath,
  destinationDir: ResolvedPath,
  pattern: string
): Promise<FilePair[]> {
  const matcher = compileMatcher(pattern);
  const entries = await fs.readdir(sourceDir.absolutePath, { withFileTypes: true });

  return entries
    .filter((entry) => entry.isFile() && !entry.name.startsWith('.') && matcher.test(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((name) => ({
      source: resolvePath(path.join(sourceDir.absolutePath, name)),
      destination: resolvePath(path.join(destinationDir.absolutePath, name)),
    }));
}

export async function executeCopyMove(context: ActionContext, action: CopyAction): Promise<void> {
  const src = resolvePath(action.src, context.workspaceRoot, context.substitutions);
  const dst = resolvePath(action.dst, context.workspaceRoot, context.substitutions);

  const pairs: FilePair[] =
    action.match === undefined ? [{ source: src, destination: dst }] : await matchFiles(src, dst, action.match);

  const isMove = action.type === 'move';
  for (const { source, destination } of pairs) {
    await copySingleFile(context, action, source, destination, isMove);
  }
}

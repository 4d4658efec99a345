/**
 * export / import
 *
 * `export` copies a file into the shared exports directory; `import` links a
 * file from there into place. Together they let one unit use files another
 * unit deployed, optionally under a versioned `name`.
 */

import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import { DestinationConflictError } from '../errors.js';
import { resolvePath } from '../PathResolver.js';
import type { ExportAction, ImportAction } from '../types.js';
import type { ActionContext } from './context.js';
import { copySingleFile } from './CopyMoveAction.js';

export async function executeExport(context: ActionContext, action: ExportAction): Promise<void> {
  const src = resolvePath(action.src, context.workspaceRoot, context.substitutions);
  const exportedName = resolvePath(action.name ?? src.baseName).baseName;
  const dst = resolvePath(exportedName, context.settings.exportsDir, context.substitutions);

  context.logger.info(` export ${src.absolutePath} -> ${dst.absolutePath}`);
  await copySingleFile(context, action, src, dst, false);
}

async function lstatOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.lstat(target);
  } catch (error: unknown) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export async function executeImport(context: ActionContext, action: ImportAction): Promise<void> {
  const dst = resolvePath(action.dst, context.workspaceRoot, context.substitutions);
  const sharedName = resolvePath(action.name ?? dst.baseName).baseName;
  const src = resolvePath(sharedName, context.settings.exportsDir, context.substitutions);

  context.logger.info(` import ${src.absolutePath} <- ${dst.absolutePath}`);
  await fs.mkdir(dst.containingDirectory, { recursive: true });

  const existing = await lstatOrNull(dst.absolutePath);
  if (existing === null) {
    await fs.symlink(src.absolutePath, dst.absolutePath);
    context.logger.info(' created symlink');
  } else if (existing.isSymbolicLink()) {
    context.logger.info(' symlink with destination name already exists');
  } else {
    throw new DestinationConflictError(dst.absolutePath);
  }
}

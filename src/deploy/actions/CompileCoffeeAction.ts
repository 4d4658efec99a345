import * as fs from 'fs/promises';
import { assertInsideWorkspace } from '../AccessGuard.js';
import { resolvePath } from '../PathResolver.js';
import type { CompileCoffeeAction, ResolvedPath } from '../types.js';
import type { ActionContext } from './context.js';

/**
 * `src` with its extension swapped for "js", next to `src`; "js" is appended when there is none.
 */
export function defaultJsDestination(source: ResolvedPath): ResolvedPath {
  const baseName = source.extension === ''
    ? `${source.baseName}.js`
    : source.baseName.slice(0, source.baseName.length - source.extension.length) + 'js';
  return resolvePath(baseName, source.containingDirectory);
}

/**
 * compile-coffee: run `coffee -c -p <src>` and write its output to `dst`.
 */
export async function executeCompileCoffee(context: ActionContext, action: CompileCoffeeAction): Promise<void> {
  const src = resolvePath(action.src, context.workspaceRoot, context.substitutions);
  const dst =
    action.dst === undefined
      ? defaultJsDestination(src)
      : resolvePath(action.dst, context.workspaceRoot, context.substitutions);

  assertInsideWorkspace(src.absolutePath, context.workspaceRoot);

  const command = context.settings.coffeeCommand;
  const args = ['-c', '-p', src.absolutePath];
  context.logger.info(` compile-coffee ${src.baseName} -> ${dst.baseName}`);
  context.logger.info(`  [${command} ${args.join(' ')} > ${dst.absolutePath}]`);

  const { stdout } = await context.tools.run(command, args, { cwd: context.workspaceRoot });
  await fs.mkdir(dst.containingDirectory, { recursive: true });
  await fs.writeFile(dst.absolutePath, stdout, 'utf-8');
}

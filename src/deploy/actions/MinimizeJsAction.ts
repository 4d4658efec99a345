import { assertInsideWorkspace } from '../AccessGuard.js';
import { resolvePath } from '../PathResolver.js';
import type { MinimizeJsAction } from '../types.js';
import type { ActionContext } from './context.js';

/**
 * minimize-js: run `uglifyjs <src> -c -m -o <dst>`; `dst` defaults to `src`.
 */
export async function executeMinimizeJs(context: ActionContext, action: MinimizeJsAction): Promise<void> {
  const src = resolvePath(action.src, context.workspaceRoot, context.substitutions);
  const dst = action.dst === undefined ? src : resolvePath(action.dst, context.workspaceRoot, context.substitutions);

  assertInsideWorkspace(src.absolutePath, context.workspaceRoot);

  const command = context.settings.uglifyCommand;
  const args = [src.absolutePath, '-c', '-m', '-o', dst.absolutePath];
  context.logger.info(` minimize-js ${src.baseName} -> ${dst.baseName}`);
  context.logger.info(`  [${command} ${args.join(' ')}]`);

  await context.tools.run(command, args, { cwd: context.workspaceRoot });
}

import type { DeployAction } from '../types.js';
import type { ActionContext } from './context.js';
import { executeCopyMove } from './CopyMoveAction.js';
import { executeCompileCoffee } from './CompileCoffeeAction.js';
import { executeMinimizeJs } from './MinimizeJsAction.js';
import { executeExport, executeImport } from './SharedDirectoryActions.js';

export type { ActionContext } from './context.js';
export { copySingleFile, matchFiles } from './CopyMoveAction.js';
export { defaultJsDestination } from './CompileCoffeeAction.js';
export { isPrivilegedDestination, selectPlacementStrategy, placeFile } from './placement.js';
export type { PlacementStrategy } from './placement.js';

/**
 * Run one parsed action.
 */
export async function executeAction(context: ActionContext, action: DeployAction): Promise<void> {
  switch (action.type) {
    case 'copy':
    case 'move':
      return executeCopyMove(context, action);
    case 'compile-coffee':
      return executeCompileCoffee(context, action);
    case 'minimize-js':
      return executeMinimizeJs(context, action);
    case 'export':
      return executeExport(context, action);
    case 'import':
      return executeImport(context, action);
  }
}

/**
 * Repo deployer — fetch a repo or archive, run its deploy.json, record the outcome.
 */

export * from './types.js';
export * from './errors.js';
export { getDeploySettings, loadDeploySettings, resetDeploySettings } from './config.js';
export type { DeploySettings } from './config.js';

export { resolvePath, substitutePlaceholders, extensionOf } from './PathResolver.js';
export { assertInsideWorkspace } from './AccessGuard.js';
export { replaceKeywords, applyKeywords, loadTemplatePairs } from './TemplateEngine.js';
export { addHeader, buildHeader, layoutHeaderLine, selectCommentStyle, HEADER_WIDTH } from './HeaderInjector.js';
export { parseInstructionDocument, parseActionRow, DOCUMENT_TYPE } from './ConfigValidator.js';
export * from './actions/index.js';

export { ProcessToolRunner } from './ToolRunner.js';
export type { ToolRunner, ToolResult, ToolRunOptions } from './ToolRunner.js';
export { withWorkspace } from './Workspace.js';
export { DeploymentOrchestrator } from './DeploymentOrchestrator.js';
export type { DeploymentPhase, UnitOfWork } from './DeploymentOrchestrator.js';
export { BatchRunner, parseRepoTarget, parseIdentity } from './BatchRunner.js';
export { createDeployer } from './createDeployer.js';

export type { StatusStore } from './StatusStore.js';
export { DeployStatusDao, STATUS_TABLE } from './DeployStatusDao.js';

export * from './fetch/index.js';

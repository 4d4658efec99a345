import type { Logger } from '../../logging/index.js';
import type { DeploySettings } from '../config.js';
import type { ToolRunner } from '../ToolRunner.js';
import type { SubstitutionMap } from '../types.js';

/**
 * Everything an action executor sees about the unit being deployed.
 */
export interface ActionContext {
  provenanceUrl: string;
  commit: string;
  workspaceRoot: string;
  substitutions: SubstitutionMap;
  settings: DeploySettings;
  tools: ToolRunner;
  logger: Logger;
  /** Deploy time written into provenance headers. */
  now: () => Date;
}

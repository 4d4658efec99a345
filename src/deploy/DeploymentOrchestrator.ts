/**
 * DeploymentOrchestrator — runs one unit's instruction document.
 *
 * Phases: fetched -> validated -> running(i) -> completed | failed.
 * Actions run strictly in document order; the first failing action moves the
 * unit to `failed` and nothing after it runs. Effects of actions that already
 * ran stay in place.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { getLogger, registerComponent } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import { executeAction } from './actions/index.js';
import type { ActionContext } from './actions/index.js';
import type { DeploySettings } from './config.js';
import { parseActionRow, parseInstructionDocument } from './ConfigValidator.js';
import type { ToolRunner } from './ToolRunner.js';
import type { ExecutionSummary, InstructionDocument } from './types.js';

registerComponent('deploy.orchestrator', 'Instruction document execution');

export type DeploymentPhase =
  | { phase: 'fetched' }
  | { phase: 'validated' }
  | { phase: 'running'; index: number }
  | { phase: 'completed' }
  | { phase: 'failed'; index?: number; error: unknown };

export interface DeploymentOrchestratorOptions {
  settings: DeploySettings;
  tools: ToolRunner;
  logger?: Logger;
  now?: () => Date;
  /** Observer for phase transitions */
  onPhase?: (phase: DeploymentPhase) => void;
}

export interface UnitOfWork {
  provenanceUrl: string;
  commit: string;
  workspaceRoot: string;
}

export class DeploymentOrchestrator {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: DeploymentOrchestratorOptions) {
    this.logger = options.logger ?? getLogger('deploy.orchestrator');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Path of the instruction document inside a workspace.
   */
  configPath(workspaceRoot: string): string {
    return path.join(workspaceRoot, this.options.settings.configFileName);
  }

  async hasInstructionDocument(workspaceRoot: string): Promise<boolean> {
    try {
      return (await fs.stat(this.configPath(workspaceRoot))).isFile();
    } catch {
      return false;
    }
  }

  async loadDocument(workspaceRoot: string): Promise<InstructionDocument> {
    const text = await fs.readFile(this.configPath(workspaceRoot), 'utf-8');
    return parseInstructionDocument(text);
  }

  async execute(unit: UnitOfWork): Promise<ExecutionSummary> {
    this.transition({ phase: 'fetched' });

    let document: InstructionDocument;
    try {
      document = await this.loadDocument(unit.workspaceRoot);
    } catch (error) {
      this.transition({ phase: 'failed', error });
      throw error;
    }
    this.transition({ phase: 'validated' });

    if (document.skip) {
      this.logger.info('field `skip` is present and true - skipping deploy');
      this.transition({ phase: 'completed' });
      return { skipped: true, actionsRun: 0, commentsSkipped: 0 };
    }

    const substitutionEntries = Object.entries(document.substitutions);
    if (substitutionEntries.length > 0) {
      this.logger.info('will substitute the following path fragments:');
      for (const [key, value] of substitutionEntries) {
        this.logger.info(` [[${key}]] -> ${value}`);
      }
    }

    const context: ActionContext = {
      provenanceUrl: unit.provenanceUrl,
      commit: unit.commit,
      workspaceRoot: unit.workspaceRoot,
      substitutions: document.substitutions,
      settings: this.options.settings,
      tools: this.options.tools,
      logger: this.logger,
      now: this.now,
    };

    const total = document.actions.length;
    let actionsRun = 0;
    let commentsSkipped = 0;

    for (const [index, row] of document.actions.entries()) {
      try {
        const action = parseActionRow(row, index, total);
        if (action === null) {
          commentsSkipped++;
          continue;
        }
        this.transition({ phase: 'running', index });
        await executeAction(context, action);
        actionsRun++;
      } catch (error) {
        this.transition({ phase: 'failed', index, error });
        throw error;
      }
    }

    this.transition({ phase: 'completed' });
    return { skipped: false, actionsRun, commentsSkipped };
  }

  private transition(phase: DeploymentPhase): void {
    if (this.logger.isDebugEnabled()) {
      const where = 'index' in phase && phase.index !== undefined ? ` (action ${phase.index + 1})` : '';
      this.logger.debug(`phase -> ${phase.phase}${where}`);
    }
    this.options.onPhase?.(phase);
  }
}

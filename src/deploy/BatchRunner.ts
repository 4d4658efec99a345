/**
 * BatchRunner — deploys units one after another.
 *
 * Each unit gets its own workspace, its outcome is written to the status
 * store exactly once, and its failure never stops the units after it. Once
 * every unit has been attempted, the first failure is rethrown.
 */

import { getLogger, registerComponent } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import type { DeploymentOrchestrator } from './DeploymentOrchestrator.js';
import { errorMessage, toError } from './errors.js';
import type { Fetcher } from './fetch/types.js';
import type { StatusStore } from './StatusStore.js';
import { DeployStatus, LOCAL_OWNER, targetIdentity } from './types.js';
import type { DeployResult, DeployTarget } from './types.js';
import { withWorkspace } from './Workspace.js';
import type { WorkspaceOptions } from './Workspace.js';

registerComponent('deploy', 'Deploy runs');

export interface BatchRunnerOptions {
  fetcher: Fetcher;
  orchestrator: DeploymentOrchestrator;
  statusStore: StatusStore;
  workspace: WorkspaceOptions;
  logger?: Logger;
}

/**
 * Parse "owner/name" into a repo target.
 */
export function parseRepoTarget(value: string): DeployTarget {
  const parts = value.split('/');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new Error(`expected a repo in the form owner/name, got [${value}]`);
  }
  return { kind: 'repo', owner: parts[0], name: parts[1] };
}

/**
 * Turn a stored identity back into a target: "<local>/<file>" is a package,
 * anything else a repo.
 */
export function parseIdentity(identity: string): DeployTarget {
  const localPrefix = `${LOCAL_OWNER}/`;
  if (identity.startsWith(localPrefix)) {
    return { kind: 'package', path: identity.slice(localPrefix.length) };
  }
  return parseRepoTarget(identity);
}

export class BatchRunner {
  private readonly logger: Logger;

  constructor(private readonly options: BatchRunnerOptions) {
    this.logger = options.logger ?? getLogger('deploy');
  }

  /**
   * Fetch, run and tear down one unit, then record its outcome.
   * Rethrows the unit's error after the outcome is stored.
   */
  async deployUnit(target: DeployTarget): Promise<DeployResult> {
    const { fetcher, orchestrator, statusStore } = this.options;
    const identity = targetIdentity(target);
    const attempt: { commit: string | null; status: DeployStatus } = {
      commit: null,
      status: DeployStatus.FAILED,
    };

    let failure: { error: unknown } | null = null;
    try {
      attempt.status = await withWorkspace(this.options.workspace, async (workspaceRoot) => {
        const fetched = await fetcher.fetch(target, workspaceRoot);
        attempt.commit = fetched.commit;

        if (!(await orchestrator.hasInstructionDocument(workspaceRoot))) {
          this.logger.info(`deploy config does not exist for this repo (${orchestrator.configPath(workspaceRoot)})`);
          return DeployStatus.SKIPPED;
        }
        await orchestrator.execute({ provenanceUrl: fetched.provenanceUrl, commit: fetched.commit, workspaceRoot });
        return DeployStatus.SUCCESS;
      });
    } catch (error) {
      failure = { error };
      attempt.status = DeployStatus.FAILED;
    }

    try {
      await statusStore.upsert(identity, attempt.commit, attempt.status);
    } catch (storeError) {
      if (failure === null) {
        throw storeError;
      }
      this.logger.error(`failed to record status for ${identity}`, toError(storeError));
    }

    if (failure !== null) {
      throw failure.error;
    }
    return { identity, commit: attempt.commit, status: attempt.status };
  }

  /**
   * Deploy every target in order. Failures are logged and deferred; the first
   * one is rethrown after the last target has been attempted.
   */
  async deployAll(targets: readonly DeployTarget[]): Promise<DeployResult[]> {
    const results: DeployResult[] = [];
    const errors: unknown[] = [];

    for (const target of targets) {
      try {
        results.push(await this.deployUnit(target));
      } catch (error) {
        this.logger.error(`failed to deploy ${targetIdentity(target)} - ${errorMessage(error)}`);
        errors.push(error);
      }
    }

    if (errors.length > 0) {
      throw errors[0];
    }
    return results;
  }
}

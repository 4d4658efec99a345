import { BatchRunner } from './BatchRunner.js';
import type { DeploySettings } from './config.js';
import { DeploymentOrchestrator } from './DeploymentOrchestrator.js';
import { ArchiveFetcher } from './fetch/ArchiveFetcher.js';
import { GitFetcher } from './fetch/GitFetcher.js';
import { SourceFetcher } from './fetch/SourceFetcher.js';
import type { StatusStore } from './StatusStore.js';
import { ProcessToolRunner } from './ToolRunner.js';
import type { ToolRunner } from './ToolRunner.js';

export interface DeployerDependencies {
  settings: DeploySettings;
  statusStore: StatusStore;
  tools?: ToolRunner;
}

/**
 * Wire the production collaborators for a batch run.
 */
export function createDeployer({ settings, statusStore, tools = new ProcessToolRunner() }: DeployerDependencies): BatchRunner {
  const fetcher = new SourceFetcher(
    new GitFetcher({ baseUrl: settings.gitBaseUrl, cloneTimeoutMs: settings.cloneTimeoutMs }),
    new ArchiveFetcher(tools)
  );
  const orchestrator = new DeploymentOrchestrator({ settings, tools });

  return new BatchRunner({
    fetcher,
    orchestrator,
    statusStore,
    workspace: { workRoot: settings.workRoot },
  });
}

import { getLogger, registerComponent } from '../../logging/index.js';
import { FetchError, errorMessage } from '../errors.js';
import { targetIdentity } from '../types.js';
import type { FetchResult } from '../types.js';
import { GitClient } from './GitClient.js';
import type { Fetcher, RepoTarget } from './types.js';

registerComponent('fetch.git', 'Repository clone');
const logger = getLogger('fetch.git');

export interface GitFetcherOptions {
  /** e.g. https://github.com */
  baseUrl: string;
  cloneTimeoutMs: number;
  gitBinary?: string;
}

export class GitFetcher implements Fetcher<RepoTarget> {
  constructor(private readonly options: GitFetcherOptions) {}

  cloneUrl(target: RepoTarget): string {
    return `${this.options.baseUrl}/${target.owner}/${target.name}.git`;
  }

  async fetch(target: RepoTarget, workspace: string): Promise<FetchResult> {
    const identity = targetIdentity(target);
    const url = this.cloneUrl(target);
    logger.info(`deploying repo ${identity} (${url})`);

    const client = new GitClient(workspace, this.options.gitBinary);
    try {
      await client.clone(url, { timeoutMs: this.options.cloneTimeoutMs });
      const commit = await client.getCommitHash();
      logger.info(` most recent commit is ${commit}`);
      return { provenanceUrl: url.replace(/\.git$/, ''), commit };
    } catch (error) {
      throw new FetchError(identity, errorMessage(error), { cause: error });
    }
  }
}

import type { DeployTarget, FetchResult } from '../types.js';
import type { Fetcher, PackageTarget, RepoTarget } from './types.js';

/**
 * Routes each target to the fetcher for its kind.
 */
export class SourceFetcher implements Fetcher {
  constructor(
    private readonly repos: Fetcher<RepoTarget>,
    private readonly packages: Fetcher<PackageTarget>
  ) {}

  fetch(target: DeployTarget, workspace: string): Promise<FetchResult> {
    switch (target.kind) {
      case 'repo':
        return this.repos.fetch(target, workspace);
      case 'package':
        return this.packages.fetch(target, workspace);
    }
  }
}

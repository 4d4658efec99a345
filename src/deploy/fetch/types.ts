import type { DeployTarget, FetchResult } from '../types.js';

/**
 * Populates an empty workspace with a unit's files.
 * Implementations throw FetchError on any failure.
 */
export interface Fetcher<T extends DeployTarget = DeployTarget> {
  fetch(target: T, workspace: string): Promise<FetchResult>;
}

export type RepoTarget = Extract<DeployTarget, { kind: 'repo' }>;
export type PackageTarget = Extract<DeployTarget, { kind: 'package' }>;

export type { Fetcher, RepoTarget, PackageTarget } from './types.js';
export { GitClient } from './GitClient.js';
export { GitFetcher } from './GitFetcher.js';
export type { GitFetcherOptions } from './GitFetcher.js';
export { ArchiveFetcher, detectArchiveKind, flattenSingleDirectory, sha1File } from './ArchiveFetcher.js';
export { SourceFetcher } from './SourceFetcher.js';

/**
 * Core types for the repo deployer: resolved paths, the instruction document,
 * its action rows, deploy targets and outcomes.
 */

/**
 * A logical file name resolved to an absolute location.
 * `extension` is everything after the first `.` of `baseName` ("foo.min.js" -> "min.js").
 */
export interface ResolvedPath {
  readonly absolutePath: string;
  readonly containingDirectory: string;
  readonly baseName: string;
  readonly extension: string;
}

/** Placeholder key (no `[[ ]]` delimiters) -> replacement text. */
export type SubstitutionMap = Readonly<Record<string, string>>;

export interface InstructionDocument {
  type: string;
  version: number;
  skip: boolean;
  substitutions: SubstitutionMap;
  /** Raw rows; each is parsed only when execution reaches it. */
  actions: readonly unknown[];
}

export const ACTION_TYPES = ['copy', 'move', 'compile-coffee', 'minimize-js', 'export', 'import'] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

/** Modifiers shared by actions that end in a file copy. */
export interface CopyModifiers {
  addHeaderComment: boolean;
  /** Template files, relative to the workspace root. */
  replaceKeywords: string[];
}

export interface CopyAction extends CopyModifiers {
  type: 'copy' | 'move';
  src: string;
  dst: string;
  match?: string;
}

export interface CompileCoffeeAction {
  type: 'compile-coffee';
  src: string;
  dst?: string;
}

export interface MinimizeJsAction {
  type: 'minimize-js';
  src: string;
  dst?: string;
}

export interface ExportAction extends CopyModifiers {
  type: 'export';
  src: string;
  name?: string;
}

export interface ImportAction {
  type: 'import';
  dst: string;
  name?: string;
}

export type DeployAction = CopyAction | CompileCoffeeAction | MinimizeJsAction | ExportAction | ImportAction;

/**
 * Outcome codes persisted to the status table.
 */
export enum DeployStatus {
  QUEUED = 0,
  SUCCESS = 1,
  SKIPPED = 2,
  FAILED = -1,
}

export type DeployTarget =
  | { kind: 'repo'; owner: string; name: string }
  | { kind: 'package'; path: string };

/** Owner of packages in the status table. */
export const LOCAL_OWNER = '<local>';

export function targetIdentity(target: DeployTarget): string {
  return target.kind === 'repo' ? `${target.owner}/${target.name}` : `${LOCAL_OWNER}/${target.path}`;
}

/**
 * What a fetch collaborator hands back once the workspace is populated.
 */
export interface FetchResult {
  /** Link recorded in provenance headers (clone URL without ".git", or file:// URL). */
  provenanceUrl: string;
  /** Commit hash for repositories, SHA-1 content hash for archives. */
  commit: string;
}

export interface DeployResult {
  identity: string;
  commit: string | null;
  status: DeployStatus;
}

export interface ExecutionSummary {
  skipped: boolean;
  actionsRun: number;
  commentsSkipped: number;
}

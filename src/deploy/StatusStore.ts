import type { DeployStatus } from './types.js';

/**
 * Durable record of the last deploy attempt per unit.
 * Writes are last-writer-wins; one deploying process at a time is assumed.
 */
export interface StatusStore {
  /**
   * Insert or update the row for `identity`, refreshing its timestamp.
   * A null `commit` leaves a stored commit untouched.
   */
  upsert(identity: string, commit: string | null, status: DeployStatus): Promise<void>;

  /** Identities whose status is QUEUED. */
  listQueued(): Promise<string[]>;
}

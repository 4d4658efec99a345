/**
 * DeployStatusDao — status rows for deployed repos and packages.
 *
 * Table schema:
 *   github_deploy_repo (
 *     id INT AUTO_INCREMENT PRIMARY KEY,
 *     repo VARCHAR(128) UNIQUE,       -- "owner/name" or "<local>/<file>"
 *     commit CHAR(40),                -- last commit or archive SHA-1
 *     datetime DATETIME,              -- last status update
 *     status INT                      -- 0 queued, 1 success, 2 skipped, -1 failed
 *   )
 */

import type { RowDataPacket } from 'mysql2/promise';
import { execute, query } from '../db/pool.js';
import type { StatusStore } from './StatusStore.js';
import { DeployStatus } from './types.js';

export const STATUS_TABLE = 'github_deploy_repo';

interface RepoRow extends RowDataPacket {
  repo: string;
}

export class DeployStatusDao implements StatusStore {
  /**
   * Create the status table when it does not exist yet.
   */
  async ensureTable(): Promise<void> {
    await execute(
      `CREATE TABLE IF NOT EXISTS \`${STATUS_TABLE}\` (
        \`id\` INT(11) NOT NULL AUTO_INCREMENT,
        \`repo\` VARCHAR(128) NOT NULL,
        \`commit\` CHAR(40) NOT NULL DEFAULT '0000000000000000000000000000000000000000',
        \`datetime\` DATETIME NOT NULL,
        \`status\` INT(11) NOT NULL DEFAULT 0,
        PRIMARY KEY (\`id\`),
        UNIQUE KEY \`repo\` (\`repo\`)
      )`
    );
  }

  async upsert(identity: string, commit: string | null, status: DeployStatus): Promise<void> {
    if (commit !== null) {
      await execute(
        `INSERT INTO \`${STATUS_TABLE}\` (\`repo\`, \`commit\`, \`datetime\`, \`status\`)
         VALUES (:repo, :commit, now(), :status)
         ON DUPLICATE KEY UPDATE \`commit\` = :commit, \`datetime\` = now(), \`status\` = :status`,
        { repo: identity, commit, status }
      );
      return;
    }

    await execute(
      `INSERT INTO \`${STATUS_TABLE}\` (\`repo\`, \`datetime\`, \`status\`)
       VALUES (:repo, now(), :status)
       ON DUPLICATE KEY UPDATE \`datetime\` = now(), \`status\` = :status`,
      { repo: identity, status }
    );
  }

  async listQueued(): Promise<string[]> {
    const rows = await query<RepoRow>(`SELECT \`repo\` FROM \`${STATUS_TABLE}\` WHERE \`status\` = :status`, {
      status: DeployStatus.QUEUED,
    });
    return rows.map((row) => row.repo);
  }
}

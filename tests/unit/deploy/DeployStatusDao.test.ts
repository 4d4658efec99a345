/**
 * DeployStatusDao tests
 *
 * Mocks: pool.ts query/execute functions
 */

import { jest, describe, it, expect, beforeEach } from '@jest/globals';

// ---------------------------------------------------------------------------
// Mock pool module
// ---------------------------------------------------------------------------
const mockQuery = jest.fn<(...args: unknown[]) => Promise<unknown>>();
const mockExecute = jest.fn<(...args: unknown[]) => Promise<unknown>>();

jest.mock('../../../src/db/pool.js', () => ({
  query: (...args: unknown[]) => mockQuery(...args),
  execute: (...args: unknown[]) => mockExecute(...args),
}));

import { DeployStatusDao, STATUS_TABLE } from '../../../src/deploy/DeployStatusDao.js';
import { DeployStatus } from '../../../src/deploy/types.js';

describe('DeployStatusDao', () => {
  const dao = new DeployStatusDao();

  beforeEach(() => {
    mockQuery.mockReset();
    mockExecute.mockReset();
    mockExecute.mockResolvedValue({ affectedRows: 1 });
  });

  describe('ensureTable', () => {
    it('should create the status table when absent', async () => {
      await dao.ensureTable();

      expect(mockExecute).toHaveBeenCalledTimes(1);
      const sql = String(mockExecute.mock.calls[0]?.[0]);
      expect(sql).toContain(`CREATE TABLE IF NOT EXISTS \`${STATUS_TABLE}\``);
      expect(sql).toContain('UNIQUE KEY `repo` (`repo`)');
    });
  });

  describe('upsert', () => {
    it('should write commit, time and status', async () => {
      await dao.upsert('owner/site', 'abc123', DeployStatus.SUCCESS);

      const [sql, params] = mockExecute.mock.calls[0] ?? [];
      expect(String(sql)).toContain('VALUES (:repo, :commit, now(), :status)');
      expect(String(sql)).toContain('ON DUPLICATE KEY UPDATE `commit` = :commit, `datetime` = now(), `status` = :status');
      expect(params).toEqual({ repo: 'owner/site', commit: 'abc123', status: 1 });
    });

    it('should leave the stored commit alone when there is none', async () => {
      await dao.upsert('owner/gone', null, DeployStatus.FAILED);

      const [sql, params] = mockExecute.mock.calls[0] ?? [];
      expect(String(sql)).not.toContain(':commit');
      expect(String(sql)).toContain('ON DUPLICATE KEY UPDATE `datetime` = now(), `status` = :status');
      expect(params).toEqual({ repo: 'owner/gone', status: -1 });
    });

    it('should propagate database errors', async () => {
      mockExecute.mockRejectedValue(new Error('ER_LOCK_WAIT_TIMEOUT'));
      await expect(dao.upsert('owner/site', 'abc', DeployStatus.SKIPPED)).rejects.toThrow('ER_LOCK_WAIT_TIMEOUT');
    });
  });

  describe('listQueued', () => {
    it('should return the identities with status 0', async () => {
      mockQuery.mockResolvedValue([{ repo: 'owner/a' }, { repo: '<local>/site.tgz' }]);

      expect(await dao.listQueued()).toEqual(['owner/a', '<local>/site.tgz']);
      const [sql, params] = mockQuery.mock.calls[0] ?? [];
      expect(String(sql)).toBe(`SELECT \`repo\` FROM \`${STATUS_TABLE}\` WHERE \`status\` = :status`);
      expect(params).toEqual({ status: 0 });
    });

    it('should return an empty list when nothing is queued', async () => {
      mockQuery.mockResolvedValue([]);
      expect(await dao.listQueued()).toEqual([]);
    });
  });
});

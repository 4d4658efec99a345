import { describe, it, expect, beforeAll } from '@jest/globals';
import chalk from 'chalk';
import {
  createTable,
  formatComponentTable,
  formatDuration,
  formatResultTable,
  pad,
  statusLabel,
} from '../../../../src/cli/lib/OutputFormatter.js';
import { DeployStatus } from '../../../../src/deploy/types.js';
import { LogLevel } from '../../../../src/logging/LogLevel.js';

describe('OutputFormatter', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  describe('formatDuration', () => {
    it('should format milliseconds, seconds and minutes', () => {
      expect(formatDuration(250)).toBe('250ms');
      expect(formatDuration(1500)).toBe('1.5s');
      expect(formatDuration(125000)).toBe('2m 5s');
    });
  });

  describe('pad', () => {
    it('should pad left-aligned by default', () => {
      expect(pad('ab', 4)).toBe('ab  ');
    });

    it('should pad right-aligned', () => {
      expect(pad('ab', 4, 'right')).toBe('  ab');
    });

    it('should truncate long values', () => {
      expect(pad('abcdef', 3)).toBe('abc');
    });
  });

  describe('statusLabel', () => {
    it('should name every status', () => {
      expect(
        [DeployStatus.QUEUED, DeployStatus.SUCCESS, DeployStatus.SKIPPED, DeployStatus.FAILED].map(statusLabel)
      ).toEqual(['QUEUED', 'SUCCESS', 'SKIPPED', 'FAILED']);
    });
  });

  describe('createTable', () => {
    it('should widen columns to fit their content', () => {
      const table = createTable([['a-long-cell', 'x']], [
        { header: 'A', width: 3 },
        { header: 'B', width: 3, align: 'right' },
      ]);

      expect(table.split('\n')).toEqual([
        '┌─────────────┬─────┐',
        '│ A           │   B │',
        '├─────────────┼─────┤',
        '│ a-long-cell │   x │',
        '└─────────────┴─────┘',
      ]);
    });
  });

  describe('formatResultTable', () => {
    it('should shorten commits and mark missing ones', () => {
      const lines = formatResultTable([
        { identity: 'owner/site', commit: 'abcdef1234567890', status: DeployStatus.SUCCESS },
        { identity: 'owner/gone', commit: null, status: DeployStatus.FAILED },
      ]).split('\n');

      expect(lines[1]).toBe('│ ' + pad('REPO', 24) + ' │ ' + pad('COMMIT', 12) + ' │ STATUS  │');
      expect(lines[3]).toBe('│ ' + pad('owner/site', 24) + ' │ abcdef123456 │ SUCCESS │');
      expect(lines[4]).toBe('│ ' + pad('owner/gone', 24) + ' │ ' + pad('-', 12) + ' │ FAILED  │');
      expect(lines).toHaveLength(6);
    });
  });

  describe('formatComponentTable', () => {
    it('should mark overridden levels', () => {
      const lines = formatComponentTable([
        { name: 'deploy', description: 'Deploy runs', effectiveLevel: LogLevel.INFO, hasOverride: false },
        { name: 'fetch.git', description: 'Repository clone', effectiveLevel: LogLevel.TRACE, hasOverride: true },
      ]).split('\n');

      expect(lines[1]).toBe(`│ ${pad('COMPONENT', 20)} │ LEVEL  │ ${pad('DESCRIPTION', 30)} │`);
      expect(lines[3]).toBe(`│ ${pad('deploy', 20)} │ INFO   │ ${pad('Deploy runs', 30)} │`);
      expect(lines[4]).toBe(`│ ${pad('fetch.git', 20)} │ TRACE* │ ${pad('Repository clone', 30)} │`);
    });
  });
});

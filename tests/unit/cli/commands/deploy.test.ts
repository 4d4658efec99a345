import { jest, describe, it, expect, afterEach } from '@jest/globals';
import chalk from 'chalk';
import { UsageError, countSources, runDeploy, targetFromOptions } from '../../../../src/cli/commands/deploy.js';
import { createProgram } from '../../../../src/cli/index.js';
import { pad } from '../../../../src/cli/lib/OutputFormatter.js';
import { LogLevel, getGlobalLevel, setGlobalLevel } from '../../../../src/logging/index.js';

describe('deploy command', () => {
  describe('countSources', () => {
    it('should count each kind of source once', () => {
      expect(countSources({})).toBe(0);
      expect(countSources({ database: true })).toBe(1);
      expect(countSources({ repo: 'owner/site', package: 'site.tgz' })).toBe(2);
      expect(countSources({ database: true, repo: 'owner/site', package: 'site.tgz' })).toBe(3);
    });

    it('should not count flags that do not name a source', () => {
      expect(countSources({ repo: 'owner/site', createTable: true, json: true })).toBe(1);
    });
  });

  describe('targetFromOptions', () => {
    it('should build repo and package targets', () => {
      expect(targetFromOptions({ repo: 'owner/site' })).toEqual({ kind: 'repo', owner: 'owner', name: 'site' });
      expect(targetFromOptions({ package: 'site.tgz' })).toEqual({ kind: 'package', path: 'site.tgz' });
    });

    it('should return null in queued mode', () => {
      expect(targetFromOptions({ database: true })).toBeNull();
    });
  });

  describe('runDeploy', () => {
    it('should require exactly one source before touching the database', async () => {
      await expect(runDeploy({})).rejects.toThrow(UsageError);
      await expect(runDeploy({ database: true, repo: 'owner/site' })).rejects.toThrow(
        'Exactly one deploy source must be given.'
      );
    });
  });

  describe('createProgram', () => {
    it('should register the source options', () => {
      const program = createProgram();
      expect(program.name()).toBe('deploy-repo');
      expect(program.options.map((option) => option.long)).toEqual([
        '--version',
        '--database',
        '--repo',
        '--package',
        '--create-table',
        '--json',
        '--log-level',
        '--log-components',
      ]);
    });
  });

  describe('log options', () => {
    const initialLevel = getGlobalLevel();

    afterEach(() => {
      setGlobalLevel(initialLevel);
      jest.restoreAllMocks();
    });

    it('should list registered components at the requested level without deploying', async () => {
      chalk.level = 0;
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

      await createProgram().parseAsync(['node', 'deploy-repo', '--log-level', 'warn', '--log-components']);

      expect(getGlobalLevel()).toBe(LogLevel.WARN);
      expect(log).toHaveBeenCalledTimes(1);
      const lines = String(log.mock.calls[0]?.[0]).split('\n');
      expect(lines).toContain(`│ ${pad('database', 20)} │ WARN   │ ${pad('Database connection pool', 30)} │`);
      expect(lines).toContain(`│ ${pad('fetch.git', 20)} │ WARN   │ ${pad('Repository clone', 30)} │`);
    });
  });
});

/**
 * Deploy Command
 *
 * Deploys exactly one source per run:
 *   deploy-repo --database            every repo queued in the status table
 *   deploy-repo --repo owner/name     one repository
 *   deploy-repo --package site.tgz    one local tar/zip archive
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { closePool, getDatabaseConfigFromEnv, initPool } from '../../db/pool.js';
import { parseIdentity, parseRepoTarget } from '../../deploy/BatchRunner.js';
import { getDeploySettings } from '../../deploy/config.js';
import { createDeployer } from '../../deploy/createDeployer.js';
import { DeployStatusDao } from '../../deploy/DeployStatusDao.js';
import type { DeployResult, DeployTarget } from '../../deploy/types.js';
import { targetIdentity } from '../../deploy/types.js';
import { getGlobalLevel, getRegisteredComponents, parseLogLevel, setGlobalLevel } from '../../logging/index.js';
import { formatComponentTable, formatDuration, formatResultTable } from '../lib/OutputFormatter.js';
import type { DeployCommandOptions } from '../types/index.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Count the deploy sources given; exactly one is allowed.
 */
export function countSources(options: DeployCommandOptions): number {
  return [options.database === true, Boolean(options.repo), Boolean(options.package)].filter(Boolean).length;
}

/**
 * Targets named directly on the command line (not --database).
 */
export function targetFromOptions(options: DeployCommandOptions): DeployTarget | null {
  if (options.repo) return parseRepoTarget(options.repo);
  if (options.package) return { kind: 'package', path: options.package };
  return null;
}

async function collectQueuedTargets(store: DeployStatusDao): Promise<DeployTarget[]> {
  const spinner = ora('Reading queued repos...').start();
  try {
    const identities = await store.listQueued();
    spinner.succeed(`${identities.length} queued`);
    return identities.map(parseIdentity);
  } catch (error) {
    spinner.fail('Could not read queued repos');
    throw error;
  }
}

export async function runDeploy(options: DeployCommandOptions): Promise<DeployResult[]> {
  if (countSources(options) !== 1) {
    throw new UsageError('Exactly one deploy source must be given.');
  }

  const started = Date.now();
  initPool(getDatabaseConfigFromEnv());
  const store = new DeployStatusDao();

  try {
    if (options.createTable) {
      await store.ensureTable();
    }

    const deployer = createDeployer({ settings: getDeploySettings(), statusStore: store });
    const direct = targetFromOptions(options);

    let results: DeployResult[];
    if (direct) {
      results = [await deployer.deployUnit(direct)];
    } else {
      const targets = await collectQueuedTargets(store);
      if (targets.length === 0) {
        console.log('no repos to deploy');
        return [];
      }
      console.log('will deploy the following repos:');
      for (const target of targets) {
        console.log(`  ${chalk.cyan(targetIdentity(target))}`);
      }
      results = await deployer.deployAll(targets);
    }

    if (options.json) {
      console.log(JSON.stringify(results, null, 2));
    } else {
      console.log(formatResultTable(results));
      console.log(chalk.gray(`done in ${formatDuration(Date.now() - started)}`));
    }
    return results;
  } finally {
    await closePool();
  }
}

/**
 * Register the deploy options and action on the root program
 */
export function registerDeployCommand(program: Command): void {
  program
    .option('-d, --database', 'deploy every repo queued in the status table')
    .option('-r, --repo <owner/name>', 'deploy the given repo (e.g. owner/www-site)')
    .option('-p, --package <file>', 'deploy the given tar/zip file (e.g. experimental.tgz)')
    .option('--create-table', 'create the status table if it does not exist')
    .option('--json', 'print results as JSON')
    .option('--log-level <level>', 'global log level (TRACE, DEBUG, INFO, WARN, ERROR)')
    .option('--log-components', 'list log components and their levels, then exit')
    .action(async (options: DeployCommandOptions) => {
      if (options.logLevel) {
        setGlobalLevel(parseLogLevel(options.logLevel));
      }
      if (options.logComponents) {
        console.log(formatComponentTable(getRegisteredComponents(getGlobalLevel())));
        return;
      }
      try {
        await runDeploy(options);
      } catch (error) {
        if (error instanceof UsageError) {
          console.error(chalk.red(error.message));
          program.outputHelp();
          process.exitCode = 1;
          return;
        }
        throw error;
      }
    });
}

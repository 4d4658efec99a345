#!/usr/bin/env node
/**
 * deploy-repo CLI
 *
 * Fetches repos (or local archives) and deploys them by following the
 * deploy.json instruction document at their root.
 *
 * Usage: deploy-repo (--database | --repo owner/name | --package file)
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { registerDeployCommand } from './commands/deploy.js';
import { shutdownLogging } from '../logging/index.js';

const VERSION = '0.1.0';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('deploy-repo')
    .description('Fetch repos or archives and deploy them according to their deploy.json')
    .version(VERSION, '-V, --version', 'Output the version number');

  registerDeployCommand(program);

  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# Deploy everything queued in the status table')}
  $ deploy-repo --database

  ${chalk.gray('# Deploy one repository')}
  $ deploy-repo --repo owner/www-site

  ${chalk.gray('# Deploy a local archive as if it were a repo')}
  $ deploy-repo --package experimental.tgz
`
  );

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  } finally {
    await shutdownLogging();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(chalk.red('Fatal error:'), error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}

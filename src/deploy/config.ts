/**
 * Deploy Settings
 *
 * Environment-derived settings for the deployer, cached after first read.
 * Follows the logging config pattern: getDeploySettings() / resetDeploySettings().
 */

import * as os from 'os';
import * as path from 'path';

export interface DeploySettings {
  /** Name of the instruction document at the workspace root (DEPLOY_CONFIG_FILE) */
  configFileName: string;
  /** Shared directory used by export/import actions (DEPLOY_EXPORTS_DIR) */
  exportsDir: string;
  /** Neutral location files are staged in before a privileged move (DEPLOY_STAGING_DIR) */
  stagingDir: string;
  /** Destinations under any of these prefixes need the privileged move (DEPLOY_PRIVILEGED_ROOTS) */
  privilegedRoots: string[];
  /** Account that owns the privileged roots (DEPLOY_PRIVILEGED_USER) */
  privilegedUser: string;
  /** Parent directory for per-unit workspaces (DEPLOY_WORK_ROOT) */
  workRoot: string;
  /** Host repos are cloned from (DEPLOY_GIT_BASE_URL) */
  gitBaseUrl: string;
  /** Clone must finish within this many milliseconds (DEPLOY_CLONE_TIMEOUT) */
  cloneTimeoutMs: number;
  /** CoffeeScript compiler executable (DEPLOY_COFFEE_COMMAND) */
  coffeeCommand: string;
  /** JavaScript minifier executable (DEPLOY_UGLIFY_COMMAND) */
  uglifyCommand: string;
}

export const DEFAULT_CONFIG_FILE_NAME = 'deploy.json';
export const DEFAULT_CLONE_TIMEOUT_MS = 60_000;

let cachedSettings: DeploySettings | null = null;

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined) return fallback;
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

// A root only covers what lies below it: /var/www/html must not take in /var/www/html2.
function asDirectoryPrefix(root: string): string {
  return root.endsWith(path.sep) ? root : root + path.sep;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Build settings from an environment map.
 */
export function loadDeploySettings(env: NodeJS.ProcessEnv = process.env): DeploySettings {
  return {
    configFileName: env['DEPLOY_CONFIG_FILE'] || DEFAULT_CONFIG_FILE_NAME,
    exportsDir: path.resolve(env['DEPLOY_EXPORTS_DIR'] || 'exports'),
    stagingDir: path.resolve(env['DEPLOY_STAGING_DIR'] || '/common'),
    privilegedRoots: parseList(env['DEPLOY_PRIVILEGED_ROOTS'], ['/var/www/html/']).map(asDirectoryPrefix),
    privilegedUser: env['DEPLOY_PRIVILEGED_USER'] || 'webadmin',
    workRoot: path.resolve(env['DEPLOY_WORK_ROOT'] || os.tmpdir()),
    gitBaseUrl: (env['DEPLOY_GIT_BASE_URL'] || 'https://github.com').replace(/\/+$/, ''),
    cloneTimeoutMs: parsePositiveInt(env['DEPLOY_CLONE_TIMEOUT'], DEFAULT_CLONE_TIMEOUT_MS),
    coffeeCommand: env['DEPLOY_COFFEE_COMMAND'] || 'coffee',
    uglifyCommand: env['DEPLOY_UGLIFY_COMMAND'] || 'uglifyjs',
  };
}

/**
 * Get the process-wide deploy settings; use resetDeploySettings() in tests.
 */
export function getDeploySettings(): DeploySettings {
  if (!cachedSettings) {
    cachedSettings = loadDeploySettings();
  }
  return cachedSettings;
}

export function resetDeploySettings(): void {
  cachedSettings = null;
}

/**
 * CLI-specific type definitions
 */

/**
 * Options accepted by the deploy command
 */
export interface DeployCommandOptions {
  database?: boolean;
  repo?: string;
  package?: string;
  createTable?: boolean;
  json?: boolean;
  logLevel?: string;
  logComponents?: boolean;
}

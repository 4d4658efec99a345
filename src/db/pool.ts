/**
 * MySQL connection pool for the deploy status table.
 */

import mysql, { Pool, PoolOptions, RowDataPacket, ResultSetHeader } from 'mysql2/promise';
import { getLogger, registerComponent } from '../logging/index.js';
import type { Logger } from '../logging/index.js';

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  connectionLimit?: number;
  connectTimeout?: number;
  timezone?: string;
}

/** Named placeholder values bound by query() and execute() */
export type SqlParams = Record<string, string | number | boolean | Date | null>;

const DEFAULT_POOL_SIZE = 2;

let pool: Pool | null = null;

registerComponent('database', 'Database connection pool');

let dbLogger: Logger | null = null;
function getDbLogger(): Logger {
  if (!dbLogger) {
    dbLogger = getLogger('database');
  }
  return dbLogger;
}

/**
 * Read database settings from DB_* environment variables.
 */
export function getDatabaseConfigFromEnv(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  return {
    host: env['DB_HOST'] ?? 'localhost',
    port: parseInt(env['DB_PORT'] ?? '3306', 10),
    database: env['DB_NAME'] ?? 'utils',
    user: env['DB_USER'] ?? 'deploy',
    password: env['DB_PASSWORD'] ?? '',
    connectionLimit: parseInt(env['DB_POOL_SIZE'] ?? String(DEFAULT_POOL_SIZE), 10),
    connectTimeout: parseInt(env['DB_CONNECT_TIMEOUT'] ?? '10000', 10),
    timezone: env['DB_TIMEZONE'] ?? 'local',
  };
}

/**
 * Initialize the database connection pool
 */
export function initPool(config: DatabaseConfig): Pool {
  if (pool) {
    return pool;
  }

  const poolOptions: PoolOptions = {
    connectionLimit: DEFAULT_POOL_SIZE,
    waitForConnections: true,
    ...config,
    namedPlaceholders: true,
  };

  pool = mysql.createPool(poolOptions);

  getDbLogger().info(
    `Database pool initialized: ${config.user}@${config.host}:${config.port}/${config.database}, connectionLimit=${poolOptions.connectionLimit ?? DEFAULT_POOL_SIZE}`
  );

  return pool;
}

/**
 * Get the current pool instance
 */
export function getPool(): Pool {
  if (!pool) {
    throw new Error('Database pool not initialized. Call initPool() first.');
  }
  return pool;
}

/**
 * Close the connection pool
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Execute a SELECT query and return rows
 */
export async function query<T extends RowDataPacket>(
  sql: string,
  params?: SqlParams
): Promise<T[]> {
  const [rows] = await getPool().query<T[]>(sql, params);
  return rows;
}

/**
 * Execute an INSERT/UPDATE/DELETE/DDL statement and return the result header
 */
export async function execute(
  sql: string,
  params?: SqlParams
): Promise<ResultSetHeader> {
  const [result] = await getPool().execute<ResultSetHeader>(sql, params);
  return result;
}

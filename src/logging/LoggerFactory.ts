/**
 * Logger Factory
 *
 * Central factory for creating and managing Logger instances.
 * Initializes the root Winston logger and caches per-component Logger wrappers.
 *
 * Usage:
 *   import { getLogger } from '../logging/index.js';
 *
 *   const logger = getLogger('deploy');
 *   logger.info('deploying repo owner/name');
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';

/**
 * Winston uses LOWER numbers for HIGHER priority: error=0 ... trace=4.
 */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function toWinstonLevel(level: LogLevel): string {
  switch (level) {
    case LogLevel.ERROR:
      return 'error';
    case LogLevel.WARN:
      return 'warn';
    case LogLevel.INFO:
      return 'info';
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.TRACE:
      return 'trace';
  }
}

let rootLogger: winston.Logger | null = null;
let currentGlobalLevel: LogLevel = LogLevel.INFO;
const loggerCache = new Map<string, Logger>();

/**
 * Initialize the logging subsystem.
 * If getLogger() is called first, it lazy-initializes with defaults.
 */
export function initializeLogging(): winston.Logger {
  const config = getLoggingConfig();

  currentGlobalLevel = config.logLevel;

  const transports: winston.transport[] = [
    new ConsoleTransport(config.logFormat, config.timestampFormat).createWinstonTransport(),
  ];

  if (config.logFile) {
    transports.push(new FileTransport(config.logFile, config.logFormat).createWinstonTransport());
  }

  const root = winston.createLogger({
    levels: WINSTON_LEVELS,
    level: toWinstonLevel(currentGlobalLevel),
    transports,
    exitOnError: false,
  });
  rootLogger = root;

  setGlobalLevelProvider(() => currentGlobalLevel);

  initFromEnv(config.debugComponents);

  // Re-wire existing cached loggers to the new root
  for (const [component] of loggerCache) {
    loggerCache.set(component, new Logger(component, root));
  }

  return root;
}

/**
 * Get (or create) a Logger for a named component.
 */
export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const root = rootLogger ?? initializeLogging();
  const logger = new Logger(component, root);
  loggerCache.set(component, logger);
  return logger;
}

/**
 * Change the global log level at runtime.
 */
export function setGlobalLevel(level: LogLevel): void {
  currentGlobalLevel = level;
  if (rootLogger) {
    rootLogger.level = toWinstonLevel(level);
  }
}

export function getGlobalLevel(): LogLevel {
  return currentGlobalLevel;
}

/**
 * Flush pending writes and close all transports.
 */
export async function shutdownLogging(): Promise<void> {
  const root = rootLogger;
  if (!root) return;
  await new Promise<void>((resolve) => {
    root.on('finish', resolve);
    root.end();
  });
  rootLogger = null;
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  if (rootLogger) {
    rootLogger.close();
  }
  rootLogger = null;
  currentGlobalLevel = LogLevel.INFO;
  loggerCache.clear();
  setGlobalLevelProvider(() => LogLevel.INFO);
}

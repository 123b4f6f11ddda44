/**
 * Logger Factory
 *
 * Central factory for creating and managing Logger instances.
 * Initializes the root winston logger and caches per-component Logger wrappers.
 *
 * Usage:
 *   import { getLogger, registerComponent } from '../logging/index.js';
 *
 *   registerComponent('x12-engine', 'Claim extraction pipeline');
 *   const logger = getLogger('x12-engine');
 *   logger.info('Extracted claims', { count: 3 });
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';

/**
 * Winston uses LOWER numbers for HIGHER priority:
 * error=0 (highest), trace=4 (lowest)
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
 * If getLogger() is called before this, it lazy-initializes with defaults.
 */
export function initializeLogging(): winston.Logger {
  const config = getLoggingConfig();

  currentGlobalLevel = config.logLevel;

  const transports: winston.transport[] = [
    new ConsoleTransport(config.logFormat, config.timestampFormat).createWinstonTransport(),
  ];

  if (config.logFile) {
    transports.push(
      new FileTransport(config.logFile, config.logFormat, config.timestampFormat).createWinstonTransport()
    );
  }

  if (rootLogger) {
    rootLogger.close();
  }

  const created = winston.createLogger({
    levels: WINSTON_LEVELS,
    level: toWinstonLevel(currentGlobalLevel),
    transports,
    exitOnError: false,
  });
  rootLogger = created;

  setGlobalLevelProvider(() => currentGlobalLevel);
  initFromEnv(config.debugComponents);

  // Re-wire existing cached loggers to the new root
  for (const [component] of loggerCache) {
    loggerCache.set(component, new Logger(component, created));
  }

  return created;
}

function ensureInitialized(): winston.Logger {
  return rootLogger ?? initializeLogging();
}

/**
 * Get (or create) a Logger for a named component.
 * Loggers are cached by component name.
 */
export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const logger = new Logger(component, ensureInitialized());
  loggerCache.set(component, logger);
  return logger;
}

/**
 * Change the global log level at runtime.
 * Affects all loggers that don't have a per-component override.
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
 * Shut down all transports, flushing pending writes.
 */
export async function shutdownLogging(): Promise<void> {
  const logger = rootLogger;
  if (!logger) return;

  await new Promise<void>((resolve) => {
    logger.on('finish', () => resolve());
    logger.end();
  });
  rootLogger = null;
  loggerCache.clear();
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

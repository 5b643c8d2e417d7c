/**
 * Logger Factory
 *
 * Usage:
 *   import { getLogger } from '../logging';
 *
 *   const logger = getLogger('batch');
 *   logger.info('Batch started');
 *
 * The root winston logger is created lazily from getLoggingConfig().
 */

import winston from 'winston';
import { getLoggingConfig, resetLoggingConfig, type LoggingConfiguration } from './config';
import { Logger } from './Logger';

export { Logger } from './Logger';
export { getLoggingConfig, resetLoggingConfig, LOG_LEVELS, type LogLevel, type LoggingConfiguration } from './config';

let rootLogger: winston.Logger | null = null;
const loggerCache = new Map<string, Logger>();

/**
 * Text format: ` INFO 2024-05-01T10:00:00.000Z [batch] Batch started`
 */
const textFormat = winston.format.printf((info) => {
  const level = info.level.toUpperCase().padStart(5);
  const component = typeof info['component'] === 'string' ? ` [${info['component']}]` : '';
  const timestamp = typeof info['timestamp'] === 'string' ? info['timestamp'] : new Date().toISOString();
  const errorStack = typeof info['errorStack'] === 'string' ? `\n${info['errorStack']}` : '';
  return `${level} ${timestamp}${component} ${String(info.message)}${errorStack}`;
});

function createRootLogger(config: LoggingConfiguration): winston.Logger {
  return winston.createLogger({
    level: config.logLevel,
    silent: config.silent,
    format:
      config.logFormat === 'json'
        ? winston.format.combine(winston.format.timestamp(), winston.format.json())
        : winston.format.combine(winston.format.timestamp(), textFormat),
    // Log lines go to stderr so command output on stdout stays clean
    transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'debug'] })],
    exitOnError: false,
  });
}

/**
 * (Re)initialize the root logger, replacing it with `logger` when given.
 */
export function initializeLogging(logger?: winston.Logger): void {
  rootLogger = logger ?? createRootLogger(getLoggingConfig());
  for (const [component] of loggerCache) {
    loggerCache.set(component, new Logger(component, rootLogger));
  }
}

/**
 * Component-bound logger.
 */
export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) {
    return cached;
  }
  if (!rootLogger) {
    initializeLogging();
  }
  const root = rootLogger ?? createRootLogger(getLoggingConfig());
  const logger = new Logger(component, root);
  loggerCache.set(component, logger);
  return logger;
}

/**
 * Logger that drops everything; for tests and library callers that do their own reporting.
 */
export function createSilentLogger(component = 'silent'): Logger {
  return new Logger(component, winston.createLogger({ silent: true, transports: [new winston.transports.Console()] }));
}

export function resetLogging(): void {
  rootLogger = null;
  loggerCache.clear();
  resetLoggingConfig();
}

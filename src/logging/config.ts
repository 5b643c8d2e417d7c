/**
 * Logging Configuration
 *
 * Derived from environment variables and cached; use resetLoggingConfig() in tests.
 */

import { z } from 'zod';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggingConfiguration {
  /** Minimum log level (LOG_LEVEL env, default info) */
  logLevel: LogLevel;
  /** Log output format (LOG_FORMAT env, default 'text') */
  logFormat: 'text' | 'json';
  /** Suppress all output (LOG_SILENT=true) */
  silent: boolean;
}

const envSchema = z.object({
  LOG_LEVEL: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .catch('info'),
  LOG_FORMAT: z.enum(['text', 'json']).catch('text'),
  LOG_SILENT: z
    .string()
    .optional()
    .transform((value) => value === 'true' || value === '1'),
});

let cachedConfig: LoggingConfiguration | null = null;

/**
 * Get the current logging configuration.
 * Unrecognized values fall back to the defaults.
 */
export function getLoggingConfig(): LoggingConfiguration {
  if (cachedConfig) return cachedConfig;

  const env = envSchema.parse({
    LOG_LEVEL: process.env['LOG_LEVEL'] ?? 'info',
    LOG_FORMAT: process.env['LOG_FORMAT'] ?? 'text',
    LOG_SILENT: process.env['LOG_SILENT'],
  });
  cachedConfig = {
    logLevel: env.LOG_LEVEL,
    logFormat: env.LOG_FORMAT,
    silent: env.LOG_SILENT,
  };
  return cachedConfig;
}

export function resetLoggingConfig(): void {
  cachedConfig = null;
}

/**
 * Anonymizer configuration
 *
 * A JSON configuration file is validated with zod; command-line flags are
 * layered on top by the CLI.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError } from './core/errors';
import { TagSelection } from './core/tagSelection';
import { DEFAULT_CATALOG, type TagCatalog } from './core/tagCatalog';

export const DEFAULT_CONCURRENCY = 4;
export const MAX_CONCURRENCY = 64;

export const configSchema = z
  .object({
    /** Tags or keywords to anonymize, or "all" (default) */
    tags: z.union([z.literal('all'), z.array(z.string().min(1))]).default('all'),
    /** Tags or keywords removed from the selection */
    exclude: z.array(z.string().min(1)).default([]),
    /** Files processed at the same time */
    concurrency: z.number().int().min(1).max(MAX_CONCURRENCY).default(DEFAULT_CONCURRENCY),
  })
  .strict();

export type AnonymizerConfigInput = z.input<typeof configSchema>;
export type AnonymizerConfig = z.output<typeof configSchema>;

/**
 * Validate raw configuration data.
 */
export function parseConfig(data: unknown): AnonymizerConfig {
  const result = configSchema.safeParse(data);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  return result.data;
}

/**
 * Read and validate a JSON configuration file.
 */
export async function loadConfigFile(path: string): Promise<AnonymizerConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read configuration file ${path}`, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Configuration file ${path} is not valid JSON`, { cause: error });
  }
  return parseConfig(data);
}

/**
 * Tag selection described by a configuration.
 */
export function selectionFromConfig(config: AnonymizerConfig, catalog: TagCatalog = DEFAULT_CATALOG): TagSelection {
  const base = config.tags === 'all' ? TagSelection.all(catalog) : TagSelection.of(config.tags, catalog);
  const selection = base.without(config.exclude, catalog);
  if (selection.isEmpty) {
    throw new ConfigurationError('No tags selected for anonymization');
  }
  return selection;
}

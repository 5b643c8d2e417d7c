/**
 * Batch Anonymizer
 *
 * Anonymizes every file of a directory tree into an `anonymized`
 * subdirectory. Files go through `pending → reading → transforming →
 * writing → succeeded | failed`; a failing file is recorded and the batch
 * moves on. All files of one call share a single UidMappingTable, so the
 * same original UID becomes the same new UID in every output file.
 */

import { randomBytes } from 'crypto';
import type { Dirent } from 'fs';
import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from 'fs/promises';
import * as path from 'path';
import { anonymize } from './anonymizer';
import type { TransformSkipped } from './elementTransformer';
import {
  AnonymizerError,
  DirectoryNotFoundError,
  UnreadableFileError,
  WriteFailureError,
  describeError,
  type AnonymizerErrorKind,
} from './errors';
import { parse } from './parser';
import type { TagCatalog } from './tagCatalog';
import { TagSelection } from './tagSelection';
import type { DicomDataSet } from './types';
import { UidMappingTable } from './uidMappingTable';
import { write } from './writer';
import { DEFAULT_CONCURRENCY } from '../config';
import { getLogger, type Logger } from '../logging';

export const OUTPUT_DIRECTORY_NAME = 'anonymized';

export type FileState = 'pending' | 'reading' | 'transforming' | 'writing' | 'succeeded' | 'failed';

export type ResultStatus = 'success' | 'skipped' | 'failed';

export interface AnonymizationResult {
  sourcePath: string;
  outputPath: string;
  status: ResultStatus;
  error?: { kind: AnonymizerErrorKind | 'Cancelled' | 'Internal'; message: string };
  /** Elements blanked because they could not be rewritten */
  skippedElements: TransformSkipped[];
}

export interface BatchReport {
  sourceDirectory: string;
  outputDirectory: string;
  /** One entry per file, in enumeration order */
  results: AnonymizationResult[];
  total: number;
  /** Files anonymized successfully */
  processed: number;
  failed: number;
  skipped: number;
  cancelled: boolean;
}

export type ProgressCallback = (completed: number, total: number) => void;

export interface BatchOptions {
  /** Tags to anonymize. Default: every catalog tag */
  selection?: TagSelection;
  catalog?: TagCatalog;
  /** Files processed at the same time. Default: 4 */
  concurrency?: number;
  /** Called after each file reaches a terminal state */
  onProgress?: ProgressCallback;
  /** Aborting stops dispatching new files; files in flight finish */
  signal?: AbortSignal;
  logger?: Logger;
  /** Name of the output subdirectory. Default: "anonymized" */
  outputDirName?: string;
  /** Source of the batch's UID table; a fresh table per call by default */
  createUidTable?: () => UidMappingTable;
}

interface FileJob {
  index: number;
  sourcePath: string;
  outputPath: string;
}

/**
 * Anonymize every regular file under `sourceDir`.
 *
 * @throws DirectoryNotFoundError when `sourceDir` is missing or not a directory,
 * UnreadableFileError when a directory below it cannot be listed, and
 * WriteFailureError when the output directory cannot be created. Every other
 * failure is recorded against its file.
 */
export async function anonymizeDirectory(sourceDir: string, options: BatchOptions = {}): Promise<BatchReport> {
  const logger = options.logger ?? getLogger('batch');
  const sourceDirectory = path.resolve(sourceDir);
  await assertDirectory(sourceDirectory);

  const outputDirectory = path.join(sourceDirectory, options.outputDirName ?? OUTPUT_DIRECTORY_NAME);
  const selection = options.selection ?? TagSelection.all(options.catalog);
  const uidTable = options.createUidTable ? options.createUidTable() : new UidMappingTable();
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));

  const files = await listFiles(sourceDirectory, outputDirectory);
  const jobs: FileJob[] = files.map((sourcePath, index) => ({
    index,
    sourcePath,
    outputPath: path.join(outputDirectory, path.relative(sourceDirectory, sourcePath)),
  }));
  const results: Array<AnonymizationResult | undefined> = new Array(jobs.length);

  logger.info(`Anonymizing ${jobs.length} file(s) from ${sourceDirectory}`, {
    selectedTags: selection.size,
    concurrency,
  });
  await createOutputDirectory(outputDirectory);

  let completed = 0;
  let nextJob = 0;
  const worker = async (): Promise<void> => {
    while (nextJob < jobs.length && !options.signal?.aborted) {
      const job = jobs[nextJob++];
      results[job.index] = await processFile(job, { selection, uidTable, catalog: options.catalog }, logger);
      completed++;
      reportProgress(options.onProgress, completed, jobs.length, logger);
    }
  };
  await Promise.all(Array.from({ length: Math.min(concurrency, jobs.length) }, () => worker()));

  const cancelled = options.signal?.aborted === true && completed < jobs.length;
  const finalResults = jobs.map(
    (job): AnonymizationResult =>
      results[job.index] ?? {
        sourcePath: job.sourcePath,
        outputPath: job.outputPath,
        status: 'skipped',
        error: { kind: 'Cancelled', message: 'cancelled before processing' },
        skippedElements: [],
      }
  );

  const report: BatchReport = {
    sourceDirectory,
    outputDirectory,
    results: finalResults,
    total: finalResults.length,
    processed: finalResults.filter((r) => r.status === 'success').length,
    failed: finalResults.filter((r) => r.status === 'failed').length,
    skipped: finalResults.filter((r) => r.status === 'skipped').length,
    cancelled,
  };
  logger.info(
    `Batch complete: ${report.processed} anonymized, ${report.failed} failed, ${report.skipped} skipped`,
    { uidsRemapped: uidTable.size, cancelled }
  );
  return report;
}

async function assertDirectory(directory: string): Promise<void> {
  try {
    const stats = await stat(directory);
    if (stats.isDirectory()) {
      return;
    }
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
  }
  throw new DirectoryNotFoundError(directory);
}

async function createOutputDirectory(outputDirectory: string): Promise<void> {
  try {
    await mkdir(outputDirectory, { recursive: true });
  } catch (error) {
    throw new WriteFailureError(outputDirectory, describeError(error), error);
  }
}

/**
 * Progress is a side channel: a throwing callback is logged, never fatal.
 */
function reportProgress(onProgress: ProgressCallback | undefined, completed: number, total: number, logger: Logger): void {
  if (!onProgress) {
    return;
  }
  try {
    onProgress(completed, total);
  } catch (error) {
    logger.warn(`Progress callback failed at ${completed}/${total}: ${describeError(error)}`);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * Regular files below `directory`, sorted, excluding the output directory.
 */
async function listFiles(directory: string, outputDirectory: string): Promise<string[]> {
  const files: string[] = [];
  let entries: Dirent[];
  try {
    entries = await readdir(directory, { withFileTypes: true });
  } catch (error) {
    throw new UnreadableFileError(directory, describeError(error), error);
  }
  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      if (fullPath !== outputDirectory) {
        files.push(...(await listFiles(fullPath, outputDirectory)));
      }
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files.sort();
}

interface FileContext {
  selection: TagSelection;
  uidTable: UidMappingTable;
  catalog?: TagCatalog;
}

async function processFile(job: FileJob, context: FileContext, batchLogger: Logger): Promise<AnonymizationResult> {
  const { sourcePath, outputPath } = job;
  const logger = batchLogger.child('file');
  const progress: { state: FileState } = { state: 'pending' };
  const enter = (next: FileState): void => {
    logger.debug(`${path.basename(sourcePath)}: ${progress.state} -> ${next}`);
    progress.state = next;
  };

  try {
    enter('reading');
    const dataset = await readDataset(sourcePath);

    enter('transforming');
    const { dataset: anonymized, skipped } = anonymize(dataset, {
      selection: context.selection,
      uidTable: context.uidTable,
      catalog: context.catalog,
    });
    for (const element of skipped) {
      logger.warn(`Element ${element.tag} in ${sourcePath} not rewritten: ${element.reason}`);
    }

    enter('writing');
    await writeAtomically(outputPath, anonymized);

    enter('succeeded');
    logger.info(`Anonymized '${sourcePath}' -> '${outputPath}'`);
    return { sourcePath, outputPath, status: 'success', skippedElements: skipped };
  } catch (error) {
    const failedIn = progress.state;
    enter('failed');
    if (error instanceof UnreadableFileError) {
      logger.warn(`Skipping non-DICOM file: ${sourcePath} (${describeError(error.cause)})`);
    } else {
      logger.error(`Failed while ${failedIn}: ${sourcePath}`, error);
    }
    return {
      sourcePath,
      outputPath,
      status: 'failed',
      error: {
        kind: error instanceof AnonymizerError ? error.kind : 'Internal',
        message: describeError(error),
      },
      skippedElements: [],
    };
  }
}

async function readDataset(sourcePath: string): Promise<DicomDataSet> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(sourcePath);
  } catch (error) {
    throw new UnreadableFileError(sourcePath, describeError(error), error);
  }
  try {
    return parse(bytes);
  } catch (error) {
    throw new UnreadableFileError(sourcePath, describeError(error), error);
  }
}

/**
 * Write to a temporary sibling and rename into place, so an interrupted or
 * failed write never leaves a partial output file.
 */
async function writeAtomically(outputPath: string, dataset: DicomDataSet): Promise<void> {
  const tempPath = `${outputPath}.${randomBytes(6).toString('hex')}.tmp`;
  try {
    const bytes = write(dataset);
    await mkdir(path.dirname(outputPath), { recursive: true });
    await writeFile(tempPath, bytes);
    await rename(tempPath, outputPath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new WriteFailureError(outputPath, describeError(error), error);
  }
}

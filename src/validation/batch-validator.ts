/**
 * Batch Validator
 *
 * Validates every matching JSON file below a directory with one Validator.
 * Files are read in chunks of at most `concurrency` at a time; entries come
 * back in sorted path order.
 *
 * TEST: tests/integration/validation/batch-validator.test.ts
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import { BATCH_CONCURRENCY, BATCH_FILE_PATTERN } from '../shared/config.js';
import { readJsonDocumentAsync } from './document-loader.js';
import { ConfigurationError, DocumentReadError } from './errors.js';
import type { ValidationOutcome } from './types.js';
import type { Validator } from './validator.js';
import { ValidationLogger } from './validation-logger.js';

export type BatchOutcome = ValidationOutcome | 'error';

export interface BatchEntry {
  /** Path relative to the validated directory */
  path: string;
  outcome: BatchOutcome;
  /** Failed rules or error text; absent for passed and skipped files */
  message?: string;
}

export interface BatchReport {
  directory: string;
  entries: BatchEntry[];
  checked: number;
  valid: number;
}

export interface BatchValidatorOptions {
  /** Glob relative to the directory (default: BATCH_FILE_PATTERN) */
  pattern?: string;
  /** Files validated at the same time (default: BATCH_CONCURRENCY) */
  concurrency?: number;
}

/**
 * Validate all matching files below `directory`
 */
export async function validateDirectory(
  validator: Validator,
  directory: string,
  options: BatchValidatorOptions = {}
): Promise<BatchReport> {
  const concurrency = options.concurrency ?? BATCH_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError('concurrency', `must be a positive integer, got ${concurrency}`);
  }
  if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) {
    throw new DocumentReadError(directory, 'directory not found');
  }

  const startTime = Date.now();
  const pattern = options.pattern ?? BATCH_FILE_PATTERN;
  const files = (await glob(pattern, { cwd: directory, nodir: true, posix: true })).sort();
  ValidationLogger.batchStarted(directory, files.length);

  const entries: BatchEntry[] = [];
  for (let i = 0; i < files.length; i += concurrency) {
    const chunk = files.slice(i, i + concurrency);
    entries.push(
      ...(await Promise.all(chunk.map((relativePath) => validateEntry(validator, directory, relativePath))))
    );
  }
  const valid = entries.filter((entry) => entry.outcome === 'passed').length;

  ValidationLogger.batchFinished(directory, valid, entries.length, Date.now() - startTime);

  return {
    directory,
    entries,
    checked: entries.length,
    valid,
  };
}

async function validateEntry(
  validator: Validator,
  directory: string,
  relativePath: string
): Promise<BatchEntry> {
  try {
    const document = await readJsonDocumentAsync(path.join(directory, relativePath));
    const report = validator.check(document);

    if (report.outcome !== 'failed') {
      return { path: relativePath, outcome: report.outcome };
    }

    const message = report.failures
      .map((failure) => `"${failure.rule.source}": ${JSON.stringify(failure.actual)}`)
      .join(', ');
    return { path: relativePath, outcome: 'failed', message: `Unsatisfied rules; ${message}` };
  } catch (error) {
    if (!(error instanceof Error)) {
      throw error;
    }
    ValidationLogger.error(`Validation error in ${relativePath}`, error);
    return { path: relativePath, outcome: 'error', message: error.message };
  }
}

/**
 * One line per file that did not pass
 */
export function formatBatchEntry(entry: BatchEntry): string {
  return entry.message ? `${entry.path},${entry.message}` : entry.path;
}

/**
 * Summary line: "<valid> / <checked> documents are valid."
 */
export function formatBatchSummary(report: BatchReport): string {
  return `${report.valid} / ${report.checked} documents are valid.`;
}

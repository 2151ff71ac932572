/**
 * Centralized Configuration
 *
 * All configuration values loaded from environment variables with sensible defaults.
 */

import * as path from 'path';
import { config as loadDotenv } from 'dotenv';

// Load .env file
loadDotenv();

export type LogLevel = 'INFO' | 'DEBUG';

const LOG_LEVELS: readonly LogLevel[] = ['INFO', 'DEBUG'];

function readLogLevel(raw: string | undefined): LogLevel {
  const level = (raw || 'INFO').toUpperCase();
  return LOG_LEVELS.find((candidate) => candidate === level) ?? 'INFO';
}

/**
 * File Paths
 */
const TMP_DIR = process.env.TMP_DIR || '/tmp';
export const LOG_PATH = process.env.LOG_PATH || path.join(TMP_DIR, 'jsonrule.log');

/**
 * Logging
 */
export const LOG_LEVEL: LogLevel = readLogLevel(process.env.LOG_LEVEL);
export const NODE_ENV = process.env.NODE_ENV || 'development';
export const SUPPRESS_TEST_LOGS = process.env.VITEST === 'true' || NODE_ENV === 'test';

/**
 * Batch Validation
 */
export const BATCH_FILE_PATTERN = process.env.BATCH_FILE_PATTERN || '**/*.json';
export const BATCH_CONCURRENCY = parseInt(process.env.BATCH_CONCURRENCY || '32', 10);

/**
 * Validate environment variables
 */
export function validateConfig(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  const rawLevel = process.env.LOG_LEVEL;
  if (rawLevel && !LOG_LEVELS.some((level) => level === rawLevel.toUpperCase())) {
    errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${rawLevel}'`);
  }

  if (!BATCH_FILE_PATTERN.trim()) {
    errors.push('BATCH_FILE_PATTERN must not be empty');
  }

  if (!Number.isInteger(BATCH_CONCURRENCY) || BATCH_CONCURRENCY < 1) {
    errors.push(`BATCH_CONCURRENCY must be a positive integer, got '${process.env.BATCH_CONCURRENCY}'`);
  }

  if (!path.isAbsolute(LOG_PATH)) {
    errors.push(`LOG_PATH must be an absolute path, got '${LOG_PATH}'`);
  }

  return {
    valid: errors.length === 0,
    errors
  };
}

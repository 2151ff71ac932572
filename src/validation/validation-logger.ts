/**
 * Validation Logger
 *
 * Centralized logging for validator construction, validation runs and batches.
 * Appends timestamped lines to LOG_PATH.
 */

import * as fs from 'fs';
import { LOG_PATH, SUPPRESS_TEST_LOGS, LOG_LEVEL } from '../shared/config.js';

/**
 * Log levels for validation operations
 */
export enum ValidationLogLevel {
  INFO = 'INFO',
  RESULT = 'RESULT',
  BATCH = 'BATCH',
  ERROR = 'ERROR',
}

/**
 * Validation logger utility
 */
export class ValidationLogger {
  private static enabled = true;
  private static logPath = LOG_PATH;

  /**
   * Log a message with timestamp and category
   */
  private static log(level: ValidationLogLevel, message: string): void {
    if (!this.enabled) return;

    const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
    const logMsg = `[${timestamp}] [Validator:${level}] ${message}`;

    try {
      fs.appendFileSync(this.logPath, logMsg + '\n');
    } catch (error) {
      // Logging never fails a validation call; report once and stop writing
      this.enabled = false;
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`[Validator] Logging disabled, cannot write ${this.logPath}: ${reason}`);
    }
  }

  /**
   * Log validator construction
   */
  static validatorCreated(ruleCount: number, flags: readonly string[], ignoreCount: number): void {
    if (SUPPRESS_TEST_LOGS) return;
    const flagInfo = flags.length > 0 ? flags.join(',') : 'none';
    this.log(
      ValidationLogLevel.INFO,
      `Validator created: rules=${ruleCount} flags=${flagInfo} ignores=${ignoreCount}`
    );
  }

  /**
   * Log the outcome of one validation call
   */
  static validationResult(source: string, outcome: string, failureCount: number): void {
    if (LOG_LEVEL !== 'DEBUG') return;
    this.log(
      ValidationLogLevel.RESULT,
      `${outcome.toUpperCase()} source="${source}" failures=${failureCount}`
    );
  }

  /**
   * Log batch start
   */
  static batchStarted(directory: string, fileCount: number): void {
    if (SUPPRESS_TEST_LOGS) return;
    this.log(ValidationLogLevel.BATCH, `Batch started: dir="${directory}" files=${fileCount}`);
  }

  /**
   * Log batch summary
   */
  static batchFinished(directory: string, valid: number, checked: number, durationMs: number): void {
    if (SUPPRESS_TEST_LOGS) return;
    this.log(
      ValidationLogLevel.BATCH,
      `Batch finished: dir="${directory}" valid=${valid}/${checked} in ${durationMs}ms`
    );
  }

  /**
   * Log error
   */
  static error(message: string, error?: Error): void {
    this.log(ValidationLogLevel.ERROR, message);
    if (error) {
      this.log(ValidationLogLevel.ERROR, `   ${error.name}: ${error.message}`);
    }
  }

  /**
   * Enable/disable logging
   */
  static setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  static isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Redirect output to another file
   */
  static setLogPath(logPath: string): void {
    this.logPath = logPath;
  }
}

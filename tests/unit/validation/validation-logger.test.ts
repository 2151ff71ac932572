/**
 * Validation Logger Unit Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { ValidationLogger } from '../../../src/validation/validation-logger.js';
import { Validator } from '../../../src/validation/validator.js';
import { ConstructionError } from '../../../src/validation/errors.js';
import { LOG_PATH } from '../../../src/shared/config.js';
import { createTempDir, removeTempDir } from '../../setup.js';

describe('ValidationLogger', () => {
  let dir: string | null = null;

  afterEach(() => {
    ValidationLogger.setEnabled(false);
    ValidationLogger.setLogPath(LOG_PATH);
    vi.restoreAllMocks();
    if (dir) removeTempDir(dir);
    dir = null;
  });

  it('should append timestamped error lines', () => {
    dir = createTempDir();
    const logFile = path.join(dir, 'validator.log');
    ValidationLogger.setLogPath(logFile);
    ValidationLogger.setEnabled(true);

    ValidationLogger.error('Validation error in a.json', new TypeError('boom'));

    const lines = fs.readFileSync(logFile, 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] \[Validator:ERROR\] Validation error in a\.json$/);
    expect(lines[1]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] \[Validator:ERROR\]    TypeError: boom$/);
  });

  it('should write nothing while disabled', () => {
    dir = createTempDir();
    const logFile = path.join(dir, 'validator.log');
    ValidationLogger.setLogPath(logFile);

    ValidationLogger.error('ignored');

    expect(fs.existsSync(logFile)).toBe(false);
  });

  it('should keep informational lines out of test runs', () => {
    dir = createTempDir();
    const logFile = path.join(dir, 'validator.log');
    ValidationLogger.setLogPath(logFile);
    ValidationLogger.setEnabled(true);

    ValidationLogger.validatorCreated(2, ['ignore-case'], 1);
    ValidationLogger.batchStarted(dir, 3);

    expect(fs.existsSync(logFile)).toBe(false);
  });

  it('should disable itself instead of throwing when the log file cannot be written', () => {
    dir = createTempDir();
    const logFile = path.join(dir, 'missing', 'validator.log');
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    ValidationLogger.setLogPath(logFile);
    ValidationLogger.setEnabled(true);

    expect(() => new Validator(['TL=1'], [], [])).toThrow(ConstructionError);
    expect(ValidationLogger.isEnabled()).toBe(false);
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr).toHaveBeenCalledWith(
      expect.stringContaining(`[Validator] Logging disabled, cannot write ${logFile}: ENOENT`)
    );
    expect(fs.existsSync(logFile)).toBe(false);
  });
});

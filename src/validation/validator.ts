/**
 * Validator
 *
 * Parses rules and flags once, then validates any number of documents.
 *
 * Usage:
 *   const validator = new Validator(['TL==1', 'TL>0'], [], ['f1']);
 *   validator.validateFromFile('annotation.json'); // true | false, or throws
 *
 * TEST: tests/unit/validation/validator.test.ts
 */

import {
  parseJsonDocument,
  parseJsonLines,
  readJsonDocument,
  toDisplayPath,
  type DocumentPath,
} from './document-loader.js';
import { ConstructionError, ParseError } from './errors.js';
import { parseFlags } from './flag-parser.js';
import { RuleEvaluator } from './rule-evaluator.js';
import { loadRules } from './rule-loader.js';
import { parseRules } from './rule-parser.js';
import type { FlagSet, JsonValue, Rule, ValidationReport } from './types.js';
import { ValidationLogger } from './validation-logger.js';

/**
 * Validator
 *
 * Immutable after construction; calls on distinct documents are independent.
 */
export class Validator {
  private readonly sources: readonly string[];
  private readonly parsedRules: readonly Rule[];
  private readonly flagSet: FlagSet;
  private readonly ignoreSet: ReadonlySet<string>;
  private readonly evaluator: RuleEvaluator;

  constructor(rules: readonly string[], flags: readonly string[], ignores: readonly string[]) {
    const { parsedRules, flagSet } = parseConfiguration(rules, flags);
    this.parsedRules = parsedRules;
    this.flagSet = flagSet;
    this.sources = Object.freeze([...rules]);
    this.ignoreSet = new Set(ignores);
    this.evaluator = new RuleEvaluator(this.parsedRules, this.ignoreSet, this.flagSet);

    ValidationLogger.validatorCreated(this.parsedRules.length, this.flagSet.tokens, this.ignoreSet.size);
  }

  /**
   * Build a validator from rules files (one rule per line)
   */
  static fromRuleFiles(
    rulePaths: readonly DocumentPath[],
    flags: readonly string[] = [],
    ignores: readonly string[] = []
  ): Validator {
    return new Validator(loadRules(...rulePaths), flags, ignores);
  }

  get rules(): readonly string[] {
    return this.sources;
  }

  get parsed(): readonly Rule[] {
    return this.parsedRules;
  }

  get flags(): FlagSet {
    return this.flagSet;
  }

  get ignores(): ReadonlySet<string> {
    return this.ignoreSet;
  }

  /**
   * Validate an already-parsed JSON value
   */
  validate(document: JsonValue): boolean {
    return this.check(document).outcome === 'passed';
  }

  /**
   * Validate JSON text
   */
  validateFromString(text: string): boolean {
    return this.checkFromString(text).outcome === 'passed';
  }

  /**
   * Validate JSON Lines text; every line is one element of the document
   */
  validateFromJsonLines(text: string): boolean {
    return this.run(parseJsonLines(text), 'json lines').outcome === 'passed';
  }

  /**
   * Validate a JSON file
   */
  validateFromFile(filePath: DocumentPath): boolean {
    return this.checkFromFile(filePath).outcome === 'passed';
  }

  /**
   * Detailed report for an already-parsed JSON value
   */
  check(document: JsonValue): ValidationReport {
    return this.run(document, 'value');
  }

  checkFromString(text: string): ValidationReport {
    return this.run(parseJsonDocument(text), 'string');
  }

  checkFromFile(filePath: DocumentPath): ValidationReport {
    return this.run(readJsonDocument(filePath), toDisplayPath(filePath));
  }

  toString(): string {
    const quote = (values: Iterable<string>) =>
      Array.from(values, (value) => `'${value}'`).join(', ');
    return `Validator([${quote(this.sources)}], [${quote(this.flagSet.tokens)}], [${quote(this.ignoreSet)}])`;
  }

  private run(document: JsonValue, source: string): ValidationReport {
    const report = this.evaluator.check(document);
    ValidationLogger.validationResult(source, report.outcome, report.failures.length);
    return report;
  }
}

/**
 * Parse rules, then flags; the first ParseError becomes a ConstructionError
 */
function parseConfiguration(
  rules: readonly string[],
  flags: readonly string[]
): { parsedRules: readonly Rule[]; flagSet: FlagSet } {
  try {
    return {
      parsedRules: Object.freeze(parseRules(rules)),
      flagSet: parseFlags(flags),
    };
  } catch (error) {
    if (error instanceof ParseError) {
      ValidationLogger.error('Validator construction failed', error);
      throw new ConstructionError(error);
    }
    throw error;
  }
}

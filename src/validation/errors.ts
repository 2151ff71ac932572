/**
 * Validation Error Types
 *
 * Construction errors (ParseError) abort building a Validator.
 * Evaluation errors (EvaluationError) abort a single validation call.
 * Acquisition errors come from reading or decoding a document.
 */

import type { JsonKind, Rule } from './types.js';

/**
 * Base class for errors raised while building a Validator
 */
export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * Thrown when a rule expression does not match `<identifier><operator><literal>`
 */
export class RuleParseError extends ParseError {
  constructor(
    public readonly expression: string,
    public readonly reason: string
  ) {
    super(`Invalid rule '${expression}': ${reason}`);
    this.name = 'RuleParseError';
  }
}

/**
 * Thrown for unknown or conflicting flag tokens
 */
export class FlagError extends ParseError {
  constructor(
    public readonly flag: string,
    public readonly reason: string
  ) {
    super(`Invalid flag '${flag}': ${reason}`);
    this.name = 'FlagError';
  }
}

/**
 * Thrown by the Validator constructor; `cause` is the first ParseError
 */
export class ConstructionError extends Error {
  constructor(public readonly cause: ParseError) {
    super(`Cannot construct validator: ${cause.message}`, { cause });
    this.name = 'ConstructionError';
  }
}

/**
 * Base class for structural errors raised during a validation call
 */
export class EvaluationError extends Error {
  constructor(
    message: string,
    public readonly elementIndex: number
  ) {
    super(message);
    this.name = 'EvaluationError';
  }
}

/**
 * Thrown when a rule's field is absent and no missing-field flag relaxes it
 */
export class FieldNotFoundError extends EvaluationError {
  constructor(
    public readonly rule: Rule,
    elementIndex: number
  ) {
    super(`Field '${rule.field}' not found for rule '${rule.source}' (element ${elementIndex})`, elementIndex);
    this.name = 'FieldNotFoundError';
  }

  get field(): string {
    return this.rule.field;
  }
}

/**
 * Thrown when an ordering comparison meets a value of the wrong kind
 */
export class TypeMismatchError extends EvaluationError {
  constructor(
    public readonly rule: Rule,
    public readonly actualType: JsonKind,
    elementIndex: number
  ) {
    super(
      `Rule '${rule.source}' expects a ${rule.operand.kind} value, found ${actualType} (element ${elementIndex})`,
      elementIndex
    );
    this.name = 'TypeMismatchError';
  }
}

/**
 * Thrown when a document element cannot be evaluated at all
 */
export class InvalidDocumentError extends EvaluationError {
  constructor(
    public readonly reason: string,
    elementIndex: number
  ) {
    super(`Invalid document (element ${elementIndex}): ${reason}`, elementIndex);
    this.name = 'InvalidDocumentError';
  }
}

/**
 * Thrown when document text is not valid JSON
 */
export class JsonSyntaxError extends Error {
  constructor(
    public readonly source: string,
    public readonly detail: string
  ) {
    super(`Invalid JSON in ${source}: ${detail}`);
    this.name = 'JsonSyntaxError';
  }
}

/**
 * Thrown when a document, rules file or directory cannot be read
 */
export class DocumentReadError extends Error {
  constructor(
    public readonly path: string,
    public readonly detail: string
  ) {
    super(`Cannot read '${path}': ${detail}`);
    this.name = 'DocumentReadError';
  }
}

/**
 * Thrown for an unusable batch option
 */
export class ConfigurationError extends Error {
  constructor(
    public readonly option: string,
    public readonly reason: string
  ) {
    super(`Invalid option '${option}': ${reason}`);
    this.name = 'ConfigurationError';
  }
}

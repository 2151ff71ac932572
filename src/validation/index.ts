/**
 * Validation Module
 *
 * Rule parsing, flag handling, document evaluation and loaders.
 */

// Types
export type {
  JsonValue,
  JsonPrimitive,
  JsonObject,
  JsonKind,
  ComparisonOperator,
  OrderingOperator,
  Literal,
  Rule,
  MissingFieldPolicy,
  FlagSet,
  ValidationOutcome,
  RuleFailure,
  ValidationReport,
} from './types.js';
export { COMPARISON_OPERATORS } from './types.js';

// Errors
export {
  ParseError,
  RuleParseError,
  FlagError,
  ConstructionError,
  EvaluationError,
  FieldNotFoundError,
  TypeMismatchError,
  InvalidDocumentError,
  JsonSyntaxError,
  DocumentReadError,
  ConfigurationError,
} from './errors.js';

// Parsing
export { parseRule, parseRules, formatRule, formatLiteral, isOrdering } from './rule-parser.js';
export { parseFlags, defaultFlags, KNOWN_FLAGS, REQUIRE_PREFIX } from './flag-parser.js';

// Evaluation
export {
  RuleEvaluator,
  evaluate,
  checkDocument,
  isJsonObject,
  kindOf,
  readDocumentFlags,
} from './rule-evaluator.js';

// Loaders
export type { DocumentPath } from './document-loader.js';
export {
  parseJsonDocument,
  parseJsonLines,
  readJsonDocument,
  readJsonDocumentAsync,
} from './document-loader.js';
export { RuleLoader, loadRules, parseRuleLines } from './rule-loader.js';

// Validator
export { Validator } from './validator.js';
export {
  validateDirectory,
  formatBatchEntry,
  formatBatchSummary,
  type BatchEntry,
  type BatchOutcome,
  type BatchReport,
  type BatchValidatorOptions,
} from './batch-validator.js';

// Logging
export { ValidationLogger, ValidationLogLevel } from './validation-logger.js';

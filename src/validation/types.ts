/**
 * Validation Module Types
 *
 * Types for rule parsing, flag handling and document evaluation.
 */

/**
 * Any value produced by JSON.parse
 */
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export type JsonPrimitive = string | number | boolean | null;
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Kind names reported in type-mismatch errors
 */
export type JsonKind = 'number' | 'string' | 'boolean' | 'null' | 'array' | 'object';

/**
 * Comparison operators, longest first
 */
export const COMPARISON_OPERATORS = ['==', '!=', '<=', '>=', '<', '>'] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export type OrderingOperator = '<' | '<=' | '>' | '>=';

/**
 * Literal operand as written in the rule expression
 */
export type Literal =
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'string'; value: string };

/**
 * Parsed rule: `<field><operator><operand>`
 */
export interface Rule {
  readonly field: string;
  readonly operator: ComparisonOperator;
  readonly operand: Literal;
  /** Trimmed source expression */
  readonly source: string;
}

/**
 * What happens when a rule's field is absent from a document
 */
export type MissingFieldPolicy = 'error' | 'pass' | 'fail' | 'zero';

/**
 * Parsed behaviour flags
 */
export interface FlagSet {
  readonly missingField: MissingFieldPolicy;
  readonly ignoreCase: boolean;
  readonly countLabels: boolean;
  /** Document flags of which at least one must be set; empty means no requirement */
  readonly requiredDocumentFlags: ReadonlySet<string>;
  /** Flag tokens as given, deduplicated, in order */
  readonly tokens: readonly string[];
}

/**
 * Outcome of evaluating one document element, or a whole document
 */
export type ValidationOutcome = 'passed' | 'failed' | 'skipped';

/**
 * A well-formed rule that did not hold
 */
export interface RuleFailure {
  rule: Rule;
  /** Position of the element within the document (0 for a single object) */
  elementIndex: number;
  /** Field value the rule was checked against; null when the field is missing */
  actual: JsonValue;
  fieldMissing: boolean;
}

/**
 * Detailed result of a validation call
 */
export interface ValidationReport {
  outcome: ValidationOutcome;
  elementCount: number;
  skippedElements: number[];
  failures: RuleFailure[];
}

/**
 * Rule Evaluator
 *
 * Applies parsed rules to a document: a single JSON object, or an array of
 * objects where every element must satisfy every applicable rule.
 *
 * A rule that is checked and does not hold is an ordinary failure.
 * A rule that cannot be checked (absent field, wrong value kind) throws an
 * EvaluationError; it is never reported as a failure.
 *
 * TEST: tests/unit/validation/rule-evaluator.test.ts
 */

import { FieldNotFoundError, InvalidDocumentError, TypeMismatchError } from './errors.js';
import { isOrdering } from './rule-parser.js';
import type {
  FlagSet,
  JsonKind,
  JsonObject,
  JsonValue,
  Literal,
  OrderingOperator,
  Rule,
  RuleFailure,
  ValidationOutcome,
  ValidationReport,
} from './types.js';

/**
 * Result of a single comparison
 */
type Comparison = { applicable: true; holds: boolean; actual: JsonValue } | { applicable: false };

/**
 * Rule Evaluator
 *
 * Holds the immutable rule set, ignores and flags; each call is independent.
 */
export class RuleEvaluator {
  private readonly activeRules: readonly Rule[];

  constructor(
    rules: readonly Rule[],
    private readonly ignores: ReadonlySet<string>,
    private readonly flags: FlagSet
  ) {
    this.activeRules = rules.filter((rule) => !ignores.has(rule.field));
  }

  /**
   * Number of rules not excluded by the ignore set
   */
  get activeRuleCount(): number {
    return this.activeRules.length;
  }

  /**
   * Evaluate a document and report every failed rule
   */
  check(document: JsonValue): ValidationReport {
    const elements = Array.isArray(document) ? document : [document];
    const failures: RuleFailure[] = [];
    const skippedElements: number[] = [];

    elements.forEach((element, index) => {
      const outcome = this.checkElement(element, index, failures);
      if (outcome === 'skipped') {
        skippedElements.push(index);
      }
    });

    let outcome: ValidationOutcome = 'passed';
    if (failures.length > 0) {
      outcome = 'failed';
    } else if (skippedElements.length > 0) {
      outcome = 'skipped';
    }

    return {
      outcome,
      elementCount: elements.length,
      skippedElements,
      failures,
    };
  }

  /**
   * True iff every applicable rule holds on every element
   */
  evaluate(document: JsonValue): boolean {
    return this.check(document).outcome === 'passed';
  }

  /**
   * Evaluate one element, appending failures; throws on structural errors
   */
  private checkElement(element: JsonValue, index: number, failures: RuleFailure[]): ValidationOutcome {
    if (!isJsonObject(element)) {
      throw new InvalidDocumentError(`expected an object, got ${kindOf(element)}`, index);
    }

    if (this.isExcluded(element)) {
      return 'skipped';
    }

    const labelCounts = this.flags.countLabels ? countLabels(element, index) : null;
    let passed = true;

    for (const rule of this.activeRules) {
      const comparison = labelCounts
        ? this.compare(rule, labelCounts.get(rule.field) ?? 0, index)
        : this.compareField(rule, element, index);

      if (comparison.applicable && !comparison.holds) {
        passed = false;
        failures.push({ rule, elementIndex: index, actual: comparison.actual, fieldMissing: false });
      } else if (!comparison.applicable && this.flags.missingField === 'fail') {
        passed = false;
        failures.push({ rule, elementIndex: index, actual: null, fieldMissing: true });
      }
    }

    return passed ? 'passed' : 'failed';
  }

  /**
   * Document-level exclusion via the element's own `flags` object
   */
  private isExcluded(element: JsonObject): boolean {
    const documentFlags = readDocumentFlags(element);

    for (const name of documentFlags) {
      if (this.ignores.has(name)) {
        return true;
      }
    }

    const required = this.flags.requiredDocumentFlags;
    if (required.size > 0) {
      return !Array.from(required).some((name) => documentFlags.has(name));
    }
    return false;
  }

  private compareField(rule: Rule, element: JsonObject, index: number): Comparison {
    if (Object.prototype.hasOwnProperty.call(element, rule.field)) {
      return this.compare(rule, element[rule.field], index);
    }

    switch (this.flags.missingField) {
      case 'error':
        throw new FieldNotFoundError(rule, index);
      case 'zero':
        return this.compare(rule, 0, index);
      case 'pass':
      case 'fail':
        return { applicable: false };
    }
  }

  private compare(rule: Rule, actual: JsonValue, index: number): Comparison {
    const { operator, operand } = rule;

    if (!isOrdering(operator)) {
      const equal = this.isEqual(actual, operand);
      return { applicable: true, holds: operator === '==' ? equal : !equal, actual };
    }

    let order: number;
    if (operand.kind === 'number' && typeof actual === 'number') {
      order = actual - operand.value;
    } else if (operand.kind === 'string' && typeof actual === 'string') {
      order = compareStrings(this.fold(actual), this.fold(operand.value));
    } else {
      throw new TypeMismatchError(rule, kindOf(actual), index);
    }

    const holds = applyOrdering(operator, order);
    return { applicable: true, holds, actual };
  }

  /**
   * Same-kind values compare by value; different kinds are never equal
   */
  private isEqual(actual: JsonValue, operand: Literal): boolean {
    switch (operand.kind) {
      case 'number':
        return typeof actual === 'number' && actual === operand.value;
      case 'boolean':
        return typeof actual === 'boolean' && actual === operand.value;
      case 'string':
        return typeof actual === 'string' && this.fold(actual) === this.fold(operand.value);
    }
  }

  private fold(value: string): string {
    return this.flags.ignoreCase ? value.toLowerCase() : value;
  }
}

/**
 * Evaluate a document against rules; true iff every applicable rule holds
 */
export function evaluate(
  document: JsonValue,
  rules: readonly Rule[],
  ignores: ReadonlySet<string>,
  flags: FlagSet
): boolean {
  return new RuleEvaluator(rules, ignores, flags).evaluate(document);
}

/**
 * Evaluate a document and return the detailed report
 */
export function checkDocument(
  document: JsonValue,
  rules: readonly Rule[],
  ignores: ReadonlySet<string>,
  flags: FlagSet
): ValidationReport {
  return new RuleEvaluator(rules, ignores, flags).check(document);
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function kindOf(value: JsonValue): JsonKind {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'number':
      return 'number';
    case 'string':
      return 'string';
    case 'boolean':
      return 'boolean';
    default:
      return 'object';
  }
}

/**
 * Names set to `true` in the element's `flags` object
 */
export function readDocumentFlags(element: JsonObject): Set<string> {
  const names = new Set<string>();
  const flags = element.flags;
  if (flags === undefined || !isJsonObject(flags)) {
    return names;
  }
  for (const [name, value] of Object.entries(flags)) {
    if (value === true) {
      names.add(name);
    }
  }
  return names;
}

/**
 * Label occurrences in the element's `shapes` array
 */
function countLabels(element: JsonObject, index: number): Map<string, number> {
  const shapes = element.shapes;
  if (shapes === undefined || !Array.isArray(shapes)) {
    throw new InvalidDocumentError('count-labels requires a "shapes" array', index);
  }

  const counts = new Map<string, number>();
  shapes.forEach((shape, shapeIndex) => {
    const label = isJsonObject(shape) ? shape.label : undefined;
    if (typeof label !== 'string') {
      throw new InvalidDocumentError(`shapes[${shapeIndex}] has no string "label"`, index);
    }
    counts.set(label, (counts.get(label) ?? 0) + 1);
  });
  return counts;
}

function applyOrdering(operator: OrderingOperator, order: number): boolean {
  switch (operator) {
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
  }
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Rule Parser
 *
 * Parses comparison rules of the form `<identifier><operator><literal>`:
 *   TL==1
 *   count >= 2.5
 *   status != done
 *   visible==true
 *
 * Operators match longest first, so `<=` is never read as `<` followed by `=`.
 * Whitespace around the operator is tolerated.
 *
 * TEST: tests/unit/validation/rule-parser.test.ts
 */

import { RuleParseError } from './errors.js';
import {
  COMPARISON_OPERATORS,
  type ComparisonOperator,
  type Literal,
  type OrderingOperator,
  type Rule,
} from './types.js';

const IDENTIFIER = /^[A-Za-z0-9_]+$/;
const NUMBER = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/;
const OPERATOR_CHARS = new Set(['=', '!', '<', '>']);

/**
 * Parse a single rule expression
 */
export function parseRule(expression: string): Rule {
  const source = expression.trim();
  if (!source) {
    throw new RuleParseError(expression, 'empty rule');
  }

  const operatorStart = findOperatorStart(source);
  if (operatorStart < 0) {
    throw new RuleParseError(source, 'missing comparison operator');
  }

  const field = source.slice(0, operatorStart).trim();
  if (!IDENTIFIER.test(field)) {
    const shown = field ? `'${field}'` : 'nothing';
    throw new RuleParseError(source, `malformed identifier: expected letters, digits or '_', found ${shown}`);
  }

  const operator = matchOperator(source, operatorStart);
  const literalText = source.slice(operatorStart + operator.length).trim();
  if (OPERATOR_CHARS.has(literalText.charAt(0))) {
    throw new RuleParseError(source, `unrecognized operator '${operator}${operatorRun(literalText, 0)}'`);
  }
  if (!literalText) {
    throw new RuleParseError(source, 'empty literal');
  }

  const operand = parseLiteral(literalText);
  if (isOrdering(operator) && operand.kind === 'boolean') {
    throw new RuleParseError(source, 'ordering operator requires a number or string literal');
  }

  return { field, operator, operand, source };
}

/**
 * Parse rules in order; the first malformed rule aborts
 */
export function parseRules(expressions: readonly string[]): Rule[] {
  return expressions.map((expression) => parseRule(expression));
}

/**
 * Render a rule in canonical form (no whitespace, normalized numbers)
 */
export function formatRule(rule: Rule): string {
  return `${rule.field}${rule.operator}${formatLiteral(rule.operand)}`;
}

export function formatLiteral(literal: Literal): string {
  switch (literal.kind) {
    case 'number':
      return Object.is(literal.value, -0) ? '-0' : String(literal.value);
    case 'boolean':
      return literal.value ? 'true' : 'false';
    case 'string':
      return literal.value;
  }
}

export function isOrdering(operator: ComparisonOperator): operator is OrderingOperator {
  return operator !== '==' && operator !== '!=';
}

/**
 * Number if it matches JSON number syntax, then boolean, else verbatim string
 */
function parseLiteral(text: string): Literal {
  if (NUMBER.test(text)) {
    const value = Number(text);
    if (Number.isFinite(value)) {
      return { kind: 'number', value };
    }
  }
  if (text === 'true' || text === 'false') {
    return { kind: 'boolean', value: text === 'true' };
  }
  return { kind: 'string', value: text };
}

function findOperatorStart(source: string): number {
  for (let i = 0; i < source.length; i++) {
    if (OPERATOR_CHARS.has(source.charAt(i))) {
      return i;
    }
  }
  return -1;
}

function matchOperator(source: string, start: number): ComparisonOperator {
  const operator = COMPARISON_OPERATORS.find((candidate) => source.startsWith(candidate, start));
  if (!operator) {
    throw new RuleParseError(source, `unrecognized operator '${operatorRun(source, start)}'`);
  }
  return operator;
}

/**
 * Consecutive operator characters starting at `start`, for error messages
 */
function operatorRun(source: string, start: number): string {
  let end = start;
  while (end < source.length && OPERATOR_CHARS.has(source.charAt(end))) {
    end++;
  }
  return source.slice(start, end);
}

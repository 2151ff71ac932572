/**
 * Rule Parser Unit Tests
 *
 * Purpose: grammar, literal typing, error reasons and canonical formatting
 */

import { describe, it, expect } from 'vitest';
import {
  parseRule,
  parseRules,
  formatRule,
} from '../../../src/validation/rule-parser.js';
import { RuleParseError, ParseError } from '../../../src/validation/errors.js';

/**
 * Reason carried by the RuleParseError thrown for `expression`
 */
function reasonFor(expression: string): string {
  try {
    parseRule(expression);
  } catch (error) {
    if (error instanceof RuleParseError) {
      return error.reason;
    }
    throw error;
  }
  throw new Error(`expected '${expression}' to be rejected`);
}

describe('parseRule', () => {
  describe('valid expressions', () => {
    it('should parse a numeric equality rule', () => {
      expect(parseRule('TL==1')).toEqual({
        field: 'TL',
        operator: '==',
        operand: { kind: 'number', value: 1 },
        source: 'TL==1',
      });
    });

    it('should parse every operator', () => {
      const operators = ['==', '!=', '<', '<=', '>', '>='];
      for (const op of operators) {
        expect(parseRule(`count${op}3`).operator).toBe(op);
      }
    });

    it('should prefer two-character operators', () => {
      expect(parseRule('x<=5').operator).toBe('<=');
      expect(parseRule('x>=5').operator).toBe('>=');
    });

    it('should trim and tolerate whitespace around the operator', () => {
      const rule = parseRule('  count >= 2.5 ');

      expect(rule.field).toBe('count');
      expect(rule.operator).toBe('>=');
      expect(rule.operand).toEqual({ kind: 'number', value: 2.5 });
      expect(rule.source).toBe('count >= 2.5');
    });

    it('should read negative numbers after an ordering operator', () => {
      const rule = parseRule('x<-3');

      expect(rule.operator).toBe('<');
      expect(rule.operand).toEqual({ kind: 'number', value: -3 });
    });

    it('should parse boolean literals', () => {
      expect(parseRule('visible==true').operand).toEqual({ kind: 'boolean', value: true });
      expect(parseRule('visible!=false').operand).toEqual({ kind: 'boolean', value: false });
    });

    it('should keep non-numeric literals verbatim as strings', () => {
      expect(parseRule('status!=done').operand).toEqual({ kind: 'string', value: 'done' });
      expect(parseRule('name==hello world').operand).toEqual({ kind: 'string', value: 'hello world' });
      expect(parseRule('flag==True').operand).toEqual({ kind: 'string', value: 'True' });
    });

    it('should treat numbers outside JSON syntax as strings', () => {
      expect(parseRule('v==01').operand).toEqual({ kind: 'string', value: '01' });
      expect(parseRule('v==.5').operand).toEqual({ kind: 'string', value: '.5' });
      expect(parseRule('v==1e999').operand).toEqual({ kind: 'string', value: '1e999' });
    });

    it('should accept exponent notation', () => {
      expect(parseRule('v==1e3').operand).toEqual({ kind: 'number', value: 1000 });
    });

    it('should allow string literals with ordering operators', () => {
      expect(parseRule('name<m').operand).toEqual({ kind: 'string', value: 'm' });
    });

    it('should accept digits and underscores in identifiers', () => {
      expect(parseRule('image_width_2>0').field).toBe('image_width_2');
    });
  });

  describe('malformed expressions', () => {
    it('should reject an empty rule', () => {
      expect(reasonFor('   ')).toBe('empty rule');
    });

    it('should reject a rule without operator', () => {
      expect(reasonFor('TL 1')).toBe('missing comparison operator');
    });

    it('should reject a missing identifier', () => {
      expect(reasonFor('==1')).toBe("malformed identifier: expected letters, digits or '_', found nothing");
    });

    it('should reject identifiers with other characters', () => {
      expect(reasonFor('T-L==1')).toBe("malformed identifier: expected letters, digits or '_', found 'T-L'");
    });

    it('should reject a single equals sign', () => {
      expect(reasonFor('TL=1')).toBe("unrecognized operator '='");
    });

    it('should reject over-long operator runs', () => {
      expect(reasonFor('TL===1')).toBe("unrecognized operator '==='");
      expect(reasonFor('TL<>1')).toBe("unrecognized operator '<>'");
    });

    it('should reject an empty literal', () => {
      expect(reasonFor('TL==')).toBe('empty literal');
      expect(reasonFor('TL>=  ')).toBe('empty literal');
    });

    it('should reject ordering against a boolean', () => {
      expect(reasonFor('visible<true')).toBe('ordering operator requires a number or string literal');
    });

    it('should carry the expression and a readable message', () => {
      try {
        parseRule('TL=1');
        expect.fail('expected a RuleParseError');
      } catch (error) {
        expect(error).toBeInstanceOf(ParseError);
        expect(error).toBeInstanceOf(RuleParseError);
        if (error instanceof RuleParseError) {
          expect(error.expression).toBe('TL=1');
          expect(error.message).toBe("Invalid rule 'TL=1': unrecognized operator '='");
          expect(error.name).toBe('RuleParseError');
        }
      }
    });
  });
});

describe('parseRules', () => {
  it('should parse rules in order', () => {
    const rules = parseRules(['TL==1', 'TL>0']);

    expect(rules.map((r) => r.source)).toEqual(['TL==1', 'TL>0']);
  });

  it('should fail on the first malformed rule', () => {
    expect(() => parseRules(['TL==1', 'TL=2', '==3'])).toThrowError(
      "Invalid rule 'TL=2': unrecognized operator '='"
    );
  });

  it('should return an empty list for no rules', () => {
    expect(parseRules([])).toEqual([]);
  });
});

describe('formatRule', () => {
  it('should render the canonical form', () => {
    expect(formatRule(parseRule(' count >= 2.50 '))).toBe('count>=2.5');
    expect(formatRule(parseRule('v==1e3'))).toBe('v==1000');
    expect(formatRule(parseRule('visible == true'))).toBe('visible==true');
    expect(formatRule(parseRule('status != in progress'))).toBe('status!=in progress');
    expect(formatRule(parseRule('x == -0'))).toBe('x==-0');
  });

  it('should be stable under re-parsing', () => {
    const expressions = [
      'TL==1',
      'x < -3.25',
      'name<m',
      'a==x<y',
      'flag != false',
      'v==01',
      'ratio>=1E-7',
      'x==-0',
    ];

    for (const expression of expressions) {
      const rule = parseRule(expression);
      const reparsed = parseRule(formatRule(rule));

      expect(reparsed.field).toBe(rule.field);
      expect(reparsed.operator).toBe(rule.operator);
      expect(reparsed.operand).toEqual(rule.operand);
      expect(formatRule(reparsed)).toBe(formatRule(rule));
    }
  });
});

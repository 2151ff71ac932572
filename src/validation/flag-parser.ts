/**
 * Flag Parser
 *
 * Turns the caller's flag tokens into a closed FlagSet.
 *
 * | Token              | Effect                                              |
 * |--------------------|-----------------------------------------------------|
 * | missing-as-pass    | absent field satisfies the rule                     |
 * | missing-as-fail    | absent field fails the rule                         |
 * | missing-as-zero    | absent field reads as 0                             |
 * | ignore-case        | case-insensitive string comparison                  |
 * | count-labels       | field value = number of shapes[] with that label    |
 * | require:<name>     | document must set flag <name>, else it is skipped   |
 */

import { FlagError } from './errors.js';
import type { FlagSet, MissingFieldPolicy } from './types.js';

export const REQUIRE_PREFIX = 'require:';

const MISSING_FIELD_FLAGS = new Map<string, MissingFieldPolicy>([
  ['missing-as-pass', 'pass'],
  ['missing-as-fail', 'fail'],
  ['missing-as-zero', 'zero'],
]);

const SWITCH_FLAGS = ['ignore-case', 'count-labels'] as const;

/**
 * Every fixed token the parser accepts
 */
export const KNOWN_FLAGS: readonly string[] = [...MISSING_FIELD_FLAGS.keys(), ...SWITCH_FLAGS];

/**
 * Parse flag tokens; unknown or conflicting tokens throw FlagError
 */
export function parseFlags(tokens: readonly string[]): FlagSet {
  const seen: string[] = [];
  let missingField: MissingFieldPolicy = 'error';
  let missingFieldToken: string | null = null;
  let ignoreCase = false;
  let countLabels = false;
  const requiredDocumentFlags = new Set<string>();

  for (const raw of tokens) {
    const token = raw.trim();
    if (seen.includes(token)) continue;
    const policy = MISSING_FIELD_FLAGS.get(token);

    if (token.startsWith(REQUIRE_PREFIX)) {
      const name = token.slice(REQUIRE_PREFIX.length).trim();
      if (!name) {
        throw new FlagError(raw, 'require: needs a document flag name');
      }
      requiredDocumentFlags.add(name);
    } else if (policy) {
      if (missingFieldToken) {
        throw new FlagError(raw, `conflicts with '${missingFieldToken}'`);
      }
      missingFieldToken = token;
      missingField = policy;
    } else if (token === 'ignore-case') {
      ignoreCase = true;
    } else if (token === 'count-labels') {
      countLabels = true;
    } else {
      throw new FlagError(raw, `unknown flag (expected one of ${KNOWN_FLAGS.join(', ')} or ${REQUIRE_PREFIX}<name>)`);
    }

    seen.push(token);
  }

  return {
    missingField,
    ignoreCase,
    countLabels,
    requiredDocumentFlags,
    tokens: seen,
  };
}

/**
 * FlagSet with every behaviour at its default
 */
export function defaultFlags(): FlagSet {
  return parseFlags([]);
}

/**
 * backend/src/shared/storage/selector.ts
 *
 * WHY:
 * - MemoryBackend answers `_find` the way CouchDB Mango does for the subset the gateway uses.
 *
 * RULES:
 * - Pure functions. No I/O, no logging.
 * - Unknown operators throw SelectorError (the backend turns it into a 400).
 * - Field names may be dotted paths (`metadata.kind`).
 */

import { isDeepStrictEqual } from 'node:util';

import { isJsonObject, type JsonObject, type JsonValue } from './storage-backend';

export class SelectorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SelectorError';
  }
}

type Operand = JsonValue | undefined;

function readPath(doc: JsonObject, path: string): Operand {
  let current: Operand = doc;
  for (const segment of path.split('.')) {
    if (!isJsonObject(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function compare(a: Operand, b: Operand): number | null {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  return null;
}

function asArray(op: string, value: JsonValue): JsonValue[] {
  if (!Array.isArray(value)) throw new SelectorError(`${op} expects an array`);
  return value;
}

function matchOperator(op: string, actual: Operand, expected: JsonValue): boolean {
  switch (op) {
    case '$eq':
      return actual !== undefined && isDeepStrictEqual(actual, expected);
    case '$ne':
      return !isDeepStrictEqual(actual, expected);
    case '$gt': {
      const c = compare(actual, expected);
      return c !== null && c > 0;
    }
    case '$gte': {
      const c = compare(actual, expected);
      return c !== null && c >= 0;
    }
    case '$lt': {
      const c = compare(actual, expected);
      return c !== null && c < 0;
    }
    case '$lte': {
      const c = compare(actual, expected);
      return c !== null && c <= 0;
    }
    case '$in':
      return actual !== undefined && asArray(op, expected).some((v) => isDeepStrictEqual(actual, v));
    case '$nin':
      return !asArray(op, expected).some((v) => isDeepStrictEqual(actual, v));
    case '$exists':
      if (typeof expected !== 'boolean') throw new SelectorError('$exists expects a boolean');
      return (actual !== undefined) === expected;
    case '$elemMatch':
      if (!Array.isArray(actual)) return false;
      return actual.some((item) => matchCondition(item, expected));
    default:
      throw new SelectorError(`Unknown selector operator: ${op}`);
  }
}

/**
 * Condition on one field: either a literal (implicit $eq) or an object of operators.
 * `{ $gt: 1, $lt: 5 }` is an implicit AND of its operators.
 */
function matchCondition(actual: Operand, condition: JsonValue): boolean {
  if (isJsonObject(condition)) {
    const keys = Object.keys(condition);
    if (keys.length > 0 && keys.every((k) => k.startsWith('$'))) {
      return keys.every((op) => {
        const expected = condition[op];
        if (expected === undefined) return true;
        return matchOperator(op, actual, expected);
      });
    }
    // Nested field selector (e.g. { metadata: { kind: 'team' } }).
    if (!isJsonObject(actual)) return false;
    return matchesSelector(actual, condition);
  }

  return matchOperator('$eq', actual, condition);
}

export function matchesSelector(doc: JsonObject, selector: JsonObject): boolean {
  for (const [key, condition] of Object.entries(selector)) {
    if (condition === undefined) continue;

    if (key === '$and' || key === '$or') {
      const clauses = asArray(key, condition);
      const results = clauses.map((clause) => {
        if (!isJsonObject(clause)) throw new SelectorError(`${key} clauses must be objects`);
        return matchesSelector(doc, clause);
      });
      const ok = key === '$and' ? results.every(Boolean) : results.some(Boolean);
      if (!ok) return false;
      continue;
    }

    if (key.startsWith('$')) throw new SelectorError(`Unknown combination operator: ${key}`);

    if (!matchCondition(readPath(doc, key), condition)) return false;
  }
  return true;
}

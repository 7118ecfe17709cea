/**
 * Mango query evaluation engine
 *
 * Field paths traverse arrays the way document databases do: `a.b` against
 * `{a: [{b: 1}, {b: 2}]}` yields both 1 and 2, and a condition holds when any
 * resolved value (or any element of a resolved array) satisfies it.
 */

import { ValidationError } from "./errors.js";
import { isPlainObject, jsonEqual } from "./format.js";
import type { DocumentData, Filter, Stage } from "./types.js";

const NUMERIC_SEGMENT = /^\d+$/;

/**
 * Resolve every value reachable under a dot path
 * @param obj - Object to read from
 * @param path - Dot-separated path (e.g., "target.selector.start")
 * @returns All values found; empty when the path does not exist
 */
export function resolvePath(obj: unknown, path: string): unknown[] {
  const segments = path.split(".");

  const walk = (current: unknown, i: number): unknown[] => {
    if (i === segments.length) {
      return [current];
    }
    const segment = segments[i] ?? "";

    if (Array.isArray(current)) {
      if (NUMERIC_SEGMENT.test(segment)) {
        const idx = Number(segment);
        return idx < current.length ? walk(current[idx], i + 1) : [];
      }
      return current.flatMap((element) => walk(element, i));
    }

    if (isPlainObject(current) && Object.hasOwn(current, segment)) {
      return walk(current[segment], i + 1);
    }
    return [];
  };

  return walk(obj, 0);
}

/**
 * Candidate values for comparison: each resolved value, plus the elements of resolved arrays
 */
function expand(values: unknown[]): unknown[] {
  return values.flatMap((v) => (Array.isArray(v) ? [v, ...v] : [v]));
}

function compareOrdered(a: unknown, b: unknown): number | undefined {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return undefined;
}

function anyEquals(values: unknown[], rhs: unknown): boolean {
  // A null condition also matches a missing field
  if (rhs === null && values.length === 0) {
    return true;
  }
  return expand(values).some((v) => jsonEqual(v, rhs));
}

function anyOrdered(values: unknown[], rhs: unknown, test: (cmp: number) => boolean): boolean {
  return expand(values).some((v) => {
    const cmp = compareOrdered(v, rhs);
    return cmp !== undefined && test(cmp);
  });
}

function requireArray(op: string, rhs: unknown): unknown[] {
  if (!Array.isArray(rhs)) {
    throw new ValidationError(`${op} operator requires an array`);
  }
  return rhs;
}

function requireFilter(op: string, rhs: unknown): Filter {
  if (!isPlainObject(rhs)) {
    throw new ValidationError(`${op} operator requires a filter object`);
  }
  return rhs;
}

function isOperatorObject(cond: unknown): cond is Record<string, unknown> {
  if (!isPlainObject(cond)) return false;
  const keys = Object.keys(cond);
  return keys.length > 0 && keys.every((k) => k.startsWith("$"));
}

/**
 * Evaluate a field-level condition
 * @param values - Values resolved for the field path
 * @param cond - Condition to test (operator object or literal value)
 */
function matchField(values: unknown[], cond: unknown): boolean {
  if (!isOperatorObject(cond)) {
    return anyEquals(values, cond);
  }

  for (const [op, rhs] of Object.entries(cond)) {
    switch (op) {
      case "$eq":
        if (!anyEquals(values, rhs)) return false;
        break;
      case "$ne":
        if (anyEquals(values, rhs)) return false;
        break;
      case "$in":
        if (!requireArray(op, rhs).some((r) => anyEquals(values, r))) return false;
        break;
      case "$nin":
        if (requireArray(op, rhs).some((r) => anyEquals(values, r))) return false;
        break;
      case "$gt":
        if (!anyOrdered(values, rhs, (c) => c > 0)) return false;
        break;
      case "$gte":
        if (!anyOrdered(values, rhs, (c) => c >= 0)) return false;
        break;
      case "$lt":
        if (!anyOrdered(values, rhs, (c) => c < 0)) return false;
        break;
      case "$lte":
        if (!anyOrdered(values, rhs, (c) => c <= 0)) return false;
        break;
      case "$elemMatch": {
        const sub = requireFilter(op, rhs);
        // A lone object is treated as a one-element array
        const found = values.some((v) =>
          (Array.isArray(v) ? v : [v]).some((el) => isPlainObject(el) && matches(el, sub))
        );
        if (!found) return false;
        break;
      }
      default:
        throw new ValidationError(`Unknown operator: ${op}`);
    }
  }
  return true;
}

/**
 * Test if a document matches a Mango filter
 * @param doc - Document to test
 * @param filter - Mango filter object
 * @returns true if document matches filter
 */
export function matches(doc: DocumentData, filter: Filter): boolean {
  for (const [key, value] of Object.entries(filter)) {
    if (key.startsWith("$")) {
      throw new ValidationError(`Unknown operator: ${key}`);
    }

    if (!matchField(resolvePath(doc, key), value)) {
      return false;
    }
  }

  return true;
}

/**
 * Apply pagination to documents
 * @param skip - Number to skip (default: 0)
 * @param limit - Maximum to return (default: unlimited)
 */
export function paginate<T>(docs: T[], skip = 0, limit?: number): T[] {
  const end = limit !== undefined ? skip + limit : undefined;
  return docs.slice(skip, end);
}

/**
 * Run an execution pipeline over documents, stage by stage in order
 */
export function runPipeline<T extends DocumentData>(docs: T[], stages: readonly Stage[]): T[] {
  let current = docs;
  for (const stage of stages) {
    if ("$match" in stage) {
      const filter = stage.$match;
      current = current.filter((d) => matches(d, filter));
    } else if ("$skip" in stage) {
      current = paginate(current, stage.$skip);
    } else {
      current = paginate(current, 0, stage.$limit);
    }
  }
  return current;
}

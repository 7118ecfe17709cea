/**
 * Field occurrence counting for container metadata
 */

import { isPlainObject } from "./format.js";

/**
 * Every dotted field path present in an annotation, each listed once
 *
 * Nested objects are expanded and array elements traversed under the array's
 * own path. JSON-LD keywords and other keys containing `@` are skipped.
 */
export function extractFields(annotation: Record<string, unknown>): string[] {
  const fields = new Set<string>();

  const visit = (value: unknown, prefix: string): void => {
    if (Array.isArray(value)) {
      for (const element of value) visit(element, prefix);
      return;
    }
    if (!isPlainObject(value)) return;

    for (const [key, child] of Object.entries(value)) {
      if (key.includes("@")) continue;
      const path = prefix ? `${prefix}.${key}` : key;
      fields.add(path);
      visit(child, path);
    }
  };

  visit(annotation, "");
  return [...fields];
}

/**
 * Apply an annotation's fields to a count table; counts reaching zero are removed
 * @param delta - +1 when the annotation is added, -1 when removed
 */
export function applyFieldCounts(
  counts: Record<string, number>,
  annotation: Record<string, unknown>,
  delta: 1 | -1
): Record<string, number> {
  const next = { ...counts };
  for (const field of extractFields(annotation)) {
    const value = (next[field] ?? 0) + delta;
    if (value > 0) {
      next[field] = value;
    } else {
      delete next[field];
    }
  }
  return next;
}

/**
 * Counts as an object sorted by field name
 */
export function sortFieldCounts(counts: Record<string, number>): Record<string, number> {
  const sorted: Record<string, number> = {};
  for (const field of Object.keys(counts).sort()) {
    const count = counts[field];
    if (count !== undefined) sorted[field] = count;
  }
  return sorted;
}

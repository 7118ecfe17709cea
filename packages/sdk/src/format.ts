/**
 * Deterministic JSON formatting utilities
 */

export type KeyOrder = "alpha" | "preserve";

/**
 * Stable, deterministic JSON stringification with guaranteed key ordering
 * @param value - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 * @param order - Key ordering: "alpha", or "preserve" for insertion order
 * @returns Formatted JSON string with trailing newline
 */
export function stableStringify(value: unknown, indent = 2, order: KeyOrder = "alpha"): string {
  const seen = new WeakSet<object>();

  const normalize = (current: unknown): unknown => {
    if (current === null || typeof current !== "object") {
      return current;
    }
    if (seen.has(current)) {
      throw new Error("Circular reference detected in object");
    }
    seen.add(current);

    try {
      // Arrays: preserve order but normalize contents
      if (Array.isArray(current)) {
        return current.map(normalize);
      }

      const keys = Object.keys(current);
      if (order === "alpha") {
        keys.sort((a, b) => a.localeCompare(b));
      }
      const out: Record<string, unknown> = {};
      for (const k of keys) {
        out[k] = normalize(Reflect.get(current, k));
      }
      return out;
    } finally {
      seen.delete(current);
    }
  };

  return JSON.stringify(normalize(value), null, indent) + "\n";
}

/**
 * Structural equality of two JSON-like values, ignoring object key order
 */
export function jsonEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a === null || b === null || typeof a !== "object" || typeof b !== "object") {
    return false;
  }
  return stableStringify(a, 0) === stableStringify(b, 0);
}

/**
 * Type guard for plain (non-array, non-null) objects
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

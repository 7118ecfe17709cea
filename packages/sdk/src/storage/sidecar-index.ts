/**
 * Physical secondary indexes kept as sidecar JSON files beside a collection
 *
 * Format: { "name": ..., "keys": { "<path>": 1 }, "entries": { "<value>": ["id1", ...] } }
 *
 * Invariants:
 * - ID arrays are sorted and deduplicated
 * - Values are namespaced by type so "1" and 1 never share a bucket
 * - Arrays are expanded: each element is indexed separately
 */

import { z } from "zod";
import { ValidationError } from "../errors.js";
import { stableStringify } from "../format.js";
import { resolvePath } from "../query.js";
import type { IndexDefinition, IndexKeyValue, StoredDocument } from "../types.js";

export type IndexEntries = Record<string, string[]>;

const IndexKeyValueSchema = z.union([
  z.literal(1),
  z.literal(-1),
  z.literal("hashed"),
  z.literal("text"),
]);

export const SidecarIndexSchema = z.object({
  name: z.string().min(1),
  keys: z.record(IndexKeyValueSchema),
  entries: z.record(z.array(z.string())),
});

export type SidecarIndex = z.infer<typeof SidecarIndexSchema>;

/**
 * The single indexed path and its key value
 * @throws ValidationError for compound or empty key specs
 */
export function indexedField(keys: Record<string, IndexKeyValue>): [string, IndexKeyValue] {
  const fields = Object.entries(keys);
  const [first] = fields;
  if (fields.length !== 1 || first === undefined) {
    throw new ValidationError(`Index must name exactly one field, got ${fields.length}`);
  }
  return first;
}

/**
 * Serialize value to index key(s)
 * Arrays are expanded to multiple keys
 */
export function serializeIndexValue(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.flatMap((v) => serializeIndexValue(v));
  }

  if (typeof value === "string") {
    // Escape strings that look like type prefixes
    if (/^__(num|bool|null|str|obj)__/.test(value)) {
      return [`__str__${value}`];
    }
    return [value];
  }

  if (typeof value === "number") {
    return [`__num__${value}`];
  }

  if (typeof value === "boolean") {
    return [`__bool__${value}`];
  }

  if (value === null) {
    return ["__null__"];
  }

  if (typeof value === "object") {
    return [`__obj__${stableStringify(value, 0).trim()}`];
  }

  return [];
}

/**
 * Lowercased word tokens of every string under a value
 */
function textTokens(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.flatMap(textTokens);
  }
  if (typeof value !== "string") {
    return [];
  }
  return value
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((word) => word.length > 0);
}

function keysFor(doc: StoredDocument, field: string, kind: IndexKeyValue): string[] {
  const values = resolvePath(doc, field);
  const keys = kind === "text" ? values.flatMap(textTokens) : values.flatMap(serializeIndexValue);
  return [...new Set(keys)];
}

/**
 * Build index entries from scratch
 */
export function buildSidecarIndex(definition: IndexDefinition, docs: StoredDocument[]): SidecarIndex {
  const [field, kind] = indexedField(definition.keys);
  const entries: IndexEntries = {};

  for (const doc of docs) {
    for (const key of keysFor(doc, field, kind)) {
      (entries[key] ??= []).push(doc._id);
    }
  }

  // Sort all buckets for deterministic output
  for (const bucket of Object.values(entries)) {
    bucket.sort();
  }

  return { name: definition.name, keys: definition.keys, entries };
}

/**
 * Move a document's entries from its old to its new version
 * @param before - Previous version, or undefined on insert
 * @param after - New version, or undefined on delete
 */
export function updateSidecarIndex(
  index: SidecarIndex,
  docId: string,
  before: StoredDocument | undefined,
  after: StoredDocument | undefined
): void {
  const [field, kind] = indexedField(index.keys);
  const { entries } = index;

  if (before) {
    for (const key of keysFor(before, field, kind)) {
      const bucket = entries[key];
      if (!bucket) continue;
      const remaining = bucket.filter((id) => id !== docId);
      if (remaining.length === 0) {
        delete entries[key];
      } else {
        entries[key] = remaining;
      }
    }
  }

  if (after) {
    for (const key of keysFor(after, field, kind)) {
      const bucket = (entries[key] ??= []);
      if (!bucket.includes(docId)) {
        bucket.push(docId);
        bucket.sort();
      }
    }
  }
}

/**
 * Document ids stored under a scalar value
 */
export function lookupSidecarIndex(index: SidecarIndex, value: string | number | boolean): string[] {
  const ids = new Set<string>();
  for (const key of serializeIndexValue(value)) {
    for (const id of index.entries[key] ?? []) {
      ids.add(id);
    }
  }
  return [...ids].sort();
}

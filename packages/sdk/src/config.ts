/**
 * Store options, with defaults and bounds applied by a zod schema
 */

import { z } from "zod";
import { DEFAULT_RANGE_SELECTOR_TYPE } from "./compiler.js";
import { ValidationError } from "./errors.js";
import type { DocumentStore } from "./storage/document-store.js";

const HOUR_MS = 60 * 60 * 1000;

export const AnnoStoreOptionsSchema = z.object({
  /** Data directory of the file-backed document store */
  root: z.string().min(1),
  /** Annotations per search result page */
  pageSize: z.number().int().min(1).max(10_000).default(100),
  /** Base of every resolvable identifier the store hands out */
  externalBaseUrl: z.string().url().default("http://localhost:8080"),
  /** `selector.type` matched by the text anchor range query functions */
  rangeSelectorType: z.string().min(1).default(DEFAULT_RANGE_SELECTOR_TYPE),
  searchCache: z
    .object({
      ttlMs: z.number().int().positive().default(HOUR_MS),
      maxSize: z.number().int().positive().default(1000),
    })
    .default({}),
  /** How long finished chores and tasks stay retrievable */
  taskTtlMs: z.number().int().positive().default(HOUR_MS),
  workerConcurrency: z.number().int().min(1).max(64).default(2),
  /** API key that authenticates as the superuser */
  rootApiKey: z.string().min(1).optional(),
  /** JSON indentation of stored files */
  indent: z.number().int().min(0).max(8).default(2),
});

/**
 * Runtime collaborators that are not plain configuration
 */
export interface AnnoStoreOverrides {
  /** Storage to use instead of a FileDocumentStore under `root` */
  documentStore?: DocumentStore;
  /** Clock for caches and tasks */
  now?: () => number;
}

export type AnnoStoreOptions = z.input<typeof AnnoStoreOptionsSchema> & AnnoStoreOverrides;

export type AnnoStoreConfig = z.output<typeof AnnoStoreOptionsSchema>;

/**
 * Apply defaults and check bounds
 * @throws ValidationError listing every invalid option
 */
export function resolveConfig(options: AnnoStoreOptions): AnnoStoreConfig {
  const parsed = AnnoStoreOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError(`Invalid store options: ${problems.join("; ")}`);
  }
  return parsed.data;
}

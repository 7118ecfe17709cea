/**
 * Stored annotation envelope
 */

import { z } from "zod";
import { logger } from "./observability/logs.js";
import type { AnnotationEnvelope, DocumentData, StoredDocument } from "./types.js";

export const AnnotationEnvelopeSchema = z.object({
  annotation_name: z.string().min(1),
  annotation: z.record(z.unknown()),
  etag: z.string().min(1),
  created: z.string(),
  modified: z.string(),
});

export type StoredEnvelope = AnnotationEnvelope & { _id: string };

/**
 * Read an envelope back from storage
 * @returns undefined (with a warning logged) when the document is not an envelope
 */
export function parseEnvelope(doc: StoredDocument, containerName?: string): StoredEnvelope | undefined {
  const parsed = AnnotationEnvelopeSchema.safeParse(doc);
  if (!parsed.success) {
    logger.warn("annotation.envelope.invalid", {
      container: containerName,
      details: { id: doc._id },
    });
    return undefined;
  }
  return { _id: doc._id, ...parsed.data };
}

/**
 * The client annotation with its resolvable identifier in `id`
 */
export function withAnnotationId(
  annotation: DocumentData,
  url: string
): DocumentData & { id: string } {
  return { ...annotation, id: url };
}

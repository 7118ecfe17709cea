/**
 * Zod schemas for validating tool inputs
 * Provides runtime type safety and detailed validation errors
 */

import { z } from "zod";

// Container and annotation names become path segments; the sdk checks them fully
const NameSchema = z.string().min(1).max(255);

const FieldSchema = z.string().min(1).superRefine((val, ctx) => {
  if (!/^[^.$\s][^\s]*$/.test(val) || val.endsWith(".")) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "field must be a dotted path without whitespace, starting with neither '.' nor '$'",
    });
  }
});

// Annotation content and queries are arbitrary JSON objects
export const JsonObjectSchema = z.record(z.string(), z.unknown());

export const PageSchema = z.number().int().min(0).default(0);

// Tool input schemas

export const CreateContainerInputSchema = z.object({
  name: NameSchema.optional(),
  label: z.string().min(1).optional(),
  readOnlyForAnonymousUsers: z.boolean().optional(),
});

export const GetContainerInputSchema = z.object({
  container: NameSchema,
});

export const AddAnnotationInputSchema = z.object({
  container: NameSchema,
  annotation: JsonObjectSchema,
  name: NameSchema.optional(),
});

export const GetAnnotationInputSchema = z.object({
  container: NameSchema,
  name: NameSchema,
});

export const CreateSearchInputSchema = z.object({
  container: NameSchema,
  query: JsonObjectSchema,
});

export const GetSearchPageInputSchema = z.object({
  container: NameSchema,
  searchId: z.string().min(1),
  page: PageSchema,
});

export const GetSearchInfoInputSchema = z.object({
  container: NameSchema,
  searchId: z.string().min(1),
});

export const IndexInputSchema = z.object({
  container: NameSchema,
  field: FieldSchema,
  // Case-insensitive kind, resolved by the sdk
  type: z.string().min(1),
});

export const ListIndexesInputSchema = z.object({
  container: NameSchema,
});

export const StartGlobalSearchInputSchema = z.object({
  query: JsonObjectSchema,
});

export const GlobalSearchStatusInputSchema = z.object({
  searchId: z.string().min(1),
});

export const GlobalSearchPageInputSchema = z.object({
  searchId: z.string().min(1),
  page: PageSchema,
});

// Export types
export type JsonObject = z.infer<typeof JsonObjectSchema>;
export type CreateContainerInput = z.infer<typeof CreateContainerInputSchema>;
export type AddAnnotationInput = z.infer<typeof AddAnnotationInputSchema>;
export type IndexInput = z.infer<typeof IndexInputSchema>;
export type GetSearchPageInput = z.infer<typeof GetSearchPageInputSchema>;

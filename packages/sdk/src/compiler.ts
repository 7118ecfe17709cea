/**
 * Query compiler: declarative annotation query → ordered `$match` stages
 *
 * Keys are walked in input order and each produces exactly one stage, so the
 * same input structure always compiles to the same stage list. Compilation is
 * pure: it never touches storage, and it reports every problem it finds rather
 * than stopping at the first.
 *
 * Query shape:
 *   { "body.type": "Page" }                                  equality
 *   { "body.type": ["Page", "Line"] }                        membership
 *   { "body.value": { ":isNotIn": ["a", "b"] } }             field operators
 *   { ":overlapsWithTextAnchorRange": { source, start, end } } query functions
 */

import { z } from "zod";
import { QueryCompilationError } from "./errors.js";
import { isPlainObject } from "./format.js";
import type { Filter, MatchStage } from "./types.js";

/**
 * Leading character that marks operators and query functions
 */
export const OPERATOR_SENTINEL = ":";

/**
 * Path prefix under which client annotations are stored
 */
export const ANNOTATION_FIELD_PREFIX = "annotation.";

export const DEFAULT_RANGE_SELECTOR_TYPE = "TextAnchorSelector";

export interface CompilerOptions {
  /** `selector.type` that text anchor range functions match (default: TextAnchorSelector) */
  rangeSelectorType?: string;
}

export type CompileResult =
  | { ok: true; stages: MatchStage[] }
  | { ok: false; errors: string[] };

const ComparableSchema = z.union([z.number(), z.string()]);
const ListSchema = z.array(z.unknown());
const AnySchema = z.unknown();

/**
 * Field operators and the match operator each compiles to
 */
interface FieldOperator {
  match: string;
  schema: z.ZodType<unknown>;
}

const FIELD_OPERATORS: ReadonlyMap<string, FieldOperator> = new Map<string, FieldOperator>([
  [":isEqualTo", { match: "$eq", schema: AnySchema }],
  [":isNotEqualTo", { match: "$ne", schema: AnySchema }],
  [":isIn", { match: "$in", schema: ListSchema }],
  [":isNotIn", { match: "$nin", schema: ListSchema }],
  [":isGreater", { match: "$gt", schema: ComparableSchema }],
  [":isGreaterOrEqual", { match: "$gte", schema: ComparableSchema }],
  [":isLess", { match: "$lt", schema: ComparableSchema }],
  [":isLessOrEqual", { match: "$lte", schema: ComparableSchema }],
]);

const TextAnchorRangeSchema = z
  .object({
    source: z.string().min(1),
    start: z.number(),
    end: z.number(),
  })
  .strict()
  .superRefine((range, ctx) => {
    if (range.start > range.end) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `start (${range.start}) must not be greater than end (${range.end})`,
      });
    }
  });

type TextAnchorRange = z.infer<typeof TextAnchorRangeSchema>;

interface QueryFunction {
  schema: typeof TextAnchorRangeSchema;
  build(params: TextAnchorRange, selectorType: string): Filter;
}

const QUERY_FUNCTIONS: ReadonlyMap<string, QueryFunction> = new Map<string, QueryFunction>([
  [
    ":overlapsWithTextAnchorRange",
    {
      schema: TextAnchorRangeSchema,
      build: ({ source, start, end }, selectorType) => ({
        "annotation.target": {
          $elemMatch: {
            source,
            "selector.type": selectorType,
            "selector.start": { $lt: end },
            "selector.end": { $gt: start },
          },
        },
      }),
    },
  ],
  [
    ":isWithinTextAnchorRange",
    {
      schema: TextAnchorRangeSchema,
      build: ({ source, start, end }, selectorType) => ({
        "annotation.target": {
          $elemMatch: {
            source,
            "selector.type": selectorType,
            "selector.start": { $gte: start },
            "selector.end": { $lte: end },
          },
        },
      }),
    },
  ],
]);

/**
 * Names of every supported field operator and query function
 */
export const SUPPORTED_OPERATORS: readonly string[] = [...FIELD_OPERATORS.keys()];
export const SUPPORTED_QUERY_FUNCTIONS: readonly string[] = [...QUERY_FUNCTIONS.keys()];

function describeIssues(prefix: string, error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const at = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${prefix}: ${at}${issue.message}`;
  });
}

function checkFieldPath(field: string): string | undefined {
  const segments = field.split(".");
  if (segments.some((s) => s.length === 0)) {
    return `invalid field path '${field}'`;
  }
  if (segments.some((s) => s.startsWith("$"))) {
    return `field path '${field}' cannot have segments starting with '$'`;
  }
  return undefined;
}

function compileFieldOperators(
  field: string,
  operators: Record<string, unknown>,
  errors: string[]
): Filter | undefined {
  const keys = Object.keys(operators);
  if (keys.length === 0) {
    errors.push(`field '${field}': empty operator object`);
    return undefined;
  }

  const literalKeys = keys.filter((k) => !k.startsWith(OPERATOR_SENTINEL));
  if (literalKeys.length > 0) {
    errors.push(
      `field '${field}': object values must only use operators starting with '${OPERATOR_SENTINEL}' ` +
        `(found ${literalKeys.map((k) => `'${k}'`).join(", ")})`
    );
    return undefined;
  }

  const condition: Filter = {};
  let valid = true;
  for (const key of keys) {
    const operator = FIELD_OPERATORS.get(key);
    if (!operator) {
      errors.push(
        `field '${field}': unknown operator '${key}'; expected one of ${SUPPORTED_OPERATORS.join(", ")}`
      );
      valid = false;
      continue;
    }
    const parsed = operator.schema.safeParse(operators[key]);
    if (!parsed.success) {
      errors.push(...describeIssues(`field '${field}' ${key}`, parsed.error));
      valid = false;
      continue;
    }
    condition[operator.match] = parsed.data;
  }
  return valid ? condition : undefined;
}

/**
 * Compile a query into an ordered list of match stages
 * @param query - Declarative query object (key order is significant)
 * @returns The stages, or every problem found
 */
export function compileQuery(query: unknown, options: CompilerOptions = {}): CompileResult {
  const selectorType = options.rangeSelectorType ?? DEFAULT_RANGE_SELECTOR_TYPE;

  if (!isPlainObject(query)) {
    return { ok: false, errors: ["query must be a JSON object"] };
  }

  const stages: MatchStage[] = [];
  const errors: string[] = [];

  for (const [key, value] of Object.entries(query)) {
    if (key.startsWith(OPERATOR_SENTINEL)) {
      const fn = QUERY_FUNCTIONS.get(key);
      if (!fn) {
        errors.push(
          `unknown query function '${key}'; expected one of ${SUPPORTED_QUERY_FUNCTIONS.join(", ")}`
        );
        continue;
      }
      const parsed = fn.schema.safeParse(value);
      if (!parsed.success) {
        errors.push(...describeIssues(key, parsed.error));
        continue;
      }
      stages.push({ $match: fn.build(parsed.data, selectorType) });
      continue;
    }

    const pathProblem = checkFieldPath(key);
    if (pathProblem) {
      errors.push(pathProblem);
      continue;
    }
    const path = ANNOTATION_FIELD_PREFIX + key;

    if (isPlainObject(value)) {
      const condition = compileFieldOperators(key, value, errors);
      if (condition) {
        stages.push({ $match: { [path]: condition } });
      }
    } else if (Array.isArray(value)) {
      stages.push({ $match: { [path]: { $in: value } } });
    } else {
      stages.push({ $match: { [path]: value } });
    }
  }

  return errors.length > 0 ? { ok: false, errors } : { ok: true, stages };
}

/**
 * Compile a query, throwing on any problem
 * @throws QueryCompilationError listing every problem found
 */
export function compileQueryOrThrow(query: unknown, options: CompilerOptions = {}): MatchStage[] {
  const result = compileQuery(query, options);
  if (!result.ok) {
    throw new QueryCompilationError(result.errors);
  }
  return result.stages;
}

/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { isRole, type Role } from "@annostore/sdk";
import { CliError } from "./errors.js";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  // Enforce reasonable max to prevent runaway paging
  if (parsed > 10000) {
    throw new InvalidArgumentError(`${name} must be <= 10000`);
  }

  return parsed;
}

/**
 * Parse JSON with descriptive error messages
 * Used on payloads inside actions, so failures are CliErrors rather than usage errors
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new CliError(`Invalid JSON in ${source}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

/**
 * Narrow parsed JSON to an object
 */
export function requireJsonObject(value: unknown, what: string): Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    throw new CliError(`${what} must be a JSON object`);
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * Parse a role name, case-insensitively
 */
export function parseRole(value: string): Role {
  const upper = value.trim().toUpperCase();
  if (!isRole(upper)) {
    throw new InvalidArgumentError("role must be one of ADMIN, EDITOR, GUEST");
  }
  return upper;
}

/**
 * Validation utilities for names that end up on disk or in index names
 */

import { ValidationError } from "./errors.js";

/**
 * Valid characters for container and annotation names: alphanumeric, underscore, dash, dot
 */
const VALID_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

/**
 * Segments of a dotted field path that can appear in a physical index name
 */
const VALID_FIELD_SEGMENT = /^[A-Za-z0-9_@:-]+$/;

const MAX_NAME_LENGTH = 200;

/**
 * Names of collections the store keeps for itself
 */
export const SYSTEM_COLLECTIONS: ReadonlySet<string> = new Set(["_containers", "_roles", "_users"]);

function checkName(value: string, label: string): void {
  if (!value) {
    throw new ValidationError(`${label} must be a non-empty string`);
  }

  if (value.length > MAX_NAME_LENGTH) {
    throw new ValidationError(`${label} is too long (max ${MAX_NAME_LENGTH} characters)`);
  }

  if (!VALID_NAME_PATTERN.test(value)) {
    throw new ValidationError(
      `${label} contains invalid characters: "${value}". ` +
        `Only alphanumeric, underscore, dash, and dot are allowed.`
    );
  }

  if (value.startsWith(".") || value.startsWith("-")) {
    throw new ValidationError(`${label} cannot start with "." or "-": "${value}"`);
  }

  if (value.includes("..")) {
    throw new ValidationError(`${label} cannot contain "..": "${value}"`);
  }
}

/**
 * Validate a container name
 * @throws ValidationError if invalid
 */
export function validateContainerName(name: string): void {
  checkName(name, "Container name");

  // Leading underscore is reserved for system collections
  if (name.startsWith("_")) {
    throw new ValidationError(`Container name cannot start with "_": "${name}"`);
  }
}

/**
 * Validate a client-chosen annotation name
 * @throws ValidationError if invalid
 */
export function validateAnnotationName(name: string): void {
  checkName(name, "Annotation name");
}

/**
 * Validate a dotted field path as used by queries and indexes
 * @throws ValidationError if invalid
 */
export function validateField(field: string): void {
  if (!field) {
    throw new ValidationError("Field must be a non-empty string");
  }
  for (const segment of field.split(".")) {
    if (!VALID_FIELD_SEGMENT.test(segment)) {
      throw new ValidationError(`Invalid field path: "${field}"`);
    }
  }
}

/**
 * Validate a user name
 * @throws ValidationError if invalid
 */
export function validateUserName(name: string): void {
  if (!name || name.trim() !== name) {
    throw new ValidationError("User name must be a non-empty string without surrounding whitespace");
  }
}

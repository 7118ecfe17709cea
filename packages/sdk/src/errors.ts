/**
 * Error types for AnnoStore operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - ValidationError, NotAuthorizedError and NotFoundError stay distinguishable so
 *   callers can tell "bad request" from "forbidden" from "gone"
 */

/**
 * Base class for all AnnoStore errors
 */
export abstract class AnnoStoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when client input is malformed; raised before any storage call
 */
export class ValidationError extends AnnoStoreError {
  readonly code: string = "E_VALIDATION";
}

/**
 * Thrown when a query cannot be compiled into stages
 */
export class QueryCompilationError extends ValidationError {
  override readonly code = "E_QUERY";

  constructor(
    public readonly problems: readonly string[],
    options?: ErrorOptions
  ) {
    super(`Invalid query: ${problems.join("; ")}`, options);
  }
}

/**
 * Thrown when an index kind is not one of the supported kinds
 */
export class UnknownIndexKindError extends ValidationError {
  override readonly code = "E_INDEX_KIND";

  constructor(kind: string, validKinds: readonly string[], options?: ErrorOptions) {
    super(`Unknown index type ${kind}; expected index types: ${validKinds.join(", ")}`, options);
  }
}

/**
 * Thrown when the caller lacks the role required for an operation
 */
export class NotAuthorizedError extends AnnoStoreError {
  readonly code = "E_NOT_AUTHORIZED";
}

/**
 * Base class for lookups of things that do not exist (or no longer exist)
 */
export class NotFoundError extends AnnoStoreError {
  readonly code: string = "E_NOT_FOUND";
}

export class ContainerNotFoundError extends NotFoundError {
  constructor(
    public readonly containerName: string,
    options?: ErrorOptions
  ) {
    super(`Annotation container '${containerName}' not found`, options);
  }
}

export class AnnotationNotFoundError extends NotFoundError {
  constructor(containerName: string, annotationName: string, options?: ErrorOptions) {
    super(`Annotation '${annotationName}' not found in container '${containerName}'`, options);
  }
}

export class SearchNotFoundError extends NotFoundError {
  constructor(searchId: string, options?: ErrorOptions) {
    super(
      `No search results found for search id ${searchId}. The search might have expired.`,
      options
    );
  }
}

export class IndexNotFoundError extends NotFoundError {
  constructor(containerName: string, field: string, indexType: string, options?: ErrorOptions) {
    super(`No ${indexType} index on field '${field}' in container '${containerName}'`, options);
  }
}

export class TaskNotFoundError extends NotFoundError {
  constructor(taskId: string, options?: ErrorOptions) {
    super(`No task found for id ${taskId}. The task might have expired.`, options);
  }
}

export class UserNotFoundError extends NotFoundError {
  constructor(userName: string, options?: ErrorOptions) {
    super(`User '${userName}' not found`, options);
  }
}

/**
 * Thrown when a write conflicts with the stored state
 * (stale concurrency token, non-empty container, taken user name)
 */
export class ConflictError extends AnnoStoreError {
  readonly code = "E_CONFLICT";
}

/**
 * Thrown when a document cannot be found on disk
 */
export class DocumentNotFoundError extends AnnoStoreError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Document not found: ${filePath}`, options);
  }
}

/**
 * Thrown when a write targets a collection that no longer exists
 */
export class CollectionNotFoundError extends AnnoStoreError {
  readonly code = "ENOENT";

  constructor(collection: string, options?: ErrorOptions) {
    super(`Collection '${collection}' does not exist`, options);
  }
}

/**
 * Thrown when a document read operation fails
 */
export class DocumentReadError extends AnnoStoreError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read document: ${filePath}`, options);
  }
}

/**
 * Thrown when a document write operation fails
 */
export class DocumentWriteError extends AnnoStoreError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write document: ${filePath}`, options);
  }
}

/**
 * Thrown when a document removal operation fails
 */
export class DocumentRemoveError extends AnnoStoreError {
  readonly code = "REMOVE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to remove document: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends AnnoStoreError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when listing files in a directory fails
 */
export class ListFilesError extends AnnoStoreError {
  readonly code = "LIST_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Failed to list files in directory: ${dirPath}`, options);
  }
}

/**
 * Render any thrown value as a one-line, human-readable message
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}

/**
 * Read the `code` property of a Node.js system error, if any
 */
export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

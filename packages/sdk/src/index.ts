/**
 * AnnoStore SDK
 *
 * Multi-tenant annotation store: compiled queries, cached and paged searches,
 * background index builds and per-container roles over a document store
 */

export type {
  DocumentData,
  StoredDocument,
  Filter,
  MatchStage,
  SkipStage,
  LimitStage,
  Stage,
  IndexKeyValue,
  IndexDefinition,
  Query,
  Role,
  Principal,
  ContainerUserEntry,
  UserEntry,
  ContainerMetadata,
  ContainerInfo,
  AnnotationEnvelope,
  AnnotationIdentifier,
  AnnotationRecord,
  AnnotationPage,
  SearchCreated,
  SearchInfo,
  IndexKind,
  IndexConfig,
  TaskState,
  TaskSummary,
  IndexChoreSummary,
  SearchTaskSummary,
} from "./types.js";
export { ROLES } from "./types.js";

// Facade
export { openAnnoStore, type AnnoStore } from "./store.js";
export {
  AnnoStoreOptionsSchema,
  resolveConfig,
  type AnnoStoreOptions,
  type AnnoStoreConfig,
  type AnnoStoreOverrides,
} from "./config.js";

// Query compiler
export {
  compileQuery,
  compileQueryOrThrow,
  OPERATOR_SENTINEL,
  SUPPORTED_OPERATORS,
  SUPPORTED_QUERY_FUNCTIONS,
  DEFAULT_RANGE_SELECTOR_TYPE,
  type CompileResult,
  type CompilerOptions,
} from "./compiler.js";

// Search
export {
  SearchManager,
  buildAnnotationPage,
  validatePageNumber,
  ANNOTATION_PAGE_CONTEXT,
  type CompiledSearch,
  type SearchManagerOptions,
} from "./search.js";
export { ExpiringLruCache, type CacheStats, type ExpiringCacheOptions } from "./cache.js";

// Indexes
export {
  IndexManager,
  IndexChore,
  INDEX_TYPES,
  indexName,
  parseIndexName,
  parseIndexKind,
} from "./indexes.js";

// Background work
export { BackgroundTask, DEFAULT_TASK_TTL_MS, type TaskProgress } from "./tasks/task.js";
export { WorkerPool, type Runnable } from "./tasks/pool.js";
export { TaskRegistry } from "./tasks/registry.js";
export { ContainerSearchTask, type ContainerSearchHit } from "./tasks/container-search-task.js";

// Access
export {
  AccessGate,
  ADMIN_ONLY,
  ADMIN_OR_EDITOR,
  ANY_ROLE,
  SUPERUSER,
  namedUser,
  samePrincipal,
  describePrincipal,
} from "./access.js";
export { DocumentRoleStore, RoleSchema, isRole, type RoleStore } from "./roles.js";
export { UserStore, type AddUsersResult } from "./users.js";
export {
  ContainerService,
  ContainerUserSchema,
  ROOT_GROUP,
  type ContainerUser,
  type CreateContainerRequest,
} from "./containers.js";
export { UriFactory } from "./uris.js";
export { extractFields } from "./fields.js";

// Storage
export { type DocumentStore, ID_INDEX_NAME } from "./storage/document-store.js";
export { FileDocumentStore, type FileDocumentStoreOptions } from "./storage/file-store.js";
export { matches, runPipeline } from "./query.js";
export { stableStringify, jsonEqual, isPlainObject } from "./format.js";

// Errors
export {
  AnnoStoreError,
  ValidationError,
  QueryCompilationError,
  UnknownIndexKindError,
  NotAuthorizedError,
  NotFoundError,
  ContainerNotFoundError,
  AnnotationNotFoundError,
  SearchNotFoundError,
  IndexNotFoundError,
  TaskNotFoundError,
  UserNotFoundError,
  ConflictError,
  CollectionNotFoundError,
  DocumentNotFoundError,
  DocumentReadError,
  DocumentWriteError,
  DocumentRemoveError,
  DirectoryError,
  ListFilesError,
  describeError,
} from "./errors.js";

// Logging
export { logger, type Logger, type LogEntry, type LogLevel, type LogSink } from "./observability/logs.js";

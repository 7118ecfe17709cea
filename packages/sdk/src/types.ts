/**
 * Core types for AnnoStore
 */

/**
 * A JSON-like document as handed to or returned by the document store
 */
export type DocumentData = Record<string, unknown>;

/**
 * A document as persisted in a collection, carrying its storage id
 */
export type StoredDocument = DocumentData & { _id: string };

/**
 * Mango-style filter: field paths mapped to literals or `$`-operator objects
 */
export type Filter = Record<string, unknown>;

export interface MatchStage {
  $match: Filter;
}

export interface SkipStage {
  $skip: number;
}

export interface LimitStage {
  $limit: number;
}

/**
 * One unit of an execution pipeline
 */
export type Stage = MatchStage | SkipStage | LimitStage;

/**
 * Key value of a physical index, per indexed path
 */
export type IndexKeyValue = 1 | -1 | "hashed" | "text";

/**
 * Physical index as the document store knows it
 */
export interface IndexDefinition {
  name: string;
  keys: Record<string, IndexKeyValue>;
}

/**
 * Declarative annotation query: field path → literal, or field path → operator
 * object, or query function → parameters. Key order is significant.
 */
export type Query = Record<string, unknown>;

/**
 * Container-scoped roles. Authorization checks membership in an explicit set,
 * never a ranking between roles.
 */
export type Role = "ADMIN" | "EDITOR" | "GUEST";

export const ROLES: readonly Role[] = ["ADMIN", "EDITOR", "GUEST"];

/**
 * Caller identity. `undefined` where a principal is accepted means anonymous.
 */
export type Principal =
  | { readonly kind: "superuser" }
  | { readonly kind: "user"; readonly name: string };

/**
 * A role assignment as persisted by the role store
 */
export interface ContainerUserEntry {
  containerName: string;
  userName: string;
  role: Role;
}

/**
 * A registered user and the API key that authenticates them
 */
export interface UserEntry {
  userName: string;
  apiKey: string;
}

/**
 * Per-container metadata record, kept in sync with the annotation collection
 */
export interface ContainerMetadata {
  name: string;
  label: string;
  createdAt: string;
  modifiedAt: string;
  /** Occurrence count per dotted field path across the container's annotations */
  fieldCounts: Record<string, number>;
  readOnlyForAnonymousUsers: boolean;
}

/**
 * Container metadata as returned to callers
 */
export interface ContainerInfo {
  id: string;
  name: string;
  label: string;
  created: string;
  modified: string;
  annotationCount: number;
  readOnlyForAnonymousUsers: boolean;
}

/**
 * Stored envelope around a client annotation
 */
export interface AnnotationEnvelope {
  annotation_name: string;
  annotation: DocumentData;
  etag: string;
  created: string;
  modified: string;
}

/**
 * Names an annotation and its current concurrency token
 */
export interface AnnotationIdentifier {
  containerName: string;
  annotationName: string;
  etag: string;
}

/**
 * A stored annotation with its resolvable `id` filled in
 */
export interface AnnotationRecord {
  annotation: DocumentData & { id: string };
  etag: string;
  created: string;
  modified: string;
}

/**
 * One page of search results
 */
export interface AnnotationPage {
  "@context": string[];
  id: string;
  type: "AnnotationPage";
  partOf: string;
  startIndex: number;
  /** Hit count frozen when the search was created */
  total: number;
  items: Array<DocumentData & { id: string }>;
  prev: string | null;
  next: string | null;
}

export interface SearchCreated {
  id: string;
  totalHits: number;
  location: string;
  infoLocation: string;
}

export interface SearchInfo {
  query: Query;
  totalHits: number;
}

/**
 * Supported secondary index kinds
 */
export type IndexKind = "hashed" | "ascending" | "descending" | "text";

export interface IndexConfig {
  field: string;
  type: IndexKind;
  url: string;
}

/**
 * Lifecycle of background work
 */
export type TaskState = "CREATED" | "RUNNING" | "DONE" | "FAILED";

/**
 * Point-in-time copy of a task's status
 */
export interface TaskSummary {
  id: string;
  state: TaskState;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  /** When a finished task stops being retrievable; null until it finishes */
  expiresAfter: string | null;
  processingTimeInMillis: number;
  totalUnits: number;
  unitsProcessed: number;
  resultCount: number;
  errors: readonly string[];
}

export interface IndexChoreSummary extends TaskSummary {
  containerName: string;
  field: string;
  indexType: IndexKind;
}

export interface SearchTaskSummary extends TaskSummary {
  query: Query;
  containersToSearch: readonly string[];
}

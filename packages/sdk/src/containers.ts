/**
 * Container and annotation service
 *
 * A container is an annotation collection plus a metadata record in
 * `_containers`. Both are created together, and the record's field counts and
 * modification time follow every annotation write. Metadata updates for one
 * container are serialized.
 *
 * Access checks are not done here; the AnnoStore facade gates every call.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { ANNOTATION_FIELD_PREFIX } from "./compiler.js";
import { parseEnvelope, withAnnotationId, type StoredEnvelope } from "./envelope.js";
import {
  AnnotationNotFoundError,
  ConflictError,
  ContainerNotFoundError,
  ValidationError,
} from "./errors.js";
import { applyFieldCounts, sortFieldCounts } from "./fields.js";
import { isPlainObject } from "./format.js";
import { logger } from "./observability/logs.js";
import { RoleSchema, type RoleStore } from "./roles.js";
import type { DocumentStore } from "./storage/document-store.js";
import { MutexMap } from "./storage/mutex.js";
import type {
  AnnotationIdentifier,
  AnnotationRecord,
  ContainerInfo,
  ContainerMetadata,
  DocumentData,
  Principal,
  Role,
} from "./types.js";
import type { UriFactory } from "./uris.js";
import { validateAnnotationName, validateContainerName, validateField } from "./validation.js";

export const CONTAINERS_COLLECTION = "_containers";

/** Group under which the superuser sees every container */
export const ROOT_GROUP = "ROOT";

const ContainerMetadataSchema = z.object({
  name: z.string(),
  label: z.string(),
  createdAt: z.string(),
  modifiedAt: z.string(),
  fieldCounts: z.record(z.number()),
  readOnlyForAnonymousUsers: z.boolean(),
});

export const ContainerUserSchema = z.object({
  userName: z.string().min(1),
  role: RoleSchema,
});

export type ContainerUser = z.infer<typeof ContainerUserSchema>;

export interface CreateContainerRequest {
  /** Preferred name; a taken or absent name is replaced by a generated one */
  name?: string;
  label?: string;
  readOnlyForAnonymousUsers?: boolean;
}

export interface ContainerServiceOptions {
  now?: () => number;
}

function annotationBody(body: unknown): DocumentData {
  if (!isPlainObject(body)) {
    throw new ValidationError("Annotation must be a JSON object");
  }
  return body;
}

export class ContainerService {
  readonly #store: DocumentStore;
  readonly #roles: RoleStore;
  readonly #uris: UriFactory;
  readonly #now: () => number;
  readonly #locks = new MutexMap();

  constructor(
    store: DocumentStore,
    roles: RoleStore,
    uris: UriFactory,
    options: ContainerServiceOptions = {}
  ) {
    this.#store = store;
    this.#roles = roles;
    this.#uris = uris;
    this.#now = options.now ?? Date.now;
  }

  // Containers

  /**
   * Create the collection and its metadata record
   * @param creator - Named user who becomes ADMIN of the new container
   */
  async createContainer(request: CreateContainerRequest = {}, creator?: string): Promise<ContainerInfo> {
    if (request.name !== undefined) {
      validateContainerName(request.name);
    }

    // Name choice and both writes happen under one lock so names stay unique
    const metadata = await this.#locks.withLock(CONTAINERS_COLLECTION, async () => {
      let name = request.name ?? randomUUID();
      while (await this.exists(name)) {
        name = randomUUID();
      }

      const timestamp = this.#timestamp();
      const created: ContainerMetadata = {
        name,
        label: request.label ?? name,
        createdAt: timestamp,
        modifiedAt: timestamp,
        fieldCounts: {},
        readOnlyForAnonymousUsers: request.readOnlyForAnonymousUsers ?? false,
      };

      await this.#store.createCollection(name);
      await this.#store.insertOne(CONTAINERS_COLLECTION, { ...created });
      return created;
    });

    const { name } = metadata;
    if (creator !== undefined) {
      await this.#roles.setRole(name, creator, "ADMIN");
    }

    logger.info("container.create", { container: name, details: { creator } });
    return this.#info(metadata);
  }

  async exists(name: string): Promise<boolean> {
    return (await this.#findMetadata(name)) !== undefined;
  }

  /**
   * @throws ContainerNotFoundError
   */
  async getContainer(name: string): Promise<ContainerInfo> {
    return this.#info(await this.#metadata(name));
  }

  /**
   * Names of every container, in creation order
   */
  async listContainerNames(): Promise<string[]> {
    const docs = await this.#store.find(CONTAINERS_COLLECTION);
    const names: string[] = [];
    for (const doc of docs) {
      const parsed = ContainerMetadataSchema.safeParse(doc);
      if (parsed.success) names.push(parsed.data.name);
    }
    return names;
  }

  /**
   * Whether anonymous callers may read the container; false for unknown containers
   */
  async isReadableAnonymously(name: string): Promise<boolean> {
    const found = await this.#findMetadata(name);
    return found?.metadata.readOnlyForAnonymousUsers ?? false;
  }

  /**
   * Remove the collection, its metadata and its role assignments
   * @throws ConflictError while annotations remain, unless forced
   */
  async deleteContainer(name: string, options: { force?: boolean } = {}): Promise<void> {
    await this.#locks.withLock(name, async () => {
      const { id } = await this.#metadataRecord(name);
      const remaining = await this.#store.count(name, []);
      if (remaining > 0 && !options.force) {
        throw new ConflictError(
          `Container '${name}' still holds ${remaining} annotation(s); delete them first or force`
        );
      }
      await this.#store.dropCollection(name);
      await this.#store.deleteOne(CONTAINERS_COLLECTION, id);
    });
    const roles = await this.#roles.removeContainer(name);
    logger.info("container.delete", { container: name, details: { force: options.force ?? false, roles } });
  }

  async setAnonymousReadAccess(name: string, readOnlyForAnonymousUsers: boolean): Promise<void> {
    await this.#updateMetadata(name, (metadata) => ({
      ...metadata,
      readOnlyForAnonymousUsers,
      modifiedAt: this.#timestamp(),
    }));
  }

  // Annotations

  /**
   * Store an annotation under the preferred name, or a generated one when it is
   * absent or already taken
   */
  async addAnnotation(
    containerName: string,
    body: unknown,
    options: { name?: string } = {}
  ): Promise<AnnotationIdentifier> {
    const annotation = annotationBody(body);
    if (options.name !== undefined) {
      validateAnnotationName(options.name);
    }

    return this.#locks.withLock(containerName, async () => {
      const found = await this.#metadataRecord(containerName);
      const identifier = await this.#insertAnnotation(containerName, annotation, options.name);
      await this.#saveMetadata(found.id, {
        ...found.metadata,
        fieldCounts: applyFieldCounts(found.metadata.fieldCounts, annotation, 1),
        modifiedAt: this.#timestamp(),
      });
      return identifier;
    });
  }

  /**
   * Store several annotations under generated names
   */
  async batchUpload(containerName: string, bodies: readonly unknown[]): Promise<AnnotationIdentifier[]> {
    const annotations = bodies.map(annotationBody);

    return this.#locks.withLock(containerName, async () => {
      const found = await this.#metadataRecord(containerName);
      const identifiers: AnnotationIdentifier[] = [];
      let fieldCounts = found.metadata.fieldCounts;
      for (const annotation of annotations) {
        identifiers.push(await this.#insertAnnotation(containerName, annotation, undefined));
        fieldCounts = applyFieldCounts(fieldCounts, annotation, 1);
      }
      await this.#saveMetadata(found.id, {
        ...found.metadata,
        fieldCounts,
        modifiedAt: this.#timestamp(),
      });
      logger.info("annotation.batch", { container: containerName, details: { count: identifiers.length } });
      return identifiers;
    });
  }

  /**
   * @throws AnnotationNotFoundError
   */
  async getAnnotation(containerName: string, annotationName: string): Promise<AnnotationRecord> {
    await this.#metadata(containerName);
    const envelope = await this.#envelope(containerName, annotationName);
    return {
      annotation: withAnnotationId(
        envelope.annotation,
        this.#uris.annotationUrl(containerName, annotationName)
      ),
      etag: envelope.etag,
      created: envelope.created,
      modified: envelope.modified,
    };
  }

  /**
   * Replace an annotation's content; a new concurrency token is issued
   * @throws ConflictError when `etag` is not the current token
   */
  async updateAnnotation(
    containerName: string,
    annotationName: string,
    etag: string,
    body: unknown
  ): Promise<AnnotationIdentifier> {
    const annotation = annotationBody(body);

    return this.#locks.withLock(containerName, async () => {
      const found = await this.#metadataRecord(containerName);
      const envelope = await this.#envelope(containerName, annotationName);
      this.#checkEtag(envelope, etag);

      const next = { ...envelope, annotation, etag: randomUUID(), modified: this.#timestamp() };
      await this.#store.replaceOne(containerName, envelope._id, {
        annotation_name: next.annotation_name,
        annotation: next.annotation,
        etag: next.etag,
        created: next.created,
        modified: next.modified,
      });

      let fieldCounts = applyFieldCounts(found.metadata.fieldCounts, envelope.annotation, -1);
      fieldCounts = applyFieldCounts(fieldCounts, annotation, 1);
      await this.#saveMetadata(found.id, { ...found.metadata, fieldCounts, modifiedAt: next.modified });

      logger.debug("annotation.update", { container: containerName, details: { annotationName } });
      return { containerName, annotationName, etag: next.etag };
    });
  }

  /**
   * Remove an annotation; the token is checked when given. The container stays.
   */
  async deleteAnnotation(containerName: string, annotationName: string, etag?: string): Promise<void> {
    await this.#locks.withLock(containerName, async () => {
      const found = await this.#metadataRecord(containerName);
      const envelope = await this.#envelope(containerName, annotationName);
      if (etag !== undefined) {
        this.#checkEtag(envelope, etag);
      }

      await this.#store.deleteOne(containerName, envelope._id);
      await this.#saveMetadata(found.id, {
        ...found.metadata,
        fieldCounts: applyFieldCounts(found.metadata.fieldCounts, envelope.annotation, -1),
        modifiedAt: this.#timestamp(),
      });
    });
    logger.debug("annotation.delete", { container: containerName, details: { annotationName } });
  }

  async getFieldCounts(containerName: string): Promise<Record<string, number>> {
    const metadata = await this.#metadata(containerName);
    return sortFieldCounts(metadata.fieldCounts);
  }

  async getDistinctFieldValues(containerName: string, field: string): Promise<unknown[]> {
    validateField(field);
    await this.#metadata(containerName);
    return this.#store.distinct(containerName, ANNOTATION_FIELD_PREFIX + field);
  }

  // Container users

  async getContainerUsers(containerName: string): Promise<ContainerUser[]> {
    await this.#metadata(containerName);
    const entries = await this.#roles.listByContainer(containerName);
    return entries
      .map(({ userName, role }) => ({ userName, role }))
      .sort((a, b) => a.userName.localeCompare(b.userName));
  }

  /**
   * Assign roles, replacing each listed user's current role
   */
  async addContainerUsers(containerName: string, users: readonly ContainerUser[]): Promise<void> {
    await this.#metadata(containerName);
    for (const user of users) {
      await this.#roles.setRole(containerName, user.userName, user.role);
    }
  }

  /**
   * @returns whether the user had a role in the container
   */
  async removeContainerUser(containerName: string, userName: string): Promise<boolean> {
    await this.#metadata(containerName);
    return this.#roles.removeRole(containerName, userName);
  }

  /**
   * Container names grouped by the caller's role; the superuser sees all under ROOT
   */
  async getMyContainers(principal: Principal): Promise<Record<string, string[]>> {
    if (principal.kind === "superuser") {
      return { [ROOT_GROUP]: await this.listContainerNames() };
    }

    const grouped: Partial<Record<Role, string[]>> = {};
    for (const entry of await this.#roles.listByUser(principal.name)) {
      const names = grouped[entry.role] ?? [];
      names.push(entry.containerName);
      grouped[entry.role] = names;
    }
    const result: Record<string, string[]> = {};
    for (const [role, names] of Object.entries(grouped)) {
      result[role] = [...names].sort();
    }
    return result;
  }

  // Internals

  async #insertAnnotation(
    containerName: string,
    annotation: DocumentData,
    preferredName: string | undefined
  ): Promise<AnnotationIdentifier> {
    let annotationName = preferredName ?? randomUUID();
    while (await this.#findEnvelope(containerName, annotationName)) {
      annotationName = randomUUID();
    }

    const timestamp = this.#timestamp();
    const etag = randomUUID();
    await this.#store.insertOne(containerName, {
      annotation_name: annotationName,
      annotation,
      etag,
      created: timestamp,
      modified: timestamp,
    });
    return { containerName, annotationName, etag };
  }

  async #findEnvelope(containerName: string, annotationName: string): Promise<StoredEnvelope | undefined> {
    const doc = await this.#store.findOne(containerName, { annotation_name: annotationName });
    return doc ? parseEnvelope(doc, containerName) : undefined;
  }

  async #envelope(containerName: string, annotationName: string): Promise<StoredEnvelope> {
    const envelope = await this.#findEnvelope(containerName, annotationName);
    if (!envelope) {
      throw new AnnotationNotFoundError(containerName, annotationName);
    }
    return envelope;
  }

  #checkEtag(envelope: StoredEnvelope, etag: string): void {
    if (envelope.etag !== etag) {
      throw new ConflictError(
        `Annotation '${envelope.annotation_name}' has changed (etag ${etag} is not current)`
      );
    }
  }

  async #findMetadata(name: string): Promise<{ id: string; metadata: ContainerMetadata } | undefined> {
    const doc = await this.#store.findOne(CONTAINERS_COLLECTION, { name });
    if (!doc) return undefined;
    const parsed = ContainerMetadataSchema.safeParse(doc);
    if (!parsed.success) {
      logger.warn("container.metadata.invalid", { container: name, details: { id: doc._id } });
      return undefined;
    }
    return { id: doc._id, metadata: parsed.data };
  }

  async #metadataRecord(name: string): Promise<{ id: string; metadata: ContainerMetadata }> {
    const found = await this.#findMetadata(name);
    if (!found) {
      throw new ContainerNotFoundError(name);
    }
    return found;
  }

  async #metadata(name: string): Promise<ContainerMetadata> {
    return (await this.#metadataRecord(name)).metadata;
  }

  async #saveMetadata(id: string, metadata: ContainerMetadata): Promise<void> {
    await this.#store.replaceOne(CONTAINERS_COLLECTION, id, { ...metadata });
  }

  async #updateMetadata(
    name: string,
    update: (metadata: ContainerMetadata) => ContainerMetadata
  ): Promise<void> {
    await this.#locks.withLock(name, async () => {
      const found = await this.#metadataRecord(name);
      await this.#saveMetadata(found.id, update(found.metadata));
    });
  }

  async #info(metadata: ContainerMetadata): Promise<ContainerInfo> {
    return {
      id: this.#uris.containerUrl(metadata.name),
      name: metadata.name,
      label: metadata.label,
      created: metadata.createdAt,
      modified: metadata.modifiedAt,
      annotationCount: await this.#store.count(metadata.name, []),
      readOnlyForAnonymousUsers: metadata.readOnlyForAnonymousUsers,
    };
  }

  #timestamp(): string {
    return new Date(this.#now()).toISOString();
  }
}

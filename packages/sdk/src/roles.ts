/**
 * Persistent (container, user) → role assignments
 */

import { z } from "zod";
import { logger } from "./observability/logs.js";
import type { DocumentStore } from "./storage/document-store.js";
import { Mutex } from "./storage/mutex.js";
import { ROLES, type ContainerUserEntry, type Role, type StoredDocument } from "./types.js";

export const ROLES_COLLECTION = "_roles";

export const RoleSchema = z.enum(["ADMIN", "EDITOR", "GUEST"]);

const RoleRecordSchema = z.object({
  containerName: z.string(),
  userName: z.string(),
  role: RoleSchema,
});

/**
 * Role-store capability consumed by the access gate and the container service
 */
export interface RoleStore {
  getRole(containerName: string, userName: string): Promise<Role | undefined>;
  /** Assign a role, replacing any role the user had in the container */
  setRole(containerName: string, userName: string, role: Role): Promise<void>;
  /** @returns whether an assignment was removed */
  removeRole(containerName: string, userName: string): Promise<boolean>;
  listByContainer(containerName: string): Promise<ContainerUserEntry[]>;
  listByUser(userName: string): Promise<ContainerUserEntry[]>;
  /** Remove every assignment for a container; returns how many were removed */
  removeContainer(containerName: string): Promise<number>;
  /** Remove every assignment for a user; returns how many were removed */
  removeUser(userName: string): Promise<number>;
}

/**
 * Type guard for role names
 */
export function isRole(value: unknown): value is Role {
  return ROLES.some((role) => role === value);
}

/**
 * Role store kept in the `_roles` collection of a document store
 */
export class DocumentRoleStore implements RoleStore {
  readonly #store: DocumentStore;
  // Serializes read-modify-write on assignments
  readonly #writes = new Mutex();

  constructor(store: DocumentStore) {
    this.#store = store;
  }

  async getRole(containerName: string, userName: string): Promise<Role | undefined> {
    const doc = await this.#store.findOne(ROLES_COLLECTION, { containerName, userName });
    return doc ? this.#parse(doc)?.role : undefined;
  }

  async setRole(containerName: string, userName: string, role: Role): Promise<void> {
    await this.#writes.withLock(async () => {
      const record: ContainerUserEntry = { containerName, userName, role };
      const existing = await this.#store.findOne(ROLES_COLLECTION, { containerName, userName });
      if (existing) {
        await this.#store.replaceOne(ROLES_COLLECTION, existing._id, { ...record });
      } else {
        await this.#store.insertOne(ROLES_COLLECTION, { ...record });
      }
    });
    logger.info("roles.set", { container: containerName, details: { userName, role } });
  }

  async removeRole(containerName: string, userName: string): Promise<boolean> {
    const removed = await this.#writes.withLock(() =>
      this.#store.deleteMany(ROLES_COLLECTION, { containerName, userName })
    );
    return removed > 0;
  }

  async listByContainer(containerName: string): Promise<ContainerUserEntry[]> {
    return this.#list({ containerName });
  }

  async listByUser(userName: string): Promise<ContainerUserEntry[]> {
    return this.#list({ userName });
  }

  async removeContainer(containerName: string): Promise<number> {
    return this.#writes.withLock(() => this.#store.deleteMany(ROLES_COLLECTION, { containerName }));
  }

  async removeUser(userName: string): Promise<number> {
    return this.#writes.withLock(() => this.#store.deleteMany(ROLES_COLLECTION, { userName }));
  }

  async #list(filter: Record<string, string>): Promise<ContainerUserEntry[]> {
    const docs = await this.#store.find(ROLES_COLLECTION, filter);
    const entries: ContainerUserEntry[] = [];
    for (const doc of docs) {
      const entry = this.#parse(doc);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  #parse(doc: StoredDocument): ContainerUserEntry | undefined {
    const parsed = RoleRecordSchema.safeParse(doc);
    if (!parsed.success) {
      logger.warn("roles.record.invalid", { details: { id: doc._id } });
      return undefined;
    }
    return parsed.data;
  }
}

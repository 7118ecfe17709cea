/**
 * User registry: user name ↔ API key, and authentication by key
 */

import { z } from "zod";
import { SUPERUSER, namedUser } from "./access.js";
import { UserNotFoundError, ValidationError } from "./errors.js";
import { logger } from "./observability/logs.js";
import type { RoleStore } from "./roles.js";
import type { DocumentStore } from "./storage/document-store.js";
import { Mutex } from "./storage/mutex.js";
import type { Principal, StoredDocument, UserEntry } from "./types.js";
import { validateUserName } from "./validation.js";

export const USERS_COLLECTION = "_users";

export const UserEntrySchema = z.object({
  userName: z.string().min(1),
  apiKey: z.string().min(1),
});

export interface AddUsersResult {
  added: string[];
  /** Entries refused because the name or the API key is already taken */
  rejected: Array<{ userName: string; reason: string }>;
}

export interface UserStoreOptions {
  /** API key that authenticates as the superuser */
  rootApiKey?: string;
}

export class UserStore {
  readonly #store: DocumentStore;
  readonly #roles: RoleStore;
  readonly #rootApiKey: string | undefined;
  readonly #writes = new Mutex();

  constructor(store: DocumentStore, roles: RoleStore, options: UserStoreOptions = {}) {
    this.#store = store;
    this.#roles = roles;
    this.#rootApiKey = options.rootApiKey;
  }

  /**
   * Resolve an API key to the principal it stands for
   * @returns undefined for an unknown key
   */
  async authenticate(apiKey: string): Promise<Principal | undefined> {
    if (!apiKey) return undefined;
    if (this.#rootApiKey !== undefined && apiKey === this.#rootApiKey) {
      return SUPERUSER;
    }
    const doc = await this.#store.findOne(USERS_COLLECTION, { apiKey });
    const entry = doc ? this.#parse(doc) : undefined;
    return entry ? namedUser(entry.userName) : undefined;
  }

  async listUsers(): Promise<string[]> {
    const docs = await this.#store.find(USERS_COLLECTION);
    const names: string[] = [];
    for (const doc of docs) {
      const entry = this.#parse(doc);
      if (entry) names.push(entry.userName);
    }
    return names.sort();
  }

  async hasUser(userName: string): Promise<boolean> {
    return (await this.#store.findOne(USERS_COLLECTION, { userName })) !== undefined;
  }

  /**
   * Register users; entries whose name or key is taken are rejected, the rest added
   */
  async addUsers(entries: readonly UserEntry[]): Promise<AddUsersResult> {
    const parsed = entries.map((entry) => {
      const result = UserEntrySchema.safeParse(entry);
      if (!result.success) {
        throw new ValidationError(`Invalid user entry: ${result.error.issues[0]?.message ?? "malformed"}`);
      }
      validateUserName(result.data.userName);
      return result.data;
    });

    return this.#writes.withLock(async () => {
      const result: AddUsersResult = { added: [], rejected: [] };
      for (const entry of parsed) {
        if (await this.hasUser(entry.userName)) {
          result.rejected.push({ userName: entry.userName, reason: "user name already taken" });
          continue;
        }
        if (
          entry.apiKey === this.#rootApiKey ||
          (await this.#store.findOne(USERS_COLLECTION, { apiKey: entry.apiKey })) !== undefined
        ) {
          result.rejected.push({ userName: entry.userName, reason: "api key already taken" });
          continue;
        }
        await this.#store.insertOne(USERS_COLLECTION, { ...entry });
        result.added.push(entry.userName);
      }
      if (result.added.length > 0) {
        logger.info("users.add", { details: { added: result.added } });
      }
      return result;
    });
  }

  /**
   * Remove a user together with their role assignments
   * @throws UserNotFoundError
   */
  async deleteUser(userName: string): Promise<void> {
    await this.#writes.withLock(async () => {
      const removed = await this.#store.deleteMany(USERS_COLLECTION, { userName });
      if (removed === 0) {
        throw new UserNotFoundError(userName);
      }
    });
    const roles = await this.#roles.removeUser(userName);
    logger.info("users.delete", { details: { userName, roles } });
  }

  #parse(doc: StoredDocument): UserEntry | undefined {
    const parsed = UserEntrySchema.safeParse(doc);
    if (!parsed.success) {
      logger.warn("users.record.invalid", { details: { id: doc._id } });
      return undefined;
    }
    return parsed.data;
  }
}

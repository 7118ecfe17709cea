/**
 * Per-container access gate
 *
 * Authorization is membership of the caller's role in an explicit set per
 * operation. ADMIN appears in every set it should pass; there is no ranking
 * between roles.
 */

import { NotAuthorizedError } from "./errors.js";
import type { RoleStore } from "./roles.js";
import type { Principal, Role } from "./types.js";

/** Container and user management, index mutation */
export const ADMIN_ONLY: ReadonlySet<Role> = new Set<Role>(["ADMIN"]);

/** Content mutation */
export const ADMIN_OR_EDITOR: ReadonlySet<Role> = new Set<Role>(["ADMIN", "EDITOR"]);

/** Reading and searching */
export const ANY_ROLE: ReadonlySet<Role> = new Set<Role>(["ADMIN", "EDITOR", "GUEST"]);

export const SUPERUSER: Principal = Object.freeze({ kind: "superuser" });

export function namedUser(name: string): Principal {
  return Object.freeze({ kind: "user", name });
}

/**
 * Whether two (possibly anonymous) principals are the same caller
 */
export function samePrincipal(a: Principal | undefined, b: Principal | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  if (a.kind === "user" && b.kind === "user") {
    return a.name === b.name;
  }
  return a.kind === b.kind;
}

export function describePrincipal(principal: Principal | undefined): string {
  if (principal === undefined) return "anonymous";
  switch (principal.kind) {
    case "superuser":
      return "root";
    case "user":
      return principal.name;
  }
}

export class AccessGate {
  readonly #roles: RoleStore;

  constructor(roles: RoleStore) {
    this.#roles = roles;
  }

  /**
   * Let the call through or throw
   * @param anonymousAllowed - Whether this operation admits callers without a principal
   * @throws NotAuthorizedError
   */
  async authorize(
    principal: Principal | undefined,
    containerName: string,
    allowedRoles: ReadonlySet<Role>,
    anonymousAllowed: boolean
  ): Promise<void> {
    if (principal === undefined) {
      if (anonymousAllowed) return;
      throw new NotAuthorizedError("No authentication found");
    }

    switch (principal.kind) {
      case "superuser":
        return;
      case "user": {
        const role = await this.#roles.getRole(containerName, principal.name);
        if (role !== undefined && allowedRoles.has(role)) return;
        throw new NotAuthorizedError(
          `User ${principal.name} does not have access rights to this endpoint`
        );
      }
    }
  }

  /**
   * Non-throwing variant of `authorize`
   */
  async isAuthorized(
    principal: Principal | undefined,
    containerName: string,
    allowedRoles: ReadonlySet<Role>,
    anonymousAllowed: boolean
  ): Promise<boolean> {
    try {
      await this.authorize(principal, containerName, allowedRoles, anonymousAllowed);
      return true;
    } catch (err) {
      if (err instanceof NotAuthorizedError) return false;
      throw err;
    }
  }
}

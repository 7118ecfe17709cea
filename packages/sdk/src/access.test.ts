/**
 * Tests for the per-container access gate
 */

import { describe, it, expect } from "vitest";
import {
  ADMIN_ONLY,
  ADMIN_OR_EDITOR,
  ANY_ROLE,
  AccessGate,
  SUPERUSER,
  describePrincipal,
  namedUser,
  samePrincipal,
} from "./access.js";
import { NotAuthorizedError } from "./errors.js";
import type { RoleStore } from "./roles.js";
import type { ContainerUserEntry, Role } from "./types.js";

/**
 * In-memory role store keyed by "container/user"
 */
class MemoryRoleStore implements RoleStore {
  readonly roles = new Map<string, Role>();

  async getRole(containerName: string, userName: string): Promise<Role | undefined> {
    return this.roles.get(`${containerName}/${userName}`);
  }

  async setRole(containerName: string, userName: string, role: Role): Promise<void> {
    this.roles.set(`${containerName}/${userName}`, role);
  }

  async removeRole(containerName: string, userName: string): Promise<boolean> {
    return this.roles.delete(`${containerName}/${userName}`);
  }

  async listByContainer(containerName: string): Promise<ContainerUserEntry[]> {
    return this.#entries().filter((e) => e.containerName === containerName);
  }

  async listByUser(userName: string): Promise<ContainerUserEntry[]> {
    return this.#entries().filter((e) => e.userName === userName);
  }

  async removeContainer(): Promise<number> {
    return 0;
  }

  async removeUser(): Promise<number> {
    return 0;
  }

  #entries(): ContainerUserEntry[] {
    return [...this.roles].map(([key, role]) => {
      const [containerName = "", userName = ""] = key.split("/");
      return { containerName, userName, role };
    });
  }
}

describe("AccessGate", () => {
  const roles = new MemoryRoleStore();
  roles.roles.set("letters/ada", "ADMIN");
  roles.roles.set("letters/ed", "EDITOR");
  roles.roles.set("letters/gus", "GUEST");
  roles.roles.set("notes/nora", "ADMIN");
  const gate = new AccessGate(roles);

  it("should let the superuser through without any role", async () => {
    await expect(gate.authorize(SUPERUSER, "letters", ADMIN_ONLY, false)).resolves.toBeUndefined();
    await expect(gate.authorize(SUPERUSER, "anything", ADMIN_ONLY, false)).resolves.toBeUndefined();
  });

  it.each([
    ["ada", ADMIN_ONLY, true],
    ["ada", ADMIN_OR_EDITOR, true],
    ["ada", ANY_ROLE, true],
    ["ed", ADMIN_ONLY, false],
    ["ed", ADMIN_OR_EDITOR, true],
    ["ed", ANY_ROLE, true],
    ["gus", ADMIN_ONLY, false],
    ["gus", ADMIN_OR_EDITOR, false],
    ["gus", ANY_ROLE, true],
    ["nora", ANY_ROLE, false],
    ["stranger", ANY_ROLE, false],
  ] as const)("should decide %s against the role set by membership", async (user, set, allowed) => {
    expect(await gate.isAuthorized(namedUser(user), "letters", set, false)).toBe(allowed);
  });

  it("should name the user when refusing", async () => {
    await expect(gate.authorize(namedUser("gus"), "letters", ADMIN_ONLY, false)).rejects.toThrow(
      new NotAuthorizedError("User gus does not have access rights to this endpoint")
    );
  });

  it("should refuse a user even when anonymous access is allowed", async () => {
    expect(await gate.isAuthorized(namedUser("stranger"), "letters", ANY_ROLE, true)).toBe(false);
  });

  it("should admit anonymous callers only where the operation allows it", async () => {
    await expect(gate.authorize(undefined, "letters", ANY_ROLE, true)).resolves.toBeUndefined();
    await expect(gate.authorize(undefined, "letters", ANY_ROLE, false)).rejects.toThrow(
      "No authentication found"
    );
  });

  it("should pass on errors that are not authorization failures", async () => {
    const broken = new MemoryRoleStore();
    broken.getRole = async () => {
      throw new Error("roles offline");
    };

    await expect(
      new AccessGate(broken).isAuthorized(namedUser("ada"), "letters", ANY_ROLE, false)
    ).rejects.toThrow("roles offline");
  });
});

describe("principals", () => {
  it("should compare principals by kind and name", () => {
    expect(samePrincipal(namedUser("ada"), namedUser("ada"))).toBe(true);
    expect(samePrincipal(namedUser("ada"), namedUser("ed"))).toBe(false);
    expect(samePrincipal(SUPERUSER, { kind: "superuser" })).toBe(true);
    expect(samePrincipal(undefined, undefined)).toBe(true);
    expect(samePrincipal(undefined, namedUser("ada"))).toBe(false);
  });

  it("should describe principals", () => {
    expect(describePrincipal(undefined)).toBe("anonymous");
    expect(describePrincipal(SUPERUSER)).toBe("root");
    expect(describePrincipal(namedUser("ada"))).toBe("ada");
  });
});

/**
 * Store adapter for CLI
 * Opens the store under the resolved root and settles who the CLI acts as
 */

import {
  SUPERUSER,
  UserNotFoundError,
  namedUser,
  openAnnoStore,
  type AnnoStore,
  type Principal,
} from "@annostore/sdk";

export interface CliSession {
  store: AnnoStore;
  principal: Principal;
}

export interface CliStoreOptions {
  root: string;
  /** Act as this registered user instead of the superuser */
  user?: string;
  /** Base of the identifiers the store hands out */
  baseUrl?: string;
}

/**
 * Open a CLI session backed by the SDK
 * @throws UserNotFoundError when `user` is not registered
 */
export async function openCliStore(options: CliStoreOptions): Promise<CliSession> {
  const store = openAnnoStore({
    root: options.root,
    externalBaseUrl: options.baseUrl,
  });

  if (options.user === undefined) {
    return { store, principal: SUPERUSER };
  }

  const users = await store.listUsers(SUPERUSER);
  if (!users.includes(options.user)) {
    await store.close();
    throw new UserNotFoundError(options.user);
  }
  return { store, principal: namedUser(options.user) };
}

/**
 * Run `fn` in a session, waiting for background work before returning
 */
export async function withCliStore<T>(
  options: CliStoreOptions,
  fn: (session: CliSession) => Promise<T>
): Promise<T> {
  const session = await openCliStore(options);
  try {
    return await fn(session);
  } finally {
    await session.store.close();
  }
}

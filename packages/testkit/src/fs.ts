/**
 * Temporary stores for tests
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openAnnoStore } from "@annostore/sdk";
import type { AnnoStore, AnnoStoreOptions } from "@annostore/sdk";

/**
 * Create a unique temporary directory for a store root
 * @param prefix - Prefix for the temp directory (default: "annostore-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempStoreRoot(prefix = "annostore-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Run `fn` against a store opened on a fresh temp root, then close the store
 * and remove the root
 * @param options - Store options; `root` is always the temp directory
 */
export async function withTempStore<T>(
  fn: (store: AnnoStore, root: string) => Promise<T>,
  options: Omit<AnnoStoreOptions, "root"> = {}
): Promise<T> {
  const root = await createTempStoreRoot();
  let store: AnnoStore;
  try {
    store = openAnnoStore({ ...options, root });
  } catch (err) {
    await removeDir(root);
    throw err;
  }

  try {
    return await fn(store, root);
  } finally {
    try {
      await store.close();
    } finally {
      await removeDir(root);
    }
  }
}

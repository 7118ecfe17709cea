/**
 * Shared test helpers for AnnoStore packages
 */

export { createTempStoreRoot, removeDir, withTempStore } from "./fs.js";
export { sleep, waitFor, type WaitForOptions } from "./timers.js";

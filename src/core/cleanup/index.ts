/**
 * Cleanup module exports
 */

export { normalizeKeepCount, rotateArchives, selectForDeletion } from "./retention";

import fs from "fs/promises";
import path from "path";
import { logger } from "../logger.js";
import { fileAge, isNotFound } from "./utils/fsUtils.js";

export const INDEX_LOCK_FILE = "index.lock";

export type IndexLockState =
  | { status: "absent" }
  | { status: "removed"; ageMs: number | null }
  | { status: "busy"; ageMs: number };

/**
 * Inspects git's own `index.lock`. A marker at or past `maxAgeMs` is left over
 * from a crashed git process and gets deleted; a younger one belongs to a live
 * operation and is reported as busy without being touched.
 */
export async function clearStaleIndexLock(
  gitDir: string,
  maxAgeMs: number,
  now = Date.now(),
): Promise<IndexLockState> {
  const lockPath = path.join(gitDir, INDEX_LOCK_FILE);
  const age = await fileAge(lockPath, now);
  if (!age.exists) return { status: "absent" };

  if (age.ageMs !== null && age.ageMs < maxAgeMs) {
    return { status: "busy", ageMs: age.ageMs };
  }

  try {
    await fs.unlink(lockPath);
  } catch (error) {
    if (!isNotFound(error)) throw error;
  }
  const seconds = age.ageMs === null ? "unknown" : `${Math.floor(age.ageMs / 1000)}s`;
  logger.info(`Removed stale index.lock (age ${seconds}).`, { lockPath });
  return { status: "removed", ageMs: age.ageMs };
}

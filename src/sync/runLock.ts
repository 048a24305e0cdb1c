import fs from "fs/promises";
import type { FileHandle } from "fs/promises";
import { logger } from "../logger.js";
import { fileAge, isNotFound } from "../git/utils/fsUtils.js";
import { sleep } from "../util/time.js";

export const RUN_LOCK_FILE = "push.lock";

export type RunLockOptions = {
  timeoutMs: number;
  pollIntervalMs?: number;
  /** How long a lock file without a readable pid may exist before it counts as abandoned. */
  emptyLockGraceMs?: number;
  isProcessAlive?: (pid: number) => boolean;
};

export type RunLockHandle = {
  path: string;
  release(): Promise<void>;
};

export type LockedResult<T> =
  | { acquired: true; value: T }
  | { acquired: false };

const DEFAULT_EMPTY_LOCK_GRACE_MS = 5_000;

export function isProcessAlive(pid: number): boolean {
  try {
    // signal 0 only checks for existence
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return err instanceof Error && "code" in err && err.code === "EPERM";
  }
}

async function readLockPid(lockPath: string): Promise<number | undefined> {
  try {
    const content = (await fs.readFile(lockPath, "utf8")).trim();
    const pid = Number.parseInt(content, 10);
    if (Number.isNaN(pid) || pid <= 0) return undefined;
    return pid;
  } catch {
    return undefined;
  }
}

function isAlreadyExists(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

async function removeIfPresent(p: string) {
  try {
    await fs.unlink(p);
  } catch (error) {
    if (!isNotFound(error)) throw error;
  }
}

async function tryCreate(lockPath: string): Promise<boolean> {
  let handle: FileHandle;
  try {
    handle = await fs.open(lockPath, "wx");
  } catch (error) {
    if (isAlreadyExists(error)) return false;
    throw error;
  }
  try {
    await handle.writeFile(String(process.pid));
  } catch (error) {
    await handle.close();
    await removeIfPresent(lockPath);
    throw error;
  }
  await handle.close();
  return true;
}

type Abandonment = {
  isProcessAlive: (pid: number) => boolean;
  emptyLockGraceMs: number;
};

type HolderState =
  | { status: "gone" }
  | { status: "held" }
  | { status: "abandoned"; pid: number | null };

async function inspectHolder(lockPath: string, rules: Abandonment): Promise<HolderState> {
  const pid = await readLockPid(lockPath);
  if (pid !== undefined) {
    return rules.isProcessAlive(pid) ? { status: "held" } : { status: "abandoned", pid };
  }
  // no pid: either the creator is between open and write, or it died there
  const age = await fileAge(lockPath);
  if (!age.exists) return { status: "gone" };
  if (age.ageMs !== null && age.ageMs < rules.emptyLockGraceMs) return { status: "held" };
  return { status: "abandoned", pid: null };
}

/**
 * Removes an abandoned lock file. Reclaimers serialize on `<lock>.reclaim` and
 * re-inspect the lock under it, so a lock freshly created by another contender
 * is never the one deleted. Returns false when another process is reclaiming.
 */
async function reclaimAbandoned(lockPath: string, rules: Abandonment): Promise<boolean> {
  const guardPath = `${lockPath}.reclaim`;
  if (!(await tryCreate(guardPath))) {
    const guard = await inspectHolder(guardPath, rules);
    if (guard.status === "abandoned") {
      logger.warn("removing abandoned run lock guard", { guardPath, pid: guard.pid });
      await removeIfPresent(guardPath);
    }
    return false;
  }
  try {
    const holder = await inspectHolder(lockPath, rules);
    if (holder.status === "held") return false;
    if (holder.status === "abandoned") {
      logger.warn("removing abandoned run lock", { lockPath, pid: holder.pid });
      await removeIfPresent(lockPath);
    }
    return true;
  } finally {
    await removeIfPresent(guardPath);
  }
}

function handleFor(lockPath: string): RunLockHandle {
  let released = false;
  return {
    path: lockPath,
    async release() {
      if (released) return;
      released = true;
      await removeIfPresent(lockPath);
    },
  };
}

/**
 * Creates `lockPath` exclusively, waiting up to `timeoutMs` for a current holder
 * to let go. A lock left by a process that no longer exists, or one that never
 * got a pid written within the grace period, is reclaimed.
 * Resolves to null when the wait times out.
 */
export async function acquireRunLock(
  lockPath: string,
  options: RunLockOptions,
): Promise<RunLockHandle | null> {
  const pollIntervalMs = options.pollIntervalMs ?? 100;
  const rules: Abandonment = {
    isProcessAlive: options.isProcessAlive ?? isProcessAlive,
    emptyLockGraceMs: options.emptyLockGraceMs ?? DEFAULT_EMPTY_LOCK_GRACE_MS,
  };
  const deadline = Date.now() + options.timeoutMs;

  for (;;) {
    if (await tryCreate(lockPath)) return handleFor(lockPath);

    const holder = await inspectHolder(lockPath, rules);
    if (holder.status === "gone") continue;
    if (holder.status === "abandoned" && (await reclaimAbandoned(lockPath, rules))) continue;

    const remaining = deadline - Date.now();
    if (remaining <= 0) return null;
    await sleep(Math.min(pollIntervalMs, remaining));
  }
}

export async function withRunLock<T>(
  lockPath: string,
  options: RunLockOptions,
  action: () => Promise<T>,
): Promise<LockedResult<T>> {
  const lock = await acquireRunLock(lockPath, options);
  if (!lock) return { acquired: false };
  try {
    return { acquired: true, value: await action() };
  } finally {
    await lock.release();
  }
}

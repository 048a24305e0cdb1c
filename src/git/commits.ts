import { logger } from "../logger.js";
import { runGit } from "./core.js";
import { hasStagedChanges } from "./queries.js";

/**
 * Stages the whole working tree (untracked files included) and commits it
 * without running hooks. Returns false when nothing ended up staged.
 */
export async function commitAll(repoRoot: string, message: string): Promise<boolean> {
  await runGit(["add", "--all"], { cwd: repoRoot });
  if (!(await hasStagedChanges(repoRoot))) {
    logger.debug("commit skipped: no staged changes", { repoRoot });
    return false;
  }
  await runGit(["commit", "--no-verify", "-m", message], { cwd: repoRoot });
  logger.info("committed local changes", { message });
  return true;
}

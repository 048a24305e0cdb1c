import { logger } from "../logger.js";
import { GitCommandError, runGit } from "./core.js";
import { getConfigValues } from "./queries.js";

export function pushUrlKey(remote: string) {
  return `remote.${remote}.pushurl`;
}

async function unsetAll(repoRoot: string, key: string) {
  try {
    await runGit(["config", "--unset-all", key], { cwd: repoRoot });
  } catch (error) {
    // exit 5: nothing to unset
    if (error instanceof GitCommandError && error.exitCode === 5) return;
    throw error;
  }
}

export async function restorePushUrls(repoRoot: string, remote: string, previous: string[]) {
  const key = pushUrlKey(remote);
  await unsetAll(repoRoot, key);
  for (const value of previous) {
    await runGit(["config", "--add", key, value], { cwd: repoRoot });
  }
}

/**
 * Points `remote.<name>.pushurl` at `pushUrl` for the duration of `action`,
 * then puts back exactly the values that were configured before (none included).
 */
export async function withPushUrl<T>(
  repoRoot: string,
  remote: string,
  pushUrl: string,
  action: () => Promise<T>,
): Promise<T> {
  const key = pushUrlKey(remote);
  const previous = await getConfigValues(repoRoot, key);
  try {
    await runGit(["config", "--replace-all", key, pushUrl], { cwd: repoRoot });
    return await action();
  } finally {
    try {
      await restorePushUrls(repoRoot, remote, previous);
    } catch (error) {
      logger.error("failed to restore push url", { repoRoot, remote });
      throw error;
    }
  }
}

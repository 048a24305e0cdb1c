import { logger } from "../logger.js";
import { runGit } from "./core.js";
import { getConfigValue } from "./queries.js";

export type CommitterIdentity = {
  name: string;
  email: string;
};

export type IdentityOverrides = {
  name?: string;
  email?: string;
};

/**
 * Fills in `user.name` / `user.email` in the repository config when git has no
 * value for them at any level. Existing values are never replaced.
 *
 * Returns the keys that were written.
 */
export async function ensureIdentity(
  repoRoot: string,
  overrides: IdentityOverrides,
  defaults: CommitterIdentity,
): Promise<string[]> {
  const wanted: Array<[string, string]> = [
    ["user.name", overrides.name || defaults.name],
    ["user.email", overrides.email || defaults.email],
  ];
  const written: string[] = [];

  for (const [key, value] of wanted) {
    const existing = await getConfigValue(repoRoot, key);
    if (existing !== null) continue;
    await runGit(["config", key, value], { cwd: repoRoot });
    written.push(key);
  }

  if (written.length) {
    logger.debug("git identity configured", { repoRoot, keys: written });
  }
  return written;
}

import path from "path";
import { GitCommandError, runGit } from "./core.js";

export async function getCurrentBranch(repoRoot: string): Promise<string | null> {
  const res = await runGit(["rev-parse", "--abbrev-ref", "HEAD"], { cwd: repoRoot });
  const name = res.stdout.trim();
  if (!name || name === "HEAD") return null;
  return name;
}

// `git config --get` exits 1 when the key is unset; anything else is a real failure.
function isUnsetKey(error: unknown) {
  return error instanceof GitCommandError && error.exitCode === 1;
}

export async function getConfigValue(repoRoot: string, key: string): Promise<string | null> {
  try {
    const res = await runGit(["config", "--get", key], { cwd: repoRoot });
    const value = res.stdout.trim();
    return value.length ? value : null;
  } catch (error) {
    if (isUnsetKey(error)) return null;
    throw error;
  }
}

export async function getConfigValues(repoRoot: string, key: string): Promise<string[]> {
  try {
    const res = await runGit(["config", "--get-all", key], { cwd: repoRoot });
    return res.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean);
  } catch (error) {
    if (isUnsetKey(error)) return [];
    throw error;
  }
}

export async function getRemoteUrl(repoRoot: string, remote: string) {
  return getConfigValue(repoRoot, `remote.${remote}.url`);
}

// `diff --cached --quiet` exits 1 when the index differs from HEAD. Unlike
// `status --porcelain` it ignores what `add` cannot stage (dirty submodules).
export async function hasStagedChanges(repoRoot: string) {
  try {
    await runGit(["diff", "--cached", "--quiet"], { cwd: repoRoot });
    return false;
  } catch (error) {
    if (error instanceof GitCommandError && error.exitCode === 1) return true;
    throw error;
  }
}

export function gitDirFor(repoRoot: string) {
  return path.join(repoRoot, ".git");
}

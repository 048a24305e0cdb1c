#!/usr/bin/env node
import fs from "fs";
import { pathToFileURL } from "url";
import { cfg, loadSyncConfig } from "../config.js";
import { logger } from "../logger.js";
import { SyncRunner } from "../sync/SyncRunner.js";
import type { SyncOutcome } from "../sync/outcome.js";

export type SyncArgs =
  | { help: true }
  | { help: false; remote: string; branch?: string };

function printUsage() {
  console.error("Usage: git-autosync [remote] [branch]");
  console.error("");
  console.error("Examples:");
  console.error("  git-autosync");
  console.error("  git-autosync origin");
  console.error("  git-autosync origin release");
  console.error("");
  console.error("Environment:");
  console.error("  GITHUB_TOKEN=<token>        push credential (required)");
  console.error("  SKIP_PUSH=1                 do nothing");
  console.error("  SYNC_REPO_DIR=<path>        repository to sync (default: cwd)");
  console.error("  GIT_USER_NAME / GIT_USER_EMAIL   committer identity when unset");
}

export function parseSyncArgs(argv: string[]): SyncArgs {
  if (argv.some((a) => a === "-h" || a === "--help")) return { help: true };
  const positional = argv.filter((a) => a.trim().length > 0);
  if (positional.length > 2) {
    throw new Error(`Unexpected arguments: ${positional.slice(2).join(" ")}`);
  }
  const [remote, branch] = positional;
  return { help: false, remote: remote || "origin", branch: branch || undefined };
}

export function exitCodeFor(outcome: SyncOutcome) {
  return outcome.status === "failed" ? 1 : 0;
}

async function main() {
  let args: SyncArgs;
  try {
    args = parseSyncArgs(process.argv.slice(2));
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    printUsage();
    process.exitCode = 2;
    return;
  }
  if (args.help) {
    printUsage();
    return;
  }

  const runner = new SyncRunner({ repoRoot: cfg.repoDir, config: loadSyncConfig() });
  const outcome = await runner.run(args.remote, args.branch);
  if (outcome.status === "skipped") {
    logger.info(`sync skipped (${outcome.reason})`);
  }
  process.exitCode = exitCodeFor(outcome);
}

// npm links bins through symlinks, so compare against the resolved path
function invokedDirectly() {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  main().catch((err) => {
    logger.error("sync aborted", { error: err });
    process.exitCode = 1;
  });
}

import path from "path";
import { cfg, loadSyncConfig } from "../config.js";
import { logger } from "../logger.js";
import type { SyncConfig } from "../schema.js";
import { commitAll } from "../git/commits.js";
import { GitCommandError, runGit } from "../git/core.js";
import { ensureIdentity } from "../git/identity.js";
import { clearStaleIndexLock } from "../git/indexLock.js";
import { getCurrentBranch, getRemoteUrl, gitDirFor } from "../git/queries.js";
import { withPushUrl } from "../git/remoteUrl.js";
import { buildPushUrl, maskRemote, redactSecret } from "../git/utils/remoteUtils.js";
import { renderCommitMessage } from "../util/time.js";
import { REBASE_RECOVERY_HINT, SyncError, type SyncErrorDetails } from "./errors.js";
import { createFailureClassifier, type FailureClassifier } from "./failureClassifier.js";
import { failed, skipped, type PushMode, type SyncOutcome } from "./outcome.js";
import { RUN_LOCK_FILE, withRunLock } from "./runLock.js";

export type SyncRunnerOptions = {
  repoRoot: string;
  config: SyncConfig;
  classifier?: FailureClassifier;
  now?: () => Date;
  isProcessAlive?: (pid: number) => boolean;
};

export class SyncRunner {
  private readonly repoRoot: string;
  private readonly config: SyncConfig;
  private readonly classifier: FailureClassifier;
  private readonly now: () => Date;
  private readonly isProcessAlive?: (pid: number) => boolean;

  constructor(options: SyncRunnerOptions) {
    this.repoRoot = options.repoRoot;
    this.config = options.config;
    this.classifier =
      options.classifier ??
      createFailureClassifier({ transientNetwork: options.config.transientNetworkPatterns });
    this.now = options.now ?? (() => new Date());
    this.isProcessAlive = options.isProcessAlive;
  }

  get runLockPath() {
    return path.join(gitDirFor(this.repoRoot), RUN_LOCK_FILE);
  }

  /**
   * Commits local changes, rebases onto `<remote>/<branch>` and pushes with a
   * token-scoped push URL. Never throws: every fatal condition comes back as a
   * `failed` outcome.
   */
  async run(remote = "origin", branch?: string): Promise<SyncOutcome> {
    if (this.config.disabled) {
      logger.info("Skipping push because SKIP_PUSH is set.");
      return skipped("disabled", "sync disabled by SKIP_PUSH");
    }

    const token = this.config.credential?.trim();
    if (!token) {
      const error = new SyncError(
        "MissingCredential",
        "GITHUB_TOKEN is not set; refusing to sync without a push credential",
      );
      logger.error(error.message);
      return failed(error);
    }

    try {
      const locked = await withRunLock(
        this.runLockPath,
        {
          timeoutMs: this.config.lockTimeoutMs,
          pollIntervalMs: this.config.lockPollIntervalMs,
          isProcessAlive: this.isProcessAlive,
        },
        () => this.syncLocked(remote, branch || null, token),
      );
      if (!locked.acquired) {
        logger.info("Another update is already running; skipping.", { lockPath: this.runLockPath });
        return skipped("lock_contention", "another sync run holds the lock");
      }
      return locked.value;
    } catch (error) {
      const syncError = this.toSyncError(error, token);
      logger.error(`sync failed: ${syncError.message}`, {
        kind: syncError.kind,
        command: syncError.command,
        exitCode: syncError.exitCode,
      });
      return failed(syncError);
    }
  }

  private async syncLocked(remote: string, branchOverride: string | null, token: string): Promise<SyncOutcome> {
    const indexLock = await clearStaleIndexLock(
      gitDirFor(this.repoRoot),
      this.config.staleIndexLockMs,
      this.now().getTime(),
    );
    if (indexLock.status === "busy") {
      throw new SyncError(
        "ConcurrentOperation",
        `.git/index.lock exists and is recent (${Math.floor(indexLock.ageMs / 1000)}s); another git process is likely running`,
      );
    }

    await ensureIdentity(this.repoRoot, this.config.identity, this.config.defaultIdentity);

    const committed = await commitAll(
      this.repoRoot,
      renderCommitMessage(this.config.commitMessageTemplate, this.now(), this.config.timeZone),
    );

    const branch =
      branchOverride || (await getCurrentBranch(this.repoRoot)) || this.config.fallbackBranch;

    const pullSkip = await this.fetchAndRebase(remote, branch, token);
    if (pullSkip) return pullSkip;

    const pushUrl = await this.resolvePushUrl(remote, token);
    const pushMode = await withPushUrl(this.repoRoot, remote, pushUrl, () =>
      this.push(remote, branch, token),
    );

    logger.info(`Pushed to ${remote}/${branch}.`, { pushMode, committed });
    return { status: "success", remote, branch, committed, pushMode };
  }

  private async fetchAndRebase(remote: string, branch: string, token: string): Promise<SyncOutcome | null> {
    try {
      await runGit(["fetch", remote], { cwd: this.repoRoot });
      await runGit(["pull", "--rebase", remote, branch], { cwd: this.repoRoot });
      return null;
    } catch (error) {
      if (!(error instanceof GitCommandError)) throw error;
      const text = redactSecret(error.stderr || error.message, token);
      switch (this.classifier(text)) {
        case "transient_network":
          logger.warn("Low resources: skipping network git (will not push).", { stderr: text });
          return skipped("transient_network", text);
        case "index_lock":
          logger.warn("Live index.lock during pull; skipping this run.", { stderr: text });
          return skipped("index_lock_busy", text);
        case "conflict":
          logger.error(`Rebase conflict. ${REBASE_RECOVERY_HINT}`);
          throw new SyncError(
            "RebaseConflict",
            `Rebase onto ${remote}/${branch} stopped on a conflict. ${REBASE_RECOVERY_HINT}`,
            this.details(error, token),
          );
        default:
          throw error;
      }
    }
  }

  private async resolvePushUrl(remote: string, token: string): Promise<string> {
    const url = await getRemoteUrl(this.repoRoot, remote);
    if (!url) {
      throw new SyncError("InvalidRemote", `Remote '${remote}' has no configured url`);
    }
    try {
      return buildPushUrl(url, this.config.tokenUsername, token);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SyncError(
        "InvalidRemote",
        redactSecret(`Cannot derive an https push url for '${remote}' (${maskRemote(url)}): ${reason}`, token),
      );
    }
  }

  private async push(remote: string, branch: string, token: string): Promise<PushMode> {
    try {
      await runGit(["push", remote, branch], { cwd: this.repoRoot });
      return "plain";
    } catch (first) {
      if (!(first instanceof GitCommandError)) throw first;
      logger.warn("plain push rejected; retrying with explicit refspec", {
        remote,
        branch,
        stderr: redactSecret(first.stderr, token),
      });
    }

    try {
      await runGit(["push", remote, `HEAD:refs/heads/${branch}`, "-u"], { cwd: this.repoRoot });
      return "refspec";
    } catch (second) {
      if (!(second instanceof GitCommandError)) throw second;
      throw new SyncError(
        "PushRejected",
        `Push to ${remote}/${branch} was rejected`,
        this.details(second, token),
      );
    }
  }

  private details(error: GitCommandError, token: string): SyncErrorDetails {
    return {
      command: redactSecret(`git ${error.args.join(" ")}`, token),
      exitCode: error.exitCode,
      stderr: redactSecret(error.stderr, token),
    };
  }

  private toSyncError(error: unknown, token: string): SyncError {
    if (error instanceof SyncError) return error;
    if (error instanceof GitCommandError) {
      return new SyncError(
        "GitCommandFailed",
        redactSecret(error.message, token),
        this.details(error, token),
      );
    }
    const message = error instanceof Error ? error.message : String(error);
    return new SyncError("Unexpected", redactSecret(message, token));
  }
}

export type SyncRepositoryOptions = {
  repoRoot?: string;
  remote?: string;
  branch?: string;
  config?: SyncConfig;
};

/** One-call entry for scheduled jobs: environment config, current repository, `origin`. */
export async function syncRepository(options: SyncRepositoryOptions = {}): Promise<SyncOutcome> {
  const runner = new SyncRunner({
    repoRoot: options.repoRoot ?? cfg.repoDir,
    config: options.config ?? loadSyncConfig(),
  });
  return runner.run(options.remote, options.branch);
}

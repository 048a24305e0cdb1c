export { runGit, runGitProcess, __setRunGitImplForTests, gitEnv, GitCommandError } from "./git/core.js";
export type { RunGitImpl, GitRunOptions, GitRunResult } from "./git/core.js";

export { getCurrentBranch, getConfigValue, getConfigValues, getRemoteUrl, hasStagedChanges, gitDirFor } from "./git/queries.js";

export { commitAll } from "./git/commits.js";

export { ensureIdentity } from "./git/identity.js";
export type { CommitterIdentity, IdentityOverrides } from "./git/identity.js";

export { clearStaleIndexLock, INDEX_LOCK_FILE } from "./git/indexLock.js";
export type { IndexLockState } from "./git/indexLock.js";

export { withPushUrl, restorePushUrls, pushUrlKey } from "./git/remoteUrl.js";

export { parseRemote, toHttpsRemote, withTokenCredential, buildPushUrl, maskRemote, redactSecret } from "./git/utils/remoteUtils.js";
export type { ParsedRemote } from "./git/utils/remoteUtils.js";

export { SyncRunner, syncRepository } from "./sync/SyncRunner.js";
export type { SyncRunnerOptions, SyncRepositoryOptions } from "./sync/SyncRunner.js";
export { SyncError, isSyncError, REBASE_RECOVERY_HINT } from "./sync/errors.js";
export type { SyncErrorKind, SyncErrorDetails } from "./sync/errors.js";
export type { SyncOutcome, SkipReason, PushMode } from "./sync/outcome.js";
export { createFailureClassifier } from "./sync/failureClassifier.js";
export type { FailureClassifier, PullFailureKind, ClassifierPatterns } from "./sync/failureClassifier.js";
export { acquireRunLock, withRunLock, RUN_LOCK_FILE } from "./sync/runLock.js";
export type { RunLockHandle, RunLockOptions } from "./sync/runLock.js";
export { loadSyncConfig } from "./config.js";
export { SyncConfigSchema } from "./schema.js";
export type { SyncConfig } from "./schema.js";
export { formatTimestamp } from "./util/time.js";
export * from "./gitUtils.js";

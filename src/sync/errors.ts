// Lock contention and transient network failures are not errors: they come
// back as skipped outcomes (see SkipReason).
export type SyncErrorKind =
  | "MissingCredential"
  | "ConcurrentOperation"
  | "RebaseConflict"
  | "PushRejected"
  | "InvalidRemote"
  | "GitCommandFailed"
  | "Unexpected";

export type SyncErrorDetails = {
  command?: string;
  exitCode?: number | null;
  stderr?: string;
};

export class SyncError extends Error {
  readonly kind: SyncErrorKind;
  readonly command?: string;
  readonly exitCode?: number | null;
  readonly stderr?: string;

  constructor(kind: SyncErrorKind, message: string, details: SyncErrorDetails = {}) {
    super(message);
    this.name = "SyncError";
    this.kind = kind;
    this.command = details.command;
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
  }
}

export function isSyncError(error: unknown, kind?: SyncErrorKind): error is SyncError {
  return error instanceof SyncError && (kind === undefined || error.kind === kind);
}

export const REBASE_RECOVERY_HINT =
  "Resolve the conflicts, then run: git add -A && git rebase --continue";

import type { SyncError } from "./errors.js";

export type SkipReason =
  | "disabled"
  | "lock_contention"
  | "transient_network"
  | "index_lock_busy";

export type PushMode = "plain" | "refspec";

export type SyncOutcome =
  | {
      status: "success";
      remote: string;
      branch: string;
      committed: boolean;
      pushMode: PushMode;
    }
  | { status: "skipped"; reason: SkipReason; message: string }
  | { status: "failed"; error: SyncError };

export function skipped(reason: SkipReason, message: string): SyncOutcome {
  return { status: "skipped", reason, message };
}

export function failed(error: SyncError): SyncOutcome {
  return { status: "failed", error };
}

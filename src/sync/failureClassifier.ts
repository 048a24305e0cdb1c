export type PullFailureKind = "transient_network" | "index_lock" | "conflict";

/** Maps the text of a failed fetch/rebase to a known failure, or null when unrecognised. */
export type FailureClassifier = (message: string) => PullFailureKind | null;

export type ClassifierPatterns = {
  transientNetwork: Array<string | RegExp>;
  indexLock?: Array<string | RegExp>;
  conflict?: Array<string | RegExp>;
};

const DEFAULT_INDEX_LOCK: Array<string | RegExp> = ["index.lock"];
const DEFAULT_CONFLICT: Array<string | RegExp> = [/conflict/i, /merge/i];

function matches(message: string, patterns: Array<string | RegExp>) {
  return patterns.some((p) => (typeof p === "string" ? message.includes(p) : p.test(message)));
}

export function createFailureClassifier(patterns: ClassifierPatterns): FailureClassifier {
  const indexLock = patterns.indexLock ?? DEFAULT_INDEX_LOCK;
  const conflict = patterns.conflict ?? DEFAULT_CONFLICT;
  return (message) => {
    if (matches(message, patterns.transientNetwork)) return "transient_network";
    if (matches(message, indexLock)) return "index_lock";
    if (matches(message, conflict)) return "conflict";
    return null;
  };
}

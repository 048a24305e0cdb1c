import fs from "fs/promises";

export function isNotFound(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export type FileAge =
  | { exists: false }
  | { exists: true; ageMs: number | null };

// ageMs is null when the file exists but its mtime cannot be read.
export async function fileAge(p: string, now = Date.now()): Promise<FileAge> {
  try {
    const stat = await fs.stat(p);
    return { exists: true, ageMs: Math.max(0, now - stat.mtimeMs) };
  } catch (error) {
    if (isNotFound(error)) return { exists: false };
    return { exists: true, ageMs: null };
  }
}

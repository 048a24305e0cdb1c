import { execFile } from "child_process";
import { promisify } from "util";

const execGit = promisify(execFile);

export type GitRunOptions = { cwd?: string };
export type GitRunResult = { stdout: string; stderr?: string };

// Allow tests to override how git is executed without relying on spy semantics on ESM exports
export type RunGitImpl = (args: string[], options?: GitRunOptions) => Promise<GitRunResult>;
let runGitImpl: RunGitImpl | null = null;

export class GitCommandError extends Error {
  readonly args: string[];
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(args: string[], exitCode: number | null, stderr: string, stdout = "") {
    const detail = stderr.trim() || stdout.trim();
    super(
      `git ${args.join(" ")} failed${exitCode === null ? "" : ` (exit ${exitCode})`}${detail ? `: ${detail}` : ""}`,
    );
    this.name = "GitCommandError";
    this.args = args;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

export function gitEnv(base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const env = { ...base };
  if (env.GIT_TERMINAL_PROMPT === undefined) env.GIT_TERMINAL_PROMPT = "0";
  return env;
}

function textOf(value: unknown) {
  if (typeof value === "string") return value;
  if (Buffer.isBuffer(value)) return value.toString("utf8");
  return "";
}

function toGitCommandError(args: string[], error: unknown): GitCommandError {
  if (error instanceof GitCommandError) return error;
  if (error instanceof Error) {
    const code = "code" in error ? error.code : undefined;
    const stderr = "stderr" in error ? textOf(error.stderr) : "";
    const stdout = "stdout" in error ? textOf(error.stdout) : "";
    return new GitCommandError(
      args,
      typeof code === "number" ? code : null,
      stderr || error.message,
      stdout,
    );
  }
  return new GitCommandError(args, null, String(error));
}

/** Spawns the git executable; what `runGit` uses unless a test replaces it. */
export async function runGitProcess(args: string[], options: GitRunOptions = {}): Promise<GitRunResult> {
  return execGit("git", args, { cwd: options.cwd, env: gitEnv() });
}

export async function runGit(args: string[], options: GitRunOptions = {}): Promise<GitRunResult> {
  try {
    return await (runGitImpl ?? runGitProcess)(args, options);
  } catch (error) {
    throw toGitCommandError(args, error);
  }
}

// Test-only hook to override git execution
export function __setRunGitImplForTests(impl?: RunGitImpl | null) {
  runGitImpl = impl || null;
}

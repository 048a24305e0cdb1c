import { describe, it, expect } from "vitest";
import { __setRunGitImplForTests } from "../src/git/core.js";
import { getConfigValue, getCurrentBranch, hasStagedChanges } from "../src/git/queries.js";
import { FakeGit } from "./helpers/fakeGit.js";

describe("git queries", () => {
  it("returns the checked-out branch", async () => {
    __setRunGitImplForTests(new FakeGit({ branch: "release" }).impl);
    expect(await getCurrentBranch("/repo")).toBe("release");
  });

  it("returns null on a detached head", async () => {
    __setRunGitImplForTests(new FakeGit({ branch: null }).impl);
    expect(await getCurrentBranch("/repo")).toBeNull();
  });

  it("maps an unset config key to null", async () => {
    __setRunGitImplForTests(new FakeGit().impl);
    expect(await getConfigValue("/repo", "user.name")).toBeNull();
  });

  it("rethrows config failures that are not an unset key", async () => {
    const git = new FakeGit().fail("config --get", "fatal: not in a git directory", { exitCode: 128 });
    __setRunGitImplForTests(git.impl);
    await expect(getConfigValue("/repo", "user.name")).rejects.toMatchObject({ exitCode: 128 });
  });

  it("reads staged changes from the diff --cached exit code", async () => {
    __setRunGitImplForTests(new FakeGit({ pending: ["notes.md"] }).impl);
    expect(await hasStagedChanges("/repo")).toBe(true);
    __setRunGitImplForTests(new FakeGit().impl);
    expect(await hasStagedChanges("/repo")).toBe(false);
  });

  it("rethrows diff failures other than exit 1", async () => {
    const git = new FakeGit().fail("diff --cached", "fatal: bad object HEAD", { exitCode: 128 });
    __setRunGitImplForTests(git.impl);
    await expect(hasStagedChanges("/repo")).rejects.toMatchObject({ exitCode: 128 });
  });
});

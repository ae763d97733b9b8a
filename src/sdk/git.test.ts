import { describe, expect, it } from "vitest";
import { CommandError } from "../errors.js";
import { FakeSystem } from "../test/fakeSystem.js";
import { createGitClient, parseLeftRightCount } from "./git.js";

const ROOT = "/home/dev/development/flutter";

describe("parseLeftRightCount", () => {
  it("reads origin on the left and local on the right", () => {
    expect(parseLeftRightCount("3\t5\n")).toEqual({ remoteAhead: 3, localAhead: 5 });
  });

  it("rejects anything else", () => {
    expect(parseLeftRightCount("")).toBeUndefined();
    expect(parseLeftRightCount("fatal: bad revision")).toBeUndefined();
  });
});

describe("createGitClient", () => {
  it("clones a single shallow branch", async () => {
    const system = new FakeSystem();
    await createGitClient(system).clone("https://example.com/flutter.git", "beta", ROOT);
    expect(system.lines).toEqual([
      `git clone --depth 1 -b beta https://example.com/flutter.git ${ROOT}`,
    ]);
  });

  it("fetches the channel with an explicit refspec inside the root", async () => {
    const system = new FakeSystem();
    await createGitClient(system).fetchBranch(ROOT, "stable");
    expect(system.calls[0]).toMatchObject({
      cwd: ROOT,
      line: "git fetch --prune origin +refs/heads/stable:refs/remotes/origin/stable",
    });
  });

  it("reports a failed set-url without throwing", async () => {
    const system = new FakeSystem();
    system.respond = () => ({ exitCode: 2 });
    expect(await createGitClient(system).setRemoteUrl(ROOT, "u")).toBe(false);
  });

  it("distinguishes local branches by probing", async () => {
    const system = new FakeSystem();
    system.respond = (call) => ({ exitCode: call.args.includes("refs/heads/beta") ? 0 : 1 });
    const git = createGitClient(system);
    expect(await git.hasLocalBranch(ROOT, "beta")).toBe(true);
    expect(await git.hasLocalBranch(ROOT, "stable")).toBe(false);
    expect(system.calls).toEqual([]);
  });

  it("creates a tracking branch from origin", async () => {
    const system = new FakeSystem();
    await createGitClient(system).checkoutTracking(ROOT, "beta");
    expect(system.lines).toEqual(["git checkout -b beta origin/beta"]);
  });

  it("turns a refused fast-forward into false", async () => {
    const system = new FakeSystem();
    system.respond = () => ({ exitCode: 128, stderr: "fatal: Not possible to fast-forward" });
    expect(await createGitClient(system).mergeFastForward(ROOT, "origin/stable")).toBe(false);
  });

  it("reports a diverged checkout as no fast-forward in dry-run mode", async () => {
    const system = new FakeSystem(true);
    system.respond = (call) => ({ exitCode: call.args[0] === "merge-base" ? 1 : 0 });
    expect(await createGitClient(system).mergeFastForward(ROOT, "origin/stable")).toBe(false);
    expect(system.probes.map((p) => p.line)).toEqual([
      "git merge-base --is-ancestor HEAD origin/stable",
    ]);
    expect(system.calls).toEqual([]);
  });

  it("plans the merge in dry-run mode when HEAD is behind the remote", async () => {
    const system = new FakeSystem(true);
    expect(await createGitClient(system).mergeFastForward(ROOT, "origin/stable")).toBe(true);
    expect(system.lines).toEqual(["git merge --ff-only origin/stable"]);
  });

  it("rethrows when git could not be started", async () => {
    const system = new FakeSystem();
    system.exec = async () => {
      throw new CommandError("git merge", undefined, "spawn git ENOENT");
    };
    await expect(
      createGitClient(system).mergeFastForward(ROOT, "origin/stable")
    ).rejects.toThrow("spawn git ENOENT");
  });

  it("counts divergence and reads the current branch", async () => {
    const system = new FakeSystem();
    system.respond = (call) =>
      call.args[0] === "rev-list" ? { stdout: "1\t4\n" } : { stdout: "beta\n" };
    const git = createGitClient(system);
    expect(await git.countDivergence(ROOT, "beta")).toEqual({ remoteAhead: 1, localAhead: 4 });
    expect(await git.currentBranch(ROOT)).toBe("beta");
    expect(system.probes.map((p) => p.line)).toEqual([
      "git rev-list --left-right --count origin/beta...beta",
      "git rev-parse --abbrev-ref HEAD",
    ]);
  });

  it("treats a detached HEAD as no branch", async () => {
    const system = new FakeSystem();
    system.respond = () => ({ stdout: "HEAD\n" });
    expect(await createGitClient(system).currentBranch(ROOT)).toBeUndefined();
  });
});

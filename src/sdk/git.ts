import { CommandError } from "../errors.js";
import type { SystemPort } from "../system.js";

export interface DivergenceCounts {
  /** Commits on the local branch missing from the remote. */
  localAhead: number;
  /** Commits on the remote tracking branch missing locally. */
  remoteAhead: number;
}

/** The git verbs the SDK synchronizer needs, scoped to one checkout root. */
export interface GitClient {
  clone(url: string, branch: string, root: string): Promise<void>;
  setRemoteUrl(root: string, url: string): Promise<boolean>;
  fetchBranch(root: string, branch: string): Promise<void>;
  hasLocalBranch(root: string, branch: string): Promise<boolean>;
  checkout(root: string, branch: string): Promise<void>;
  checkoutTracking(root: string, branch: string): Promise<void>;
  /** Returns false when a fast-forward is impossible. */
  mergeFastForward(root: string, ref: string): Promise<boolean>;
  countDivergence(root: string, branch: string): Promise<DivergenceCounts | undefined>;
  resetHard(root: string, ref: string): Promise<void>;
  currentBranch(root: string): Promise<string | undefined>;
}

/** Parse `git rev-list --left-right --count origin/x...x` output ("<left>\t<right>"). */
export function parseLeftRightCount(output: string): DivergenceCounts | undefined {
  const match = output.trim().match(/^(\d+)\s+(\d+)$/);
  if (!match) return undefined;
  return { remoteAhead: Number(match[1]), localAhead: Number(match[2]) };
}

export function createGitClient(system: SystemPort): GitClient {
  const git = (root: string, args: string[], allowFailure = false) =>
    system.exec("git", args, { cwd: root, allowFailure });

  return {
    async clone(url, branch, root) {
      await system.exec("git", ["clone", "--depth", "1", "-b", branch, url, root]);
    },

    async setRemoteUrl(root, url) {
      const result = await git(root, ["remote", "set-url", "origin", url], true);
      return result.exitCode === 0;
    },

    async fetchBranch(root, branch) {
      await git(root, [
        "fetch",
        "--prune",
        "origin",
        `+refs/heads/${branch}:refs/remotes/origin/${branch}`,
      ]);
    },

    async hasLocalBranch(root, branch) {
      const result = await system.probe(
        "git",
        ["rev-parse", "--verify", "--quiet", `refs/heads/${branch}`],
        { cwd: root }
      );
      return result.exitCode === 0;
    },

    async checkout(root, branch) {
      await git(root, ["checkout", branch]);
    },

    async checkoutTracking(root, branch) {
      await git(root, ["checkout", "-b", branch, `origin/${branch}`]);
    },

    async mergeFastForward(root, ref) {
      if (system.dryRun) {
        // The merge only gets logged, so ask git whether it would fast-forward.
        const ancestry = await system.probe(
          "git",
          ["merge-base", "--is-ancestor", "HEAD", ref],
          { cwd: root }
        );
        if (ancestry.exitCode !== 0) return false;
      }
      try {
        await git(root, ["merge", "--ff-only", ref]);
        return true;
      } catch (err: unknown) {
        if (err instanceof CommandError && err.code !== undefined) return false;
        throw err;
      }
    },

    async countDivergence(root, branch) {
      const result = await system.probe(
        "git",
        ["rev-list", "--left-right", "--count", `origin/${branch}...${branch}`],
        { cwd: root }
      );
      return result.exitCode === 0 ? parseLeftRightCount(result.stdout) : undefined;
    },

    async resetHard(root, ref) {
      await git(root, ["reset", "--hard", ref]);
    },

    async currentBranch(root) {
      const result = await system.probe(
        "git",
        ["rev-parse", "--abbrev-ref", "HEAD"],
        { cwd: root }
      );
      const branch = result.stdout.trim();
      return result.exitCode === 0 && branch && branch !== "HEAD" ? branch : undefined;
    },
  };
}

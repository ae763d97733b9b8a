import { dirname, join } from "node:path";
import type { Channel, UpdateMode } from "../config.js";
import { SdkSyncError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Confirm } from "../prompt.js";
import type { SystemPort } from "../system.js";
import type { DivergenceCounts, GitClient } from "./git.js";

// ─── SDK checkout synchronization ──────────────────────────────────
//
//   absent ──clone──────────────────────────────▶ cloned
//   present ─fetch─▶ merge --ff-only ─ok────────▶ fast-forwarded
//                         │ fails
//                         ▼
//                      diverged ─skip───────────▶ diverged-skipped
//                         │ reset/confirm
//                         ├─yes─ reset --hard ──▶ reset
//                         └─no──────────────────▶ reset-declined
//
// `reclone` removes the root first so every run starts from `absent`.

export interface SyncRequest {
  root: string;
  url: string;
  channel: Channel;
  mode: UpdateMode;
}

export type SyncOutcome =
  | { kind: "cloned"; recloned: boolean }
  | { kind: "fast-forwarded" }
  | { kind: "diverged-skipped" }
  | { kind: "reset"; counts: DivergenceCounts | undefined }
  | { kind: "reset-declined"; counts: DivergenceCounts | undefined };

export interface SynchronizerDeps {
  git: GitClient;
  system: Pick<SystemPort, "exists" | "isEmptyDir" | "mkdir" | "remove">;
  confirm: Confirm;
  logger: Logger;
}

export interface SdkCheckout {
  root: string;
  exists: boolean;
  isRepository: boolean;
  branch?: string;
  counts?: DivergenceCounts;
}

async function isRepository(
  system: SynchronizerDeps["system"],
  root: string
): Promise<boolean> {
  return system.exists(join(root, ".git"));
}

async function wrap<T>(action: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err: unknown) {
    throw new SdkSyncError(`Failed to ${action}: ${errorMessage(err)}`);
  }
}

async function cloneSdk(
  request: SyncRequest,
  deps: SynchronizerDeps,
  recloned: boolean
): Promise<SyncOutcome> {
  const { root, url, channel } = request;
  const { system, git, logger } = deps;

  if ((await system.exists(root)) && !(await system.isEmptyDir(root))) {
    throw new SdkSyncError(
      `${root} exists but is not a git checkout. Remove it or re-run with --flutter-update reclone.`
    );
  }

  await system.mkdir(dirname(root));
  logger.info(`Cloning Flutter (${channel}) to ${root}…`);
  await wrap("clone Flutter", () => git.clone(url, channel, root));
  logger.success(`Flutter ${channel} cloned.`);
  return { kind: "cloned", recloned };
}

async function resolveDivergence(
  request: SyncRequest,
  deps: SynchronizerDeps
): Promise<SyncOutcome> {
  const { root, channel, mode } = request;
  const { git, confirm, logger } = deps;
  const remoteRef = `origin/${channel}`;

  if (mode === "skip") {
    logger.warning(
      "Flutter repo has diverged; skipping update (per --flutter-update skip)."
    );
    return { kind: "diverged-skipped" };
  }

  logger.warning(`Flutter repo has diverged from ${remoteRef}.`);
  const counts = await git.countDivergence(root, channel);
  logger.info(
    `Local ahead by: ${counts?.localAhead ?? 0}; origin ahead by: ${counts?.remoteAhead ?? 0}`
  );

  const approved = await confirm(
    `Hard reset Flutter to ${remoteRef} now? This discards local changes.`
  );
  if (!approved) {
    logger.warning(
      "Skipped reset. You can re-run with: --flutter-update reclone (or fix manually)."
    );
    return { kind: "reset-declined", counts };
  }

  await wrap(`reset Flutter to ${remoteRef}`, () => git.resetHard(root, remoteRef));
  logger.success(`Reset Flutter to ${remoteRef}.`);
  return { kind: "reset", counts };
}

/** Bring the SDK checkout at `request.root` onto `request.channel`. */
export async function synchronizeSdk(
  request: SyncRequest,
  deps: SynchronizerDeps
): Promise<SyncOutcome> {
  const { root, url, channel, mode } = request;
  const { system, git, logger } = deps;

  if (mode === "reclone" && (await system.exists(root))) {
    logger.warning(`Recloning Flutter (${channel}) into ${root}…`);
    await system.remove(root);
    return cloneSdk(request, { ...deps, system: absentRoot(system, root) }, true);
  }

  if (!(await isRepository(system, root))) {
    return cloneSdk(request, deps, false);
  }

  logger.info(`Updating Flutter (${channel}) at ${root}…`);
  if (!(await git.setRemoteUrl(root, url))) {
    logger.debug("git remote set-url failed; keeping the existing origin.");
  }
  await wrap("fetch Flutter", () => git.fetchBranch(root, channel));

  await wrap(`check out ${channel}`, async () => {
    if (await git.hasLocalBranch(root, channel)) {
      await git.checkout(root, channel);
    } else {
      await git.checkoutTracking(root, channel);
    }
  });

  if (await git.mergeFastForward(root, `origin/${channel}`)) {
    logger.success(`Fast-forwarded Flutter to origin/${channel}.`);
    return { kind: "fast-forwarded" };
  }

  return resolveDivergence(request, deps);
}

/**
 * After a (possibly dry-run) removal the root must read as gone, otherwise
 * the clone step would refuse the still-present directory.
 */
function absentRoot(
  system: SynchronizerDeps["system"],
  root: string
): SynchronizerDeps["system"] {
  return {
    exists: async (path) => (path === root ? false : system.exists(path)),
    isEmptyDir: (path) => system.isEmptyDir(path),
    mkdir: (path) => system.mkdir(path),
    remove: (path) => system.remove(path),
  };
}

/** Read-only report of the checkout at `root`. */
export async function inspectSdk(
  root: string,
  deps: Pick<SynchronizerDeps, "git" | "system">
): Promise<SdkCheckout> {
  const { git, system } = deps;
  const exists = await system.exists(root);
  if (!exists || !(await isRepository(system, root))) {
    return { root, exists, isRepository: false };
  }
  const branch = await git.currentBranch(root);
  const counts = branch ? await git.countDivergence(root, branch) : undefined;
  return { root, exists, isRepository: true, branch, counts };
}

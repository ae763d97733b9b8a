import { PrerequisiteError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { Platform } from "./platforms.js";
import { prependToPath } from "./sdk/path.js";
import type { SystemPort } from "./system.js";

const HOMEBREW_INSTALL_URL =
  "https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh";
const APPLE_SILICON_BREW_PREFIX = "/opt/homebrew";

export interface BrewPackage {
  name: string;
  cask?: boolean;
}

export const REQUIRED_PACKAGES: readonly BrewPackage[] = [
  { name: "git" },
  { name: "cocoapods" },
];

export const ANDROID_PACKAGES: readonly BrewPackage[] = [
  { name: "temurin", cask: true },
  { name: "android-commandlinetools", cask: true },
];

export interface PrerequisiteDeps {
  system: SystemPort;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
}

function brewArgs(verb: "list" | "install", pkg: BrewPackage): string[] {
  return pkg.cask ? [verb, "--cask", pkg.name] : [verb, pkg.name];
}

/** Install a Homebrew formula or cask unless `brew list` already knows it. */
export async function ensureInstalled(
  pkg: BrewPackage,
  deps: PrerequisiteDeps
): Promise<"present" | "installed"> {
  const { system, logger } = deps;
  const listed = await system.probe("brew", brewArgs("list", pkg));
  if (listed.exitCode === 0) {
    logger.debug(`${pkg.name} already installed`);
    return "present";
  }
  logger.info(`Installing ${pkg.name}…`);
  try {
    await system.exec("brew", brewArgs("install", pkg));
  } catch (err: unknown) {
    throw new PrerequisiteError(`Failed to install ${pkg.name}: ${errorMessage(err)}`);
  }
  logger.success(`${pkg.name} installed`);
  return "installed";
}

async function ensureXcodeTools(deps: PrerequisiteDeps): Promise<void> {
  const { system, logger } = deps;
  if (!(await system.commandExists("xcode-select"))) {
    throw new PrerequisiteError(
      "xcode-select missing; install Xcode Command Line Tools."
    );
  }
  const selected = await system.probe("xcode-select", ["-p"]);
  if (selected.exitCode === 0) {
    logger.debug(`Xcode Command Line Tools at ${selected.stdout.trim()}`);
    return;
  }
  logger.warning("Xcode Command Line Tools not found, starting the installer…");
  await system.exec("xcode-select", ["--install"], { allowFailure: true });
  throw new PrerequisiteError(
    "Finish the Xcode Command Line Tools installation in the popup window, then re-run."
  );
}

async function ensureHomebrew(deps: PrerequisiteDeps): Promise<void> {
  const { system, logger } = deps;
  const env = deps.env ?? process.env;
  const addBrewToPath = async () => {
    if (await system.exists(`${APPLE_SILICON_BREW_PREFIX}/bin/brew`)) {
      env.PATH = prependToPath(env.PATH, `${APPLE_SILICON_BREW_PREFIX}/sbin`);
      env.PATH = prependToPath(env.PATH, `${APPLE_SILICON_BREW_PREFIX}/bin`);
    }
  };

  await addBrewToPath();
  if (await system.commandExists("brew")) {
    logger.debug("Homebrew found");
    return;
  }

  logger.warning("Homebrew not found, installing…");
  try {
    await system.exec(
      "/bin/bash",
      ["-c", `/bin/bash -c "$(curl -fsSL ${HOMEBREW_INSTALL_URL})"`],
      { env: { NONINTERACTIVE: "1" } }
    );
  } catch (err: unknown) {
    throw new PrerequisiteError(`Failed to install Homebrew: ${errorMessage(err)}`);
  }
  await addBrewToPath();
  if (!system.dryRun && !(await system.commandExists("brew"))) {
    throw new PrerequisiteError(
      "Homebrew was installed but `brew` is not on PATH; open a new shell and re-run."
    );
  }
  logger.success("Homebrew installed");
}

/** Check for (and install) everything the SDK and the selected platforms need. */
export async function ensurePrerequisites(
  platforms: readonly Platform[],
  deps: PrerequisiteDeps
): Promise<void> {
  const { system, logger } = deps;

  await ensureXcodeTools(deps);
  await ensureHomebrew(deps);

  for (const pkg of REQUIRED_PACKAGES) await ensureInstalled(pkg, deps);

  if (platforms.includes("android")) {
    for (const pkg of ANDROID_PACKAGES) await ensureInstalled(pkg, deps);
  }

  if (platforms.includes("ios")) {
    try {
      await system.exec("pod", ["repo", "update"]);
    } catch (err: unknown) {
      logger.warning(
        `pod repo update failed; CocoaPods specs may be stale. ${errorMessage(err)}`
      );
    }
  }

  logger.success("Prerequisites satisfied");
}

import type { EnvironmentConfig, RunConfig } from "./config.js";
import { bootstrapProject } from "./bootstrap/bootstrapper.js";
import { runDoctor } from "./doctor.js";
import { errorMessage } from "./errors.js";
import { enablePlatforms, generateProject } from "./generator.js";
import type { Logger } from "./logger.js";
import { ensurePrerequisites } from "./prerequisites.js";
import type { Confirm } from "./prompt.js";
import { createGitClient, type GitClient } from "./sdk/git.js";
import { persistSdkPath } from "./sdk/path.js";
import { synchronizeSdk, type SyncOutcome } from "./sdk/synchronizer.js";
import type { SystemPort } from "./system.js";

const TOTAL_STEPS = 6;

export interface SetupDeps {
  environment: EnvironmentConfig;
  system: SystemPort;
  logger: Logger;
  confirm: Confirm;
  git?: GitClient;
  /** Process environment whose PATH receives the SDK and Homebrew. */
  env?: NodeJS.ProcessEnv;
}

export interface SetupResult {
  sdk: SyncOutcome;
  project: "created" | "skipped";
  projectPath: string;
}

function summarize(config: RunConfig, logger: Logger): void {
  logger.header(`Setting up Flutter for: ${config.projectName}`);
  logger.label("Template", config.template);
  logger.label("Org", config.org);
  logger.label("Channel", config.channel);
  logger.label("Out dir", config.outputDir);
  logger.label("Platforms", config.platforms.join(" "));
  logger.label("Package name", config.packageName);
  logger.label("Flutter update mode", config.updateMode);
  if (config.template === "plugin") {
    logger.label(
      "Plugin langs",
      `iOS: ${config.iosLanguage}  Android: ${config.androidLanguage}`
    );
  }
  if (config.dryRun) logger.warning("Dry-run mode: nothing will be changed.");
}

function nextSteps(config: RunConfig, environment: EnvironmentConfig, logger: Logger): void {
  logger.header("Next steps");
  logger.info(`source ${environment.profilePath}`);
  logger.info(`cd "${config.projectPath}"`);
  logger.info("make run            # Chrome");
  logger.info("make run_ios        # iOS Simulator");
  logger.info("make run_android    # Android Emulator");
  logger.info("make test           # unit + widget tests");
  logger.info("make analyze        # lints");
  logger.info(
    "If flutter doctor listed issues, fix them (Android SDK, Xcode signing, licenses) and re-run."
  );
}

/** Run the whole pipeline: prerequisites → SDK → doctor → create → bootstrap. */
export async function runSetup(config: RunConfig, deps: SetupDeps): Promise<SetupResult> {
  const { environment, system, logger, confirm } = deps;
  const git = deps.git ?? createGitClient(system);
  const sdkRoot = environment.sdkRoot;

  summarize(config, logger);

  logger.step(1, TOTAL_STEPS, "Checking prerequisites");
  await ensurePrerequisites(config.platforms, { system, logger, env: deps.env });

  logger.step(2, TOTAL_STEPS, "Installing/updating the Flutter SDK");
  const sdk = await synchronizeSdk(
    {
      root: sdkRoot,
      url: environment.gitUrl,
      channel: config.channel,
      mode: config.updateMode,
    },
    { git, system, confirm, logger }
  );
  await persistSdkPath({
    sdkRoot,
    home: environment.home,
    profilePath: environment.profilePath,
    system,
    logger,
    env: deps.env,
  });

  logger.step(3, TOTAL_STEPS, "Running flutter doctor");
  try {
    await runDoctor({ sdkRoot, system, logger, confirm });
  } catch (err: unknown) {
    logger.warning(`flutter doctor could not run: ${errorMessage(err)}`);
  }

  logger.step(4, TOTAL_STEPS, "Enabling platforms");
  await enablePlatforms(config, { sdkRoot, system, logger });

  logger.step(5, TOTAL_STEPS, "Creating the Flutter project");
  const project = await generateProject(config, { sdkRoot, system, logger });

  logger.step(6, TOTAL_STEPS, "Bootstrapping development & testing helpers");
  await bootstrapProject(config, { sdkRoot, system, logger });

  if (config.dryRun) {
    logger.success("Dry run complete! No changes were made.");
  } else {
    logger.success(`Flutter setup completed: ${config.projectPath}`);
  }
  nextSteps(config, environment, logger);

  return { sdk, project, projectPath: config.projectPath };
}

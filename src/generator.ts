import type { RunConfig } from "./config.js";
import { ProjectCreationError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { PLATFORM_CONFIG_FLAGS } from "./platforms.js";
import { flutterBinary } from "./sdk/path.js";
import type { SystemPort } from "./system.js";

export type GeneratorConfig = Pick<
  RunConfig,
  | "org"
  | "packageName"
  | "platformsCsv"
  | "template"
  | "iosLanguage"
  | "androidLanguage"
  | "outputDir"
  | "projectPath"
>;

export interface GeneratorDeps {
  sdkRoot: string;
  system: SystemPort;
  logger: Logger;
}

/** Arguments for `flutter create`; language flags only apply to plugins. */
export function buildCreateArgs(config: GeneratorConfig): string[] {
  const args = [
    "create",
    "--org",
    config.org,
    "--project-name",
    config.packageName,
    `--platforms=${config.platformsCsv}`,
    "--template",
    config.template,
  ];
  if (config.template === "plugin") {
    args.push(
      "--ios-language",
      config.iosLanguage,
      "--android-language",
      config.androidLanguage
    );
  }
  args.push(config.projectPath);
  return args;
}

/** Turn on every requested platform in the SDK's global config. */
export async function enablePlatforms(
  config: Pick<RunConfig, "platforms">,
  deps: GeneratorDeps
): Promise<void> {
  for (const platform of config.platforms) {
    await deps.system.exec(flutterBinary(deps.sdkRoot), [
      "config",
      PLATFORM_CONFIG_FLAGS[platform],
    ]);
  }
  deps.logger.debug(`Enabled platforms: ${config.platforms.join(", ")}`);
}

/**
 * Materialize the project with `flutter create`. An existing project
 * directory is left untouched and reported as skipped.
 */
export async function generateProject(
  config: GeneratorConfig,
  deps: GeneratorDeps
): Promise<"created" | "skipped"> {
  const { system, logger } = deps;
  await system.mkdir(config.outputDir);

  if (await system.exists(config.projectPath)) {
    logger.warning(`Directory '${config.projectPath}' exists—skipping create.`);
    return "skipped";
  }

  logger.info(`Creating Flutter project at ${config.projectPath}…`);
  try {
    await system.exec(flutterBinary(deps.sdkRoot), buildCreateArgs(config));
  } catch (err: unknown) {
    throw new ProjectCreationError(`Failed to create project: ${errorMessage(err)}`);
  }
  logger.success(`Project created at: ${config.projectPath}`);
  return "created";
}

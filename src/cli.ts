import { Command, CommanderError, Option, type OutputConfiguration } from "commander";
import {
  DEFAULT_ORG,
  UPDATE_MODES,
  buildRunConfig,
  type RunConfig,
} from "./config.js";
import { UsageError } from "./errors.js";
import { SUPPORTED_PLATFORMS } from "./platforms.js";

export const PROGRAM_NAME = "flutter-kickstart";
export const VERSION = "1.0.0";

interface CreateOptions {
  org: string;
  channel: string;
  dir: string;
  template: string;
  swift?: boolean;
  objc?: boolean;
  kotlin?: boolean;
  java?: boolean;
  flutterUpdate: string;
  dryRun?: boolean;
  verbose?: boolean;
  yes?: boolean;
}

const lower = (value: string) => value.toLowerCase();

const EXAMPLES = `
Examples:
  $ ${PROGRAM_NAME} MyApp ios android macos web
  $ ${PROGRAM_NAME} --template plugin --objc --java MyPlugin ios android
  $ ${PROGRAM_NAME} --flutter-update reclone MyApp ios
  $ ${PROGRAM_NAME} mcp`;

/** Declare the arguments and options of the `create` command on `command`. */
export function defineCreateCommand(command: Command): Command {
  return command
    .description("Install/update the Flutter SDK and scaffold a project")
    .argument("<project_name>", "project folder name")
    .argument("<platforms...>", `target platforms (${SUPPORTED_PLATFORMS.join(", ")}; osx, win)`)
    .option("--org <id>", "organization identifier", DEFAULT_ORG)
    .option("--channel <channel>", "Flutter channel: stable|beta", lower, "stable")
    .option("--dir <path>", "output directory", ".")
    .option("--template <template>", "project template: app|plugin", lower, "app")
    .addOption(new Option("--swift", "(plugin only) iOS language Swift").conflicts("objc"))
    .addOption(new Option("--objc", "(plugin only) iOS language Objective-C"))
    .addOption(new Option("--kotlin", "(plugin only) Android language Kotlin").conflicts("java"))
    .addOption(new Option("--java", "(plugin only) Android language Java"))
    .option(
      "--flutter-update <mode>",
      `what to do with an existing SDK checkout: ${UPDATE_MODES.join("|")}`,
      lower,
      "reset"
    )
    .option("--dry-run", "preview actions without executing them")
    .option("-y, --yes", "answer yes to confirmation prompts")
    .option("-v, --verbose", "print every command that runs");
}

export function toRunConfig(
  projectName: string,
  platforms: string[],
  options: CreateOptions,
  cwd = process.cwd()
): RunConfig {
  return buildRunConfig(
    {
      projectName,
      platforms,
      org: options.org,
      channel: options.channel,
      outputDir: options.dir,
      template: options.template,
      iosLanguage: options.objc ? "objc" : "swift",
      androidLanguage: options.java ? "java" : "kotlin",
      updateMode: options.flutterUpdate,
      dryRun: Boolean(options.dryRun),
      verbose: Boolean(options.verbose),
      assumeYes: Boolean(options.yes),
    },
    cwd
  );
}

/**
 * Commander reports parse problems as `CommanderError`; help and version
 * output come through the same path with their own codes.
 */
export function fromCommanderError(err: CommanderError): UsageError | number {
  switch (err.code) {
    case "commander.helpDisplayed":
    case "commander.help":
      return 1;
    case "commander.version":
      return 0;
    default:
      return new UsageError(err.message.replace(/^error:\s*/, ""));
  }
}

export interface ProgramHandlers {
  create(config: RunConfig): Promise<void>;
  mcp(): Promise<void>;
}

/**
 * The full program: `create` (default) and `mcp`. Parse errors are thrown
 * as `CommanderError` instead of exiting.
 */
export function buildProgram(
  handlers: ProgramHandlers,
  output?: OutputConfiguration
): Command {
  const program = new Command(PROGRAM_NAME)
    .description("Automated Flutter development environment setup for macOS")
    .version(VERSION, "-V, --version")
    .addHelpText("after", EXAMPLES)
    .exitOverride();
  if (output) program.configureOutput(output);

  defineCreateCommand(program.command("create", { isDefault: true }))
    .action(async (projectName: string, platforms: string[], options: CreateOptions) => {
      await handlers.create(toRunConfig(projectName, platforms, options));
    });

  program
    .command("mcp")
    .description("Serve the setup pipeline as MCP tools over stdio")
    .action(async () => {
      await handlers.mcp();
    });

  return program;
}

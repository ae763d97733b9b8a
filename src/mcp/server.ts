import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import {
  ANDROID_LANGUAGES,
  CHANNELS,
  IOS_LANGUAGES,
  TEMPLATES,
  UPDATE_MODES,
  buildRunConfig,
  loadEnvironment,
  type EnvironmentConfig,
} from "../config.js";
import { errorMessage } from "../errors.js";
import { createBufferLogger } from "../logger.js";
import { SUPPORTED_PLATFORMS } from "../platforms.js";
import { denyAll } from "../prompt.js";
import { createGitClient } from "../sdk/git.js";
import { inspectSdk } from "../sdk/synchronizer.js";
import { runSetup } from "../setup.js";
import { createSystem, type SystemPort } from "../system.js";
import { PROGRAM_NAME, VERSION } from "../cli.js";

// ─── Tool handlers ─────────────────────────────────────────────────
// Prompts cannot reach a user over stdio, so every confirmation is "no":
// a diverged SDK is reported, never reset, unless flutter_update is reclone.

export const setupToolShape = {
  name: z.string().min(1).describe("Project folder name, e.g. MyApp"),
  platforms: z
    .array(z.string())
    .min(1)
    .describe(`Target platforms: ${SUPPORTED_PLATFORMS.join(", ")} (aliases osx, win)`),
  org: z.string().optional().describe("Organisation identifier, e.g. com.example"),
  channel: z.enum(CHANNELS).optional().describe("Flutter channel (default: stable)"),
  dir: z.string().optional().describe("Output directory (default: server working directory)"),
  template: z.enum(TEMPLATES).optional().describe("Project template (default: app)"),
  ios_language: z.enum(IOS_LANGUAGES).optional().describe("Plugin iOS language"),
  android_language: z.enum(ANDROID_LANGUAGES).optional().describe("Plugin Android language"),
  flutter_update: z
    .enum(UPDATE_MODES)
    .optional()
    .describe("What to do with an existing SDK checkout (default: reset, which needs confirmation and so declines)"),
  dry_run: z.boolean().optional().describe("Report what would happen without executing anything"),
};

const setupToolSchema = z.object(setupToolShape);
export type SetupToolArgs = z.infer<typeof setupToolSchema>;

export interface ToolContext {
  environment?: EnvironmentConfig;
  /** Build the system port for a run; defaults to the real machine. */
  createSystem?: typeof createSystem;
  cwd?: string;
  /** Process environment whose PATH receives the SDK; defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

function textResult(text: string, isError = false): CallToolResult {
  return isError
    ? { isError: true, content: [{ type: "text", text }] }
    : { content: [{ type: "text", text }] };
}

export async function handleSetupTool(
  args: SetupToolArgs,
  context: ToolContext = {}
): Promise<CallToolResult> {
  const { logger, lines } = createBufferLogger();
  try {
    const config = buildRunConfig(
      {
        projectName: args.name,
        platforms: args.platforms,
        org: args.org,
        channel: args.channel,
        outputDir: args.dir,
        template: args.template,
        iosLanguage: args.ios_language,
        androidLanguage: args.android_language,
        updateMode: args.flutter_update,
        dryRun: args.dry_run ?? false,
      },
      context.cwd
    );
    const environment = context.environment ?? loadEnvironment();
    const system = (context.createSystem ?? createSystem)({
      dryRun: config.dryRun,
      logger,
    });
    const result = await runSetup(config, {
      environment,
      system,
      logger,
      confirm: denyAll,
      env: context.env,
    });
    lines.push("", `SDK: ${result.sdk.kind}`, `Project: ${result.project} (${result.projectPath})`);
    return textResult(lines.join("\n"));
  } catch (err: unknown) {
    return textResult(
      `❌ Setup failed:\n${errorMessage(err)}\n\nProgress so far:\n${lines.join("\n")}`,
      true
    );
  }
}

export async function handleInspectTool(
  context: ToolContext & { system?: SystemPort } = {}
): Promise<CallToolResult> {
  try {
    const environment = context.environment ?? loadEnvironment();
    const system =
      context.system ??
      (context.createSystem ?? createSystem)({
        dryRun: true,
        logger: createBufferLogger().logger,
      });
    const checkout = await inspectSdk(environment.sdkRoot, {
      git: createGitClient(system),
      system,
    });
    return textResult(JSON.stringify(checkout, null, 2));
  } catch (err: unknown) {
    return textResult(`Could not inspect the Flutter SDK: ${errorMessage(err)}`, true);
  }
}

// ─── MCP Server ────────────────────────────────────────────────────

/** Ask for a dry run first, and the real run only once its commands are agreed. */
export function setupPromptText(name: string, platforms: string): string {
  const targets = platforms.split(/[\s,]+/).filter(Boolean).join(", ");
  return (
    `Create the Flutter project "${name}" targeting ${targets}. ` +
    `Call setup_flutter_project with dry_run=true and show me the commands it would run; ` +
    `once I agree, call it again without dry_run.`
  );
}

export function createMcpServer(context: ToolContext = {}): McpServer {
  const server = new McpServer({ name: PROGRAM_NAME, version: VERSION });

  server.prompt(
    "setup-flutter-project",
    "Install/update the Flutter SDK and scaffold a project with tooling",
    {
      name: z.string().describe("Project folder name, e.g. MyApp"),
      platforms: z.string().describe("Space-separated platforms, e.g. ios android web"),
    },
    ({ name, platforms }) => ({
      messages: [
        {
          role: "user",
          content: {
            type: "text",
            text: setupPromptText(name, platforms),
          },
        },
      ],
    })
  );

  server.tool(
    "setup_flutter_project",
    `Provision the Flutter SDK and scaffold a project.

Runs: prerequisites (Xcode CLT, Homebrew, git, CocoaPods, Android tools) →
SDK clone/fast-forward → PATH in the shell profile → flutter doctor →
platform toggles → flutter create → editor/Makefile/tests/lints/CI/.env.

Confirmation prompts are answered "no": a diverged SDK checkout is left as
is unless flutter_update is "reclone". Use dry_run=true to preview.`,
    setupToolShape,
    async (args) => handleSetupTool(args, context)
  );

  server.tool(
    "inspect_flutter_sdk",
    "Report the local Flutter SDK checkout: presence, branch and ahead/behind counts. Read-only.",
    async () => handleInspectTool(context)
  );

  return server;
}

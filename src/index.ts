#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CommanderError } from "commander";
import { buildProgram, fromCommanderError } from "./cli.js";
import { loadEnvironment, type RunConfig } from "./config.js";
import { EXIT_CODE, KickstartError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { createMcpServer } from "./mcp/server.js";
import { approveAll, createTerminalConfirm } from "./prompt.js";
import { runSetup } from "./setup.js";
import { createSystem } from "./system.js";

// ─── Commands ──────────────────────────────────────────────────────

async function create(config: RunConfig): Promise<void> {
  const logger = createLogger({ verbose: config.verbose || undefined });
  const environment = loadEnvironment();
  await runSetup(config, {
    environment,
    system: createSystem({ dryRun: config.dryRun, logger }),
    logger,
    confirm: config.assumeYes ? approveAll : createTerminalConfirm(logger),
  });
}

async function serve(): Promise<void> {
  const server = createMcpServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("flutter-kickstart MCP server running on stdio");
}

// ─── Start ─────────────────────────────────────────────────────────

async function main(argv: string[]): Promise<number> {
  const program = buildProgram({ create, mcp: serve });

  if (argv.length === 0) {
    program.outputHelp({ error: true });
    return EXIT_CODE.usage;
  }

  try {
    await program.parseAsync(argv, { from: "user" });
    return EXIT_CODE.ok;
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      const mapped = fromCommanderError(err);
      if (typeof mapped === "number") return mapped;
      // Commander already printed the message itself.
      return mapped.exitCode;
    }
    throw err;
  }
}

process.once("SIGINT", () => {
  createLogger().warning("Setup interrupted by user");
  process.exit(EXIT_CODE.interrupted);
});

main(process.argv.slice(2)).then(
  (code) => {
    // The MCP server keeps the event loop alive on its own.
    process.exitCode = code;
  },
  (err: unknown) => {
    const logger = createLogger();
    logger.error(errorMessage(err));
    if (process.argv.includes("--verbose") || process.argv.includes("-v")) {
      console.error(err);
    }
    process.exit(err instanceof KickstartError ? err.exitCode : EXIT_CODE.failure);
  }
);

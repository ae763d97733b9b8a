import chalk, { Chalk, type ChalkInstance } from "chalk";

export type LogLevel = "info" | "error";
export type LogSink = (line: string, level: LogLevel) => void;

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  step(step: number, total: number, message: string): void;
  header(title: string): void;
  /** Report an action that dry-run mode intercepted. */
  dryRun(action: string): void;
  label(label: string, value: string): void;
}

export interface LoggerOptions {
  sink?: LogSink;
  verbose?: boolean;
  color?: boolean;
}

const consoleSink: LogSink = (line, level) => {
  if (level === "error") console.error(line);
  else console.log(line);
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? consoleSink;
  const verbose = options.verbose ?? Boolean(process.env.DEBUG);
  const c: ChalkInstance =
    options.color === false ? new Chalk({ level: 0 }) : chalk;

  return {
    info: (message) => sink(`${c.blue("ℹ")} ${message}`, "info"),
    success: (message) => sink(`${c.green("✓")} ${message}`, "info"),
    warning: (message) => sink(`${c.yellow("⚠")} ${message}`, "info"),
    error: (message) => sink(`${c.red("✗")} ${message}`, "error"),
    debug: (message) => {
      if (verbose) sink(`${c.gray("🔍")} ${message}`, "info");
    },
    step: (step, total, message) =>
      sink(`${c.cyan(`[${step}/${total}]`)} ${c.bold(message)}`, "info"),
    header: (title) => {
      sink("", "info");
      sink(c.bold.cyan(`═══ ${title} ═══`), "info");
      sink("", "info");
    },
    dryRun: (action) => sink(`${c.magenta("[dry-run]")} ${action}`, "info"),
    label: (label, value) => sink(`${c.gray(label + ":")} ${value}`, "info"),
  };
}

/** Collects uncoloured lines in memory; used for MCP tool results and tests. */
export function createBufferLogger(verbose = false): {
  logger: Logger;
  lines: string[];
} {
  const lines: string[] = [];
  const logger = createLogger({
    sink: (line) => lines.push(line),
    verbose,
    color: false,
  });
  return { logger, lines };
}

import { execFile, spawn } from "node:child_process";
import {
  access,
  appendFile,
  mkdir,
  readFile,
  readdir,
  rm,
  writeFile,
} from "node:fs/promises";
import { dirname } from "node:path";
import { promisify } from "node:util";
import { CommandError } from "./errors.js";
import type { Logger } from "./logger.js";

const execFileAsync = promisify(execFile);

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** Resolve with the result instead of throwing on a non-zero exit. */
  allowFailure?: boolean;
  /** Attach the child to this terminal (stdin/stdout/stderr inherited). */
  interactive?: boolean;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Every side effect the pipeline has on the machine goes through here.
 * `exec` and the filesystem writers are the dry-run chokepoint; `probe`,
 * `exists`, `readFile` and `isEmptyDir` only look.
 */
export interface SystemPort {
  readonly dryRun: boolean;
  exec(command: string, args: string[], options?: ExecOptions): Promise<ExecResult>;
  probe(command: string, args: string[], options?: { cwd?: string }): Promise<ExecResult>;
  commandExists(command: string): Promise<boolean>;
  exists(path: string): Promise<boolean>;
  isEmptyDir(path: string): Promise<boolean>;
  readFile(path: string): Promise<string | undefined>;
  writeFile(path: string, content: string): Promise<void>;
  appendFile(path: string, content: string): Promise<void>;
  mkdir(path: string): Promise<void>;
  remove(path: string): Promise<void>;
}

// ─── Helpers ───────────────────────────────────────────────────────

/** Render a command line for logs, quoting arguments that contain spaces. */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map((a) => (/[\s"]/.test(a) ? JSON.stringify(a) : a))
    .join(" ");
}

interface ErrorLike {
  stdout?: unknown;
  stderr?: unknown;
  code?: unknown;
  message?: unknown;
}

function isErrorLike(err: unknown): err is ErrorLike {
  return typeof err === "object" && err !== null;
}

function text(value: unknown): string {
  if (typeof value === "string") return value;
  if (Buffer.isBuffer(value)) return value.toString("utf-8");
  return "";
}

/** Run a command and collect its output; non-zero exits resolve with the code. */
async function runCaptured(
  command: string,
  args: string[],
  cwd?: string,
  extraEnv?: Record<string, string>
): Promise<ExecResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd,
      maxBuffer: 10 * 1024 * 1024,
      env: { ...process.env, ...extraEnv },
    });
    return { stdout, stderr, exitCode: 0 };
  } catch (err: unknown) {
    if (!isErrorLike(err)) throw err;
    // ENOENT and friends carry a string code and never started.
    if (typeof err.code !== "number") {
      throw new CommandError(
        formatCommand(command, args),
        undefined,
        text(err.message)
      );
    }
    return {
      stdout: text(err.stdout),
      stderr: text(err.stderr),
      exitCode: err.code,
    };
  }
}

/** Run a command attached to the terminal so the user can answer its prompts. */
function runInteractive(
  command: string,
  args: string[],
  cwd?: string,
  extraEnv?: Record<string, string>
): Promise<ExecResult> {
  return new Promise((resolvePromise, reject) => {
    const child = spawn(command, args, {
      cwd,
      stdio: "inherit",
      env: { ...process.env, ...extraEnv },
    });
    child.once("error", (err) =>
      reject(new CommandError(formatCommand(command, args), undefined, err.message))
    );
    child.once("close", (code) =>
      resolvePromise({ stdout: "", stderr: "", exitCode: code ?? 1 })
    );
  });
}

// ─── Node implementation ───────────────────────────────────────────

export function createSystem(options: { dryRun: boolean; logger: Logger }): SystemPort {
  const { dryRun, logger } = options;

  return {
    dryRun,

    async exec(command, args, execOptions = {}) {
      const line = formatCommand(command, args);
      if (dryRun) {
        logger.dryRun(execOptions.cwd ? `(cd ${execOptions.cwd}) ${line}` : line);
        return { stdout: "", stderr: "", exitCode: 0 };
      }
      logger.debug(`$ ${line}`);
      const result = execOptions.interactive
        ? await runInteractive(command, args, execOptions.cwd, execOptions.env)
        : await runCaptured(command, args, execOptions.cwd, execOptions.env);
      if (result.exitCode !== 0 && !execOptions.allowFailure) {
        const output = [result.stderr, result.stdout]
          .filter(Boolean)
          .join("\n")
          .trim();
        throw new CommandError(line, result.exitCode, output);
      }
      return result;
    },

    async probe(command, args, probeOptions = {}) {
      logger.debug(`? ${formatCommand(command, args)}`);
      try {
        return await runCaptured(command, args, probeOptions.cwd);
      } catch (err: unknown) {
        if (err instanceof CommandError) {
          return { stdout: "", stderr: err.output, exitCode: 127 };
        }
        throw err;
      }
    },

    async commandExists(command) {
      try {
        const result = await runCaptured("which", [command]);
        return result.exitCode === 0;
      } catch {
        return false;
      }
    },

    async exists(path) {
      try {
        await access(path);
        return true;
      } catch {
        return false;
      }
    },

    async isEmptyDir(path) {
      try {
        const entries = await readdir(path);
        return entries.length === 0;
      } catch (err: unknown) {
        // A plain file in the way is as occupied as a populated directory.
        if (isErrorLike(err) && err.code === "ENOTDIR") return false;
        throw err;
      }
    },

    async readFile(path) {
      try {
        return await readFile(path, "utf-8");
      } catch (err: unknown) {
        if (isErrorLike(err) && err.code === "ENOENT") return undefined;
        throw err;
      }
    },

    async writeFile(path, content) {
      if (dryRun) {
        logger.dryRun(`write ${path}`);
        return;
      }
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content, "utf-8");
    },

    async appendFile(path, content) {
      if (dryRun) {
        logger.dryRun(`append to ${path}: ${content.trim()}`);
        return;
      }
      await mkdir(dirname(path), { recursive: true });
      await appendFile(path, content, "utf-8");
    },

    async mkdir(path) {
      if (dryRun) {
        logger.dryRun(`mkdir -p ${path}`);
        return;
      }
      await mkdir(path, { recursive: true });
    },

    async remove(path) {
      if (dryRun) {
        logger.dryRun(`rm -rf ${path}`);
        return;
      }
      await rm(path, { recursive: true, force: true });
    },
  };
}

/**
 * Append `line` to `file` unless a line equal to it is already there.
 * Returns true when the file was (or, in dry-run, would be) changed.
 */
export async function ensureLineInFile(
  system: SystemPort,
  file: string,
  line: string
): Promise<boolean> {
  const current = await system.readFile(file);
  if (current !== undefined && current.split(/\r?\n/).includes(line)) {
    return false;
  }
  const separator =
    current !== undefined && current.length > 0 && !current.endsWith("\n")
      ? "\n"
      : "";
  await system.appendFile(file, `${separator}${line}\n`);
  return true;
}

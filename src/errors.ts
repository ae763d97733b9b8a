// ─── Error taxonomy ────────────────────────────────────────────────
// Every fatal condition carries the exit code the CLI should end with.

export const EXIT_CODE = {
  ok: 0,
  usage: 1,
  failure: 1,
  validation: 2,
  interrupted: 130,
} as const;

export class KickstartError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number = EXIT_CODE.failure) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/** Bad or missing arguments, unsupported platform, invalid enum value. */
export class UsageError extends KickstartError {
  constructor(message: string) {
    super(message, EXIT_CODE.validation);
  }
}

/** A required tool is absent and could not be installed. */
export class PrerequisiteError extends KickstartError {
  constructor(message: string) {
    super(message, EXIT_CODE.validation);
  }
}

/** The user pressed Ctrl-C while a prompt was waiting. */
export class InterruptedError extends KickstartError {
  constructor(message = "Setup interrupted by user") {
    super(message, EXIT_CODE.interrupted);
  }
}

export class SdkSyncError extends KickstartError {}

export class ProjectCreationError extends KickstartError {}

/** A subprocess exited non-zero (or could not be spawned). */
export class CommandError extends KickstartError {
  readonly command: string;
  readonly code: number | undefined;
  readonly output: string;

  constructor(command: string, code: number | undefined, output: string) {
    super(
      output
        ? `Command failed: ${command}\n${output}`
        : `Command failed: ${command}`
    );
    this.command = command;
    this.code = code;
    this.output = output;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

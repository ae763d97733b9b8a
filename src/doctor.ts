import { z } from "zod";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { Confirm } from "./prompt.js";
import { flutterBinary } from "./sdk/path.js";
import type { SystemPort } from "./system.js";

// `flutter doctor --machine` prints a JSON array of validator results.
// Older SDKs, or a first run that downloads the Dart SDK, can put text
// around it, so the array is cut out of the output before parsing.

const doctorMessageSchema = z.object({
  type: z.string().default("information"),
  message: z.string().default(""),
});

const validatorSchema = z.object({
  name: z.string().default("unknown"),
  type: z.string(),
  statusInfo: z.string().optional(),
  messages: z.array(doctorMessageSchema).default([]),
});

const doctorOutputSchema = z.array(validatorSchema);

export type DoctorValidator = z.infer<typeof validatorSchema>;

export interface DoctorReport {
  source: "machine" | "text";
  /** One human-readable line per problem. */
  issues: string[];
  androidLicensesMissing: boolean;
}

const LICENSE_HINT = "--android-licenses";
const LICENSE_TEXT_MARKER = "Some Android licenses not accepted";

function extractJsonArray(output: string): unknown {
  const start = output.search(/^\s*\[/m);
  const end = output.lastIndexOf("]");
  if (start < 0 || end < start) return undefined;
  try {
    return JSON.parse(output.slice(start, end + 1));
  } catch {
    return undefined;
  }
}

/** Structured reading of `flutter doctor --machine`; undefined when it is not JSON. */
export function parseMachineDoctor(output: string): DoctorReport | undefined {
  const parsed = doctorOutputSchema.safeParse(extractJsonArray(output));
  if (!parsed.success) return undefined;

  const issues: string[] = [];
  let androidLicensesMissing = false;
  for (const validator of parsed.data) {
    const problems = validator.messages.filter(
      (m) => m.type === "error" || m.type === "hint"
    );
    if (problems.some((m) => m.message.includes(LICENSE_HINT))) {
      androidLicensesMissing = true;
    }
    if (validator.type === "installed") continue;
    const title = validator.statusInfo
      ? `${validator.name} (${validator.statusInfo})`
      : validator.name;
    issues.push(`${title}: ${validator.type}`);
    for (const problem of problems) issues.push(`  ${problem.message}`);
  }
  return { source: "machine", issues, androidLicensesMissing };
}

/**
 * Fallback for SDKs without `--machine`: scrape `flutter doctor -v` for
 * ✗ markers and the licence sentence.
 */
export function parseTextDoctor(output: string): DoctorReport {
  const issues = output
    .split(/\r?\n/)
    .filter((line) => /(^|[\s[])✗/.test(line))
    .map((line) => line.trim());
  return {
    source: "text",
    issues,
    androidLicensesMissing: output.includes(LICENSE_TEXT_MARKER),
  };
}

export interface DoctorDeps {
  sdkRoot: string;
  system: SystemPort;
  logger: Logger;
  confirm: Confirm;
}

export async function runDoctor(deps: DoctorDeps): Promise<DoctorReport> {
  const { sdkRoot, system, logger } = deps;
  const flutter = flutterBinary(sdkRoot);

  const machine = await system.exec(flutter, ["doctor", "--machine"], {
    allowFailure: true,
  });
  let report = parseMachineDoctor(machine.stdout);
  if (!report) {
    logger.debug("flutter doctor --machine gave no JSON; reading doctor -v text.");
    const verbose = await system.exec(flutter, ["doctor", "-v"], {
      allowFailure: true,
    });
    report = parseTextDoctor(`${verbose.stdout}\n${verbose.stderr}`);
  }

  if (report.issues.length > 0) {
    logger.warning("flutter doctor found issues:");
    for (const issue of report.issues) logger.info(issue);
  } else if (!system.dryRun) {
    logger.success("flutter doctor found no issues");
  }

  if (report.androidLicensesMissing) {
    await offerAndroidLicenses(deps);
  }
  return report;
}

async function offerAndroidLicenses(deps: DoctorDeps): Promise<void> {
  const { sdkRoot, system, logger, confirm } = deps;
  logger.warning("Android licenses not accepted.");
  const approved = await confirm("Run 'flutter doctor --android-licenses' now?");
  if (!approved) {
    logger.warning(
      "Skipped license acceptance. You can run: flutter doctor --android-licenses"
    );
    return;
  }
  try {
    await system.exec(flutterBinary(sdkRoot), ["doctor", "--android-licenses"], {
      interactive: true,
    });
  } catch (err: unknown) {
    logger.warning(`License acceptance did not finish: ${errorMessage(err)}`);
  }
}

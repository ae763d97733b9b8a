import { delimiter, join, relative, isAbsolute } from "node:path";
import type { Logger } from "../logger.js";
import { ensureLineInFile, type SystemPort } from "../system.js";

export function sdkBinDir(sdkRoot: string): string {
  return join(sdkRoot, "bin");
}

export function flutterBinary(sdkRoot: string): string {
  return join(sdkBinDir(sdkRoot), "flutter");
}

export function dartBinary(sdkRoot: string): string {
  return join(sdkBinDir(sdkRoot), "dart");
}

/**
 * The profile line exporting the SDK bin dir. Paths under `home` are written
 * relative to `$HOME` so the profile survives a renamed home directory.
 */
export function pathExportLine(sdkRoot: string, home: string): string {
  const bin = sdkBinDir(sdkRoot);
  const rel = relative(home, bin);
  const shown =
    rel && !rel.startsWith("..") && !isAbsolute(rel) ? `$HOME/${rel}` : bin;
  return `export PATH="${shown}:$PATH"`;
}

/** Prepend `dir` to a PATH string unless it is already one of its entries. */
export function prependToPath(pathValue: string | undefined, dir: string): string {
  const entries = (pathValue ?? "").split(delimiter).filter(Boolean);
  if (entries.includes(dir)) return entries.join(delimiter);
  return [dir, ...entries].join(delimiter);
}

export interface PersistPathOptions {
  sdkRoot: string;
  home: string;
  profilePath: string;
  system: SystemPort;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
}

/** Put the SDK on this process's PATH and persist it to the shell profile once. */
export async function persistSdkPath(options: PersistPathOptions): Promise<boolean> {
  const { sdkRoot, home, profilePath, system, logger } = options;
  const env = options.env ?? process.env;

  env.PATH = prependToPath(env.PATH, sdkBinDir(sdkRoot));

  const line = pathExportLine(sdkRoot, home);
  const added = await ensureLineInFile(system, profilePath, line);
  if (added) logger.success(`Flutter PATH added to ${profilePath}`);
  else logger.debug(`Flutter PATH already in ${profilePath}`);
  return added;
}

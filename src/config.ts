import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { z } from "zod";
import { UsageError } from "./errors.js";
import { resolvePlatforms, type Platform } from "./platforms.js";

// ─── Constants ─────────────────────────────────────────────────────
export const DEFAULT_ORG = "com.example";
export const DEFAULT_GIT_URL = "https://github.com/flutter/flutter.git";
export const DART_PACKAGE_NAME_RE = /^[a-z][a-z0-9_]*$/;
export const FALLBACK_PACKAGE_NAME = "app";

export const CHANNELS = ["stable", "beta"] as const;
export const TEMPLATES = ["app", "plugin"] as const;
export const IOS_LANGUAGES = ["swift", "objc"] as const;
export const ANDROID_LANGUAGES = ["kotlin", "java"] as const;
export const UPDATE_MODES = ["reset", "reclone", "skip"] as const;

export type Channel = (typeof CHANNELS)[number];
export type Template = (typeof TEMPLATES)[number];
export type IosLanguage = (typeof IOS_LANGUAGES)[number];
export type AndroidLanguage = (typeof ANDROID_LANGUAGES)[number];
export type UpdateMode = (typeof UPDATE_MODES)[number];

// ─── Environment ───────────────────────────────────────────────────

export interface EnvironmentConfig {
  home: string;
  sdkRoot: string;
  gitUrl: string;
  profilePath: string;
}

const envSchema = z.object({
  HOME: z.string().min(1).optional(),
  FLUTTER_KICKSTART_SDK_ROOT: z.string().min(1).optional(),
  FLUTTER_KICKSTART_GIT_URL: z.string().min(1).optional(),
  FLUTTER_KICKSTART_PROFILE: z.string().min(1).optional(),
});

/** Read where the SDK lives, where it comes from and which profile gets the PATH line. */
export function loadEnvironment(
  env: NodeJS.ProcessEnv = process.env
): EnvironmentConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new UsageError(
      `Invalid environment variable ${issue?.path.join(".") ?? ""}: ${issue?.message ?? "unknown"}`
    );
  }
  const vars = parsed.data;
  const home = vars.HOME ?? homedir();
  return {
    home,
    sdkRoot: resolve(
      vars.FLUTTER_KICKSTART_SDK_ROOT ?? join(home, "development", "flutter")
    ),
    gitUrl: vars.FLUTTER_KICKSTART_GIT_URL ?? DEFAULT_GIT_URL,
    profilePath: resolve(
      vars.FLUTTER_KICKSTART_PROFILE ?? join(home, ".zprofile")
    ),
  };
}

// ─── Run configuration ─────────────────────────────────────────────

export interface RunConfig {
  readonly projectName: string;
  readonly org: string;
  readonly channel: Channel;
  readonly outputDir: string;
  readonly template: Template;
  readonly iosLanguage: IosLanguage;
  readonly androidLanguage: AndroidLanguage;
  readonly updateMode: UpdateMode;
  readonly dryRun: boolean;
  readonly verbose: boolean;
  readonly assumeYes: boolean;
  readonly platforms: readonly Platform[];
  readonly platformsCsv: string;
  readonly packageName: string;
  readonly projectPath: string;
}

/**
 * Derive a Dart package name: lowercase, anything outside [a-z0-9_] becomes
 * `_`, leading characters that are not letters are dropped.
 */
export function sanitizePackageName(name: string): string {
  const sanitized = name
    .toLowerCase()
    .replace(/[^a-z0-9_]/g, "_")
    .replace(/^[^a-z]+/, "");
  return DART_PACKAGE_NAME_RE.test(sanitized) ? sanitized : FALLBACK_PACKAGE_NAME;
}

const enumOf = <T extends readonly [string, ...string[]]>(values: T, flag: string) =>
  z.enum(values, {
    errorMap: () => ({ message: `Invalid ${flag}. Use ${values.join("|")}.` }),
  });

const runInputSchema = z.object({
  projectName: z
    .string()
    .trim()
    .min(1, "Project folder name is required.")
    .refine(
      (v) => !/[\\/]/.test(v),
      "Project folder name must not contain path separators."
    )
    .refine(
      (v) => v !== "." && v !== "..",
      "Project folder name must name a new folder, not '.' or '..'."
    ),
  platforms: z
    .array(z.string())
    .min(1, "At least one platform is required (e.g., ios android macos web)."),
  org: z
    .string()
    .trim()
    .min(1, "Organization identifier must not be empty.")
    .default(DEFAULT_ORG),
  channel: enumOf(CHANNELS, "--channel").default("stable"),
  outputDir: z.string().min(1).default("."),
  template: enumOf(TEMPLATES, "--template").default("app"),
  iosLanguage: enumOf(IOS_LANGUAGES, "iOS language").default("swift"),
  androidLanguage: enumOf(ANDROID_LANGUAGES, "Android language").default("kotlin"),
  updateMode: enumOf(UPDATE_MODES, "--flutter-update").default("reset"),
  dryRun: z.boolean().default(false),
  verbose: z.boolean().default(false),
  assumeYes: z.boolean().default(false),
});

/** Raw, unvalidated values as they arrive from argv or an MCP tool call. */
export interface RunInput {
  projectName: string;
  platforms: readonly string[];
  org?: string;
  channel?: string;
  outputDir?: string;
  template?: string;
  iosLanguage?: string;
  androidLanguage?: string;
  updateMode?: string;
  dryRun?: boolean;
  verbose?: boolean;
  assumeYes?: boolean;
}

/** Validate raw values into an immutable `RunConfig`; throws `UsageError`. */
export function buildRunConfig(input: RunInput, cwd = process.cwd()): RunConfig {
  const parsed = runInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new UsageError(parsed.error.issues[0]?.message ?? "Invalid arguments.");
  }
  const values = parsed.data;

  const { platforms, csv } = resolvePlatforms(values.platforms);
  if (platforms.length === 0) {
    throw new UsageError(
      "At least one platform is required (e.g., ios android macos web)."
    );
  }

  const outputDir = resolve(cwd, values.outputDir);
  return Object.freeze({
    projectName: values.projectName,
    org: values.org,
    channel: values.channel,
    outputDir,
    template: values.template,
    iosLanguage: values.iosLanguage,
    androidLanguage: values.androidLanguage,
    updateMode: values.updateMode,
    dryRun: values.dryRun,
    verbose: values.verbose,
    assumeYes: values.assumeYes,
    platforms: Object.freeze([...platforms]),
    platformsCsv: csv,
    packageName: sanitizePackageName(values.projectName),
    projectPath: join(outputDir, values.projectName),
  });
}

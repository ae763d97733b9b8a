import { UsageError } from "./errors.js";

export const SUPPORTED_PLATFORMS = [
  "ios",
  "android",
  "macos",
  "linux",
  "windows",
  "web",
] as const;

export type Platform = (typeof SUPPORTED_PLATFORMS)[number];

export const PLATFORM_ALIASES: Readonly<Record<string, Platform>> = {
  osx: "macos",
  win: "windows",
};

export function isPlatform(value: string): value is Platform {
  return SUPPORTED_PLATFORMS.some((platform) => platform === value);
}

/**
 * Map one raw token to its canonical platform. Returns `undefined` for an
 * empty token; throws a `UsageError` for an unsupported one.
 */
export function resolvePlatform(token: string): Platform | undefined {
  const raw = token.replace(/\s+/g, "").toLowerCase();
  if (!raw) return undefined;

  const resolved = PLATFORM_ALIASES[raw] ?? raw;
  if (!isPlatform(resolved)) {
    throw new UsageError(
      `Unsupported platform: '${token}'. Allowed: ${SUPPORTED_PLATFORMS.join(" ")}`
    );
  }
  return resolved;
}

export interface ResolvedPlatforms {
  platforms: Platform[];
  csv: string;
}

/** Resolve every token, dropping blanks and keeping first occurrences only. */
export function resolvePlatforms(tokens: readonly string[]): ResolvedPlatforms {
  const platforms: Platform[] = [];
  for (const token of tokens) {
    const platform = resolvePlatform(token);
    if (platform && !platforms.includes(platform)) platforms.push(platform);
  }
  return { platforms, csv: platforms.join(",") };
}

/** `flutter config` switch that enables each platform. */
export const PLATFORM_CONFIG_FLAGS: Readonly<Record<Platform, string>> = {
  ios: "--enable-ios",
  android: "--enable-android",
  macos: "--enable-macos-desktop",
  linux: "--enable-linux-desktop",
  windows: "--enable-windows-desktop",
  web: "--enable-web",
};

import { describe, expect, it } from "vitest";
import { buildRunConfig } from "./config.js";
import { ProjectCreationError } from "./errors.js";
import { buildCreateArgs, enablePlatforms, generateProject } from "./generator.js";
import { createBufferLogger } from "./logger.js";
import { FakeSystem } from "./test/fakeSystem.js";

const SDK = "/sdk/flutter";

function deps(system = new FakeSystem()) {
  const { logger, lines } = createBufferLogger();
  return { sdkRoot: SDK, system, logger, lines };
}

describe("buildCreateArgs", () => {
  it("passes org, package name, platforms and template", () => {
    const config = buildRunConfig(
      { projectName: "MyApp", platforms: ["ios", "android", "osx"] },
      "/work"
    );
    expect(buildCreateArgs(config)).toEqual([
      "create",
      "--org",
      "com.example",
      "--project-name",
      "myapp",
      "--platforms=ios,android,macos",
      "--template",
      "app",
      "/work/MyApp",
    ]);
  });

  it("adds native languages for plugins only", () => {
    const config = buildRunConfig(
      {
        projectName: "MyPlugin",
        platforms: ["ios", "android"],
        template: "plugin",
        iosLanguage: "objc",
        androidLanguage: "java",
      },
      "/work"
    );
    expect(buildCreateArgs(config).slice(7)).toEqual([
      "plugin",
      "--ios-language",
      "objc",
      "--android-language",
      "java",
      "/work/MyPlugin",
    ]);
  });
});

describe("enablePlatforms", () => {
  it("maps each platform to its config flag", async () => {
    const d = deps();
    await enablePlatforms({ platforms: ["macos", "web", "windows"] }, d);
    expect(d.system.lines).toEqual([
      `${SDK}/bin/flutter config --enable-macos-desktop`,
      `${SDK}/bin/flutter config --enable-web`,
      `${SDK}/bin/flutter config --enable-windows-desktop`,
    ]);
  });
});

describe("generateProject", () => {
  const config = buildRunConfig({ projectName: "MyApp", platforms: ["web"] }, "/work");

  it("runs flutter create for a new project", async () => {
    const d = deps();
    expect(await generateProject(config, d)).toBe("created");
    expect(d.system.calls).toHaveLength(1);
    expect(d.system.calls[0]?.command).toBe(`${SDK}/bin/flutter`);
    expect(d.system.dirs.has("/work")).toBe(true);
  });

  it("skips an existing project directory", async () => {
    const d = deps();
    d.system.files.set("/work/MyApp/pubspec.yaml", "name: myapp\n");
    expect(await generateProject(config, d)).toBe("skipped");
    expect(d.system.calls).toEqual([]);
    expect(d.lines).toEqual(["⚠ Directory '/work/MyApp' exists—skipping create."]);
  });

  it("wraps a failed create", async () => {
    const d = deps();
    d.system.respond = () => ({ exitCode: 1, stderr: "invalid org" });
    await expect(generateProject(config, d)).rejects.toThrow(ProjectCreationError);
  });
});

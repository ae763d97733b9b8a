import { describe, expect, it } from "vitest";
import { PrerequisiteError } from "./errors.js";
import { createBufferLogger } from "./logger.js";
import { ensureInstalled, ensurePrerequisites } from "./prerequisites.js";
import { FakeSystem } from "./test/fakeSystem.js";

function deps(system = new FakeSystem(), env: NodeJS.ProcessEnv = { PATH: "/usr/bin" }) {
  const { logger, lines } = createBufferLogger();
  return { system, logger, env, lines };
}

describe("ensureInstalled", () => {
  it("leaves listed packages alone", async () => {
    const d = deps();
    expect(await ensureInstalled({ name: "git" }, d)).toBe("present");
    expect(d.system.probes.map((p) => p.line)).toEqual(["brew list git"]);
    expect(d.system.calls).toEqual([]);
  });

  it("installs casks with --cask", async () => {
    const d = deps();
    d.system.respond = (call) => (call.args[0] === "list" ? { exitCode: 1 } : undefined);
    expect(await ensureInstalled({ name: "temurin", cask: true }, d)).toBe("installed");
    expect(d.system.lines).toEqual(["brew install --cask temurin"]);
  });

  it("reports a failed install as a prerequisite error", async () => {
    const d = deps();
    d.system.respond = () => ({ exitCode: 1, stderr: "no bottle" });
    await expect(ensureInstalled({ name: "cocoapods" }, d)).rejects.toThrow(
      "Failed to install cocoapods: Command failed: brew install cocoapods\nno bottle"
    );
  });
});

describe("ensurePrerequisites", () => {
  it("checks the base toolchain and the android casks", async () => {
    const d = deps();
    await ensurePrerequisites(["android", "web"], d);
    expect(d.system.probes.map((p) => p.line)).toEqual([
      "xcode-select -p",
      "brew list git",
      "brew list cocoapods",
      "brew list --cask temurin",
      "brew list --cask android-commandlinetools",
    ]);
    expect(d.system.calls).toEqual([]);
    expect(d.lines.at(-1)).toBe("✓ Prerequisites satisfied");
  });

  it("refreshes CocoaPods specs for iOS and survives a failure", async () => {
    const d = deps();
    d.system.respond = (call) => (call.command === "pod" ? { exitCode: 1 } : undefined);
    await ensurePrerequisites(["ios"], d);
    expect(d.system.lines).toEqual(["pod repo update"]);
    expect(d.lines).toContain(
      "⚠ pod repo update failed; CocoaPods specs may be stale. Command failed: pod repo update"
    );
  });

  it("stops without xcode-select", async () => {
    const d = deps();
    d.system.installedCommands.delete("xcode-select");
    await expect(ensurePrerequisites(["web"], d)).rejects.toThrow(
      "xcode-select missing; install Xcode Command Line Tools."
    );
  });

  it("starts the Command Line Tools installer and asks for a re-run", async () => {
    const d = deps();
    d.system.respond = (call) =>
      call.command === "xcode-select" ? { exitCode: 2 } : undefined;
    await expect(ensurePrerequisites(["web"], d)).rejects.toThrow(PrerequisiteError);
    expect(d.system.lines).toEqual(["xcode-select --install"]);
  });

  it("puts Apple Silicon Homebrew on PATH", async () => {
    const d = deps();
    d.system.files.set("/opt/homebrew/bin/brew", "");
    await ensurePrerequisites(["web"], d);
    expect(d.env.PATH).toBe("/opt/homebrew/bin:/opt/homebrew/sbin:/usr/bin");
  });

  it("installs Homebrew non-interactively when it is missing", async () => {
    const d = deps(new FakeSystem(true));
    d.system.installedCommands.delete("brew");
    await ensurePrerequisites(["web"], d);
    expect(d.system.calls[0]).toMatchObject({
      command: "/bin/bash",
      args: [
        "-c",
        '/bin/bash -c "$(curl -fsSL https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh)"',
      ],
    });
  });

  it("fails when brew is still missing after installing", async () => {
    const d = deps();
    d.system.installedCommands.delete("brew");
    await expect(ensurePrerequisites(["web"], d)).rejects.toThrow(
      "Homebrew was installed but `brew` is not on PATH"
    );
  });
});

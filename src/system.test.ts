import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createBufferLogger } from "./logger.js";
import { createSystem, ensureLineInFile, formatCommand } from "./system.js";
import { FakeSystem } from "./test/fakeSystem.js";

describe("formatCommand", () => {
  it("quotes only arguments with whitespace or quotes", () => {
    expect(formatCommand("git", ["clone", "--depth", "1"])).toBe("git clone --depth 1");
    expect(formatCommand("bash", ["-c", "echo hi"])).toBe('bash -c "echo hi"');
    expect(formatCommand("flutter", ['dev:x:{"sdk":"flutter"}'])).toBe(
      'flutter "dev:x:{\\"sdk\\":\\"flutter\\"}"'
    );
  });
});

describe("createSystem", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "kickstart-system-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("intercepts every write in dry-run mode", async () => {
    const { logger, lines } = createBufferLogger();
    const system = createSystem({ dryRun: true, logger });

    await system.mkdir(join(dir, "a"));
    await system.writeFile(join(dir, "a", "b.txt"), "hello");
    await system.appendFile(join(dir, "profile"), "export X=1\n");
    await system.remove(dir);
    const result = await system.exec("no-such-binary", ["run", "two words"], { cwd: dir });

    expect(result).toEqual({ stdout: "", stderr: "", exitCode: 0 });
    expect(await readdir(dir)).toEqual([]);
    expect(lines).toEqual([
      `[dry-run] mkdir -p ${join(dir, "a")}`,
      `[dry-run] write ${join(dir, "a", "b.txt")}`,
      `[dry-run] append to ${join(dir, "profile")}: export X=1`,
      `[dry-run] rm -rf ${dir}`,
      `[dry-run] (cd ${dir}) no-such-binary run "two words"`,
    ]);
  });

  it("still reads in dry-run mode", async () => {
    const { logger } = createBufferLogger();
    const system = createSystem({ dryRun: true, logger });
    expect(await system.exists(dir)).toBe(true);
    expect(await system.isEmptyDir(dir)).toBe(true);
    expect(await system.readFile(join(dir, "missing"))).toBeUndefined();
  });

  it("treats a file as an occupied directory", async () => {
    const { logger } = createBufferLogger();
    const system = createSystem({ dryRun: false, logger });
    const file = join(dir, "flutter");
    await writeFile(file, "not a checkout");
    expect(await system.isEmptyDir(file)).toBe(false);
  });

  it("creates parent directories when writing for real", async () => {
    const { logger } = createBufferLogger();
    const system = createSystem({ dryRun: false, logger });
    const target = join(dir, "nested", "deeper", "file.txt");

    await system.writeFile(target, "content");

    expect(await readFile(target, "utf-8")).toBe("content");
    expect(await system.readFile(target)).toBe("content");
    expect(await system.isEmptyDir(dir)).toBe(false);
  });
});

describe("ensureLineInFile", () => {
  it("appends once and terminates the previous last line", async () => {
    const system = new FakeSystem();
    system.files.set("/home/dev/.zprofile", "export A=1");

    expect(await ensureLineInFile(system, "/home/dev/.zprofile", "export B=2")).toBe(true);
    expect(await ensureLineInFile(system, "/home/dev/.zprofile", "export B=2")).toBe(false);
    expect(system.files.get("/home/dev/.zprofile")).toBe("export A=1\nexport B=2\n");
  });

  it("creates a missing file with just the line", async () => {
    const system = new FakeSystem();
    expect(await ensureLineInFile(system, "/p", "line")).toBe(true);
    expect(system.files.get("/p")).toBe("line\n");
  });

  it("matches whole lines, not substrings", async () => {
    const system = new FakeSystem();
    system.files.set("/p", "# export B=2 (disabled)\n");
    expect(await ensureLineInFile(system, "/p", "export B=2")).toBe(true);
    expect(system.files.get("/p")).toBe("# export B=2 (disabled)\nexport B=2\n");
  });

  it("is idempotent against the real filesystem", async () => {
    const dir = await mkdtemp(join(tmpdir(), "kickstart-profile-"));
    try {
      const { logger } = createBufferLogger();
      const system = createSystem({ dryRun: false, logger });
      const profile = join(dir, ".zprofile");
      await ensureLineInFile(system, profile, 'export PATH="/x:$PATH"');
      await ensureLineInFile(system, profile, 'export PATH="/x:$PATH"');
      expect(await readFile(profile, "utf-8")).toBe('export PATH="/x:$PATH"\n');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

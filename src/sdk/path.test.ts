import { describe, expect, it } from "vitest";
import { createBufferLogger } from "../logger.js";
import { FakeSystem } from "../test/fakeSystem.js";
import { pathExportLine, persistSdkPath, prependToPath } from "./path.js";

describe("pathExportLine", () => {
  it("writes SDKs under home relative to $HOME", () => {
    expect(pathExportLine("/Users/dev/development/flutter", "/Users/dev")).toBe(
      'export PATH="$HOME/development/flutter/bin:$PATH"'
    );
  });

  it("keeps SDKs elsewhere absolute", () => {
    expect(pathExportLine("/opt/flutter", "/Users/dev")).toBe(
      'export PATH="/opt/flutter/bin:$PATH"'
    );
  });
});

describe("prependToPath", () => {
  it("puts the directory first once", () => {
    expect(prependToPath("/usr/bin:/bin", "/sdk/bin")).toBe("/sdk/bin:/usr/bin:/bin");
    expect(prependToPath("/usr/bin:/sdk/bin", "/sdk/bin")).toBe("/usr/bin:/sdk/bin");
    expect(prependToPath(undefined, "/sdk/bin")).toBe("/sdk/bin");
  });
});

describe("persistSdkPath", () => {
  it("updates the process PATH and the profile exactly once", async () => {
    const system = new FakeSystem();
    const { logger, lines } = createBufferLogger();
    const env: NodeJS.ProcessEnv = { PATH: "/usr/bin" };
    const options = {
      sdkRoot: "/Users/dev/development/flutter",
      home: "/Users/dev",
      profilePath: "/Users/dev/.zprofile",
      system,
      logger,
      env,
    };

    expect(await persistSdkPath(options)).toBe(true);
    expect(await persistSdkPath(options)).toBe(false);

    expect(env.PATH).toBe("/Users/dev/development/flutter/bin:/usr/bin");
    expect(system.files.get("/Users/dev/.zprofile")).toBe(
      'export PATH="$HOME/development/flutter/bin:$PATH"\n'
    );
    expect(lines).toEqual(["✓ Flutter PATH added to /Users/dev/.zprofile"]);
  });
});

// @vitest-environment node
import { describe, it, expect } from "vitest";
import { stat, readFile } from "node:fs/promises";
import { join } from "node:path";
import { createTempDir, fakeYqScript, isProcessAlive, writeExecutable } from "./test-utils";

describe("createTempDir", () => {
  it("creates a directory and removes it on cleanup", async () => {
    const { path, cleanup } = await createTempDir();

    expect((await stat(path)).isDirectory()).toBe(true);

    await cleanup();

    await expect(stat(path)).rejects.toThrow();
  });
});

describe("writeExecutable", () => {
  it("creates parent directories and writes the content", async () => {
    const { path, cleanup } = await createTempDir();
    try {
      const target = join(path, "nested", "yq");

      await writeExecutable(target, "#!/bin/sh\n");

      expect(await readFile(target, "utf-8")).toBe("#!/bin/sh\n");
    } finally {
      await cleanup();
    }
  });
});

describe("fakeYqScript", () => {
  it("reports the requested version in the banner", () => {
    const script = fakeYqScript({ version: "v4.30.1" });

    expect(script.split("\n")).toContain(
      '  echo "yq (https://github.com/mikefarah/yq/) version v4.30.1"'
    );
  });

  it("runs the custom body for other invocations", () => {
    const script = fakeYqScript({ body: "exit 3" });

    expect(script.endsWith("exit 3\n")).toBe(true);
  });
});

describe("isProcessAlive", () => {
  it("reports the current process as alive", () => {
    expect(isProcessAlive(process.pid)).toBe(true);
  });
});

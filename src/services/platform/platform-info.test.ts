import { homedir } from "node:os";
import { describe, it, expect } from "vitest";
import { createNodePlatformInfo } from "./platform-info";
import { createMockPlatformInfo } from "./platform-info.test-utils";

describe("createNodePlatformInfo", () => {
  it("reports the running process", () => {
    expect(createNodePlatformInfo()).toEqual({
      platform: process.platform,
      arch: process.arch,
      homeDir: homedir(),
    });
  });
});

describe("createMockPlatformInfo", () => {
  it("defaults to linux x64", () => {
    expect(createMockPlatformInfo()).toEqual({
      platform: "linux",
      arch: "x64",
      homeDir: "/home/test",
    });
  });

  it("applies overrides", () => {
    expect(createMockPlatformInfo({ platform: "win32", arch: "arm64" })).toMatchObject({
      platform: "win32",
      arch: "arm64",
    });
  });
});

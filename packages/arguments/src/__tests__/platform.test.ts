import { describe, expect, it } from "vitest";
import { createResolutionContext, detectPlatform } from "../platform.js";

describe("detectPlatform", () => {
  it("maps Node identifiers to document names", () => {
    expect(detectPlatform("win32", "x64")).toEqual({ name: "windows", arch: "x86_64" });
    expect(detectPlatform("darwin", "arm64")).toEqual({ name: "osx", arch: "arm64" });
    expect(detectPlatform("linux", "ia32")).toEqual({ name: "linux", arch: "x86" });
  });

  it("passes unknown identifiers through", () => {
    expect(detectPlatform("freebsd", "riscv64")).toEqual({ name: "freebsd", arch: "riscv64" });
  });
});

describe("createResolutionContext", () => {
  it("builds a frozen context from its inputs", () => {
    const context = createResolutionContext({
      constants: { version_name: "1.21" },
      features: ["is_demo_user"],
      platform: { name: "linux", arch: "x86_64" },
    });

    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context.constants)).toBe(true);
    expect(context.features.has("is_demo_user")).toBe(true);
    expect(context.platform).toEqual({ name: "linux", arch: "x86_64" });
  });

  it("defaults to no features and the detected platform", () => {
    const context = createResolutionContext({ constants: {} });

    expect(context.features.size).toBe(0);
    expect(context.platform).toEqual(detectPlatform());
  });
});

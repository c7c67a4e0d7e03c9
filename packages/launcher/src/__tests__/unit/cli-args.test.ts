import { ValidationError } from "@cubelaunch/errors";
import { describe, expect, it } from "vitest";
import { applyOverrides, parseArgs } from "../../cli.js";
import { defaultConfig } from "../../config/index.js";

describe("parseArgs", () => {
  it("returns defaults for no arguments", () => {
    expect(parseArgs([])).toEqual({
      config: undefined,
      version: undefined,
      workDir: undefined,
      java: undefined,
      features: [],
      concurrency: undefined,
      dryRun: false,
      format: "terminal",
      help: false,
    });
  });

  it("maps every flag", () => {
    const args = parseArgs([
      "--config",
      "launch.yaml",
      "--version",
      "latest-snapshot",
      "--work-dir",
      "/games/run",
      "--java",
      "/opt/jdk/bin/java",
      "--feature",
      "is_demo_user",
      "--concurrency",
      "8",
      "--dry-run",
      "--format",
      "json",
    ]);

    expect(args).toEqual({
      config: "launch.yaml",
      version: "latest-snapshot",
      workDir: "/games/run",
      java: "/opt/jdk/bin/java",
      features: ["is_demo_user"],
      concurrency: 8,
      dryRun: true,
      format: "json",
      help: false,
    });
  });

  it("honours --dry-run=true and --dry-run=false", () => {
    expect(parseArgs(["--dry-run=true"]).dryRun).toBe(true);
    expect(parseArgs(["--dry-run=false"]).dryRun).toBe(false);
    expect(parseArgs(["--help=true"]).help).toBe(true);
  });

  it("rejects other inline values on boolean flags", () => {
    expect(() => parseArgs(["--dry-run=yes"])).toThrow(
      "--dry-run takes no value other than true or false",
    );
  });

  it("rejects unknown options", () => {
    expect(() => parseArgs(["--bogus"])).toThrow("Unknown option: --bogus");
  });

  it("rejects positional arguments", () => {
    expect(() => parseArgs(["1.21"])).toThrow(ValidationError);
  });

  it("rejects an invalid format", () => {
    expect(() => parseArgs(["--format", "xml"])).toThrow(
      '--format must be "terminal" or "json", got "xml"',
    );
  });

  it("rejects a non-integer concurrency", () => {
    expect(() => parseArgs(["--concurrency", "0"])).toThrow(ValidationError);
    expect(() => parseArgs(["--concurrency", "2.5"])).toThrow(ValidationError);
  });

  it("rejects a value flag given without a value", () => {
    expect(() => parseArgs(["--java"])).toThrow("--java requires a value");
  });
});

describe("applyOverrides", () => {
  it("layers flags over config and merges features", () => {
    const config = { ...defaultConfig(), features: ["has_custom_resolution"] };
    const args = parseArgs([
      "--version",
      "1.20.4",
      "--java",
      "/opt/java",
      "--feature",
      "is_demo_user,has_custom_resolution",
      "--concurrency",
      "2",
    ]);

    const result = applyOverrides(config, args);

    expect(result.version).toBe("1.20.4");
    expect(result.javaPath).toBe("/opt/java");
    expect(result.features).toEqual(["has_custom_resolution", "is_demo_user"]);
    expect(result.sync).toEqual({ concurrency: 2, timeoutMs: 30_000, stopOnFailure: false });
    expect(Object.isFrozen(result)).toBe(true);
  });

  it("keeps config values when no flags are given", () => {
    const config = defaultConfig();

    expect(applyOverrides(config, parseArgs([]))).toEqual(config);
  });
});

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigFileNotFoundError, ConfigSchemaError } from "@cubelaunch/errors";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG_FILE, defaultConfig, loadConfig } from "../../config/index.js";

describe("loadConfig", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "cubelaunch-config-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("falls back to defaults when the default file is absent", async () => {
    await expect(loadConfig(undefined, { cwd: tmpDir })).resolves.toEqual(defaultConfig());
  });

  it("reads the default file from cwd", async () => {
    await writeFile(join(tmpDir, DEFAULT_CONFIG_FILE), "version: latest-snapshot\n");

    const config = await loadConfig(undefined, { cwd: tmpDir });

    expect(config.version).toBe("latest-snapshot");
  });

  it("resolves an explicit relative path against cwd", async () => {
    await writeFile(join(tmpDir, "custom.yaml"), "player:\n  name: ${PLAYER_NAME}\n");

    const config = await loadConfig("custom.yaml", { cwd: tmpDir, env: { PLAYER_NAME: "Alex" } });

    expect(config.player.name).toBe("Alex");
  });

  it("throws ConfigFileNotFoundError for a missing explicit file", async () => {
    const promise = loadConfig("missing.yaml", { cwd: tmpDir });

    await expect(promise).rejects.toBeInstanceOf(ConfigFileNotFoundError);
    await expect(promise).rejects.toThrow(`Config file not found: ${join(tmpDir, "missing.yaml")}`);
  });

  it("surfaces schema errors from the file", async () => {
    await writeFile(join(tmpDir, DEFAULT_CONFIG_FILE), "sync:\n  concurrency: many\n");

    await expect(loadConfig(undefined, { cwd: tmpDir })).rejects.toBeInstanceOf(ConfigSchemaError);
  });
});

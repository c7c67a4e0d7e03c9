import { mkdtemp, readdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ArtifactDescriptor } from "@cubelaunch/core";
import {
  ArtifactFetchError,
  ArtifactIntegrityError,
  ArtifactWriteError,
} from "@cubelaunch/errors";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { computeDigest } from "../../digest.js";
import { InMemoryFetcher } from "../../in-memory-fetcher.js";
import { syncAll } from "../../scheduler.js";
import { ArtifactStoreClient } from "../../store-client.js";

const encoder = new TextEncoder();

function descriptorFor(url: string, content: string, path: string): ArtifactDescriptor {
  const bytes = encoder.encode(content);
  return { url, sha1: computeDigest(bytes), size: bytes.byteLength, path };
}

describe("ArtifactStoreClient", () => {
  let tmpDir: string;
  let fetcher: InMemoryFetcher;
  let client: ArtifactStoreClient;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "cubelaunch-store-"));
    fetcher = new InMemoryFetcher();
    client = new ArtifactStoreClient(fetcher);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("fetches a missing artifact and creates parent directories", async () => {
    const url = "https://example.test/libs/a.jar";
    fetcher.set(url, "library-a");
    const d = descriptorFor(url, "library-a", join(tmpDir, "libraries", "a", "a.jar"));

    const outcome = await client.ensure(d);

    expect(outcome).toEqual({ kind: "fetched", bytes: 9 });
    expect(await readFile(d.path, "utf-8")).toBe("library-a");
    expect(fetcher.requestCount(url)).toBe(1);
  });

  it("is idempotent: a second ensure performs no fetch", async () => {
    const url = "https://example.test/a.jar";
    fetcher.set(url, "library-a");
    const d = descriptorFor(url, "library-a", join(tmpDir, "a.jar"));

    await client.ensure(d);
    const second = await client.ensure(d);

    expect(second).toEqual({ kind: "already-valid" });
    expect(fetcher.requestCount(url)).toBe(1);
  });

  it("re-fetches a file whose content was corrupted", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const url = "https://example.test/a.jar";
    fetcher.set(url, "library-a");
    const d = descriptorFor(url, "library-a", join(tmpDir, "a.jar"));
    await client.ensure(d);

    await writeFile(d.path, "tampered");
    const outcome = await client.ensure(d);

    expect(outcome.kind).toBe("fetched");
    expect(fetcher.requestCount(url)).toBe(2);
    expect(await readFile(d.path, "utf-8")).toBe("library-a");
    expect(warn).toHaveBeenCalledWith(`[ArtifactStore] Digest mismatch for ${d.path}, re-fetching`);
  });

  it("accepts an upper-case expected digest", async () => {
    const url = "https://example.test/a.jar";
    fetcher.set(url, "library-a");
    const d = descriptorFor(url, "library-a", join(tmpDir, "a.jar"));

    const outcome = await client.ensure({ ...d, sha1: d.sha1.toUpperCase() });

    expect(outcome.kind).toBe("fetched");
  });

  it("rejects corrupt bytes and writes nothing", async () => {
    const url = "https://example.test/a.jar";
    fetcher.set(url, "evil");
    const d = descriptorFor(url, "library-a", join(tmpDir, "sub", "a.jar"));

    const error = await client.ensure(d).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ArtifactIntegrityError);
    expect(error).toMatchObject({
      url,
      expectedDigest: d.sha1,
      actualDigest: computeDigest(encoder.encode("evil")),
    });
    await expect(stat(d.path)).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("propagates transport failures", async () => {
    const d = descriptorFor("https://example.test/missing", "x", join(tmpDir, "x"));

    await expect(client.ensure(d)).rejects.toThrow(ArtifactFetchError);
  });

  it("reports filesystem failures as ArtifactWriteError", async () => {
    const url = "https://example.test/a.jar";
    fetcher.set(url, "library-a");
    await writeFile(join(tmpDir, "blocker"), "not a directory");
    const d = descriptorFor(url, "library-a", join(tmpDir, "blocker", "a.jar"));

    await expect(client.ensure(d)).rejects.toThrow(ArtifactWriteError);
  });

  it("warns on size mismatch but keeps the verified bytes", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const url = "https://example.test/a.jar";
    fetcher.set(url, "library-a");
    const d = { ...descriptorFor(url, "library-a", join(tmpDir, "a.jar")), size: 100 };

    const outcome = await client.ensure(d);

    expect(outcome).toEqual({ kind: "fetched", bytes: 9 });
    expect(warn).toHaveBeenCalledWith(
      `[ArtifactStore] Size mismatch for ${url}: expected 100, got 9`,
    );
  });

  it("leaves no temp files behind", async () => {
    const url = "https://example.test/a.jar";
    fetcher.set(url, "library-a");
    await client.ensure(descriptorFor(url, "library-a", join(tmpDir, "a.jar")));

    expect(await readdir(tmpDir)).toEqual(["a.jar"]);
  });
});

describe("syncAll with ArtifactStoreClient", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "cubelaunch-sync-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("downloads a batch once and then reports everything as valid", async () => {
    const fetcher = new InMemoryFetcher();
    const descriptors = ["one", "two", "three"].map((name) => {
      const url = `https://example.test/${name}`;
      fetcher.set(url, `content-${name}`);
      return descriptorFor(url, `content-${name}`, join(tmpDir, name));
    });
    const client = new ArtifactStoreClient(fetcher);

    const first = await syncAll(client, descriptors);
    const second = await syncAll(client, descriptors);

    expect(first.summary.fetched).toBe(3);
    expect(second.summary.alreadyValid).toBe(3);
    expect(fetcher.requestCount()).toBe(3);
  });
});

import { ManifestParseError, ManifestSchemaError } from "@cubelaunch/errors";
import { describe, expect, it } from "vitest";
import { parseAssetIndex, parseVersionInfo, parseVersionManifest } from "../../parser.js";
import { ASSET_INDEX, clone, VERSION_INFO, VERSION_MANIFEST } from "../helpers/fixtures.js";

describe("parseVersionManifest", () => {
  it("parses a valid manifest", () => {
    const manifest = parseVersionManifest(JSON.stringify(VERSION_MANIFEST));

    expect(manifest.latest).toEqual({ release: "1.21", snapshot: "24w14a" });
    expect(manifest.versions.map((v) => v.id)).toEqual(["24w14a", "1.21"]);
    expect(manifest.versions[1]?.type).toBe("release");
  });

  it("deep-freezes the result", () => {
    const manifest = parseVersionManifest(JSON.stringify(VERSION_MANIFEST));

    expect(Object.isFrozen(manifest)).toBe(true);
    expect(Object.isFrozen(manifest.versions)).toBe(true);
    expect(Object.isFrozen(manifest.versions[0])).toBe(true);
  });

  it("throws ManifestParseError on invalid JSON", () => {
    expect(() => parseVersionManifest("{ not json")).toThrow(ManifestParseError);
    expect(() => parseVersionManifest("{ not json")).toThrow(/^Failed to parse version manifest: /);
  });

  it("throws ManifestSchemaError listing each issue", () => {
    try {
      parseVersionManifest(JSON.stringify({ versions: VERSION_MANIFEST.versions }));
      expect.fail("should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestSchemaError);
      expect(error instanceof ManifestSchemaError && error.issues).toEqual(["latest: Required"]);
    }
  });

  it("rejects an unknown version type", () => {
    const doc = clone(VERSION_MANIFEST);
    const first = doc.versions[0];
    if (first) first.type = "beta";

    expect(() => parseVersionManifest(JSON.stringify(doc))).toThrow(
      /versions\.0\.type: Invalid enum value/,
    );
  });

  it("rejects a malformed digest", () => {
    const doc = clone(VERSION_MANIFEST);
    const first = doc.versions[0];
    if (first) first.sha1 = "not-a-digest";

    expect(() => parseVersionManifest(JSON.stringify(doc))).toThrow(
      "versions.0.sha1: Must be a 40-character hex SHA-1 digest",
    );
  });

  it("reports a non-object document without a path", () => {
    try {
      parseVersionManifest("[]");
      expect.fail("should throw");
    } catch (error) {
      expect(error instanceof ManifestSchemaError && error.issues).toEqual([
        "Expected object, received array",
      ]);
    }
  });
});

describe("parseVersionInfo", () => {
  it("normalizes literal and guarded arguments", () => {
    const info = parseVersionInfo(JSON.stringify(VERSION_INFO));

    expect(info.arguments.game).toEqual([
      { kind: "literal", value: "--username" },
      { kind: "literal", value: "${auth_player_name}" },
      {
        kind: "guarded",
        rules: [{ action: "allow", features: { has_custom_resolution: true } }],
        value: { kind: "multiple", values: ["--width", "${resolution_width}"] },
      },
    ]);
    expect(info.arguments.jvm[1]).toEqual({
      kind: "guarded",
      rules: [{ action: "allow", os: { arch: "x86" } }],
      value: { kind: "single", value: "-Xss1M" },
    });
  });

  it("defaults library rules to an empty list", () => {
    const info = parseVersionInfo(JSON.stringify(VERSION_INFO));

    expect(info.libraries[0]?.rules).toEqual([]);
    expect(info.libraries[1]?.rules).toEqual([{ action: "allow", os: { name: "osx" } }]);
    expect(info.libraries[2]?.downloads.artifact).toBeUndefined();
  });

  it("keeps the remaining fields", () => {
    const info = parseVersionInfo(JSON.stringify(VERSION_INFO));

    expect(info.id).toBe("1.21");
    expect(info.mainClass).toBe("net.example.client.main.Main");
    expect(info.assetIndex.id).toBe("17");
    expect(info.javaVersion.majorVersion).toBe(21);
    expect(info.logging?.client?.file.id).toBe("client-1.12.xml");
  });

  it("strips unknown keys", () => {
    const doc = { ...clone(VERSION_INFO), extraField: true };

    expect(parseVersionInfo(JSON.stringify(doc))).not.toHaveProperty("extraField");
  });

  it("rejects an argument entry that is neither string nor rule object", () => {
    const doc = clone(VERSION_INFO);
    const broken = { ...doc, arguments: { game: [42], jvm: [] } };

    expect(() => parseVersionInfo(JSON.stringify(broken))).toThrow(ManifestSchemaError);
  });

  it("rejects a rule with an unknown action", () => {
    const doc = clone(VERSION_INFO);
    const broken = {
      ...doc,
      arguments: { game: [{ rules: [{ action: "maybe" }], value: "--x" }], jvm: [] },
    };

    expect(() => parseVersionInfo(JSON.stringify(broken))).toThrow(ManifestSchemaError);
  });
});

describe("parseAssetIndex", () => {
  it("parses objects keyed by name", () => {
    const index = parseAssetIndex(JSON.stringify(ASSET_INDEX));

    expect(Object.keys(index.objects)).toHaveLength(3);
    expect(index.objects["icons/icon_32x32.png"]).toEqual({
      hash: "92750c5f93c312ba9ab413d546f32190c56d6f1f",
      size: 5362,
    });
  });

  it("rejects a negative size", () => {
    const doc = { objects: { a: { hash: "a".repeat(40), size: -1 } } };

    expect(() => parseAssetIndex(JSON.stringify(doc))).toThrow(ManifestSchemaError);
  });
});

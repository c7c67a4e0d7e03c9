/**
 * Manifest document fixtures.
 */

export const RELEASE_SHA1 = "c".repeat(40);
export const SNAPSHOT_SHA1 = "b".repeat(40);

export const VERSION_MANIFEST = {
  latest: { release: "1.21", snapshot: "24w14a" },
  versions: [
    {
      id: "24w14a",
      type: "snapshot",
      url: "https://meta.example.test/v1/packages/24w14a.json",
      time: "2024-04-03T12:00:00+00:00",
      releaseTime: "2024-04-03T11:30:00+00:00",
      sha1: SNAPSHOT_SHA1,
      complianceLevel: 1,
    },
    {
      id: "1.21",
      type: "release",
      url: "https://meta.example.test/v1/packages/1.21.json",
      time: "2024-06-13T08:32:38+00:00",
      releaseTime: "2024-06-13T08:24:03+00:00",
      sha1: RELEASE_SHA1,
      complianceLevel: 1,
    },
  ],
};

export const VERSION_INFO = {
  arguments: {
    game: [
      "--username",
      "${auth_player_name}",
      {
        rules: [{ action: "allow", features: { has_custom_resolution: true } }],
        value: ["--width", "${resolution_width}"],
      },
    ],
    jvm: [
      {
        rules: [{ action: "allow", os: { name: "osx" } }],
        value: ["-XstartOnFirstThread"],
      },
      {
        rules: [{ action: "allow", os: { arch: "x86" } }],
        value: "-Xss1M",
      },
      "-cp",
      "${classpath}",
    ],
  },
  assetIndex: {
    id: "17",
    sha1: "d".repeat(40),
    size: 412,
    totalSize: 1024,
    url: "https://meta.example.test/v1/packages/indexes/17.json",
  },
  assets: "17",
  complianceLevel: 1,
  downloads: {
    client: {
      sha1: "e".repeat(40),
      size: 26,
      url: "https://cdn.example.test/client.jar",
    },
  },
  id: "1.21",
  javaVersion: { component: "java-runtime-delta", majorVersion: 21 },
  libraries: [
    {
      name: "com.example:core:1.0",
      downloads: {
        artifact: {
          path: "com/example/core/1.0/core-1.0.jar",
          sha1: "f".repeat(40),
          size: 10,
          url: "https://libraries.example.test/com/example/core/1.0/core-1.0.jar",
        },
      },
    },
    {
      name: "com.example:mac-only:1.0",
      downloads: {
        artifact: {
          path: "com/example/mac-only/1.0/mac-only-1.0.jar",
          sha1: "0".repeat(40),
          size: 10,
          url: "https://libraries.example.test/com/example/mac-only/1.0/mac-only-1.0.jar",
        },
      },
      rules: [{ action: "allow", os: { name: "osx" } }],
    },
    {
      name: "com.example:natives-only:1.0",
      downloads: {},
    },
  ],
  logging: {
    client: {
      argument: "-Dlog4j.configurationFile=${path}",
      file: {
        id: "client-1.12.xml",
        sha1: "1".repeat(40),
        size: 888,
        url: "https://cdn.example.test/client-1.12.xml",
      },
      type: "log4j2-xml",
    },
  },
  mainClass: "net.example.client.main.Main",
  minimumLauncherVersion: 21,
  releaseTime: "2024-06-13T08:24:03+00:00",
  time: "2024-06-13T08:24:03+00:00",
  type: "release",
};

export const ASSET_INDEX = {
  objects: {
    "icons/icon_16x16.png": { hash: "bdf48ef6b5d0d23bbb02e17d04865216179f510a", size: 3665 },
    "icons/icon_32x32.png": { hash: "92750c5f93c312ba9ab413d546f32190c56d6f1f", size: 5362 },
    "sounds/duplicate.ogg": { hash: "bdf48ef6b5d0d23bbb02e17d04865216179f510a", size: 3665 },
  },
};

/** Deep copy of a fixture as a plain mutable JSON value */
export function clone<T>(value: T): T {
  return structuredClone(value);
}

/**
 * Zod schemas for the wire format of the three manifest documents.
 */

import { z } from "zod";

const SHA1_PATTERN = /^[0-9a-fA-F]{40}$/;

export const Sha1Schema = z
  .string()
  .regex(SHA1_PATTERN, { message: "Must be a 40-character hex SHA-1 digest" });

const TimestampSchema = z.string().datetime({ offset: true });

export const VersionTypeSchema = z.enum(["release", "snapshot", "old_beta", "old_alpha"]);

export const FileInfoSchema = z.object({
  sha1: Sha1Schema,
  size: z.number().int().nonnegative(),
  url: z.string().url(),
});

// ---------------------------------------------------------------------------
// Rules and arguments (untagged on the wire)
// ---------------------------------------------------------------------------

export const RuleSchema = z.object({
  action: z.enum(["allow", "deny"]),
  features: z.record(z.string(), z.boolean()).optional(),
  os: z
    .object({
      name: z.string().optional(),
      arch: z.string().optional(),
    })
    .optional(),
});

export const RuleValueSchema = z.union([z.string(), z.array(z.string())]);

export const LaunchArgumentSchema = z.union([
  z.string(),
  z.object({
    rules: z.array(RuleSchema),
    value: RuleValueSchema,
  }),
]);

export const LaunchArgumentsSchema = z.object({
  game: z.array(LaunchArgumentSchema),
  jvm: z.array(LaunchArgumentSchema),
});

// ---------------------------------------------------------------------------
// Version manifest
// ---------------------------------------------------------------------------

export const VersionEntrySchema = z.object({
  id: z.string().min(1),
  type: VersionTypeSchema,
  url: z.string().url(),
  time: TimestampSchema,
  releaseTime: TimestampSchema,
  sha1: Sha1Schema,
  complianceLevel: z.number().int().nonnegative().optional(),
});

export const VersionManifestSchema = z.object({
  latest: z.object({
    release: z.string().min(1),
    snapshot: z.string().min(1),
  }),
  versions: z.array(VersionEntrySchema),
});

// ---------------------------------------------------------------------------
// Version info
// ---------------------------------------------------------------------------

export const LibrarySchema = z.object({
  name: z.string().min(1),
  downloads: z.object({
    artifact: FileInfoSchema.extend({ path: z.string().min(1) }).optional(),
  }),
  rules: z.array(RuleSchema).optional(),
});

const SidedLoggingSchema = z.object({
  argument: z.string(),
  file: FileInfoSchema.extend({ id: z.string().min(1) }),
  type: z.string(),
});

export const VersionInfoSchema = z.object({
  arguments: LaunchArgumentsSchema,
  assetIndex: FileInfoSchema.extend({
    id: z.string().min(1),
    totalSize: z.number().int().nonnegative(),
  }),
  assets: z.string().min(1),
  complianceLevel: z.number().int().nonnegative().optional(),
  downloads: z.object({
    client: FileInfoSchema,
    client_mappings: FileInfoSchema.optional(),
    server: FileInfoSchema.optional(),
    server_mappings: FileInfoSchema.optional(),
  }),
  id: z.string().min(1),
  javaVersion: z.object({
    component: z.string().min(1),
    majorVersion: z.number().int().positive(),
  }),
  libraries: z.array(LibrarySchema),
  logging: z
    .object({
      client: SidedLoggingSchema.optional(),
      server: SidedLoggingSchema.optional(),
    })
    .optional(),
  mainClass: z.string().min(1),
  minimumLauncherVersion: z.number().int().nonnegative(),
  releaseTime: TimestampSchema,
  time: TimestampSchema,
  type: VersionTypeSchema,
});

// ---------------------------------------------------------------------------
// Asset index
// ---------------------------------------------------------------------------

export const AssetIndexSchema = z.object({
  objects: z.record(
    z.string(),
    z.object({
      hash: Sha1Schema,
      size: z.number().int().nonnegative(),
    }),
  ),
});

export type RawRule = z.infer<typeof RuleSchema>;
export type RawLaunchArgument = z.infer<typeof LaunchArgumentSchema>;
export type RawLibrary = z.infer<typeof LibrarySchema>;
export type RawVersionInfo = z.infer<typeof VersionInfoSchema>;

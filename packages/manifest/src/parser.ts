/**
 * Synchronous manifest document parsers.
 * JSON parse → Zod validation → normalization → deep freeze.
 */

import { isError, ManifestParseError, ManifestSchemaError } from "@cubelaunch/errors";
import type { z } from "zod";

import { deepFreeze } from "./freeze.js";
import { normalizeVersionInfo } from "./normalize.js";
import { AssetIndexSchema, VersionInfoSchema, VersionManifestSchema } from "./schema.js";
import type { AssetIndex, VersionInfo, VersionManifest } from "./types.js";

/**
 * Formats Zod issues as `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

function parseJson(text: string, document: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error: unknown) {
    throw new ManifestParseError(
      document,
      isError(error) ? error.message : String(error),
      isError(error) ? error : undefined,
    );
  }
}

function validate<T extends z.ZodTypeAny>(schema: T, value: unknown, document: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ManifestSchemaError(document, formatIssues(result.error), result.error);
  }
  return result.data;
}

/**
 * Parses the version manifest listing every published version.
 *
 * @throws ManifestParseError when the text is not JSON
 * @throws ManifestSchemaError when the document does not match the schema
 */
export function parseVersionManifest(text: string): VersionManifest {
  const document = "version manifest";
  return deepFreeze(validate(VersionManifestSchema, parseJson(text, document), document));
}

/**
 * Parses one version's info document. Argument and rule entries come back
 * as tagged `ArgumentSpec` / `Clause` values.
 */
export function parseVersionInfo(text: string): VersionInfo {
  const document = "version info";
  const raw = validate(VersionInfoSchema, parseJson(text, document), document);
  return deepFreeze(normalizeVersionInfo(raw));
}

export function parseAssetIndex(text: string): AssetIndex {
  const document = "asset index";
  return deepFreeze(validate(AssetIndexSchema, parseJson(text, document), document));
}

import type { ArgumentSpec } from "./argument-types.js";
import type { SyncItemResult, SyncOutcome } from "./artifact-types.js";

export function isLiteralSpec(
  spec: ArgumentSpec,
): spec is Extract<ArgumentSpec, { kind: "literal" }> {
  return spec.kind === "literal";
}

export function isFailedResult(
  result: SyncItemResult,
): result is SyncItemResult & { readonly outcome: Extract<SyncOutcome, { kind: "failed" }> } {
  return result.outcome.kind === "failed";
}

import { NotFoundError } from "./bases/not-found-error.js";
import { ValidationError } from "./bases/validation-error.js";

/**
 * Thrown when an explicitly requested config file does not exist.
 */
export class ConfigFileNotFoundError extends NotFoundError<"CONFIG_FILE_NOT_FOUND"> {
  constructor(public readonly filePath: string) {
    super({
      code: "CONFIG_FILE_NOT_FOUND",
      message: `Config file not found: ${filePath}`,
      metadata: { filePath },
    });
  }
}

export class ConfigParseError extends ValidationError<"CONFIG_PARSE_FAILED"> {
  constructor(
    public readonly filePath: string | undefined,
    reason: string,
    public readonly line?: number | undefined,
    public readonly column?: number | undefined,
    cause?: Error,
  ) {
    const location =
      line !== undefined ? ` at line ${line}${column !== undefined ? `:${column}` : ""}` : "";
    super({
      code: "CONFIG_PARSE_FAILED",
      message: `Config parse failed${filePath ? ` (${filePath})` : ""}${location}: ${reason}`,
      cause,
    });
  }
}

export class ConfigSchemaError extends ValidationError<"CONFIG_VALIDATION_FAILED"> {
  constructor(
    public readonly issues: readonly string[],
    cause?: Error,
  ) {
    super({
      code: "CONFIG_VALIDATION_FAILED",
      message: `Config validation failed:\n${issues.map((i) => `  - ${i}`).join("\n")}`,
      cause,
    });
  }
}

/**
 * Thrown when `${VAR}` references in the config file name unset variables.
 * All missing names are reported at once.
 */
export class ConfigInterpolationError extends ValidationError<"CONFIG_INTERPOLATION_FAILED"> {
  constructor(public readonly missingVars: readonly string[]) {
    super({
      code: "CONFIG_INTERPOLATION_FAILED",
      message: `Missing environment variables: ${missingVars.join(", ")}`,
    });
  }
}

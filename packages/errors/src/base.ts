import {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCode,
  type ErrorDomain,
  type ExitCode,
} from "./catalog.js";
import type { LauncherErrorOptions } from "./types.js";

/**
 * Plain-object form of a LauncherError, as written by the JSON reporter.
 */
export interface ErrorJSON {
  readonly name: string;
  readonly type: BaseErrorType;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly exitCode: ExitCode;
  readonly isExpected: boolean;
  readonly metadata?: Readonly<Record<string, string>>;
  readonly cause?: string;
}

/**
 * Root of the cubelaunch error hierarchy.
 *
 * Domain, exit code and expectedness are looked up from the catalog entry
 * of the error's code, so subclasses only pick a code and a message.
 */
export abstract class LauncherError<C extends ErrorCode = ErrorCode> extends Error {
  abstract readonly _tag: BaseErrorType;
  readonly code: C;
  readonly domain: ErrorDomain;
  readonly exitCode: ExitCode;
  readonly isExpected: boolean;
  readonly metadata: Readonly<Record<string, string>> | undefined;

  protected constructor(options: LauncherErrorOptions<C>) {
    super(options.message, options.cause ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    const entry = ERROR_CATALOG[options.code];
    this.code = options.code;
    this.domain = entry.domain;
    this.exitCode = entry.exitCode;
    this.isExpected = entry.isExpected;
    this.metadata = options.metadata ? Object.freeze({ ...options.metadata }) : undefined;
  }

  toJSON(): ErrorJSON {
    return {
      name: this.name,
      type: this._tag,
      code: this.code,
      message: this.message,
      domain: this.domain,
      exitCode: this.exitCode,
      isExpected: this.isExpected,
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.cause instanceof Error ? { cause: this.cause.message } : {}),
    };
  }
}

/**
 * Check if a value is a LauncherError
 */
export function isLauncherError(error: unknown): error is LauncherError {
  return error instanceof LauncherError;
}

/**
 * Check if a value is any Error
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Normalizes the two constructor forms of the base types into options.
 */
export function toOptions<C extends ErrorCode>(
  messageOrOptions: string | LauncherErrorOptions<C>,
  defaultCode: C,
  metadata?: Record<string, string>,
): LauncherErrorOptions<C> {
  if (typeof messageOrOptions === "string") {
    return { code: defaultCode, message: messageOrOptions, metadata };
  }
  return messageOrOptions;
}

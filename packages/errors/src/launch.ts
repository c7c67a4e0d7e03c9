import { ExternalError } from "./bases/external-error.js";

/**
 * Thrown when the game process cannot be spawned.
 */
export class LaunchProcessError extends ExternalError<"LAUNCH_PROCESS_FAILED"> {
  constructor(
    public readonly command: string,
    reason: string,
    cause?: Error,
  ) {
    super({
      code: "LAUNCH_PROCESS_FAILED",
      message: `Failed to start ${command}: ${reason}`,
      metadata: { command },
      cause,
    });
  }
}

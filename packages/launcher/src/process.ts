/**
 * Thin process-launch wrapper around child_process.spawn.
 */

import { spawn } from "node:child_process";
import { LaunchProcessError } from "@cubelaunch/errors";
import type { LaunchPlan } from "./types.js";

/**
 * The part of a child process launchProcess listens to.
 */
export interface SpawnedProcess {
  once(event: "error", listener: (error: Error) => void): unknown;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export interface SpawnOptions {
  readonly cwd: string;
  readonly stdio: "inherit";
}

export type Spawner = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => SpawnedProcess;

const defaultSpawner: Spawner = (command, args, options) =>
  spawn(command, [...args], { cwd: options.cwd, stdio: options.stdio });

/**
 * `[java, ...jvmArgs, mainClass, ...gameArgs]`
 */
export function buildCommandLine(plan: LaunchPlan): string[] {
  return [plan.javaPath, ...plan.jvmArgs, plan.mainClass, ...plan.gameArgs];
}

/**
 * Starts the game in its game directory with inherited stdio and resolves
 * with its exit code. A process killed by a signal resolves with 1.
 *
 * @throws LaunchProcessError when the process cannot be started
 */
export function launchProcess(plan: LaunchPlan, spawner: Spawner = defaultSpawner): Promise<number> {
  const executable = plan.javaPath;
  const args = buildCommandLine(plan).slice(1);

  return new Promise<number>((resolve, reject) => {
    let child: SpawnedProcess;
    try {
      child = spawner(executable, args, { cwd: plan.layout.gameDir, stdio: "inherit" });
    } catch (error: unknown) {
      const cause = error instanceof Error ? error : undefined;
      reject(new LaunchProcessError(executable, cause?.message ?? String(error), cause));
      return;
    }

    child.once("error", (error) => {
      reject(new LaunchProcessError(executable, error.message, error));
    });
    child.once("exit", (code, signal) => {
      if (signal !== null) {
        console.warn(`[Launcher] Game process terminated by ${signal}`);
      }
      resolve(code ?? 1);
    });
  });
}

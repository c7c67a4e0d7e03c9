/**
 * Batch fetch scheduler.
 *
 * Runs one ensure() per descriptor through a fixed-width worker pool. Each
 * item's failure is captured in its own result; the batch itself never
 * rejects because of an item.
 */

import {
  type ArtifactDescriptor,
  isFailedResult,
  type SyncItemResult,
  type SyncOutcome,
  type SyncReport,
  type SyncSummary,
} from "@cubelaunch/core";
import {
  ArtifactSyncFailedError,
  type FailedArtifact,
  isError,
  ValidationError,
  wrapError,
} from "@cubelaunch/errors";
import { type ArtifactEnsurer, DEFAULT_CONCURRENCY, type SyncOptions } from "./types.js";

// ---------------------------------------------------------------------------
// Worker pool
// ---------------------------------------------------------------------------

/**
 * Runs tasks with at most `concurrency` in flight. `results[i]` belongs to
 * `tasks[i]` regardless of completion order.
 *
 * Waits for every worker before returning. If a task threw, the first
 * rejection is re-thrown once all workers have stopped.
 */
export async function runWithConcurrency<T>(
  tasks: readonly (() => Promise<T>)[],
  concurrency: number,
): Promise<T[]> {
  const results: T[] = new Array<T>(tasks.length);
  let index = 0;

  async function worker(): Promise<void> {
    while (index < tasks.length) {
      const current = index;
      index++;
      const task = tasks[current];
      if (task) {
        results[current] = await task();
      }
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(concurrency, tasks.length); i++) {
    workers.push(worker());
  }
  const settled = await Promise.allSettled(workers);
  for (const outcome of settled) {
    if (outcome.status === "rejected") {
      throw outcome.reason;
    }
  }

  return results;
}

// ---------------------------------------------------------------------------
// Summary computation
// ---------------------------------------------------------------------------

export function summarize(results: readonly SyncItemResult[]): SyncSummary {
  let alreadyValid = 0;
  let fetched = 0;
  let failed = 0;
  let skipped = 0;

  for (const result of results) {
    switch (result.outcome.kind) {
      case "already-valid":
        alreadyValid++;
        break;
      case "fetched":
        fetched++;
        break;
      case "failed":
        failed++;
        break;
      case "skipped":
        skipped++;
        break;
    }
  }

  return { total: results.length, alreadyValid, fetched, failed, skipped };
}

// ---------------------------------------------------------------------------
// Batch synchronization
// ---------------------------------------------------------------------------

function validateConcurrency(concurrency: number): void {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ValidationError("concurrency must be an integer >= 1", {
      concurrency: String(concurrency),
    });
  }
}

/**
 * Ensures every descriptor and reports one result per input, in input order.
 *
 * @throws ValidationError when `concurrency` is not a positive integer
 */
export async function syncAll(
  client: ArtifactEnsurer,
  descriptors: readonly ArtifactDescriptor[],
  options?: SyncOptions,
): Promise<SyncReport> {
  const concurrency = options?.concurrency ?? DEFAULT_CONCURRENCY;
  validateConcurrency(concurrency);

  const stopOnFailure = options?.stopOnFailure ?? false;
  const total = descriptors.length;
  const startTime = performance.now();
  let completed = 0;
  let halted = false;

  const settle = (result: SyncItemResult): SyncItemResult => {
    completed++;
    options?.onItemComplete?.(result, completed, total);
    return result;
  };

  const tasks = descriptors.map((descriptor) => async (): Promise<SyncItemResult> => {
    if (halted) {
      return settle({
        descriptor,
        outcome: { kind: "skipped", reason: "batch stopped after an earlier failure" },
        durationMs: 0,
      });
    }

    const itemStart = performance.now();
    let outcome: SyncOutcome;
    try {
      outcome = await client.ensure(descriptor);
    } catch (error) {
      outcome = { kind: "failed", error: isError(error) ? error : wrapError(error) };
      if (stopOnFailure) {
        halted = true;
      }
    }

    return settle({
      descriptor,
      outcome,
      durationMs: Math.round(performance.now() - itemStart),
    });
  });

  const results = await runWithConcurrency(tasks, concurrency);

  return {
    results,
    summary: summarize(results),
    durationMs: Math.round(performance.now() - startTime),
  };
}

/**
 * Throws when any item in the report failed.
 *
 * @param stage - Label used in the error message, e.g. "libraries"
 * @throws ArtifactSyncFailedError listing every failed item
 */
export function assertSynced(report: SyncReport, stage: string): void {
  const failures: FailedArtifact[] = [];
  for (const result of report.results) {
    if (isFailedResult(result)) {
      failures.push({
        path: result.descriptor.path,
        url: result.descriptor.url,
        error: result.outcome.error,
      });
    }
  }

  if (failures.length > 0) {
    throw new ArtifactSyncFailedError(stage, failures);
  }
}

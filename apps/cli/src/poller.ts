import {
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_TIMEOUT_MS,
  RunFailedError,
  TimeoutError,
  isFailureStatus,
  isSuccessStatus,
} from "@callgate/shared";
import type { RunStatus, SuccessRunStatus } from "@callgate/shared";
import type { TestRunsClient } from "@callgate/sdk";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

export interface PollOptions {
  intervalMs?: number;
  timeoutMs?: number;
  /** Called whenever the observed status differs from the previous poll */
  onStatus?: (status: RunStatus, pollCount: number) => void;
  /** When set, partial results are fetched while RUNNING and summarized per call status */
  onProgress?: (total: number, counts: Record<string, number>) => void;
  logger?: Logger;
}

type StatusSource = Pick<TestRunsClient, "getStatus" | "getResults">;

export async function pollRun(
  client: StatusSource,
  runId: string,
  opts: PollOptions = {}
): Promise<SuccessRunStatus> {
  const intervalMs = opts.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const log = opts.logger ?? silentLogger;
  const deadline = Date.now() + timeoutMs;
  let pollCount = 0;
  let lastStatus: RunStatus | undefined;

  const timedOut = () =>
    new TimeoutError(
      `Test run ${runId} did not finish within ${Math.round(timeoutMs / 1000)}s (last status: ${lastStatus ?? "unknown"})`,
      timeoutMs
    );

  for (;;) {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw timedOut();
    }

    pollCount++;
    const { status } = await beforeDeadline(
      remaining,
      (signal) => client.getStatus(runId, { signal }),
      timedOut
    );

    if (status !== lastStatus) {
      opts.onStatus?.(status, pollCount);
      lastStatus = status;
    }
    log.debug(`poll #${pollCount}: status=${status}`);

    if (isSuccessStatus(status)) {
      return status;
    }
    if (isFailureStatus(status)) {
      throw new RunFailedError(runId, status);
    }

    if (status === "RUNNING" && opts.onProgress) {
      await reportProgress(client, runId, deadline, opts.onProgress, log);
    }

    const wait = Math.min(intervalMs, deadline - Date.now());
    if (wait > 0) {
      await new Promise((resolve) => setTimeout(resolve, wait));
    }
  }
}

/**
 * Settles with `fn`, or rejects with `onExpire()` once `remainingMs` passes.
 * The signal handed to `fn` is aborted at that point so the request stops too.
 */
async function beforeDeadline<T>(
  remainingMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  onExpire: () => Error
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject first so the race settles with the timeout, not the abort.
      reject(onExpire());
      controller.abort();
    }, remainingMs);
  });

  try {
    return await Promise.race([fn(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}

async function reportProgress(
  client: StatusSource,
  runId: string,
  deadline: number,
  onProgress: NonNullable<PollOptions["onProgress"]>,
  log: Logger
): Promise<void> {
  try {
    const results = await beforeDeadline(
      deadline - Date.now(),
      (signal) => client.getResults(runId, { signal }),
      () => new Error("deadline reached")
    );
    if (results.calls.length === 0) return;
    const counts: Record<string, number> = {};
    for (const call of results.calls) {
      counts[call.status] = (counts[call.status] ?? 0) + 1;
    }
    onProgress(results.calls.length, counts);
  } catch (err) {
    // Progress is informational; the status endpoint decides the outcome.
    const msg = err instanceof Error ? err.message : String(err);
    log.debug(`could not fetch progress: ${msg}`);
  }
}

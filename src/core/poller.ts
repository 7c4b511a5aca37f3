import { setTimeout as sleep } from "node:timers/promises";
import { PollError } from "./errors.js";
import { reportProgress, type ProgressListener } from "./progress.js";
import { ok, err, type Result } from "./result.js";
import { jobKinds, type AsyncJobHandle, type JobClassifier, type JobStatusSnapshot } from "./jobs.js";
import { logger } from "../logger.js";

export interface PollPolicy {
  /** 0 waits forever. */
  timeoutSeconds: number;
  /** Between 1 and 60. */
  pollingIntervalSeconds: number;
  wantsResultOnSuccess: boolean;
}

export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    await sleep(ms, undefined, { signal });
  },
};

/** Returns null once the job no longer exists on the server. */
export type StatusFetcher<P> = (
  id: string,
  signal?: AbortSignal
) => Promise<JobStatusSnapshot<P> | null>;

export interface PollOptions<P> {
  signal?: AbortSignal;
  onProgress?: ProgressListener;
  clock?: Clock;
  /** Overrides the terminal-state predicate of the handle's kind. */
  classify?: JobClassifier;
  /**
   * Loads the full result object when the policy asks for it. Resolves to
   * null once the job no longer exists.
   */
  fetchResult?: (id: string, signal?: AbortSignal) => Promise<P | null>;
}

export const MIN_POLLING_INTERVAL_SECONDS = 1;
export const MAX_POLLING_INTERVAL_SECONDS = 60;
export const BROWSE_POLL_INTERVAL_MS = 500;
export const BROWSE_MAX_ATTEMPTS = 30;

type PollBudget =
  | { type: "deadline"; timeoutSeconds: number }
  | { type: "attempts"; maxAttempts: number };

interface PollLoop<P> {
  handle: AsyncJobHandle<P>;
  intervalMs: number;
  budget: PollBudget;
  fetchStatus: StatusFetcher<P>;
  classify: JobClassifier;
  signal?: AbortSignal;
  onProgress?: ProgressListener;
  clock: Clock;
}

function cancelled(handle: AsyncJobHandle): PollError {
  return new PollError(`Wait for ${handle.displayName} was cancelled`, "CANCELLED", handle.id);
}

function vanished(handle: AsyncJobHandle): PollError {
  return new PollError(`${handle.displayName} no longer exists`, "JOB_VANISHED", handle.id);
}

/**
 * Runs one sleep or request. A rejection caused by the caller's abort becomes
 * CANCELLED; any other rejection propagates unchanged.
 */
async function unlessCancelled<T>(
  handle: AsyncJobHandle,
  signal: AbortSignal | undefined,
  work: () => Promise<T>
): Promise<Result<T, PollError>> {
  try {
    return ok(await work());
  } catch (error) {
    if (signal?.aborted) {
      return err(cancelled(handle));
    }
    throw error;
  }
}

/**
 * Maps a snapshot to a final result, or undefined while the job is still
 * running.
 */
function settle<P>(
  handle: AsyncJobHandle<P>,
  snapshot: JobStatusSnapshot<P> | null,
  classify: JobClassifier
): Result<JobStatusSnapshot<P>, PollError> | undefined {
  if (snapshot === null) {
    return err(vanished(handle));
  }

  const outcome = classify(snapshot);
  if (outcome === "failed") {
    const detail = snapshot.statusInfo ? `: ${snapshot.statusInfo}` : "";
    return err(
      new PollError(
        `${handle.displayName} ended in state '${snapshot.state}'${detail}`,
        "JOB_FAILED",
        handle.id,
        snapshot.statusInfo
      )
    );
  }
  if (outcome === "succeeded") {
    return ok(snapshot);
  }
  return undefined;
}

function percentComplete(budget: PollBudget, elapsedSeconds: number, attempts: number): number | undefined {
  if (budget.type === "attempts") {
    return Math.min(100, Math.round((attempts / budget.maxAttempts) * 100));
  }
  if (budget.timeoutSeconds === 0) {
    return undefined;
  }
  return Math.min(100, Math.round((elapsedSeconds / budget.timeoutSeconds) * 100));
}

function budgetExhausted(budget: PollBudget, elapsedSeconds: number, attempts: number): boolean {
  if (budget.type === "attempts") {
    return attempts >= budget.maxAttempts;
  }
  return budget.timeoutSeconds > 0 && elapsedSeconds >= budget.timeoutSeconds;
}

async function pollUntilTerminal<P>(loop: PollLoop<P>): Promise<Result<JobStatusSnapshot<P>, PollError>> {
  const { handle, intervalMs, budget, fetchStatus, classify, signal, onProgress, clock } = loop;
  const startedAt = clock.now();

  if (signal?.aborted) {
    return err(cancelled(handle));
  }

  const lastKnown = handle.lastKnown;
  const initial = lastKnown
    ? ok(lastKnown)
    : await unlessCancelled(handle, signal, () => fetchStatus(handle.id, signal));
  if (!initial.ok) {
    return initial;
  }
  const immediate = settle(handle, initial.value, classify);
  if (immediate) {
    return immediate;
  }

  let attempts = 0;
  for (;;) {
    if (signal?.aborted) {
      return err(cancelled(handle));
    }
    const slept = await unlessCancelled(handle, signal, () => clock.sleep(intervalMs, signal));
    if (!slept.ok) {
      return slept;
    }
    attempts += 1;

    const fetched = await unlessCancelled(handle, signal, () => fetchStatus(handle.id, signal));
    if (!fetched.ok) {
      return fetched;
    }
    const snapshot = fetched.value;
    const elapsedSeconds = (clock.now() - startedAt) / 1000;
    const state = snapshot?.state ?? "missing";
    const percent = percentComplete(budget, elapsedSeconds, attempts);
    const detail = snapshot?.statusInfo ?? state;

    reportProgress(onProgress, {
      operation: handle.kind,
      jobId: handle.id,
      state,
      ...(percent === undefined ? {} : { percent }),
      message: `${handle.displayName}: ${detail}`,
    });

    const settled = settle(handle, snapshot, classify);
    if (settled) {
      return settled;
    }

    if (budgetExhausted(budget, elapsedSeconds, attempts)) {
      const spent =
        budget.type === "attempts"
          ? `${attempts} attempts`
          : `${Math.round(elapsedSeconds)} seconds`;
      logger.warn(`Gave up waiting for ${handle.displayName} after ${spent}`);
      return err(
        new PollError(
          `Timed out waiting for ${handle.displayName} after ${spent}`,
          "TIMEOUT",
          handle.id,
          snapshot?.statusInfo,
          { elapsedSeconds, attempts }
        )
      );
    }
  }
}

function validatePolicy(handle: AsyncJobHandle, policy: PollPolicy): PollError | undefined {
  if (handle.id.trim() === "") {
    return new PollError("Job id must not be empty", "INVALID_POLICY", handle.id);
  }
  const interval = policy.pollingIntervalSeconds;
  if (
    !Number.isFinite(interval) ||
    interval < MIN_POLLING_INTERVAL_SECONDS ||
    interval > MAX_POLLING_INTERVAL_SECONDS
  ) {
    return new PollError(
      `Polling interval must be between ${MIN_POLLING_INTERVAL_SECONDS} and ${MAX_POLLING_INTERVAL_SECONDS} seconds, got ${interval}`,
      "INVALID_POLICY",
      handle.id
    );
  }
  if (!Number.isFinite(policy.timeoutSeconds) || policy.timeoutSeconds < 0) {
    return new PollError(
      `Timeout must be zero or more seconds, got ${policy.timeoutSeconds}`,
      "INVALID_POLICY",
      handle.id
    );
  }
  return undefined;
}

/**
 * Waits until a task or import job reaches a terminal state.
 *
 * A job that is already terminal returns without sleeping. Otherwise the job
 * is re-fetched every `pollingIntervalSeconds` until it succeeds, fails,
 * disappears, or `timeoutSeconds` elapses. Nothing is retried.
 */
export async function waitForCompletion<P>(
  handle: AsyncJobHandle<P>,
  policy: PollPolicy,
  fetchStatus: StatusFetcher<P>,
  options: PollOptions<P> = {}
): Promise<Result<JobStatusSnapshot<P>, PollError>> {
  const invalid = validatePolicy(handle, policy);
  if (invalid) {
    return err(invalid);
  }

  logger.debug(
    `Waiting for ${handle.displayName} (timeout ${policy.timeoutSeconds}s, interval ${policy.pollingIntervalSeconds}s)`
  );

  const result = await pollUntilTerminal({
    handle,
    intervalMs: policy.pollingIntervalSeconds * 1000,
    budget: { type: "deadline", timeoutSeconds: policy.timeoutSeconds },
    fetchStatus,
    classify: options.classify ?? jobKinds[handle.kind],
    signal: options.signal,
    onProgress: options.onProgress,
    clock: options.clock ?? systemClock,
  });

  const { fetchResult, signal } = options;
  if (result.ok && policy.wantsResultOnSuccess && fetchResult) {
    const loaded = await unlessCancelled(handle, signal, () => fetchResult(handle.id, signal));
    if (!loaded.ok) {
      return loaded;
    }
    if (loaded.value === null) {
      return err(vanished(handle));
    }
    return ok({ ...result.value, resultPayload: loaded.value });
  }
  return result;
}

/**
 * Waits for a directory-browse request. Browse requests are short-lived, so
 * the wait is bounded by attempts rather than wall-clock time.
 */
export async function waitForBrowse<P>(
  handle: AsyncJobHandle<P>,
  fetchStatus: StatusFetcher<P>,
  options: Omit<PollOptions<P>, "fetchResult"> = {}
): Promise<Result<JobStatusSnapshot<P>, PollError>> {
  if (handle.id.trim() === "") {
    return err(new PollError("Job id must not be empty", "INVALID_POLICY", handle.id));
  }

  return pollUntilTerminal({
    handle,
    intervalMs: BROWSE_POLL_INTERVAL_MS,
    budget: { type: "attempts", maxAttempts: BROWSE_MAX_ATTEMPTS },
    fetchStatus,
    classify: options.classify ?? jobKinds.browse,
    signal: options.signal,
    onProgress: options.onProgress,
    clock: options.clock ?? systemClock,
  });
}

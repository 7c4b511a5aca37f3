import type {
  BrowseRecord,
  DirectoryEntry,
  ImportJobRecord,
  TaskRecord,
  VergeKey,
} from "../types/vergeos.js";

export type JobKind = "task" | "import" | "browse";

export interface JobStatusSnapshot<P = unknown> {
  readonly state: string;
  readonly statusInfo?: string;
  readonly resultPayload: P | null;
  readonly isRunning: boolean;
}

export interface AsyncJobHandle<P = unknown> {
  readonly id: string;
  readonly kind: JobKind;
  readonly displayName: string;
  /** Status observed when the job was submitted, if the caller has one. */
  readonly lastKnown?: JobStatusSnapshot<P>;
}

export type JobOutcome = "running" | "succeeded" | "failed";

export type JobClassifier = (snapshot: JobStatusSnapshot) => JobOutcome;

const FAILED_STATES = new Set(["error", "aborted"]);

/** Terminal-state predicates per job kind. */
export const jobKinds: Record<JobKind, JobClassifier> = {
  task: (snapshot) => {
    if (FAILED_STATES.has(snapshot.state)) return "failed";
    return snapshot.isRunning ? "running" : "succeeded";
  },
  import: (snapshot) => {
    if (FAILED_STATES.has(snapshot.state)) return "failed";
    return snapshot.state === "complete" ? "succeeded" : "running";
  },
  browse: (snapshot) => {
    if (snapshot.state === "error") return "failed";
    return snapshot.state === "complete" ? "succeeded" : "running";
  },
};

export function createHandle<P = unknown>(
  kind: JobKind,
  id: VergeKey,
  displayName?: string,
  lastKnown?: JobStatusSnapshot<P>
): AsyncJobHandle<P> {
  return {
    id: String(id),
    kind,
    displayName: displayName ?? `${kind} ${id}`,
    ...(lastKnown ? { lastKnown } : {}),
  };
}

export function taskSnapshot(record: TaskRecord): JobStatusSnapshot<TaskRecord> {
  const state = record.status ?? (record.is_running ? "running" : "idle");
  return {
    state,
    isRunning: record.is_running ?? state === "running",
    statusInfo: record.name ? `${record.name}: ${state}` : state,
    resultPayload: null,
  };
}

export interface ImportResult {
  vm: VergeKey | null;
}

export function importSnapshot(record: ImportJobRecord): JobStatusSnapshot<ImportResult> {
  const statusInfo = record.status_info ?? undefined;
  return {
    state: record.status,
    isRunning: record.status === "initializing" || record.status === "running",
    ...(statusInfo ? { statusInfo } : {}),
    resultPayload: record.status === "complete" ? { vm: record.vm ?? null } : null,
  };
}

type ListingParse = { ok: true; entries: DirectoryEntry[] } | { ok: false; message: string };

function isDirectoryEntry(value: unknown): value is DirectoryEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string"
  );
}

/**
 * Normalizes the `result` of a browse request into directory entries.
 * Absent and empty results mean an empty directory.
 */
export function parseListing(result: unknown): ListingParse {
  if (result === null || result === undefined || result === "") {
    return { ok: true, entries: [] };
  }
  if (Array.isArray(result)) {
    return { ok: true, entries: result.filter(isDirectoryEntry) };
  }
  if (typeof result === "string") {
    let parsed: unknown;
    try {
      parsed = JSON.parse(result);
    } catch {
      return { ok: false, message: result };
    }
    return typeof parsed === "string" ? { ok: false, message: parsed } : parseListing(parsed);
  }
  if (typeof result === "object" && "entries" in result) {
    return parseListing(result.entries);
  }
  return { ok: false, message: `Unrecognized directory listing: ${JSON.stringify(result)}` };
}

export function browseSnapshot(record: BrowseRecord): JobStatusSnapshot<DirectoryEntry[]> {
  if (record.status === "error") {
    return {
      state: "error",
      isRunning: false,
      statusInfo: typeof record.result === "string" ? record.result : "Directory browse failed",
      resultPayload: null,
    };
  }
  if (record.status !== "complete") {
    return { state: record.status, isRunning: true, resultPayload: null };
  }

  const listing = parseListing(record.result);
  if (!listing.ok) {
    return { state: "error", isRunning: false, statusInfo: listing.message, resultPayload: null };
  }
  return { state: "complete", isRunning: false, resultPayload: listing.entries };
}

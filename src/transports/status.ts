import { browseSnapshot, importSnapshot, taskSnapshot, type ImportResult } from "../core/jobs.js";
import type { StatusFetcher } from "../core/poller.js";
import type { DirectoryEntry, TaskRecord } from "../types/vergeos.js";
import type { Transport } from "./types.js";

export function taskStatusFetcher(transport: Transport): StatusFetcher<TaskRecord> {
  return async (id, signal) => {
    const task = await transport.getTask(id, signal);
    return task ? taskSnapshot(task) : null;
  };
}

export function importStatusFetcher(transport: Transport): StatusFetcher<ImportResult> {
  return async (id, signal) => {
    const job = await transport.getImportJob(id, signal);
    return job ? importSnapshot(job) : null;
  };
}

export function browseStatusFetcher(transport: Transport): StatusFetcher<DirectoryEntry[]> {
  return async (id, signal) => {
    const request = await transport.getVolumeBrowse(id, signal);
    return request ? browseSnapshot(request) : null;
  };
}

/** Loads every field of a finished task; null once the task is gone. */
export function fullTaskFetcher(
  transport: Transport
): (id: string, signal?: AbortSignal) => Promise<TaskRecord | null> {
  return (id, signal) => transport.getTaskDetails(id, signal);
}

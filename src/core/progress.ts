import { logger } from "../logger.js";

export type ProgressOperation = "task" | "import" | "browse" | "upload" | "download";

export interface ProgressEvent {
  operation: ProgressOperation;
  /** Job key or remote file key the event belongs to. */
  jobId: string;
  message: string;
  /** 0-100; undefined while progress is indeterminate. */
  percent?: number;
  state?: string;
  bytesTransferred?: number;
  totalBytes?: number;
}

export type ProgressListener = (event: ProgressEvent) => void;

/**
 * Delivers a progress event. Listener failures are logged and dropped so they
 * never replace the outcome of the operation being reported on.
 */
export function reportProgress(listener: ProgressListener | undefined, event: ProgressEvent): void {
  if (!listener) return;
  try {
    listener(event);
  } catch (error) {
    logger.debug(
      `Progress listener failed for ${event.operation} ${event.jobId}: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
  }
}

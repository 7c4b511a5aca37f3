/**
 * Error classes for long-running operations and file transfers.
 */

export class VergeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "VergeError";
  }
}

export type PollErrorCode =
  | "JOB_VANISHED"
  | "JOB_FAILED"
  | "TIMEOUT"
  | "CANCELLED"
  | "INVALID_POLICY";

export class PollError extends VergeError {
  constructor(
    message: string,
    public readonly code: PollErrorCode,
    public readonly jobId: string,
    public readonly statusInfo?: string,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "PollError";
  }
}

export type TransferErrorCode =
  | "ENTRY_CREATION_FAILED"
  | "CHUNK_WRITE_FAILED"
  | "SOURCE_UNREADABLE"
  | "DESTINATION_EXISTS"
  | "DESTINATION_DIRECTORY_MISSING"
  | "DOWNLOAD_FAILED"
  | "CANCELLED";

export class TransferError extends VergeError {
  constructor(
    message: string,
    public readonly code: TransferErrorCode,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, code, context);
    this.name = "TransferError";
    if (options && "cause" in options) {
      this.cause = options.cause;
    }
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

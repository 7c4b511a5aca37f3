import { createWriteStream, type Stats } from "node:fs";
import { open, stat, type FileHandle } from "node:fs/promises";
import { basename, dirname } from "node:path";
import { Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import { TransferError, describeError } from "./errors.js";
import { reportProgress, type ProgressListener } from "./progress.js";
import { ok, err, type Result } from "./result.js";
import type { DownloadStream, FileEntryRequest, FileEntryResponse, FileTier } from "../types/vergeos.js";
import { logger } from "../logger.js";

export const DEFAULT_CHUNK_SIZE = 262144;

const UNSIZED_PROGRESS_STEP = 1024 * 1024;

/** The slice of the API the transfer engine talks to. */
export interface FileTransferApi {
  createFileEntry(request: FileEntryRequest, signal?: AbortSignal): Promise<FileEntryResponse>;
  writeFileChunk(id: string, offset: number, bytes: Buffer, signal?: AbortSignal): Promise<void>;
  openFileDownload(id: string, filename: string, signal?: AbortSignal): Promise<DownloadStream>;
}

export interface TransferSession {
  readonly localPath: string;
  readonly remoteIdentifier: string;
  readonly totalBytes: number;
  bytesTransferred: number;
  readonly chunkSize?: number;
  readonly direction: "upload" | "download";
}

export interface UploadMetadata {
  description?: string;
  tier?: FileTier;
}

export interface UploadOptions {
  chunkSize?: number;
  signal?: AbortSignal;
  onProgress?: ProgressListener;
}

export interface RemoteFileRef {
  id: string;
  name: string;
  totalBytes: number;
  chunks: number;
}

export interface DownloadOptions {
  overwrite?: boolean;
  /** Name requested from the server; defaults to the destination's base name. */
  filename?: string;
  signal?: AbortSignal;
  onProgress?: ProgressListener;
}

export interface LocalFileRef {
  path: string;
  bytesWritten: number;
}

function cancelled(session: Pick<TransferSession, "direction" | "localPath">): TransferError {
  return new TransferError(`The ${session.direction} of ${session.localPath} was cancelled`, "CANCELLED", {
    localPath: session.localPath,
  });
}

async function sourceSize(localPath: string): Promise<Result<number, TransferError>> {
  try {
    const info = await stat(localPath);
    if (!info.isFile()) {
      return err(new TransferError(`${localPath} is not a regular file`, "SOURCE_UNREADABLE", { localPath }));
    }
    return ok(info.size);
  } catch (error) {
    return err(
      new TransferError(`Cannot read ${localPath}: ${describeError(error)}`, "SOURCE_UNREADABLE", { localPath }, {
        cause: error,
      })
    );
  }
}

async function sendChunks(
  api: FileTransferApi,
  handle: FileHandle,
  session: TransferSession,
  chunkSize: number,
  options: UploadOptions
): Promise<Result<number, TransferError>> {
  const { signal, onProgress } = options;
  const { totalBytes, remoteIdentifier: id } = session;
  const totalChunks = Math.ceil(totalBytes / chunkSize);
  let uploadedChunks = 0;

  while (session.bytesTransferred < totalBytes) {
    if (signal?.aborted) {
      return err(cancelled(session));
    }

    const offset = session.bytesTransferred;
    const chunk = Buffer.alloc(Math.min(chunkSize, totalBytes - offset));
    let bytesRead: number;
    try {
      ({ bytesRead } = await handle.read(chunk, 0, chunk.length, offset));
    } catch (error) {
      return err(
        new TransferError(
          `Reading ${session.localPath} at offset ${offset} failed: ${describeError(error)}`,
          "SOURCE_UNREADABLE",
          { localPath: session.localPath, offset },
          { cause: error }
        )
      );
    }
    if (bytesRead === 0) {
      break;
    }

    try {
      await api.writeFileChunk(id, offset, chunk.subarray(0, bytesRead), signal);
    } catch (error) {
      if (signal?.aborted) {
        return err(cancelled(session));
      }
      return err(
        new TransferError(
          `Writing chunk at offset ${offset} of file ${id} failed: ${describeError(error)}`,
          "CHUNK_WRITE_FAILED",
          { remoteId: id, offset },
          { cause: error }
        )
      );
    }

    session.bytesTransferred += bytesRead;
    uploadedChunks += 1;
    reportProgress(onProgress, {
      operation: "upload",
      jobId: id,
      message: `Uploading ${basename(session.localPath)}: chunk ${uploadedChunks} of ${totalChunks}`,
      percent: Math.round((uploadedChunks / totalChunks) * 100),
      bytesTransferred: session.bytesTransferred,
      totalBytes,
    });
  }

  return ok(uploadedChunks);
}

/**
 * Uploads a local file: creates the remote file entry, then writes the body
 * in `chunkSize` pieces, one at a time and in offset order.
 *
 * A failed chunk aborts the upload and leaves the remote entry incomplete;
 * removing it is up to the caller.
 */
export async function uploadFile(
  api: FileTransferApi,
  localPath: string,
  remoteName: string,
  metadata: UploadMetadata = {},
  options: UploadOptions = {}
): Promise<Result<RemoteFileRef, TransferError>> {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${chunkSize}`);
  }

  const size = await sourceSize(localPath);
  if (!size.ok) {
    return size;
  }
  const totalBytes = size.value;

  if (options.signal?.aborted) {
    return err(cancelled({ direction: "upload", localPath }));
  }

  let entry: FileEntryResponse;
  try {
    entry = await api.createFileEntry({ name: remoteName, ...metadata, totalBytes }, options.signal);
  } catch (error) {
    return err(
      new TransferError(
        `Creating file entry '${remoteName}' failed: ${describeError(error)}`,
        "ENTRY_CREATION_FAILED",
        { name: remoteName },
        { cause: error }
      )
    );
  }
  const key = entry.$key;
  if (key === undefined || key === null || key === "") {
    return err(
      new TransferError(`Server returned no identifier for file '${remoteName}'`, "ENTRY_CREATION_FAILED", {
        name: remoteName,
      })
    );
  }

  const session: TransferSession = {
    localPath,
    remoteIdentifier: String(key),
    totalBytes,
    bytesTransferred: 0,
    chunkSize,
    direction: "upload",
  };
  logger.info(`Uploading ${localPath} (${totalBytes} bytes) to file ${session.remoteIdentifier}`);

  let handle: FileHandle;
  try {
    handle = await open(localPath, "r");
  } catch (error) {
    return err(
      new TransferError(`Cannot open ${localPath}: ${describeError(error)}`, "SOURCE_UNREADABLE", { localPath }, {
        cause: error,
      })
    );
  }

  let sent: Result<number, TransferError>;
  try {
    sent = await sendChunks(api, handle, session, chunkSize, options);
  } finally {
    await handle.close();
  }
  if (!sent.ok) {
    return sent;
  }

  if (session.bytesTransferred < totalBytes) {
    return err(
      new TransferError(
        `${localPath} ended after ${session.bytesTransferred} of ${totalBytes} bytes`,
        "SOURCE_UNREADABLE",
        { localPath, bytesTransferred: session.bytesTransferred, totalBytes }
      )
    );
  }

  logger.info(`Uploaded ${localPath} as file ${session.remoteIdentifier} in ${sent.value} chunks`);
  return ok({ id: session.remoteIdentifier, name: remoteName, totalBytes, chunks: sent.value });
}

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch {
    return null;
  }
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

function destinationExists(destinationPath: string, detail: string): TransferError {
  return new TransferError(`${destinationPath} ${detail}`, "DESTINATION_EXISTS", { destinationPath });
}

function progressCounter(session: TransferSession, onProgress: ProgressListener | undefined): Transform {
  const total = session.totalBytes;
  let lastMark = -1;

  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      session.bytesTransferred += chunk.length;
      const mark =
        total > 0
          ? Math.min(100, Math.round((session.bytesTransferred / total) * 100))
          : Math.floor(session.bytesTransferred / UNSIZED_PROGRESS_STEP);
      if (mark !== lastMark) {
        lastMark = mark;
        reportProgress(onProgress, {
          operation: "download",
          jobId: session.remoteIdentifier,
          message: `Downloading ${basename(session.localPath)}: ${session.bytesTransferred} bytes`,
          ...(total > 0 ? { percent: mark, totalBytes: total } : {}),
          bytesTransferred: session.bytesTransferred,
        });
      }
      callback(null, chunk);
    },
  });
}

/**
 * Streams a remote file to `destinationPath`. The destination checks run
 * before any request is made. A failed transfer leaves the partial file in
 * place.
 */
export async function downloadFile(
  api: FileTransferApi,
  remoteId: string,
  destinationPath: string,
  options: DownloadOptions = {}
): Promise<Result<LocalFileRef, TransferError>> {
  const { signal, onProgress } = options;
  const directory = dirname(destinationPath);

  if (!(await statOrNull(directory))?.isDirectory()) {
    return err(
      new TransferError(`Destination directory ${directory} does not exist`, "DESTINATION_DIRECTORY_MISSING", {
        destinationPath,
      })
    );
  }
  const existing = await statOrNull(destinationPath);
  if (existing?.isDirectory()) {
    return err(destinationExists(destinationPath, "is a directory"));
  }
  if (existing && !options.overwrite) {
    return err(destinationExists(destinationPath, "already exists; pass overwrite to replace it"));
  }
  if (signal?.aborted) {
    return err(cancelled({ direction: "download", localPath: destinationPath }));
  }

  const filename = options.filename ?? basename(destinationPath);
  let download: DownloadStream;
  try {
    download = await api.openFileDownload(remoteId, filename, signal);
  } catch (error) {
    if (signal?.aborted) {
      return err(cancelled({ direction: "download", localPath: destinationPath }));
    }
    return err(
      new TransferError(`Requesting file ${remoteId} failed: ${describeError(error)}`, "DOWNLOAD_FAILED", {
        remoteId,
      }, { cause: error })
    );
  }

  const session: TransferSession = {
    localPath: destinationPath,
    remoteIdentifier: remoteId,
    totalBytes: download.totalBytes ?? 0,
    bytesTransferred: 0,
    direction: "download",
  };
  logger.info(`Downloading file ${remoteId} to ${destinationPath}`);

  try {
    await pipeline(
      download.stream,
      progressCounter(session, onProgress),
      createWriteStream(destinationPath, { flags: options.overwrite ? "w" : "wx" }),
      { signal }
    );
  } catch (error) {
    if (hasErrorCode(error, "EEXIST")) {
      return err(destinationExists(destinationPath, "already exists; pass overwrite to replace it"));
    }
    logger.warn(`Download of file ${remoteId} stopped; partial output left at ${destinationPath}`);
    if (signal?.aborted) {
      return err(cancelled(session));
    }
    return err(
      new TransferError(
        `Downloading file ${remoteId} to ${destinationPath} failed: ${describeError(error)}`,
        "DOWNLOAD_FAILED",
        { remoteId, destinationPath, bytesWritten: session.bytesTransferred },
        { cause: error }
      )
    );
  }

  logger.info(`Downloaded file ${remoteId} to ${destinationPath} (${session.bytesTransferred} bytes)`);
  return ok({ path: destinationPath, bytesWritten: session.bytesTransferred });
}

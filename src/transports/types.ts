import type { FileTransferApi } from "../core/transfer.js";
import type { BrowseRecord, ImportJobRecord, TaskRecord } from "../types/vergeos.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface Transport extends FileTransferApi {
  // Connection
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;

  // Raw request
  apiRequest<T = unknown>(
    method: HttpMethod,
    endpoint: string,
    data?: unknown,
    signal?: AbortSignal
  ): Promise<T>;

  // Long-running jobs; null once the job no longer exists
  getTask(id: string, signal?: AbortSignal): Promise<TaskRecord | null>;
  getTaskDetails(id: string, signal?: AbortSignal): Promise<TaskRecord | null>;
  getImportJob(id: string, signal?: AbortSignal): Promise<ImportJobRecord | null>;

  // NAS volume browsing
  startVolumeBrowse(volumeId: string, path: string, signal?: AbortSignal): Promise<string>;
  getVolumeBrowse(id: string, signal?: AbortSignal): Promise<BrowseRecord | null>;
}

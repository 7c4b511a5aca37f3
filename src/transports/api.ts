import axios, { isAxiosError, type AxiosInstance, type AxiosRequestConfig } from "axios";
import https from "https";
import type { ZodType, ZodTypeDef } from "zod";
import type { Config } from "../config/index.js";
import type { HttpMethod, Transport } from "./types.js";
import {
  browseRecordSchema,
  importJobRecordSchema,
  keyedResponseSchema,
  taskRecordSchema,
  type BrowseRecord,
  type DownloadStream,
  type FileEntryRequest,
  type FileEntryResponse,
  type ImportJobRecord,
  type TaskRecord,
} from "../types/vergeos.js";
import { logger } from "../logger.js";

const TASK_FIELDS = "$key,name,status,is_running";
const TASK_DETAIL_FIELDS = "most";
const IMPORT_FIELDS = "$key,name,status,status_info,vm";
const BROWSE_FIELDS = "$key,status,result";

export class APITransport implements Transport {
  private client: AxiosInstance;
  private config: Config;
  private connected: boolean = false;

  constructor(config: Config) {
    this.config = config;

    const httpsAgent = new https.Agent({
      rejectUnauthorized: config.verifySsl,
    });

    this.client = axios.create({
      baseURL: this.getBaseUrl(),
      timeout: config.timeout,
      httpsAgent,
      headers: this.getAuthHeaders(),
    });
  }

  getBaseUrl(): string {
    return `https://${this.config.host}:${this.config.port}/api/v4`;
  }

  getAuthHeaders(): Record<string, string> {
    if (this.config.apiToken) {
      return { "x-yottabyte-token": this.config.apiToken };
    }
    const credentials = Buffer.from(`${this.config.username ?? ""}:${this.config.password ?? ""}`).toString(
      "base64"
    );
    return { Authorization: `Basic ${credentials}` };
  }

  async connect(): Promise<void> {
    // Test connection and credentials with a cheap authenticated read
    try {
      await this.client.get("/system", { params: { fields: "$key" } });
      this.connected = true;
      logger.info(`Connected to VergeOS API at ${this.getBaseUrl()}`);
    } catch (error) {
      this.connected = false;
      throw new Error(
        `Failed to connect to VergeOS API: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async apiRequest<T = unknown>(
    method: HttpMethod,
    endpoint: string,
    data?: unknown,
    signal?: AbortSignal
  ): Promise<T> {
    const config: AxiosRequestConfig = {
      method: method.toLowerCase(),
      url: endpoint,
      signal,
    };

    if (data) {
      if (method === "GET") {
        config.params = data;
      } else {
        config.data = data;
      }
    }

    const response = await this.client.request<T>(config);
    return response.data;
  }

  /** GETs and validates a record, mapping 404 and empty bodies to null. */
  private async getRecord<T>(
    endpoint: string,
    fields: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    signal?: AbortSignal
  ): Promise<T | null> {
    let data: unknown;
    try {
      data = await this.apiRequest("GET", endpoint, { fields }, signal);
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 404) {
        return null;
      }
      throw error;
    }
    if (data === null || data === undefined || data === "") {
      return null;
    }
    return schema.parse(data);
  }

  async getTask(id: string, signal?: AbortSignal): Promise<TaskRecord | null> {
    return this.getRecord(`/tasks/${encodeURIComponent(id)}`, TASK_FIELDS, taskRecordSchema, signal);
  }

  async getTaskDetails(id: string, signal?: AbortSignal): Promise<TaskRecord | null> {
    return this.getRecord(`/tasks/${encodeURIComponent(id)}`, TASK_DETAIL_FIELDS, taskRecordSchema, signal);
  }

  async getImportJob(id: string, signal?: AbortSignal): Promise<ImportJobRecord | null> {
    return this.getRecord(`/vm_imports/${encodeURIComponent(id)}`, IMPORT_FIELDS, importJobRecordSchema, signal);
  }

  async startVolumeBrowse(volumeId: string, path: string, signal?: AbortSignal): Promise<string> {
    const data = await this.apiRequest(
      "POST",
      "/volume_browser",
      { volume: volumeId, query: "get-dir", params: { dir: path } },
      signal
    );
    const key = keyedResponseSchema.parse(data).$key;
    if (key === undefined) {
      throw new Error(`Browse request for volume ${volumeId} returned no id`);
    }
    return String(key);
  }

  async getVolumeBrowse(id: string, signal?: AbortSignal): Promise<BrowseRecord | null> {
    return this.getRecord(`/volume_browser/${encodeURIComponent(id)}`, BROWSE_FIELDS, browseRecordSchema, signal);
  }

  async createFileEntry(request: FileEntryRequest, signal?: AbortSignal): Promise<FileEntryResponse> {
    const payload: Record<string, unknown> = {
      name: request.name,
      allocated_bytes: request.totalBytes,
    };
    if (request.description) payload.description = request.description;
    if (request.tier) payload.preferred_tier = String(request.tier);

    const data = await this.apiRequest("POST", "/files", payload, signal);
    return keyedResponseSchema.parse(data ?? {});
  }

  async writeFileChunk(id: string, offset: number, bytes: Buffer, signal?: AbortSignal): Promise<void> {
    await this.client.request({
      method: "put",
      url: `/files/${encodeURIComponent(id)}`,
      params: { filepos: offset },
      data: bytes,
      headers: { "Content-Type": "application/octet-stream" },
      maxBodyLength: Infinity,
      signal,
    });
  }

  async openFileDownload(id: string, filename: string, signal?: AbortSignal): Promise<DownloadStream> {
    const response = await this.client.request<NodeJS.ReadableStream>({
      method: "get",
      url: `/files/${encodeURIComponent(id)}`,
      params: { download: 1, filename },
      responseType: "stream",
      timeout: 0,
      signal,
    });

    const length = Number(response.headers["content-length"]);
    return {
      stream: response.data,
      ...(Number.isFinite(length) && length > 0 ? { totalBytes: length } : {}),
    };
  }
}

import { z } from "zod";

/** VergeOS object keys are integers, occasionally strings. */
export const vergeKeySchema = z.union([z.number().int(), z.string().min(1)]);
export type VergeKey = z.infer<typeof vergeKeySchema>;

export const taskRecordSchema = z
  .object({
    $key: vergeKeySchema,
    name: z.string().optional(),
    status: z.string().optional(),
    is_running: z.boolean().optional(),
  })
  .passthrough();
export type TaskRecord = z.infer<typeof taskRecordSchema>;

export type ImportStatus = "initializing" | "running" | "complete" | "error" | "aborted";

export const importJobRecordSchema = z.object({
  $key: vergeKeySchema.optional(),
  name: z.string().optional(),
  status: z.string(),
  status_info: z.string().nullish(),
  vm: vergeKeySchema.nullish(),
});
export type ImportJobRecord = z.infer<typeof importJobRecordSchema>;

export type BrowseStatus = "pending" | "complete" | "error";

export const browseRecordSchema = z.object({
  $key: vergeKeySchema.optional(),
  status: z.string(),
  result: z.unknown().optional(),
});
export type BrowseRecord = z.infer<typeof browseRecordSchema>;

export const keyedResponseSchema = z
  .object({
    $key: vergeKeySchema.optional(),
  })
  .passthrough();
export type FileEntryResponse = z.infer<typeof keyedResponseSchema>;

export interface DirectoryEntry {
  name: string;
  type?: string;
  size?: number;
  date?: number;
  [key: string]: unknown;
}

/** Storage tiers 1 (fastest) to 5. */
export type FileTier = 1 | 2 | 3 | 4 | 5;

export interface FileEntryRequest {
  name: string;
  description?: string;
  tier?: FileTier;
  totalBytes: number;
}

export interface DownloadStream {
  stream: NodeJS.ReadableStream;
  /** From Content-Length when the server sends one. */
  totalBytes?: number;
}

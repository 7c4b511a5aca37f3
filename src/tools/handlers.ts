import { statSync } from "fs";
import { basename, join, resolve } from "path";
import { z } from "zod";
import type { Config } from "../config/index.js";
import { createHandle, type ImportResult } from "../core/jobs.js";
import { waitForBrowse, waitForCompletion, type Clock } from "../core/poller.js";
import type { ProgressListener } from "../core/progress.js";
import { unwrap } from "../core/result.js";
import { downloadFile, uploadFile } from "../core/transfer.js";
import type { Transport } from "../transports/index.js";
import type { DirectoryEntry, TaskRecord } from "../types/vergeos.js";
import {
  browseStatusFetcher,
  fullTaskFetcher,
  importStatusFetcher,
  taskStatusFetcher,
} from "../transports/status.js";

export interface ToolContext {
  signal?: AbortSignal;
  onProgress?: ProgressListener;
}

// Tool handler type
export type ToolHandler = (args: Record<string, unknown>, context?: ToolContext) => Promise<unknown>;

export type ToolRegistry = Map<string, ToolHandler>;

const jobKey = z.union([z.string().min(1), z.number().int().nonnegative()]).transform(String);

const waitArgs = {
  timeoutSeconds: z.number().int().nonnegative().optional(),
  pollingIntervalSeconds: z.number().int().min(1).max(60).optional(),
};

const taskWaitArgs = z.object({
  taskId: jobKey,
  ...waitArgs,
  passThru: z.boolean().optional(),
});

const importWaitArgs = z.object({
  importId: jobKey,
  ...waitArgs,
});

const browseArgs = z.object({
  volumeId: z.string().min(1),
  path: z.string().default("/"),
});

const tierSchema = z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5)]);

const uploadArgs = z.object({
  path: z.string().min(1),
  name: z.string().min(1).optional(),
  description: z.string().optional(),
  tier: tierSchema.optional(),
});

const downloadArgs = z.object({
  fileId: jobKey,
  destination: z.string().min(1),
  filename: z.string().min(1).optional(),
  force: z.boolean().optional(),
});

export function registerTaskTools(
  toolRegistry: ToolRegistry,
  transport: Transport,
  config: Config,
  clock?: Clock
): void {
  toolRegistry.set("vergeos_task_wait", async (rawArgs, context = {}) => {
    const args = taskWaitArgs.parse(rawArgs);
    const passThru = args.passThru ?? false;

    const result = await waitForCompletion(
      createHandle<TaskRecord>("task", args.taskId, `Task ${args.taskId}`),
      {
        timeoutSeconds: args.timeoutSeconds ?? config.taskTimeoutSeconds,
        pollingIntervalSeconds: args.pollingIntervalSeconds ?? config.pollingIntervalSeconds,
        wantsResultOnSuccess: passThru,
      },
      taskStatusFetcher(transport),
      {
        signal: context.signal,
        onProgress: context.onProgress,
        clock,
        fetchResult: fullTaskFetcher(transport),
      }
    );
    const snapshot = unwrap(result);

    if (passThru) {
      return { success: true, taskId: args.taskId, status: snapshot.state, task: snapshot.resultPayload };
    }
    return {
      success: true,
      taskId: args.taskId,
      status: snapshot.state,
      message: `Task ${args.taskId} completed`,
    };
  });
}

export function registerImportTools(
  toolRegistry: ToolRegistry,
  transport: Transport,
  config: Config,
  clock?: Clock
): void {
  toolRegistry.set("vergeos_vm_import_wait", async (rawArgs, context = {}) => {
    const args = importWaitArgs.parse(rawArgs);

    const result = await waitForCompletion(
      createHandle<ImportResult>("import", args.importId, `Import ${args.importId}`),
      {
        timeoutSeconds: args.timeoutSeconds ?? config.taskTimeoutSeconds,
        pollingIntervalSeconds: args.pollingIntervalSeconds ?? config.pollingIntervalSeconds,
        wantsResultOnSuccess: false,
      },
      importStatusFetcher(transport),
      { signal: context.signal, onProgress: context.onProgress, clock }
    );
    const snapshot = unwrap(result);

    return {
      success: true,
      importId: args.importId,
      status: snapshot.state,
      vm: snapshot.resultPayload?.vm ?? null,
      message: `Import ${args.importId} completed`,
    };
  });
}

export function registerNasTools(
  toolRegistry: ToolRegistry,
  transport: Transport,
  _config: Config,
  clock?: Clock
): void {
  toolRegistry.set("vergeos_nas_volume_browse", async (rawArgs, context = {}) => {
    const args = browseArgs.parse(rawArgs);

    const requestId = await transport.startVolumeBrowse(args.volumeId, args.path, context.signal);
    const result = await waitForBrowse(
      createHandle<DirectoryEntry[]>("browse", requestId, `Browse of ${args.path} on volume ${args.volumeId}`),
      browseStatusFetcher(transport),
      { signal: context.signal, onProgress: context.onProgress, clock }
    );
    const snapshot = unwrap(result);

    return {
      volumeId: args.volumeId,
      path: args.path,
      entries: snapshot.resultPayload ?? [],
    };
  });
}

function isExistingDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

export function registerFileTools(
  toolRegistry: ToolRegistry,
  transport: Transport,
  config: Config
): void {
  toolRegistry.set("vergeos_file_upload", async (rawArgs, context = {}) => {
    const args = uploadArgs.parse(rawArgs);
    const localPath = resolve(args.path);
    const name = args.name ?? basename(localPath);

    const result = await uploadFile(
      transport,
      localPath,
      name,
      { description: args.description, tier: args.tier },
      { chunkSize: config.uploadChunkSize, signal: context.signal, onProgress: context.onProgress }
    );
    const file = unwrap(result);

    return {
      success: true,
      fileId: file.id,
      name: file.name,
      size: file.totalBytes,
      chunks: file.chunks,
      message: `Uploaded ${localPath} as ${file.name}`,
    };
  });

  toolRegistry.set("vergeos_file_download", async (rawArgs, context = {}) => {
    const args = downloadArgs.parse(rawArgs);
    if (args.force && config.safeMode) {
      throw new Error("Overwriting local files is disabled in safe mode");
    }

    let destination = resolve(args.destination);
    if (isExistingDirectory(destination)) {
      if (!args.filename) {
        throw new Error("filename is required when destination is a directory");
      }
      destination = join(destination, args.filename);
    }

    const result = await downloadFile(transport, args.fileId, destination, {
      overwrite: args.force ?? false,
      filename: args.filename,
      signal: context.signal,
      onProgress: context.onProgress,
    });
    const file = unwrap(result);

    return {
      success: true,
      fileId: args.fileId,
      path: file.path,
      bytes: file.bytesWritten,
    };
  });
}

export function registerAllTools(
  toolRegistry: ToolRegistry,
  transport: Transport,
  config: Config,
  clock?: Clock
): void {
  registerTaskTools(toolRegistry, transport, config, clock);
  registerImportTools(toolRegistry, transport, config, clock);
  registerNasTools(toolRegistry, transport, config, clock);
  registerFileTools(toolRegistry, transport, config);
}

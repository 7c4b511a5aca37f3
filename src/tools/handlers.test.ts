import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { Readable } from "stream";
import { registerAllTools, type ToolHandler, type ToolRegistry } from "./handlers.js";
import { toolDefinitions } from "./definitions.js";
import type { Config } from "../config/index.js";
import type { Clock } from "../core/poller.js";
import type { ProgressEvent } from "../core/progress.js";
import { MockTransport } from "../testing/mock-transport.js";
import { logger } from "../logger.js";

function fakeClock(): { clock: Clock; sleeps: number[] } {
  let now = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    clock: {
      now: () => now,
      sleep: async (ms) => {
        sleeps.push(ms);
        now += ms;
      },
    },
  };
}

describe("Tool Handlers", () => {
  let toolRegistry: ToolRegistry;
  let transport: MockTransport;
  let config: Config;
  let sleeps: number[];
  let dir: string;

  const register = (overrides: Partial<Config> = {}): void => {
    const fake = fakeClock();
    sleeps = fake.sleeps;
    registerAllTools(toolRegistry, transport, { ...config, ...overrides }, fake.clock);
  };

  const tool = (name: string): ToolHandler => {
    const handler = toolRegistry.get(name);
    if (!handler) throw new Error(`${name} is not registered`);
    return handler;
  };

  beforeEach(() => {
    vi.clearAllMocks();
    logger.setLevel("silent");
    toolRegistry = new Map();
    transport = new MockTransport();
    dir = mkdtempSync(join(tmpdir(), "vergeos-tools-"));
    config = {
      host: "verge.example.com",
      port: 443,
      apiToken: "test-token",
      verifySsl: false,
      timeout: 30000,
      pollingIntervalSeconds: 5,
      taskTimeoutSeconds: 0,
      uploadChunkSize: 4,
      safeMode: false,
      logLevel: "silent",
    };
    register();
  });

  afterEach(() => {
    logger.setLevel("info");
    rmSync(dir, { recursive: true, force: true });
  });

  it("registers a handler for every tool definition", () => {
    expect([...toolRegistry.keys()].sort()).toEqual(toolDefinitions.map((d) => d.name).sort());
  });

  describe("vergeos_task_wait", () => {
    const running = { $key: 7, name: "Clone", status: "running", is_running: true };
    const idle = { $key: 7, name: "Clone", status: "idle", is_running: false };

    it("returns at once for an idle task", async () => {
      transport.getTask.mockResolvedValue(idle);

      const result = await tool("vergeos_task_wait")({ taskId: 7 });

      expect(result).toEqual({ success: true, taskId: "7", status: "idle", message: "Task 7 completed" });
      expect(sleeps).toEqual([]);
    });

    it("polls with the configured interval", async () => {
      transport.getTask.mockResolvedValueOnce(running).mockResolvedValueOnce(idle);

      await tool("vergeos_task_wait")({ taskId: "7" });

      expect(sleeps).toEqual([5000]);
      expect(transport.getTask).toHaveBeenCalledTimes(2);
    });

    it("returns the full task with passThru", async () => {
      transport.getTask.mockResolvedValue(idle);
      transport.getTaskDetails.mockResolvedValue({ ...idle, progress: 100 });

      const result = await tool("vergeos_task_wait")({ taskId: 7, passThru: true });

      expect(result).toEqual({
        success: true,
        taskId: "7",
        status: "idle",
        task: { ...idle, progress: 100 },
      });
    });

    it("fails when the task is removed before passThru loads it", async () => {
      transport.getTask.mockResolvedValue(idle);
      transport.getTaskDetails.mockResolvedValue(null);

      await expect(tool("vergeos_task_wait")({ taskId: 7, passThru: true })).rejects.toThrow(
        "Task 7 no longer exists"
      );
    });

    it("throws on timeout and reports progress", async () => {
      transport.getTask.mockResolvedValue(running);
      const events: ProgressEvent[] = [];

      await expect(
        tool("vergeos_task_wait")(
          { taskId: 7, timeoutSeconds: 4, pollingIntervalSeconds: 2 },
          { onProgress: (event) => events.push(event) }
        )
      ).rejects.toThrow("Timed out waiting for Task 7 after 4 seconds");
      expect(events.map((e) => e.percent)).toEqual([50, 100]);
    });

    it("throws when the task disappears", async () => {
      transport.getTask.mockResolvedValue(null);

      await expect(tool("vergeos_task_wait")({ taskId: 7 })).rejects.toThrow("Task 7 no longer exists");
    });

    it("rejects an out-of-range polling interval", async () => {
      await expect(tool("vergeos_task_wait")({ taskId: 7, pollingIntervalSeconds: 0 })).rejects.toThrow();
      expect(transport.getTask).not.toHaveBeenCalled();
    });
  });

  describe("vergeos_vm_import_wait", () => {
    it("returns the imported VM", async () => {
      transport.getImportJob
        .mockResolvedValueOnce({ status: "running" })
        .mockResolvedValueOnce({ status: "complete", vm: 42 });

      const result = await tool("vergeos_vm_import_wait")({ importId: "abc", pollingIntervalSeconds: 1 });

      expect(result).toEqual({
        success: true,
        importId: "abc",
        status: "complete",
        vm: 42,
        message: "Import abc completed",
      });
      expect(sleeps).toEqual([1000]);
    });

    it("throws with the server diagnostic", async () => {
      transport.getImportJob.mockResolvedValue({ status: "error", status_info: "bad ovf" });

      await expect(tool("vergeos_vm_import_wait")({ importId: "abc" })).rejects.toThrow(
        "Import abc ended in state 'error': bad ovf"
      );
    });
  });

  describe("vergeos_nas_volume_browse", () => {
    it("lists an empty directory", async () => {
      transport.startVolumeBrowse.mockResolvedValue("12");
      transport.getVolumeBrowse
        .mockResolvedValueOnce({ status: "pending" })
        .mockResolvedValueOnce({ status: "complete", result: null });

      const result = await tool("vergeos_nas_volume_browse")({ volumeId: "8f2c" });

      expect(result).toEqual({ volumeId: "8f2c", path: "/", entries: [] });
      expect(transport.startVolumeBrowse).toHaveBeenCalledWith("8f2c", "/", undefined);
      expect(sleeps).toEqual([500]);
    });

    it("returns directory entries", async () => {
      transport.startVolumeBrowse.mockResolvedValue("12");
      transport.getVolumeBrowse.mockResolvedValue({
        status: "complete",
        result: { entries: [{ name: "nightly.tar", size: 4096 }] },
      });

      const result = await tool("vergeos_nas_volume_browse")({ volumeId: "8f2c", path: "/backups" });

      expect(result).toEqual({
        volumeId: "8f2c",
        path: "/backups",
        entries: [{ name: "nightly.tar", size: 4096 }],
      });
    });
  });

  describe("vergeos_file_upload", () => {
    it("uploads in configured chunks", async () => {
      const source = join(dir, "data.bin");
      writeFileSync(source, "0123456789");
      transport.createFileEntry.mockResolvedValue({ $key: 31 });
      transport.writeFileChunk.mockResolvedValue(undefined);

      const result = await tool("vergeos_file_upload")({ path: source, tier: 2 });

      expect(result).toEqual({
        success: true,
        fileId: "31",
        name: "data.bin",
        size: 10,
        chunks: 3,
        message: `Uploaded ${source} as data.bin`,
      });
      expect(transport.writeFileChunk.mock.calls.map((call) => call[1])).toEqual([0, 4, 8]);
      expect(transport.createFileEntry).toHaveBeenCalledWith(
        { name: "data.bin", description: undefined, tier: 2, totalBytes: 10 },
        undefined
      );
    });

    it("throws when the entry cannot be created", async () => {
      const source = join(dir, "data.bin");
      writeFileSync(source, "0123456789");
      transport.createFileEntry.mockResolvedValue({});

      await expect(tool("vergeos_file_upload")({ path: source })).rejects.toThrow(
        "Server returned no identifier for file 'data.bin'"
      );
    });

    it("rejects an unknown tier", async () => {
      await expect(tool("vergeos_file_upload")({ path: join(dir, "x"), tier: 9 })).rejects.toThrow();
    });
  });

  describe("vergeos_file_download", () => {
    beforeEach(() => {
      transport.openFileDownload.mockResolvedValue({
        stream: Readable.from([Buffer.from("iso")]),
        totalBytes: 3,
      });
    });

    it("saves into a directory under the given filename", async () => {
      const result = await tool("vergeos_file_download")({
        fileId: 31,
        destination: dir,
        filename: "ubuntu.iso",
      });

      expect(result).toEqual({ success: true, fileId: "31", path: join(dir, "ubuntu.iso"), bytes: 3 });
      expect(readFileSync(join(dir, "ubuntu.iso"), "utf-8")).toBe("iso");
      expect(transport.openFileDownload).toHaveBeenCalledWith("31", "ubuntu.iso", undefined);
    });

    it("requires a filename for a directory destination", async () => {
      await expect(tool("vergeos_file_download")({ fileId: 31, destination: dir })).rejects.toThrow(
        "filename is required when destination is a directory"
      );
    });

    it("refuses to replace an existing file without force", async () => {
      const destination = join(dir, "out.iso");
      writeFileSync(destination, "old");

      await expect(tool("vergeos_file_download")({ fileId: 31, destination })).rejects.toThrow(
        `${destination} already exists; pass overwrite to replace it`
      );
      expect(transport.openFileDownload).not.toHaveBeenCalled();
    });

    it("replaces an existing file with force", async () => {
      const destination = join(dir, "out.iso");
      writeFileSync(destination, "old");

      await tool("vergeos_file_download")({ fileId: 31, destination, force: true });

      expect(readFileSync(destination, "utf-8")).toBe("iso");
    });

    it("refuses force in safe mode", async () => {
      toolRegistry = new Map();
      register({ safeMode: true });

      await expect(
        tool("vergeos_file_download")({ fileId: 31, destination: join(dir, "out.iso"), force: true })
      ).rejects.toThrow("Overwriting local files is disabled in safe mode");
      expect(transport.openFileDownload).not.toHaveBeenCalled();
    });
  });
});

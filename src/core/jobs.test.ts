import { describe, it, expect } from "vitest";
import {
  browseSnapshot,
  createHandle,
  importSnapshot,
  jobKinds,
  parseListing,
  taskSnapshot,
} from "./jobs.js";

describe("createHandle", () => {
  it("stringifies the key and derives a display name", () => {
    expect(createHandle("task", 5)).toEqual({ id: "5", kind: "task", displayName: "task 5" });
  });

  it("keeps an explicit display name", () => {
    expect(createHandle("import", "abc", "Import web01").displayName).toBe("Import web01");
  });
});

describe("taskSnapshot", () => {
  it("uses is_running when present", () => {
    const snapshot = taskSnapshot({ $key: 1, name: "Power on", status: "running", is_running: false });
    expect(snapshot.isRunning).toBe(false);
    expect(snapshot.statusInfo).toBe("Power on: running");
  });

  it("derives running from the status otherwise", () => {
    expect(taskSnapshot({ $key: 1, status: "running" }).isRunning).toBe(true);
    expect(taskSnapshot({ $key: 1, status: "idle" }).isRunning).toBe(false);
  });

  it("falls back to idle when the task reports no status", () => {
    expect(taskSnapshot({ $key: 1 }).state).toBe("idle");
  });
});

describe("importSnapshot", () => {
  it("carries the VM only once complete", () => {
    expect(importSnapshot({ status: "running", vm: 42 }).resultPayload).toBeNull();
    expect(importSnapshot({ status: "complete", vm: 42 }).resultPayload).toEqual({ vm: 42 });
    expect(importSnapshot({ status: "complete" }).resultPayload).toEqual({ vm: null });
  });

  it("marks initializing and running as in progress", () => {
    expect(importSnapshot({ status: "initializing" }).isRunning).toBe(true);
    expect(importSnapshot({ status: "error", status_info: "bad ovf" })).toEqual({
      state: "error",
      isRunning: false,
      statusInfo: "bad ovf",
      resultPayload: null,
    });
  });
});

describe("parseListing", () => {
  const entry = { name: "backup.tar", type: "file", size: 2048 };

  it("treats absent results as empty", () => {
    expect(parseListing(null)).toEqual({ ok: true, entries: [] });
    expect(parseListing(undefined)).toEqual({ ok: true, entries: [] });
    expect(parseListing("")).toEqual({ ok: true, entries: [] });
  });

  it("accepts arrays, entries objects and JSON strings", () => {
    expect(parseListing([entry])).toEqual({ ok: true, entries: [entry] });
    expect(parseListing({ entries: [entry] })).toEqual({ ok: true, entries: [entry] });
    expect(parseListing(JSON.stringify({ entries: [entry] }))).toEqual({ ok: true, entries: [entry] });
  });

  it("drops array items without a name", () => {
    expect(parseListing([entry, { size: 1 }, 7])).toEqual({ ok: true, entries: [entry] });
  });

  it("treats plain text as a failure message", () => {
    expect(parseListing("permission denied")).toEqual({ ok: false, message: "permission denied" });
  });
});

describe("browseSnapshot", () => {
  it("keeps pending requests running", () => {
    expect(browseSnapshot({ status: "pending" })).toEqual({
      state: "pending",
      isRunning: true,
      resultPayload: null,
    });
  });

  it("turns an unreadable completed result into an error", () => {
    expect(browseSnapshot({ status: "complete", result: "volume offline" })).toEqual({
      state: "error",
      isRunning: false,
      statusInfo: "volume offline",
      resultPayload: null,
    });
  });
});

describe("jobKinds", () => {
  const snapshot = (state: string, isRunning: boolean) => ({ state, isRunning, resultPayload: null });

  it("classifies tasks by running flag and error states", () => {
    expect(jobKinds.task(snapshot("running", true))).toBe("running");
    expect(jobKinds.task(snapshot("idle", false))).toBe("succeeded");
    expect(jobKinds.task(snapshot("error", false))).toBe("failed");
  });

  it("classifies imports and browses by state", () => {
    expect(jobKinds.import(snapshot("initializing", true))).toBe("running");
    expect(jobKinds.import(snapshot("complete", false))).toBe("succeeded");
    expect(jobKinds.import(snapshot("aborted", false))).toBe("failed");
    expect(jobKinds.browse(snapshot("pending", true))).toBe("running");
    expect(jobKinds.browse(snapshot("complete", false))).toBe("succeeded");
    expect(jobKinds.browse(snapshot("error", false))).toBe("failed");
  });
});

import { describe, test, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { createLogger, setLogLevel, setLogPath, setStderrLogging } from "../src/services/logger.js";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "logger-"));
});

afterEach(() => {
  setLogPath(null);
  setLogLevel("warn");
  setStderrLogging(true);
  rmSync(dir, { recursive: true, force: true });
});

describe("logger", () => {
  test("appends NDJSON entries at or above the level", () => {
    const logPath = join(dir, "logs", "wincli.log");
    setStderrLogging(false);
    setLogLevel("info");
    setLogPath(logPath);

    const log = createLogger("wt-profile");
    log.debug("hidden");
    log.info("Profile added", { guid: "{1}" });
    log.error("failed");

    const entries = readFileSync(logPath, "utf-8").trimEnd().split("\n").map((line) => JSON.parse(line));
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({ level: "info", component: "wt-profile", msg: "Profile added", data: { guid: "{1}" } });
    expect(entries[1]).toMatchObject({ level: "error", msg: "failed" });
    expect(entries[1]).not.toHaveProperty("data");
  });

  test("mirrors entries to stderr", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    createLogger("paths").warn("Multiple settings files", { count: 2 });
    createLogger("paths").info("below the default level");

    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith('[paths] WARN  Multiple settings files {"count":2}\n');
  });

  test("stops writing the file when it cannot be created", () => {
    const blocker = join(dir, "file");
    writeFileSync(blocker, "");
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    setLogPath(join(blocker, "wincli.log"));

    const log = createLogger("test");
    log.warn("first");
    log.warn("second");

    const lines = write.mock.calls.map(([chunk]) => String(chunk));
    expect(lines.filter((line) => line.startsWith("[logger] cannot write"))).toHaveLength(1);
    expect(lines.filter((line) => line.startsWith("[test] WARN "))).toHaveLength(2);
  });
});

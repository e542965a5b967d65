import { appendFileSync, existsSync, mkdirSync, renameSync, statSync, unlinkSync } from "node:fs";
import { dirname } from "node:path";
import { LOG_MAX_BYTES, LOG_ROTATION_COUNT } from "../constants.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  ts: string;
  level: LogLevel;
  component: string;
  msg: string;
  data?: Record<string, unknown>;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

let minLevel: LogLevel = "warn";
let logPath: string | null = null;
let stderrEnabled = true;

export function setLogLevel(level: LogLevel): void { minLevel = level; }
export function setLogPath(path: string | null): void { logPath = path; }
export function setStderrLogging(enabled: boolean): void { stderrEnabled = enabled; }

function rotateIfNeeded(filePath: string): void {
  if (!existsSync(filePath)) return;
  if (statSync(filePath).size <= LOG_MAX_BYTES) return;

  for (let i = LOG_ROTATION_COUNT - 1; i >= 1; i--) {
    const from = i === 1 ? filePath : `${filePath}.${i - 1}`;
    const to = `${filePath}.${i}`;
    if (existsSync(to)) unlinkSync(to);
    if (existsSync(from)) renameSync(from, to);
  }
}

function writeEntry(entry: LogEntry): void {
  if (logPath) {
    try {
      mkdirSync(dirname(logPath), { recursive: true });
      rotateIfNeeded(logPath);
      appendFileSync(logPath, JSON.stringify(entry) + "\n", "utf-8");
    } catch (err) {
      // The log file is best effort; report once on stderr and keep going.
      process.stderr.write(`[logger] cannot write ${logPath}: ${err instanceof Error ? err.message : String(err)}\n`);
      logPath = null;
    }
  }

  if (!stderrEnabled) return;
  const levelTag = entry.level.toUpperCase().padEnd(5);
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : "";
  process.stderr.write(`[${entry.component}] ${levelTag} ${entry.msg}${dataStr}\n`);
}

export function createLogger(component: string): Logger {
  function log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) return;
    writeEntry({
      ts: new Date().toISOString(),
      level,
      component,
      msg,
      ...(data ? { data } : {}),
    });
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
  };
}

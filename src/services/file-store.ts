import { dirname } from "node:path";
import { mkdir, readFile, rename, rmdir, stat, unlink, writeFile } from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";
import { LOCK_BACKOFF_MS, LOCK_RETRIES, LOCK_TTL_MS } from "../constants.js";
import { ConfigurationError, DataFormatError, hasErrorCode } from "./errors.js";

interface Lock {
  release(): Promise<void>;
}

interface LockOptions {
  retries?: number;
  backoffMs?: number;
  ttlMs?: number;
}

export interface WriteOptions {
  indent?: number;
}

const DEFAULT_LOCK_OPTS: Required<LockOptions> = {
  retries: LOCK_RETRIES,
  backoffMs: LOCK_BACKOFF_MS,
  ttlMs: LOCK_TTL_MS,
};

export type { Lock as LockHandle, LockOptions };

async function lockAgeMs(lockPath: string): Promise<number | null> {
  try {
    const s = await stat(lockPath);
    return Date.now() - s.mtimeMs;
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) return null;
    throw err;
  }
}

export async function acquireLock(
  lockPath: string,
  opts: LockOptions = {}
): Promise<Lock> {
  const { retries, backoffMs, ttlMs } = { ...DEFAULT_LOCK_OPTS, ...opts };

  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      await mkdir(lockPath, { recursive: false });

      let released = false;
      return {
        async release() {
          if (released) return;
          released = true;
          await rmdir(lockPath).catch((err: unknown) => {
            if (!hasErrorCode(err, "ENOENT")) throw err;
          });
        },
      };
    } catch (err) {
      if (!hasErrorCode(err, "EEXIST")) throw err;

      const age = await lockAgeMs(lockPath);
      if (age === null) continue;
      if (age > ttlMs) {
        // Stale lock left behind by a crashed writer.
        await rmdir(lockPath).catch(() => undefined);
        continue;
      }

      if (attempt < retries) {
        await sleep(backoffMs + Math.random() * backoffMs);
      }
    }
  }

  throw new Error(`Failed to acquire lock after ${retries} retries: ${lockPath}`);
}

/** Runs `fn` while holding `<path>.lock`; callers doing read-modify-write wrap the whole cycle. */
export async function withFileLock<T>(path: string, fn: () => Promise<T>, opts: LockOptions = {}): Promise<T> {
  const lock = await acquireLock(`${path}.lock`, opts);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}

// Takes no lock of its own; rename makes the replacement atomic for readers.
export async function atomicWrite(path: string, data: object, opts: WriteOptions = {}): Promise<void> {
  await mkdir(dirname(path), { recursive: true });

  const tmpPath = `${path}.tmp.${process.pid}.${Date.now()}`;
  try {
    await writeFile(tmpPath, JSON.stringify(data, null, opts.indent ?? 2), "utf-8");
    await rename(tmpPath, path);
  } finally {
    await unlink(tmpPath).catch(() => undefined);
  }
}

export async function readJsonFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      throw new ConfigurationError(`File not found: ${path}`, err);
    }
    throw err;
  }

  try {
    return JSON.parse(content.replace(/^\uFEFF/, ""));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DataFormatError(`${path} is not valid JSON (${reason})`, { filePath: path, cause: err });
  }
}

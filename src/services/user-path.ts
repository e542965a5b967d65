import { mkdir } from "node:fs/promises";
import { resolve, win32 } from "node:path";
import { PATH_SEPARATOR, USER_PATH_VAR } from "../constants.js";
import type { UserEnvironment } from "../system/user-environment.js";
import { ValidationError } from "./errors.js";
import { createLogger } from "./logger.js";

const log = createLogger("user-path");

export interface AddToPathResult {
  path: string;
  added: boolean;
}

/** Resolves the directory and creates it when missing. */
export async function validateDirectory(input: string): Promise<string> {
  const resolved = resolve(input);
  try {
    await mkdir(resolved, { recursive: true });
  } catch (err) {
    throw new ValidationError(err instanceof Error ? err.message : String(err), undefined, err);
  }
  return resolved;
}

// Windows paths compare case-insensitively and ignore separator style.
export function normalizePathEntry(entry: string): string {
  const normalized = win32.normalize(entry.trim());
  const stripped = /^[a-zA-Z]:\\$/.test(normalized) ? normalized : normalized.replace(/\\+$/, "");
  return stripped.toLowerCase();
}

export function splitPathValue(value: string): string[] {
  return value.split(PATH_SEPARATOR).filter((entry) => entry.trim().length > 0);
}

export function appendPathEntry(current: string, entry: string): string {
  const base = current.replace(/;+$/, "");
  return base.length > 0 ? `${base}${PATH_SEPARATOR}${entry}` : entry;
}

export function containsPathEntry(value: string, dir: string): boolean {
  const target = normalizePathEntry(dir);
  return splitPathValue(value).some((entry) => normalizePathEntry(entry) === target);
}

export class UserPathManager {
  constructor(private readonly env: UserEnvironment) {}

  async isOnPath(dir: string): Promise<boolean> {
    return containsPathEntry((await this.env.get(USER_PATH_VAR)) ?? "", dir);
  }

  async addToPath(dir: string): Promise<AddToPathResult> {
    const current = (await this.env.get(USER_PATH_VAR)) ?? "";
    if (containsPathEntry(current, dir)) {
      log.debug("Directory already on the user PATH", { dir });
      return { path: dir, added: false };
    }

    await this.env.set(USER_PATH_VAR, appendPathEntry(current, dir));
    log.info("Added directory to the user PATH", { dir });
    return { path: dir, added: true };
  }
}

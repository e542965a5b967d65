import { join } from "node:path";
import { existsSync } from "node:fs";
import { readdir } from "node:fs/promises";
import { WT_PACKAGE_PREFIX, WT_PACKAGES_DIR, WT_SETTINGS_RELATIVE } from "./constants.js";
import type { RuntimeConfig } from "./config.js";
import { ConfigurationError, hasErrorCode } from "./services/errors.js";
import { createLogger } from "./services/logger.js";

const log = createLogger("paths");

export function getWtPackagesDir(localAppData: string): string {
  return join(localAppData, WT_PACKAGES_DIR);
}

/**
 * Existing `Packages/Microsoft.WindowsTerminal_<id>/LocalState/settings.json`
 * files under the given base directory, sorted by package directory name.
 */
export async function findWtSettingsCandidates(localAppData: string): Promise<string[]> {
  const packagesDir = getWtPackagesDir(localAppData);
  let entries: string[];
  try {
    entries = await readdir(packagesDir);
  } catch (err) {
    if (hasErrorCode(err, "ENOENT") || hasErrorCode(err, "ENOTDIR")) return [];
    throw err;
  }

  return entries
    .filter((entry) => entry.startsWith(WT_PACKAGE_PREFIX))
    .sort()
    .map((entry) => join(packagesDir, entry, ...WT_SETTINGS_RELATIVE))
    .filter((candidate) => existsSync(candidate));
}

export async function resolveWtSettingsPath(
  config: Pick<RuntimeConfig, "localAppData" | "wtSettingsPath">
): Promise<string> {
  if (config.wtSettingsPath) {
    if (!existsSync(config.wtSettingsPath)) {
      throw new ConfigurationError(`Windows Terminal settings file not found: ${config.wtSettingsPath}`);
    }
    return config.wtSettingsPath;
  }

  if (!config.localAppData) {
    throw new ConfigurationError("Failed to resolve %LOCALAPPDATA%");
  }

  const candidates = await findWtSettingsCandidates(config.localAppData);
  if (candidates.length === 0) {
    throw new ConfigurationError("Failed to resolve Windows Terminal settings.json");
  }
  if (candidates.length > 1) {
    log.warn("Multiple Windows Terminal settings files found, using the first", { candidates });
  }
  return candidates[0];
}

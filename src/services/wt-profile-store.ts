import { randomUUID } from "node:crypto";
import { z } from "zod";
import { WT_SETTINGS_INDENT } from "../constants.js";
import { loadRuntimeConfig, type RuntimeConfig } from "../config.js";
import { resolveWtSettingsPath } from "../paths.js";
import type { ProfileField, ProfileMatch, WtProfile, WtProfileEntry, WtSettings } from "../types.js";
import { DataFormatError } from "./errors.js";
import { atomicWrite, readJsonFile, withFileLock } from "./file-store.js";
import { createLogger } from "./logger.js";

const log = createLogger("wt-profile-store");

const ProfileEntrySchema = z
  .object({
    name: z.string().optional(),
    guid: z.string().optional(),
    commandline: z.string().optional(),
    hidden: z.boolean().optional(),
    icon: z.string().optional(),
  })
  .passthrough();

const SettingsSchema = z
  .object({
    profiles: z.object({ list: z.array(ProfileEntrySchema) }).passthrough(),
  })
  .passthrough();

// The schema only guards the shape. The parsed copy is discarded because zod
// rebuilds objects with known keys first, which would reorder the file.
function assertWtSettings(value: unknown, filePath: string): asserts value is WtSettings {
  const result = SettingsSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    throw new DataFormatError(`Unexpected settings structure at '${where}': ${issue.message}`, {
      filePath,
      cause: result.error,
    });
  }
}

export function newProfileGuid(): string {
  return `{${randomUUID()}}`;
}

export function findProfile(list: WtProfileEntry[], value: string, field: ProfileField): ProfileMatch {
  const index = list.findIndex((profile) => profile[field] === value);
  return index === -1 ? { found: false } : { found: true, index, profile: list[index] };
}

/**
 * CRUD over the profile list of a Windows Terminal settings.json.
 *
 * Nothing is cached: every call reads the file again, and every mutation
 * rewrites the whole document before it resolves. Mutations hold
 * `<settings>.lock` from the read to the rename. Keys the store does not know
 * about are written back untouched and in their original order.
 */
export class WtProfileStore {
  constructor(readonly settingsPath: string) {}

  static async open(config: Pick<RuntimeConfig, "localAppData" | "wtSettingsPath"> = loadRuntimeConfig()): Promise<WtProfileStore> {
    const settingsPath = await resolveWtSettingsPath(config);
    log.debug("Using Windows Terminal settings", { settingsPath });
    return new WtProfileStore(settingsPath);
  }

  async data(): Promise<WtSettings> {
    const raw = await readJsonFile(this.settingsPath);
    assertWtSettings(raw, this.settingsPath);
    return raw;
  }

  async profiles(): Promise<WtProfileEntry[]> {
    return (await this.data()).profiles.list;
  }

  async query(value: string, field: ProfileField): Promise<WtProfileEntry | null> {
    const match = findProfile(await this.profiles(), value, field);
    return match.found ? match.profile : null;
  }

  /** Appends the profile, replacing any profile with the same commandline. */
  async addProfile(profile: WtProfile): Promise<boolean> {
    return withFileLock(this.settingsPath, async () => {
      const data = await this.data();
      const list = data.profiles.list;

      const existing = findProfile(list, profile.commandline, "commandline");
      if (existing.found) {
        list.splice(existing.index, 1);
        log.info("Replacing profile with the same commandline", {
          commandline: profile.commandline,
          replacedGuid: existing.profile.guid,
        });
      }
      list.push(profile);

      await this.save(data);
      return true;
    });
  }

  async removeProfile(value: string, field: ProfileField): Promise<WtProfileEntry | null> {
    return withFileLock(this.settingsPath, async () => {
      const data = await this.data();
      const match = findProfile(data.profiles.list, value, field);
      if (!match.found) {
        log.debug("No profile to remove", { field, value });
        return null;
      }

      data.profiles.list.splice(match.index, 1);
      await this.save(data);
      return match.profile;
    });
  }

  private async save(data: WtSettings): Promise<void> {
    await atomicWrite(this.settingsPath, data, { indent: WT_SETTINGS_INDENT });
    log.debug("Wrote settings", { settingsPath: this.settingsPath, profiles: data.profiles.list.length });
  }
}

import chalk from "chalk";
import { realpath, stat } from "node:fs/promises";
import { z } from "zod";
import { OUTPUT_FORMATS } from "../constants.js";
import { NotFoundError, ValidationError, hasErrorCode } from "../services/errors.js";
import { formatProfileJson, formatProfiles } from "../services/profile-format.js";
import { newProfileGuid, type WtProfileStore } from "../services/wt-profile-store.js";
import type { OutputFormat, WtProfile } from "../types.js";

export const OutputFormatSchema = z.enum(OUTPUT_FORMATS);

export const ProfileNameSchema = z.string().trim().min(1, "Profile name must not be empty");

export interface AddProfileArgs {
  name: string;
  exe: string;
  icon?: string;
}

export interface RemoveProfileArgs {
  guid?: string;
  name?: string;
}

async function assertExists(option: string, path: string): Promise<void> {
  try {
    await stat(path);
  } catch (err) {
    if (hasErrorCode(err, "ENOENT") || hasErrorCode(err, "ENOTDIR")) {
      throw new ValidationError(`Invalid value for '--${option}': Path '${path}' does not exist.`);
    }
    throw err;
  }
}

export async function buildProfile(args: AddProfileArgs): Promise<WtProfile> {
  const name = ProfileNameSchema.safeParse(args.name);
  if (!name.success) throw new ValidationError(name.error.issues[0].message);

  await assertExists("exe", args.exe);
  if (args.icon) await assertExists("icon", args.icon);

  const profile: WtProfile = {
    name: name.data,
    commandline: await realpath(args.exe),
    guid: newProfileGuid(),
    hidden: false,
  };
  if (args.icon) profile.icon = args.icon;
  return profile;
}

export function parseOutputFormat(value: string): OutputFormat {
  const parsed = OutputFormatSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`Invalid value for '--output': '${value}' is not one of ${OUTPUT_FORMATS.join(", ")}.`);
  }
  return parsed.data;
}

export async function addProfileCommand(store: WtProfileStore, args: AddProfileArgs): Promise<string> {
  const profile = await buildProfile(args);
  await store.addProfile(profile);
  return [formatProfileJson(profile), `${chalk.greenBright("INFO  ")} - Profile added successfully`].join("\n");
}

export async function listProfilesCommand(store: WtProfileStore, format: OutputFormat): Promise<string> {
  return formatProfiles(await store.profiles(), format);
}

export async function removeProfileCommand(store: WtProfileStore, args: RemoveProfileArgs): Promise<string> {
  if (args.guid && args.name) {
    throw new ValidationError("Have passed both GUID and Name. Use only one.");
  }
  if (!args.guid && !args.name) {
    throw new ValidationError("Pass either --guid or --name.");
  }

  const [field, value] = args.guid ? (["guid", args.guid] as const) : (["name", args.name ?? ""] as const);
  const removed = await store.removeProfile(value, field);
  if (!removed) {
    throw new NotFoundError(`No profile to remove with: ${field} = ${value}`);
  }
  return [formatProfileJson(removed), `${chalk.blueBright("INFO  ")} - Profile removed successfully.`].join("\n");
}

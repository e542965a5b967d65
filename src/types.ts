import type { OUTPUT_FORMATS, PROFILE_FIELDS } from "./constants.js";

/** A profile as it appears in settings.json; entries Windows Terminal generates may omit fields. */
export interface WtProfileEntry {
  name?: string;
  guid?: string;
  commandline?: string;
  hidden?: boolean;
  icon?: string;
  [key: string]: unknown;
}

/** A profile created by wt-profile. */
export interface WtProfile extends WtProfileEntry {
  name: string;
  guid: string;
  commandline: string;
  hidden: boolean;
}

export interface WtProfilesSection {
  list: WtProfileEntry[];
  [key: string]: unknown;
}

export interface WtSettings {
  profiles: WtProfilesSection;
  [key: string]: unknown;
}

export type ProfileField = (typeof PROFILE_FIELDS)[number];
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type ProfileMatch =
  | { found: true; index: number; profile: WtProfileEntry }
  | { found: false };

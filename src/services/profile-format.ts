import chalk from "chalk";
import { stringify as stringifyYaml } from "yaml";
import { WT_SETTINGS_INDENT } from "../constants.js";
import type { OutputFormat, WtProfileEntry } from "../types.js";

export const TABLE_COLUMNS = ["name", "guid", "commandline", "hidden", "icon"] as const;

function cellValue(value: unknown): string {
  if (value === undefined) return "";
  return typeof value === "string" ? value : JSON.stringify(value);
}

export function formatProfileJson(profile: WtProfileEntry): string {
  return JSON.stringify(profile, null, WT_SETTINGS_INDENT);
}

export function formatProfilesJson(profiles: WtProfileEntry[]): string {
  return JSON.stringify(profiles, null, WT_SETTINGS_INDENT);
}

export function formatProfilesYaml(profiles: WtProfileEntry[]): string {
  return stringifyYaml({ profiles }, { indent: WT_SETTINGS_INDENT }).trimEnd();
}

export function formatProfilesTable(profiles: WtProfileEntry[]): string {
  if (profiles.length === 0) return "No Windows Terminal profiles found.";

  const rows = profiles.map((profile) => TABLE_COLUMNS.map((column) => cellValue(profile[column])));
  const widths = TABLE_COLUMNS.map((column, i) =>
    Math.max(column.length, ...rows.map((row) => row[i].length))
  );
  const line = (cells: readonly string[]) =>
    cells.map((cell, i) => (i === cells.length - 1 ? cell : cell.padEnd(widths[i]))).join("  ").trimEnd();

  const header = line(TABLE_COLUMNS);
  const divider = "-".repeat(widths.reduce((sum, w) => sum + w, 0) + 2 * (widths.length - 1));
  return [chalk.bold(header), divider, ...rows.map(line)].join("\n");
}

export function formatProfiles(profiles: WtProfileEntry[], format: OutputFormat): string {
  switch (format) {
    case "json":
      return formatProfilesJson(profiles);
    case "yaml":
      return formatProfilesYaml(profiles);
    case "table":
      return formatProfilesTable(profiles);
  }
}

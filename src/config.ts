import { z } from "zod";
import { ConfigurationError } from "./services/errors.js";
import { setLogLevel, setLogPath, type LogLevel } from "./services/logger.js";

export interface RuntimeConfig {
  localAppData?: string;
  wtSettingsPath?: string;
  logLevel: LogLevel;
  logFile?: string;
}

const optionalPath = z
  .string()
  .transform((value) => value.trim())
  .optional()
  .transform((value) => (value ? value : undefined));

const RuntimeEnvSchema = z.object({
  LOCALAPPDATA: optionalPath,
  WINCLI_WT_SETTINGS: optionalPath,
  WINCLI_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("warn"),
  WINCLI_LOG_FILE: optionalPath,
});

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = RuntimeEnvSchema.safeParse({
    LOCALAPPDATA: env.LOCALAPPDATA,
    WINCLI_WT_SETTINGS: env.WINCLI_WT_SETTINGS,
    WINCLI_LOG_LEVEL: env.WINCLI_LOG_LEVEL || undefined,
    WINCLI_LOG_FILE: env.WINCLI_LOG_FILE,
  });
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`Invalid environment configuration (${details})`);
  }

  return {
    localAppData: parsed.data.LOCALAPPDATA,
    wtSettingsPath: parsed.data.WINCLI_WT_SETTINGS,
    logLevel: parsed.data.WINCLI_LOG_LEVEL,
    logFile: parsed.data.WINCLI_LOG_FILE,
  };
}

export function applyLoggingConfig(config: RuntimeConfig): void {
  setLogLevel(config.logLevel);
  setLogPath(config.logFile ?? null);
}

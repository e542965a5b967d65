export const WT_PACKAGES_DIR = "Packages";
export const WT_PACKAGE_PREFIX = "Microsoft.WindowsTerminal_";
export const WT_SETTINGS_RELATIVE = ["LocalState", "settings.json"] as const;
export const WT_SETTINGS_INDENT = 4;

export const PROFILE_FIELDS = ["guid", "name", "commandline"] as const;
export const OUTPUT_FORMATS = ["json", "yaml", "table"] as const;
export const DEFAULT_OUTPUT_FORMAT = "yaml";

export const TELEGRAM_ENV = {
  phoneNumber: "TELEGRAM_NUMBER",
  apiId: "TELEGRAM_API_ID",
  apiHash: "TELEGRAM_API_HASH",
  session: "TELEGRAM_SESSION",
} as const;
export const TELEGRAM_COUNTRY_PREFIX = "+91";
export const TELEGRAM_PHONE_LENGTH = 13;
export const TELEGRAM_API_ID_LENGTH = 8;
export const TELEGRAM_API_HASH_BYTES = 16;
export const TELEGRAM_CONNECTION_RETRIES = 5;

export const USER_PATH_VAR = "Path";
export const PATH_SEPARATOR = ";";

export const LOCK_RETRIES = 20;
export const LOCK_BACKOFF_MS = 50;
export const LOCK_TTL_MS = 10_000;

export const LOG_MAX_BYTES = 10 * 1024 * 1024;
export const LOG_ROTATION_COUNT = 3;

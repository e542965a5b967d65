export { WtProfileStore, findProfile, newProfileGuid } from "./services/wt-profile-store.js";
export { formatProfiles, formatProfileJson } from "./services/profile-format.js";
export { resolveWtSettingsPath, findWtSettingsCandidates } from "./paths.js";
export { loadRuntimeConfig } from "./config.js";
export type { RuntimeConfig } from "./config.js";
export { UserPathManager, validateDirectory } from "./services/user-path.js";
export { WindowsUserEnvironment } from "./system/user-environment.js";
export type { UserEnvironment } from "./system/user-environment.js";
export { TelegramCredentialStore, validateApiHash, validateApiId, validatePhoneNumber } from "./services/telegram-credentials.js";
export { TelegramSessionManager } from "./services/telegram-session.js";
export type { TelegramGateway, TelegramGatewayFactory, SignInPrompts } from "./services/telegram-session.js";
export {
  CliUtilsError,
  ConfigurationError,
  DataFormatError,
  EnvironmentError,
  NotFoundError,
  TelegramError,
  ValidationError,
} from "./services/errors.js";
export type {
  OutputFormat,
  ProfileField,
  ProfileMatch,
  WtProfile,
  WtProfileEntry,
  WtSettings,
} from "./types.js";

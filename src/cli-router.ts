import { addToPathCommand } from "./commands/add-to-path.js";
import { loginCommand, logoutCommand, verifyCommand } from "./commands/telegram.js";
import {
  addProfileCommand,
  listProfilesCommand,
  parseOutputFormat,
  removeProfileCommand,
} from "./commands/wt-profile.js";
import type { RuntimeConfig } from "./config.js";
import { runCommand, consoleIO, type CommandIO } from "./cli/run.js";
import { CliUtilsError, ValidationError } from "./services/errors.js";
import { TelegramCredentialStore, type Prompt } from "./services/telegram-credentials.js";
import { TelegramSessionManager, type TelegramGatewayFactory } from "./services/telegram-session.js";
import { UserPathManager } from "./services/user-path.js";
import { WtProfileStore } from "./services/wt-profile-store.js";
import type { UserEnvironment } from "./system/user-environment.js";

export interface WtProfileContext {
  command?: string;
  input: string[];
  flags: {
    exe?: string;
    icon?: string;
    output: string;
    guid?: string;
    name?: string;
  };
}

export interface TelegramContext {
  command?: string;
  input: string[];
  flags: {
    force: boolean;
    reset: boolean;
  };
}

export interface TelegramDeps {
  env: UserEnvironment;
  createGateway: TelegramGatewayFactory;
  prompt: Prompt;
  source?: NodeJS.ProcessEnv;
  io?: CommandIO;
}

export function assertWindows(platform: NodeJS.Platform = process.platform): void {
  if (platform !== "win32") {
    throw new CliUtilsError("This tool only supports Windows (win32) operating systems.", { category: "unknown", exitCode: 1 });
  }
}

export async function routeWtProfile(ctx: WtProfileContext, config: RuntimeConfig, io: CommandIO = consoleIO): Promise<number> {
  const { command, input, flags } = ctx;

  return runCommand("wt-profile", async () => {
    if (command === "add") {
      const name = input[1];
      if (!name) throw new ValidationError("Missing argument 'NAME'.");
      if (!flags.exe) throw new ValidationError("Missing option '--exe'.");
      const store = await WtProfileStore.open(config);
      return addProfileCommand(store, { name, exe: flags.exe, icon: flags.icon });
    }
    if (command === "list") {
      const format = parseOutputFormat(flags.output);
      const store = await WtProfileStore.open(config);
      return listProfilesCommand(store, format);
    }
    if (command === "remove") {
      const store = await WtProfileStore.open(config);
      return removeProfileCommand(store, { guid: flags.guid, name: flags.name });
    }
    throw new ValidationError(`Unknown command: ${command}`);
  }, io);
}

export async function routeAddToPath(input: string[], env: UserEnvironment, io: CommandIO = consoleIO): Promise<number> {
  return runCommand("add-to-path", async () => {
    const [dir] = input;
    if (!dir) throw new ValidationError("Missing argument 'PATH'.");
    return addToPathCommand(new UserPathManager(env), dir);
  }, io);
}

export async function routeTelegram(ctx: TelegramContext, deps: TelegramDeps): Promise<number> {
  const { command, input, flags } = ctx;
  const io = deps.io ?? consoleIO;
  const manager = new TelegramSessionManager({
    store: new TelegramCredentialStore(deps.env, deps.source),
    createGateway: deps.createGateway,
    prompt: deps.prompt,
    notify: (message) => io.out(message),
  });

  try {
    return await runCommand("telegram", async () => {
      if (command === "login") {
        return loginCommand(manager, input[1], { force: flags.force, prompt: deps.prompt });
      }
      if (command === "logout") {
        return logoutCommand(manager, { reset: flags.reset });
      }
      if (command === "verify") {
        return verifyCommand(manager);
      }
      throw new ValidationError(`Unknown command: ${command}`);
    }, io);
  } finally {
    await manager.close();
  }
}

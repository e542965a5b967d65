#!/usr/bin/env node
import meow from "meow";
import { assertWindows, routeTelegram } from "../cli-router.js";
import { WindowsUserEnvironment } from "../system/user-environment.js";
import { promptInput } from "./prompt.js";
import { bootstrap, runCommand } from "./run.js";

const cli = meow(
  `
  Usage
    $ telegram login [phone]   Login to Telegram
    $ telegram logout          Logout from Telegram
    $ telegram verify          Verify the current session

  Options
    -f, --force   Force login, clearing any existing session (login)
    -r, --reset   Also clear the stored API ID and hash (logout)
`,
  {
    importMeta: import.meta,
    flags: {
      force: { type: "boolean", shortFlag: "f", default: false },
      reset: { type: "boolean", shortFlag: "r", default: false },
    },
  }
);

const [command] = cli.input;

if (!command) {
  cli.showHelp(0);
}

if (!bootstrap()) {
  process.exitCode = 1;
} else {
  process.exitCode = await runCommand("telegram", async () => assertWindows());
  if (process.exitCode === 0) {
    const { createGramJsGateway } = await import("../system/telegram-client.js");
    process.exitCode = await routeTelegram(
      { command, input: cli.input, flags: cli.flags },
      { env: new WindowsUserEnvironment(), createGateway: createGramJsGateway, prompt: promptInput }
    );
  }
}

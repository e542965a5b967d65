#!/usr/bin/env node
import meow from "meow";
import { assertWindows, routeAddToPath } from "../cli-router.js";
import { WindowsUserEnvironment } from "../system/user-environment.js";
import { bootstrap, runCommand } from "./run.js";

const cli = meow(
  `
  Usage
    $ add-to-path <path>

  Adds <path> to the user's PATH environment variable, creating the
  directory when it does not exist yet.
`,
  { importMeta: import.meta }
);

if (cli.input.length === 0) {
  cli.showHelp(0);
}

if (!bootstrap()) {
  process.exitCode = 1;
} else {
  process.exitCode = await runCommand("add-to-path", async () => assertWindows());
  if (process.exitCode === 0) {
    process.exitCode = await routeAddToPath(cli.input, new WindowsUserEnvironment());
  }
}

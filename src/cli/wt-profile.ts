#!/usr/bin/env node
import meow from "meow";
import { DEFAULT_OUTPUT_FORMAT, OUTPUT_FORMATS } from "../constants.js";
import { routeWtProfile } from "../cli-router.js";
import { bootstrap } from "./run.js";

const cli = meow(
  `
  Usage
    $ wt-profile add --exe <path> [--icon <path>] <name>   Add a new Windows Terminal profile
    $ wt-profile list [-o json|yaml|table]                  List all current profiles
    $ wt-profile remove --guid <guid> | --name <name>       Remove a profile

  Options
    --exe          Command line executable for the profile (add)
    --icon         Optional icon for the profile (add)
    -o, --output   Output format: ${OUTPUT_FORMATS.join(", ")} (list, default ${DEFAULT_OUTPUT_FORMAT})
    --guid         GUID of the profile to delete (remove)
    --name         Name of the profile to delete (remove)

  Use either --guid or --name with remove, not both.
`,
  {
    importMeta: import.meta,
    flags: {
      exe: { type: "string" },
      icon: { type: "string" },
      output: { type: "string", shortFlag: "o", default: DEFAULT_OUTPUT_FORMAT },
      guid: { type: "string" },
      name: { type: "string" },
    },
  }
);

const [command] = cli.input;

if (!command) {
  cli.showHelp(0);
}

const config = bootstrap();
process.exitCode = config
  ? await routeWtProfile({ command, input: cli.input, flags: cli.flags }, config)
  : 1;

import chalk from "chalk";
import { applyLoggingConfig, loadRuntimeConfig, type RuntimeConfig } from "../config.js";
import { classifyError, formatErrorForUI } from "../services/errors.js";
import { createLogger } from "../services/logger.js";

export interface CommandIO {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIO: CommandIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function report(e: unknown, io: CommandIO): number {
  const error = classifyError(e);
  io.err(`${chalk.bold.red("ERROR")} : ${formatErrorForUI(error)}`);
  return error.exitCode;
}

/** Loads runtime config and applies its logging settings; null when the environment is invalid. */
export function bootstrap(env: NodeJS.ProcessEnv = process.env, io: CommandIO = consoleIO): RuntimeConfig | null {
  try {
    const config = loadRuntimeConfig(env);
    applyLoggingConfig(config);
    return config;
  } catch (e) {
    report(e, io);
    return null;
  }
}

/** Runs one command and prints its output or its failure. Resolves to the exit code. */
export async function runCommand(
  component: string,
  action: () => Promise<string | void>,
  io: CommandIO = consoleIO,
): Promise<number> {
  try {
    const output = await action();
    if (output) io.out(output);
    return 0;
  } catch (e) {
    createLogger(component).debug("Command failed", { error: e instanceof Error ? e.message : String(e) });
    return report(e, io);
  }
}

import { TelegramError } from "../services/errors.js";
import { validatePhoneNumber, type Prompt } from "../services/telegram-credentials.js";
import type { TelegramSessionManager } from "../services/telegram-session.js";

export async function loginCommand(
  manager: TelegramSessionManager,
  phoneArg: string | undefined,
  opts: { force?: boolean; prompt: Prompt },
): Promise<string> {
  let phoneNumber = phoneArg || manager.phoneNumber;
  if (!phoneNumber) {
    phoneNumber = validatePhoneNumber(await opts.prompt("Please enter a valid telegram number (+91): "));
  }

  const result = await manager.login(phoneNumber, { force: opts.force });
  return result.status === "already-active"
    ? "Active session already exists."
    : "Logged in successfully and session saved.";
}

export async function logoutCommand(manager: TelegramSessionManager, opts: { reset?: boolean } = {}): Promise<string> {
  await manager.logout(opts);
  return opts.reset ? "Logged out successfully. API ID and hash cleared." : "Logged out successfully.";
}

export async function verifyCommand(manager: TelegramSessionManager): Promise<string> {
  if (!(await manager.verify())) {
    throw new TelegramError("No active session found.", 7);
  }
  return `Active session found for '${manager.phoneNumber}'.`;
}

import { z } from "zod";
import {
  TELEGRAM_API_HASH_BYTES,
  TELEGRAM_API_ID_LENGTH,
  TELEGRAM_COUNTRY_PREFIX,
  TELEGRAM_ENV,
  TELEGRAM_PHONE_LENGTH,
} from "../constants.js";
import type { UserEnvironment } from "../system/user-environment.js";
import { ValidationError } from "./errors.js";

export type Prompt = (question: string) => Promise<string>;

export const PhoneNumberSchema = z.string().regex(
  new RegExp(`^\\+\\d{${TELEGRAM_PHONE_LENGTH - 1}}$`),
  "Phone numbers must be '+' followed by country code and number",
);
export const ApiIdSchema = z.string().regex(new RegExp(`^\\d{${TELEGRAM_API_ID_LENGTH}}$`));
export const ApiHashSchema = z.string().regex(new RegExp(`^[0-9a-fA-F]{${TELEGRAM_API_HASH_BYTES * 2}}$`));

export function validatePhoneNumber(input: string): string {
  const trimmed = input.trim();
  const value = trimmed.startsWith(TELEGRAM_COUNTRY_PREFIX) ? trimmed : `${TELEGRAM_COUNTRY_PREFIX}${trimmed}`;
  if (!PhoneNumberSchema.safeParse(value).success) {
    throw new ValidationError(`'${value}' is not a valid phone number.`, 4);
  }
  return value;
}

export function validateApiId(input: string): number {
  const value = input.trim();
  if (!ApiIdSchema.safeParse(value).success) {
    throw new ValidationError(`'${value}' is not a valid API ID.`, 5);
  }
  return Number(value);
}

export function validateApiHash(input: string): string {
  const value = input.trim();
  if (!ApiHashSchema.safeParse(value).success) {
    throw new ValidationError(`'${value}' is not a valid API Hash.`, 6);
  }
  return value;
}

export interface TelegramCredentials {
  phoneNumber: string;
  apiId: number;
  apiHash: string;
  session: string;
}

/**
 * Telegram credentials kept in user environment variables. Values are read from
 * the process environment and written through to the persistent user scope.
 */
export class TelegramCredentialStore {
  constructor(
    private readonly env: UserEnvironment,
    private readonly source: NodeJS.ProcessEnv = process.env,
  ) {}

  read(): TelegramCredentials {
    return {
      phoneNumber: this.source[TELEGRAM_ENV.phoneNumber] ?? "",
      apiId: Number(this.source[TELEGRAM_ENV.apiId] || 0) || 0,
      apiHash: this.source[TELEGRAM_ENV.apiHash] ?? "",
      session: this.source[TELEGRAM_ENV.session] ?? "",
    };
  }

  async write(key: keyof TelegramCredentials, value: string | number): Promise<void> {
    const name = TELEGRAM_ENV[key];
    const text = String(value);
    if (text.length === 0 || text === "0") {
      await this.env.remove(name);
      delete this.source[name];
      return;
    }
    await this.env.set(name, text);
    this.source[name] = text;
  }

  /** Prompts for, validates and persists a missing API ID or hash. */
  async ensureApiCredentials(prompt: Prompt): Promise<TelegramCredentials> {
    const current = this.read();
    if (!current.apiId) {
      const apiId = validateApiId(await prompt("Enter a valid Telegram API-ID: "));
      await this.write("apiId", apiId);
    }
    if (!current.apiHash) {
      const apiHash = validateApiHash(await prompt("Enter a valid Telegram API Hash: "));
      await this.write("apiHash", apiHash);
    }
    return this.read();
  }
}

import { describe, test, expect } from "vitest";
import {
  TelegramCredentialStore,
  validateApiHash,
  validateApiId,
  validatePhoneNumber,
} from "../src/services/telegram-credentials.js";
import { ValidationError } from "../src/services/errors.js";
import { FakeUserEnvironment, scriptedPrompt } from "./fakes.js";

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected a throw");
}

const API_HASH = "0123456789abcdef0123456789abcdef";

describe("validatePhoneNumber", () => {
  test("adds the country prefix when missing", () => {
    expect(validatePhoneNumber("9876543210")).toBe("+919876543210");
    expect(validatePhoneNumber(" +919876543210 ")).toBe("+919876543210");
  });

  test("rejects numbers of the wrong length with exit code 4", () => {
    const err = thrown(() => validatePhoneNumber("98765"));
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ message: "'+9198765' is not a valid phone number.", exitCode: 4 });
  });

  test("rejects non-digits", () => {
    expect(() => validatePhoneNumber("98765abcde")).toThrow(ValidationError);
  });
});

describe("validateApiId", () => {
  test("accepts eight digits", () => {
    expect(validateApiId("12345678")).toBe(12345678);
  });

  test("rejects other input with exit code 5", () => {
    expect(() => validateApiId("1234")).toThrow("'1234' is not a valid API ID.");
    expect(thrown(() => validateApiId("1234567a"))).toMatchObject({ exitCode: 5 });
  });
});

describe("validateApiHash", () => {
  test("accepts 32 hex characters", () => {
    expect(validateApiHash(API_HASH)).toBe(API_HASH);
  });

  test("rejects other input with exit code 6", () => {
    expect(() => validateApiHash("xyz")).toThrow("'xyz' is not a valid API Hash.");
    expect(thrown(() => validateApiHash(API_HASH.slice(1)))).toMatchObject({ exitCode: 6 });
  });
});

describe("TelegramCredentialStore", () => {
  test("reads missing values as empty", () => {
    const store = new TelegramCredentialStore(new FakeUserEnvironment(), {});
    expect(store.read()).toEqual({ phoneNumber: "", apiId: 0, apiHash: "", session: "" });
  });

  test("writes through to the user environment and the source", async () => {
    const env = new FakeUserEnvironment();
    const source: NodeJS.ProcessEnv = {};
    const store = new TelegramCredentialStore(env, source);

    await store.write("apiId", 12345678);
    await store.write("phoneNumber", "+919876543210");

    expect(env.vars.get("TELEGRAM_API_ID")).toBe("12345678");
    expect(source.TELEGRAM_NUMBER).toBe("+919876543210");
    expect(store.read()).toMatchObject({ apiId: 12345678, phoneNumber: "+919876543210" });
  });

  test("empty values remove the variable", async () => {
    const env = new FakeUserEnvironment({ TELEGRAM_SESSION: "test-session" });
    const source: NodeJS.ProcessEnv = { TELEGRAM_SESSION: "test-session" };
    const store = new TelegramCredentialStore(env, source);

    await store.write("session", "");

    expect(env.vars.has("TELEGRAM_SESSION")).toBe(false);
    expect(source.TELEGRAM_SESSION).toBeUndefined();
    expect(env.writes).toEqual([["TELEGRAM_SESSION", null]]);
  });

  test("ensureApiCredentials prompts only for what is missing", async () => {
    const env = new FakeUserEnvironment();
    const source: NodeJS.ProcessEnv = { TELEGRAM_API_ID: "12345678" };
    const store = new TelegramCredentialStore(env, source);
    const { prompt, asked } = scriptedPrompt({ "API Hash": API_HASH });

    const credentials = await store.ensureApiCredentials(prompt);

    expect(asked).toEqual(["Enter a valid Telegram API Hash: "]);
    expect(credentials).toEqual({ phoneNumber: "", apiId: 12345678, apiHash: API_HASH, session: "" });
    expect(env.vars.get("TELEGRAM_API_HASH")).toBe(API_HASH);
  });

  test("ensureApiCredentials rejects an invalid answer without saving", async () => {
    const env = new FakeUserEnvironment();
    const store = new TelegramCredentialStore(env, {});
    const { prompt } = scriptedPrompt({ "API-ID": "42" });

    await expect(store.ensureApiCredentials(prompt)).rejects.toThrow("'42' is not a valid API ID.");
    expect(env.writes).toEqual([]);
  });
});

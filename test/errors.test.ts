import { describe, test, expect } from "vitest";
import {
  CliUtilsError,
  ConfigurationError,
  DataFormatError,
  EnvironmentError,
  NotFoundError,
  TelegramError,
  ValidationError,
  classifyError,
  formatErrorForUI,
  hasErrorCode,
} from "../src/services/errors.js";

describe("exit codes", () => {
  test("follow the error category unless overridden", () => {
    expect(new ConfigurationError("x").exitCode).toBe(1);
    expect(new DataFormatError("x").exitCode).toBe(1);
    expect(new ValidationError("x").exitCode).toBe(2);
    expect(new ValidationError("x", 4).exitCode).toBe(4);
    expect(new EnvironmentError("Path").exitCode).toBe(3);
    expect(new TelegramError("x", 7).exitCode).toBe(7);
    expect(new NotFoundError("x").exitCode).toBe(1);
  });
});

describe("classifyError", () => {
  test("passes CLI errors through", () => {
    const err = new ValidationError("bad");
    expect(classifyError(err)).toBe(err);
  });

  test("wraps other errors as unknown", () => {
    const cause = new Error("boom");
    const classified = classifyError(cause);
    expect(classified).toBeInstanceOf(CliUtilsError);
    expect(classified.category).toBe("unknown");
    expect(classified.message).toBe("boom");
    expect(classified.cause).toBe(cause);
    expect(classifyError("plain").message).toBe("plain");
  });
});

describe("formatErrorForUI", () => {
  test("prefixes by category", () => {
    expect(formatErrorForUI(new ConfigurationError("no file"))).toBe("Configuration error: no file");
    expect(formatErrorForUI(new DataFormatError("bad json"))).toBe("Invalid settings file: bad json");
    expect(formatErrorForUI(new EnvironmentError("Path", "denied"))).toBe("Environment error: denied");
    expect(formatErrorForUI(new ValidationError("Pass either --guid or --name."))).toBe("Pass either --guid or --name.");
  });
});

describe("hasErrorCode", () => {
  test("matches Node error codes", () => {
    const err = Object.assign(new Error("missing"), { code: "ENOENT" });
    expect(hasErrorCode(err, "ENOENT")).toBe(true);
    expect(hasErrorCode(err, "EACCES")).toBe(false);
    expect(hasErrorCode("ENOENT", "ENOENT")).toBe(false);
  });
});

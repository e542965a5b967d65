import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync, statSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  UserPathManager,
  appendPathEntry,
  containsPathEntry,
  normalizePathEntry,
  validateDirectory,
} from "../src/services/user-path.js";
import { ValidationError } from "../src/services/errors.js";
import { FakeUserEnvironment } from "./fakes.js";

describe("normalizePathEntry", () => {
  test("ignores case, separator style and trailing separators", () => {
    expect(normalizePathEntry("C:/Tools/Bin/")).toBe("c:\\tools\\bin");
    expect(normalizePathEntry("  C:\\Tools\\Bin  ")).toBe("c:\\tools\\bin");
  });

  test("keeps the separator of a drive root", () => {
    expect(normalizePathEntry("D:\\")).toBe("d:\\");
  });
});

describe("appendPathEntry", () => {
  test("strips trailing separators before appending", () => {
    expect(appendPathEntry("C:\\a;C:\\b;;", "C:\\c")).toBe("C:\\a;C:\\b;C:\\c");
  });

  test("an empty value becomes the entry itself", () => {
    expect(appendPathEntry("", "C:\\c")).toBe("C:\\c");
  });
});

describe("containsPathEntry", () => {
  test("matches equivalent spellings and skips blank entries", () => {
    expect(containsPathEntry("C:\\Windows; ;C:\\Tools\\", "c:/tools")).toBe(true);
    expect(containsPathEntry("C:\\Windows;;", "C:\\Tools")).toBe(false);
  });
});

describe("UserPathManager", () => {
  test("appends a directory that is not on the PATH", async () => {
    const env = new FakeUserEnvironment({ Path: "C:\\Windows;" });
    const result = await new UserPathManager(env).addToPath("C:\\Tools");
    expect(result).toEqual({ path: "C:\\Tools", added: true });
    expect(env.vars.get("Path")).toBe("C:\\Windows;C:\\Tools");
  });

  test("does not write when the directory is already present", async () => {
    const env = new FakeUserEnvironment({ Path: "C:\\Windows;C:\\TOOLS" });
    const manager = new UserPathManager(env);
    expect(await manager.isOnPath("C:\\Tools")).toBe(true);
    expect(await manager.addToPath("C:\\Tools")).toEqual({ path: "C:\\Tools", added: false });
    expect(env.writes).toEqual([]);
  });

  test("keeps %VAR% entries unexpanded when appending", async () => {
    const env = new FakeUserEnvironment({ Path: "%USERPROFILE%\\AppData\\Local\\Microsoft\\WindowsApps;" });
    await new UserPathManager(env).addToPath("C:\\Tools");
    expect(env.vars.get("Path")).toBe("%USERPROFILE%\\AppData\\Local\\Microsoft\\WindowsApps;C:\\Tools");
  });

  test("creates the Path variable when it is unset", async () => {
    const env = new FakeUserEnvironment();
    await new UserPathManager(env).addToPath("C:\\Tools");
    expect(env.vars.get("Path")).toBe("C:\\Tools");
  });
});

describe("validateDirectory", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "user-path-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("creates missing directories and returns the absolute path", async () => {
    const target = join(dir, "a", "b");
    expect(await validateDirectory(target)).toBe(target);
    expect(statSync(target).isDirectory()).toBe(true);
  });

  test("rejects a path that is a file", async () => {
    const file = join(dir, "file");
    writeFileSync(file, "");
    await expect(validateDirectory(file)).rejects.toThrow(ValidationError);
    expect(existsSync(file)).toBe(true);
  });
});

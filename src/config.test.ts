import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  buildProgram,
  ConfigError,
  parseBoolEnv,
  resolveConfig,
} from "./config.js";

describe("parseBoolEnv", () => {
  it("accepts the usual truthy spellings", () => {
    expect(parseBoolEnv("1")).toBe(true);
    expect(parseBoolEnv(" Yes ")).toBe(true);
    expect(parseBoolEnv("on")).toBe(true);
    expect(parseBoolEnv("0")).toBe(false);
    expect(parseBoolEnv(undefined)).toBe(false);
  });
});

describe("resolveConfig", () => {
  it("defaults to Normal mode without logging", () => {
    expect(resolveConfig({ file: "notes.txt" }, {})).toEqual({
      filePath: path.resolve("notes.txt"),
      startMode: "normal",
      logFile: null,
      debug: false,
    });
  });

  it("maps --insert and --append to a start mode", () => {
    expect(resolveConfig({ insert: true }, {}).startMode).toBe("insert");
    expect(resolveConfig({ append: true }, {}).startMode).toBe("append");
    expect(resolveConfig({}, {}).filePath).toBeNull();
  });

  it("rejects --insert with --append", () => {
    expect(() => resolveConfig({ insert: true, append: true }, {})).toThrow(
      ConfigError,
    );
  });

  it("reads the log file and debug flag from the environment", () => {
    const config = resolveConfig(
      {},
      { VIMPAD_LOG_FILE: "/tmp/vimpad.log", VIMPAD_DEBUG: "true" },
    );
    expect(config.logFile).toBe("/tmp/vimpad.log");
    expect(config.debug).toBe(true);
  });

  it("lets flags win over the environment", () => {
    const config = resolveConfig(
      { logFile: "/var/tmp/other.log", debug: false },
      { VIMPAD_LOG_FILE: "/tmp/vimpad.log", VIMPAD_DEBUG: "1" },
    );
    expect(config.logFile).toBe("/var/tmp/other.log");
    expect(config.debug).toBe(false);
  });

  it("treats a blank environment log file as unset", () => {
    expect(resolveConfig({}, { VIMPAD_LOG_FILE: "  " }).logFile).toBeNull();
  });

  it("rejects an empty --log-file", () => {
    expect(() => resolveConfig({ logFile: "" }, {})).toThrow(
      "Invalid configuration: logFile: log file path must not be empty",
    );
  });
});

describe("buildProgram", () => {
  it("parses the file argument and options", () => {
    const program = buildProgram().exitOverride();
    program.parse(["--append", "--log-file", "/tmp/a.log", "todo.md"], {
      from: "user",
    });
    expect(program.args).toEqual(["todo.md"]);
    expect(program.opts()).toEqual({ append: true, logFile: "/tmp/a.log" });
  });
});

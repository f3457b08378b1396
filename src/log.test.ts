import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { stripVTControlCharacters } from "node:util";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createLogger, formatLine, getTimestamp } from "./log.js";

describe("getTimestamp", () => {
  it("formats kitchen time with milliseconds", () => {
    expect(getTimestamp(new Date(2024, 0, 1, 8, 5, 0, 7))).toBe("8:05.007AM");
    expect(getTimestamp(new Date(2024, 0, 1, 0, 30, 0, 0))).toBe("12:30.000AM");
    expect(getTimestamp(new Date(2024, 0, 1, 13, 9, 0, 250))).toBe(
      "1:09.250PM",
    );
  });
});

describe("formatLine", () => {
  it("prefixes the timestamp and level", () => {
    const now = new Date(2024, 0, 1, 8, 5, 0, 7);
    const line = formatLine("info", ["saved", "/tmp/a.txt"], now);
    expect(stripVTControlCharacters(line)).toBe(
      "8:05.007AM INFO saved /tmp/a.txt\n",
    );
  });

  it("formats objects like console output", () => {
    const now = new Date(2024, 0, 1, 20, 0, 0, 0);
    const line = formatLine("error", ["bad", { code: 2 }], now);
    expect(stripVTControlCharacters(line)).toBe(
      "8:00.000PM ERROR bad { code: 2 }\n",
    );
  });
});

describe("createLogger", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "vimpad-log-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function readLines(file: string): string[] {
    return stripVTControlCharacters(fs.readFileSync(file, "utf8"))
      .trimEnd()
      .split("\n")
      .map((line) => line.replace(/^\S+ /, ""));
  }

  it("skips debug lines unless debug is on", () => {
    const file = path.join(dir, "quiet.log");
    const logger = createLogger({ file, debug: false });
    logger.info("one");
    logger.debug("hidden");
    logger.error("two");
    expect(readLines(file)).toEqual(["INFO one", "ERROR two"]);
  });

  it("writes debug lines when enabled", () => {
    const file = path.join(dir, "debug.log");
    const logger = createLogger({ file, debug: true });
    logger.debug("shown", 3);
    expect(readLines(file)).toEqual(["DEBUG shown 3"]);
  });

  it("does nothing without a file", () => {
    const logger = createLogger({ file: null, debug: true });
    expect(() => logger.info("nowhere")).not.toThrow();
  });

  it("swallows write failures", () => {
    const file = path.join(dir, "missing-dir", "x.log");
    const logger = createLogger({ file, debug: false });
    expect(() => logger.error("lost")).not.toThrow();
    expect(fs.existsSync(file)).toBe(false);
  });
});

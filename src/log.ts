/**
 * File logging for vimpad.
 *
 * The terminal belongs to the editor UI, so log lines go to a file (set with
 * --log-file or VIMPAD_LOG_FILE). Without one, logging is a no-op. Lines are
 * styled with ANSI colours for reading with `tail -f`.
 */

import fs from "node:fs";
import { format } from "node:util";
import { Chalk } from "chalk";

export type LogLevel = "info" | "error" | "debug";

export type LoggerOptions = {
  file: string | null;
  debug: boolean;
};

export type Logger = {
  info: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
};

const style = new Chalk({ level: 1 });

/**
 * Kitchen time with milliseconds, e.g. 8:23.456PM
 */
export function getTimestamp(now = new Date()): string {
  let hours = now.getHours();
  const ampm = hours >= 12 ? "PM" : "AM";
  hours = hours % 12;
  hours = hours ? hours : 12;

  const mm = String(now.getMinutes()).padStart(2, "0");
  const ms = String(now.getMilliseconds()).padStart(3, "0");
  return `${hours}:${mm}.${ms}${ampm}`;
}

function levelTag(level: LogLevel): string {
  switch (level) {
    case "error":
      return style.red("ERROR");
    case "debug":
      return style.gray("DEBUG");
    case "info":
      return style.cyan("INFO");
  }
}

export function formatLine(
  level: LogLevel,
  args: unknown[],
  now = new Date(),
): string {
  const message = format(...args);
  const body = level === "error" ? style.red(message) : message;
  return `${style.dim(getTimestamp(now))} ${levelTag(level)} ${body}\n`;
}

export function createLogger(options: LoggerOptions): Logger {
  let file = options.file;

  const write = (level: LogLevel, args: unknown[]) => {
    if (file === null) return;
    if (level === "debug" && !options.debug) return;
    try {
      fs.appendFileSync(file, formatLine(level, args), "utf8");
    } catch {
      // Stop writing after the first failure.
      file = null;
    }
  };

  return {
    info: (...args) => write("info", args),
    error: (...args) => write("error", args),
    debug: (...args) => write("debug", args),
  };
}

let active: Logger = createLogger({ file: null, debug: false });

export function configureLog(options: LoggerOptions) {
  active = createLogger(options);
}

export const log: Logger = {
  info: (...args) => active.info(...args),
  error: (...args) => active.error(...args),
  debug: (...args) => active.debug(...args),
};

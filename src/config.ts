import path from "node:path";
import { Command } from "commander";
import { z } from "zod";

export const VERSION = "0.1.0";

export const AppConfigSchema = z.object({
  filePath: z.string().min(1).nullable(),
  startMode: z.enum(["normal", "insert", "append"]),
  logFile: z.string().min(1, "log file path must not be empty").nullable(),
  debug: z.boolean(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/** Options as commander hands them over, plus the positional file. */
export type CLIOptions = {
  file?: string;
  insert?: boolean;
  append?: boolean;
  logFile?: string;
  debug?: boolean;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function parseBoolEnv(value: string | undefined): boolean {
  if (value === undefined) return false;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

export function buildProgram(): Command {
  return new Command()
    .name("vimpad")
    .description("Modal text editor for the terminal")
    .version(VERSION, "-v, --version")
    .argument("[file]", "file to edit (created on first save if missing)")
    .option("--insert", "open in Insert mode with the cursor at the start")
    .option("--append", "open in Insert mode with the cursor at the end")
    .option("--log-file <path>", "append log lines to this file")
    .option("--debug", "include debug lines in the log");
}

export function resolveConfig(
  cli: CLIOptions,
  env: NodeJS.ProcessEnv,
): AppConfig {
  if (cli.insert && cli.append) {
    throw new ConfigError("--insert and --append cannot be combined");
  }

  const logFile = cli.logFile ?? (env.VIMPAD_LOG_FILE?.trim() || undefined);

  const parsed = AppConfigSchema.safeParse({
    filePath: cli.file ? path.resolve(cli.file) : null,
    startMode: cli.insert ? "insert" : cli.append ? "append" : "normal",
    logFile: logFile === undefined ? null : logFile && path.resolve(logFile),
    debug: cli.debug ?? parseBoolEnv(env.VIMPAD_DEBUG),
  });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}

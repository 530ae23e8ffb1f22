import path from "node:path";
import { LOG_LEVELS } from "@autoversion/core-application";
import type { LogLevel } from "@autoversion/core-domain";

export type Command =
  | { name: "watch"; configPath: string }
  | { name: "init"; configPath: string }
  | { name: "list"; file: string; configPath: string }
  | { name: "journal"; date: string; configPath: string }
  | { name: "help" };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = `Usage: autoversion <command> [options]

Commands:
  watch [config]        watch the configured folders until stopped
  init [config]         write a starter configuration if none exists
  list <file> [config]  print the stored versions of a file, oldest first
  journal [date] [config]
                        print the versions written on a UTC day (YYYY-MM-DD, default today)
  help                  show this message

The configuration defaults to $AUTOVERSION_CONFIG, then ~/.autoversion/config.json.
Set AUTOVERSION_LOG_LEVEL to override the configured log level.`;

export function defaultConfigPath(env: NodeJS.ProcessEnv, homeDir: string): string {
  const fromEnv = env.AUTOVERSION_CONFIG?.trim();
  if (fromEnv) return path.resolve(fromEnv);
  return path.join(homeDir, ".autoversion", "config.json");
}

const JOURNAL_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function parseArgs(argv: string[], defaultConfig: string, now: Date = new Date()): Command {
  const [command = "watch", ...rest] = argv;

  switch (command) {
    case "watch":
    case "init": {
      if (rest.length > 1) throw new UsageError(`"${command}" takes at most one argument`);
      const configPath = path.resolve(rest[0] ?? defaultConfig);
      return command === "watch" ? { name: "watch", configPath } : { name: "init", configPath };
    }
    case "list": {
      const [file, config, ...extra] = rest;
      if (!file) throw new UsageError(`"list" needs the path of a tracked file`);
      if (extra.length > 0) throw new UsageError(`"list" takes at most two arguments`);
      return { name: "list", file: path.resolve(file), configPath: path.resolve(config ?? defaultConfig) };
    }
    case "journal": {
      if (rest.length > 2) throw new UsageError(`"journal" takes at most two arguments`);
      // a lone argument is the config unless it reads as a date
      const [first, second] = rest;
      const date = first !== undefined && JOURNAL_DATE.test(first) ? first : undefined;
      if (second !== undefined && date === undefined) {
        throw new UsageError(`"journal" date must be YYYY-MM-DD, got "${first}"`);
      }
      const config = date === undefined ? first : second;
      return {
        name: "journal",
        date: date ?? now.toISOString().slice(0, 10),
        configPath: path.resolve(config ?? defaultConfig),
      };
    }
    case "help":
    case "--help":
    case "-h":
      return { name: "help" };
    default:
      throw new UsageError(`Unknown command "${command}"`);
  }
}

/** Level from the environment when it names a known one, otherwise the fallback. */
export function logLevelFrom(env: NodeJS.ProcessEnv, fallback: LogLevel): LogLevel {
  const wanted = env.AUTOVERSION_LOG_LEVEL?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === wanted) ?? fallback;
}

import { ConfigurationError, WatchStartError } from "./errors";

export const ExitCode = {
  Ok: 0,
  Usage: 1,
  Configuration: 2,
  WatchFailure: 3,
  Unexpected: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof ConfigurationError) return ExitCode.Configuration;
  if (err instanceof WatchStartError) return ExitCode.WatchFailure;
  return ExitCode.Unexpected;
}

import { pino, type DestinationStream, type Logger as PinoInstance } from "pino";
import pretty from "pino-pretty";
import type { LogLevel } from "@autoversion/core-domain";
import type { Logger } from "../ports/logger";

export type PinoLoggerOptions = {
  level: LogLevel;
  name?: string;
  /** Human-readable output instead of JSON lines. Ignored when `destination` is set. */
  pretty?: boolean;
  destination?: DestinationStream;
};

export function wrapPino(instance: PinoInstance): Logger {
  return {
    debug: (message, fields) => instance.debug(fields ?? {}, message),
    info: (message, fields) => instance.info(fields ?? {}, message),
    warn: (message, fields) => instance.warn(fields ?? {}, message),
    error: (message, fields) => instance.error(fields ?? {}, message),
    child: (bindings) => wrapPino(instance.child(bindings)),
  };
}

/**
 * Human-readable stream on stdout (or a file). Written synchronously so the last
 * records before `process.exit` are not lost.
 */
export function prettyStream(destination: string | number = 1) {
  return pretty({
    colorize: true,
    translateTime: "SYS:standard",
    ignore: "pid,hostname",
    sync: true,
    destination,
  });
}

export function createPinoLogger(options: PinoLoggerOptions): Logger {
  const base = { level: options.level, name: options.name ?? "autoversion" };

  if (options.destination) return wrapPino(pino(base, options.destination));

  if (options.pretty) return wrapPino(pino(base, prettyStream()));

  return wrapPino(pino(base));
}

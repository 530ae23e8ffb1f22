export class ConfigurationError extends Error {
  constructor(message: string, public readonly issues: string[] = [], public cause?: unknown) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class WatchStartError extends Error {
  constructor(message: string, public readonly folder: string, public cause?: unknown) {
    super(message);
    this.name = "WatchStartError";
  }
}

export class VersionWriteError extends Error {
  constructor(message: string, public readonly sourcePath: string, public cause?: unknown) {
    super(message);
    this.name = "VersionWriteError";
  }
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const code = errorCode(err);
    return code ? `${err.name}: ${err.message} (${code})` : `${err.name}: ${err.message}`;
  }
  return String(err);
}

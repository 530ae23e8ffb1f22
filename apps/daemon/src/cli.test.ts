import path from "node:path";
import { describe, it, expect } from "vitest";
import { UsageError, defaultConfigPath, logLevelFrom, parseArgs } from "./cli";

const DEFAULT = path.resolve("/home/test/.autoversion/config.json");

describe("parseArgs", () => {
  it("watches with the default configuration when no command is given", () => {
    expect(parseArgs([], DEFAULT)).toEqual({ name: "watch", configPath: DEFAULT });
  });

  it("takes an explicit configuration path for watch and init", () => {
    expect(parseArgs(["watch", "/etc/av.json"], DEFAULT)).toEqual({
      name: "watch",
      configPath: path.resolve("/etc/av.json"),
    });
    expect(parseArgs(["init"], DEFAULT)).toEqual({ name: "init", configPath: DEFAULT });
  });

  it("needs a file for list", () => {
    expect(parseArgs(["list", "/docs/report.pdf"], DEFAULT)).toEqual({
      name: "list",
      file: path.resolve("/docs/report.pdf"),
      configPath: DEFAULT,
    });
    expect(() => parseArgs(["list"], DEFAULT)).toThrow(UsageError);
  });

  it("reads the journal of a given day or of today", () => {
    const now = new Date("2026-10-19T23:30:00.000Z");
    expect(parseArgs(["journal"], DEFAULT, now)).toEqual({ name: "journal", date: "2026-10-19", configPath: DEFAULT });
    expect(parseArgs(["journal", "2026-10-01"], DEFAULT, now)).toEqual({
      name: "journal",
      date: "2026-10-01",
      configPath: DEFAULT,
    });
    expect(parseArgs(["journal", "/etc/av.json"], DEFAULT, now)).toEqual({
      name: "journal",
      date: "2026-10-19",
      configPath: path.resolve("/etc/av.json"),
    });
    expect(parseArgs(["journal", "2026-10-01", "/etc/av.json"], DEFAULT, now)).toEqual({
      name: "journal",
      date: "2026-10-01",
      configPath: path.resolve("/etc/av.json"),
    });
  });

  it("rejects a journal date in another format", () => {
    expect(() => parseArgs(["journal", "19.10.2026", "/etc/av.json"], DEFAULT)).toThrow(
      '"journal" date must be YYYY-MM-DD, got "19.10.2026"'
    );
  });

  it("rejects unknown commands and extra arguments", () => {
    expect(() => parseArgs(["sync"], DEFAULT)).toThrow('Unknown command "sync"');
    expect(() => parseArgs(["watch", "a.json", "b.json"], DEFAULT)).toThrow(
      '"watch" takes at most one argument'
    );
  });

  it("recognises help flags", () => {
    expect(parseArgs(["--help"], DEFAULT)).toEqual({ name: "help" });
    expect(parseArgs(["-h"], DEFAULT)).toEqual({ name: "help" });
  });
});

describe("defaultConfigPath", () => {
  it("prefers AUTOVERSION_CONFIG", () => {
    expect(defaultConfigPath({ AUTOVERSION_CONFIG: "/srv/av.json" }, "/home/test")).toBe(path.resolve("/srv/av.json"));
  });

  it("falls back to the home directory", () => {
    expect(defaultConfigPath({}, "/home/test")).toBe(path.join("/home/test", ".autoversion", "config.json"));
  });
});

describe("logLevelFrom", () => {
  it("uses a known level from the environment", () => {
    expect(logLevelFrom({ AUTOVERSION_LOG_LEVEL: " DEBUG " }, "info")).toBe("debug");
  });

  it("ignores unknown or missing levels", () => {
    expect(logLevelFrom({ AUTOVERSION_LOG_LEVEL: "loud" }, "warn")).toBe("warn");
    expect(logLevelFrom({}, "info")).toBe("info");
  });
});

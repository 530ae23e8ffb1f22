import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import micromatch from "micromatch";

import type { VersionConfig, WatchTarget } from "@autoversion/core-domain";
import {
  ConfigFileSchema,
  DEFAULT_CONFIG_FILE,
  formatIssues,
  type ParsedConfigFile,
} from "../application/config-schema";
import { ConfigurationError, errorCode } from "../application/errors";
import { isInside } from "../services/path-filter";

export type LoadConfigOptions = {
  homeDir?: string;
};

function stripOuterQuotes(input: string): string {
  return input.replace(/^"(.*)"$/, "$1");
}

export function expandHome(input: string, homeDir: string): string {
  const p = stripOuterQuotes(input.trim());
  if (p === "~") return homeDir;
  if (p.startsWith("~/") || p.startsWith("~\\")) return path.join(homeDir, p.slice(2));
  return p;
}

function checkPattern(pattern: string, folder: string, issues: string[]) {
  if (pattern.includes("/") || pattern.includes("\\")) {
    issues.push(`${folder}: pattern "${pattern}" must be a file name or glob, not a path`);
    return;
  }
  try {
    micromatch.makeRe(pattern, { dot: true, strictBrackets: true });
  } catch (err) {
    issues.push(`${folder}: pattern "${pattern}" is not a valid glob (${String(err)})`);
  }
}

async function checkFolder(folder: string, issues: string[]) {
  try {
    const stat = await fs.stat(folder);
    if (!stat.isDirectory()) issues.push(`${folder}: not a directory`);
  } catch (err) {
    issues.push(`${folder}: cannot access folder (${errorCode(err) ?? String(err)})`);
  }
}

/** Turns a schema-valid file into a VersionConfig, checking it against the filesystem. */
export async function resolveConfig(
  parsed: ParsedConfigFile,
  options: LoadConfigOptions = {}
): Promise<VersionConfig> {
  const homeDir = options.homeDir ?? os.homedir();
  const versionRoot = path.resolve(expandHome(parsed.versionRoot, homeDir));
  const issues: string[] = [];
  const targets: WatchTarget[] = [];

  for (const entry of parsed.folders) {
    const folder = path.resolve(expandHome(entry.path, homeDir));
    const patterns = [
      ...(entry.patterns ?? []),
      ...(entry.base_filenames ?? []).map((b) => b.name),
    ];

    await checkFolder(folder, issues);
    for (const pattern of patterns) checkPattern(pattern, folder, issues);

    if (folder === versionRoot || isInside(versionRoot, folder)) {
      issues.push(`${folder}: watched folder lies inside the version root ${versionRoot}`);
    }

    targets.push({
      folder,
      patterns: [...new Set(patterns)],
      recursive: entry.recursive,
      downloadCopies: entry.downloadCopies,
    });
  }

  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  return {
    targets,
    versionRoot,
    debounceMs: parsed.debounceMs,
    stabilityProbeMs: parsed.stabilityProbeMs,
    drainTimeoutMs: parsed.drainTimeoutMs,
    skipUnchanged: parsed.skipUnchanged,
    logLevel: parsed.logLevel,
  };
}

export async function loadConfig(configPath: string, options: LoadConfigOptions = {}): Promise<VersionConfig> {
  const file = path.resolve(configPath);

  let raw: string;
  try {
    raw = await fs.readFile(file, "utf-8");
  } catch (err) {
    const hint = errorCode(err) === "ENOENT" ? ` (run "init" to create one)` : "";
    throw new ConfigurationError(`Cannot read configuration ${file}${hint}`, [], err);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Configuration ${file} is not valid JSON`, [], err);
  }

  const result = ConfigFileSchema.safeParse(json);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`Invalid configuration ${file}: ${issues.join("; ")}`, issues);
  }

  return resolveConfig(result.data, options);
}

/** Writes the starter configuration unless a file already exists. Returns whether it wrote. */
export async function writeDefaultConfig(configPath: string): Promise<boolean> {
  const file = path.resolve(configPath);
  await fs.mkdir(path.dirname(file), { recursive: true });
  try {
    await fs.writeFile(file, JSON.stringify(DEFAULT_CONFIG_FILE, null, 2) + "\n", { encoding: "utf-8", flag: "wx" });
    return true;
  } catch (err) {
    if (errorCode(err) === "EEXIST") return false;
    throw err;
  }
}

import path from "node:path";
import micromatch from "micromatch";
import type { VersionConfig, WatchTarget } from "@autoversion/core-domain";

// partial downloads and editor scratch files
const TRANSIENT_SUFFIXES = [".crdownload", ".download", ".part", ".swp", ".tmp", "~"];

export function isInside(parentAbs: string, childAbs: string): boolean {
  const rel = path.relative(parentAbs, childAbs);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

export function matchesPattern(baseName: string, pattern: string): boolean {
  if (baseName === pattern) return true;
  return micromatch.isMatch(baseName, pattern, { dot: true });
}

function isTransientName(baseName: string): boolean {
  if (baseName.startsWith(".") || baseName.startsWith("~$")) return true;
  return TRANSIENT_SUFFIXES.some((suffix) => baseName.endsWith(suffix));
}

function coversFolder(target: WatchTarget, fileAbs: string): boolean {
  if (target.recursive) return isInside(target.folder, fileAbs);
  return path.dirname(fileAbs) === target.folder;
}

// parentheses stay literal: they are common in file names and in copy names
const GLOB_CHARS = /[*?[\]{}!]/;

function escapeRegExp(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const copyPatterns = new Map<string, RegExp>();

/** Matches the names browsers and file managers give to another copy of `baseName`. */
export function downloadCopyPattern(baseName: string): RegExp {
  const cached = copyPatterns.get(baseName);
  if (cached) return cached;

  const ext = path.extname(baseName);
  const stem = escapeRegExp(ext ? baseName.slice(0, -ext.length) : baseName);
  const e = escapeRegExp(ext);
  const pattern = new RegExp(
    `^(?:\\(\\d+\\)${escapeRegExp(baseName)}|${stem}(?:[ _-]copy\\d*| \\(\\d+\\)|[ _-]\\d+)${e})$`
  );
  copyPatterns.set(baseName, pattern);
  return pattern;
}

/** True when `candidate` is a download copy of the exact name `pattern`. Globs have no copies. */
export function isDownloadCopy(candidate: string, pattern: string): boolean {
  if (candidate === pattern || GLOB_CHARS.test(pattern)) return false;
  return downloadCopyPattern(pattern).test(candidate);
}

export type TrackedFile = {
  target: WatchTarget;
  /** Base name the versions are filed under. */
  versionName: string;
};

/**
 * Target tracking `filePath` and the name its versions go under, or null.
 * Direct name and glob matches win over download copies. Exact pattern names
 * also win over the transient-name exclusion, so a target can still track
 * `notes.tmp` by name.
 */
export function matchTrackedFile(filePath: string, config: VersionConfig): TrackedFile | null {
  const abs = path.resolve(filePath);
  if (abs === config.versionRoot || isInside(config.versionRoot, abs)) return null;

  const baseName = path.basename(abs);
  const transient = isTransientName(baseName);
  const candidates = config.targets.filter(
    (target) => coversFolder(target, abs) && (!transient || target.patterns.includes(baseName))
  );

  for (const target of candidates) {
    if (target.patterns.some((pattern) => matchesPattern(baseName, pattern))) {
      return { target, versionName: baseName };
    }
  }

  for (const target of candidates) {
    if (!target.downloadCopies) continue;
    const original = target.patterns.find((pattern) => isDownloadCopy(baseName, pattern));
    if (original) return { target, versionName: original };
  }
  return null;
}

export function findTarget(filePath: string, config: VersionConfig): WatchTarget | null {
  return matchTrackedFile(filePath, config)?.target ?? null;
}

export function matches(filePath: string, config: VersionConfig): boolean {
  return matchTrackedFile(filePath, config) !== null;
}

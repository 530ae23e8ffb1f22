import path from "node:path";
import type { WatchTarget } from "@autoversion/core-domain";
import { isInside } from "../services/path-filter";

/** Predicate handed to the watcher so it never descends into unrelated trees. */
export function createWatchIgnore(target: WatchTarget, versionRoot: string) {
  const root = path.resolve(target.folder);
  const versions = path.resolve(versionRoot);

  return (absPath: string) => {
    const p = path.resolve(absPath);

    if (p === root) return false;
    if (!isInside(root, p)) return true;

    // our own output
    if (p === versions || isInside(versions, p)) return true;

    const rel = path.relative(root, p).replaceAll("\\", "/");
    if (rel.startsWith(".git/") || rel === ".git") return true;
    if (rel.startsWith("node_modules/") || rel === "node_modules") return true;

    return false;
  };
}

import { Minimatch } from "minimatch";
import type { TreeEntry } from "../git/objects.js";
import type { FilterSpec } from "./filterConfig.js";

export type ExclusionRule = { kind: "path" | "glob"; pattern: string };

export type FilterResult = {
  kept: TreeEntry[];
  removed: Array<{ path: string; rule: ExclusionRule }>;
};

type CompiledGlob = {
  rule: ExclusionRule;
  matcher: Minimatch;
  directoriesOnly: boolean;
};

/**
 * `dir/` only matches directories, `/x` is anchored at the root, and a
 * pattern without any other slash matches a basename at any depth.
 */
function compileGlob(pattern: string): CompiledGlob {
  let body = pattern.trim();
  const directoriesOnly = body.endsWith("/");
  body = body.replace(/\/+$/, "");
  const anchored = body.startsWith("/");
  body = body.replace(/^\/+/, "");
  return {
    rule: { kind: "glob", pattern },
    matcher: new Minimatch(body, { dot: true, matchBase: !anchored && !body.includes("/") }),
    directoriesOnly,
  };
}

function ancestorsOf(entryPath: string): string[] {
  const parts = entryPath.split("/");
  const dirs: string[] = [];
  for (let i = 1; i < parts.length; i++) {
    dirs.push(parts.slice(0, i).join("/"));
  }
  return dirs;
}

export function matchesLiteral(entryPath: string, excluded: string) {
  return entryPath === excluded || entryPath.startsWith(`${excluded}/`);
}

/**
 * Removes every entry covered by `filter`. Literal exclusions drop the path
 * and everything beneath it; a glob that matches a directory drops that
 * whole subtree. Exclusions that match nothing are not an error.
 */
export function applyFilter(entries: readonly TreeEntry[], filter: FilterSpec): FilterResult {
  const globs = filter.excludeGlobs.map(compileGlob);
  const kept: TreeEntry[] = [];
  const removed: FilterResult["removed"] = [];

  for (const entry of entries) {
    const rule = findExclusion(entry.path, filter.excludePaths, globs);
    if (rule) removed.push({ path: entry.path, rule });
    else kept.push(entry);
  }
  return { kept, removed };
}

function findExclusion(
  entryPath: string,
  excludePaths: readonly string[],
  globs: readonly CompiledGlob[],
): ExclusionRule | null {
  for (const excluded of excludePaths) {
    if (matchesLiteral(entryPath, excluded)) return { kind: "path", pattern: excluded };
  }
  if (!globs.length) return null;

  const dirs = ancestorsOf(entryPath);
  for (const glob of globs) {
    if (!glob.directoriesOnly && glob.matcher.match(entryPath)) return glob.rule;
    if (dirs.some((dir) => glob.matcher.match(dir))) return glob.rule;
  }
  return null;
}

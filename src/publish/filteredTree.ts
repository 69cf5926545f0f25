import { listTree, writeTree } from "../git/objects.js";
import { logger } from "../logger.js";
import type { FilterSpec } from "./filterConfig.js";
import { applyFilter, type FilterResult } from "./treeFilter.js";

export type FilteredTree = {
  treeId: string;
  sourceRev: string;
  keptCount: number;
  removed: FilterResult["removed"];
};

/**
 * Builds the public tree for `rev`: its full tree minus everything the
 * filter excludes. Only the object store is read and written.
 */
export async function buildFilteredTree(
  repoRoot: string,
  rev: string,
  filter: FilterSpec,
): Promise<FilteredTree> {
  const entries = await listTree(repoRoot, rev);
  const { kept, removed } = applyFilter(entries, filter);
  const treeId = await writeTree(repoRoot, kept);

  logger.debug("filtered tree written", {
    repoRoot,
    rev,
    treeId,
    total: entries.length,
    kept: kept.length,
    removed: removed.length,
  });

  return { treeId, sourceRev: rev, keptCount: kept.length, removed };
}

/**
 * Empty Directory Pruning
 *
 * Overwrites can move a record to a new service/pillar directory, leaving
 * its old directory empty. Pruning walks the tree depth-first so a parent
 * emptied by removing its last child is removed as well. The root itself
 * is never removed.
 */

import { readdirSync, rmdirSync } from 'node:fs';
import { join } from 'node:path';

/**
 * Removes every empty directory below `dir`.
 *
 * @returns true if `dir` itself is empty once its children have been pruned
 */
function pruneChildren(dir: string, removed: string[]): boolean {
  let remaining = 0;

  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (!entry.isDirectory()) {
      remaining++;
      continue;
    }
    const child = join(dir, entry.name);
    if (pruneChildren(child, removed)) {
      rmdirSync(child);
      removed.push(child);
    } else {
      remaining++;
    }
  }

  return remaining === 0;
}

/**
 * Removes empty directories under `root`, bottom-up.
 *
 * @returns Removed directory paths, deepest first
 */
export function removeEmptyDirectories(root: string): string[] {
  const removed: string[] = [];
  pruneChildren(root, removed);
  return removed;
}

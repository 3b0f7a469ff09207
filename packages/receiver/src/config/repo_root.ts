import fs from "node:fs";
import path from "node:path";

/**
 * Walk upward from `startDir` until `requiredRelativePath` exists.
 *
 * Under npm workspaces the process may start in the repo root or in an app
 * directory; profile files live at the root.
 */
export function findRepoRoot(startDir: string, requiredRelativePath: string, maxHops = 8): string | null {
  let cur = path.resolve(startDir);
  for (let hop = 0; hop <= maxHops; hop++) {
    if (fs.existsSync(path.join(cur, requiredRelativePath))) return cur;
    const parent = path.dirname(cur);
    if (parent === cur) break;
    cur = parent;
  }
  return null;
}

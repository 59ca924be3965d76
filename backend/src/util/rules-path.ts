import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Finds the project's `rules` directory: the one beside package.json, found
 * by walking up from this module. The same code runs from backend/src/util
 * under tsx and from dist/backend/src/util once built.
 */
export function resolveRulesDir(currentDir?: string): string {
  const start = currentDir ?? path.dirname(fileURLToPath(import.meta.url));

  let dir = path.resolve(start);
  for (;;) {
    const rulesDir = path.join(dir, "rules");
    if (
      fs.existsSync(path.join(dir, "package.json")) &&
      fs.existsSync(rulesDir)
    ) {
      return rulesDir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  // Not found: point at the source layout so the read error names a path
  return path.resolve(start, "..", "..", "..", "rules");
}

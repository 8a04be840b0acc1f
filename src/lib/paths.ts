import * as fs from "fs";
import * as path from "path";

let cachedRoot: string | null = null;

/**
 * Directory holding package.json, found by walking up from this module.
 * Works the same from src/ (tests) and from dist/src/ (built CLI).
 */
export function projectRoot(): string {
  if (cachedRoot) return cachedRoot;
  let dir = __dirname;
  for (;;) {
    if (fs.existsSync(path.join(dir, "package.json"))) {
      cachedRoot = dir;
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new Error(`Cannot locate project root above ${__dirname}`);
    }
    dir = parent;
  }
}

export function dataPath(...segments: string[]): string {
  return path.join(projectRoot(), "data", ...segments);
}

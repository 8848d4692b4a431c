import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

const moduleDir = dirname(fileURLToPath(import.meta.url));

/**
 * Directory holding package.json. Compiled code lives one level deeper
 * (dist/) than this file's source (src/), so both candidates are checked.
 */
export function getProjectRoot(): string {
  const candidates = [resolve(moduleDir, ".."), resolve(moduleDir, "../..")];
  return candidates.find((candidate) => existsSync(resolve(candidate, "package.json"))) ?? candidates[0];
}

export function resolveFromRoot(...segments: string[]): string {
  return resolve(getProjectRoot(), ...segments);
}

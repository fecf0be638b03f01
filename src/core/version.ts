/**
 * Version information for the CLI, read from package.json at runtime.
 */

import { readFile } from "node:fs/promises";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

const moduleDir = dirname(fileURLToPath(import.meta.url));

let cachedVersion: string | null = null;

async function tryReadPackageJson(path: string): Promise<string | null> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch {
    return null;
  }
  const pkg: unknown = JSON.parse(content);
  if (typeof pkg === "object" && pkg !== null && "version" in pkg) {
    return typeof pkg.version === "string" ? pkg.version : null;
  }
  return null;
}

/**
 * Get the current version from package.json.
 * Result is cached for subsequent calls.
 *
 * Both src/core/ and dist/core/ sit two levels below package.json;
 * a flattened bundle sits one level below.
 */
export async function getVersion(): Promise<string> {
  if (cachedVersion) {
    return cachedVersion;
  }

  const possiblePaths = [
    join(moduleDir, "..", "package.json"),
    join(moduleDir, "..", "..", "package.json"),
  ];

  for (const path of possiblePaths) {
    const version = await tryReadPackageJson(path);
    if (version) {
      cachedVersion = version;
      return version;
    }
  }

  return "unknown";
}

/**
 * Discovery - Find environment directories under the repository root
 */

import fs from "fs/promises";
import path from "path";
import yaml from "js-yaml";
import type { DiscoveredEnvironment } from "../types.js";
import {
  ENVIRONMENT_FILE,
  IGNORED_DIRS,
  PLACEHOLDER_NAMES,
  getRootPath,
} from "../constants.js";
import { errorMessage } from "../errors.js";

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Read the declared name of a definition file, or null when it has none
 */
export function readDeclaredName(content: string): string | null {
  const data = yaml.load(content);
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return null;
  }
  const name = "name" in data ? data.name : undefined;
  return typeof name === "string" && name.trim() !== "" ? name.trim() : null;
}

export function isPlaceholderName(name: string): boolean {
  return PLACEHOLDER_NAMES.includes(name.toLowerCase());
}

/**
 * Scan the immediate subdirectories of root for definition files
 */
export async function scanEnvironments(
  root: string = getRootPath()
): Promise<DiscoveredEnvironment[]> {
  const entries = await fs.readdir(root, { withFileTypes: true });
  const environments: DiscoveredEnvironment[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory() || IGNORED_DIRS.includes(entry.name)) continue;

    const absolutePath = path.join(root, entry.name, ENVIRONMENT_FILE);
    if (!(await isFile(absolutePath))) continue;

    const definitionPath = path.relative(process.cwd(), absolutePath) || absolutePath;

    let name = entry.name;
    try {
      const content = await fs.readFile(absolutePath, "utf-8");
      name = readDeclaredName(content) ?? entry.name;
    } catch (error) {
      console.error(`⚠️  Could not parse ${definitionPath}: ${errorMessage(error)}`);
    }

    if (isPlaceholderName(name)) continue;

    environments.push({ name, directory: entry.name, definitionPath });
  }

  return environments.sort((a, b) => a.name.localeCompare(b.name));
}

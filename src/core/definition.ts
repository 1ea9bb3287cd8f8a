/**
 * Definition - Argument and definition file checks
 */

import fs from "fs/promises";
import path from "path";
import type { ResolvedDefinition } from "../types.js";
import { getDefinitionPath } from "../constants.js";
import { NotFoundError, UsageError } from "../errors.js";

/**
 * Fail with the usage line when the environment name is absent or empty
 */
export function requireEnvironmentName(
  name: string | undefined,
  usage: string
): string {
  if (name === undefined || name === "") {
    throw new UsageError(usage);
  }
  return name;
}

/**
 * Resolve the definition file of an environment. The display path is
 * relative to the working directory ("core/environment.yml" by default).
 */
export function resolveDefinition(name: string): ResolvedDefinition {
  const absolutePath = getDefinitionPath(name);
  const displayPath = path.relative(process.cwd(), absolutePath) || absolutePath;
  return { absolutePath, displayPath };
}

export async function definitionExists(name: string): Promise<boolean> {
  const { absolutePath } = resolveDefinition(name);
  try {
    const stats = await fs.stat(absolutePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Resolve the definition file, failing with NotFoundError when it is missing
 */
export async function requireDefinition(name: string): Promise<ResolvedDefinition> {
  const resolved = resolveDefinition(name);
  if (!(await definitionExists(name))) {
    throw new NotFoundError(resolved.displayPath);
  }
  return resolved;
}

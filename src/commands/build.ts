/**
 * Build Command - Create or update an environment from its definition file
 */

import type { BuildOptions, BuildResult } from "../types.js";
import { requireDefinition, requireEnvironmentName } from "../core/definition.js";
import { createCondaManager, describeCommand, updateArgs } from "../core/runner.js";
import { ExternalToolError, reportFailure } from "../errors.js";

export const BUILD_USAGE = "Usage: envkit build <env-name>";

/**
 * Update (or create) the named environment, pruning packages that the
 * definition file no longer lists
 */
export async function buildEnvironment(
  name: string | undefined,
  options: BuildOptions = {}
): Promise<BuildResult> {
  const envName = requireEnvironmentName(name, BUILD_USAGE);
  const { displayPath } = await requireDefinition(envName);
  const manager = options.manager ?? createCondaManager();

  console.log(`🚀 Building environment: ${envName}`);
  const status = await manager.updateFromFile(envName, displayPath);
  if (status !== 0) {
    throw new ExternalToolError(
      describeCommand(manager.executable, updateArgs(envName, displayPath)),
      status
    );
  }

  console.log("✅ Done.");
  return { name: envName, definitionPath: displayPath };
}

/**
 * CLI handler for build command
 */
export async function handleBuild(args: {
  name?: string;
  manager?: BuildOptions["manager"];
}): Promise<number> {
  try {
    await buildEnvironment(args.name, { manager: args.manager });
    return 0;
  } catch (error) {
    return reportFailure(error);
  }
}

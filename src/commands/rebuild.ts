/**
 * Rebuild Command - Delete an environment and recreate it from scratch
 *
 * Start → AwaitConfirmation → Aborted
 *                           → Deleting → RecreatingCheck → NotFound
 *                                                       → Creating → Done
 *
 * The definition file is checked only after the delete, so a missing file
 * leaves the environment deleted with no replacement.
 */

import type { RebuildOptions, RebuildResult } from "../types.js";
import { requireDefinition, requireEnvironmentName } from "../core/definition.js";
import {
  createArgs,
  createCondaManager,
  describeCommand,
  removeArgs,
} from "../core/runner.js";
import { askLine, confirm } from "../core/prompt.js";
import { ExternalToolError, reportFailure } from "../errors.js";

export const REBUILD_USAGE = "Usage: envkit rebuild <env-name>";

export function confirmationQuestion(name: string): string {
  return `⚠️  Delete and rebuild environment '${name}'? [y/N] `;
}

export async function rebuildEnvironment(
  name: string | undefined,
  options: RebuildOptions = {}
): Promise<RebuildResult> {
  const envName = requireEnvironmentName(name, REBUILD_USAGE);
  const manager = options.manager ?? createCondaManager();

  const confirmed =
    options.yes === true ||
    (await confirm(confirmationQuestion(envName), options.prompt ?? askLine));
  if (!confirmed) {
    console.log("Aborted.");
    return { outcome: "aborted", name: envName };
  }

  console.log(`🧨 Removing environment: ${envName}`);
  const removeStatus = await manager.removeEnvironment(envName);
  if (removeStatus !== 0) {
    throw new ExternalToolError(
      describeCommand(manager.executable, removeArgs(envName)),
      removeStatus
    );
  }

  const { displayPath } = await requireDefinition(envName);

  console.log(`🚀 Recreating environment: ${envName}`);
  const createStatus = await manager.createFromFile(displayPath);
  if (createStatus !== 0) {
    throw new ExternalToolError(
      describeCommand(manager.executable, createArgs(displayPath)),
      createStatus
    );
  }

  console.log("✅ Done.");
  return { outcome: "rebuilt", name: envName, definitionPath: displayPath };
}

/**
 * CLI handler for rebuild command. A declined prompt exits 0.
 */
export async function handleRebuild(args: {
  name?: string;
  yes?: boolean;
  manager?: RebuildOptions["manager"];
  prompt?: RebuildOptions["prompt"];
}): Promise<number> {
  try {
    await rebuildEnvironment(args.name, {
      yes: args.yes,
      manager: args.manager,
      prompt: args.prompt,
    });
    return 0;
  } catch (error) {
    return reportFailure(error);
  }
}

/**
 * envkit
 *
 * Build, update and recreate declarative package environments
 * through an external package manager
 */

// Types
export type {
  PackageManager,
  ToolRunner,
  ResolvedDefinition,
  DiscoveredEnvironment,
  BuildOptions,
  BuildResult,
  Prompt,
  RebuildOptions,
  RebuildOutcome,
  RebuildResult,
} from "./types.js";

// Errors
export {
  EnvkitError,
  UsageError,
  NotFoundError,
  ExternalToolError,
  InterruptedError,
  exitCodeFor,
} from "./errors.js";

// Core
export { createCondaManager, runTool } from "./core/runner.js";
export { requireDefinition, resolveDefinition, definitionExists } from "./core/definition.js";
export { scanEnvironments } from "./core/discovery.js";
export { confirm, isAffirmative } from "./core/prompt.js";

// Commands
export { buildEnvironment, handleBuild } from "./commands/build.js";
export { rebuildEnvironment, handleRebuild } from "./commands/rebuild.js";
export { formatEnvironments, handleList } from "./commands/list.js";

// CLI
export { run } from "./main.js";

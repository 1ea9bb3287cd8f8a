/**
 * Types - Shared type definitions for envkit
 */

// ============================================================================
// Package Manager Types
// ============================================================================

/**
 * Runs an executable and resolves with its exit status
 */
export type ToolRunner = (command: string, args: string[]) => Promise<number>;

/**
 * The three operations envkit needs from the external package manager.
 * Every operation resolves with the tool's exit status.
 */
export interface PackageManager {
  readonly executable: string;
  /** Create or update an environment, pruning packages no longer listed */
  updateFromFile(name: string, definitionPath: string): Promise<number>;
  /** Delete an environment and everything installed in it */
  removeEnvironment(name: string): Promise<number>;
  /** Create a new environment; the name comes from the file */
  createFromFile(definitionPath: string): Promise<number>;
}

// ============================================================================
// Definition Types
// ============================================================================

export interface ResolvedDefinition {
  absolutePath: string;
  /** Path relative to the working directory, passed to the package manager */
  displayPath: string;
}

export interface DiscoveredEnvironment {
  name: string;
  directory: string;
  definitionPath: string;
}

// ============================================================================
// Command Types
// ============================================================================

export interface BuildOptions {
  manager?: PackageManager;
}

export interface BuildResult {
  name: string;
  definitionPath: string;
}

/**
 * Asks a yes/no question and resolves with the raw answer line
 */
export type Prompt = (question: string) => Promise<string>;

export interface RebuildOptions {
  manager?: PackageManager;
  prompt?: Prompt;
  /** Skip the confirmation prompt */
  yes?: boolean;
}

export type RebuildOutcome = "aborted" | "rebuilt";

export interface RebuildResult {
  outcome: RebuildOutcome;
  name: string;
  definitionPath?: string;
}

/**
 * Constants - Paths and default values
 */

import path from "path";

// Definition file expected inside every environment directory
export const ENVIRONMENT_FILE = "environment.yml";

// Only this exact answer confirms a rebuild
export const AFFIRMATIVE_ANSWER = "y";

// Directories never treated as environments
export const IGNORED_DIRS = ["template", ".git", ".github", "node_modules"];

// Scaffolding names skipped when listing
export const PLACEHOLDER_NAMES = ["envname", "template"];

// Package manager
export const DEFAULT_CONDA_EXECUTABLE = "conda";

// Environment variables
export const ENVKIT_ROOT_ENV = "ENVKIT_ROOT";
export const ENVKIT_CONDA_ENV = "ENVKIT_CONDA";
export const ENVKIT_DEBUG_ENV = "ENVKIT_DEBUG";

/**
 * Custom root path (set via --root flag or ENVKIT_ROOT env)
 */
let customRootPath: string | null = null;

/**
 * Custom package manager executable (set via --conda flag or ENVKIT_CONDA env)
 */
let customCondaExecutable: string | null = null;

/**
 * Set custom root path for the current process
 */
export function setRootPath(rootPath: string): void {
  customRootPath = path.resolve(rootPath);
}

/**
 * Clear custom root path (for testing)
 */
export function clearRootPath(): void {
  customRootPath = null;
}

/**
 * Get the repository root holding the environment directories
 * Priority: 1. Custom root (--root), 2. ENVKIT_ROOT env, 3. Current directory
 */
export function getRootPath(): string {
  if (customRootPath) {
    return customRootPath;
  }

  const fromEnv = process.env[ENVKIT_ROOT_ENV];
  if (fromEnv) {
    return path.resolve(fromEnv);
  }

  return process.cwd();
}

export function setCondaExecutable(executable: string): void {
  customCondaExecutable = executable;
}

export function clearCondaExecutable(): void {
  customCondaExecutable = null;
}

/**
 * Get the package manager executable
 * Priority: 1. --conda flag, 2. ENVKIT_CONDA env, 3. "conda"
 */
export function getCondaExecutable(): string {
  if (customCondaExecutable) {
    return customCondaExecutable;
  }
  return process.env[ENVKIT_CONDA_ENV] || DEFAULT_CONDA_EXECUTABLE;
}

/**
 * Get the directory of a named environment
 */
export function getEnvironmentDir(name: string): string {
  return path.join(getRootPath(), name);
}

/**
 * Get the definition file path of a named environment
 */
export function getDefinitionPath(name: string): string {
  return path.join(getEnvironmentDir(name), ENVIRONMENT_FILE);
}

/**
 * Runner - Invokes the external package manager
 *
 * Every call blocks until the child exits and resolves with its exit
 * status. Nothing is retried and no timeout is imposed.
 */

import { spawn } from "child_process";
import { constants } from "os";
import type { PackageManager, ToolRunner } from "../types.js";
import { getCondaExecutable } from "../constants.js";
import { logDebug } from "../logger.js";
import { errorMessage, ExternalToolError } from "../errors.js";

// Status a POSIX shell reports when the executable cannot be started
export const SPAWN_FAILURE_STATUS = 127;

export function describeCommand(command: string, args: string[]): string {
  return [command, ...args].join(" ");
}

/**
 * Translate a terminating signal into the status a shell would report
 */
export function signalStatus(signal: NodeJS.Signals): number {
  const signo = new Map<string, number>(Object.entries(constants.signals)).get(signal);
  return signo === undefined ? 1 : 128 + signo;
}

/**
 * Run an executable with inherited stdio and resolve with its exit status.
 * Rejects with ExternalToolError (status 127) when it cannot be started.
 */
export const runTool: ToolRunner = (command, args) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: "inherit",
    });

    child.on("close", (code, signal) => {
      if (code !== null) {
        resolve(code);
      } else if (signal) {
        resolve(signalStatus(signal));
      } else {
        resolve(1);
      }
    });

    child.on("error", (error) => {
      reject(
        new ExternalToolError(
          describeCommand(command, args),
          SPAWN_FAILURE_STATUS,
          `Failed to run ${command}: ${errorMessage(error)}`
        )
      );
    });
  });
};

export const updateArgs = (name: string, definitionPath: string): string[] =>
  ["env", "update", "-n", name, "-f", definitionPath, "--prune"];

export const removeArgs = (name: string): string[] =>
  ["remove", "-n", name, "--all", "-y"];

export const createArgs = (definitionPath: string): string[] =>
  ["env", "create", "-f", definitionPath];

/**
 * Create a PackageManager backed by the conda command line
 */
export function createCondaManager(
  executable: string = getCondaExecutable(),
  run: ToolRunner = runTool
): PackageManager {
  const invoke = (args: string[]): Promise<number> => {
    logDebug(`Executing "${describeCommand(executable, args)}"`);
    return run(executable, args);
  };

  return {
    executable,
    updateFromFile: (name, definitionPath) => invoke(updateArgs(name, definitionPath)),
    removeEnvironment: (name) => invoke(removeArgs(name)),
    createFromFile: (definitionPath) => invoke(createArgs(definitionPath)),
  };
}

/**
 * List Command - Show the environments defined under the repository root
 */

import type { DiscoveredEnvironment } from "../types.js";
import { scanEnvironments } from "../core/discovery.js";
import { reportFailure } from "../errors.js";

export const EMPTY_MESSAGE = "No environments found";

/**
 * Format environments flat: name (padded)  definition path  [(dir: x)]
 */
export function formatEnvironments(environments: DiscoveredEnvironment[]): string {
  if (environments.length === 0) {
    return EMPTY_MESSAGE;
  }

  const width = Math.max(...environments.map((env) => env.name.length));
  return environments
    .map((env) => {
      let line = `${env.name.padEnd(width)}  ${env.definitionPath}`;
      if (env.name !== env.directory) {
        line += `  (dir: ${env.directory})`;
      }
      return line;
    })
    .join("\n");
}

/**
 * CLI handler for list command
 */
export async function handleList(args: { root?: string } = {}): Promise<number> {
  try {
    const environments = await scanEnvironments(args.root);
    if (environments.length === 0) {
      console.error(`❌ ${EMPTY_MESSAGE}`);
      return 1;
    }
    console.log(formatEnvironments(environments));
    return 0;
  } catch (error) {
    return reportFailure(error);
  }
}

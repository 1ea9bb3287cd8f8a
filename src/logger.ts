/**
 * Logger - Debug output toggled by ENVKIT_DEBUG
 */

import { ENVKIT_DEBUG_ENV } from "./constants.js";

export function isDebugEnabled(): boolean {
  return Boolean(process.env[ENVKIT_DEBUG_ENV]);
}

/**
 * Print a debug line to stderr when ENVKIT_DEBUG is set
 */
export function logDebug(message: string): void {
  if (isDebugEnabled()) {
    console.error(`[debug] ${message}`);
  }
}

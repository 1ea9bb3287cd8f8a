/**
 * Commands - Re-exports
 */

export * from "./build.js";
export * from "./rebuild.js";
export * from "./list.js";

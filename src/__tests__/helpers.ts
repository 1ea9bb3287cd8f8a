/**
 * Test helpers - In-process package manager fake and temp workspaces
 */

import { vi } from "vitest";
import fs from "fs/promises";
import path from "path";
import os from "os";
import type { PackageManager } from "../types.js";

export type ManagerStatuses = Partial<Record<"update" | "remove" | "create", number>>;

/**
 * Fake PackageManager that records every call in order
 */
export function createFakeManager(statuses: ManagerStatuses = {}) {
  const calls: string[] = [];
  const manager: PackageManager = {
    executable: "conda",
    updateFromFile: vi.fn(async (name: string, definitionPath: string) => {
      calls.push(`update ${name} ${definitionPath}`);
      return statuses.update ?? 0;
    }),
    removeEnvironment: vi.fn(async (name: string) => {
      calls.push(`remove ${name}`);
      return statuses.remove ?? 0;
    }),
    createFromFile: vi.fn(async (definitionPath: string) => {
      calls.push(`create ${definitionPath}`);
      return statuses.create ?? 0;
    }),
  };
  return { manager, calls };
}

export async function makeTempDir(prefix: string): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), `envkit-${prefix}-`));
  return fs.realpath(dir);
}

/**
 * Write <root>/<name>/environment.yml
 */
export async function writeDefinition(
  root: string,
  name: string,
  content: string = `name: ${name}\nchannels:\n  - conda-forge\ndependencies:\n  - python=3.11\n`
): Promise<void> {
  await fs.mkdir(path.join(root, name), { recursive: true });
  await fs.writeFile(path.join(root, name, "environment.yml"), content);
}

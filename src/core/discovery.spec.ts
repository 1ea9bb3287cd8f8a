/**
 * Discovery - Unit tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs/promises";
import path from "path";
import { scanEnvironments, readDeclaredName, isPlaceholderName } from "./discovery.js";
import { makeTempDir, writeDefinition } from "../__tests__/helpers.js";

describe("Discovery", () => {
  describe("readDeclaredName", () => {
    it("should read the name key", () => {
      expect(readDeclaredName("name: core\nchannels:\n  - conda-forge\n")).toBe("core");
    });

    it("should return null when there is no usable name", () => {
      expect(readDeclaredName("")).toBeNull();
      expect(readDeclaredName("- numpy\n- pandas\n")).toBeNull();
      expect(readDeclaredName("name: 42\n")).toBeNull();
      expect(readDeclaredName("channels:\n  - defaults\n")).toBeNull();
    });
  });

  describe("isPlaceholderName", () => {
    it("should match placeholder names case-insensitively", () => {
      expect(isPlaceholderName("ENVNAME")).toBe(true);
      expect(isPlaceholderName("Template")).toBe(true);
      expect(isPlaceholderName("core")).toBe(false);
    });
  });

  describe("scanEnvironments", () => {
    let tmpDir: string;
    let originalCwd: string;

    beforeEach(async () => {
      tmpDir = await makeTempDir("discovery");
      originalCwd = process.cwd();
      process.chdir(tmpDir);
      vi.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(async () => {
      process.chdir(originalCwd);
      await fs.rm(tmpDir, { recursive: true, force: true });
      vi.restoreAllMocks();
    });

    it("should find environment directories sorted by name", async () => {
      await writeDefinition(tmpDir, "web");
      await writeDefinition(tmpDir, "core");

      const envs = await scanEnvironments(tmpDir);

      expect(envs).toEqual([
        { name: "core", directory: "core", definitionPath: "core/environment.yml" },
        { name: "web", directory: "web", definitionPath: "web/environment.yml" },
      ]);
    });

    it("should prefer the declared name over the directory name", async () => {
      await writeDefinition(tmpDir, "ml", "name: machine-learning\ndependencies:\n  - numpy\n");

      const envs = await scanEnvironments(tmpDir);

      expect(envs).toEqual([
        { name: "machine-learning", directory: "ml", definitionPath: "ml/environment.yml" },
      ]);
    });

    it("should skip ignored directories, placeholders and folders without a file", async () => {
      await writeDefinition(tmpDir, "core");
      await writeDefinition(tmpDir, "template");
      await writeDefinition(tmpDir, ".github");
      await writeDefinition(tmpDir, "scaffold", "name: envname\n");
      await fs.mkdir(path.join(tmpDir, "docs"));
      await fs.writeFile(path.join(tmpDir, "environment.yml"), "name: root\n");

      const envs = await scanEnvironments(tmpDir);

      expect(envs.map((env) => env.name)).toEqual(["core"]);
    });

    it("should fall back to the directory name when the file cannot be parsed", async () => {
      await writeDefinition(tmpDir, "broken", "name: [unclosed\n");

      const envs = await scanEnvironments(tmpDir);

      expect(envs.map((env) => env.name)).toEqual(["broken"]);
      expect(console.error).toHaveBeenCalledWith(
        expect.stringContaining("⚠️  Could not parse broken/environment.yml: ")
      );
    });

    it("should default to the working directory as root", async () => {
      await writeDefinition(tmpDir, "core");

      const envs = await scanEnvironments();

      expect(envs.map((env) => env.directory)).toEqual(["core"]);
    });
  });
});

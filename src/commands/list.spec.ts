/**
 * List Command - Unit tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs/promises";
import { formatEnvironments, handleList, EMPTY_MESSAGE } from "./list.js";
import { makeTempDir, writeDefinition } from "../__tests__/helpers.js";

describe("List Command", () => {
  describe("formatEnvironments", () => {
    it("should align paths and flag renamed directories", () => {
      const output = formatEnvironments([
        { name: "core", directory: "core", definitionPath: "core/environment.yml" },
        { name: "machine-learning", directory: "ml", definitionPath: "ml/environment.yml" },
      ]);

      expect(output).toBe(
        "core" + " ".repeat(14) + "core/environment.yml\n" +
          "machine-learning  ml/environment.yml  (dir: ml)"
      );
    });

    it("should report an empty list", () => {
      expect(formatEnvironments([])).toBe(EMPTY_MESSAGE);
    });
  });

  describe("handleList", () => {
    let tmpDir: string;
    let originalCwd: string;

    beforeEach(async () => {
      tmpDir = await makeTempDir("list");
      originalCwd = process.cwd();
      process.chdir(tmpDir);
      vi.spyOn(console, "log").mockImplementation(() => {});
      vi.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(async () => {
      process.chdir(originalCwd);
      await fs.rm(tmpDir, { recursive: true, force: true });
      vi.restoreAllMocks();
    });

    it("should print the environments and exit 0", async () => {
      await writeDefinition(tmpDir, "core");

      const code = await handleList({ root: tmpDir });

      expect(code).toBe(0);
      expect(console.log).toHaveBeenCalledWith("core  core/environment.yml");
    });

    it("should exit 1 when no environment is found", async () => {
      const code = await handleList({ root: tmpDir });

      expect(code).toBe(1);
      expect(console.error).toHaveBeenCalledWith("❌ No environments found");
    });

    it("should report an unreadable root", async () => {
      const code = await handleList({ root: `${tmpDir}/missing` });

      expect(code).toBe(1);
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining("❌ ENOENT"));
    });
  });
});

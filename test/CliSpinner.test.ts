/**
 * Tests for CLI Spinner module.
 *
 * Tests the TTY spinner through a mocked @clack/prompts and the plain
 * fallback through CliUx.
 *
 * @module
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const clackSpinner = vi.hoisted(() => ({
  start: vi.fn(),
  stop: vi.fn(),
  message: vi.fn(),
}));

vi.mock("@clack/prompts", () => ({
  spinner: () => clackSpinner,
}));

import { createCliSpinner } from "../src/cli/ux/CliSpinner.js";
import { createCliUx, type UxLevel } from "../src/cli/ux/CliUx.js";

function captureUx(level: UxLevel = "info") {
  const stdout: string[] = [];
  const ux = createCliUx({ level, colors: false, stdout: (msg) => stdout.push(msg), stderr: () => undefined });
  return { ux, stdout };
}

describe("CliSpinner", () => {
  beforeEach(() => {
    clackSpinner.start.mockClear();
    clackSpinner.stop.mockClear();
  });

  describe("non-TTY fallback mode", () => {
    it("prints start and success messages once", async () => {
      const { ux, stdout } = captureUx();
      const spinner = createCliSpinner({ ux, isTTY: false });

      const result = await spinner.wrap("Deploying stages", async () => 7, "Deployment complete");

      expect(result).toBe(7);
      expect(stdout).toEqual(["→ Deploying stages\n", "✓ Deployment complete\n"]);
      expect(clackSpinner.start).not.toHaveBeenCalled();
    });

    it("rethrows failures without a success line", async () => {
      const { ux, stdout } = captureUx();
      const spinner = createCliSpinner({ ux, isTTY: false });
      const failure = new Error("apply failed");

      await expect(spinner.wrap("Deploying stages", () => Promise.reject(failure))).rejects.toBe(failure);

      expect(stdout).toEqual(["→ Deploying stages\n"]);
    });
  });

  describe("TTY mode", () => {
    it("animates and stops with the success message", async () => {
      const { ux } = captureUx();
      const spinner = createCliSpinner({ ux, isTTY: true });

      await spinner.wrap("Deploying stages", async () => undefined, "Deployment complete");

      expect(clackSpinner.start).toHaveBeenCalledWith("Deploying stages");
      expect(clackSpinner.stop).toHaveBeenCalledWith("Deployment complete");
    });

    it("stops with an error code on failure", async () => {
      const { ux } = captureUx();
      const spinner = createCliSpinner({ ux, isTTY: true });

      await expect(spinner.wrap("Deploying stages", () => Promise.reject(new Error("x")))).rejects.toThrow("x");

      expect(clackSpinner.stop).toHaveBeenCalledWith("Deploying stages", 1);
    });

    it("does not animate when silent", () => {
      const { ux, stdout } = captureUx("silent");
      const spinner = createCliSpinner({ ux, isTTY: true });

      spinner.start("Deploying stages");
      spinner.succeed();

      expect(clackSpinner.start).not.toHaveBeenCalled();
      expect(stdout).toEqual([]);
    });
  });
});

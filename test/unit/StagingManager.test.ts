/**
 * Unit tests for StagingManager.
 *
 * @module
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";

import { StagingManager } from "../../src/core/staging/StagingManager.js";
import { createTempDir, pathExists, removeTempDir } from "../helpers/stubs.js";

describe("StagingManager", () => {
  let rootDir: string;
  let staging: StagingManager;

  beforeEach(async () => {
    rootDir = await createTempDir("clusterforge-staging-");
    staging = new StagingManager(rootDir);
  });

  afterEach(async () => {
    await removeTempDir(rootDir);
  });

  it("places staging directories under the project metadata directory", () => {
    expect(staging.getStagingBase()).toBe(path.join(rootDir, ".clusterforge", ".staging"));
  });

  it("creates unique directories named after the label", async () => {
    const first = await staging.createStagingDir("02-infrastructure");
    const second = await staging.createStagingDir("02-infrastructure");

    expect(first).not.toBe(second);
    expect(path.basename(first).startsWith("02-infrastructure-")).toBe(true);
    expect(await pathExists(first)).toBe(true);
  });

  it("cleanup tolerates a directory that is already gone", async () => {
    await expect(staging.cleanup(path.join(rootDir, "missing"))).resolves.toBeUndefined();
  });

  it("withStagingDir returns the body's result and removes the directory", async () => {
    let seen = "";
    const result = await staging.withStagingDir("stage", async (dir) => {
      seen = dir;
      await fs.writeFile(path.join(dir, "main.tf"), "", "utf-8");
      return "done";
    });

    expect(result).toBe("done");
    expect(await pathExists(seen)).toBe(false);
  });

  it("withStagingDir removes the directory when the body throws", async () => {
    let seen = "";
    const failure = new Error("apply failed");

    await expect(
      staging.withStagingDir("stage", async (dir) => {
        seen = dir;
        throw failure;
      }),
    ).rejects.toBe(failure);

    expect(seen).not.toBe("");
    expect(await pathExists(seen)).toBe(false);
  });
});

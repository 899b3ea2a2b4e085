/**
 * Staging Manager - scratch directories for stage planning.
 *
 * A stage's plan context writes its rendered files into a fresh directory
 * under `<rootDir>/.clusterforge/.staging/`, runs the provisioning tool there
 * and removes the directory when the context is released, whether the body
 * returned or threw.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { randomBytes } from "node:crypto";
import { METADATA_DIR } from "../outputs/OutputStore.js";
import { createSilentLogger, type ContextualLogger } from "../logging/ContextualLogger.js";

// =============================================================================
// Constants
// =============================================================================

const STAGING_DIRNAME = ".staging";

// =============================================================================
// StagingManager Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const staging = new StagingManager(rootDir);
 * await staging.withStagingDir("02-infrastructure", async (dir) => {
 *   await writeFiles(dir, files);
 *   await adapter.init({ stage, workdir: dir, env });
 * });
 * ```
 */
export class StagingManager {
  private readonly stagingBase: string;
  private readonly logger: ContextualLogger;

  /**
   * @param rootDir - Project root; staging dirs live under its metadata directory
   */
  constructor(rootDir: string, logger?: ContextualLogger) {
    this.stagingBase = path.join(path.resolve(rootDir), METADATA_DIR, STAGING_DIRNAME);
    this.logger = logger ?? createSilentLogger();
  }

  /**
   * Creates a new unique staging directory named after the stage.
   *
   * @returns Absolute path to the created directory
   */
  async createStagingDir(label: string): Promise<string> {
    await fs.mkdir(this.stagingBase, { recursive: true });

    const stagingName = `${label}-${Date.now()}-${randomBytes(4).toString("hex")}`;
    const stagingDir = path.join(this.stagingBase, stagingName);
    await fs.mkdir(stagingDir, { recursive: true });

    this.logger.debug("Created staging directory", { stagingDir });
    return stagingDir;
  }

  /**
   * Removes a staging directory. A directory that is already gone is fine.
   */
  async cleanup(stagingDir: string): Promise<void> {
    await fs.rm(stagingDir, { recursive: true, force: true });
    this.logger.debug("Cleaned up staging directory", { stagingDir });
  }

  /**
   * Runs `body` with a fresh staging directory and removes it afterwards.
   * A cleanup failure never replaces an error thrown by `body`.
   */
  async withStagingDir<T>(label: string, body: (stagingDir: string) => Promise<T>): Promise<T> {
    const stagingDir = await this.createStagingDir(label);
    let result: T;
    try {
      result = await body(stagingDir);
    } catch (error) {
      await this.cleanup(stagingDir).catch((cleanupError: unknown) => {
        this.logger.warn("Failed to clean up staging directory", {
          stagingDir,
          error: cleanupError instanceof Error ? cleanupError : new Error(String(cleanupError)),
        });
      });
      throw error;
    }
    await this.cleanup(stagingDir);
    return result;
  }

  getStagingBase(): string {
    return this.stagingBase;
  }
}

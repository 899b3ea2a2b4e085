/**
 * Output Store - persisted stage outputs.
 *
 * After each stage completes, its output record is written to
 * `<rootDir>/.clusterforge/outputs/<stage>.json` so a later run can see how
 * far an earlier one got. Fields a stage declares sensitive (cluster
 * credentials) are left out of the file; a resumed run re-reads them from
 * the provisioning tool instead.
 *
 * ## Atomic Writes
 *
 * Every write goes to a temp file in the same directory and is renamed over
 * the final path.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as crypto from "node:crypto";
import { z } from "zod";
import { ForgeError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { ProviderVariantSchema } from "../config/ConfigSchema.js";
import type { OutputRecord } from "./StageOutputs.js";

// =============================================================================
// Constants
// =============================================================================

const CURRENT_SCHEMA_VERSION = 1;

/** Directory for clusterforge metadata inside the project root. */
export const METADATA_DIR = ".clusterforge";

const OUTPUTS_DIR = "outputs";

// =============================================================================
// Schemas
// =============================================================================

export const PersistedStageOutputsSchema = z.object({
  schemaVersion: z.number().int().positive(),
  stage: z.string().min(1),
  provider: ProviderVariantSchema,
  updatedAt: z.string(),
  /** Fields left out of `outputs` because they are sensitive. */
  omitted: z.array(z.string()).default([]),
  outputs: z.record(z.string(), z.unknown()),
});

export type PersistedStageOutputs = z.infer<typeof PersistedStageOutputsSchema>;

// =============================================================================
// OutputStore
// =============================================================================

export interface WriteOutputsParams {
  readonly stage: string;
  readonly provider: z.infer<typeof ProviderVariantSchema>;
  readonly outputs: OutputRecord;
  readonly sensitive?: readonly string[];
}

export class OutputStore {
  private readonly outputsDir: string;

  constructor(rootDir: string) {
    this.outputsDir = path.join(path.resolve(rootDir), METADATA_DIR, OUTPUTS_DIR);
  }

  getPath(stage: string): string {
    return path.join(this.outputsDir, `${stage}.json`);
  }

  /**
   * Reads one stage's persisted outputs, or null when none exist.
   *
   * @throws ForgeError if the file exists but is unreadable or invalid
   */
  async read(stage: string): Promise<PersistedStageOutputs | null> {
    const filePath = this.getPath(stage);

    let content: string;
    try {
      content = await fs.readFile(filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new ForgeError(
        `Failed to read outputs of stage '${stage}'`,
        ErrorCode.OUTPUTS_READ_FAILED,
        { path: filePath },
        `Could not read ${filePath}. Check file permissions.`,
        err instanceof Error ? err : undefined,
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new ForgeError(
        `Invalid JSON in outputs of stage '${stage}'`,
        ErrorCode.OUTPUTS_INVALID,
        { path: filePath },
        `Delete ${filePath} to forget this stage's progress.`,
        err instanceof Error ? err : undefined,
      );
    }

    const result = PersistedStageOutputsSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new ForgeError(
        `Invalid outputs file for stage '${stage}'`,
        ErrorCode.OUTPUTS_INVALID,
        { path: filePath, issues },
        `Delete ${filePath} to forget this stage's progress.`,
      );
    }

    return result.data;
  }

  /**
   * Persists a stage's outputs, leaving out its sensitive fields.
   */
  async write(params: WriteOutputsParams): Promise<PersistedStageOutputs> {
    const sensitive = new Set(params.sensitive ?? []);
    const outputs: Record<string, unknown> = {};
    const omitted: string[] = [];

    for (const [key, value] of Object.entries(params.outputs)) {
      if (sensitive.has(key)) {
        omitted.push(key);
      } else {
        outputs[key] = value;
      }
    }

    const record: PersistedStageOutputs = {
      schemaVersion: CURRENT_SCHEMA_VERSION,
      stage: params.stage,
      provider: params.provider,
      updatedAt: new Date().toISOString(),
      omitted,
      outputs,
    };

    await fs.mkdir(this.outputsDir, { recursive: true });

    const filePath = this.getPath(params.stage);
    const tempPath = path.join(
      this.outputsDir,
      `${params.stage}.json.tmp-${process.pid}-${crypto.randomBytes(6).toString("hex")}`,
    );

    try {
      await fs.writeFile(tempPath, JSON.stringify(record, null, 2) + "\n", "utf-8");
      await fs.rename(tempPath, filePath);
    } catch (err) {
      await fs.rm(tempPath, { force: true });
      throw err;
    }

    return record;
  }

  /**
   * Forgets a stage's progress. Missing files are ignored.
   */
  async remove(stage: string): Promise<void> {
    await fs.rm(this.getPath(stage), { force: true });
  }

  /**
   * Stages with persisted outputs, in no particular order.
   */
  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.outputsDir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    return entries.filter((name) => name.endsWith(".json")).map((name) => name.slice(0, -".json".length));
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Terraform Provisioning Adapter.
 *
 * Runs the `terraform` binary through execa in a stage's working directory.
 * Input variables are written to `clusterforge.auto.tfvars.json`, which
 * Terraform loads automatically, so no command line carries a secret.
 *
 * The child process receives exactly the environment in the invocation
 * (`extendEnv: false`) plus the automation switches below.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { execa } from "execa";
import { z } from "zod";
import { ForgeError, ProvisioningError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { createSilentLogger, type ContextualLogger } from "../logging/ContextualLogger.js";
import type {
  AdapterInvocation,
  AdapterVarsInvocation,
  OutputVariables,
  ProvisioningAdapter,
  StateImportRecord,
} from "./ProvisioningAdapter.js";

// =============================================================================
// Constants
// =============================================================================

/** Variables file written next to the rendered stage files. */
export const TFVARS_FILENAME = "clusterforge.auto.tfvars.json";

/** Lines of stderr kept in error details. */
const STDERR_TAIL_LINES = 20;

const OutputJsonSchema = z.record(
  z.string(),
  z.object({
    value: z.unknown(),
    sensitive: z.boolean().optional(),
  }),
);

// =============================================================================
// Types
// =============================================================================

export interface TerraformAdapterOptions {
  /** Binary to execute (default: "terraform") */
  readonly binary?: string;

  /** Shared `TF_PLUGIN_CACHE_DIR`, if any */
  readonly pluginCacheDir?: string;

  readonly logger?: ContextualLogger;
}

interface CommandResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

// =============================================================================
// TerraformAdapter Class
// =============================================================================

export class TerraformAdapter implements ProvisioningAdapter {
  private readonly binary: string;
  private readonly pluginCacheDir: string | undefined;
  private readonly logger: ContextualLogger;

  constructor(options: TerraformAdapterOptions = {}) {
    this.binary = options.binary ?? "terraform";
    this.pluginCacheDir = options.pluginCacheDir;
    this.logger = options.logger ?? createSilentLogger();
  }

  async init(invocation: AdapterInvocation): Promise<void> {
    await this.runOrThrow(["init", "-input=false", "-no-color"], invocation);
  }

  async validate(invocation: AdapterInvocation): Promise<void> {
    await this.runOrThrow(["validate", "-no-color"], invocation);
  }

  /**
   * Imports each record whose address is not yet in state.
   */
  async importState(
    invocation: AdapterVarsInvocation & { readonly records: readonly StateImportRecord[] },
  ): Promise<string[]> {
    if (invocation.records.length === 0) {
      return [];
    }

    await this.writeInputVars(invocation.workdir, invocation.inputVars);
    const managed = await this.listState(invocation);
    const imported: string[] = [];

    for (const record of invocation.records) {
      if (managed.has(record.address)) {
        this.logger.debug("Resource already in state", { stage: invocation.stage, address: record.address });
        continue;
      }
      this.logger.info("Importing existing resource", { stage: invocation.stage, address: record.address });
      await this.runOrThrow(["import", "-input=false", "-no-color", record.address, record.id], invocation);
      imported.push(record.address);
    }

    return imported;
  }

  async apply(invocation: AdapterVarsInvocation): Promise<OutputVariables> {
    await this.writeInputVars(invocation.workdir, invocation.inputVars);
    await this.runOrThrow(["apply", "-input=false", "-no-color", "-auto-approve"], invocation);
    return this.output(invocation);
  }

  async output(invocation: AdapterInvocation): Promise<OutputVariables> {
    const result = await this.runOrThrow(["output", "-json"], invocation);

    let parsed: unknown;
    try {
      parsed = JSON.parse(result.stdout.trim() || "{}");
    } catch (err) {
      throw new ForgeError(
        `Terraform returned unreadable outputs for stage '${invocation.stage}'`,
        ErrorCode.PROVISION_OUTPUT_INVALID,
        { stage: invocation.stage },
        undefined,
        err instanceof Error ? err : undefined,
      );
    }

    const outputs = OutputJsonSchema.safeParse(parsed);
    if (!outputs.success) {
      throw new ForgeError(
        `Terraform returned unexpected outputs for stage '${invocation.stage}'`,
        ErrorCode.PROVISION_OUTPUT_INVALID,
        { stage: invocation.stage, issues: outputs.error.issues.map((i) => i.message) },
      );
    }

    return Object.fromEntries(Object.entries(outputs.data).map(([name, entry]) => [name, entry.value]));
  }

  async destroy(invocation: AdapterVarsInvocation): Promise<void> {
    await this.writeInputVars(invocation.workdir, invocation.inputVars);
    await this.runOrThrow(["destroy", "-input=false", "-no-color", "-auto-approve"], invocation);
  }

  // ===========================================================================
  // Private helpers
  // ===========================================================================

  private async writeInputVars(workdir: string, inputVars: Readonly<Record<string, unknown>>): Promise<void> {
    await fs.writeFile(path.join(workdir, TFVARS_FILENAME), JSON.stringify(inputVars, null, 2) + "\n", "utf-8");
  }

  /**
   * Addresses currently managed. A working directory without state has none.
   */
  private async listState(invocation: AdapterInvocation): Promise<Set<string>> {
    const result = await this.run(["state", "list"], invocation);
    if (result.exitCode !== 0) {
      if (result.stderr.includes("No state file was found")) {
        return new Set();
      }
      throw this.failure(["state", "list"], invocation, result);
    }
    return new Set(
      result.stdout
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => line.length > 0),
    );
  }

  private async runOrThrow(args: string[], invocation: AdapterInvocation): Promise<CommandResult> {
    const result = await this.run(args, invocation);
    if (result.exitCode !== 0) {
      throw this.failure(args, invocation, result);
    }
    return result;
  }

  private async run(args: string[], invocation: AdapterInvocation): Promise<CommandResult> {
    const logger = this.logger.forStage(invocation.stage);
    const env: Record<string, string> = {
      ...invocation.env,
      TF_IN_AUTOMATION: "1",
    };
    if (this.pluginCacheDir) {
      env.TF_PLUGIN_CACHE_DIR = this.pluginCacheDir;
    }

    logger.debug("Running terraform", { args: args.slice(0, 2) });
    const startTime = Date.now();

    const subprocess = execa(this.binary, args, {
      cwd: invocation.workdir,
      env,
      extendEnv: false,
      reject: false,
    });

    subprocess.stdout?.on("data", (chunk: Buffer) => {
      for (const line of chunk.toString().split("\n").filter((l) => l.trim())) {
        logger.debug(line, { stream: "stdout" });
      }
    });
    subprocess.stderr?.on("data", (chunk: Buffer) => {
      for (const line of chunk.toString().split("\n").filter((l) => l.trim())) {
        logger.debug(line, { stream: "stderr" });
      }
    });

    const result = await subprocess;
    const exitCode = result.exitCode ?? (result.failed ? 1 : 0);
    const stderr = result.stderr || (result.failed ? (result.message ?? "") : "");

    logger.debug("Terraform finished", { command: args[0], exitCode, durationMs: Date.now() - startTime });

    return { exitCode, stdout: result.stdout, stderr };
  }

  private failure(args: string[], invocation: AdapterInvocation, result: CommandResult): ProvisioningError {
    const command = `terraform ${args[0]}${args[0] === "state" ? ` ${args[1]}` : ""}`;
    const tail = result.stderr.split("\n").filter((l) => l.trim()).slice(-STDERR_TAIL_LINES).join("\n");
    return new ProvisioningError(`${command} failed for stage '${invocation.stage}'`, invocation.stage, {
      details: { command, exitCode: result.exitCode, workdir: invocation.workdir, stderr: tail },
      hint: `Run '${command}' manually in ${invocation.workdir} to debug.`,
    });
  }
}

/**
 * Stage lifecycle contract.
 *
 * A `StageDefinition` is the static, registrable description of a stage:
 * name, priority, the configuration sections it owns, the outputs it
 * publishes and the upstream outputs it reads. `create()` binds it to a
 * validated configuration and the run's collaborators, yielding a `Stage`.
 *
 * Scoped acquisitions (`plan`, `deploy`, `destroy`) take the nested work as
 * a callback: the stage acquires whatever it needs, runs the body, and
 * releases on every exit path. Later stages run inside an earlier stage's
 * body, so they see the environment that stage extended and nothing leaks
 * past it.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import type { ForgeConfig, ProviderVariant } from "../config/ConfigSchema.js";
import type { EnvironmentScope } from "../env/EnvironmentScope.js";
import { ForgeError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { ContextualLogger } from "../logging/ContextualLogger.js";
import type { StageOutputs } from "../outputs/StageOutputs.js";
import type { ClusterProbe } from "../cluster/ClusterProbe.js";
import type { ProvisioningAdapter, StateImportRecord } from "../provisioning/ProvisioningAdapter.js";
import type { RenderedFiles, TemplateRenderer } from "../render/TemplateRenderer.js";
import type { FieldRule } from "../schema/constraints.js";
import type { StagingManager } from "../staging/StagingManager.js";
import type { PersistedStageOutputs } from "../outputs/OutputStore.js";
import type { DestroyReport } from "./DestroyReport.js";
import type { StageLifecycle } from "./StageLifecycle.js";
import type { VariantTable } from "./variants.js";

// =============================================================================
// Types
// =============================================================================

export type SchemaShape = Readonly<Record<string, z.ZodType>>;

/**
 * An output field of an upstream stage that a stage reads.
 */
export interface OutputReference {
  readonly stage: string;
  readonly field: string;
}

/**
 * Collaborators and validated configuration a stage is bound to.
 */
export interface StageInit {
  readonly config: ForgeConfig;

  /** The whole validated document, including extension sections */
  readonly document: Readonly<Record<string, unknown>>;

  /** Project root: rendered files, outputs and local state live here */
  readonly rootDir: string;

  readonly adapter: ProvisioningAdapter;
  readonly staging: StagingManager;
  readonly templates: TemplateRenderer;
  readonly probe: ClusterProbe;
  readonly logger: ContextualLogger;
}

export interface StageDefinition {
  readonly name: string;

  /** Lower runs first; ties keep registration order */
  readonly priority: number;

  /** Top-level configuration sections this stage owns */
  readonly inputShape: SchemaShape;

  /** Fields of the record this stage publishes */
  readonly outputShape: SchemaShape;

  /** Upstream outputs read by `inputVars` */
  readonly requires: readonly OutputReference[];

  /** Cross-field rules over the document */
  readonly rules: readonly FieldRule[];

  /** Output fields that must never be written to disk */
  readonly sensitiveOutputs: readonly string[];

  /** Which provider variants the stage serves */
  readonly variants: VariantTable<object>;

  create(init: StageInit): Stage;
}

/**
 * What a stage is given when one of its lifecycle operations runs.
 */
export interface StageRunContext {
  readonly outputs: StageOutputs;
  readonly scope: EnvironmentScope;
  readonly lifecycle: StageLifecycle;
}

/**
 * What a stage hands to the stages nested inside it.
 */
export interface StageYield {
  readonly outputs: StageOutputs;
  readonly scope: EnvironmentScope;
}

export type NestedBody<T> = (inner: StageYield) => Promise<T>;

/**
 * `deploy` runs `apply`; `refresh` only reads outputs; `teardown` prepares
 * for `destroy`.
 */
export type PlanMode = "deploy" | "refresh" | "teardown";

// =============================================================================
// Stage Class
// =============================================================================

export abstract class Stage {
  readonly name: string;
  readonly priority: number;

  protected readonly config: ForgeConfig;
  protected readonly logger: ContextualLogger;

  constructor(
    readonly definition: StageDefinition,
    protected readonly init: StageInit,
  ) {
    this.name = definition.name;
    this.priority = definition.priority;
    this.config = init.config;
    this.logger = init.logger.forStage(definition.name);
  }

  get provider(): ProviderVariant {
    return this.config.provider;
  }

  /**
   * Disabled stages are skipped by every pass.
   */
  enabled(): boolean {
    return true;
  }

  /**
   * Files to write, keyed by path relative to the project root. Reads static
   * templates at most; never touches the network or spawns processes.
   */
  async render(): Promise<RenderedFiles> {
    return {};
  }

  /**
   * Variables for the provisioning tool, projected from configuration and
   * upstream outputs.
   */
  inputVars(_outputs: StageOutputs): Record<string, unknown> {
    return {};
  }

  /**
   * Existing remote resources to adopt before the first apply.
   */
  stateImports(_scope: EnvironmentScope): StateImportRecord[] {
    return [];
  }

  /**
   * Files the provisioning tool runs against, relative to the stage's
   * working directory.
   */
  protected async workingFiles(): Promise<RenderedFiles> {
    return {};
  }

  /**
   * Writes the working files into a fresh staging directory, runs `body`
   * there and removes the directory on every exit path.
   */
  async plan<T>(run: StageRunContext, body: (workdir: string) => Promise<T>, mode: PlanMode = "deploy"): Promise<T> {
    const files = await this.workingFiles();
    return this.init.staging.withStagingDir(this.name, async (workdir) => {
      await writeFiles(workdir, files);
      if (mode !== "refresh") {
        run.lifecycle.transition("planned");
      }
      return body(workdir);
    });
  }

  /**
   * Publishes this stage's outputs and runs the later stages. Stages without
   * provisioning publish an empty record.
   */
  async deploy<T>(run: StageRunContext, body: NestedBody<T>): Promise<T> {
    const outputs = this.setOutputs(run.outputs, {});
    run.lifecycle.transition("deployed");
    return body({ outputs, scope: this.extendScope(outputs, run.scope) });
  }

  /**
   * Re-enters a stage that an earlier run completed, without repeating its
   * side effects.
   */
  async resume<T>(run: StageRunContext, _persisted: PersistedStageOutputs, body: NestedBody<T>): Promise<T> {
    return this.deploy(run, body);
  }

  /**
   * Post-deploy verification.
   *
   * @throws CheckFailure when the stage's resource is unusable
   */
  async check(_run: StageYield): Promise<void> {}

  /**
   * Tears the stage down after the later stages (`body`) have been torn
   * down, recording the outcome in `report`.
   */
  async destroy(run: StageRunContext, report: DestroyReport, body: NestedBody<void>): Promise<void> {
    await body({ outputs: run.outputs, scope: run.scope });
    run.lifecycle.transition("destroyed");
    report.record(this.name, true);
  }

  /**
   * Validates `values` against the output schema and publishes them.
   *
   * @throws ForgeError (STAGE_OUTPUT_INVALID) when `values` do not match
   */
  setOutputs(outputs: StageOutputs, values: Record<string, unknown>): StageOutputs {
    const result = z.object({ ...this.definition.outputShape }).safeParse(values);
    if (!result.success) {
      throw new ForgeError(
        `Stage '${this.name}' produced invalid outputs`,
        ErrorCode.STAGE_OUTPUT_INVALID,
        { stage: this.name, issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
        "The provisioning templates and the stage's output schema disagree.",
      );
    }
    return outputs.with(this.name, result.data);
  }

  /**
   * Environment the later stages run in. Stages that produce credentials
   * layer them on top of `scope`.
   */
  extendScope(_outputs: StageOutputs, scope: EnvironmentScope): EnvironmentScope {
    return scope;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Writes `files` beneath `baseDir`, creating directories as needed.
 */
export async function writeFiles(baseDir: string, files: RenderedFiles): Promise<string[]> {
  const resolvedBase = path.resolve(baseDir);
  const written: string[] = [];

  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.resolve(resolvedBase, relativePath);
    if (!target.startsWith(resolvedBase + path.sep)) {
      throw new ForgeError(
        `Refusing to write '${relativePath}' outside ${resolvedBase}`,
        ErrorCode.RENDER_WRITE_FAILED,
        { relativePath, baseDir: resolvedBase },
      );
    }
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, "utf-8");
    written.push(target);
  }

  return written;
}

/**
 * Base class for stages backed by the provisioning adapter.
 *
 * Variant-specific behavior lives in a `VariantTable<TerraformVariant>`; the
 * class dispatches on the configured provider and owns the shared flow:
 *
 * - deploy: plan (init, validate, state imports), apply, publish outputs,
 *   run later stages in the extended scope
 * - resume: read outputs without applying, publish, run later stages
 * - destroy: read outputs, run later stages' teardown, destroy, record
 *
 * Rendered files land in `stages/<name>/<provider>/` when rendering and in a
 * staging directory when the adapter runs.
 *
 * @module
 */

import type { ForgeConfig } from "../config/ConfigSchema.js";
import type { EnvironmentScope } from "../env/EnvironmentScope.js";
import type { StageOutputs } from "../outputs/StageOutputs.js";
import type { PersistedStageOutputs } from "../outputs/OutputStore.js";
import type { StateImportRecord } from "../provisioning/ProvisioningAdapter.js";
import { renderSettings, SETTINGS_FILENAME, stateBackend, type BackendBlock } from "../provisioning/terraformSettings.js";
import type { RenderedFiles } from "../render/TemplateRenderer.js";
import { stagePrefix } from "../utils/paths.js";
import type { DestroyReport } from "./DestroyReport.js";
import { Stage, type NestedBody, type PlanMode, type StageDefinition, type StageInit, type StageRunContext, type StageYield } from "./Stage.js";
import { dispatch, type VariantTable } from "./variants.js";

// =============================================================================
// Types
// =============================================================================

/**
 * One provider variant's implementation of a Terraform stage.
 */
export interface TerraformVariant {
  inputVars(config: ForgeConfig, outputs: StageOutputs): Record<string, unknown>;

  stateImports?(config: ForgeConfig, scope: EnvironmentScope): StateImportRecord[];

  /** `provider` blocks for the settings file */
  providers?(config: ForgeConfig): Record<string, unknown>;
}

// =============================================================================
// TerraformStage Class
// =============================================================================

export abstract class TerraformStage extends Stage {
  constructor(
    definition: StageDefinition,
    init: StageInit,
    protected readonly variants: VariantTable<TerraformVariant>,
  ) {
    super(definition, init);
  }

  protected get variant(): TerraformVariant {
    return dispatch(this.variants, this.provider, this.name);
  }

  override inputVars(outputs: StageOutputs): Record<string, unknown> {
    return this.variant.inputVars(this.config, outputs);
  }

  override stateImports(scope: EnvironmentScope): StateImportRecord[] {
    return this.variant.stateImports?.(this.config, scope) ?? [];
  }

  /**
   * Where this stage keeps its state.
   */
  protected backend(): BackendBlock {
    return stateBackend(this.config, this.name, this.init.rootDir);
  }

  /**
   * Values the stage's templates are rendered with.
   */
  protected templateData(): Record<string, unknown> {
    return {
      project_name: this.config.project_name,
      namespace: this.config.namespace,
      provider: this.provider,
      stage: this.name,
    };
  }

  protected override async workingFiles(): Promise<RenderedFiles> {
    const variant = this.variant;
    const files = await this.init.templates.render(this.name, this.provider, this.templateData());
    files[SETTINGS_FILENAME] = renderSettings(this.backend(), variant.providers?.(this.config));
    return files;
  }

  override async render(): Promise<RenderedFiles> {
    const prefix = stagePrefix(this.name, this.provider);
    const files = await this.workingFiles();
    return Object.fromEntries(Object.entries(files).map(([file, content]) => [`${prefix}/${file}`, content]));
  }

  /**
   * Prepares the working directory: init, and for deploys validate and state
   * imports.
   */
  override async plan<T>(
    run: StageRunContext,
    body: (workdir: string) => Promise<T>,
    mode: PlanMode = "deploy",
  ): Promise<T> {
    const env = run.scope.variables();
    return super.plan(
      run,
      async (workdir) => {
        const invocation = { stage: this.name, workdir, env };
        await this.init.adapter.init(invocation);

        if (mode === "deploy") {
          await this.init.adapter.validate(invocation);
          const records = this.stateImports(run.scope);
          if (records.length > 0) {
            const imported = await this.init.adapter.importState({
              ...invocation,
              inputVars: this.inputVars(run.outputs),
              records,
            });
            this.logger.info("State imports reconciled", { requested: records.length, imported: imported.length });
          }
        }

        return body(workdir);
      },
      mode,
    );
  }

  override async deploy<T>(run: StageRunContext, body: NestedBody<T>): Promise<T> {
    const inputVars = this.inputVars(run.outputs);
    return this.plan(run, async (workdir) => {
      this.logger.info("Applying stage");
      const values = await this.init.adapter.apply({
        stage: this.name,
        workdir,
        env: run.scope.variables(),
        inputVars,
      });
      const outputs = this.setOutputs(run.outputs, this.completeOutputs(values));
      run.lifecycle.transition("deployed");
      return body({ outputs, scope: this.extendScope(outputs, run.scope) });
    });
  }

  override async resume<T>(run: StageRunContext, _persisted: PersistedStageOutputs, body: NestedBody<T>): Promise<T> {
    return this.plan(
      run,
      async (workdir) => {
        this.logger.info("Resuming stage from recorded outputs");
        const values = await this.init.adapter.output({ stage: this.name, workdir, env: run.scope.variables() });
        const outputs = this.setOutputs(run.outputs, this.completeOutputs(values));
        run.lifecycle.transition("deployed");
        return body({ outputs, scope: this.extendScope(outputs, run.scope) });
      },
      "refresh",
    );
  }

  /**
   * Refreshes outputs, tears down the later stages, then destroys this one.
   * Failures are recorded in `report`, never thrown; a failure of the
   * nested body itself is an internal error and propagates.
   */
  override async destroy(run: StageRunContext, report: DestroyReport, body: NestedBody<void>): Promise<void> {
    let bodyEntered = false;
    let bodyError: unknown;

    const enterBody = async (inner: StageYield): Promise<void> => {
      bodyEntered = true;
      try {
        await body(inner);
      } catch (error) {
        bodyError = error;
        throw error;
      }
    };

    try {
      await this.plan(
        run,
        async (workdir) => {
          const env = run.scope.variables();
          const inner = await this.refresh(run, workdir);
          await enterBody(inner);

          this.logger.info("Destroying stage");
          await this.init.adapter.destroy({
            stage: this.name,
            workdir,
            env,
            inputVars: this.inputVars(run.outputs),
          });
        },
        "teardown",
      );
    } catch (error) {
      if (bodyError !== undefined) {
        throw bodyError;
      }
      if (!bodyEntered) {
        await body({ outputs: run.outputs, scope: run.scope });
      }
      this.logger.error("Stage teardown failed", { error: error instanceof Error ? error : new Error(String(error)) });
      run.lifecycle.fail();
      report.record(this.name, false, error);
      return;
    }

    run.lifecycle.transition("destroyed");
    report.record(this.name, true);
  }

  /**
   * Outputs and scope for the stages torn down before this one. When the
   * outputs cannot be read the stage is left unpublished, and later stages
   * that need them record their own failure.
   */
  private async refresh(run: StageRunContext, workdir: string): Promise<StageYield> {
    try {
      const values = await this.init.adapter.output({ stage: this.name, workdir, env: run.scope.variables() });
      const outputs = this.setOutputs(run.outputs, this.completeOutputs(values));
      return { outputs, scope: this.extendScope(outputs, run.scope) };
    } catch (error) {
      this.logger.warn("Could not read stage outputs before teardown", {
        error: error instanceof Error ? error : new Error(String(error)),
      });
      return { outputs: run.outputs, scope: run.scope };
    }
  }

  /**
   * Hook for values only known after the adapter ran, merged before the
   * outputs are validated.
   */
  protected completeOutputs(values: Record<string, unknown>): Record<string, unknown> {
    return values;
  }
}

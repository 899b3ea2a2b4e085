/**
 * Orchestrator - runs the registered stages as one pass.
 *
 * Every pass starts with validation (union schema, field rules, version
 * marker, dependency graph, provider support of every enabled stage);
 * nothing is rendered, planned or applied until the whole document is
 * accepted.
 *
 * ## Deploy
 *
 * Stages run in ascending priority. Each stage renders, deploys, is checked
 * and has its outputs persisted, then the next stage runs inside the body of
 * the previous one, so it sees that stage's outputs and environment scope.
 * The first failure halts the pass; the output store keeps exactly the
 * stages that completed.
 *
 * ## Resume
 *
 * With `resume`, a stage that an earlier run completed for the same provider
 * is not applied again. Its outputs are re-read from the provisioning tool
 * and its check runs again before later stages proceed.
 *
 * ## Destroy
 *
 * Stage contexts are acquired in ascending order and torn down in reverse.
 * A failing stage is recorded and the remaining stages are still attempted;
 * the pass ends with `PartialDestroyFailure` when anything failed.
 *
 * @module
 */

import * as path from "node:path";
import type { ClusterProbe } from "../cluster/ClusterProbe.js";
import { KubectlProbe } from "../cluster/ClusterProbe.js";
import { ConfigLoader, type ValidatedConfig } from "../config/ConfigLoader.js";
import { assertCredentials, type EnvironmentRecord } from "../config/credentials.js";
import { EnvironmentScope } from "../env/EnvironmentScope.js";
import { ConfigurationError, ForgeError, PartialDestroyFailure } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { createSilentLogger, type ContextualLogger } from "../logging/ContextualLogger.js";
import { createExecutionContext, type ExecutionContext, type RunKind } from "../logging/ExecutionContext.js";
import { Step } from "../logging/Step.js";
import { StepTimer } from "../logging/StepTimer.js";
import { OutputStore } from "../outputs/OutputStore.js";
import { StageOutputs } from "../outputs/StageOutputs.js";
import type { ProvisioningAdapter } from "../provisioning/ProvisioningAdapter.js";
import type { StageRegistry } from "../registry/StageRegistry.js";
import { TemplateRenderer } from "../render/TemplateRenderer.js";
import { DestroyReport, type DestroyStatus } from "../stages/DestroyReport.js";
import { writeFiles, type Stage, type StageYield } from "../stages/Stage.js";
import { StageLifecycle, type RunDirection, type StageState } from "../stages/StageLifecycle.js";
import { dispatch } from "../stages/variants.js";
import { StagingManager } from "../staging/StagingManager.js";

// =============================================================================
// Types
// =============================================================================

export interface OrchestratorOptions {
  readonly registry: StageRegistry;
  readonly adapter: ProvisioningAdapter;

  /** Cluster reachability checks (default: kubectl) */
  readonly probe?: ClusterProbe;

  readonly templates?: TemplateRenderer;
  readonly logger?: ContextualLogger;

  /**
   * Base environment for the provisioning tool and credential checks.
   * The CLI passes a copy of `process.env`; nothing reads it implicitly.
   */
  readonly env?: EnvironmentRecord;
}

interface PassOptions {
  /** Project root: rendered files, persisted outputs and local state */
  readonly rootDir: string;
}

export interface DeployOptions extends PassOptions {
  /** Skip stages an earlier run completed */
  readonly resume?: boolean;

  /** Leave the rendered files in the project root untouched */
  readonly skipRender?: boolean;
}

export interface DestroyOptions extends PassOptions {
  /** Skip the confirmation */
  readonly disablePrompt?: boolean;

  /**
   * Asked once validation passed, unless `disablePrompt` is set. Returning
   * false aborts before any stage is touched.
   */
  readonly confirm?: (request: DestroyConfirmation) => Promise<boolean>;
}

export interface DestroyConfirmation {
  readonly project: string;

  /** Enabled stages in priority order; teardown runs in reverse */
  readonly stages: readonly string[];
}

export interface RenderOptions extends PassOptions {
  /** Where rendered files are written (default: `rootDir`) */
  readonly outputDir?: string;
}

export interface StageSummary {
  readonly stage: string;
  readonly state: StageState;
  readonly resumed: boolean;
}

export interface DeployResult {
  readonly context: ExecutionContext;
  readonly outputs: StageOutputs;
  readonly stages: readonly StageSummary[];
}

export interface DestroyResult {
  readonly context: ExecutionContext;
  readonly status: Record<string, DestroyStatus>;
  readonly stages: readonly StageSummary[];
}

export interface RenderResult {
  readonly context: ExecutionContext;

  /** Written files, relative to the output directory */
  readonly files: readonly string[];
}

export interface ValidateResult extends ValidatedConfig {
  readonly context: ExecutionContext;

  /** Stages that would run, in order */
  readonly stages: readonly string[];
}

/**
 * Per-pass state shared by the nested stage calls.
 */
interface Pass {
  readonly context: ExecutionContext;
  readonly logger: ContextualLogger;
  readonly timer: StepTimer;
  readonly validated: ValidatedConfig;
  readonly stages: readonly Stage[];
  readonly store: OutputStore;
  readonly summaries: StageSummary[];
}

interface Tracked {
  readonly stage: Stage;
  readonly lifecycle: StageLifecycle;
  resumed: boolean;
}

// =============================================================================
// Orchestrator Class
// =============================================================================

export class Orchestrator {
  private readonly loader: ConfigLoader;
  private readonly probe: ClusterProbe;
  private readonly templates: TemplateRenderer;
  private readonly logger: ContextualLogger;
  private readonly env: EnvironmentRecord;

  constructor(private readonly options: OrchestratorOptions) {
    this.loader = new ConfigLoader(options.registry);
    this.probe = options.probe ?? new KubectlProbe();
    this.templates = options.templates ?? new TemplateRenderer();
    this.logger = options.logger ?? createSilentLogger();
    this.env = { ...(options.env ?? {}) };
  }

  // ===========================================================================
  // Passes
  // ===========================================================================

  /**
   * Validates a parsed configuration document.
   *
   * @throws ConfigurationError or DependencyOrderError
   */
  async validate(document: unknown): Promise<ValidateResult> {
    const { context, logger, timer } = this.begin("validate");
    const validated = await this.runValidation(document, timer);
    const stages = this.createStages(validated, process.cwd(), logger)
      .filter((stage) => stage.enabled())
      .map((stage) => stage.name);

    logger.withContext({ step: Step.DONE }).info("Configuration valid", { stages });
    return { ...validated, context, stages };
  }

  /**
   * Writes every enabled stage's rendered files beneath the output directory.
   */
  async render(document: unknown, options: RenderOptions): Promise<RenderResult> {
    const { context, logger, timer } = this.begin("render");
    const validated = await this.runValidation(document, timer);
    const outputDir = path.resolve(options.outputDir ?? options.rootDir);
    const files: string[] = [];

    for (const stage of this.createStages(validated, options.rootDir, logger)) {
      if (!stage.enabled()) {
        logger.forStage(stage.name).info("Stage disabled, not rendered");
        continue;
      }
      const written = await timer.run(Step.STAGE_RENDER, () => this.writeRendered(stage, outputDir), {
        stage: stage.name,
      });
      files.push(...written.map((file) => path.relative(outputDir, file)));
    }

    logger.withContext({ step: Step.DONE }).info("Render complete", { outputDir, files: files.length });
    return { context, files };
  }

  /**
   * Deploys every enabled stage in ascending priority.
   *
   * @throws ConfigurationError before any stage runs; ProvisioningError,
   *   CheckFailure or the stage's own error once a stage failed
   */
  async deploy(document: unknown, options: DeployOptions): Promise<DeployResult> {
    const { context, logger, timer } = this.begin("deploy");
    const validated = await this.runValidation(document, timer);
    const { config } = validated;

    if (config.prevent_deploy) {
      throw new ConfigurationError("Deployments are disabled for this project", {
        code: ErrorCode.DEPLOY_PREVENTED,
        details: { project: config.project_name, namespace: config.namespace },
        hint: "Set prevent_deploy to false in the configuration to deploy.",
      });
    }
    assertCredentials(config.provider, this.env);

    const pass = this.createPass(context, logger, timer, validated, options);
    logger.info("Deploying", {
      provider: config.provider,
      stages: pass.stages.map((stage) => stage.name),
      resume: options.resume ?? false,
    });

    const outputs = await this.deployFrom(pass, 0, this.rootYield(), options);

    logger.withContext({ step: Step.DONE }).info("Deploy complete", { stages: outputs.stages() });
    return { context, outputs, stages: pass.summaries };
  }

  /**
   * Tears every enabled stage down in descending priority.
   *
   * @throws PartialDestroyFailure when any stage failed to tear down
   * @throws ForgeError (DESTROY_ABORTED) when the confirmation is declined
   */
  async destroy(document: unknown, options: DestroyOptions): Promise<DestroyResult> {
    const { context, logger, timer } = this.begin("destroy");
    const validated = await this.runValidation(document, timer);
    assertCredentials(validated.config.provider, this.env);

    const pass = this.createPass(context, logger, timer, validated, options);
    const names = pass.stages.filter((stage) => stage.enabled()).map((stage) => stage.name);

    const confirmed =
      options.disablePrompt === true ||
      !options.confirm ||
      (await options.confirm({ project: validated.config.project_name, stages: names }));
    if (!confirmed) {
      throw new ForgeError(
        "Destroy aborted",
        ErrorCode.DESTROY_ABORTED,
        { stages: names },
        "Re-run with --disable-prompt to skip the confirmation.",
      );
    }

    const report = new DestroyReport();
    logger.info("Destroying", { provider: validated.config.provider, stages: [...names].reverse() });
    await this.destroyFrom(pass, 0, this.rootYield(), report);

    if (report.hasFailures()) {
      throw new PartialDestroyFailure(report.outcomes());
    }

    logger.withContext({ step: Step.DONE }).info("Destroy complete", { stages: report.outcomes().length });
    return { context, status: report.toStatus(), stages: pass.summaries };
  }

  // ===========================================================================
  // Deploy
  // ===========================================================================

  private async deployFrom(pass: Pass, index: number, inner: StageYield, options: DeployOptions): Promise<StageOutputs> {
    const stage = pass.stages[index];
    if (!stage) {
      return inner.outputs;
    }

    const tracked = this.track(pass, stage, "deploy");
    const { lifecycle } = tracked;
    const log = pass.logger.forStage(stage.name);

    if (!stage.enabled()) {
      lifecycle.transition("skipped");
      log.info("Stage disabled, skipped");
      return this.deployFrom(pass, index + 1, inner, options);
    }

    const provider = pass.validated.config.provider;
    const run = { ...inner, lifecycle };

    const body = async (next: StageYield): Promise<StageOutputs> => {
      await pass.timer.run(Step.STAGE_CHECK, () => stage.check(next), { stage: stage.name });
      lifecycle.transition("checked");

      await pass.timer.run(
        Step.OUTPUTS_WRITE,
        () =>
          pass.store.write({
            stage: stage.name,
            provider,
            outputs: next.outputs.get(stage.name) ?? {},
            sensitive: stage.definition.sensitiveOutputs,
          }),
        { stage: stage.name },
      );

      return this.deployFrom(pass, index + 1, next, options);
    };

    try {
      if (options.skipRender) {
        await stage.render();
      } else {
        await pass.timer.run(Step.STAGE_RENDER, () => this.writeRendered(stage, options.rootDir), {
          stage: stage.name,
        });
      }
      lifecycle.transition("rendered");

      const persisted = options.resume ? await pass.store.read(stage.name) : null;
      if (persisted && persisted.provider === provider) {
        tracked.resumed = true;
        return await pass.timer.run(Step.STAGE_RESUME, () => stage.resume(run, persisted, body), {
          stage: stage.name,
        });
      }
      if (persisted) {
        log.warn("Recorded outputs belong to another provider, deploying again", {
          recorded: persisted.provider,
          provider,
        });
      }

      return await pass.timer.run(Step.STAGE_DEPLOY, () => stage.deploy(run, body), { stage: stage.name });
    } catch (error) {
      // Later stages fail inside this stage's body; only the stage that
      // failed first is still in a non-terminal state.
      if (lifecycle.canTransition("failed")) {
        lifecycle.fail();
        log.error("Stage failed", { error: error instanceof Error ? error : new Error(String(error)) });
      }
      throw error;
    }
  }

  // ===========================================================================
  // Destroy
  // ===========================================================================

  private async destroyFrom(pass: Pass, index: number, inner: StageYield, report: DestroyReport): Promise<void> {
    const stage = pass.stages[index];
    if (!stage) {
      return;
    }

    const { lifecycle } = this.track(pass, stage, "teardown");

    if (!stage.enabled()) {
      lifecycle.transition("skipped");
      pass.logger.forStage(stage.name).info("Stage disabled, skipped");
      return this.destroyFrom(pass, index + 1, inner, report);
    }

    const run = { ...inner, lifecycle };

    pass.timer.start(Step.STAGE_DESTROY, { stage: stage.name });
    await stage.destroy(run, report, (next) => this.destroyFrom(pass, index + 1, next, report));
    pass.timer.end(Step.STAGE_DESTROY, stage.name, { status: report.status(stage.name) });

    if (report.status(stage.name) === "success") {
      try {
        await pass.store.remove(stage.name);
      } catch (error) {
        // The stage itself is torn down; earlier stages still follow.
        pass.logger.forStage(stage.name).warn("Could not remove recorded outputs", {
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private begin(kind: RunKind): { context: ExecutionContext; logger: ContextualLogger; timer: StepTimer } {
    const context = createExecutionContext(kind);
    const logger = this.logger.withContext({ correlationId: context.correlationId, run: kind });
    return { context, logger, timer: new StepTimer(logger) };
  }

  private async runValidation(document: unknown, timer: StepTimer): Promise<ValidatedConfig> {
    return timer.run(Step.CONFIG_VALIDATE, async () => this.loader.validate(document));
  }

  private createPass(
    context: ExecutionContext,
    logger: ContextualLogger,
    timer: StepTimer,
    validated: ValidatedConfig,
    options: PassOptions,
  ): Pass {
    return {
      context,
      logger,
      timer,
      validated,
      stages: this.createStages(validated, options.rootDir, logger),
      store: new OutputStore(options.rootDir),
      summaries: [],
    };
  }

  private createStages(validated: ValidatedConfig, rootDir: string, logger: ContextualLogger): Stage[] {
    const resolvedRoot = path.resolve(rootDir);
    const init = {
      config: validated.config,
      document: validated.document,
      rootDir: resolvedRoot,
      adapter: this.options.adapter,
      staging: new StagingManager(resolvedRoot, logger),
      templates: this.templates,
      probe: this.probe,
      logger,
    };
    const stages = this.options.registry.stages().map((definition) => definition.create(init));

    // Every enabled stage must serve the provider before anything is applied.
    for (const stage of stages) {
      if (stage.enabled()) {
        dispatch(stage.definition.variants, validated.config.provider, stage.name);
      }
    }

    return stages;
  }

  private rootYield(): StageYield {
    return { outputs: StageOutputs.empty(), scope: EnvironmentScope.root(this.env) };
  }

  /**
   * Registers a stage's lifecycle in the pass summary. The summary reads the
   * lifecycle lazily, so it always reports the latest state.
   */
  private track(pass: Pass, stage: Stage, direction: RunDirection): Tracked {
    const tracked: Tracked = { stage, lifecycle: new StageLifecycle(stage.name, direction), resumed: false };
    pass.summaries.push({
      stage: stage.name,
      get state() {
        return tracked.lifecycle.state;
      },
      get resumed() {
        return tracked.resumed;
      },
    });
    return tracked;
  }

  private async writeRendered(stage: Stage, outputDir: string): Promise<string[]> {
    return writeFiles(outputDir, await stage.render());
  }
}

/**
 * Collaborators shared by the command handlers.
 *
 * Handlers receive these explicitly; tests pass a stub adapter and probe,
 * the CLI passes the Terraform adapter and kubectl probe.
 *
 * @module
 */

import { KubectlProbe, type ClusterProbe } from "../../core/cluster/ClusterProbe.js";
import type { EnvironmentRecord } from "../../core/config/credentials.js";
import { createLogger, type ContextualLogger, type LogLevel } from "../../core/logging/ContextualLogger.js";
import { Orchestrator } from "../../core/orchestrator/Orchestrator.js";
import type { ProvisioningAdapter } from "../../core/provisioning/ProvisioningAdapter.js";
import { TerraformAdapter } from "../../core/provisioning/TerraformAdapter.js";
import { StageRegistry } from "../../core/registry/StageRegistry.js";
import type { TemplateRenderer } from "../../core/render/TemplateRenderer.js";
import { ensureCachePaths } from "../../core/utils/paths.js";
import type { UxLevel } from "../ux/CliUx.js";

export interface CommandDependencies {
  readonly registry: StageRegistry;
  readonly adapter: ProvisioningAdapter;
  readonly probe?: ClusterProbe;
  readonly templates?: TemplateRenderer;
  readonly logger: ContextualLogger;

  /** Base environment for credentials and child processes */
  readonly env: EnvironmentRecord;
}

export type DependencyFactory = (level: UxLevel) => Promise<CommandDependencies>;

/**
 * Structured logs stay quiet unless the user asked for more output.
 */
export function logLevelFor(level: UxLevel): LogLevel {
  switch (level) {
    case "debug":
      return "debug";
    case "verbose":
      return "info";
    case "info":
      return "warn";
    case "silent":
      return "error";
  }
}

export async function createDefaultDependencies(level: UxLevel): Promise<CommandDependencies> {
  const logger = createLogger({ minLevel: logLevelFor(level), debug: level === "debug" });
  const { pluginCacheDir } = await ensureCachePaths();

  return {
    registry: StageRegistry.create(),
    adapter: new TerraformAdapter({ pluginCacheDir, logger }),
    probe: new KubectlProbe(),
    logger,
    env: { ...process.env },
  };
}

export function createOrchestrator(deps: CommandDependencies): Orchestrator {
  return new Orchestrator({
    registry: deps.registry,
    adapter: deps.adapter,
    probe: deps.probe,
    templates: deps.templates,
    logger: deps.logger,
    env: deps.env,
  });
}

/**
 * Handler for the `deploy` CLI command.
 *
 * Reads the configuration file and runs the deploy pass, or, for a dry run,
 * only the render pass. Kept apart from the commander wiring so it can be
 * tested with a stub adapter.
 *
 * @module
 */

import * as path from "node:path";
import { ConfigLoader } from "../../core/config/ConfigLoader.js";
import type { DeployResult, RenderResult } from "../../core/orchestrator/Orchestrator.js";
import { createOrchestrator, type CommandDependencies } from "./dependencies.js";

export interface DeployInput {
  readonly configPath: string;

  /** Project root (default: the configuration file's directory) */
  readonly rootDir?: string;

  readonly resume: boolean;

  /** Render only */
  readonly dryRun: boolean;

  /** Deploy from the files already rendered into the project */
  readonly skipRender: boolean;
}

export type DeployOutcome =
  | { readonly kind: "deployed"; readonly rootDir: string; readonly result: DeployResult }
  | { readonly kind: "rendered"; readonly rootDir: string; readonly result: RenderResult };

export async function handleDeploy(input: DeployInput, deps: CommandDependencies): Promise<DeployOutcome> {
  const loader = new ConfigLoader(deps.registry);
  const { document, path: configPath } = await loader.read(input.configPath);
  const rootDir = path.resolve(input.rootDir ?? path.dirname(configPath));
  const orchestrator = createOrchestrator(deps);

  if (input.dryRun) {
    const result = await orchestrator.render(document, { rootDir });
    return { kind: "rendered", rootDir, result };
  }

  const result = await orchestrator.deploy(document, {
    rootDir,
    resume: input.resume,
    skipRender: input.skipRender,
  });
  return { kind: "deployed", rootDir, result };
}

/**
 * One line per stage with its final state.
 */
export function formatDeploySummary(result: DeployResult): string[] {
  return result.stages.map((summary) => {
    const note = summary.resumed ? " (resumed)" : "";
    return `${summary.stage}: ${summary.state}${note}`;
  });
}

/**
 * Handler for the `validate` CLI command.
 *
 * @module
 */

import { ConfigLoader } from "../../core/config/ConfigLoader.js";
import type { ValidateResult } from "../../core/orchestrator/Orchestrator.js";
import { createOrchestrator, type CommandDependencies } from "./dependencies.js";

export interface ValidateInput {
  readonly configPath: string;
}

export interface ValidateOutcome {
  readonly configPath: string;
  readonly result: ValidateResult;
}

export async function handleValidate(input: ValidateInput, deps: CommandDependencies): Promise<ValidateOutcome> {
  const loader = new ConfigLoader(deps.registry);
  const { document, path: configPath } = await loader.read(input.configPath);
  return { configPath, result: await createOrchestrator(deps).validate(document) };
}

export function formatValidateOutput(outcome: ValidateOutcome): string[] {
  const { config, stages } = outcome.result;
  return [
    `Configuration valid: ${outcome.configPath}`,
    `  project: ${config.project_name}`,
    `  namespace: ${config.namespace}`,
    `  provider: ${config.provider}`,
    `  stages: ${stages.join(", ")}`,
  ];
}

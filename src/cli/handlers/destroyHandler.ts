/**
 * Handler for the `destroy` CLI command.
 *
 * @module
 */

import * as path from "node:path";
import { ConfigLoader } from "../../core/config/ConfigLoader.js";
import type { DestroyConfirmation, DestroyResult } from "../../core/orchestrator/Orchestrator.js";
import { createOrchestrator, type CommandDependencies } from "./dependencies.js";

export interface DestroyInput {
  readonly configPath: string;
  readonly rootDir?: string;
  readonly disablePrompt: boolean;
}

export interface DestroyDependencies extends CommandDependencies {
  /** Asked before anything is torn down, unless prompts are disabled */
  readonly confirm?: (request: DestroyConfirmation) => Promise<boolean>;
}

/**
 * @throws PartialDestroyFailure carrying every stage's outcome when a stage
 *   failed to tear down
 */
export async function handleDestroy(input: DestroyInput, deps: DestroyDependencies): Promise<DestroyResult> {
  const loader = new ConfigLoader(deps.registry);
  const { document, path: configPath } = await loader.read(input.configPath);

  return createOrchestrator(deps).destroy(document, {
    rootDir: path.resolve(input.rootDir ?? path.dirname(configPath)),
    disablePrompt: input.disablePrompt,
    confirm: deps.confirm,
  });
}

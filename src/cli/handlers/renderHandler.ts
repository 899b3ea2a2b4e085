/**
 * Handler for the `render` CLI command.
 *
 * @module
 */

import * as path from "node:path";
import { ConfigLoader } from "../../core/config/ConfigLoader.js";
import type { RenderResult } from "../../core/orchestrator/Orchestrator.js";
import { createOrchestrator, type CommandDependencies } from "./dependencies.js";

export interface RenderInput {
  readonly configPath: string;

  /** Default: the configuration file's directory */
  readonly outputDir?: string;
}

export interface RenderOutcome {
  readonly outputDir: string;
  readonly result: RenderResult;
}

export async function handleRender(input: RenderInput, deps: CommandDependencies): Promise<RenderOutcome> {
  const loader = new ConfigLoader(deps.registry);
  const { document, path: configPath } = await loader.read(input.configPath);
  const rootDir = path.dirname(configPath);
  const outputDir = path.resolve(input.outputDir ?? rootDir);

  const result = await createOrchestrator(deps).render(document, { rootDir, outputDir });
  return { outputDir, result };
}

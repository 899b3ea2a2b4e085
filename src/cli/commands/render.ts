/**
 * `render` CLI command.
 *
 * Usage:
 *   clusterforge render [--config <path>] [--output <dir>]
 *
 * @module
 */

import { Command } from "commander";
import { createDefaultDependencies, type DependencyFactory } from "../handlers/dependencies.js";
import { handleRender } from "../handlers/renderHandler.js";
import { formatRenderPreview } from "../printers/RenderPreviewPrinter.js";
import { CONFIG_DESCRIPTION, CONFIG_FLAGS, configPathOf, reportFailure, uxFor } from "./shared.js";

interface RenderFlags {
  readonly config?: string;
  readonly output?: string;
}

export function buildRenderCommand(
  createDependencies: DependencyFactory = createDefaultDependencies,
): Command {
  return new Command("render")
    .description("Write every enabled stage's files without provisioning")
    .option(CONFIG_FLAGS, CONFIG_DESCRIPTION)
    .option("-o, --output <dir>", "Output directory (default: the configuration file's directory)")
    .action(async (flags: RenderFlags, command: Command) => {
      const ux = uxFor(command);

      try {
        const deps = await createDependencies(ux.currentLevel);
        const { outputDir, result } = await handleRender(
          { configPath: configPathOf(flags.config), outputDir: flags.output },
          deps,
        );
        for (const line of formatRenderPreview(result.files, outputDir)) {
          ux.line(line);
        }
      } catch (error) {
        reportFailure(error, ux);
      }
    });
}

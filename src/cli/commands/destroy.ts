/**
 * `destroy` CLI command.
 *
 * Usage:
 *   clusterforge destroy [--config <path>] [--disable-prompt]
 *
 * Tears the stages down in reverse priority order and prints a per-stage
 * summary table, including when some stages failed.
 *
 * @module
 */

import { Command } from "commander";
import { PartialDestroyFailure } from "../../core/errors/errors.js";
import { createDefaultDependencies, type DependencyFactory } from "../handlers/dependencies.js";
import { handleDestroy } from "../handlers/destroyHandler.js";
import { formatDestroySummary } from "../printers/DestroySummaryPrinter.js";
import { confirmDestroy } from "../prompts/confirmDestroy.js";
import { CONFIG_DESCRIPTION, CONFIG_FLAGS, configPathOf, reportFailure, uxFor } from "./shared.js";

interface DestroyFlags {
  readonly config?: string;
  readonly disablePrompt: boolean;
}

export function buildDestroyCommand(
  createDependencies: DependencyFactory = createDefaultDependencies,
): Command {
  return new Command("destroy")
    .description("Tear every stage down in reverse priority order")
    .option(CONFIG_FLAGS, CONFIG_DESCRIPTION)
    .option("--disable-prompt", "Destroy without asking for confirmation", false)
    .action(async (flags: DestroyFlags, command: Command) => {
      const ux = uxFor(command);

      try {
        const deps = await createDependencies(ux.currentLevel);
        const result = await handleDestroy(
          { configPath: configPathOf(flags.config), disablePrompt: flags.disablePrompt },
          { ...deps, confirm: ({ project, stages }) => confirmDestroy(project, stages) },
        );

        ux.header("Destroy summary");
        const outcomes = Object.entries(result.status).map(([stage, status]) => ({
          stage,
          success: status === "success",
        }));
        for (const line of formatDestroySummary(outcomes, { useColors: ux.colors })) {
          ux.line(line);
        }
        ux.success("All stages destroyed");
      } catch (error) {
        if (error instanceof PartialDestroyFailure) {
          ux.header("Destroy summary");
          for (const line of formatDestroySummary(error.outcomes, { useColors: ux.colors })) {
            ux.line(line);
          }
        }
        reportFailure(error, ux);
      }
    });
}
